import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { HTTP_TRACE_HEADERS, createJsonLogEntry, ensureCorrelationId } from '@object-fs/shared';
import {
  ObjectStoreError,
  type ObjectStoreErrorCode,
} from '../../../domain/objects/object-store.errors';

interface HttpRequestLike {
  headers: Record<string, string | string[] | undefined>;
  originalUrl?: string;
  url?: string;
  method: string;
}

interface HttpResponseLike {
  headersSent?: boolean;
  setHeader(name: string, value: string): void;
  status(code: number): HttpResponseLike;
  json(body: unknown): void;
}

interface ErrorResponseBody {
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
  statusCode: number;
  path: string;
  method: string;
  timestamp: string;
  correlationId: string;
}

export interface NormalizedHttpError {
  statusCode: number;
  code: string;
  message: string;
  details?: unknown;
}

export function statusForObjectStoreError(code: ObjectStoreErrorCode): HttpStatus {
  switch (code) {
    case 'OBJECT_NOT_FOUND':
      return HttpStatus.NOT_FOUND;
    case 'RANGE_NOT_SATISFIABLE':
      return HttpStatus.REQUESTED_RANGE_NOT_SATISFIABLE;
    case 'MALFORMED_OBJECT_RESPONSE':
      return HttpStatus.BAD_GATEWAY;
    case 'OBJECT_CHANGED':
      return HttpStatus.CONFLICT;
    case 'INVALID_SEEK':
    case 'INVALID_OBJECT_KEY':
      return HttpStatus.BAD_REQUEST;
    case 'UNSUPPORTED_OPERATION':
      return HttpStatus.NOT_IMPLEMENTED;
  }
}

export function normalizeHttpException(exception: unknown): NormalizedHttpError {
  if (exception instanceof ObjectStoreError) {
    return {
      statusCode: statusForObjectStoreError(exception.code),
      code: exception.code,
      message: exception.message,
    };
  }

  if (exception instanceof HttpException) {
    const statusCode = exception.getStatus();
    const response = exception.getResponse();

    if (typeof response === 'string') {
      return {
        statusCode,
        code: defaultCodeForStatus(statusCode),
        message: response,
      };
    }

    const rawMessage: unknown = Reflect.get(response, 'message');
    const rawCode: unknown = Reflect.get(response, 'code');
    const details: unknown = Reflect.get(response, 'details');
    return {
      statusCode,
      code: typeof rawCode === 'string' ? rawCode : defaultCodeForStatus(statusCode),
      message: extractMessage(rawMessage) ?? (exception.message || 'Request failed.'),
      details: details ?? (Array.isArray(rawMessage) ? rawMessage : undefined),
    };
  }

  return {
    statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
    code: 'INTERNAL_SERVER_ERROR',
    message: 'Unexpected server error.',
  };
}

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const request = ctx.getRequest<HttpRequestLike>();
    const response = ctx.getResponse<HttpResponseLike>();

    const correlationId = ensureCorrelationId(request.headers[HTTP_TRACE_HEADERS.correlationId]);
    const normalized = normalizeHttpException(exception);
    const body: ErrorResponseBody = {
      error: {
        code: normalized.code,
        message: normalized.message,
        ...(normalized.details === undefined ? {} : { details: normalized.details }),
      },
      statusCode: normalized.statusCode,
      path: request.originalUrl ?? request.url ?? '/',
      method: request.method,
      timestamp: new Date().toISOString(),
      correlationId,
    };

    const level = normalized.statusCode >= 500 ? 'error' : 'warn';
    const logLine = JSON.stringify(createJsonLogEntry({
      level,
      service: 'object-gateway',
      message: 'HTTP request failed.',
      correlationId,
      metadata: {
        method: body.method,
        path: body.path,
        statusCode: body.statusCode,
        errorCode: body.error.code,
      },
      error: normalized.statusCode >= 500 ? exception : undefined,
    }));

    if (level === 'error') {
      this.logger.error(logLine);
    } else {
      this.logger.warn(logLine);
    }

    // A streamed body may already be on the wire.
    if (response.headersSent) {
      return;
    }
    response.setHeader(HTTP_TRACE_HEADERS.correlationId, correlationId);
    response.status(normalized.statusCode).json(body);
  }
}

function extractMessage(value: unknown): string | undefined {
  if (typeof value === 'string' && value.trim()) {
    return value;
  }
  if (Array.isArray(value)) {
    const first: unknown = value.find((item) => typeof item === 'string' && item.trim());
    if (typeof first === 'string') {
      return first;
    }
  }
  return undefined;
}

function defaultCodeForStatus(statusCode: number): string {
  switch (statusCode) {
    case HttpStatus.BAD_REQUEST:
      return 'BAD_REQUEST';
    case HttpStatus.NOT_FOUND:
      return 'NOT_FOUND';
    case HttpStatus.CONFLICT:
      return 'CONFLICT';
    case HttpStatus.PAYLOAD_TOO_LARGE:
      return 'PAYLOAD_TOO_LARGE';
    default:
      return statusCode >= 500 ? 'INTERNAL_SERVER_ERROR' : 'HTTP_ERROR';
  }
}
