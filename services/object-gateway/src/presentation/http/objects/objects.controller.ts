import {
  Controller,
  Delete,
  Get,
  Headers,
  Inject,
  Post,
  Put,
  Query,
  Req,
  Res,
  StreamableFile,
} from '@nestjs/common';
import type { IncomingMessage } from 'node:http';
import { HTTP_TRACE_HEADERS } from '@object-fs/shared';
import { ObjectsApplicationService } from '../../../application/objects/objects.application.service';
import { abortOnClientDisconnect, type HttpResponseLike } from '../common/client-disconnect';

const OCTET_STREAM = 'application/octet-stream';

@Controller('objects')
export class ObjectsController {
  constructor(
    @Inject(ObjectsApplicationService)
    private readonly objectsService: ObjectsApplicationService,
  ) {}

  @Get('stat')
  async statObject(
    @Res({ passthrough: true }) response: HttpResponseLike,
    @Query('key') key?: string,
    @Query('namespace') namespace?: string,
    @Headers(HTTP_TRACE_HEADERS.correlationId) correlationId?: string,
  ) {
    return this.objectsService.statObject({
      key,
      namespace,
      correlationId,
      signal: abortOnClientDisconnect(response),
    });
  }

  @Get('content')
  async readObjectContent(
    @Res({ passthrough: true }) response: HttpResponseLike,
    @Query('key') key?: string,
    @Query('namespace') namespace?: string,
    @Query('offset') offset?: string,
    @Query('length') length?: string,
    @Headers(HTTP_TRACE_HEADERS.correlationId) correlationId?: string,
  ): Promise<StreamableFile> {
    const result = await this.objectsService.readObjectRange({
      key,
      namespace,
      offset,
      length,
      correlationId,
      signal: abortOnClientDisconnect(response),
    });

    response.setHeader('last-modified', result.info.modifiedAt.toUTCString());
    response.setHeader(HTTP_TRACE_HEADERS.objectSize, String(result.info.size));
    response.setHeader(HTTP_TRACE_HEADERS.objectOffset, String(result.offset));
    return new StreamableFile(result.data, { type: OCTET_STREAM, length: result.data.length });
  }

  @Get('download')
  async downloadObject(
    @Res({ passthrough: true }) response: HttpResponseLike,
    @Query('key') key?: string,
    @Query('namespace') namespace?: string,
    @Headers(HTTP_TRACE_HEADERS.correlationId) correlationId?: string,
  ): Promise<StreamableFile> {
    const data = await this.objectsService.downloadObject({
      key,
      namespace,
      correlationId,
      signal: abortOnClientDisconnect(response),
    });
    return new StreamableFile(data, { type: OCTET_STREAM, length: data.length });
  }

  @Put('content')
  async putObjectContent(
    @Req() request: IncomingMessage,
    @Res({ passthrough: true }) response: HttpResponseLike,
    @Query('key') key?: string,
    @Query('namespace') namespace?: string,
    @Headers(HTTP_TRACE_HEADERS.correlationId) correlationId?: string,
  ) {
    return this.objectsService.putObject({
      key,
      namespace,
      correlationId,
      body: request,
      signal: abortOnClientDisconnect(response),
    });
  }

  @Delete()
  async deleteObject(
    @Query('key') key?: string,
    @Query('namespace') namespace?: string,
    @Headers(HTTP_TRACE_HEADERS.correlationId) correlationId?: string,
  ) {
    return this.objectsService.deleteObject({ key, namespace, correlationId });
  }

  @Post('presign')
  async presignObject(
    @Query('key') key?: string,
    @Query('namespace') namespace?: string,
    @Query('method') method?: string,
    @Query('expiresSeconds') expiresSeconds?: string,
    @Headers(HTTP_TRACE_HEADERS.correlationId) correlationId?: string,
  ) {
    return this.objectsService.presignObject({
      key,
      namespace,
      method,
      expiresSeconds,
      correlationId,
    });
  }
}
