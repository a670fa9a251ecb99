export {
  HTTP_TRACE_HEADERS,
  OBJECT_STORE_DRIVERS,
  type ObjectStoreDriver,
} from './standards';
export {
  createJsonLogEntry,
  serializeError,
  type CreateJsonLogEntryInput,
  type JsonLogEntry,
  type LogLevel,
  type SerializedError,
} from './logging/json-log';
export { ensureCorrelationId, generateCorrelationId, generateId } from './tracing/ids';
