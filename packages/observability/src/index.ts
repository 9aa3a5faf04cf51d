export { log, serializeError, type LogLevel, type SerializedError } from './logger.js';
export {
  createServiceLogger,
  redactMetadata,
  type ServiceLogger,
  type ServiceLoggerConfig
} from './service-logger.js';
