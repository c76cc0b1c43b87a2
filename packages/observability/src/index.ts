export { log, type LogLevel } from './logger.js';
export { createServiceLogger, redactMetadata, type ServiceLogger, type ServiceLoggerConfig } from './service-logger.js';
