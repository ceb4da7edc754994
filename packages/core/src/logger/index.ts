export * from './types.js';
export * from './schemas.js';
export { StepTraceLogger, type StepTraceLoggerConfig } from './logger.js';
export { createLogger, type CreateLoggerOptions } from './factory.js';
export { createTransport, createTransports } from './transport-factory.js';
export { ConsoleTransport, type ConsoleTransportConfig } from './transports/console-transport.js';
export { FileTransport, type FileTransportConfig } from './transports/file-transport.js';
export { SilentTransport } from './transports/silent-transport.js';
export { LoggerError } from './errors.js';
export { LoggerErrorCode } from './error-codes.js';
