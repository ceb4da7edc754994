/**
 * Error scopes representing functional domains in the system
 * Each scope owns its error codes and factory
 */
export enum ErrorScope {
    CONFIG = 'config', // Environment loading and validation
    CONTEXT = 'context', // Traceparent parsing and propagation
    TELEMETRY = 'telemetry', // Record construction and encoding
    EXPORTER = 'exporter', // OTLP/HTTP delivery
    RETRY = 'retry', // Retry policy and execution
    LOGGER = 'logger', // Diagnostic logger and its transports
    PROCESS = 'process', // Spawning and supervising step commands
}

/**
 * Error types describing the nature of the failure
 */
export enum ErrorType {
    USER = 'user', // bad input, invalid configuration or policy
    TIMEOUT = 'timeout', // operation exceeded its deadline
    SYSTEM = 'system', // internal failures, unexpected states
    THIRD_PARTY = 'third_party', // collector or other upstream failures
}
