/**
 * Logger Types and Interfaces
 *
 * Diagnostic logging for the instrumentation itself. Step output never flows
 * through here; it belongs to LogTee and the OTLP log records.
 */

/**
 * Log levels in order of severity
 * Following Winston convention: error < warn < info < debug < silly
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silly';

/**
 * Component identifiers for structured logging
 * Mirrors ErrorScope, plus the tracer and the CLI
 */
export enum LogComponent {
    CONFIG = 'config',
    CONTEXT = 'context',
    TELEMETRY = 'telemetry',
    EXPORTER = 'exporter',
    RETRY = 'retry',
    LOG_TEE = 'log_tee',
    PROCESS = 'process',
    TRACER = 'tracer',
    CLI = 'cli',
}

/**
 * Structured log entry
 * All logs are converted to this format before being sent to transports
 */
export interface LogEntry {
    level: LogLevel;
    message: string;
    /** ISO timestamp */
    timestamp: string;
    component: LogComponent;
    /** Service emitting the telemetry (OTEL_SERVICE_NAME) */
    service: string;
    context?: Record<string, unknown> | undefined;
}

/**
 * Logger type
 * All logger implementations must implement this shape.
 */
export type Logger = {
    debug(message: string, context?: Record<string, unknown>): void;
    silly(message: string, context?: Record<string, unknown>): void;
    info(message: string, context?: Record<string, unknown>): void;
    warn(message: string, context?: Record<string, unknown>): void;
    error(message: string, context?: Record<string, unknown>): void;

    /**
     * Track exception with stack trace
     */
    trackException(error: Error, context?: Record<string, unknown>): void;

    /**
     * Create a child logger with a different component
     * Shares the same transports, service and level
     */
    createChild(component: LogComponent): Logger;

    /**
     * Cleanup resources and close transports
     */
    destroy(): Promise<void>;
};

/**
 * Base transport interface
 */
export type LoggerTransport = {
    write(entry: LogEntry): void | Promise<void>;
    destroy?(): void | Promise<void>;
};
