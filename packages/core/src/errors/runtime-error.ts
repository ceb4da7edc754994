import type { ErrorScope, ErrorType } from './types.js';

/**
 * Runtime error with a stable code, the scope that raised it and structured context.
 * Module-specific factories (TelemetryError, ExporterError, ...) build these.
 */
export class StepTraceRuntimeError extends Error {
    constructor(
        public readonly code: string,
        public readonly scope: ErrorScope,
        public readonly type: ErrorType,
        message: string,
        public readonly context: Record<string, unknown> = {}
    ) {
        super(message);
        this.name = 'StepTraceRuntimeError';
    }

    toJSON(): Record<string, unknown> {
        return {
            code: this.code,
            message: this.message,
            scope: this.scope,
            type: this.type,
            context: this.context,
        };
    }
}

/**
 * Type guard for errors raised by this library
 */
export function isStepTraceError(error: unknown): error is StepTraceRuntimeError {
    return error instanceof StepTraceRuntimeError;
}
