import { StepTraceRuntimeError } from '../errors/runtime-error.js';
import { ErrorScope, ErrorType } from '../errors/types.js';
import { ExporterErrorCode } from './error-codes.js';

/**
 * Exporter error factory. Delivery errors are logged and dropped, never thrown.
 */
export class ExporterError {
    static timeout(url: string, timeoutMs: number): StepTraceRuntimeError {
        return new StepTraceRuntimeError(
            ExporterErrorCode.DELIVERY_TIMEOUT,
            ErrorScope.EXPORTER,
            ErrorType.TIMEOUT,
            `Export to ${url} abandoned after ${timeoutMs}ms`,
            { url, timeoutMs }
        );
    }

    static rejected(url: string, status: number, statusText: string): StepTraceRuntimeError {
        return new StepTraceRuntimeError(
            ExporterErrorCode.DELIVERY_REJECTED,
            ErrorScope.EXPORTER,
            ErrorType.THIRD_PARTY,
            `Collector at ${url} answered ${status} ${statusText}`.trim(),
            { url, status }
        );
    }

    static failed(url: string, cause: unknown): StepTraceRuntimeError {
        return new StepTraceRuntimeError(
            ExporterErrorCode.DELIVERY_FAILED,
            ErrorScope.EXPORTER,
            ErrorType.THIRD_PARTY,
            `Export to ${url} failed: ${cause instanceof Error ? cause.message : String(cause)}`,
            { url }
        );
    }

    static serializationFailed(cause: unknown): StepTraceRuntimeError {
        return new StepTraceRuntimeError(
            ExporterErrorCode.SERIALIZATION_FAILED,
            ErrorScope.EXPORTER,
            ErrorType.SYSTEM,
            `Could not serialize telemetry payload: ${cause instanceof Error ? cause.message : String(cause)}`
        );
    }
}
