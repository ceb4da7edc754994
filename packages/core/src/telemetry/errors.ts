import { StepTraceRuntimeError } from '../errors/runtime-error.js';
import { ErrorScope, ErrorType } from '../errors/types.js';
import { TelemetryErrorCode } from './error-codes.js';

/**
 * Telemetry error factory. These never reach the workload: the encoder's
 * callers drop the record and log the error instead.
 */
export class TelemetryError {
    static invalidMetricName(name: string): StepTraceRuntimeError {
        return new StepTraceRuntimeError(
            TelemetryErrorCode.INVALID_METRIC_NAME,
            ErrorScope.TELEMETRY,
            ErrorType.USER,
            'Metric name must be a non-empty string',
            { name }
        );
    }

    static invalidMetricValue(name: string, value: number | bigint): StepTraceRuntimeError {
        return new StepTraceRuntimeError(
            TelemetryErrorCode.INVALID_METRIC_VALUE,
            ErrorScope.TELEMETRY,
            ErrorType.USER,
            `Metric '${name}' needs a safe integer value, got ${String(value)}`,
            { name, value: String(value) }
        );
    }

    static invalidSpanName(name: string): StepTraceRuntimeError {
        return new StepTraceRuntimeError(
            TelemetryErrorCode.INVALID_SPAN_NAME,
            ErrorScope.TELEMETRY,
            ErrorType.USER,
            'Span name must be a non-empty string',
            { name }
        );
    }
}
