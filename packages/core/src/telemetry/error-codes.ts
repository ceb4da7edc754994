/**
 * Telemetry record construction error codes
 */
export enum TelemetryErrorCode {
    INVALID_METRIC_NAME = 'telemetry_invalid_metric_name',
    INVALID_METRIC_VALUE = 'telemetry_invalid_metric_value',
    INVALID_SPAN_NAME = 'telemetry_invalid_span_name',
}
