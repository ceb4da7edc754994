/**
 * Builds OTLP/JSON payloads for spans, log records and metric data points.
 *
 * Pure functions: one resource, one scope and one record per payload.
 * Timestamps and integer values are rendered as decimal strings.
 */

import type { Logger } from '../logger/types.js';
import { toOtlpAttributes } from './attributes.js';
import { TelemetryError } from './errors.js';
import type { ResourceDescriptor } from './resource.js';
import { SDK_NAME } from './resource.js';
import {
    AGGREGATION_TEMPORALITY_CUMULATIVE,
    SPAN_KIND_INTERNAL,
    type LogRecord,
    type MetricDataPoint,
    type OtlpLogsPayload,
    type OtlpMetricsPayload,
    type OtlpResource,
    type OtlpScope,
    type OtlpTracesPayload,
    type SpanRecord,
} from './types.js';

const SCOPE: OtlpScope = { name: SDK_NAME };

function toOtlpResource(resource: ResourceDescriptor): OtlpResource {
    return { attributes: toOtlpAttributes(resource) };
}

function toIntString(name: string, value: number | bigint): string {
    if (typeof value === 'bigint') {
        return value.toString();
    }
    if (!Number.isSafeInteger(value)) {
        throw TelemetryError.invalidMetricValue(name, value);
    }
    return value.toString();
}

export function encodeSpan(resource: ResourceDescriptor, span: SpanRecord): OtlpTracesPayload {
    if (span.name.length === 0) {
        throw TelemetryError.invalidSpanName(span.name);
    }

    return {
        resourceSpans: [
            {
                resource: toOtlpResource(resource),
                scopeSpans: [
                    {
                        scope: SCOPE,
                        spans: [
                            {
                                traceId: span.traceId,
                                spanId: span.spanId,
                                parentSpanId: span.parentSpanId,
                                name: span.name,
                                kind: SPAN_KIND_INTERNAL,
                                startTimeUnixNano: span.startTimeUnixNano.toString(),
                                endTimeUnixNano: span.endTimeUnixNano.toString(),
                                status: { code: span.status },
                                attributes: toOtlpAttributes(span.attributes),
                            },
                        ],
                    },
                ],
            },
        ],
    };
}

export function encodeLog(resource: ResourceDescriptor, log: LogRecord): OtlpLogsPayload {
    const time = log.timeUnixNano.toString();

    return {
        resourceLogs: [
            {
                resource: toOtlpResource(resource),
                scopeLogs: [
                    {
                        scope: SCOPE,
                        logRecords: [
                            {
                                timeUnixNano: time,
                                observedTimeUnixNano: time,
                                body: { stringValue: log.body },
                                traceId: log.traceId,
                                spanId: log.spanId,
                                attributes: toOtlpAttributes(log.attributes),
                            },
                        ],
                    },
                ],
            },
        ],
    };
}

/**
 * The data point is a delta increment but is sent as a cumulative, monotonic
 * Sum: backends drop exemplars on deltas and gauges. Query it with increase().
 */
export function encodeMetric(
    resource: ResourceDescriptor,
    point: MetricDataPoint
): OtlpMetricsPayload {
    if (point.name.length === 0) {
        throw TelemetryError.invalidMetricName(point.name);
    }

    const value = toIntString(point.name, point.value);
    const exemplarValue = toIntString(point.name, point.exemplar.value);

    return {
        resourceMetrics: [
            {
                resource: toOtlpResource(resource),
                scopeMetrics: [
                    {
                        scope: SCOPE,
                        metrics: [
                            {
                                name: point.name,
                                sum: {
                                    dataPoints: [
                                        {
                                            asInt: value,
                                            timeUnixNano: point.timeUnixNano.toString(),
                                            attributes: toOtlpAttributes(point.attributes),
                                            exemplars: [
                                                {
                                                    timeUnixNano:
                                                        point.exemplar.timeUnixNano.toString(),
                                                    traceId: point.exemplar.traceId,
                                                    spanId: point.exemplar.spanId,
                                                    asInt: exemplarValue,
                                                },
                                            ],
                                        },
                                    ],
                                    aggregationTemporality: AGGREGATION_TEMPORALITY_CUMULATIVE,
                                    isMonotonic: true,
                                },
                            },
                        ],
                    },
                ],
            },
        ],
    };
}

/**
 * Runs an encoder and turns any failure into "nothing to send".
 */
export function safeEncode<T>(encode: () => T, logger: Logger): T | undefined {
    try {
        return encode();
    } catch (error) {
        logger.debug('Dropping telemetry record that failed to encode', {
            error: error instanceof Error ? error.message : String(error),
        });
        return undefined;
    }
}
