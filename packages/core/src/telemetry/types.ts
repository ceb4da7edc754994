import type { SpanStatusCode } from '@opentelemetry/api';
import type { AttributeSet } from './attributes.js';

/**
 * Span outcome. Spans are only ever closed as OK or ERROR; UNSET is never sent.
 */
export type StatusCode = SpanStatusCode.OK | SpanStatusCode.ERROR;

/**
 * A closed span, built once at close time and sent once
 */
export interface SpanRecord {
    readonly traceId: string;
    readonly spanId: string;
    readonly parentSpanId: string;
    readonly name: string;
    readonly startTimeUnixNano: bigint;
    readonly endTimeUnixNano: bigint;
    readonly status: StatusCode;
    readonly attributes: AttributeSet;
}

/**
 * One emitted output line, correlated with the open step span
 */
export interface LogRecord {
    readonly traceId: string;
    readonly spanId: string;
    readonly timeUnixNano: bigint;
    readonly body: string;
    readonly attributes: AttributeSet;
}

export interface Exemplar {
    readonly timeUnixNano: bigint;
    readonly traceId: string;
    readonly spanId: string;
    readonly value: number | bigint;
}

/**
 * Monotonic counter increment, exported as a cumulative Sum so the exemplar survives
 */
export interface MetricDataPoint {
    readonly name: string;
    readonly value: number | bigint;
    readonly timeUnixNano: bigint;
    readonly attributes: AttributeSet;
    readonly exemplar: Exemplar;
}

// OTLP/JSON wire shapes (only the fields this library emits)

export const SPAN_KIND_INTERNAL = 1;
export const AGGREGATION_TEMPORALITY_CUMULATIVE = 2;

export interface OtlpKeyValue {
    key: string;
    value: { stringValue: string };
}

export interface OtlpResource {
    attributes: OtlpKeyValue[];
}

export interface OtlpScope {
    name: string;
}

export interface OtlpSpan {
    traceId: string;
    spanId: string;
    parentSpanId: string;
    name: string;
    kind: typeof SPAN_KIND_INTERNAL;
    startTimeUnixNano: string;
    endTimeUnixNano: string;
    status: { code: StatusCode };
    attributes: OtlpKeyValue[];
}

export interface OtlpTracesPayload {
    resourceSpans: Array<{
        resource: OtlpResource;
        scopeSpans: Array<{ scope: OtlpScope; spans: OtlpSpan[] }>;
    }>;
}

export interface OtlpLogRecord {
    timeUnixNano: string;
    observedTimeUnixNano: string;
    body: { stringValue: string };
    traceId: string;
    spanId: string;
    attributes: OtlpKeyValue[];
}

export interface OtlpLogsPayload {
    resourceLogs: Array<{
        resource: OtlpResource;
        scopeLogs: Array<{ scope: OtlpScope; logRecords: OtlpLogRecord[] }>;
    }>;
}

export interface OtlpExemplar {
    timeUnixNano: string;
    traceId: string;
    spanId: string;
    asInt: string;
}

export interface OtlpNumberDataPoint {
    asInt: string;
    timeUnixNano: string;
    attributes: OtlpKeyValue[];
    exemplars: OtlpExemplar[];
}

export interface OtlpMetric {
    name: string;
    sum: {
        dataPoints: OtlpNumberDataPoint[];
        aggregationTemporality: typeof AGGREGATION_TEMPORALITY_CUMULATIVE;
        isMonotonic: true;
    };
}

export interface OtlpMetricsPayload {
    resourceMetrics: Array<{
        resource: OtlpResource;
        scopeMetrics: Array<{ scope: OtlpScope; metrics: OtlpMetric[] }>;
    }>;
}

export type OtlpSignal = 'traces' | 'logs' | 'metrics';

export type OtlpPayload = OtlpTracesPayload | OtlpLogsPayload | OtlpMetricsPayload;
