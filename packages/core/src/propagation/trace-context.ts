import { isValidSpanId, isValidTraceId } from '@opentelemetry/api';
import type { IdGenerator } from './id-generator.js';

/**
 * The propagated (trace id, span id, parent span id, flags) tuple.
 * Fields are lowercase hex, or empty strings when no context was received.
 */
export interface TraceContext {
    readonly traceId: string;
    readonly spanId: string;
    readonly parentSpanId: string;
    readonly traceFlags: string;
}

export const TRACEPARENT_VERSION = '00';

/** Flags used when a step has to start its own trace */
export const SAMPLED_FLAGS = '01';

export const EMPTY_CONTEXT: TraceContext = Object.freeze({
    traceId: '',
    spanId: '',
    parentSpanId: '',
    traceFlags: '',
});

const TRACEPARENT_PATTERN = /^00-([0-9a-f]{32})-([0-9a-f]{16})-([0-9a-f]{2})$/;

/**
 * Parses a W3C traceparent (`00-<32 hex>-<16 hex>-<2 hex>`).
 * Malformed input yields EMPTY_CONTEXT; this never throws.
 */
export function parseTraceparent(value: string | undefined | null): TraceContext {
    if (typeof value !== 'string') return EMPTY_CONTEXT;

    const match = TRACEPARENT_PATTERN.exec(value.trim());
    if (!match) return EMPTY_CONTEXT;

    const [, traceId = '', spanId = '', traceFlags = ''] = match;
    if (!isValidTraceId(traceId) || !isValidSpanId(spanId)) return EMPTY_CONTEXT;

    return { traceId, spanId, parentSpanId: '', traceFlags };
}

export function formatTraceparent(context: TraceContext): string {
    return `${TRACEPARENT_VERSION}-${context.traceId}-${context.spanId}-${context.traceFlags}`;
}

export function isEmptyContext(context: TraceContext): boolean {
    return context.traceId === '';
}

export interface DerivedContext {
    child: TraceContext;
    /** Serialized parent context, handed back to `restore` when the child closes */
    restoreToken: string;
}

/**
 * Opens a child: fresh span id, same trace id and flags, parent = current span.
 */
export function deriveChild(parent: TraceContext, ids: IdGenerator): DerivedContext {
    return {
        child: {
            traceId: parent.traceId,
            spanId: ids.spanId(),
            parentSpanId: parent.spanId,
            traceFlags: parent.traceFlags,
        },
        restoreToken: formatTraceparent(parent),
    };
}
