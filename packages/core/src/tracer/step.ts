/**
 * An open CI step: the root span every span, log record and data point of the
 * step is attached to.
 */

import { SpanStatusCode } from '@opentelemetry/api';
import type { StepTraceConfig } from '../config/schemas.js';
import type { Exporter } from '../exporter/types.js';
import type { LogCorrelation, LogSink } from '../log-tee/types.js';
import type { Logger } from '../logger/types.js';
import { ActiveContext } from '../propagation/active-context.js';
import { restore, type ContextCarrier } from '../propagation/carrier.js';
import type { IdGenerator } from '../propagation/id-generator.js';
import { deriveChild, formatTraceparent, type TraceContext } from '../propagation/trace-context.js';
import { RetryExecutor, type RetryOperation, type Sleep, type Traceable } from '../retry/retry-executor.js';
import type { RetryPolicyInput } from '../retry/schemas.js';
import type { AttributeSet } from '../telemetry/attributes.js';
import type { Clock } from '../telemetry/clock.js';
import { encodeLog, encodeMetric, encodeSpan, safeEncode } from '../telemetry/encoder.js';
import type { ResourceDescriptor } from '../telemetry/resource.js';
import type { OtlpPayload, OtlpSignal, SpanRecord, StatusCode } from '../telemetry/types.js';

export interface StepInit {
    name: string;
    context: TraceContext;
    attributes: AttributeSet;
    resource: ResourceDescriptor;
    /** Published context to put back when the step ends */
    restoreToken: string | undefined;
    config: StepTraceConfig;
    exporter: Exporter;
    carrier: ContextCarrier;
    clock: Clock;
    ids: IdGenerator;
    logger: Logger;
    sleep?: Sleep | undefined;
}

export class Step implements Traceable, LogSink {
    readonly name: string;
    readonly traceId: string;
    readonly spanId: string;
    readonly parentSpanId: string;
    readonly traceFlags: string;
    readonly attributes: AttributeSet;
    readonly resource: ResourceDescriptor;
    readonly startTimeUnixNano: bigint;

    private readonly active: ActiveContext;
    private readonly retryExecutor: RetryExecutor;
    private readonly restoreToken: string | undefined;
    private readonly config: StepTraceConfig;
    private readonly exporter: Exporter;
    private readonly carrier: ContextCarrier;
    private readonly clock: Clock;
    private readonly ids: IdGenerator;
    private readonly logger: Logger;
    private ended = false;

    constructor(init: StepInit) {
        this.name = init.name;
        this.traceId = init.context.traceId;
        this.spanId = init.context.spanId;
        this.parentSpanId = init.context.parentSpanId;
        this.traceFlags = init.context.traceFlags;
        this.attributes = init.attributes;
        this.resource = init.resource;
        this.restoreToken = init.restoreToken;
        this.config = init.config;
        this.exporter = init.exporter;
        this.carrier = init.carrier;
        this.clock = init.clock;
        this.ids = init.ids;
        this.logger = init.logger;
        this.active = new ActiveContext(init.context);
        this.retryExecutor = new RetryExecutor(this, {
            policy: init.config.retry,
            sleep: init.sleep,
            logger: init.logger,
        });
        this.startTimeUnixNano = init.clock.nowUnixNano();
    }

    get isEnded(): boolean {
        return this.ended;
    }

    get correlation(): LogCorrelation {
        return { traceId: this.traceId, parentSpanId: this.parentSpanId, spanId: this.spanId };
    }

    /**
     * Serialized context of the innermost open span, for handing to a subprocess
     */
    traceparent(): string {
        return formatTraceparent(this.active.current());
    }

    /**
     * Runs `operation` as a child span of the current span and returns or
     * rethrows its outcome unchanged. The span is ERROR when it threw.
     */
    async trace<T>(name: string, operation: () => T | Promise<T>): Promise<T> {
        if (this.ended) {
            this.logger.warn(`Step '${this.name}' has ended; '${name}' runs untraced`);
            return operation();
        }

        const { child, restoreToken } = deriveChild(this.active.current(), this.ids);
        const startTimeUnixNano = this.clock.nowUnixNano();
        this.carrier.publish(formatTraceparent(child));

        let status: StatusCode = SpanStatusCode.ERROR;
        try {
            const result = await this.active.run(child, operation);
            status = SpanStatusCode.OK;
            return result;
        } finally {
            restore(this.carrier, restoreToken);
            this.exportSpan({
                traceId: child.traceId,
                spanId: child.spanId,
                parentSpanId: child.parentSpanId,
                name,
                startTimeUnixNano,
                endTimeUnixNano: this.clock.nowUnixNano(),
                status,
                attributes: this.attributes,
            });
        }
    }

    /**
     * Retries `operation` with exponential backoff, all attempts in one span.
     * `policy` overrides the configured retry policy field by field.
     */
    retry<T>(name: string, operation: RetryOperation<T>, policy?: RetryPolicyInput): Promise<T> {
        return this.retryExecutor.run(name, operation, policy);
    }

    log(line: string): void {
        if (this.warnIfEnded('log')) return;
        const record = {
            traceId: this.traceId,
            spanId: this.spanId,
            timeUnixNano: this.clock.nowUnixNano(),
            body: line,
            attributes: this.attributes,
        };
        this.export('logs', () => encodeLog(this.resource, record));
    }

    /**
     * Records a counter increment whose exemplar points at the step span
     */
    metric(name: string, value: number | bigint): void {
        if (this.warnIfEnded('metric')) return;
        const timeUnixNano = this.clock.nowUnixNano();
        const point = {
            name,
            value,
            timeUnixNano,
            attributes: this.attributes,
            exemplar: { timeUnixNano, traceId: this.traceId, spanId: this.spanId, value },
        };
        this.export('metrics', () => encodeMetric(this.resource, point));
    }

    /**
     * Closes the step span (ERROR for a non-zero exit code) and waits for the
     * export, or for every outstanding export in `all` flush mode.
     */
    async end(exitCode = 0): Promise<void> {
        if (this.ended) {
            this.logger.warn(`Step '${this.name}' already ended`, { exitCode });
            return;
        }
        this.ended = true;

        this.exportSpan({
            traceId: this.traceId,
            spanId: this.spanId,
            parentSpanId: this.parentSpanId,
            name: this.name,
            startTimeUnixNano: this.startTimeUnixNano,
            endTimeUnixNano: this.clock.nowUnixNano(),
            status: exitCode === 0 ? SpanStatusCode.OK : SpanStatusCode.ERROR,
            attributes: this.attributes,
        });
        if (this.restoreToken !== undefined) {
            restore(this.carrier, this.restoreToken);
        }

        if (this.config.flushMode === 'all') {
            await this.exporter.drain();
        } else {
            await this.exporter.waitLast();
        }
    }

    private warnIfEnded(operation: string): boolean {
        if (this.ended) {
            this.logger.warn(`Step '${this.name}' has ended; dropping ${operation}`);
        }
        return this.ended;
    }

    private exportSpan(span: SpanRecord): void {
        this.export('traces', () => encodeSpan(this.resource, span));
    }

    private export(signal: OtlpSignal, encode: () => OtlpPayload): void {
        const payload = safeEncode(encode, this.logger);
        if (payload === undefined) return;
        try {
            this.exporter.send(signal, payload);
        } catch (error) {
            this.logger.debug('Exporter failed to start a delivery', {
                signal,
                error: error instanceof Error ? error.message : String(error),
            });
        }
    }
}
