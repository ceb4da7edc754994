import { loadConfig, type ConfigIssue } from '../config/loader.js';
import type { StepTraceConfig } from '../config/schemas.js';
import { OtlpHttpExporter } from '../exporter/otlp-http-exporter.js';
import type { Exporter } from '../exporter/types.js';
import { createLogger } from '../logger/factory.js';
import { LogComponent, type Logger } from '../logger/types.js';
import { EnvContextCarrier, type ContextCarrier } from '../propagation/carrier.js';
import { RandomIdGenerator, type IdGenerator } from '../propagation/id-generator.js';
import {
    SAMPLED_FLAGS,
    formatTraceparent,
    isEmptyContext,
    parseTraceparent,
    type TraceContext,
} from '../propagation/trace-context.js';
import type { Sleep } from '../retry/retry-executor.js';
import { attributesFrom, type AttributeInput } from '../telemetry/attributes.js';
import { SystemClock, type Clock } from '../telemetry/clock.js';
import { ATTR_STEP_NAME, buildResource } from '../telemetry/resource.js';
import { Step } from './step.js';
import type { TracerDeps, TracerOptions } from './types.js';

export const STEP_NAME_PREFIX = 'step-';

export class Tracer {
    readonly config: StepTraceConfig;
    readonly logger: Logger;
    private readonly exporter: Exporter;
    private readonly carrier: ContextCarrier;
    private readonly clock: Clock;
    private readonly ids: IdGenerator;
    private readonly sleep: Sleep | undefined;

    constructor(deps: TracerDeps) {
        this.config = deps.config;
        this.logger = deps.logger;
        this.exporter = deps.exporter;
        this.carrier = deps.carrier;
        this.clock = deps.clock;
        this.ids = deps.ids;
        this.sleep = deps.sleep;
    }

    /**
     * Opens a step span under the inbound context, or as a new root trace when
     * the carrier holds nothing usable, and publishes the step's context.
     */
    startStep(name: string, attributes: AttributeInput = []): Step {
        const stepName = `${STEP_NAME_PREFIX}${name}`;
        const inboundValue = this.carrier.read();
        const inbound = parseTraceparent(inboundValue);
        if (isEmptyContext(inbound) && inboundValue?.trim()) {
            this.logger.debug('Ignoring malformed inbound traceparent, starting a new trace', {
                traceparent: inboundValue,
            });
        }

        const context = this.openContext(inbound);
        const step = new Step({
            name: stepName,
            context,
            attributes: [{ key: ATTR_STEP_NAME, value: stepName }, ...attributesFrom(attributes)],
            resource: buildResource({
                serviceName: this.config.serviceName,
                serviceVersion: this.config.serviceVersion,
                hostName: this.config.hostName,
                stepName,
            }),
            restoreToken: isEmptyContext(inbound) ? undefined : formatTraceparent(inbound),
            config: this.config,
            exporter: this.exporter,
            carrier: this.carrier,
            clock: this.clock,
            ids: this.ids,
            logger: this.logger,
            sleep: this.sleep,
        });
        this.carrier.publish(formatTraceparent(context));
        this.logger.debug(`Started ${stepName}`, { traceId: context.traceId, spanId: context.spanId });
        return step;
    }

    /**
     * Releases the diagnostic logger's transports
     */
    async close(): Promise<void> {
        await this.logger.destroy();
    }

    private openContext(inbound: TraceContext): TraceContext {
        if (isEmptyContext(inbound)) {
            return {
                traceId: this.ids.traceId(),
                spanId: this.ids.spanId(),
                parentSpanId: '',
                traceFlags: SAMPLED_FLAGS,
            };
        }
        return {
            traceId: inbound.traceId,
            spanId: this.ids.spanId(),
            parentSpanId: inbound.spanId,
            traceFlags: inbound.traceFlags,
        };
    }
}

function reportConfigIssues(logger: Logger, issues: ConfigIssue[]): void {
    for (const issue of issues) {
        logger.warn(`Invalid ${issue.field} in environment, using the default: ${issue.message}`, {
            field: issue.field,
        });
    }
}

/**
 * @example
 * ```typescript
 * const tracer = createTracer();
 * const step = tracer.startStep('build', ['target=linux']);
 * await step.trace('compile', () => compile());
 * await step.end(0);
 * ```
 */
export function createTracer(options: TracerOptions = {}): Tracer {
    const env = options.env ?? process.env;
    const { config, issues } = options.config
        ? { config: options.config, issues: [] }
        : loadConfig(env);

    const logger =
        options.logger ??
        createLogger({
            service: config.serviceName,
            component: LogComponent.TRACER,
            config: {
                level: config.logLevel,
                transports: [
                    { type: 'console', colorize: true },
                    ...(config.logFile ? [{ type: 'file' as const, path: config.logFile }] : []),
                ],
            },
        });
    reportConfigIssues(logger.createChild(LogComponent.CONFIG), issues);

    const exporter =
        options.exporter ??
        new OtlpHttpExporter({
            endpoint: config.endpoint,
            timeoutMs: config.exportTimeoutMs,
            headers: config.headers,
            fetch: options.fetch,
            logger: logger.createChild(LogComponent.EXPORTER),
        });

    return new Tracer({
        config,
        logger,
        exporter,
        carrier: options.carrier ?? new EnvContextCarrier(env),
        clock: options.clock ?? new SystemClock(),
        ids: options.ids ?? new RandomIdGenerator(),
        sleep: options.sleep,
    });
}
