import type { StepTraceConfig } from '../config/schemas.js';
import type { Exporter, FetchLike } from '../exporter/types.js';
import type { Logger } from '../logger/types.js';
import type { ContextCarrier } from '../propagation/carrier.js';
import type { IdGenerator } from '../propagation/id-generator.js';
import type { Sleep } from '../retry/retry-executor.js';
import type { Clock } from '../telemetry/clock.js';

/**
 * Everything a tracer depends on. Omitted collaborators are built from the
 * environment: config from `env`, a TRACEPARENT carrier over `env`, an OTLP/HTTP
 * exporter, the system clock and random ids.
 */
export interface TracerOptions {
    /** Defaults to process.env */
    env?: NodeJS.ProcessEnv;
    /** Skips environment loading when given */
    config?: StepTraceConfig;
    exporter?: Exporter;
    /** Used by the default exporter */
    fetch?: FetchLike;
    carrier?: ContextCarrier;
    clock?: Clock;
    ids?: IdGenerator;
    logger?: Logger;
    /** Backoff sleep for `step.retry` */
    sleep?: Sleep;
}

export interface TracerDeps {
    config: StepTraceConfig;
    exporter: Exporter;
    carrier: ContextCarrier;
    clock: Clock;
    ids: IdGenerator;
    logger: Logger;
    sleep?: Sleep | undefined;
}
