/**
 * Logger Factory
 *
 * Validates a logger configuration and builds a StepTraceLogger from it.
 */

import { LoggerConfigSchema, type LoggerConfigInput } from './schemas.js';
import { LogComponent, type Logger } from './types.js';
import { StepTraceLogger } from './logger.js';
import { createTransports } from './transport-factory.js';
import { LoggerError } from './errors.js';

export interface CreateLoggerOptions {
    config?: LoggerConfigInput;
    /** Service name stamped on every entry */
    service: string;
    /** Component identifier (defaults to TRACER) */
    component?: LogComponent;
}

/**
 * @example
 * ```typescript
 * const logger = createLogger({ service: 'sbom-generator', config: { level: 'debug' } });
 * logger.debug('span exported', { name: 'compile' });
 * ```
 */
export function createLogger(options: CreateLoggerOptions): Logger {
    const parsed = LoggerConfigSchema.safeParse(options.config ?? {});
    if (!parsed.success) {
        throw LoggerError.invalidConfig(
            parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        );
    }

    return new StepTraceLogger({
        level: parsed.data.level,
        component: options.component ?? LogComponent.TRACER,
        service: options.service,
        transports: createTransports(parsed.data.transports),
    });
}
