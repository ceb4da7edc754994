import { z } from 'zod';
import { LogLevelSchema } from '../logger/schemas.js';
import { RetryPolicySchema } from '../retry/schemas.js';
import { DEFAULT_EXPORT_TIMEOUT_MS } from '../exporter/otlp-http-exporter.js';

export const FlushModeSchema = z
    .enum(['last', 'all'])
    .describe("'last' joins only the final export at step end; 'all' joins every outstanding one");

export type FlushMode = z.output<typeof FlushModeSchema>;

export const StepTraceConfigSchema = z
    .object({
        serviceName: z.string().min(1).default('unknown'),
        serviceVersion: z.string().min(1).default('unknown'),
        hostName: z.string().min(1).default('unknown'),
        endpoint: z.string().url().optional().describe('OTLP/HTTP collector base URL'),
        headers: z.record(z.string()).default({}).describe('Extra headers on every export'),
        exportTimeoutMs: z.number().int().positive().default(DEFAULT_EXPORT_TIMEOUT_MS),
        flushMode: FlushModeSchema.default('last'),
        logLevel: LogLevelSchema.default('warn'),
        logFile: z.string().min(1).optional().describe('Also append diagnostics to this file'),
        retry: RetryPolicySchema.default({}),
    })
    .strict();

export type StepTraceConfig = z.output<typeof StepTraceConfigSchema>;
export type StepTraceConfigInput = z.input<typeof StepTraceConfigSchema>;
