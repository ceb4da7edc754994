import { z } from 'zod';

export const DEFAULT_MAX_ATTEMPTS = 30;
export const DEFAULT_INITIAL_DELAY_MS = 1000;
export const DEFAULT_MAX_DELAY_MS = 60_000;

export const RetryPolicySchema = z
    .object({
        maxAttempts: z
            .number()
            .int()
            .positive()
            .default(DEFAULT_MAX_ATTEMPTS)
            .describe('Attempts before the last failure is returned'),
        initialDelayMs: z
            .number()
            .int()
            .nonnegative()
            .default(DEFAULT_INITIAL_DELAY_MS)
            .describe('Sleep before the second attempt; doubles after each failure'),
        maxDelayMs: z
            .number()
            .int()
            .nonnegative()
            .default(DEFAULT_MAX_DELAY_MS)
            .describe('Upper bound for the doubled delay'),
    })
    .strict();

export type RetryPolicy = z.output<typeof RetryPolicySchema>;
export type RetryPolicyInput = z.input<typeof RetryPolicySchema>;
