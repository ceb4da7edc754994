/**
 * Runs an operation until it succeeds or the attempts run out, sleeping with
 * exponential backoff in between. The whole loop is recorded as one span.
 */

import { setTimeout as sleepFor } from 'timers/promises';
import type { Logger } from '../logger/types.js';
import { RetryError } from './errors.js';
import { RetryPolicySchema, type RetryPolicy, type RetryPolicyInput } from './schemas.js';

/**
 * Anything that can wrap an async operation in a span
 */
export interface Traceable {
    trace<T>(name: string, operation: () => Promise<T>): Promise<T>;
}

export type RetryOperation<T> = (attempt: number) => Promise<T>;

export type Sleep = (ms: number) => Promise<void>;

export interface RetryExecutorOptions {
    policy?: RetryPolicyInput;
    /** Defaults to timers/promises setTimeout */
    sleep?: Sleep;
    logger?: Logger;
}

export function resolvePolicy(input: RetryPolicyInput = {}): RetryPolicy {
    const result = RetryPolicySchema.safeParse(input);
    if (!result.success) {
        throw RetryError.invalidPolicy(result.error.issues);
    }
    return result.data;
}

/**
 * Fields left undefined in `overrides` keep the base value
 */
function overlayPolicy(base: RetryPolicy, overrides: RetryPolicyInput): RetryPolicyInput {
    return {
        maxAttempts: overrides.maxAttempts ?? base.maxAttempts,
        initialDelayMs: overrides.initialDelayMs ?? base.initialDelayMs,
        maxDelayMs: overrides.maxDelayMs ?? base.maxDelayMs,
    };
}

export class RetryExecutor {
    private readonly policy: RetryPolicy;
    private readonly sleep: Sleep;
    private readonly logger: Logger | undefined;

    constructor(
        private readonly traceable: Traceable,
        options: RetryExecutorOptions = {}
    ) {
        this.policy = resolvePolicy(options.policy);
        this.sleep = options.sleep ?? ((ms) => sleepFor(ms));
        this.logger = options.logger;
    }

    /**
     * Returns the first successful result, or rethrows the last failure once
     * `maxAttempts` attempts have failed. A per-call policy overrides the
     * executor's fields one by one.
     */
    async run<T>(name: string, operation: RetryOperation<T>, policy?: RetryPolicyInput): Promise<T> {
        const effective = policy ? resolvePolicy(overlayPolicy(this.policy, policy)) : this.policy;
        return this.traceable.trace(name, () => this.loop(name, operation, effective));
    }

    private async loop<T>(name: string, operation: RetryOperation<T>, policy: RetryPolicy): Promise<T> {
        let delayMs = policy.initialDelayMs;
        for (let attempt = 1; ; attempt++) {
            try {
                return await operation(attempt);
            } catch (error) {
                if (attempt >= policy.maxAttempts) {
                    this.logger?.debug(`'${name}' failed after ${attempt} attempts`, {
                        attempt,
                        error: error instanceof Error ? error.message : String(error),
                    });
                    throw error;
                }
                this.logger?.debug(`'${name}' attempt ${attempt} failed, retrying in ${delayMs}ms`, {
                    attempt,
                    delayMs,
                    error: error instanceof Error ? error.message : String(error),
                });
                await this.sleep(delayMs);
                delayMs = Math.min(delayMs * 2, policy.maxDelayMs);
            }
        }
    }
}
