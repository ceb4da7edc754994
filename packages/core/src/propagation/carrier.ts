/**
 * Context carriers publish the current traceparent where collaborators outside
 * this process can read it, typically a command spawned by the step.
 */

export interface ContextCarrier {
    /** Current serialized context, if any */
    read(): string | undefined;
    publish(traceparent: string): void;
}

export const TRACEPARENT_ENV = 'TRACEPARENT';

/**
 * Keeps the context in an environment map, `process.env` unless told otherwise,
 * so child processes inherit it.
 */
export class EnvContextCarrier implements ContextCarrier {
    constructor(
        private readonly env: NodeJS.ProcessEnv = process.env,
        private readonly variable: string = TRACEPARENT_ENV
    ) {}

    read(): string | undefined {
        return this.env[this.variable];
    }

    publish(traceparent: string): void {
        this.env[this.variable] = traceparent;
    }
}

/**
 * Carrier held in memory; for embedding and tests.
 */
export class InMemoryContextCarrier implements ContextCarrier {
    constructor(private value?: string) {}

    read(): string | undefined {
        return this.value;
    }

    publish(traceparent: string): void {
        this.value = traceparent;
    }
}

/**
 * Resets the published context to a token produced by `deriveChild`.
 */
export function restore(carrier: ContextCarrier, token: string): void {
    carrier.publish(token);
}
