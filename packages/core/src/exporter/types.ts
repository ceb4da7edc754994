import type { OtlpPayload, OtlpSignal } from '../telemetry/types.js';

export const SIGNAL_PATHS: Record<OtlpSignal, string> = {
    traces: 'v1/traces',
    logs: 'v1/logs',
    metrics: 'v1/metrics',
};

/**
 * Best-effort delivery of encoded records.
 * Nothing here rejects or throws back into the workload.
 */
export interface Exporter {
    /** Starts a delivery and returns without waiting for it */
    send(signal: OtlpSignal, payload: OtlpPayload): void;
    /** Resolves when the most recently started delivery settled or was abandoned */
    waitLast(): Promise<void>;
    /** Resolves when every outstanding delivery settled or was abandoned */
    drain(): Promise<void>;
}

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;
