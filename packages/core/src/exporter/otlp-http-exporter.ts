/**
 * OTLP/HTTP JSON exporter
 *
 * Each send is one POST, started in the background and bounded by a timeout.
 * Failed deliveries are logged at debug level and dropped; there is no retry.
 */

import { isStepTraceError } from '../errors/runtime-error.js';
import type { Logger } from '../logger/types.js';
import type { OtlpPayload, OtlpSignal } from '../telemetry/types.js';
import { ExporterError } from './errors.js';
import { SIGNAL_PATHS, type Exporter, type FetchLike } from './types.js';

export const DEFAULT_EXPORT_TIMEOUT_MS = 5000;

export interface OtlpHttpExporterOptions {
    /** Collector base URL, e.g. http://collector:4318. Without one every send is skipped. */
    endpoint?: string | undefined;
    timeoutMs?: number;
    headers?: Record<string, string>;
    /** Defaults to the global fetch */
    fetch?: FetchLike;
    logger: Logger;
}

export class OtlpHttpExporter implements Exporter {
    private readonly endpoint: string | undefined;
    private readonly timeoutMs: number;
    private readonly headers: Record<string, string>;
    private readonly fetchImpl: FetchLike;
    private readonly logger: Logger;
    private last: Promise<void> = Promise.resolve();
    private readonly inFlight = new Set<Promise<void>>();

    constructor(options: OtlpHttpExporterOptions) {
        this.endpoint = options.endpoint?.replace(/\/+$/, '');
        this.timeoutMs = options.timeoutMs ?? DEFAULT_EXPORT_TIMEOUT_MS;
        this.headers = { ...options.headers, 'Content-Type': 'application/json' };
        this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
        this.logger = options.logger;
    }

    send(signal: OtlpSignal, payload: OtlpPayload): void {
        if (!this.endpoint) {
            this.logger.silly('No OTLP endpoint configured, skipping export', { signal });
            return;
        }

        let body: string;
        try {
            body = JSON.stringify(payload);
        } catch (error) {
            this.logger.debug(ExporterError.serializationFailed(error).message, { signal });
            return;
        }

        const delivery = this.deliver(`${this.endpoint}/${SIGNAL_PATHS[signal]}`, body);
        this.last = delivery;
        this.inFlight.add(delivery);
        void delivery.then(() => {
            this.inFlight.delete(delivery);
        });
    }

    waitLast(): Promise<void> {
        return this.last;
    }

    async drain(): Promise<void> {
        await Promise.all([...this.inFlight]);
    }

    /**
     * Resolves once the POST settled or the timeout fired; never rejects.
     */
    private async deliver(url: string, body: string): Promise<void> {
        const controller = new AbortController();
        let timer: NodeJS.Timeout | undefined;
        const timedOut = new Promise<never>((_, reject) => {
            timer = setTimeout(() => {
                controller.abort();
                reject(ExporterError.timeout(url, this.timeoutMs));
            }, this.timeoutMs);
        });

        try {
            const response = await Promise.race([
                this.fetchImpl(url, {
                    method: 'POST',
                    headers: this.headers,
                    body,
                    signal: controller.signal,
                }),
                timedOut,
            ]);
            if (!response.ok) {
                const error = ExporterError.rejected(url, response.status, response.statusText);
                this.logger.debug(error.message, error.context);
            }
            // releases the connection back to the pool
            await response.body?.cancel();
        } catch (error) {
            const reported = isStepTraceError(error) ? error : ExporterError.failed(url, error);
            this.logger.debug(reported.message, reported.context);
        } finally {
            clearTimeout(timer);
        }
    }
}
