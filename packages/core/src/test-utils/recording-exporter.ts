import type { Exporter } from '../exporter/types.js';
import type {
    OtlpLogRecord,
    OtlpMetric,
    OtlpPayload,
    OtlpSignal,
    OtlpSpan,
} from '../telemetry/types.js';

/**
 * Exporter that keeps every payload in memory
 */
export class RecordingExporter implements Exporter {
    readonly sent: Array<{ signal: OtlpSignal; payload: OtlpPayload }> = [];
    waitLastCalls = 0;
    drainCalls = 0;

    send(signal: OtlpSignal, payload: OtlpPayload): void {
        this.sent.push({ signal, payload });
    }

    async waitLast(): Promise<void> {
        this.waitLastCalls += 1;
    }

    async drain(): Promise<void> {
        this.drainCalls += 1;
    }

    spans(): OtlpSpan[] {
        return this.sent.flatMap(({ payload }) =>
            'resourceSpans' in payload
                ? payload.resourceSpans.flatMap((r) => r.scopeSpans.flatMap((s) => s.spans))
                : []
        );
    }

    logs(): OtlpLogRecord[] {
        return this.sent.flatMap(({ payload }) =>
            'resourceLogs' in payload
                ? payload.resourceLogs.flatMap((r) => r.scopeLogs.flatMap((s) => s.logRecords))
                : []
        );
    }

    metrics(): OtlpMetric[] {
        return this.sent.flatMap(({ payload }) =>
            'resourceMetrics' in payload
                ? payload.resourceMetrics.flatMap((r) => r.scopeMetrics.flatMap((s) => s.metrics))
                : []
        );
    }
}
