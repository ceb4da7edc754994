/**
 * Maps the step's environment onto StepTraceConfig.
 *
 * A bad value never fails the step: the field falls back to its default and
 * the problem is returned as an issue for the caller to log.
 */

import os from 'os';
import type { ZodIssue } from 'zod';
import { parseAttributePair } from '../telemetry/attributes.js';
import { StepTraceConfigSchema, type StepTraceConfig } from './schemas.js';

export const CONFIG_ENV = {
    SERVICE_NAME: 'OTEL_SERVICE_NAME',
    SERVICE_VERSION: 'OTEL_SERVICE_VERSION',
    HOST_NAME: 'HOSTNAME',
    ENDPOINT: 'OTEL_EXPORTER_OTLP_ENDPOINT',
    HEADERS: 'OTEL_EXPORTER_OTLP_HEADERS',
    TIMEOUT: 'OTEL_EXPORTER_OTLP_TIMEOUT',
    FLUSH_MODE: 'STEPTRACE_FLUSH_MODE',
    LOG_LEVEL: 'STEPTRACE_LOG_LEVEL',
    LOG_FILE: 'STEPTRACE_LOG_FILE',
    RETRY_COUNT: 'RETRY_COUNT',
    RETRY_DELAY: 'RETRY_DELAY',
    RETRY_MAX_DELAY: 'RETRY_MAX_DELAY',
} as const;

export interface ConfigIssue {
    /** Dotted config path, e.g. `retry.maxAttempts` */
    field: string;
    message: string;
}

export interface LoadedConfig {
    config: StepTraceConfig;
    issues: ConfigIssue[];
}

interface RawRetry {
    maxAttempts?: number | undefined;
    initialDelayMs?: number | undefined;
    maxDelayMs?: number | undefined;
}

interface RawConfig {
    serviceName?: string | undefined;
    serviceVersion?: string | undefined;
    hostName?: string | undefined;
    endpoint?: string | undefined;
    headers?: Record<string, string> | undefined;
    exportTimeoutMs?: number | undefined;
    flushMode?: string | undefined;
    logLevel?: string | undefined;
    logFile?: string | undefined;
    retry: RawRetry;
}

function nonEmpty(value: string | undefined): string | undefined {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
}

function toNumber(value: string | undefined): number | undefined {
    const text = nonEmpty(value);
    return text === undefined ? undefined : Number(text);
}

function secondsToMs(value: string | undefined): number | undefined {
    const seconds = toNumber(value);
    return seconds === undefined ? undefined : seconds * 1000;
}

/**
 * Parses `key=value,key2=value2` with percent-encoded values.
 */
export function parseHeaders(value: string | undefined): Record<string, string> | undefined {
    const text = nonEmpty(value);
    if (text === undefined) return undefined;

    const headers: Record<string, string> = {};
    for (const entry of text.split(',')) {
        const { key, value: encoded } = parseAttributePair(entry);
        const name = key.trim();
        if (!name) continue;
        try {
            headers[name] = decodeURIComponent(encoded.trim());
        } catch {
            headers[name] = encoded.trim();
        }
    }
    return headers;
}

function readRaw(env: NodeJS.ProcessEnv): RawConfig {
    return {
        serviceName: nonEmpty(env[CONFIG_ENV.SERVICE_NAME]),
        serviceVersion: nonEmpty(env[CONFIG_ENV.SERVICE_VERSION]),
        hostName: nonEmpty(env[CONFIG_ENV.HOST_NAME]) ?? os.hostname(),
        endpoint: nonEmpty(env[CONFIG_ENV.ENDPOINT]),
        headers: parseHeaders(env[CONFIG_ENV.HEADERS]),
        exportTimeoutMs: toNumber(env[CONFIG_ENV.TIMEOUT]),
        flushMode: nonEmpty(env[CONFIG_ENV.FLUSH_MODE]),
        logLevel: nonEmpty(env[CONFIG_ENV.LOG_LEVEL]),
        logFile: nonEmpty(env[CONFIG_ENV.LOG_FILE]),
        retry: {
            maxAttempts: toNumber(env[CONFIG_ENV.RETRY_COUNT]),
            initialDelayMs: secondsToMs(env[CONFIG_ENV.RETRY_DELAY]),
            maxDelayMs: secondsToMs(env[CONFIG_ENV.RETRY_MAX_DELAY]),
        },
    };
}

function isRetryKey(key: PropertyKey): key is keyof RawRetry {
    return key === 'maxAttempts' || key === 'initialDelayMs' || key === 'maxDelayMs';
}

function isTopLevelKey(key: PropertyKey): key is Exclude<keyof RawConfig, 'retry'> {
    return (
        key === 'serviceName' ||
        key === 'serviceVersion' ||
        key === 'hostName' ||
        key === 'endpoint' ||
        key === 'headers' ||
        key === 'exportTimeoutMs' ||
        key === 'flushMode' ||
        key === 'logLevel' ||
        key === 'logFile'
    );
}

/**
 * Clears every field an issue points at so the schema default applies instead
 */
function withoutInvalidFields(raw: RawConfig, issues: ZodIssue[]): RawConfig {
    const next: RawConfig = { ...raw, retry: { ...raw.retry } };
    for (const issue of issues) {
        const [head, sub] = issue.path;
        if (head === 'retry' && sub !== undefined && isRetryKey(sub)) {
            next.retry[sub] = undefined;
        } else if (head !== undefined && isTopLevelKey(head)) {
            next[head] = undefined;
        }
    }
    return next;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): LoadedConfig {
    const raw = readRaw(env);
    const first = StepTraceConfigSchema.safeParse(raw);
    if (first.success) {
        return { config: first.data, issues: [] };
    }

    const issues = first.error.issues.map((issue) => ({
        field: issue.path.join('.'),
        message: issue.message,
    }));
    // Defaults are valid by construction, so this parse cannot fail
    const config = StepTraceConfigSchema.parse(withoutInvalidFields(raw, first.error.issues));
    return { config, issues };
}
