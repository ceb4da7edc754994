import os from 'os';
import { describe, expect, it } from 'vitest';
import { loadConfig, parseHeaders } from './loader.js';

describe('loadConfig', () => {
    it('applies defaults to an empty environment', () => {
        const { config, issues } = loadConfig({});

        expect(issues).toEqual([]);
        expect(config).toEqual({
            serviceName: 'unknown',
            serviceVersion: 'unknown',
            hostName: os.hostname(),
            endpoint: undefined,
            headers: {},
            exportTimeoutMs: 5000,
            flushMode: 'last',
            logLevel: 'warn',
            retry: { maxAttempts: 30, initialDelayMs: 1000, maxDelayMs: 60000 },
        });
    });

    it('maps every variable and converts retry delays from seconds', () => {
        const { config, issues } = loadConfig({
            OTEL_SERVICE_NAME: 'build',
            OTEL_SERVICE_VERSION: '1.4.2',
            HOSTNAME: 'runner-1',
            OTEL_EXPORTER_OTLP_ENDPOINT: 'http://collector:4318',
            OTEL_EXPORTER_OTLP_HEADERS: 'authorization=Bearer%20test-secret, x-team=ci',
            OTEL_EXPORTER_OTLP_TIMEOUT: '2500',
            STEPTRACE_FLUSH_MODE: 'all',
            STEPTRACE_LOG_LEVEL: 'debug',
            STEPTRACE_LOG_FILE: '/var/log/steptrace.jsonl',
            RETRY_COUNT: '3',
            RETRY_DELAY: '1.5',
            RETRY_MAX_DELAY: '10',
        });

        expect(issues).toEqual([]);
        expect(config).toEqual({
            serviceName: 'build',
            serviceVersion: '1.4.2',
            hostName: 'runner-1',
            endpoint: 'http://collector:4318',
            headers: { authorization: 'Bearer test-secret', 'x-team': 'ci' },
            exportTimeoutMs: 2500,
            flushMode: 'all',
            logLevel: 'debug',
            logFile: '/var/log/steptrace.jsonl',
            retry: { maxAttempts: 3, initialDelayMs: 1500, maxDelayMs: 10000 },
        });
    });

    it('falls back per field and reports each invalid value', () => {
        const { config, issues } = loadConfig({
            OTEL_SERVICE_NAME: 'build',
            OTEL_EXPORTER_OTLP_ENDPOINT: 'not a url',
            STEPTRACE_FLUSH_MODE: 'sometimes',
            RETRY_COUNT: 'abc',
            RETRY_DELAY: '2',
        });

        expect(issues.map((issue) => issue.field).sort()).toEqual([
            'endpoint',
            'flushMode',
            'retry.maxAttempts',
        ]);
        expect(config.serviceName).toBe('build');
        expect(config.endpoint).toBeUndefined();
        expect(config.flushMode).toBe('last');
        expect(config.retry).toEqual({ maxAttempts: 30, initialDelayMs: 2000, maxDelayMs: 60000 });
    });

    it('treats blank values as unset', () => {
        const { config, issues } = loadConfig({ OTEL_SERVICE_NAME: '   ', HOSTNAME: 'runner-1' });

        expect(issues).toEqual([]);
        expect(config.serviceName).toBe('unknown');
    });
});

describe('parseHeaders', () => {
    it('returns undefined when unset', () => {
        expect(parseHeaders(undefined)).toBeUndefined();
        expect(parseHeaders('')).toBeUndefined();
    });

    it('skips entries without a key and keeps undecodable values verbatim', () => {
        expect(parseHeaders('=orphan,x-a=%E0%A4%A,x-b=1=2')).toEqual({
            'x-a': '%E0%A4%A',
            'x-b': '1=2',
        });
    });
});
