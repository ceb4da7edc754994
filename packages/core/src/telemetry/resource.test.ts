import { describe, it, expect } from 'vitest';
import { buildResource } from './resource.js';

describe('buildResource', () => {
    it('lists the fixed resource attributes in order', () => {
        const resource = buildResource({
            serviceName: 'sbom-generator',
            serviceVersion: '1.4.0',
            hostName: 'runner-7',
            stepName: 'step-build',
        });

        expect(resource).toEqual([
            { key: 'service.name', value: 'sbom-generator' },
            { key: 'service.version', value: '1.4.0' },
            { key: 'host.name', value: 'runner-7' },
            { key: 'telemetry.sdk.language', value: 'nodejs' },
            { key: 'telemetry.sdk.name', value: 'steptrace' },
            { key: 'step.name', value: 'step-build' },
        ]);
        expect(Object.isFrozen(resource)).toBe(true);
    });
});
