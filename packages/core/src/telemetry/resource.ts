import {
    ATTR_SERVICE_NAME,
    ATTR_SERVICE_VERSION,
    ATTR_TELEMETRY_SDK_LANGUAGE,
    ATTR_TELEMETRY_SDK_NAME,
    TELEMETRY_SDK_LANGUAGE_VALUE_NODEJS,
} from '@opentelemetry/semantic-conventions';
import type { AttributeSet } from './attributes.js';

export const SDK_NAME = 'steptrace';
export const ATTR_HOST_NAME = 'host.name';
export const ATTR_STEP_NAME = 'step.name';

export interface ResourceInfo {
    serviceName: string;
    serviceVersion: string;
    hostName: string;
    stepName: string;
}

/**
 * Resource attributes attached to every exported record.
 * Only step.name changes between steps of one process.
 */
export type ResourceDescriptor = AttributeSet;

export function buildResource(info: ResourceInfo): ResourceDescriptor {
    return Object.freeze([
        { key: ATTR_SERVICE_NAME, value: info.serviceName },
        { key: ATTR_SERVICE_VERSION, value: info.serviceVersion },
        { key: ATTR_HOST_NAME, value: info.hostName },
        { key: ATTR_TELEMETRY_SDK_LANGUAGE, value: TELEMETRY_SDK_LANGUAGE_VALUE_NODEJS },
        { key: ATTR_TELEMETRY_SDK_NAME, value: SDK_NAME },
        { key: ATTR_STEP_NAME, value: info.stepName },
    ]);
}
