export * from './types.js';
export {
    type Attribute,
    type AttributeSet,
    type AttributeInput,
    EMPTY_ATTRIBUTES,
    attributesFrom,
    parseAttributePair,
    parseAttributePairs,
    toOtlpAttributes,
} from './attributes.js';
export {
    type ResourceDescriptor,
    type ResourceInfo,
    ATTR_HOST_NAME,
    ATTR_STEP_NAME,
    SDK_NAME,
    buildResource,
} from './resource.js';
export { type Clock, SystemClock } from './clock.js';
export { encodeSpan, encodeLog, encodeMetric, safeEncode } from './encoder.js';
export { TelemetryError } from './errors.js';
export { TelemetryErrorCode } from './error-codes.js';
