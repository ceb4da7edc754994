export {
    StepTraceConfigSchema,
    FlushModeSchema,
    type StepTraceConfig,
    type StepTraceConfigInput,
    type FlushMode,
} from './schemas.js';
export { loadConfig, parseHeaders, CONFIG_ENV, type ConfigIssue, type LoadedConfig } from './loader.js';
