export {
  loadLoggingConfig,
  loadRuntimeConfig,
  RuntimeConfigSchema,
  type LoggingConfig,
  type RuntimeConfig,
} from './runtime-config.js';
