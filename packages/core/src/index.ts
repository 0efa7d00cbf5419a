// Logging with redaction
export * from './logging/index.js';

export {
  EnvironmentResolutionError,
  readEnvInteger,
  readEnvLogLevel,
} from './env/index.js';
