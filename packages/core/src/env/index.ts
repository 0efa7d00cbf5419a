export {
  EnvironmentResolutionError,
  readEnvInteger,
  readEnvLogLevel,
} from './env-reader.js';
