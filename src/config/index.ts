/**
 * Configuration
 *
 * Configuration types, defaults, environment loading and validation.
 */

export type { DynaQueryConfig, CredentialsConfig, BatchConfig } from './config.js';
export { DynaQueryConfigBuilder, isStaticCredentials, isProfileCredentials } from './config.js';

export {
  DEFAULT_REGION,
  DEFAULT_LOG_LEVEL,
  DEFAULT_BATCH_CONFIG,
  LOCAL_ENDPOINT,
  resolveConfig,
  type ResolvedConfig,
} from './defaults.js';

export { loadConfigFromEnv, getEnvBoolean } from './environment.js';
export { validateConfig } from './validation.js';
