export { loadVersioningEnv, loadVersioningOptions, versioningOptionsFromEnv, type VersioningEnv } from './env.js';
export { loadAccountsApiServiceEnv, type AccountsApiServiceEnv } from './service-env.js';
export {
  parseVersioningConfig,
  strategyConfigSchema,
  versioningConfigSchema,
  type VersioningConfig
} from './versioning.js';
