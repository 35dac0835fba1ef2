export { deny, denyVersioningError, errorEnvelope, VERSIONING_ERROR_STATUS } from './errors.js';
export { registerServiceMetrics, type ServiceMetricsOptions } from './metrics.js';
export {
  registerVersioning,
  resolvedTemplate,
  toRequestView,
  type VersionContext,
  type VersionedHandler,
  type VersioningPluginOptions
} from './versioning.js';
export { runService, runServiceAndExit, type ServiceBootstrapOptions } from './bootstrap.js';
