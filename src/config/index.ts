export {
  DEFAULT_RECONCILE_CONFIG,
  resolveConfig,
  validateConfig,
  type ReconcileConfig,
  type ReconcileConfigInput,
  type DefaultKeywordPhrases,
} from './reconcile-config.js'
export {
  configFileSchema,
  parseConfigFile,
  toReconcileConfigInput,
  type ConfigFile,
} from './config-file.js'
