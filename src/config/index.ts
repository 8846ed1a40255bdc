/**
 * Config module exports.
 */

export type { EngineConfigFile, MergedConfig, LogLevelSetting } from './config-schema.js';
export { DEFAULT_CONFIG, CONFIG_FILE_VERSION, engineConfigFileSchema } from './config-schema.js';
export { ConfigLoader, createConfigLoader } from './config-loader.js';
