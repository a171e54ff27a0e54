/**
 * Config module exports.
 */

export { loadConfig, parseConfig, mergeConfig, CONFIG_FILENAME } from './loader.ts';
export { DEFAULT_CONFIG, resolveMode } from './defaults.ts';
