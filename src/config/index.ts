/**
 * Configuration module exports
 */

export { CONFIG_FILE_NAMES, DEFAULT_SETTINGS, LEGACY_KEY_ALIASES, normalizeKey } from "./defaults";
export { applyOverrides, extractOverrides, INLINE_CONFIG_OPTIONS, type InlineOverrides } from "./inline";
export {
  findConfigFile,
  loadSettings,
  parseConfigContent,
  parseKeyValue,
  resolvePaths,
} from "./loader";
export { ConfigError, isSettingsKey, validateSettings } from "./validator";
