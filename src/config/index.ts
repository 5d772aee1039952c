export { loadAuditorConfig, resolveConfig, CONFIG_DEFAULTS, DEFAULT_CONFIG_FILE } from './loader';
export type { ConfigWarning, LoadConfigResult, ConfigOverrides } from './loader';
export { auditorConfigSchema } from './schema';
