export { loadMutaformConfig, resolveConfig, CONFIG_DEFAULTS, CONFIG_FILE } from './loader';
export type { ConfigWarning, LoadConfigResult, ResolvedConfig } from './loader';
export { mutaformConfigSchema, CONFIG_SECTIONS } from './schema';
export type { MutaformConfigInput } from './schema';
