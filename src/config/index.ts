// src/config/index.ts
export { ENV_MAP, LOG_LEVEL_ENV } from './defaults';
export { parseConfigFile } from './configFile';
export { resolveConfig, readEnvConfig, type ConfigSources, type Env } from './resolve';
