export { CONFIG_FILE_NAME, findConfigPath, findConfigUpwards, loadConfig, parseConfig, psetToMap, resolveConfig } from './loader';

export { type GridConfig, GridConfigSchema, type Pset } from './schema';
