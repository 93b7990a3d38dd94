// Barrel-файл модуля конфигурации.
export {
  AppConfigSchema,
  ChainConfigSchema,
  DemoConfigSchema,
  DocumentKindSchema,
  StrategyNameSchema,
} from './schema.js';

export type {
  AppConfig,
  ChainConfig,
  DemoConfig,
  DocumentKind,
  StrategyName,
} from './schema.js';

export { defaultConfig } from './defaults.js';

export { loadConfig, resolveEnvVars, deepMerge } from './loader.js';
