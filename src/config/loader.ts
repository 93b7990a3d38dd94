import { readFile, access } from 'node:fs/promises';
import { resolve, join } from 'node:path';
import { homedir } from 'node:os';
import { parse as parseYaml } from 'yaml';
import { AppConfigSchema } from './schema.js';
import { defaultConfig } from './defaults.js';
import type { AppConfig } from './schema.js';

// Имя конфиг-файла в текущей директории.
const LOCAL_CONFIG_NAME = 'docflow.config.yaml';

// Переменная окружения с явным путём к конфигу.
const CONFIG_ENV_VAR = 'DOCFLOW_CONFIG';

// Паттерн для подстановки переменных окружения: ${ENV_VAR}.
const ENV_VAR_PATTERN = /\$\{([^}]+)\}/g;

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Рекурсивно обходит значение и заменяет строки вида ${ENV_VAR}
 * на значения из process.env. Неизвестные переменные остаются как есть.
 */
export function resolveEnvVars(value: unknown): unknown {
  if (typeof value === 'string') {
    return value.replace(ENV_VAR_PATTERN, (match, varName: string) => process.env[varName] ?? match);
  }

  if (Array.isArray(value)) {
    return value.map((item) => resolveEnvVars(item));
  }

  if (isPlainObject(value)) {
    const result: PlainObject = {};
    for (const [key, item] of Object.entries(value)) {
      result[key] = resolveEnvVars(item);
    }
    return result;
  }

  return value;
}

/**
 * Рекурсивный deep-merge: значения source перезаписывают target,
 * вложенные объекты сливаются, массивы заменяются целиком.
 * Исходные объекты не мутируются.
 */
export function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = result[key];
    result[key] = isPlainObject(sourceValue) && isPlainObject(targetValue)
      ? deepMerge(targetValue, sourceValue)
      : sourceValue;
  }

  return result;
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Определяет путь к конфиг-файлу.
 * Порядок поиска:
 * 0. Переданный configPath (--config). При отсутствии файла — throw Error.
 * 1. DOCFLOW_CONFIG env var. При отсутствии файла — throw Error.
 * 2. ./docflow.config.yaml (текущая директория).
 * 3. ~/.config/docflow/config.yaml (домашняя директория).
 */
export async function resolveConfigPath(configPath?: string): Promise<string | null> {
  if (configPath) {
    const resolved = resolve(configPath);
    if (await fileExists(resolved)) {
      return resolved;
    }
    throw new Error(`Config file not found at path: ${resolved}`);
  }

  const envConfigPath = process.env[CONFIG_ENV_VAR];
  if (envConfigPath) {
    const resolved = resolve(envConfigPath);
    if (await fileExists(resolved)) {
      return resolved;
    }
    throw new Error(`Config file not found at ${CONFIG_ENV_VAR} path: ${resolved}`);
  }

  const localPath = resolve(LOCAL_CONFIG_NAME);
  if (await fileExists(localPath)) {
    return localPath;
  }

  const globalPath = join(homedir(), '.config', 'docflow', 'config.yaml');
  if (await fileExists(globalPath)) {
    return globalPath;
  }

  return null;
}

/**
 * Загружает конфигурацию из YAML-файла.
 *
 * 1. Определяет путь к конфиг-файлу (аргумент или поиск).
 * 2. Читает YAML и подставляет переменные окружения.
 * 3. Сливает с дефолтами и валидирует через AppConfigSchema.
 *
 * Если конфиг-файл не найден или пуст — возвращает дефолтный конфиг.
 */
export async function loadConfig(configPath?: string): Promise<AppConfig> {
  const resolvedPath = await resolveConfigPath(configPath);

  if (!resolvedPath) {
    return AppConfigSchema.parse(defaultConfig);
  }

  const raw = await readFile(resolvedPath, 'utf-8');
  const parsed: unknown = parseYaml(raw);

  if (!isPlainObject(parsed)) {
    return AppConfigSchema.parse(defaultConfig);
  }

  const withEnvVars = resolveEnvVars(parsed);
  const merged = isPlainObject(withEnvVars)
    ? deepMerge({ ...defaultConfig }, withEnvVars)
    : { ...defaultConfig };

  return AppConfigSchema.parse(merged);
}
