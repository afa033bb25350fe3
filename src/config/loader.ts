import * as fs from 'fs-extra';
import * as path from 'path';
import { parse as parseYaml } from 'yaml';
import { safeValidateConfig, Config } from './schema';
import { defaultConfig } from './defaults';
import { ConfigError } from '../core/errors';

export const DEFAULT_CONFIG_FILES = ['req2code.config.json', 'req2code.config.yaml', 'req2code.config.yml', 'req2code.config.js'];

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep-merge plain objects; arrays and scalars from `override` replace `base`.
 */
export function mergeConfig(base: PlainObject, override: PlainObject): PlainObject {
  const result: PlainObject = { ...base };
  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) {
      continue;
    }
    const existing = result[key];
    result[key] = isPlainObject(existing) && isPlainObject(value) ? mergeConfig(existing, value) : value;
  }
  return result;
}

async function readConfigFile(configFile: string): Promise<unknown> {
  if (configFile.endsWith('.json')) {
    return fs.readJson(configFile);
  }
  if (configFile.endsWith('.yaml') || configFile.endsWith('.yml')) {
    return parseYaml(await fs.readFile(configFile, 'utf-8'));
  }
  if (configFile.endsWith('.js')) {
    const resolved = path.resolve(configFile);
    delete require.cache[require.resolve(resolved)];
    return require(resolved);
  }
  throw new ConfigError(`Unsupported config file format: ${configFile}`);
}

async function findDefaultConfigFile(cwd: string): Promise<string | null> {
  for (const name of DEFAULT_CONFIG_FILES) {
    const candidate = path.join(cwd, name);
    if (await fs.pathExists(candidate)) {
      return candidate;
    }
  }
  return null;
}

/**
 * Load and validate configuration.
 *
 * An explicit `configPath` must exist. Without one, the first default file in
 * `cwd` is used, or the defaults alone when there is none. `overrides` (e.g. CLI
 * flags) win over the file.
 */
export async function loadConfig(
  configPath?: string,
  overrides: PlainObject = {},
  cwd: string = process.cwd()
): Promise<Config> {
  let fileData: unknown = {};

  if (configPath) {
    if (!(await fs.pathExists(configPath))) {
      throw new ConfigError(`Config file not found: ${configPath}`);
    }
    fileData = await readConfigFile(configPath);
  } else {
    const found = await findDefaultConfigFile(cwd);
    if (found) {
      fileData = await readConfigFile(found);
    }
  }

  if (!isPlainObject(fileData)) {
    throw new ConfigError(`Config file must contain an object: ${configPath || 'default config'}`);
  }

  const merged = mergeConfig(mergeConfig({ ...defaultConfig }, fileData), overrides);
  const result = safeValidateConfig(merged);

  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration:\n  ${issues.join('\n  ')}`);
  }

  return result.data;
}

export async function configExists(configPath?: string, cwd: string = process.cwd()): Promise<boolean> {
  if (configPath) {
    return fs.pathExists(configPath);
  }
  return (await findDefaultConfigFile(cwd)) !== null;
}
