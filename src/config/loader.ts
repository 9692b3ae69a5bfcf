// Configuration persistence
import { readFile, writeFile, rename, unlink, mkdir } from 'fs/promises';
import { existsSync } from 'fs';
import { dirname, basename, join, extname } from 'path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { ConfigMissingError, ConfigInvalidError, errorMessage } from '../errors';
import { DeploymentConfig } from '../types';
import { ConfigFormat, ConfigStore } from './types';
import { validateAndNormalizeConfig } from './validator';

export const DEFAULT_CONFIG_PATHS = [
  './hackstack.json',
  './hackstack.yml',
  './hackstack.yaml'
];

/**
 * Field order used when writing a configuration, so the same config always
 * produces the same bytes.
 */
export const CONFIG_FIELD_ORDER: readonly (keyof DeploymentConfig)[] = [
  'stack_name',
  'region',
  'aws_profile',
  'storage_bucket_name',
  'table_name',
  'function_name',
  'api_name',
  'function_package',
  'function_role_arn',
  'function_runtime',
  'function_handler',
  'function_timeout',
  'function_memory',
  'function_environment',
  'api_routes',
  'api_stage',
  'tags',
  'storage_bucket_arn',
  'table_arn',
  'function_arn_or_id',
  'api_id',
  'api_endpoint'
];

export function detectFormat(path: string): ConfigFormat {
  const extension = extname(path).toLowerCase();
  if (extension === '.json') {
    return 'json';
  }
  if (extension === '.yml' || extension === '.yaml') {
    return 'yaml';
  }
  throw new ConfigInvalidError(path, ['Unsupported file format. Only .json, .yml, and .yaml files are supported.']);
}

function sortRecord(record: Record<string, string>): Record<string, string> {
  const sorted: Record<string, string> = {};
  for (const key of Object.keys(record).sort()) {
    sorted[key] = record[key];
  }
  return sorted;
}

/**
 * Serialize a configuration deterministically: fixed field order, sorted map
 * keys, absent fields omitted.
 */
export function serializeConfig(config: DeploymentConfig, format: ConfigFormat): string {
  const ordered: Record<string, unknown> = {};

  for (const field of CONFIG_FIELD_ORDER) {
    const value = config[field];
    if (value === undefined) {
      continue;
    }
    if (field === 'tags' || field === 'function_environment') {
      ordered[field] = sortRecord(config[field] ?? {});
    } else {
      ordered[field] = value;
    }
  }

  return format === 'json'
    ? `${JSON.stringify(ordered, null, 2)}\n`
    : stringifyYaml(ordered);
}

/**
 * Configuration store backed by a local JSON or YAML file.
 *
 * Writes go to a sibling temp file that is renamed over the target, so a
 * reader sees either the previous file or the new one, never a partial write.
 */
export class FileConfigStore implements ConfigStore {
  readonly path: string;
  private readonly format: ConfigFormat;

  constructor(path: string) {
    this.path = path;
    this.format = detectFormat(path);
  }

  async exists(): Promise<boolean> {
    return existsSync(this.path);
  }

  async load(): Promise<DeploymentConfig> {
    if (!existsSync(this.path)) {
      throw new ConfigMissingError(this.path);
    }

    const content = await readFile(this.path, 'utf-8');

    let rawConfig: unknown;
    try {
      rawConfig = this.format === 'json' ? JSON.parse(content) : parseYaml(content);
    } catch (error) {
      throw new ConfigInvalidError(this.path, [`Could not parse file: ${errorMessage(error)}`]);
    }

    return validateAndNormalizeConfig(rawConfig, this.path);
  }

  async save(config: DeploymentConfig): Promise<void> {
    const content = serializeConfig(config, this.format);
    const directory = dirname(this.path);
    const tempPath = join(directory, `.${basename(this.path)}.${process.pid}.${Date.now()}.tmp`);

    await mkdir(directory, { recursive: true });
    try {
      await writeFile(tempPath, content, 'utf-8');
      await rename(tempPath, this.path);
    } catch (error) {
      if (existsSync(tempPath)) {
        await unlink(tempPath);
      }
      throw error;
    }
  }
}

/**
 * Convenience function to create a file-backed configuration store
 */
export function createConfigStore(path: string): FileConfigStore {
  return new FileConfigStore(path);
}

/**
 * Find the first existing configuration file among the search paths.
 * Falls back to the first search path so `init` has somewhere to write.
 */
export function resolveConfigPath(searchPaths: string[] = DEFAULT_CONFIG_PATHS): string {
  return searchPaths.find(path => existsSync(path)) ?? searchPaths[0];
}
