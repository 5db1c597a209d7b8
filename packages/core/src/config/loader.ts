import fs from 'fs';
import path from 'path';
import os from 'os';
import yaml from 'js-yaml';
import { ConfigError, ConfigSchema, type Config } from '@patchfix/shared';

type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends unknown[] ? T[K] : T[K] extends object ? DeepPartial<T[K]> : T[K];
};

/** Config values set from command-line flags */
export type ConfigOverrides = DeepPartial<Config>;

export interface ConfigOptions {
  configPath?: string; // --config
  flags?: ConfigOverrides;
  cwd?: string; // repo root, for .patchfix.yaml
  env?: NodeJS.ProcessEnv;
}

export const USER_CONFIG_DIR = '.patchfix';
export const REPO_CONFIG_FILE = '.patchfix.yaml';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ConfigLoader {
  static loadYaml(filePath: string): Record<string, unknown> {
    if (!fs.existsSync(filePath)) {
      return {};
    }
    let parsed: unknown;
    try {
      parsed = yaml.load(fs.readFileSync(filePath, 'utf8'));
    } catch (error: unknown) {
      if (error instanceof yaml.YAMLException) {
        throw new ConfigError(`Error parsing YAML file: ${filePath}\n${error.message}`, { cause: error });
      }
      throw error;
    }
    // An empty file loads as undefined.
    if (parsed === undefined || parsed === null) return {};
    if (!isPlainObject(parsed)) {
      throw new ConfigError(`Config file must contain a mapping: ${filePath}`);
    }
    return parsed;
  }

  /**
   * Objects merge key by key; arrays and primitives replace. Undefined
   * source values are ignored.
   */
  static mergeConfigs(target: Record<string, unknown>, source: unknown): Record<string, unknown> {
    const output: Record<string, unknown> = { ...target };
    if (!isPlainObject(source)) {
      return output;
    }

    for (const [key, sourceValue] of Object.entries(source)) {
      if (sourceValue === undefined) continue;
      const targetValue = output[key];
      output[key] =
        isPlainObject(sourceValue) && isPlainObject(targetValue)
          ? this.mergeConfigs(targetValue, sourceValue)
          : sourceValue;
    }
    return output;
  }

  static load(options: ConfigOptions = {}): Config {
    const cwd = options.cwd || process.cwd();
    const env = options.env || process.env;

    // 1. User config: ~/.patchfix/config.yaml
    const userConfig = this.loadYaml(path.join(os.homedir(), USER_CONFIG_DIR, 'config.yaml'));

    // 2. Repo config: <repoRoot>/.patchfix.yaml
    const repoConfig = this.loadYaml(path.join(cwd, REPO_CONFIG_FILE));

    // 3. Explicit --config file
    let explicitConfig: Record<string, unknown> = {};
    if (options.configPath) {
      if (!fs.existsSync(options.configPath)) {
        throw new ConfigError(`Config file not found: ${options.configPath}`);
      }
      explicitConfig = this.loadYaml(options.configPath);
    }

    // Precedence: flags > explicit > repo > user; schema defaults fill the rest.
    let merged = this.mergeConfigs({}, userConfig);
    merged = this.mergeConfigs(merged, repoConfig);
    merged = this.mergeConfigs(merged, explicitConfig);
    merged = this.mergeConfigs(merged, options.flags);

    const result = ConfigSchema.safeParse(merged);
    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `- ${i.path.join('.')}: ${i.message}`)
        .join('\n');
      throw new ConfigError(`Configuration validation failed:\n${issues}`);
    }

    const config = result.data;

    // Handle `api_key_env` resolution
    for (const providerConfig of Object.values(config.providers ?? {})) {
      if (providerConfig.api_key_env && !providerConfig.api_key) {
        const value = env[providerConfig.api_key_env];
        if (value) {
          providerConfig.api_key = value;
        }
      }
    }

    return config;
  }
}
