import fs from 'fs';
import path from 'path';
import os from 'os';
import yaml from 'js-yaml';
import {
  ConfigError,
  parseEngineConfig,
  type EngineConfig,
  type EngineConfigInput,
} from '@hunkwise/shared';

export interface ConfigOptions {
  configPath?: string; // CLI override
  flags?: EngineConfigInput; // CLI flags
  cwd?: string; // Current working directory (for repo config)
  env?: NodeJS.ProcessEnv; // Environment variables
}

type ConfigRecord = Record<string, unknown>;

type EnvValue = 'int' | 'boolean' | 'string';

/** `HUNKWISE_*` variables and the config key path each one sets */
const ENV_KEYS: ReadonlyArray<[string, readonly string[], EnvValue]> = [
  ['HUNKWISE_STRIP_LEVEL', ['stripLevel'], 'int'],
  ['HUNKWISE_SEARCH_RADIUS', ['matching', 'searchRadius'], 'int'],
  ['HUNKWISE_FUZZ', ['matching', 'fuzz'], 'int'],
  ['HUNKWISE_IGNORE_WHITESPACE', ['matching', 'ignoreWhitespace'], 'boolean'],
  ['HUNKWISE_BINARY', ['binary'], 'string'],
  ['HUNKWISE_ALLOW_OVERWRITE', ['allowOverwrite'], 'boolean'],
  ['HUNKWISE_ATOMIC', ['atomic'], 'boolean'],
  ['HUNKWISE_REVERSE', ['reverse'], 'boolean'],
  ['HUNKWISE_TIMEOUT_MS', ['timeoutMs'], 'int'],
  ['HUNKWISE_LOG_FILE', ['logging', 'jsonlPath'], 'string'],
];

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ConfigLoader {
  static loadYaml(filePath: string): ConfigRecord {
    if (!fs.existsSync(filePath)) {
      return {};
    }
    let parsed: unknown;
    try {
      parsed = yaml.load(fs.readFileSync(filePath, 'utf8'));
    } catch (error: unknown) {
      if (error instanceof yaml.YAMLException) {
        throw new ConfigError(`Error parsing YAML file: ${filePath}\n${error.message}`, {
          cause: error,
        });
      }
      throw error;
    }
    if (parsed === undefined || parsed === null) {
      return {};
    }
    if (!isRecord(parsed)) {
      throw new ConfigError(`Config file must contain a mapping: ${filePath}`);
    }
    return parsed;
  }

  static mergeConfigs(target: ConfigRecord, source: ConfigRecord): ConfigRecord {
    const output: ConfigRecord = { ...target };
    for (const [key, sourceValue] of Object.entries(source)) {
      if (sourceValue === undefined) {
        continue;
      }
      const targetValue = output[key];
      if (isRecord(sourceValue) && isRecord(targetValue)) {
        output[key] = this.mergeConfigs(targetValue, sourceValue);
      } else {
        // Arrays and primitives replace
        output[key] = sourceValue;
      }
    }
    return output;
  }

  /**
   * Reads `HUNKWISE_*` variables into a partial configuration.
   * Values that do not convert are passed through so validation reports them.
   */
  static fromEnv(env: NodeJS.ProcessEnv): ConfigRecord {
    let config: ConfigRecord = {};
    for (const [name, keyPath, kind] of ENV_KEYS) {
      const raw = env[name];
      if (raw === undefined || raw === '') continue;
      const value = convertEnvValue(raw, kind);
      const nested = keyPath.reduceRight<unknown>((inner, key) => ({ [key]: inner }), value);
      if (isRecord(nested)) config = this.mergeConfigs(config, nested);
    }
    return config;
  }

  /**
   * Merges, lowest to highest precedence: user config, repo config, explicit
   * `--config` file, environment, CLI flags. The result is validated and
   * completed with defaults.
   */
  static load(options: ConfigOptions = {}): EngineConfig {
    const cwd = options.cwd || process.cwd();
    const env = options.env || process.env;

    // 1. User config: ~/.hunkwise/config.yaml
    const userConfig = this.loadYaml(path.join(os.homedir(), '.hunkwise', 'config.yaml'));

    // 2. Repo config: <cwd>/.hunkwise.yaml
    const repoConfig = this.loadYaml(path.join(cwd, '.hunkwise.yaml'));

    // 3. Explicit --config file (if provided)
    let explicitConfig: ConfigRecord = {};
    if (options.configPath) {
      if (!fs.existsSync(options.configPath)) {
        throw new ConfigError(`Config file not found: ${options.configPath}`);
      }
      explicitConfig = this.loadYaml(options.configPath);
    }

    // 4. Environment, 5. CLI flags
    const envConfig = this.fromEnv(env);
    const flagConfig: ConfigRecord = { ...(options.flags ?? {}) };

    let merged = this.mergeConfigs({}, userConfig);
    merged = this.mergeConfigs(merged, repoConfig);
    merged = this.mergeConfigs(merged, explicitConfig);
    merged = this.mergeConfigs(merged, envConfig);
    merged = this.mergeConfigs(merged, flagConfig);

    return parseEngineConfig(merged);
  }
}

function convertEnvValue(raw: string, kind: EnvValue): unknown {
  switch (kind) {
    case 'int': {
      const value = Number(raw);
      return Number.isFinite(value) ? value : raw;
    }
    case 'boolean':
      if (/^(1|true|yes|on)$/i.test(raw)) return true;
      if (/^(0|false|no|off)$/i.test(raw)) return false;
      return raw;
    case 'string':
      return raw;
  }
}
