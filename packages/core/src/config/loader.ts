import fs from 'fs';
import os from 'os';
import path from 'path';
import yaml from 'js-yaml';
import {
  ConfigError,
  DocvaultConfigSchema,
  type DocvaultConfig,
  type DocvaultConfigInput,
} from '@docvault/shared';

type ConfigLayer = Record<string, unknown>;

export interface ConfigOptions {
  configPath?: string; // --config
  flags?: DocvaultConfigInput; // CLI flags
  cwd?: string; // base for relative paths and the project config
}

const IN_MEMORY = ':memory:';

function isPlainObject(value: unknown): value is ConfigLayer {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ConfigLoader {
  static userConfigPath(): string {
    return path.join(os.homedir(), '.docvault', 'config.yaml');
  }

  static loadYaml(filePath: string): ConfigLayer {
    let parsed: unknown;
    try {
      if (!fs.existsSync(filePath)) {
        return {};
      }
      parsed = yaml.load(fs.readFileSync(filePath, 'utf8'));
    } catch (error: unknown) {
      if (error instanceof yaml.YAMLException) {
        throw new ConfigError(`Error parsing YAML file: ${filePath}\n${error.message}`);
      }
      throw error;
    }

    if (parsed === undefined || parsed === null) {
      return {};
    }
    if (!isPlainObject(parsed)) {
      throw new ConfigError(`Config file must contain a mapping: ${filePath}`);
    }
    return parsed;
  }

  /** Objects merge key by key; arrays and primitives replace */
  static mergeConfigs(target: ConfigLayer, source: ConfigLayer): ConfigLayer {
    const output: ConfigLayer = { ...target };

    for (const [key, sourceValue] of Object.entries(source)) {
      if (sourceValue === undefined) {
        continue;
      }
      const targetValue = output[key];
      output[key] =
        isPlainObject(sourceValue) && isPlainObject(targetValue)
          ? this.mergeConfigs(targetValue, sourceValue)
          : sourceValue;
    }
    return output;
  }

  /**
   * Effective configuration. Layers, lowest precedence first: schema
   * defaults, `~/.docvault/config.yaml`, `<cwd>/.docvault.yaml`, the
   * `--config` file, CLI flags.
   */
  static load(options: ConfigOptions = {}): DocvaultConfig {
    const cwd = options.cwd || process.cwd();

    const userConfig = this.loadYaml(this.userConfigPath());
    const projectConfig = this.loadYaml(path.join(cwd, '.docvault.yaml'));

    let explicitConfig: ConfigLayer = {};
    if (options.configPath) {
      const explicitPath = path.resolve(cwd, options.configPath);
      if (!fs.existsSync(explicitPath)) {
        throw new ConfigError(`Config file not found: ${options.configPath}`);
      }
      explicitConfig = this.loadYaml(explicitPath);
    }

    let merged = this.mergeConfigs({}, userConfig);
    merged = this.mergeConfigs(merged, projectConfig);
    merged = this.mergeConfigs(merged, explicitConfig);
    merged = this.mergeConfigs(merged, options.flags ?? {});

    const result = DocvaultConfigSchema.safeParse(merged);
    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `- ${i.path.join('.')}: ${i.message}`)
        .join('\n');
      throw new ConfigError(`Configuration validation failed:\n${issues}`, {
        details: { issues: result.error.issues.map((i) => i.path.join('.')) },
      });
    }

    return this.resolvePaths(result.data, cwd);
  }

  private static resolvePaths(config: DocvaultConfig, cwd: string): DocvaultConfig {
    return {
      ...config,
      knowledgeDir: path.resolve(cwd, config.knowledgeDir),
      storage: {
        ...config.storage,
        path:
          config.storage.path === IN_MEMORY
            ? IN_MEMORY
            : path.resolve(cwd, config.storage.path),
      },
      logging: {
        ...config.logging,
        eventsPath: config.logging.eventsPath
          ? path.resolve(cwd, config.logging.eventsPath)
          : undefined,
      },
    };
  }
}
