import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import os from 'os';
import { Config, ConfigInput, ConfigSchema, ConfigError } from '@lambdakit/shared';

export const PROJECT_CONFIG_FILENAME = 'lambdakit.yaml';

export interface ConfigOptions {
  configPath?: string; // CLI override
  flags?: ConfigInput; // CLI flags
  cwd?: string; // Project root (for project config)
}

type ConfigRecord = Record<string, unknown>;

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ConfigLoader {
  static userConfigPath(): string {
    return path.join(os.homedir(), '.lambdakit', 'config.yaml');
  }

  static loadYaml(filePath: string): ConfigRecord {
    try {
      if (!fs.existsSync(filePath)) {
        return {};
      }
      const content = fs.readFileSync(filePath, 'utf8');
      const parsed: unknown = yaml.load(content);
      if (parsed === undefined || parsed === null) {
        return {};
      }
      if (!isRecord(parsed)) {
        throw new ConfigError(`Config file must contain a mapping: ${filePath}`);
      }
      return parsed;
    } catch (error: unknown) {
      if (error instanceof yaml.YAMLException) {
        throw new ConfigError(`Error parsing YAML file: ${filePath}\n${error.message}`, {
          cause: error,
        });
      }
      throw error;
    }
  }

  static mergeConfigs(target: ConfigRecord, source: ConfigRecord): ConfigRecord {
    const output: ConfigRecord = { ...target };

    for (const key of Object.keys(source)) {
      const sourceValue = source[key];

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

  static load(options: ConfigOptions = {}): Config {
    const cwd = options.cwd || process.cwd();

    // 1. User config: ~/.lambdakit/config.yaml
    const userConfig = this.loadYaml(this.userConfigPath());

    // 2. Project config: <project>/lambdakit.yaml
    const projectConfig = this.loadYaml(path.join(cwd, PROJECT_CONFIG_FILENAME));

    // 3. Explicit --config file (if provided)
    let explicitConfig: ConfigRecord = {};
    if (options.configPath) {
      if (!fs.existsSync(options.configPath)) {
        throw new ConfigError(`Config file not found: ${options.configPath}`);
      }
      explicitConfig = this.loadYaml(options.configPath);
    }

    // 4. CLI flags (passed as partial config)
    const flagConfig: ConfigRecord = options.flags ?? {};

    // Merge in order of precedence: flags > explicit > project > user
    let mergedConfig = this.mergeConfigs({}, userConfig);
    mergedConfig = this.mergeConfigs(mergedConfig, projectConfig);
    mergedConfig = this.mergeConfigs(mergedConfig, explicitConfig);
    mergedConfig = this.mergeConfigs(mergedConfig, flagConfig);

    // Validate; schema defaults fill the rest
    const result = ConfigSchema.safeParse(mergedConfig);

    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `- ${i.path.join('.')}: ${i.message}`)
        .join('\n');
      throw new ConfigError(`Configuration validation failed:\n${issues}`);
    }

    return result.data;
  }
}
