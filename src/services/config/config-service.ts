/**
 * Configuration Service
 *
 * Loads scanner settings from <baseDir>/scanner.config.yaml, validated
 * against ScannerConfigSchema, with environment overrides applied on top.
 * A missing file yields the defaults.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as yaml from 'yaml';
import { ConfigError, errnoCode } from '../../core/errors.js';
import { safeValidateScannerConfig, LogLevelNameSchema, type ScannerConfig } from '../../core/schemas.js';

export const CONFIG_FILE_NAME = 'scanner.config.yaml';

/**
 * Environment variables read by the service
 */
export const ENV_ROOTS = 'SCANNER_ROOTS';
export const ENV_LOG_LEVEL = 'SCANNER_LOG_LEVEL';

export interface ConfigServiceOptions {
  baseDir?: string;
  env?: NodeJS.ProcessEnv;
}

export class ConfigService {
  private baseDir: string;
  private configPath: string;
  private env: NodeJS.ProcessEnv;
  private cachedConfig: ScannerConfig | null = null;

  constructor(options: ConfigServiceOptions = {}) {
    this.baseDir = options.baseDir || '.scanner';
    this.configPath = path.join(this.baseDir, CONFIG_FILE_NAME);
    this.env = options.env ?? process.env;
  }

  get path(): string {
    return this.configPath;
  }

  /**
   * Load configuration from file, with caching
   */
  async load(): Promise<ScannerConfig> {
    if (this.cachedConfig !== null) {
      return this.cachedConfig;
    }

    const fromFile = await this.readFile();
    const result = safeValidateScannerConfig(fromFile ?? {});
    if (!result.success) {
      const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
      throw new ConfigError(`Invalid configuration in ${this.configPath}`, { issues });
    }

    const config = this.applyEnv(result.data);
    this.cachedConfig = config;
    return config;
  }

  private async readFile(): Promise<unknown> {
    let content: string;
    try {
      content = await fs.readFile(this.configPath, 'utf-8');
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        return null;
      }
      throw new ConfigError(`Unable to read ${this.configPath}`, { path: this.configPath }, { cause: error });
    }

    try {
      return yaml.parse(content);
    } catch (error) {
      throw new ConfigError(`Unable to parse ${this.configPath}`, { path: this.configPath }, { cause: error });
    }
  }

  private applyEnv(config: ScannerConfig): ScannerConfig {
    const result: ScannerConfig = { ...config, provider: { ...config.provider } };

    const roots = this.env[ENV_ROOTS];
    if (roots !== undefined && roots.trim() !== '') {
      result.roots = roots.split(path.delimiter).map(root => root.trim()).filter(root => root.length > 0);
    }

    const level = this.env[ENV_LOG_LEVEL];
    if (level !== undefined && level.trim() !== '') {
      const parsed = LogLevelNameSchema.safeParse(level.trim().toLowerCase());
      if (!parsed.success) {
        throw new ConfigError(`Invalid ${ENV_LOG_LEVEL}: ${level}`, { value: level });
      }
      result.logLevel = parsed.data;
    }

    return result;
  }

  /**
   * Clear the cached configuration (useful for testing or after config changes)
   */
  clearCache(): void {
    this.cachedConfig = null;
  }

  /**
   * Default search path roots, resolved against the working directory
   */
  async getRoots(): Promise<string[]> {
    const config = await this.load();
    return config.roots;
  }

  async getNamespaces(): Promise<string[]> {
    const config = await this.load();
    return config.namespaces;
  }

  async isProviderReplacementAllowed(): Promise<boolean> {
    const config = await this.load();
    return config.provider.allowReplacement;
  }

  /**
   * Save configuration to file
   */
  async saveConfig(config: ScannerConfig): Promise<void> {
    await fs.mkdir(this.baseDir, { recursive: true });
    await fs.writeFile(this.configPath, yaml.stringify(config), 'utf-8');
    this.cachedConfig = null;
  }
}
