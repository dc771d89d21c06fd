/**
 * Configuration Manager
 *
 * Locates and reads the task-configuration document (YAML or JSON), applies
 * environment overrides and keeps the last successfully loaded result.
 */

import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import { MonitorConfig } from '../types';
import { ConfigError, ConfigErrorKind } from '../utils/errors';
import { MonitorLogger, createConfigLogger } from '../utils/logger';
import { parseConfigDocument } from './config-parser';

export const CONFIG_FILE_CANDIDATES = ['monitor.config.yaml', 'monitor.config.yml', 'monitor.config.json'];

export interface ConfigManagerOptions {
  /** Explicit document path; wins over MONITOR_CONFIG and the default names */
  configPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  logger?: MonitorLogger;
}

export class ConfigManager {
  private readonly options: Required<Omit<ConfigManagerOptions, 'configPath' | 'logger'>> & { configPath?: string };
  private readonly logger: MonitorLogger;
  private config: MonitorConfig | null = null;
  private warnings: ConfigError[] = [];
  private loadedFrom: string | null = null;

  constructor(options: ConfigManagerOptions = {}) {
    this.options = {
      configPath: options.configPath,
      cwd: options.cwd || process.cwd(),
      env: options.env || process.env
    };
    this.logger = options.logger || createConfigLogger();
  }

  /**
   * Resolve the document path: explicit option, MONITOR_CONFIG, then default names
   */
  resolvePath(): string {
    const explicit = this.options.configPath || this.options.env.MONITOR_CONFIG;
    if (explicit) {
      return path.resolve(this.options.cwd, explicit);
    }

    for (const name of CONFIG_FILE_CANDIDATES) {
      const candidate = path.join(this.options.cwd, name);
      if (fs.existsSync(candidate)) {
        return candidate;
      }
    }

    throw new ConfigError(
      `No configuration document found (looked for ${CONFIG_FILE_CANDIDATES.join(', ')} in ${this.options.cwd})`,
      ConfigErrorKind.MISSING_FIELD
    );
  }

  /**
   * Read, parse and validate the document; throws ConfigError when it is unusable
   */
  load(): MonitorConfig {
    const configPath = this.resolvePath();
    const raw = this.readDocument(configPath);
    const { config, warnings } = parseConfigDocument(raw);

    this.applyEnvironmentOverrides(config);

    for (const warning of warnings) {
      this.logger.warn(`Skipping task: ${warning.message}`, { field: warning.field, kind: warning.kind });
    }

    const enabled = config.tasks.filter(t => t.enabled).length;
    this.logger.info(`Loaded ${config.tasks.length} task(s), ${enabled} enabled, from ${configPath}`);

    this.config = config;
    this.warnings = warnings;
    this.loadedFrom = configPath;
    return config;
  }

  reload(): MonitorConfig {
    return this.load();
  }

  getConfig(): MonitorConfig {
    if (!this.config) {
      throw new Error('Configuration has not been loaded');
    }
    return this.config;
  }

  getWarnings(): ConfigError[] {
    return [...this.warnings];
  }

  getLoadedPath(): string | null {
    return this.loadedFrom;
  }

  private readDocument(configPath: string): unknown {
    let content: string;
    try {
      content = fs.readFileSync(configPath, 'utf-8');
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`Cannot read configuration file ${configPath}: ${reason}`, ConfigErrorKind.INVALID);
    }

    try {
      return configPath.endsWith('.json') ? JSON.parse(content) : yaml.load(content);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`Cannot parse configuration file ${configPath}: ${reason}`, ConfigErrorKind.INVALID);
    }
  }

  private applyEnvironmentOverrides(config: MonitorConfig): void {
    const level = this.options.env.LOG_LEVEL?.toLowerCase();
    if (level === 'debug' || level === 'info' || level === 'warn' || level === 'error') {
      config.globalSettings.logLevel = level;
    }
  }
}
