/**
 * faultpage configuration
 *
 * Reads an optional JSON file (default ./faultpage.json), then applies
 * environment variable overrides. The result is frozen: the detail
 * disclosure flag in particular never changes after startup.
 */

import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { ConfigurationError } from '../errors/faultpage-error.js';
import { TEMPLATE_FILES } from '../render/error-template.js';

export interface FaultpageConfig {
  /** Expose raw failure messages and stack frames to clients. Default: false */
  displayExceptionDetails: boolean;
  /** Directory holding error.html, css/main.css and images/logo.svg */
  assetsDir: string;
  /** pino level. Default: info */
  logLevel: string;
  server: {
    /** Default: 8000 */
    port: number;
  };
}

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

/** Bundled assets, two levels up from both src/config and dist/config. */
export const DEFAULT_ASSETS_DIR = fileURLToPath(new URL('../../assets', import.meta.url));

export class ConfigManager {
  private readonly configPath: string;

  constructor(
    configPath?: string,
    private readonly env: NodeJS.ProcessEnv = process.env
  ) {
    this.configPath = configPath ?? path.join(process.cwd(), 'faultpage.json');
  }

  /**
   * Load config from disk. Returns defaults if file doesn't exist.
   */
  load(): FaultpageConfig {
    if (!fs.existsSync(this.configPath)) {
      return ConfigManager.defaults();
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(this.configPath, 'utf-8'));
    } catch (err) {
      throw new ConfigurationError(
        `Failed to read config at ${this.configPath}: ${err instanceof Error ? err.message : String(err)}`,
        { configPath: this.configPath }
      );
    }
    return this.merge(ConfigManager.defaults(), parsed);
  }

  /**
   * Load config, then apply environment variable overrides.
   *
   * Supported env vars:
   *   FAULTPAGE_DISPLAY_EXCEPTION_DETAILS, FAULTPAGE_ASSETS_DIR,
   *   FAULTPAGE_LOG_LEVEL, FAULTPAGE_PORT
   */
  loadWithEnvOverrides(): Readonly<FaultpageConfig> {
    const config = this.load();
    const env = this.env;

    if (env.FAULTPAGE_DISPLAY_EXCEPTION_DETAILS !== undefined) {
      config.displayExceptionDetails = parseFlag(env.FAULTPAGE_DISPLAY_EXCEPTION_DETAILS);
    }
    if (env.FAULTPAGE_ASSETS_DIR) config.assetsDir = path.resolve(env.FAULTPAGE_ASSETS_DIR);
    if (env.FAULTPAGE_LOG_LEVEL) config.logLevel = env.FAULTPAGE_LOG_LEVEL;
    if (env.FAULTPAGE_PORT) config.server.port = parseInt(env.FAULTPAGE_PORT, 10);

    return Object.freeze({ ...config, server: Object.freeze({ ...config.server }) });
  }

  /**
   * Validate a config object. Returns errors array — empty means valid.
   */
  validate(config: FaultpageConfig): { valid: boolean; errors: string[] } {
    const errors: string[] = [];

    if (!isLogLevel(config.logLevel)) {
      errors.push(`logLevel must be one of ${LOG_LEVELS.join(' | ')}, got: ${config.logLevel}`);
    }

    const port = config.server.port;
    if (!Number.isInteger(port) || port < 1 || port > 65535) {
      errors.push(`server.port must be an integer between 1 and 65535, got: ${port}`);
    }

    for (const file of Object.values(TEMPLATE_FILES)) {
      const fullPath = path.join(config.assetsDir, file);
      if (!fs.existsSync(fullPath)) {
        errors.push(`assetsDir is missing ${file} (looked for ${fullPath})`);
      }
    }

    return { valid: errors.length === 0, errors };
  }

  /**
   * Return a default configuration: details hidden, bundled assets.
   */
  static defaults(): FaultpageConfig {
    return {
      displayExceptionDetails: false,
      assetsDir: DEFAULT_ASSETS_DIR,
      logLevel: 'info',
      server: { port: 8000 },
    };
  }

  /** Copy over the recognised fields of a parsed file, ignoring anything mistyped. */
  private merge(target: FaultpageConfig, source: unknown): FaultpageConfig {
    if (!isRecord(source)) {
      throw new ConfigurationError(`Config at ${this.configPath} must be a JSON object`);
    }
    const result = { ...target, server: { ...target.server } };
    if (typeof source.displayExceptionDetails === 'boolean') {
      result.displayExceptionDetails = source.displayExceptionDetails;
    }
    if (typeof source.assetsDir === 'string') {
      result.assetsDir = path.resolve(path.dirname(this.configPath), source.assetsDir);
    }
    if (typeof source.logLevel === 'string') result.logLevel = source.logLevel;
    if (isRecord(source.server) && typeof source.server.port === 'number') {
      result.server.port = source.server.port;
    }
    return result;
  }
}

export function isLogLevel(level: string): level is (typeof LOG_LEVELS)[number] {
  return LOG_LEVELS.some((known) => known === level);
}

function parseFlag(value: string): boolean {
  return ['true', '1', 'yes'].includes(value.trim().toLowerCase());
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
