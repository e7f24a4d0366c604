import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { parse as parseYaml } from 'yaml';
import { ChronicleConfigSchema, type ChronicleConfig } from './types.js';
import { ConfigError } from './errors.js';
import { createLogger, setLogger } from './logger.js';

export type ConfigOverrides = {
  recorder?: Partial<ChronicleConfig['recorder']>;
  logging?: Partial<ChronicleConfig['logging']>;
};

export class ConfigManager {
  private config: ChronicleConfig | null = null;
  private globalDir: string;
  private projectDir: string;

  constructor(projectDir?: string, globalDir?: string) {
    this.globalDir = globalDir || join(homedir(), '.chronicle');
    this.projectDir = projectDir || process.cwd();
  }

  /**
   * Load configuration from all sources, merged in order:
   * defaults <- global config <- project config <- env vars <- overrides
   */
  load(overrides?: ConfigOverrides, env: NodeJS.ProcessEnv = process.env): ChronicleConfig {
    let raw: Record<string, unknown> = {};

    raw = this.deepMerge(raw, this.readYaml(join(this.globalDir, 'config.yaml'), 'global'));
    raw = this.deepMerge(raw, this.readYaml(join(this.projectDir, '.chronicle.yaml'), 'project'));
    raw = this.applyEnvVars(raw, env);

    if (overrides) {
      raw = this.deepMerge(raw, { ...overrides });
    }

    const parsed = ChronicleConfigSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigError(`Invalid configuration: ${parsed.error.message}`, parsed.error);
    }

    this.config = parsed.data;
    return this.config;
  }

  get(): ChronicleConfig {
    if (!this.config) {
      return this.load();
    }
    return this.config;
  }

  getGlobalDir(): string {
    return this.globalDir;
  }

  getProjectDir(): string {
    return this.projectDir;
  }

  private readYaml(path: string, scope: string): Record<string, unknown> {
    if (!existsSync(path)) return {};
    try {
      const parsed: unknown = parseYaml(readFileSync(path, 'utf-8'));
      return isRecord(parsed) ? parsed : {};
    } catch (err) {
      throw new ConfigError(
        `Failed to parse ${scope} config at ${path}`,
        err instanceof Error ? err : undefined,
      );
    }
  }

  private applyEnvVars(raw: Record<string, unknown>, env: NodeJS.ProcessEnv): Record<string, unknown> {
    const recorder = isRecord(raw.recorder) ? { ...raw.recorder } : {};
    const logging = isRecord(raw.logging) ? { ...raw.logging } : {};

    if (env.CHRONICLE_STRICTNESS) {
      recorder.strictness = Number(env.CHRONICLE_STRICTNESS);
    }
    if (env.CHRONICLE_DIFF) {
      recorder.diff = env.CHRONICLE_DIFF;
    }
    if (env.CHRONICLE_REPR_LIMIT) {
      recorder.reprLimit = Number(env.CHRONICLE_REPR_LIMIT);
    }
    if (env.CHRONICLE_LOG_LEVEL) {
      logging.level = env.CHRONICLE_LOG_LEVEL;
    }

    return { ...raw, recorder, logging };
  }

  private deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
    const result = { ...target };
    for (const key of Object.keys(source)) {
      const next = source[key];
      const prev = target[key];
      if (isRecord(next) && isRecord(prev)) {
        result[key] = this.deepMerge(prev, next);
      } else if (next !== undefined) {
        result[key] = next;
      }
    }
    return result;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

let _config: ChronicleConfig | null = null;

/**
 * Process-wide configuration read by recorder construction. Falls back to
 * schema defaults; nothing is read from disk unless `setConfig` is given
 * the result of `ConfigManager.load()`.
 */
export function getConfig(): ChronicleConfig {
  if (!_config) {
    _config = ChronicleConfigSchema.parse({});
  }
  return _config;
}

export function setConfig(config: ChronicleConfig): void {
  _config = config;
}

export function resetConfig(): void {
  _config = null;
}

/**
 * Install a loaded configuration and rebuild the default logger from its
 * logging section.
 */
export function configure(config: ChronicleConfig): void {
  setConfig(config);
  setLogger(createLogger('chronicle', config.logging));
}
