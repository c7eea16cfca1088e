import path from 'path';
import { z } from 'zod';
import { ErrorCode, RankerConfig, TargetRepository } from '../types';
import { CONFIG_FILENAME, MAX_THREADS, defaultConfig } from './default';
import { createRankError } from '../utils/errors';
import { FileUtils } from '../utils/fileUtils';
import { logger } from '../utils/logger';

const ConfigFileSchema = z
  .object({
    sourceUrl: z.string(),
    targetDb: z.nativeEnum(TargetRepository),
    mirrors: z.number().int(),
    threads: z.number().int(),
    maxCheck: z.number().int(),
    outputFile: z.string(),
    statsFile: z.string(),
    exclude: z.array(z.string()),
    excludeFrom: z.string(),
    retryAttempts: z.number().int(),
    retryDelayMs: z.number().int(),
    probeTimeoutMs: z.number().int(),
  })
  .partial()
  .strict();

export function parseTargetRepository(value: string): TargetRepository | undefined {
  const normalized = value.trim().toLowerCase();
  return Object.values(TargetRepository).find(target => target === normalized);
}

export function parseCount(value: string, name: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw createRankError(
      `Invalid value for ${name}: \`${value}\` is not a non-negative integer`,
      ErrorCode.CONFIG_ERROR,
      { [name]: value }
    );
  }
  return Number.parseInt(value, 10);
}

export class ConfigManager {
  private config: RankerConfig;
  private configPath: string;
  private explicitPath: boolean;

  constructor(configPath?: string) {
    this.config = { ...defaultConfig, exclude: [...defaultConfig.exclude] };
    this.explicitPath = configPath !== undefined;
    this.configPath = configPath ?? path.join(process.cwd(), CONFIG_FILENAME);
  }

  /**
   * Merge the JSON config file over the defaults. The default file is
   * optional; a file named explicitly must exist.
   */
  async loadConfig(): Promise<RankerConfig> {
    let raw: unknown;
    try {
      raw = await FileUtils.readJSON<unknown>(this.configPath);
    } catch (error) {
      throw createRankError(
        `Could not read configuration file \`${this.configPath}\``,
        ErrorCode.CONFIG_ERROR,
        { path: this.configPath },
        false,
        error
      );
    }

    if (raw === null) {
      if (this.explicitPath) {
        throw createRankError(
          `Configuration file \`${this.configPath}\` does not exist`,
          ErrorCode.CONFIG_ERROR,
          { path: this.configPath }
        );
      }
      logger.debug('No configuration file found, using default config');
      return this.config;
    }

    const parsed = ConfigFileSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw createRankError(
        `Invalid configuration file \`${this.configPath}\` (${issues})`,
        ErrorCode.CONFIG_ERROR,
        { path: this.configPath }
      );
    }

    this.updateConfig(parsed.data);
    logger.debug(`Loaded configuration from ${this.configPath}`);
    return this.config;
  }

  /**
   * Apply MIRROR_RANKER_* variables (already loaded from .env by the caller).
   */
  applyEnvironment(env: NodeJS.ProcessEnv = process.env): void {
    const updates: Partial<RankerConfig> = {};

    const sourceUrl = env['MIRROR_RANKER_SOURCE_URL'];
    if (sourceUrl) {
      updates.sourceUrl = sourceUrl;
    }

    const targetDb = env['MIRROR_RANKER_TARGET_DB'];
    if (targetDb) {
      const target = parseTargetRepository(targetDb);
      if (!target) {
        throw createRankError(
          `Invalid MIRROR_RANKER_TARGET_DB: ${targetDb}`,
          ErrorCode.CONFIG_ERROR,
          { targetDb }
        );
      }
      updates.targetDb = target;
    }

    const counts = [
      ['MIRROR_RANKER_MIRRORS', 'mirrors'],
      ['MIRROR_RANKER_THREADS', 'threads'],
      ['MIRROR_RANKER_MAX_CHECK', 'maxCheck'],
    ] as const;
    for (const [variable, key] of counts) {
      const value = env[variable];
      if (value) {
        updates[key] = parseCount(value, variable);
      }
    }

    const excludeFrom = env['MIRROR_RANKER_EXCLUDE_FROM'];
    if (excludeFrom) {
      updates.excludeFrom = excludeFrom;
    }

    this.updateConfig(updates);
  }

  getConfig(): RankerConfig {
    return this.config;
  }

  updateConfig(updates: Partial<RankerConfig>): void {
    const defined = { ...updates };
    for (const [key, value] of Object.entries(updates)) {
      if (value === undefined) {
        Reflect.deleteProperty(defined, key);
      }
    }
    this.config = { ...this.config, ...defined };
  }

  validateConfig(): { valid: boolean; errors: string[] } {
    const errors: string[] = [];
    const { sourceUrl, targetDb, mirrors, threads, maxCheck } = this.config;

    if (!sourceUrl.trim()) {
      errors.push('Source URL is required');
    } else if (/^[a-z][a-z0-9+.-]*:\/\//i.test(sourceUrl) && !/^(https?|file):\/\//i.test(sourceUrl)) {
      errors.push(`Unsupported source URL scheme: ${sourceUrl}`);
    }

    if (!Object.values(TargetRepository).includes(targetDb)) {
      errors.push(`Invalid target database: ${targetDb}`);
    }

    if (!Number.isInteger(mirrors) || mirrors < 1) {
      errors.push('Number of mirrors must be at least 1');
    }

    if (!Number.isInteger(threads) || threads < 1 || threads > MAX_THREADS) {
      errors.push(`Number of threads must be between 1 and ${MAX_THREADS}`);
    }

    if (!Number.isInteger(maxCheck) || maxCheck < 0) {
      errors.push('Max check must be 0 (unlimited) or positive');
    }

    if (this.config.retryAttempts < 1) {
      errors.push('Retry attempts must be at least 1');
    }

    if (this.config.probeTimeoutMs < 1) {
      errors.push('Probe timeout must be positive');
    }

    return {
      valid: errors.length === 0,
      errors,
    };
  }
}
