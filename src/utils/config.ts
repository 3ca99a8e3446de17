import { readFileSync } from 'fs';
import { isAbsolute, join } from 'path';
import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { CategoryRule } from '../types/Article';
import { Config } from '../types/Config';
import { ConfigError } from '../errors';
import { isLogLevel, logger } from './logger';

type Environment = Record<string, string | undefined>;

const SourceSchema = z.object({
  enabled: z.boolean(),
  requestDelayMs: z.number().nonnegative(),
  timeoutMs: z.number().int().positive(),
});

const CategoryRuleSchema = z.object({
  label: z.string().trim().min(1),
  keywords: z.array(z.string().trim().min(1)).min(1),
});

const ConfigFileSchema = z.object({
  sources: z.object({
    hackernews: SourceSchema,
    devto: SourceSchema.extend({
      tag: z.string().trim().min(1),
    }),
  }),
  ingestion: z.object({
    maxItemsPerSource: z.number().int().positive(),
  }),
  categories: z.array(CategoryRuleSchema),
  database: z.object({
    path: z.string().min(1),
  }),
  trends: z
    .object({
      defaultWindowDays: z.number().int().positive(),
      defaultTopN: z.number().int().positive(),
    })
    .default({ defaultWindowDays: 7, defaultTopN: 20 }),
});

type ConfigFile = z.infer<typeof ConfigFileSchema>;

export class ConfigLoader {
  public static readonly DEFAULT_CONFIG_PATH = join(
    process.cwd(),
    'config',
    'techtrends.json'
  );

  /** Populates process.env from a `.env` file in the working directory, if present. */
  public static loadEnvironmentFile(): void {
    const result = loadDotenv();
    if (result.error) {
      logger.debug('.env not loaded', { reason: result.error.message });
    }
  }

  public static loadConfig(env: Environment = process.env): Config {
    const path = env.TECHTRENDS_CONFIG
      ? ConfigLoader.resolvePath(env.TECHTRENDS_CONFIG)
      : ConfigLoader.DEFAULT_CONFIG_PATH;

    logger.info('Loading configuration', { path });

    const configFile = ConfigLoader.parseConfigFile(
      ConfigLoader.readConfigFile(path),
      path
    );
    const config = ConfigLoader.mergeWithEnvironmentVariables(configFile, env);
    ConfigLoader.validateConfig(config);

    const envLevel = (env.LOG_LEVEL ?? '').toUpperCase();
    if (isLogLevel(envLevel)) {
      logger.setLevel(envLevel);
    }

    logger.info('Configuration loaded', {
      enabledSources: ConfigLoader.getEnabledSources(config),
      categories: config.categories.length,
      database: config.database.path,
    });

    return config;
  }

  private static resolvePath(path: string): string {
    return isAbsolute(path) ? path : join(process.cwd(), path);
  }

  private static readConfigFile(path: string): string {
    try {
      return readFileSync(path, 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        throw new ConfigError(`Config file not found: ${path}`);
      }
      throw new ConfigError(`Config file could not be read: ${String(error)}`);
    }
  }

  public static parseConfigFile(content: string, origin = 'config'): ConfigFile {
    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch (error) {
      throw new ConfigError(`${origin} is not valid JSON: ${String(error)}`);
    }

    const parsed = ConfigFileSchema.safeParse(json);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map(issue => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new ConfigError(`${origin} is invalid: ${issues}`);
    }
    return parsed.data;
  }

  private static mergeWithEnvironmentVariables(
    configFile: ConfigFile,
    env: Environment
  ): Config {
    const maxItems = ConfigLoader.optionalInteger(env, 'MAX_ARTICLES_PER_SOURCE', 1);
    const delayMs = ConfigLoader.optionalInteger(env, 'SCRAPING_DELAY_MS', 0);

    return {
      sources: {
        hackernews: {
          ...configFile.sources.hackernews,
          ...(delayMs !== undefined ? { requestDelayMs: delayMs } : {}),
        },
        devto: {
          ...configFile.sources.devto,
          ...(delayMs !== undefined ? { requestDelayMs: delayMs } : {}),
          ...(env.DEVTO_API_KEY ? { apiKey: env.DEVTO_API_KEY } : {}),
        },
      },
      ingestion: {
        maxItemsPerSource: maxItems ?? configFile.ingestion.maxItemsPerSource,
      },
      categories: ConfigLoader.normalizeRules(configFile.categories),
      database: {
        path: env.DATABASE_PATH
          ? ConfigLoader.resolveDatabasePath(env.DATABASE_PATH)
          : ConfigLoader.resolveDatabasePath(configFile.database.path),
      },
      trends: configFile.trends,
    };
  }

  private static resolveDatabasePath(path: string): string {
    return path === ':memory:' ? path : ConfigLoader.resolvePath(path);
  }

  private static optionalInteger(
    env: Environment,
    name: string,
    min: number
  ): number | undefined {
    const raw = env[name]?.trim();
    if (!raw) return undefined;
    const value = Number(raw);
    if (!Number.isInteger(value) || value < min) {
      throw new ConfigError(`${name} must be an integer >= ${min}, got "${raw}"`);
    }
    return value;
  }

  /** Lowercases and de-duplicates keywords, keeping rule and keyword order. */
  public static normalizeRules(rules: readonly CategoryRule[]): CategoryRule[] {
    return rules.map(rule => ({
      label: rule.label.trim(),
      keywords: [...new Set(rule.keywords.map(keyword => keyword.trim().toLowerCase()))],
    }));
  }

  private static validateConfig(config: Config): void {
    const seen = new Set<string>();
    for (const rule of config.categories) {
      if (seen.has(rule.label)) {
        throw new ConfigError(`Duplicate category label: ${rule.label}`);
      }
      seen.add(rule.label);
    }

    if (ConfigLoader.getEnabledSources(config).length === 0) {
      throw new ConfigError('At least one source must be enabled');
    }

    logger.debug('Configuration validated');
  }

  public static getEnabledSources(config: Config): string[] {
    const sources: string[] = [];
    if (config.sources.hackernews.enabled) sources.push('hackernews');
    if (config.sources.devto.enabled) sources.push('devto');
    return sources;
  }

  public static getEnvironmentVariables(
    env: Environment = process.env
  ): Record<string, string | undefined> {
    return {
      DATABASE_PATH: env.DATABASE_PATH,
      DEVTO_API_KEY: env.DEVTO_API_KEY ? '[SET]' : undefined,
      MAX_ARTICLES_PER_SOURCE: env.MAX_ARTICLES_PER_SOURCE,
      SCRAPING_DELAY_MS: env.SCRAPING_DELAY_MS,
      LOG_LEVEL: env.LOG_LEVEL,
      NODE_ENV: env.NODE_ENV,
    };
  }
}
