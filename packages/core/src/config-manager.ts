import { readFile } from 'node:fs/promises';
import { resolve, dirname } from 'node:path';
import { existsSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import {
  type InsightsConfig,
  type OpenAIProviderConfig,
  type DatabaseConfig,
  type MemoryConfig,
  type LoggingConfig,
  DEFAULT_CONFIG,
  insightsConfigSchema,
  ConfigError,
} from '@insights/shared';

export const CONFIG_FILE_NAMES = ['insights.config.yaml', 'insights.config.yml', 'insights.config.json'];

export interface ConfigOverrides {
  providers?: { openai?: Partial<OpenAIProviderConfig> };
  database?: Partial<DatabaseConfig>;
  memory?: Partial<MemoryConfig>;
  logging?: Partial<LoggingConfig>;
}

type PlainObject = Record<string, unknown>;

export class ConfigManager {
  private config: InsightsConfig = DEFAULT_CONFIG;
  private sourcePath: string | null = null;

  async load(options?: { configPath?: string; cwd?: string }): Promise<InsightsConfig> {
    // 1. Config file
    let merged: PlainObject = {};
    const filePath = this.findConfigFile(options?.configPath, options?.cwd);
    if (filePath) {
      merged = deepMerge(merged, await this.parseConfigFile(filePath));
    }
    this.sourcePath = filePath;

    // 2. Environment variables
    merged = deepMerge(merged, this.loadEnvVars());

    // 3. Validate; the schema fills in defaults
    const result = insightsConfigSchema.safeParse(merged);
    if (!result.success) {
      throw new ConfigError(
        `Invalid configuration: ${result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ')}`,
      );
    }

    this.config = result.data;
    return this.config;
  }

  get<K extends keyof InsightsConfig>(key: K): InsightsConfig[K] {
    return this.config[key];
  }

  getAll(): InsightsConfig {
    return this.config;
  }

  /** Path of the file the last `load` read, or null when only defaults and env applied. */
  getSourcePath(): string | null {
    return this.sourcePath;
  }

  set(overrides: ConfigOverrides): void {
    const current = this.config;
    this.config = {
      providers: { openai: { ...current.providers.openai, ...overrides.providers?.openai } },
      database: { ...current.database, ...overrides.database },
      memory: { ...current.memory, ...overrides.memory },
      logging: { ...current.logging, ...overrides.logging },
    };
  }

  private findConfigFile(configPath?: string, cwd?: string): string | null {
    if (configPath) {
      if (!existsSync(configPath)) {
        throw new ConfigError(`Config file not found: ${configPath}`);
      }
      return resolve(configPath);
    }

    // Search cwd and parent directories
    let dir = resolve(cwd ?? process.cwd());
    for (let depth = 0; depth < 10; depth++) {
      for (const name of CONFIG_FILE_NAMES) {
        const p = resolve(dir, name);
        if (existsSync(p)) return p;
      }
      const parent = dirname(dir);
      if (parent === dir) break; // reached filesystem root
      dir = parent;
    }
    return null;
  }

  private async parseConfigFile(p: string): Promise<PlainObject> {
    const content = await readFile(p, 'utf-8');
    let parsed: unknown;
    try {
      parsed = p.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
    } catch (err) {
      throw new ConfigError(`Could not parse ${p}: ${err instanceof Error ? err.message : String(err)}`);
    }
    // An empty YAML file parses to null
    if (parsed === null || parsed === undefined) return {};
    if (!isPlainObject(parsed)) {
      throw new ConfigError(`${p} must contain a mapping at the top level`);
    }
    return parsed;
  }

  private loadEnvVars(): PlainObject {
    const env = process.env;
    const openai: PlainObject = {};
    const database: PlainObject = {};
    const memory: PlainObject = {};
    const logging: PlainObject = {};

    if (env.OPENAI_API_KEY) openai.apiKey = env.OPENAI_API_KEY;
    if (env.OPENAI_MODEL) openai.model = env.OPENAI_MODEL;
    if (env.OPENAI_BASE_URL) openai.baseUrl = env.OPENAI_BASE_URL;
    if (env.DATABASE_URL) database.url = env.DATABASE_URL;
    if (env.LONG_TERM_DB_PATH) memory.longTermDbPath = env.LONG_TERM_DB_PATH;
    if (env.SHORT_TERM_CHECKPOINT_PATH) memory.checkpointPath = env.SHORT_TERM_CHECKPOINT_PATH;
    if (env.INSIGHTS_LOG_LEVEL) logging.level = env.INSIGHTS_LOG_LEVEL;

    const config: PlainObject = {};
    if (Object.keys(openai).length > 0) config.providers = { openai };
    if (Object.keys(database).length > 0) config.database = database;
    if (Object.keys(memory).length > 0) config.memory = memory;
    if (Object.keys(logging).length > 0) config.logging = logging;
    return config;
  }
}

/** The API key, or a ConfigError for commands that need the model. */
export function requireApiKey(config: InsightsConfig): string {
  const key = config.providers.openai.apiKey;
  if (!key) {
    throw new ConfigError('Missing OPENAI_API_KEY');
  }
  return key;
}

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result = { ...target };
  for (const key of Object.keys(source)) {
    const incoming = source[key];
    const existing = target[key];
    if (isPlainObject(incoming) && isPlainObject(existing)) {
      result[key] = deepMerge(existing, incoming);
    } else {
      result[key] = incoming;
    }
  }
  return result;
}
