import { z } from 'zod';
import { cosmiconfig } from 'cosmiconfig';
import fs from 'node:fs';
import path from 'node:path';
import { stringify as yamlStringify } from 'yaml';
import { resolvePath, getRecallDeckDir } from './utils.js';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';

export const ConfigSchema = z.object({
  server: z
    .object({
      port: z.number().default(3892),
      host: z.string().default('127.0.0.1'),
    })
    .default({}),

  db: z
    .object({
      path: z.string().default('~/.recalldeck/recalldeck.db'),
    })
    .default({}),

  // SM-2 family constants used by the review scheduler
  review: z
    .object({
      initial_ease: z.number().default(2.5),
      min_ease: z.number().min(1).default(1.3),
      max_ease: z.number().default(3.0),
      again_penalty: z.number().nonnegative().default(0.2),
      hard_penalty: z.number().nonnegative().default(0.15),
      hard_multiplier: z.number().min(1).default(1.2),
      easy_bonus: z.number().min(1).default(1.3),
      easy_ease_bonus: z.number().nonnegative().default(0.15),
      max_interval_days: z.number().int().min(1).default(365),
    })
    .default({}),

  drafting: z
    .object({
      base_url: z.string().default('http://localhost:11434/v1'),
      api_key: z.string().default(''),
      model: z.string().default('llama3.2'),
      max_tokens: z.number().default(1024),
      temperature: z.number().default(0.3),
      timeout_ms: z.number().default(60000),
      max_concurrent: z.number().int().min(1).default(2),
      max_cards: z.number().int().min(1).default(5),
    })
    .default({}),

  sources: z
    .object({
      strict_dedup: z.boolean().default(false),
    })
    .default({}),

  export: z
    .object({
      vault_path: z.string().default(''),
      folder: z.string().default('learnings'),
    })
    .default({}),

  // Raindrop.io highlight import; highlights in flashcard_color are flagged for drafting
  raindrop: z
    .object({
      token: z.string().default(''),
      base_url: z.string().default('https://api.raindrop.io/rest/v1'),
      flashcard_color: z.string().default('orange'),
      per_page: z.number().int().min(1).max(50).default(50),
      timeout_ms: z.number().default(30000),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

let cachedConfig: Config | null = null;

export function generateDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

export function generateDefaultConfigYaml(): string {
  return yamlStringify(generateDefaultConfig());
}

export function writeDefaultConfig(configPath: string): void {
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, generateDefaultConfigYaml(), 'utf-8');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function overrideSection(
  rawConfig: Record<string, unknown>,
  section: string,
  values: Record<string, string | undefined>,
): Record<string, unknown> {
  const set = Object.entries(values).filter((entry): entry is [string, string] => Boolean(entry[1]));
  if (set.length === 0) return rawConfig;

  const current = rawConfig[section];
  const merged: Record<string, unknown> = isRecord(current) ? { ...current } : {};
  for (const [key, value] of set) merged[key] = value;
  return { ...rawConfig, [section]: merged };
}

/**
 * Apply RECALLDECK_LLM_* and RECALLDECK_RAINDROP_TOKEN environment overrides
 * onto a raw config object.
 */
export function applyEnvOverrides(
  rawConfig: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env,
): Record<string, unknown> {
  const withDrafting = overrideSection(rawConfig, 'drafting', {
    api_key: env['RECALLDECK_LLM_API_KEY'],
    base_url: env['RECALLDECK_LLM_BASE_URL'],
    model: env['RECALLDECK_LLM_MODEL'],
  });
  return overrideSection(withDrafting, 'raindrop', { token: env['RECALLDECK_RAINDROP_TOKEN'] });
}

export async function loadConfig(force = false): Promise<Config> {
  if (cachedConfig && !force) return cachedConfig;

  const explorer = cosmiconfig('recalldeck', {
    searchPlaces: [
      'recalldeck.config.yaml',
      'recalldeck.config.yml',
      '.recalldeckrc.yaml',
      '.recalldeckrc.yml',
    ],
  });

  const envConfigPath = process.env['RECALLDECK_CONFIG'];
  const defaultConfigPath = path.join(getRecallDeckDir(), 'config.yaml');

  let rawConfig: Record<string, unknown> = {};

  if (envConfigPath) {
    const resolved = resolvePath(envConfigPath);
    if (!fs.existsSync(resolved)) {
      throw new ConfigError(`Config file not found: ${resolved}`);
    }
    const loaded: unknown = (await explorer.load(resolved))?.config;
    if (isRecord(loaded)) rawConfig = loaded;
  } else if (fs.existsSync(defaultConfigPath)) {
    const loaded: unknown = (await explorer.load(defaultConfigPath))?.config;
    if (isRecord(loaded)) rawConfig = loaded;
  } else {
    const found: unknown = (await explorer.search())?.config;
    if (isRecord(found)) {
      rawConfig = found;
    } else {
      logger.debug('No config file found, using defaults');
    }
  }

  const parsed = ConfigSchema.safeParse(applyEnvOverrides(rawConfig));
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', {
      errors: parsed.error.flatten().fieldErrors,
    });
  }

  cachedConfig = parsed.data;
  return cachedConfig;
}
