import { readFileSync, existsSync } from 'fs';
import { parse } from 'yaml';
import { z } from 'zod';
import path from 'path';
import { config as loadDotenv } from 'dotenv';
import { isLogLevel, type LogLevel } from './logger.js';
import { DEFAULT_MAX_PER_REGION } from './scrapers/ebay.js';
import { DEFAULT_TIMEOUT_MS } from './scrapers/region-fetcher.js';
import { REGION_CODES } from './scrapers/regions.js';

// Load .env file
loadDotenv();

const SearchConfigSchema = z.object({
  regions: z.array(z.enum(REGION_CODES)).min(1).default(['us']),
  maxPerRegion: z.number().int().positive().default(DEFAULT_MAX_PER_REGION),
  timeoutMs: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  stripQueryString: z.boolean().default(true),
  insecureTls: z.boolean().default(false),
});

const ExportConfigSchema = z.object({
  filenamePrefix: z.string().min(1).default('price_comparison'),
  outputDir: z.string().min(1).default('.'),
});

const ConfigSchema = z.object({
  search: SearchConfigSchema.default({}),
  export: ExportConfigSchema.default({}),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type Config = z.infer<typeof ConfigSchema>;
export type SearchConfig = z.infer<typeof SearchConfigSchema>;
export type ExportConfig = z.infer<typeof ExportConfigSchema>;

export const DEFAULT_CONFIG_PATH = './config/config.local.yaml';

let cachedConfig: Config | null = null;

export function getEnv(key: string, required = true): string {
  const value = process.env[key];
  if (!value && required) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value || '';
}

/**
 * Validate a parsed YAML document. `null` (an empty or absent file) yields
 * the defaults.
 */
export function parseConfig(raw: unknown): Config {
  const result = ConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `  ${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid configuration:\n${details}`);
  }
  return result.data;
}

function logLevelOverride(): LogLevel | undefined {
  const value = getEnv('LOG_LEVEL', false).toLowerCase();
  if (!value) return undefined;
  if (!isLogLevel(value)) {
    throw new Error(`Invalid LOG_LEVEL: ${value} (expected debug, info, warn or error)`);
  }
  return value;
}

export function loadConfig(configPath?: string): Config {
  if (cachedConfig && !configPath) return cachedConfig;

  const resolved = path.resolve(configPath ?? (getEnv('PRICEFINDER_CONFIG', false) || DEFAULT_CONFIG_PATH));

  let raw: unknown = null;
  if (existsSync(resolved)) {
    raw = parse(readFileSync(resolved, 'utf-8'));
  } else if (configPath) {
    throw new Error(`Config file not found at ${resolved}`);
  }

  const config = parseConfig(raw);
  const logLevel = logLevelOverride();
  if (logLevel) config.logLevel = logLevel;

  if (!configPath) cachedConfig = config;
  return config;
}
