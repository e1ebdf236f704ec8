/**
 * Configuration loading for the sales metrics pipeline
 *
 * Precedence (lowest first): built-in defaults, JSON config file, environment.
 * The merged object is validated with zod before anything uses it.
 */

import { readFileSync, existsSync } from 'fs';
import { homedir } from 'os';
import { resolve } from 'path';
import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import { ConfigError, errorMessage } from './errors';
import { DEFAULT_COLUMN_SCHEMA } from '../dataset/types';

// CWD .env, never overrides variables already set
dotenvConfig();

const columnsSchema = z.object({
  date: z.string().min(1),
  productId: z.string().min(1),
  unitsSold: z.string().min(1),
  avgPrice: z.string().min(1),
});

const configSchema = z.object({
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  dataFile: z.string().min(1).default('data/raw/sales_data.csv'),
  outputDir: z.string().min(1).default('output'),
  columns: columnsSchema.default({ ...DEFAULT_COLUMN_SCHEMA }),
  topN: z.coerce.number().int().positive().default(5),
});

export type AppConfig = z.infer<typeof configSchema>;

type Env = Record<string, string | undefined>;

function resolveUserPath(input: string): string {
  const trimmed = input.trim();
  if (!trimmed) return trimmed;
  if (trimmed.startsWith('~')) {
    return resolve(trimmed.replace(/^~(?=$|[\\/])/, homedir()));
  }
  return resolve(trimmed);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects. Protects against prototype pollution.
 */
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const DANGEROUS_KEYS = new Set(['__proto__', 'constructor', 'prototype']);
  const result: Record<string, unknown> = { ...target };
  for (const key of Object.keys(source)) {
    if (DANGEROUS_KEYS.has(key)) continue;
    const sourceValue = source[key];
    const targetValue = target[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }
  return result;
}

function readConfigFile(path: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Failed to parse config file ${path}: ${errorMessage(err)}`, [], err);
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigError(`Config file ${path} must contain a JSON object`);
  }
  return parsed;
}

/** Only the variables that are actually set; unset ones must not mask file values. */
function envOverrides(env: Env): Record<string, unknown> {
  const columns: Record<string, unknown> = {};
  if (env.SALES_DATE_COLUMN) columns.date = env.SALES_DATE_COLUMN;
  if (env.SALES_PRODUCT_COLUMN) columns.productId = env.SALES_PRODUCT_COLUMN;
  if (env.SALES_UNITS_COLUMN) columns.unitsSold = env.SALES_UNITS_COLUMN;
  if (env.SALES_PRICE_COLUMN) columns.avgPrice = env.SALES_PRICE_COLUMN;

  const overrides: Record<string, unknown> = {};
  if (env.LOG_LEVEL) overrides.logLevel = env.LOG_LEVEL.toLowerCase();
  if (env.SALES_DATA_FILE) overrides.dataFile = env.SALES_DATA_FILE;
  if (env.SALES_OUTPUT_DIR) overrides.outputDir = env.SALES_OUTPUT_DIR;
  if (env.SALES_TOP_N) overrides.topN = env.SALES_TOP_N;
  if (Object.keys(columns).length > 0) overrides.columns = columns;
  return overrides;
}

export interface LoadConfigOptions {
  /** Explicit JSON config file; falls back to SALES_METRICS_CONFIG */
  configPath?: string;
  env?: Env;
}

/**
 * Load configuration from file and environment
 */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const env = options.env ?? process.env;
  const configPath = options.configPath ?? env.SALES_METRICS_CONFIG;

  let merged: Record<string, unknown> = { columns: { ...DEFAULT_COLUMN_SCHEMA } };
  if (configPath) {
    const fullPath = resolveUserPath(configPath);
    if (!existsSync(fullPath)) {
      throw new ConfigError(`Config file not found: ${fullPath}`);
    }
    merged = deepMerge(merged, readConfigFile(fullPath));
  }
  merged = deepMerge(merged, envOverrides(env));

  const parsed = configSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigError('Invalid configuration', issues);
  }
  return parsed.data;
}

/** Plain, log-safe view of the configuration. */
export function describeConfig(config: AppConfig): Record<string, unknown> {
  return {
    dataFile: config.dataFile,
    outputDir: config.outputDir,
    columns: { ...config.columns },
    topN: config.topN,
    logLevel: config.logLevel,
  };
}
