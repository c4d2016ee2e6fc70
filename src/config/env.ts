import * as dotenv from 'dotenv';
import * as path from 'path';
import * as fs from 'fs';

// Load .env file if it exists
const envPath = path.resolve(process.cwd(), '.env');
if (fs.existsSync(envPath)) {
  dotenv.config({ path: envPath });
}

export const DEFAULT_GEMINI_MODEL = 'gemini-2.5-flash';

export type StorageMode = 'stateless' | 'persisted';

/**
 * Environment configuration with validation
 */
export interface EnvConfig {
  // Server
  port: number;
  nodeEnv: string;

  // Text generation
  geminiApiKey: string;
  geminiModel: string;

  // Storage
  storageMode: StorageMode;
  databaseUrl?: string;
  historyMaxLimit: number;
}

/**
 * Parse integer from environment variable
 */
function parseInteger(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) return defaultValue;
  return parsed;
}

/**
 * Rewrites the legacy `postgres://` scheme some hosting providers hand out to
 * `postgresql://`. Only the leading scheme token changes.
 */
export function normalizeDatabaseUrl(url: string): string {
  if (url.startsWith('postgres://')) {
    return url.replace('postgres://', 'postgresql://');
  }
  return url;
}

/**
 * Replaces the user-info part of a connection string so it can be logged.
 */
export function maskDatabaseUrl(url: string): string {
  return url.replace(/\/\/[^@/]+@/, '//<credentials>@');
}

function resolveStorageMode(errors: string[]): StorageMode {
  const mode = process.env.STORAGE_MODE;
  if (!mode) {
    return process.env.DATABASE_URL ? 'persisted' : 'stateless';
  }
  if (mode !== 'stateless' && mode !== 'persisted') {
    errors.push(`STORAGE_MODE must be 'stateless' or 'persisted' (got '${mode}')`);
    return 'stateless';
  }
  return mode;
}

/**
 * Load and validate environment configuration. Throws when a required value is missing.
 */
export function loadEnvConfig(): EnvConfig {
  const errors: string[] = [];

  const geminiApiKey = process.env.GEMINI_API_KEY;
  if (!geminiApiKey) {
    errors.push('GEMINI_API_KEY is not set');
  }

  const storageMode = resolveStorageMode(errors);
  const databaseUrl = process.env.DATABASE_URL
    ? normalizeDatabaseUrl(process.env.DATABASE_URL)
    : undefined;
  if (storageMode === 'persisted' && !databaseUrl) {
    errors.push('DATABASE_URL is required when STORAGE_MODE is persisted');
  }

  const historyMaxLimit = parseInteger(process.env.HISTORY_MAX_LIMIT, 100);
  if (historyMaxLimit < 1) {
    errors.push('HISTORY_MAX_LIMIT must be a positive integer');
  }

  if (errors.length > 0 || !geminiApiKey) {
    throw new Error(`Environment validation failed:\n${errors.join('\n')}`);
  }

  return {
    port: parseInteger(process.env.PORT, 8000),
    nodeEnv: process.env.NODE_ENV || 'development',
    geminiApiKey,
    geminiModel: process.env.GEMINI_MODEL || DEFAULT_GEMINI_MODEL,
    storageMode,
    databaseUrl: storageMode === 'persisted' ? databaseUrl : undefined,
    historyMaxLimit,
  };
}

/**
 * Get environment configuration (singleton)
 */
let cachedConfig: EnvConfig | null = null;

export function getEnvConfig(): EnvConfig {
  if (!cachedConfig) {
    cachedConfig = loadEnvConfig();
  }
  return cachedConfig;
}

/**
 * Print configuration summary (without sensitive data)
 */
export function printConfigSummary(config: EnvConfig): void {
  console.log('Configuration Summary:');
  console.log(`  Environment: ${config.nodeEnv}`);
  console.log(`  Port: ${config.port}`);
  console.log(`  Gemini API Key: ${config.geminiApiKey ? '***configured***' : 'not set'}`);
  console.log(`  Gemini Model: ${config.geminiModel}`);
  console.log(`  Storage Mode: ${config.storageMode}`);

  if (config.databaseUrl) {
    console.log(`  Database: ${maskDatabaseUrl(config.databaseUrl)}`);
    console.log(`  History Limit Cap: ${config.historyMaxLimit}`);
  }
}
