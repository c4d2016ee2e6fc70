export type { EnvConfig, StorageMode } from './env';
export {
  DEFAULT_GEMINI_MODEL,
  loadEnvConfig,
  getEnvConfig,
  printConfigSummary,
  normalizeDatabaseUrl,
  maskDatabaseUrl,
} from './env';
