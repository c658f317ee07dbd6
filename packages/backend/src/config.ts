export interface Config {
  port: number;
  database_url: string;
  node_env: string;
  gemini_api_key: string;
  gemini_embedding_model: string;
  gemini_flash_model: string;
  embedding_dimensions: number;
  embedding_timeout_ms: number;
  log_level: 'debug' | 'info' | 'warn' | 'error';
  confidence_threshold: number;
  duplicate_threshold: number;
  flag_alert_threshold: number;
  retrieval_candidates: number;
  alert_webhook_url: string | null;
  alert_timeout_ms: number;
}

const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

function get_env(key: string, default_value?: string): string {
  const value = process.env[key];
  if (value === undefined) {
    if (default_value !== undefined) {
      return default_value;
    }
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

function parse_log_level(value: string | undefined): Config['log_level'] {
  const level = LOG_LEVELS.find((l) => l === value);
  return level ?? 'info';
}

export function load_config(): Config {
  return {
    port: parseInt(get_env('PORT', '4000'), 10),
    database_url: get_env('DATABASE_URL'),
    node_env: get_env('NODE_ENV', 'development'),
    gemini_api_key: get_env('GEMINI_API_KEY'),
    gemini_embedding_model: get_env('GEMINI_EMBEDDING_MODEL', 'gemini-embedding-001'),
    gemini_flash_model: get_env('GEMINI_FLASH_MODEL', 'gemini-2.5-flash'),
    embedding_dimensions: parseInt(get_env('EMBEDDING_DIMENSIONS', '3072'), 10),
    embedding_timeout_ms: parseInt(get_env('EMBEDDING_TIMEOUT_MS', '10000'), 10),
    log_level: parse_log_level(process.env.LOG_LEVEL),
    confidence_threshold: parseFloat(get_env('CONFIDENCE_THRESHOLD', '0.80')),
    duplicate_threshold: parseFloat(get_env('DUPLICATE_THRESHOLD', '0.95')),
    flag_alert_threshold: parseInt(get_env('FLAG_ALERT_THRESHOLD', '3'), 10),
    retrieval_candidates: parseInt(get_env('RETRIEVAL_CANDIDATES', '3'), 10),
    alert_webhook_url: process.env.ALERT_WEBHOOK_URL || null,
    alert_timeout_ms: parseInt(get_env('ALERT_TIMEOUT_MS', '5000'), 10),
  };
}

export const config = load_config();
