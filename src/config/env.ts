import dotenv from 'dotenv';

dotenv.config();

export const env = {
  // Server
  PORT: parseInt(process.env.PORT || '3001', 10),
  NODE_ENV: process.env.NODE_ENV || 'development',
  LOG_LEVEL: process.env.LOG_LEVEL || 'info',

  // Site configuration & run state
  SITES_CONFIG_PATH: process.env.SITES_CONFIG_PATH || 'config/sites.json',
  FRONTIER_SNAPSHOT_PATH: process.env.FRONTIER_SNAPSHOT_PATH || 'data/frontier.json',

  // Storage sink
  SINK: process.env.SINK || 'csv', // memory | csv | mongo
  CSV_OUTPUT_PATH: process.env.CSV_OUTPUT_PATH || 'outputs/listings.csv',
  MONGODB_URI: process.env.MONGODB_URI || 'mongodb://localhost:27017/listing-crawler',
  SINK_MAX_ATTEMPTS: parseInt(process.env.SINK_MAX_ATTEMPTS || '3', 10),
  SINK_BACKOFF_BASE: parseInt(process.env.SINK_BACKOFF_BASE || '200', 10),

  // Redis (shared dedup state)
  REDIS_ENABLED: process.env.REDIS_ENABLED === 'true', // Default false
  REDIS_URL: process.env.REDIS_URL || 'redis://localhost:6379',
  REDIS_PASSWORD: process.env.REDIS_PASSWORD,
  REDIS_DB: parseInt(process.env.REDIS_DB || '0', 10),
  REDIS_KEY_PREFIX: process.env.REDIS_KEY_PREFIX || 'crawl',

  // Workers
  WORKER_COUNT: parseInt(process.env.WORKER_COUNT || '4', 10),
  FETCH_TIMEOUT: parseInt(process.env.FETCH_TIMEOUT || '10000', 10), // 10s, per fetch
  WORKER_IDLE_POLL_MS: parseInt(process.env.WORKER_IDLE_POLL_MS || '250', 10),

  // Identities
  PROXY_URLS: process.env.PROXY_URLS || process.env.PROXY_URL, // Comma-separated proxy URLs
  DIRECT_IDENTITIES: parseInt(process.env.DIRECT_IDENTITIES || '3', 10),
  IDENTITY_MAX_CONSECUTIVE_FAILURES: parseInt(process.env.IDENTITY_MAX_CONSECUTIVE_FAILURES || '3', 10),
  IDENTITY_COOLDOWN_MS: parseInt(process.env.IDENTITY_COOLDOWN_MS || '300000', 10), // 5 minutes

  // Politeness
  GOVERNOR_MAX_BACKOFF_MULTIPLIER: parseInt(process.env.GOVERNOR_MAX_BACKOFF_MULTIPLIER || '32', 10),
  GOVERNOR_DECAY_WINDOW_MS: parseInt(process.env.GOVERNOR_DECAY_WINDOW_MS || '60000', 10),

  // Circuit Breaker
  CIRCUIT_BREAKER_WINDOW_MS: parseInt(process.env.CIRCUIT_BREAKER_WINDOW_MS || '60000', 10),
  CIRCUIT_BREAKER_ERROR_THRESHOLD: parseInt(process.env.CIRCUIT_BREAKER_ERROR_THRESHOLD || '50', 10), // 50%
  CIRCUIT_BREAKER_RESET_TIMEOUT: parseInt(process.env.CIRCUIT_BREAKER_RESET_TIMEOUT || '30000', 10), // 30 seconds
  CIRCUIT_BREAKER_MIN_REQUESTS: parseInt(process.env.CIRCUIT_BREAKER_MIN_REQUESTS || '5', 10),
  CIRCUIT_BREAKER_HALF_OPEN_PROBES: parseInt(process.env.CIRCUIT_BREAKER_HALF_OPEN_PROBES || '1', 10),

  // Deduplication
  DEDUP_URL_MODE: process.env.DEDUP_URL_MODE || 'exact', // exact | probabilistic
  DEDUP_EXPECTED_ITEMS: parseInt(process.env.DEDUP_EXPECTED_ITEMS || '1000000', 10),
  DEDUP_FALSE_POSITIVE_RATE: parseFloat(process.env.DEDUP_FALSE_POSITIVE_RATE || '0.001'),

  // Observability
  METRICS_INTERVAL_MS: parseInt(process.env.METRICS_INTERVAL_MS || '30000', 10),
} as const;

export default env;
