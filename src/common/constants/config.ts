/**
 * Centralized configuration constants for the application
 */

// Node RPC constants
export const BLOCKCHAIN = {
  RPC: {
    METHODS: {
      SYNCING: 'eth_syncing',
    },
  },
} as const;

// Feature flags
export const FEATURE_FLAGS = {
  ENABLE_FILE_LOGGING: 'ENABLE_FILE_LOGGING',
  ENABLE_INFLUXDB: 'ENABLE_INFLUXDB',
} as const;

// Environment variable names
export const ENV_VARS = {
  // General
  NODE_ENV: 'NODE_ENV',
  LOG_LEVEL: 'LOG_LEVEL',
  LOG_DIRECTORY: 'LOG_DIRECTORY',
  PORT: 'PORT',

  // Sync monitoring
  NODE_URL: 'GETH_URL',
  BOT_TOKEN: 'BOT_TOKEN',
  CHECK_INTERVAL: 'CHECK_INTERVAL',
  REPORT_INTERVAL: 'REPORT_INTERVAL',
  ALERT_GROUP: 'ALERT_GROUP',

  // InfluxDB Configuration
  INFLUXDB_URL: 'INFLUXDB_URL',
  INFLUXDB_TOKEN: 'INFLUXDB_TOKEN',
  INFLUXDB_ORG: 'INFLUXDB_ORG',
  INFLUXDB_BUCKET: 'INFLUXDB_BUCKET',
} as const;

// Default values for configuration
export const DEFAULTS = {
  PORT: 3000,
  LOG_LEVEL: 'info',
  LOG_DIRECTORY: 'logs',

  // InfluxDB defaults
  INFLUXDB_URL: 'http://localhost:8086',
  INFLUXDB_ORG: 'node-monitor',
  INFLUXDB_BUCKET: 'node_sync',
} as const;

// Scheduler interval names
export const SCHEDULER = {
  SAMPLER_INTERVAL: 'syncSampler',
  REPORTER_INTERVAL: 'syncReporter',
  // Timer delays outside this range make Node fall back to 1ms
  MIN_INTERVAL_MS: 1,
  MAX_INTERVAL_MS: 2147483647,
} as const;

// Telegram Bot API
export const TELEGRAM = {
  API_URL: 'https://api.telegram.org',
  REQUEST_TIMEOUT_MS: 10000,
} as const;

// InfluxDB measurement names
export const MEASUREMENTS = {
  SYNC_SAMPLE: 'node_sync_sample',
  SYNC_ALERT: 'node_sync_alert',
} as const;
