import { DEFAULTS, ENV_VARS, FEATURE_FLAGS, SCHEDULER } from '@common/constants/config';
import { formatDuration, parseDuration } from '@common/utils/duration';
import { ConfigurationError, getErrorMessage } from '@common/utils/error-handler';
import { Injectable, Logger } from '@nestjs/common';
import * as dotenv from 'dotenv';
import * as fs from 'fs';
import { join } from 'path';
import { InfluxDbConfig, LoggingConfig, SyncMonitorConfig } from '@types';

type Environment = Record<string, string | undefined>;

const NODE_URL_PROTOCOLS = ['http:', 'https:'];

/**
 * Configuration service with strict typing and validation
 */
@Injectable()
export class ConfigService {
  private readonly logger = new Logger(ConfigService.name);
  private readonly env: Environment;

  // Cached config values
  private syncMonitorConfig: SyncMonitorConfig | null = null;
  private influxDbConfig: InfluxDbConfig | null = null;

  /**
   * @param env - explicit environment; when omitted, `process.env` merged with `.env` in the working directory
   */
  constructor(env?: Environment) {
    this.env = env ?? this.loadEnvironment();
  }

  private loadEnvironment(): Environment {
    try {
      const envPath = join(process.cwd(), '.env');
      if (fs.existsSync(envPath)) {
        const envConfig = dotenv.parse(fs.readFileSync(envPath));
        this.logger.log(`Loaded environment variables from ${envPath}`);
        return { ...process.env, ...envConfig };
      }
      this.logger.log('No .env file found, using process environment variables');
    } catch (error) {
      this.logger.error(`Failed to load environment variables: ${getErrorMessage(error)}`);
    }
    return { ...process.env };
  }

  /**
   * Get a string value from environment variables
   */
  get(key: string, defaultValue?: string): string {
    return this.read(key, defaultValue, value => value);
  }

  /**
   * Read a value from environment variables with type conversion
   */
  private read<T>(key: string, defaultValue: T | undefined, transform: (value: string) => T): T {
    const value = this.env[key]?.trim();

    if (value === undefined || value === '') {
      if (defaultValue !== undefined) {
        return defaultValue;
      }
      throw new ConfigurationError(`Missing required environment variable: ${key}`, key);
    }

    try {
      return transform(value);
    } catch (error) {
      throw new ConfigurationError(`Failed to transform environment variable ${key}: ${getErrorMessage(error)}`, key);
    }
  }

  /**
   * Get an integer value; only an optional sign followed by digits is accepted
   */
  getInteger(key: string, defaultValue?: number): number {
    return this.read<number>(key, defaultValue, value => {
      if (!/^[-+]?\d+$/.test(value)) {
        throw new Error(`Cannot convert "${value}" to an integer`);
      }
      const num = Number(value);
      if (!Number.isSafeInteger(num)) {
        throw new Error(`"${value}" is out of range`);
      }
      return num;
    });
  }

  /**
   * Get a boolean value from environment variables
   */
  getBoolean(key: string, defaultValue?: boolean): boolean {
    return this.read<boolean>(key, defaultValue, value => {
      if (value.toLowerCase() === 'true' || value === '1') return true;
      if (value.toLowerCase() === 'false' || value === '0') return false;
      throw new Error(`Cannot convert "${value}" to a boolean`);
    });
  }

  /**
   * Get a duration (e.g. `30s`, `5m`, `1h30m`) in milliseconds, usable as a timer delay
   */
  getDuration(key: string, defaultValue?: number): number {
    return this.read<number>(key, defaultValue, value => {
      const ms = parseDuration(value);
      if (ms < SCHEDULER.MIN_INTERVAL_MS || ms > SCHEDULER.MAX_INTERVAL_MS) {
        throw new Error(
          `duration "${value}" must be between ${formatDuration(SCHEDULER.MIN_INTERVAL_MS)} and ${formatDuration(SCHEDULER.MAX_INTERVAL_MS)}`,
        );
      }
      return ms;
    });
  }

  /**
   * Get feature flag status
   */
  isFeatureEnabled(featureFlag: string, defaultValue = false): boolean {
    return this.getBoolean(featureFlag, defaultValue);
  }

  /**
   * Get the application port
   */
  getPort(): number {
    return this.getInteger(ENV_VARS.PORT, DEFAULTS.PORT);
  }

  /**
   * Get the log level
   */
  getLogLevel(): string {
    return this.get(ENV_VARS.LOG_LEVEL, DEFAULTS.LOG_LEVEL);
  }

  /**
   * Get the runtime environment name
   */
  getEnvironment(): string {
    return this.get(ENV_VARS.NODE_ENV, 'development');
  }

  /**
   * Get logger settings
   */
  getLoggingConfig(): LoggingConfig {
    return {
      level: this.getLogLevel(),
      directory: this.get(ENV_VARS.LOG_DIRECTORY, DEFAULTS.LOG_DIRECTORY),
      enableFileLogging: this.isFeatureEnabled(FEATURE_FLAGS.ENABLE_FILE_LOGGING, true),
    };
  }

  /**
   * Get the validated sync monitor configuration
   * @throws ConfigurationError when a setting is missing or invalid
   */
  getSyncMonitorConfig(): SyncMonitorConfig {
    if (!this.syncMonitorConfig) {
      const nodeUrl = this.read(ENV_VARS.NODE_URL, undefined, value => {
        const url = new URL(value);
        if (!NODE_URL_PROTOCOLS.includes(url.protocol)) {
          throw new Error(`unsupported protocol ${url.protocol}`);
        }
        return value;
      });
      const botToken = this.get(ENV_VARS.BOT_TOKEN);
      const checkIntervalMs = this.getDuration(ENV_VARS.CHECK_INTERVAL);
      const reportIntervalMs = this.getDuration(ENV_VARS.REPORT_INTERVAL);
      const alertGroup = this.getInteger(ENV_VARS.ALERT_GROUP);

      if (reportIntervalMs <= checkIntervalMs) {
        throw new ConfigurationError(
          `${ENV_VARS.REPORT_INTERVAL} must be greater than ${ENV_VARS.CHECK_INTERVAL}`,
          ENV_VARS.REPORT_INTERVAL,
          { checkIntervalMs, reportIntervalMs },
        );
      }

      this.syncMonitorConfig = { nodeUrl, botToken, checkIntervalMs, reportIntervalMs, alertGroup };
    }

    return this.syncMonitorConfig;
  }

  /**
   * Get InfluxDB configuration
   */
  getInfluxDbConfig(): InfluxDbConfig {
    if (!this.influxDbConfig) {
      this.influxDbConfig = {
        url: this.get(ENV_VARS.INFLUXDB_URL, DEFAULTS.INFLUXDB_URL),
        token: this.get(ENV_VARS.INFLUXDB_TOKEN, ''),
        org: this.get(ENV_VARS.INFLUXDB_ORG, DEFAULTS.INFLUXDB_ORG),
        bucket: this.get(ENV_VARS.INFLUXDB_BUCKET, DEFAULTS.INFLUXDB_BUCKET),
        enabled: this.isFeatureEnabled(FEATURE_FLAGS.ENABLE_INFLUXDB, false),
      };

      // Disable InfluxDB if token is not provided
      if (!this.influxDbConfig.token && this.influxDbConfig.enabled) {
        this.logger.warn('InfluxDB is enabled but no token is provided, disabling InfluxDB');
        this.influxDbConfig.enabled = false;
      }
    }

    return this.influxDbConfig;
  }
}
