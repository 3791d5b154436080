/**
 * Sync monitoring types
 */

/**
 * Result of a single sample of the node's sync status
 */
export type SampleOutcome = 'synced' | 'syncing' | 'failed';

/**
 * Alert state change decided on a reporting tick
 */
export type SyncTransition = 'back-in-sync' | 'out-of-sync';

/**
 * Validated settings of the sync monitor
 */
export interface SyncMonitorConfig {
  nodeUrl: string;
  botToken: string;
  checkIntervalMs: number;
  reportIntervalMs: number;
  alertGroup: number;
}

/**
 * InfluxDB connection settings
 */
export interface InfluxDbConfig {
  url: string;
  token: string;
  org: string;
  bucket: string;
  enabled: boolean;
}

/**
 * Logger settings
 */
export interface LoggingConfig {
  level: string;
  directory: string;
  enableFileLogging: boolean;
}

/**
 * Point-in-time view of the sync monitor, safe to serialize as JSON
 */
export interface SyncMonitorStatus {
  alerting: boolean;
  syncedSamplesInWindow: number;
  checkInterval: string;
  reportInterval: string;
  lastReportAt: string | null;
  snapshot:
    | { synced: true; observedAt: string }
    | { synced: false; currentBlock: string; highestBlock: string; observedAt: string }
    | null;
}
