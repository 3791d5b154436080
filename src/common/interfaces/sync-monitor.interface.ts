import { SyncProgress } from '@types';

/**
 * Injection token for the node client used by the sampler
 */
export const NODE_SYNC_CLIENT = Symbol('NODE_SYNC_CLIENT');

/**
 * Injection token for the alert channel used by the reporter
 */
export const NOTIFIER = Symbol('NOTIFIER');

/**
 * Source of the node's sync status
 */
export interface NodeSyncClient {
  /**
   * Resolves to `null` when the node considers itself caught up
   */
  querySyncProgress(): Promise<SyncProgress | null>;
}

/**
 * Sends plain text messages to an operator channel
 */
export interface Notifier {
  sendMessage(destination: number, text: string): Promise<void>;
}
