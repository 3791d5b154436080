import { SyncTransition } from '@types';

/**
 * Decide the alert transition at the end of a reporting window.
 *
 * One fully synced sample anywhere in the window is enough to clear an alert,
 * while an alert is raised only when the whole window had none.
 *
 * @param syncedSamples - fully synced samples observed in the window
 * @param alerting - whether an out-of-sync alert is currently raised
 * @returns the transition to apply, or `null` to stay in the current state
 */
export function resolveTransition(syncedSamples: number, alerting: boolean): SyncTransition | null {
  if (syncedSamples > 0 && alerting) {
    return 'back-in-sync';
  }
  if (syncedSamples === 0 && !alerting) {
    return 'out-of-sync';
  }
  return null;
}
