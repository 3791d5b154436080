/**
 * Injection token for the validated sync monitor settings
 */
export const SYNC_MONITOR_CONFIG = Symbol('SYNC_MONITOR_CONFIG');
