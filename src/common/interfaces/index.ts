/**
 * Central export point for all common interfaces
 */
export * from './sync-monitor.interface';
