// Blockchain types
export * from './blockchain/sync';

// Monitoring types
export * from './monitoring/sync-monitor';
