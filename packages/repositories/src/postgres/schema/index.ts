// Re-export all schema tables
export * from './batches.js';
export * from './allocations.js';
