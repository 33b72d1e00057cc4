export type { Timestamp, Sku, BatchReference } from './common.js';
export type { OrderLine, Batch } from './batches.js';
