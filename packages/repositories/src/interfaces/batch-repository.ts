import type { Batch, BatchReference } from '@allocation/domain';
import type { Repository, TrackingRepository } from './repository.js';

/**
 * Repository interface for Batch operations.
 *
 * Batches are looked up by reference. Allocations are part of the batch and
 * are loaded and saved with it.
 */
export type BatchRepository = Repository<Batch, BatchReference>;

export type TrackingBatchRepository = TrackingRepository<Batch, BatchReference>;
