// In-memory repository and Unit of Work for development and testing
//
// Useful for:
// - Fast use-case tests
// - Local development without a database
//
// The in-memory Unit of Work does NOT roll anything back: repository writes
// land in the maps immediately. Use it to check what a use case does and
// that it commits, not to check transactional behaviour.

import type { Batch, BatchReference } from '@allocation/domain';
import type { BatchRepository } from '../interfaces/index.js';
import { AbstractUnitOfWork, type UnitOfWorkOptions } from '../unit-of-work/index.js';
import { silentLogger } from '../logging.js';

/**
 * Batch repository with access to its underlying map and a clear function.
 */
export interface InMemoryBatchRepository extends BatchRepository {
  /** Direct access to the underlying data (for debugging/testing) */
  _data: Map<BatchReference, Batch>;
  /** Clear all data */
  clear(): void;
}

/**
 * Create an in-memory batch repository.
 *
 * `get` and `list` return the stored objects themselves, so model changes
 * made by a use case are visible without a save step.
 *
 * @example
 * ```typescript
 * const batches = createInMemoryBatchRepository([
 *   createBatch({ reference: 'batch1', sku: 'LAMP', quantity: 10 }),
 * ]);
 * console.log(batches._data.size); // 1
 * ```
 */
export function createInMemoryBatchRepository(initial: Batch[] = []): InMemoryBatchRepository {
  const batches = new Map<BatchReference, Batch>(initial.map((b) => [b.reference, b]));

  return {
    _data: batches,
    async add(batch) {
      batches.set(batch.reference, batch);
    },
    async get(reference) {
      return batches.get(reference) ?? null;
    },
    async list() {
      return Array.from(batches.values());
    },
    clear() {
      batches.clear();
    },
  };
}

/**
 * Fake Unit of Work over an in-memory batch repository.
 *
 * Every scope hands out the same repository. commit() only sets the
 * `committed` flag and release() discards nothing. Logs nowhere unless a
 * logger is passed.
 *
 * @example
 * ```typescript
 * const uow = new InMemoryUnitOfWork();
 * await addBatch({ reference: 'b1', sku: 'LAMP', quantity: 100 }, uow);
 * expect(uow.committed).toBe(true);
 * expect(uow.store._data.has('b1')).toBe(true);
 * ```
 */
export class InMemoryUnitOfWork extends AbstractUnitOfWork {
  readonly store: InMemoryBatchRepository;

  constructor(store: InMemoryBatchRepository = createInMemoryBatchRepository(), options: UnitOfWorkOptions = {}) {
    super({ logger: options.logger ?? silentLogger });
    this.store = store;
  }

  protected async openScope(): Promise<BatchRepository> {
    return this.store;
  }

  protected async persist(): Promise<void> {}

  protected async discard(): Promise<void> {}
}
