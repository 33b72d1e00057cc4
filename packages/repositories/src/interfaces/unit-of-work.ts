import type { BatchRepository, TrackingBatchRepository } from './batch-repository.js';

/**
 * Lifecycle of a Unit of Work instance.
 *
 * - idle: never acquired
 * - opening: acquire() is waiting on the underlying resource
 * - open: a scope is active (committed or not)
 * - committing: commit() is waiting on the underlying resource
 * - closing: release() is rolling back or closing the resource
 * - closed: the last scope was released; acquire() may be called again
 */
export type UnitOfWorkState = 'idle' | 'opening' | 'open' | 'committing' | 'closing' | 'closed';

/**
 * UnitOfWork groups repository operations into one atomic outcome.
 *
 * Rollback is the default: nothing performed through `batches` becomes
 * durable unless `commit()` is called before the scope is released.
 * Prefer `withUnitOfWork()` over calling acquire/release by hand so release
 * runs on every exit path.
 *
 * @example
 * ```ts
 * await withUnitOfWork(uow, async ({ batches }) => {
 *   await batches.add(createBatch({ reference: 'batch1', sku: 'LAMP', quantity: 10 }));
 *   await uow.commit();
 * });
 * ```
 */
export interface UnitOfWork {
  readonly state: UnitOfWorkState;

  /**
   * True once commit() succeeded in the current (or last released) scope.
   */
  readonly committed: boolean;

  /**
   * Batch repository bound to the open scope.
   * @throws ScopeMisuseError before acquire() or after release()
   */
  readonly batches: BatchRepository;

  /**
   * Open a new scope.
   * @throws ScopeMisuseError if a scope from this instance is already open
   * @throws AcquireError if the underlying resource cannot be obtained
   */
  acquire(): Promise<this>;

  /**
   * Make every operation since acquire() durable. Final for the scope.
   * @throws ScopeMisuseError outside an open scope or when already committed
   * @throws CommitError if storage rejects the transaction
   */
  commit(): Promise<void>;

  /**
   * Close the scope, rolling back unless committed.
   *
   * Pass the failure that is propagating out of the scope body, if any.
   * With a failure in flight release never throws; secondary failures and
   * a misplaced release are logged instead.
   * @throws ScopeMisuseError if no scope is open, or a commit is in progress
   * @throws RollbackError if rollback fails with no failure in flight
   * @throws ResourceDisposalError if closing fails with no failure in flight
   */
  release(...failure: [failure?: unknown]): Promise<void>;
}

/**
 * What happens to the underlying connection when a scope is released.
 *
 * - retain: keep it for the next scope of the same instance
 * - dispose: close it on every release
 */
export type ReleasePolicy = 'retain' | 'dispose';

/**
 * A connection with native transaction primitives.
 * `db` is the query handle repositories are built on.
 */
export interface TransactionalConnection<TDb> {
  readonly db: TDb;
  begin(): Promise<void>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
  close(): Promise<void>;
}

export type ConnectionFactory<TDb> = () => Promise<TransactionalConnection<TDb>>;

/**
 * Build a batch repository bound to a live connection. Must not open or
 * close the connection.
 */
export type BatchRepositoryFactory<TDb> = (db: TDb) => TrackingBatchRepository;
