import type {
  BatchRepository,
  BatchRepositoryFactory,
  ConnectionFactory,
  ReleasePolicy,
  TrackingBatchRepository,
  TransactionalConnection,
} from '../interfaces/index.js';
import type { Logger } from '../logging.js';
import { AbstractUnitOfWork } from './abstract-unit-of-work.js';
import { CommitError, ResourceDisposalError, RollbackError, ScopeMisuseError } from './errors.js';

export type SqlUnitOfWorkOptions<TDb> = {
  /** Opens a connection; called lazily from acquire() */
  connect: ConnectionFactory<TDb>;
  /** Builds the batch repository on the scope's connection */
  createBatchRepository: BatchRepositoryFactory<TDb>;
  /** Defaults to 'retain' */
  releasePolicy?: ReleasePolicy;
  logger?: Logger;
};

/**
 * Unit of Work bound to a SQL connection with native transactions.
 *
 * Each scope runs in one transaction on one connection, and the batch
 * repository for the scope is built on that same connection. Nothing is
 * connected until acquire().
 *
 * Under the 'retain' policy the connection survives release() and is reused
 * by the next scope of this instance; call dispose() when the instance is no
 * longer needed. Under 'dispose' it is closed on every release.
 */
export class SqlUnitOfWork<TDb> extends AbstractUnitOfWork {
  readonly releasePolicy: ReleasePolicy;

  private readonly connect: ConnectionFactory<TDb>;
  private readonly createBatchRepository: BatchRepositoryFactory<TDb>;
  private connection: TransactionalConnection<TDb> | null = null;
  private connectionBroken = false;
  private repository: TrackingBatchRepository | null = null;

  constructor(options: SqlUnitOfWorkOptions<TDb>) {
    super({ logger: options.logger });
    this.connect = options.connect;
    this.createBatchRepository = options.createBatchRepository;
    this.releasePolicy = options.releasePolicy ?? 'retain';
  }

  /**
   * Close a retained connection. Only valid between scopes.
   * @throws ScopeMisuseError while a scope is open
   * @throws ResourceDisposalError if the connection fails to close
   */
  async dispose(): Promise<void> {
    if (this.state !== 'idle' && this.state !== 'closed') {
      throw new ScopeMisuseError('dispose', 'a scope from this unit of work is still open');
    }
    const connection = this.connection;
    if (!connection) return;
    this.connection = null;
    try {
      await connection.close();
    } catch (error) {
      throw new ResourceDisposalError(error);
    }
  }

  protected async openScope(): Promise<BatchRepository> {
    const connection = this.connection ?? (await this.connect());
    this.connection = connection;

    try {
      await connection.begin();
    } catch (error) {
      // Drop a connection that failed to begin
      this.connection = null;
      await connection.close().catch((closeError: unknown) => {
        this.logger.error('Failed to close connection after begin failed', {
          error: closeError instanceof Error ? closeError.message : String(closeError),
        });
      });
      throw error;
    }

    this.repository = this.createBatchRepository(connection.db);
    return this.repository;
  }

  protected async persist(): Promise<void> {
    const { connection, repository } = this.requireResources();
    try {
      await repository.flush();
      await connection.commit();
    } catch (error) {
      throw new CommitError(error);
    }
  }

  protected async discard(): Promise<void> {
    const { connection } = this.requireResources();
    try {
      await connection.rollback();
    } catch (error) {
      this.connectionBroken = true;
      throw new RollbackError(error);
    }
  }

  protected async closeScope(): Promise<void> {
    this.repository = null;
    // A connection whose rollback failed may still hold the transaction
    if (this.releasePolicy === 'retain' && !this.connectionBroken) return;

    const connection = this.connection;
    this.connection = null;
    this.connectionBroken = false;
    if (!connection) return;
    try {
      await connection.close();
    } catch (error) {
      throw new ResourceDisposalError(error);
    }
  }

  private requireResources(): {
    connection: TransactionalConnection<TDb>;
    repository: TrackingBatchRepository;
  } {
    const { connection, repository } = this;
    if (!connection || !repository) {
      // Storage hooks only run while a scope is open
      throw new Error('SqlUnitOfWork has no open connection');
    }
    return { connection, repository };
  }
}
