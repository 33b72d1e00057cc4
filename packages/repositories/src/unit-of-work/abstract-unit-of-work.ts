import type { BatchRepository, UnitOfWork, UnitOfWorkState } from '../interfaces/index.js';
import { consoleLogger, type Logger } from '../logging.js';
import {
  UnitOfWorkError,
  ScopeMisuseError,
  AcquireError,
  CommitError,
  RollbackError,
  ResourceDisposalError,
} from './errors.js';
import { Scope, ScopedRepository } from './scope.js';

export type UnitOfWorkOptions = {
  logger?: Logger;
};

/**
 * Scope state machine shared by every Unit of Work.
 *
 * Subclasses supply the storage side through four hooks and never see the
 * state checks: openScope() is only called from idle/closed, persist() only
 * on an open uncommitted scope, discard() only on release without commit,
 * and closeScope() once per release. While persist() runs the instance is
 * 'committing' and rejects release().
 */
export abstract class AbstractUnitOfWork implements UnitOfWork {
  protected readonly logger: Logger;

  private currentState: UnitOfWorkState = 'idle';
  private scope: Scope | null = null;
  private handle: BatchRepository | null = null;
  private lastCommitted = false;
  private scopeCount = 0;

  constructor(options: UnitOfWorkOptions = {}) {
    this.logger = options.logger ?? consoleLogger;
  }

  get state(): UnitOfWorkState {
    return this.currentState;
  }

  get committed(): boolean {
    return this.lastCommitted;
  }

  get batches(): BatchRepository {
    if (!this.handle) {
      throw new ScopeMisuseError('access batches', this.describeState());
    }
    return this.handle;
  }

  async acquire(): Promise<this> {
    if (this.currentState !== 'idle' && this.currentState !== 'closed') {
      throw new ScopeMisuseError('acquire', this.describeState());
    }

    const previous = this.currentState;
    this.currentState = 'opening';

    let repository: BatchRepository;
    try {
      repository = await this.openScope();
    } catch (error) {
      this.currentState = previous;
      throw error instanceof UnitOfWorkError ? error : new AcquireError(error);
    }

    const scope = new Scope(++this.scopeCount);
    this.scope = scope;
    this.handle = new ScopedRepository(repository, scope);
    this.lastCommitted = false;
    this.currentState = 'open';

    this.logger.debug('Unit of work acquired', { scope: scope.id });
    return this;
  }

  async commit(): Promise<void> {
    const scope = this.requireOpenScope('commit');
    if (scope.committed) {
      throw new ScopeMisuseError('commit', `scope ${scope.id} is already committed`);
    }

    this.currentState = 'committing';
    try {
      await this.persist();
    } catch (error) {
      this.currentState = 'open';
      this.logger.warn('Unit of work commit failed', {
        scope: scope.id,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error instanceof UnitOfWorkError ? error : new CommitError(error);
    }

    this.currentState = 'open';
    scope.committed = true;
    this.lastCommitted = true;
    this.logger.debug('Unit of work committed', { scope: scope.id });
  }

  async release(...failure: [failure?: unknown]): Promise<void> {
    const failureInFlight = failure.length > 0;
    if (failureInFlight && (this.currentState !== 'open' || !this.scope)) {
      const misuse = new ScopeMisuseError('release', this.describeState());
      this.logger.error('Unit of work release failed while another failure was propagating', {
        code: misuse.code,
        error: misuse.message,
        primary: describeFailure(failure[0]),
      });
      return;
    }
    const scope = this.requireOpenScope('release');

    // Handles stop working before any I/O happens
    scope.open = false;
    this.scope = null;
    this.handle = null;
    this.currentState = 'closing';

    const secondary: UnitOfWorkError[] = [];

    if (!scope.committed) {
      try {
        await this.discard();
        this.logger.debug('Unit of work released without commit', { scope: scope.id });
      } catch (error) {
        secondary.push(error instanceof UnitOfWorkError ? error : new RollbackError(error));
      }
    }

    try {
      await this.closeScope();
    } catch (error) {
      secondary.push(error instanceof UnitOfWorkError ? error : new ResourceDisposalError(error));
    }

    this.currentState = 'closed';

    for (const error of secondary) {
      this.logger.error(
        failureInFlight
          ? 'Unit of work release failed while another failure was propagating'
          : 'Unit of work release failed',
        {
          scope: scope.id,
          code: error.code,
          error: error.message,
          ...(failureInFlight ? { primary: describeFailure(failure[0]) } : {}),
        }
      );
    }

    if (!failureInFlight && secondary.length > 0) {
      throw secondary[0];
    }
  }

  /**
   * Obtain the scope's resource and return the repository bound to it.
   */
  protected abstract openScope(): Promise<BatchRepository>;

  /**
   * Make the scope's writes durable.
   */
  protected abstract persist(): Promise<void>;

  /**
   * Discard the scope's uncommitted writes.
   */
  protected abstract discard(): Promise<void>;

  /**
   * Runs at the end of every release, after rollback.
   */
  protected async closeScope(): Promise<void> {}

  private requireOpenScope(operation: string): Scope {
    if (this.currentState !== 'open' || !this.scope) {
      throw new ScopeMisuseError(operation, this.describeState());
    }
    return this.scope;
  }

  private describeState(): string {
    switch (this.currentState) {
      case 'idle':
        return 'unit of work has not been acquired';
      case 'opening':
        return 'unit of work is still being acquired';
      case 'open':
        return 'a scope from this unit of work is already open';
      case 'committing':
        return 'unit of work is committing';
      case 'closing':
        return 'unit of work is being released';
      case 'closed':
        return 'unit of work has been released';
    }
  }
}

function describeFailure(failure: unknown): string {
  return failure instanceof Error ? `${failure.name}: ${failure.message}` : String(failure);
}
