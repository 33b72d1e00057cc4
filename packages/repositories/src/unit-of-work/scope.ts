import type { Repository } from '../interfaces/index.js';
import { ScopeMisuseError } from './errors.js';

/**
 * Per-scope bookkeeping. A new Scope is created on every acquire(), so
 * handles from an earlier scope never see a later one as open.
 */
export class Scope {
  open = true;
  committed = false;

  constructor(readonly id: number) {}

  assertReadable(operation: string): void {
    if (!this.open) {
      throw new ScopeMisuseError(operation, `scope ${this.id} has been released`);
    }
  }

  assertWritable(operation: string): void {
    this.assertReadable(operation);
    if (this.committed) {
      throw new ScopeMisuseError(operation, `scope ${this.id} is already committed`);
    }
  }
}

/**
 * Repository handle bound to one scope. Delegates to the underlying
 * repository while the scope is open; writes stop at commit.
 */
export class ScopedRepository<TEntity, TKey> implements Repository<TEntity, TKey> {
  constructor(
    private readonly inner: Repository<TEntity, TKey>,
    private readonly scope: Scope
  ) {}

  async add(entity: TEntity): Promise<void> {
    this.scope.assertWritable('add');
    await this.inner.add(entity);
  }

  async get(key: TKey): Promise<TEntity | null> {
    this.scope.assertReadable('get');
    return this.inner.get(key);
  }

  async list(): Promise<TEntity[]> {
    this.scope.assertReadable('list');
    return this.inner.list();
  }
}
