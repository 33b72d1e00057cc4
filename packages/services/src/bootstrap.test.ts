// Wiring only: postgres.js connects lazily, so nothing here reaches a server

import { describe, it, expect } from 'vitest';
import { SqlUnitOfWork, silentLogger } from '@allocation/repositories';
import { createUnitOfWorkFactory } from './bootstrap.js';
import { loadConfig } from './config.js';

describe('createUnitOfWorkFactory', () => {
  it('hands out independent, unacquired units of work with the configured policy', async () => {
    const factory = createUnitOfWorkFactory(
      loadConfig({ DATABASE_URL: 'postgres://localhost:5432/allocation', UOW_RELEASE_POLICY: 'retain' }),
      { logger: silentLogger }
    );

    const first = factory.createUnitOfWork();
    const second = factory.createUnitOfWork();

    expect(first).toBeInstanceOf(SqlUnitOfWork);
    expect(first).not.toBe(second);
    expect(first.state).toBe('idle');
    expect(first.releasePolicy).toBe('retain');

    await factory.close();
  });
});
