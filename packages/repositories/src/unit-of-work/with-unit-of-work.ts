import type { UnitOfWork } from '../interfaces/index.js';

/**
 * Run `work` inside a freshly acquired scope of `uow`.
 *
 * release() runs on every exit path. A failure thrown by `work` is rethrown
 * unchanged after release; release failures in that case are only logged.
 * Nothing is committed here: `work` must call `uow.commit()` itself.
 *
 * @returns The return value of `work`
 */
export async function withUnitOfWork<TUow extends UnitOfWork, T>(
  uow: TUow,
  work: (uow: TUow) => Promise<T>
): Promise<T> {
  await uow.acquire();

  let result: T;
  try {
    result = await work(uow);
  } catch (error) {
    await uow.release(error);
    throw error;
  }

  await uow.release();
  return result;
}
