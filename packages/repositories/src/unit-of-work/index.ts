export {
  UnitOfWorkError,
  ScopeMisuseError,
  AcquireError,
  CommitError,
  RollbackError,
  ResourceDisposalError,
  isUnitOfWorkError,
} from './errors.js';
export { AbstractUnitOfWork, type UnitOfWorkOptions } from './abstract-unit-of-work.js';
export { SqlUnitOfWork, type SqlUnitOfWorkOptions } from './sql-unit-of-work.js';
export { withUnitOfWork } from './with-unit-of-work.js';
