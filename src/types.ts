import type {
  ErrorUnitOfWorkAlreadyExists,
  ErrorUnitOfWorkNotFound,
  ErrorUnitOfWorkBackend,
  ErrorUnitOfWorkCompensation,
} from './errors';

/**
 * Content that can be staged, strings are encoded as UTF-8
 */
type Data = string | Buffer | Uint8Array;

/**
 * Tagged result of an operation that may fail
 */
type Result<T, E extends Error = Error> =
  | {
      type: 'success';
      value: T;
    }
  | {
      type: 'failure';
      error: E;
    };

/**
 * Lifecycle of a unit of work
 * `rolledback` instances remain usable for further staging
 */
type UnitOfWorkStatus = 'empty' | 'staged' | 'committing' | 'rolledback';

type CommitPhase = 'create' | 'delete';

/**
 * Compensating actions applied during rollback
 * `delete` undoes a create, `restore` undoes a delete
 */
type CompensationAction = 'delete' | 'restore';

type RollbackSummary = {
  /**
   * Names whose compensation succeeded or was not needed
   */
  compensated: Array<string>;
  failures: Array<ErrorUnitOfWorkCompensation<unknown>>;
};

type CommitSummary = {
  created: Array<string>;
  deleted: Array<string>;
};

type StageCreateResult = Result<
  void,
  ErrorUnitOfWorkAlreadyExists<unknown> | ErrorUnitOfWorkBackend<unknown>
>;

type StageDeleteResult = Result<
  void,
  ErrorUnitOfWorkNotFound<unknown> | ErrorUnitOfWorkBackend<unknown>
>;

type CommitResult =
  | {
      type: 'success';
      value: CommitSummary;
    }
  | {
      type: 'failure';
      error: ErrorUnitOfWorkBackend<unknown>;
      rollback: RollbackSummary;
    };

export type {
  Data,
  Result,
  UnitOfWorkStatus,
  CommitPhase,
  CompensationAction,
  RollbackSummary,
  CommitSummary,
  StageCreateResult,
  StageDeleteResult,
  CommitResult,
};
