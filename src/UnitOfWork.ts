import type { ResourceAcquire } from '@matrixai/resources';
import type { Backend } from './backends';
import type {
  Data,
  UnitOfWorkStatus,
  CommitPhase,
  CompensationAction,
  RollbackSummary,
  StageCreateResult,
  StageDeleteResult,
  CommitResult,
} from './types';
import Logger from '@matrixai/logger';
import { Lock } from '@matrixai/async-locks';
import { withF } from '@matrixai/resources';
import * as errors from './errors';
import * as backendsErrors from './backends/errors';
import * as utils from './utils';

/**
 * Buffers creates and deletes of whole files and applies them at a single commit point.
 * A failure while committing is compensated by undoing what was applied
 * before the failure is reported to the caller.
 *
 * Staging and committing are serialised on the instance.
 * There is no isolation between instances sharing a backend,
 * overlapping names interleave and a rollback may undo another instance's work.
 */
class UnitOfWork {
  /**
   * Unit of work as a resource
   * It is committed on release unless the resource usage failed,
   * a failed commit is thrown from the release
   */
  public static transaction(
    backend: Backend,
    logger?: Logger,
  ): ResourceAcquire<UnitOfWork> {
    return async () => {
      const uow = new UnitOfWork({ backend, logger });
      return [
        async (e) => {
          if (e != null) {
            uow.clear();
            return;
          }
          utils.unwrap(await uow.commit());
        },
        uow,
      ];
    };
  }

  public static async withUnitOfWorkF<T>(
    backend: Backend,
    f: (uow: UnitOfWork) => Promise<T>,
    logger?: Logger,
  ): Promise<T> {
    return withF([UnitOfWork.transaction(backend, logger)], ([uow]) => f(uow));
  }

  protected backend: Backend;
  protected logger: Logger;
  protected lock: Lock = new Lock();
  protected _pendingCreates: Map<string, Buffer> = new Map();
  protected _pendingDeletes: Map<string, Buffer> = new Map();
  protected _status: UnitOfWorkStatus = 'empty';
  protected _lastRollback?: RollbackSummary;

  constructor({
    backend,
    logger = new Logger(UnitOfWork.name),
  }: {
    backend: Backend;
    logger?: Logger;
  }) {
    this.backend = backend;
    this.logger = logger;
  }

  get status(): UnitOfWorkStatus {
    return this._status;
  }

  /**
   * Copy of the pending creates, in staging order
   */
  get pendingCreates(): ReadonlyMap<string, Buffer> {
    return copyEntries(this._pendingCreates);
  }

  /**
   * Copy of the pending deletes and their captured content, in staging order
   */
  get pendingDeletes(): ReadonlyMap<string, Buffer> {
    return copyEntries(this._pendingDeletes);
  }

  /**
   * Summary of the rollback performed by the last failed commit
   */
  get lastRollback(): Readonly<RollbackSummary> | undefined {
    return this._lastRollback;
  }

  /**
   * Stages the creation of a file that must not exist yet in the backend.
   * Staging the same name twice keeps the latest content.
   */
  public async stageCreate(
    name: string,
    content: Data,
  ): Promise<StageCreateResult> {
    return withF([this.lock.lock()], async (): Promise<StageCreateResult> => {
      let exists: boolean;
      try {
        exists = await this.backend.exists(name);
      } catch (e) {
        return utils.failure(
          new errors.ErrorUnitOfWorkBackend(
            `Failed to check existence of ${name}`,
            {
              data: { operation: 'exists', name },
              cause: e,
            },
          ),
        );
      }
      if (exists) {
        return utils.failure(
          new errors.ErrorUnitOfWorkAlreadyExists(name, {
            data: { name },
          }),
        );
      }
      this._pendingCreates.set(name, utils.toBuffer(content));
      this._status = 'staged';
      this.logger.debug(`Staged create of ${name}`);
      return utils.success(undefined);
    });
  }

  /**
   * Stages the deletion of a file.
   * A pending create of the same name is cancelled instead, without touching the backend.
   * Otherwise the current content is captured so it can be restored on rollback.
   */
  public async stageDelete(name: string): Promise<StageDeleteResult> {
    return withF([this.lock.lock()], async (): Promise<StageDeleteResult> => {
      if (this._pendingCreates.delete(name)) {
        if (
          this._pendingCreates.size === 0 &&
          this._pendingDeletes.size === 0
        ) {
          this._status = 'empty';
        }
        this.logger.debug(`Cancelled pending create of ${name}`);
        return utils.success(undefined);
      }
      let content: Buffer | undefined;
      try {
        content = await this.backend.tryRead(name);
      } catch (e) {
        return utils.failure(
          new errors.ErrorUnitOfWorkBackend(`Failed to read ${name}`, {
            data: { operation: 'tryRead', name },
            cause: e,
          }),
        );
      }
      if (content == null) {
        return utils.failure(
          new errors.ErrorUnitOfWorkNotFound(name, {
            data: { name },
          }),
        );
      }
      this._pendingDeletes.set(name, content);
      this._status = 'staged';
      this.logger.debug(`Staged delete of ${name}`);
      return utils.success(undefined);
    });
  }

  /**
   * Applies all pending creates, then all pending deletes, in staging order.
   * The first failure stops the commit, the applied operations are compensated
   * and the failure is returned together with the rollback summary.
   */
  public async commit(): Promise<CommitResult> {
    return withF([this.lock.lock()], async (): Promise<CommitResult> => {
      if (this._pendingCreates.size === 0 && this._pendingDeletes.size === 0) {
        this.clearBuffers();
        return utils.success({ created: [], deleted: [] });
      }
      this._status = 'committing';
      this.logger.info(
        `Committing ${this._pendingCreates.size} creates and ${this._pendingDeletes.size} deletes`,
      );
      const created: Array<string> = [];
      const deleted: Array<string> = [];
      for (const [name, content] of this._pendingCreates) {
        try {
          await this.backend.write(name, content);
        } catch (e) {
          return await this.abort('create', name, e);
        }
        this.logger.debug(`Created ${name}`);
        created.push(name);
      }
      for (const name of this._pendingDeletes.keys()) {
        try {
          await this.backend.delete(name);
        } catch (e) {
          return await this.abort('delete', name, e);
        }
        this.logger.debug(`Deleted ${name}`);
        deleted.push(name);
      }
      this.clearBuffers();
      this.logger.info(
        `Committed ${created.length} creates and ${deleted.length} deletes`,
      );
      return utils.success({ created, deleted });
    });
  }

  /**
   * Discards all pending operations, including unresolved entries left by a rollback
   */
  public clear(): void {
    this.clearBuffers();
  }

  protected clearBuffers(): void {
    this._pendingCreates = new Map();
    this._pendingDeletes = new Map();
    this._status = 'empty';
  }

  protected async abort(
    phase: CommitPhase,
    name: string,
    cause: unknown,
  ): Promise<CommitResult> {
    const error = new errors.ErrorUnitOfWorkBackend(
      `Failed to ${phase === 'create' ? 'write' : 'delete'} ${name} during ${phase} phase`,
      {
        data: { phase, name },
        cause,
      },
    );
    this.logger.warn(`${error.message}, rolling back`);
    // A delete that found nothing to delete left no state to restore
    const rollback = await this.rollback(
      phase === 'delete' && cause instanceof backendsErrors.ErrorBackendNotFound
        ? name
        : undefined,
    );
    this._lastRollback = rollback;
    this._status = 'rolledback';
    if (rollback.failures.length > 0) {
      this.logger.error(
        `Rollback left ${rollback.failures.length} entries unresolved`,
      );
    } else {
      this.logger.warn(`Rolled back ${rollback.compensated.length} entries`);
    }
    return { type: 'failure', error, rollback };
  }

  /**
   * Undoes the creates and deletes of a failed commit.
   * Every pending create that exists is deleted,
   * every pending delete that no longer exists is restored with its captured content.
   * A delete that failed as not found is not restored, the entry was removed outside this commit.
   * Entries that could not be compensated remain pending.
   */
  protected async rollback(missingDelete?: string): Promise<RollbackSummary> {
    const compensated: Array<string> = [];
    const failures: Array<errors.ErrorUnitOfWorkCompensation<unknown>> = [];
    const unresolvedCreates: Map<string, Buffer> = new Map();
    const unresolvedDeletes: Map<string, Buffer> = new Map();
    for (const [name, content] of this._pendingCreates) {
      try {
        if (await this.backend.exists(name)) {
          await this.backend.delete(name);
          this.logger.debug(`Compensated create of ${name}`);
        }
        compensated.push(name);
      } catch (e) {
        failures.push(this.compensationFailure('delete', name, e));
        unresolvedCreates.set(name, content);
      }
    }
    for (const [name, content] of this._pendingDeletes) {
      if (name === missingDelete) {
        continue;
      }
      try {
        if (!(await this.backend.exists(name))) {
          await this.backend.write(name, content);
          this.logger.debug(`Compensated delete of ${name}`);
        }
        compensated.push(name);
      } catch (e) {
        failures.push(this.compensationFailure('restore', name, e));
        unresolvedDeletes.set(name, content);
      }
    }
    this._pendingCreates = unresolvedCreates;
    this._pendingDeletes = unresolvedDeletes;
    return { compensated, failures };
  }

  protected compensationFailure(
    action: CompensationAction,
    name: string,
    cause: unknown,
  ): errors.ErrorUnitOfWorkCompensation<unknown> {
    const error = new errors.ErrorUnitOfWorkCompensation(
      `Failed to ${action} ${name} during rollback`,
      {
        data: { action, name },
        cause,
      },
    );
    this.logger.error(error.message);
    return error;
  }
}

function copyEntries(entries: Map<string, Buffer>): Map<string, Buffer> {
  return new Map(
    [...entries].map(([name, content]): [string, Buffer] => [
      name,
      Buffer.from(content),
    ]),
  );
}

export default UnitOfWork;
