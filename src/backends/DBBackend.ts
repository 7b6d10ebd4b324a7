import type { LevelPath } from '@matrixai/db';
import type { Backend } from './types';
import Logger from '@matrixai/logger';
import { DB } from '@matrixai/db';
import { withF } from '@matrixai/resources';
import {
  CreateDestroyStartStop,
  ready,
} from '@matrixai/async-init/dist/CreateDestroyStartStop';
import * as backendsErrors from './errors';
import * as utils from '../utils';

/**
 * Backend storing entries in a LevelDB key-value store
 * When a key is supplied, entries are encrypted at rest
 * An injected DB is not owned, its lifecycle stays with the caller
 */
interface DBBackend extends CreateDestroyStartStop {}
@CreateDestroyStartStop(
  new backendsErrors.ErrorBackendRunning(),
  new backendsErrors.ErrorBackendDestroyed(),
)
class DBBackend implements Backend {
  public static async createDBBackend({
    dbPath,
    key,
    logger,
    fresh,
  }: {
    dbPath: string;
    key?: Buffer;
    logger?: Logger;
    fresh?: boolean;
  }): Promise<DBBackend>;
  public static async createDBBackend({
    db,
    logger,
    fresh,
  }: {
    db: DB;
    logger?: Logger;
    fresh?: boolean;
  }): Promise<DBBackend>;
  public static async createDBBackend({
    dbPath,
    key,
    db,
    logger = new Logger(this.name),
    fresh = false,
  }: {
    dbPath?: string;
    key?: Buffer;
    db?: DB;
    logger?: Logger;
    fresh?: boolean;
  }): Promise<DBBackend> {
    logger.info(`Creating ${this.name}`);
    let dbOwned = false;
    if (db == null) {
      if (dbPath == null) {
        throw new TypeError('Either `db` or `dbPath` must be supplied');
      }
      db = await DB.createDB({
        dbPath,
        crypto:
          key != null
            ? {
                key,
                ops: {
                  encrypt: utils.encrypt,
                  decrypt: utils.decrypt,
                },
              }
            : undefined,
        logger: logger.getChild(DB.name),
      });
      dbOwned = true;
    }
    const backend = new DBBackend({ db, dbOwned, logger });
    await backend.start({ fresh });
    logger.info(`Created ${this.name}`);
    return backend;
  }

  public readonly entriesDbPath: LevelPath = [this.constructor.name, 'entries'];

  protected db: DB;
  protected dbOwned: boolean;
  protected logger: Logger;

  constructor({
    db,
    dbOwned = false,
    logger,
  }: {
    db: DB;
    dbOwned?: boolean;
    logger: Logger;
  }) {
    this.db = db;
    this.dbOwned = dbOwned;
    this.logger = logger;
  }

  public async start({
    fresh = false,
  }: {
    fresh?: boolean;
  } = {}): Promise<void> {
    this.logger.info(`Starting ${this.constructor.name}`);
    if (this.dbOwned) {
      await this.db.start();
    }
    if (fresh) {
      await this.db.clear(this.entriesDbPath);
    }
    this.logger.info(`Started ${this.constructor.name}`);
  }

  public async stop(): Promise<void> {
    this.logger.info(`Stopping ${this.constructor.name}`);
    if (this.dbOwned) {
      await this.db.stop();
    }
    this.logger.info(`Stopped ${this.constructor.name}`);
  }

  /**
   * An owned DB is destroyed entirely
   * An injected DB only has this backend's entries cleared
   */
  public async destroy(): Promise<void> {
    this.logger.info(`Destroying ${this.constructor.name}`);
    if (this.dbOwned) {
      await this.db.destroy();
    } else {
      await this.db.clear(this.entriesDbPath);
    }
    this.logger.info(`Destroyed ${this.constructor.name}`);
  }

  @ready(new backendsErrors.ErrorBackendNotRunning())
  public async exists(name: string): Promise<boolean> {
    return (await this.tryRead(name)) != null;
  }

  @ready(new backendsErrors.ErrorBackendNotRunning())
  public async tryRead(name: string): Promise<Buffer | undefined> {
    const keyPath = this.keyPath(name);
    try {
      return await this.db.get(keyPath, true);
    } catch (e) {
      throw new backendsErrors.ErrorBackendRead(name, {
        data: { name },
        cause: e,
      });
    }
  }

  @ready(new backendsErrors.ErrorBackendNotRunning())
  public async write(name: string, content: Buffer): Promise<void> {
    const keyPath = this.keyPath(name);
    try {
      await this.db.put(keyPath, content, true);
    } catch (e) {
      throw new backendsErrors.ErrorBackendWrite(name, {
        data: { name },
        cause: e,
      });
    }
    this.logger.debug(`Wrote ${name}`);
  }

  @ready(new backendsErrors.ErrorBackendNotRunning())
  public async delete(name: string): Promise<void> {
    const keyPath = this.keyPath(name);
    try {
      await withF([this.db.transaction()], async ([tran]) => {
        const content = await tran.get(keyPath, true);
        if (content == null) {
          throw new backendsErrors.ErrorBackendNotFound(name, {
            data: { name },
          });
        }
        await tran.del(keyPath);
      });
    } catch (e) {
      if (e instanceof backendsErrors.ErrorBackendNotFound) {
        throw e;
      }
      throw new backendsErrors.ErrorBackendDelete(name, {
        data: { name },
        cause: e,
      });
    }
    this.logger.debug(`Deleted ${name}`);
  }

  protected keyPath(name: string): LevelPath {
    if (name === '') {
      throw new backendsErrors.ErrorBackendInvalidName(name, {
        data: { name },
      });
    }
    return [...this.entriesDbPath, name];
  }
}

export default DBBackend;
