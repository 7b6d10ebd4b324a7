import type { Backend } from './types';
import fs from 'fs';
import pathNode from 'path';
import Logger from '@matrixai/logger';
import {
  CreateDestroyStartStop,
  ready,
} from '@matrixai/async-init/dist/CreateDestroyStartStop';
import * as backendsUtils from './utils';
import * as backendsErrors from './errors';
import * as utils from '../utils';

/**
 * Backend storing one file per entry in a local directory
 * Writes land in a temporary file that is renamed into place
 */
interface LocalBackend extends CreateDestroyStartStop {}
@CreateDestroyStartStop(
  new backendsErrors.ErrorBackendRunning(),
  new backendsErrors.ErrorBackendDestroyed(),
)
class LocalBackend implements Backend {
  public static async createLocalBackend({
    path,
    logger = new Logger(this.name),
    fresh = false,
  }: {
    path: string;
    logger?: Logger;
    fresh?: boolean;
  }): Promise<LocalBackend> {
    logger.info(`Creating ${this.name}`);
    const backend = new LocalBackend({ path, logger });
    await backend.start({ fresh });
    logger.info(`Created ${this.name}`);
    return backend;
  }

  public readonly path: string;

  protected logger: Logger;

  constructor({ path, logger }: { path: string; logger: Logger }) {
    this.path = path;
    this.logger = logger;
  }

  public async start({
    fresh = false,
  }: {
    fresh?: boolean;
  } = {}): Promise<void> {
    this.logger.info(`Starting ${this.constructor.name}`);
    if (fresh) {
      await fs.promises.rm(this.path, { force: true, recursive: true });
    }
    await fs.promises.mkdir(this.path, { recursive: true });
    this.logger.info(`Started ${this.constructor.name}`);
  }

  public async stop(): Promise<void> {
    this.logger.info(`Stopping ${this.constructor.name}`);
    this.logger.info(`Stopped ${this.constructor.name}`);
  }

  public async destroy(): Promise<void> {
    this.logger.info(`Destroying ${this.constructor.name}`);
    await fs.promises.rm(this.path, { force: true, recursive: true });
    this.logger.info(`Destroyed ${this.constructor.name}`);
  }

  @ready(new backendsErrors.ErrorBackendNotRunning())
  public async exists(name: string): Promise<boolean> {
    const path = this.resolvePath(name);
    try {
      const stat = await fs.promises.stat(path);
      return stat.isFile();
    } catch (e) {
      if (backendsUtils.isErrnoException(e) && e.code === 'ENOENT') {
        return false;
      }
      throw new backendsErrors.ErrorBackendRead(name, {
        data: { name, path },
        cause: e,
      });
    }
  }

  @ready(new backendsErrors.ErrorBackendNotRunning())
  public async tryRead(name: string): Promise<Buffer | undefined> {
    const path = this.resolvePath(name);
    try {
      return await fs.promises.readFile(path);
    } catch (e) {
      if (backendsUtils.isErrnoException(e) && e.code === 'ENOENT') {
        return;
      }
      throw new backendsErrors.ErrorBackendRead(name, {
        data: { name, path },
        cause: e,
      });
    }
  }

  @ready(new backendsErrors.ErrorBackendNotRunning())
  public async write(name: string, content: Buffer): Promise<void> {
    const path = this.resolvePath(name);
    const tmpPath = pathNode.join(
      this.path,
      backendsUtils.tmpPrefix + utils.getRandomBytesSync(8).toString('hex'),
    );
    try {
      await fs.promises.writeFile(tmpPath, content);
      await fs.promises.rename(tmpPath, path);
    } catch (e) {
      await fs.promises.rm(tmpPath, { force: true }).catch((e_) => {
        this.logger.warn(
          `Failed to remove temporary file ${tmpPath}: ${String(e_)}`,
        );
      });
      throw new backendsErrors.ErrorBackendWrite(name, {
        data: { name, path },
        cause: e,
      });
    }
    this.logger.debug(`Wrote ${name}`);
  }

  @ready(new backendsErrors.ErrorBackendNotRunning())
  public async delete(name: string): Promise<void> {
    const path = this.resolvePath(name);
    try {
      await fs.promises.unlink(path);
    } catch (e) {
      if (backendsUtils.isErrnoException(e) && e.code === 'ENOENT') {
        throw new backendsErrors.ErrorBackendNotFound(name, {
          data: { name, path },
          cause: e,
        });
      }
      throw new backendsErrors.ErrorBackendDelete(name, {
        data: { name, path },
        cause: e,
      });
    }
    this.logger.debug(`Deleted ${name}`);
  }

  /**
   * Names of the stored entries sorted by name
   */
  @ready(new backendsErrors.ErrorBackendNotRunning())
  public async names(): Promise<Array<string>> {
    const dirents = await fs.promises.readdir(this.path, {
      withFileTypes: true,
    });
    return dirents
      .filter((d) => d.isFile() && backendsUtils.isValidName(d.name))
      .map((d) => d.name)
      .sort();
  }

  protected resolvePath(name: string): string {
    if (!backendsUtils.isValidName(name)) {
      throw new backendsErrors.ErrorBackendInvalidName(name, {
        data: { name },
      });
    }
    return pathNode.join(this.path, name);
  }
}

export default LocalBackend;
