import type { Backend } from './types';
import type { Data } from '../types';
import * as backendsErrors from './errors';
import * as utils from '../utils';

/**
 * Backend keeping entries in process memory
 * Values are copied in and out
 */
class MemoryBackend implements Backend {
  protected entries: Map<string, Buffer>;

  constructor(entries: Iterable<[string, Data]> = []) {
    this.entries = new Map();
    for (const [name, content] of entries) {
      this.entries.set(name, utils.toBuffer(content));
    }
  }

  public async exists(name: string): Promise<boolean> {
    return this.entries.has(name);
  }

  public async tryRead(name: string): Promise<Buffer | undefined> {
    const content = this.entries.get(name);
    if (content == null) {
      return;
    }
    return Buffer.from(content);
  }

  public async write(name: string, content: Buffer): Promise<void> {
    this.entries.set(name, Buffer.from(content));
  }

  public async delete(name: string): Promise<void> {
    if (!this.entries.delete(name)) {
      throw new backendsErrors.ErrorBackendNotFound(name, {
        data: { name },
      });
    }
  }

  /**
   * Names currently stored, in insertion order
   */
  public names(): Array<string> {
    return [...this.entries.keys()];
  }
}

export default MemoryBackend;
