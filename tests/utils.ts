import type { Backend } from '@/backends';
import type { Result } from '@/types';
import { MemoryBackend } from '@/backends';

type BackendOperation = 'exists' | 'tryRead' | 'write' | 'delete';

type BackendCall = {
  op: BackendOperation;
  name: string;
};

/**
 * Memory backend that records every call and fails on demand
 */
class TestBackend implements Backend {
  public readonly inner: MemoryBackend;
  public calls: Array<BackendCall> = [];
  protected mutationCount: number = 0;
  protected failingMutation?: number;
  protected failingCalls: Set<string> = new Set();

  constructor(inner: MemoryBackend = new MemoryBackend()) {
    this.inner = inner;
  }

  /**
   * Fails the k-th write or delete from now on, counting from 1
   */
  public failMutation(k: number): void {
    this.mutationCount = 0;
    this.failingMutation = k;
  }

  /**
   * Fails every call of `op` on `name`
   */
  public failCall(op: BackendOperation, name: string): void {
    this.failingCalls.add(`${op}:${name}`);
  }

  public reset(): void {
    this.calls = [];
    this.mutationCount = 0;
    this.failingMutation = undefined;
    this.failingCalls.clear();
  }

  public callsFor(name: string): Array<BackendCall> {
    return this.calls.filter((c) => c.name === name);
  }

  public async exists(name: string): Promise<boolean> {
    this.record('exists', name);
    return this.inner.exists(name);
  }

  public async tryRead(name: string): Promise<Buffer | undefined> {
    this.record('tryRead', name);
    return this.inner.tryRead(name);
  }

  public async write(name: string, content: Buffer): Promise<void> {
    this.record('write', name);
    return this.inner.write(name, content);
  }

  public async delete(name: string): Promise<void> {
    this.record('delete', name);
    return this.inner.delete(name);
  }

  protected record(op: BackendOperation, name: string): void {
    this.calls.push({ op, name });
    if (this.failingCalls.has(`${op}:${name}`)) {
      throw new Error(`injected ${op} failure on ${name}`);
    }
    if (op === 'write' || op === 'delete') {
      this.mutationCount++;
      if (this.mutationCount === this.failingMutation) {
        throw new Error(`injected ${op} failure on ${name}`);
      }
    }
  }
}

/**
 * Snapshot of a memory backend as name to UTF-8 content
 */
async function snapshot(
  backend: MemoryBackend,
): Promise<Record<string, string>> {
  const entries: Record<string, string> = {};
  for (const name of backend.names()) {
    const content = await backend.tryRead(name);
    if (content != null) {
      entries[name] = content.toString('utf-8');
    }
  }
  return entries;
}

async function sleep(ms: number): Promise<void> {
  return await new Promise<void>((r) => setTimeout(r, ms));
}

/**
 * Narrows a result to its failure
 */
function expectFailure<T, E extends Error>(result: Result<T, E>): E {
  expect(result.type).toBe('failure');
  if (result.type === 'success') throw Error('never'); // Let typescript know the type
  return result.error;
}

export { TestBackend, snapshot, expectFailure, sleep };

export type { BackendOperation, BackendCall };
