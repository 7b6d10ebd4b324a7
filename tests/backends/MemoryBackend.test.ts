import { MemoryBackend } from '@/backends';
import * as backendsErrors from '@/backends/errors';

describe(MemoryBackend.name, () => {
  test('write then read and check existence', async () => {
    const backend = new MemoryBackend();
    expect(await backend.exists('a')).toBeFalse();
    expect(await backend.tryRead('a')).toBeUndefined();
    await backend.write('a', Buffer.from('value'));
    expect(await backend.exists('a')).toBeTrue();
    expect((await backend.tryRead('a'))?.toString()).toBe('value');
  });
  test('write overwrites existing entries', async () => {
    const backend = new MemoryBackend([['a', 'first']]);
    await backend.write('a', Buffer.from('second'));
    expect((await backend.tryRead('a'))?.toString()).toBe('second');
    expect(backend.names()).toEqual(['a']);
  });
  test('delete removes entries', async () => {
    const backend = new MemoryBackend([
      ['a', 'value'],
      ['b', 'value'],
    ]);
    await backend.delete('a');
    expect(await backend.exists('a')).toBeFalse();
    expect(backend.names()).toIncludeSameMembers(['b']);
  });
  test('delete of a missing entry rejects', async () => {
    const backend = new MemoryBackend();
    await expect(backend.delete('a')).rejects.toThrow(
      backendsErrors.ErrorBackendNotFound,
    );
  });
  test('stored values are isolated from callers', async () => {
    const backend = new MemoryBackend();
    const value = Buffer.from('abc');
    await backend.write('a', value);
    value[0] = 'x'.charCodeAt(0);
    const read = await backend.tryRead('a');
    expect(read?.toString()).toBe('abc');
    if (read != null) read[1] = 'y'.charCodeAt(0);
    expect((await backend.tryRead('a'))?.toString()).toBe('abc');
  });
});
