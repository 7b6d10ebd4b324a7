import * as utils from '@/utils';
import * as errors from '@/errors';

describe('utils', () => {
  test('strings are staged as utf-8', () => {
    expect(utils.toBuffer('héllo')).toEqual(
      Buffer.from([104, 195, 169, 108, 108, 111]),
    );
  });
  test('buffers are copied', () => {
    const input = Buffer.from('abc');
    const output = utils.toBuffer(input);
    expect(output.equals(input)).toBe(true);
    input[0] = 0;
    expect(output.toString()).toBe('abc');
  });
  test('array buffer conversion copies the viewed bytes only', () => {
    const b = Buffer.from('xxabcxx').subarray(2, 5);
    const ab = utils.toArrayBuffer(b);
    expect(ab.byteLength).toBe(3);
    expect(utils.fromArrayBuffer(ab).toString()).toBe('abc');
  });
  test('encryption and decryption', async () => {
    const key = utils.generateKeySync(256);
    const plainText = Buffer.from('hello world', 'utf-8');
    const cipherText = utils.encryptWithKey(key, plainText);
    expect(cipherText.length).toBe(
      utils.ivSize + utils.authTagSize + plainText.length,
    );
    expect(utils.decryptWithKey(key, cipherText)).toEqual(plainText);
    const cipherText_ = await utils.encrypt(
      utils.toArrayBuffer(key),
      utils.toArrayBuffer(plainText),
    );
    const plainText_ = await utils.decrypt(
      utils.toArrayBuffer(key),
      cipherText_,
    );
    expect(plainText_).toBeDefined();
    if (plainText_ != null) {
      expect(utils.fromArrayBuffer(plainText_).toString()).toBe('hello world');
    }
  });
  test('decryption fails with the wrong key', () => {
    const cipherText = utils.encryptWithKey(
      utils.generateKeySync(256),
      Buffer.from('hello world'),
    );
    expect(
      utils.decryptWithKey(utils.generateKeySync(256), cipherText),
    ).toBeUndefined();
    expect(
      utils.decryptWithKey(utils.generateKeySync(256), Buffer.alloc(10)),
    ).toBeUndefined();
  });
  test('empty plain text round trips', () => {
    const key = utils.generateKeySync(128);
    const cipherText = utils.encryptWithKey(key, Buffer.alloc(0));
    expect(utils.decryptWithKey(key, cipherText)).toEqual(Buffer.alloc(0));
  });
  test('unwrap returns the value or throws the error', () => {
    expect(utils.unwrap(utils.success(42))).toBe(42);
    const error = new errors.ErrorUnitOfWorkNotFound('file1');
    expect(() => utils.unwrap(utils.failure(error))).toThrow(error);
  });
});
