import type { Data, Result } from './types';
import { random, cipher, util as forgeUtil } from 'node-forge';

const ivSize = 16;
const authTagSize = 16;

/**
 * Copies the Node Buffer into a new ArrayBuffer
 */
function toArrayBuffer(b: Buffer): ArrayBuffer {
  const ab = new ArrayBuffer(b.byteLength);
  new Uint8Array(ab).set(b);
  return ab;
}

/**
 * Wraps ArrayBuffer in Node Buffer with zero copy
 */
function fromArrayBuffer(
  b: ArrayBuffer,
  offset?: number,
  length?: number,
): Buffer {
  return Buffer.from(b, offset, length);
}

/**
 * Normalises staged content into an owned Buffer
 * Buffers are copied
 */
function toBuffer(data: Data): Buffer {
  if (typeof data === 'string') {
    return Buffer.from(data, 'utf-8');
  }
  return Buffer.from(data);
}

function getRandomBytesSync(size: number): Buffer {
  return Buffer.from(random.getBytesSync(size), 'binary');
}

function generateKeySync(bits: 128 | 192 | 256 = 256): Buffer {
  if (![128, 192, 256].includes(bits)) {
    throw new RangeError('AES only allows 128, 192, 256 bit sizes');
  }
  const len = Math.floor(bits / 8);
  return getRandomBytesSync(len);
}

function encryptWithKey(key: Buffer, plainText: Buffer): Buffer {
  const iv = getRandomBytesSync(ivSize);
  const c = cipher.createCipher('AES-GCM', key.toString('binary'));
  c.start({ iv: iv.toString('binary'), tagLength: authTagSize * 8 });
  c.update(forgeUtil.createBuffer(plainText));
  c.finish();
  const cipherText = Buffer.from(c.output.getBytes(), 'binary');
  const authTag = Buffer.from(c.mode.tag.getBytes(), 'binary');
  return Buffer.concat([iv, authTag, cipherText]);
}

function decryptWithKey(key: Buffer, cipherText: Buffer): Buffer | undefined {
  if (cipherText.length < ivSize + authTagSize) {
    return;
  }
  const iv = cipherText.subarray(0, ivSize);
  const authTag = cipherText.subarray(ivSize, ivSize + authTagSize);
  const cipherText_ = cipherText.subarray(ivSize + authTagSize);
  const d = cipher.createDecipher('AES-GCM', key.toString('binary'));
  d.start({
    iv: iv.toString('binary'),
    tagLength: authTagSize * 8,
    tag: forgeUtil.createBuffer(authTag),
  });
  d.update(forgeUtil.createBuffer(cipherText_));
  if (!d.finish()) {
    return;
  }
  return Buffer.from(d.output.getBytes(), 'binary');
}

/**
 * Encryption operation handed to the DB as its crypto ops
 */
async function encrypt(
  key: ArrayBuffer,
  plainText: ArrayBuffer,
): Promise<ArrayBuffer> {
  return toArrayBuffer(
    encryptWithKey(fromArrayBuffer(key), fromArrayBuffer(plainText)),
  );
}

/**
 * Decryption operation handed to the DB as its crypto ops
 */
async function decrypt(
  key: ArrayBuffer,
  cipherText: ArrayBuffer,
): Promise<ArrayBuffer | undefined> {
  const plainText = decryptWithKey(
    fromArrayBuffer(key),
    fromArrayBuffer(cipherText),
  );
  if (plainText == null) {
    return;
  }
  return toArrayBuffer(plainText);
}

function success<T>(value: T): { type: 'success'; value: T } {
  return { type: 'success', value };
}

function failure<E extends Error>(error: E): { type: 'failure'; error: E } {
  return { type: 'failure', error };
}

/**
 * Extracts the value of a result, throwing the error of a failure
 */
function unwrap<T, E extends Error>(result: Result<T, E>): T {
  if (result.type === 'failure') {
    throw result.error;
  }
  return result.value;
}

export {
  ivSize,
  authTagSize,
  toArrayBuffer,
  fromArrayBuffer,
  toBuffer,
  getRandomBytesSync,
  generateKeySync,
  encryptWithKey,
  decryptWithKey,
  encrypt,
  decrypt,
  success,
  failure,
  unwrap,
};
