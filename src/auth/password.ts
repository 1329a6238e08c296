/**
 * Salted password hashing (PBKDF2-HMAC-SHA256).
 *
 * Salt and hash are stored as hex text in the accounts table.
 */

import { pbkdf2, randomBytes, timingSafeEqual } from 'node:crypto';
import { promisify } from 'node:util';

const pbkdf2Async = promisify(pbkdf2);

export const PBKDF2_ITERATIONS = 100_000;
export const HASH_LENGTH_BYTES = 32;
export const SALT_LENGTH_BYTES = 16;
const DIGEST = 'sha256';

export function generateSalt(): Buffer {
  return randomBytes(SALT_LENGTH_BYTES);
}

export async function hashPassword(salt: Buffer, password: string): Promise<Buffer> {
  return pbkdf2Async(password, salt, PBKDF2_ITERATIONS, HASH_LENGTH_BYTES, DIGEST);
}

/**
 * Compare the password, combined with the salt, against the stored hash
 */
export async function verifyPassword(salt: Buffer, expected: Buffer, password: string): Promise<boolean> {
  const actual = await hashPassword(salt, password);

  if (actual.length !== expected.length) {
    return false;
  }

  return timingSafeEqual(actual, expected);
}

/**
 * Decode a hex column into bytes. Throws on anything that is not
 * non-empty, even-length hex text.
 */
export function decodeHex(value: unknown, field: string): Buffer {
  if (typeof value !== 'string' || value.length === 0) {
    throw new Error(`${field} is missing`);
  }

  if (value.length % 2 !== 0 || !/^[0-9a-fA-F]+$/.test(value)) {
    throw new Error(`${field} is not valid hex`);
  }

  return Buffer.from(value, 'hex');
}

export interface StoredCredential {
  passwordHex: string;
  saltHex: string;
}

export async function createCredential(password: string): Promise<StoredCredential> {
  const salt = generateSalt();
  const hash = await hashPassword(salt, password);

  return {
    passwordHex: hash.toString('hex'),
    saltHex: salt.toString('hex'),
  };
}
