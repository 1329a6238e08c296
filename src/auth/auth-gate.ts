/**
 * Checks dashboard credentials against the accounts table
 */

import { decodeHex, verifyPassword } from './password.js';
import { toError } from '../errors/index.js';

export interface AccountRecord {
  username: string;
  password: string | null;
  misc: string | null;
}

export interface AccountLookup {
  queryAccount(username: string): AccountRecord | undefined;
}

export type PasswordVerifier = (salt: Buffer, expected: Buffer, password: string) => Promise<boolean>;

export class AuthGate {
  constructor(
    private accounts: AccountLookup,
    private verify: PasswordVerifier = verifyPassword
  ) {}

  /**
   * Returns true only when the account exists, its stored salt and hash
   * decode cleanly and the verifier accepts the password.
   */
  async authorize(username: string, password: string): Promise<boolean> {
    const account = this.accounts.queryAccount(username);
    if (!account) {
      return false;
    }

    let salt: Buffer;
    let expected: Buffer;
    try {
      salt = decodeHex(account.misc, 'salt');
      expected = decodeHex(account.password, 'password hash');
    } catch (error) {
      console.warn(`Stored credential for account "${username}" is malformed:`, toError(error).message);
      return false;
    }

    return this.verify(salt, expected, password);
  }
}
