/**
 * Vault codec for memvault
 * Uses Node.js crypto with AES-256-GCM
 *
 * Blob layout: iv (12) + authTag (16) + ciphertext
 */

import crypto from 'crypto';
import { AuthenticationError, VaultError, VaultErrorCode } from './errors';

const ALGORITHM = 'aes-256-gcm';
const IV_LENGTH = 12; // GCM standard
const AUTH_TAG_LENGTH = 16;
const KEY_LENGTH = 32; // 256 bits
const HEADER_LENGTH = IV_LENGTH + AUTH_TAG_LENGTH;

const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;

/**
 * Generate a new vault key (base64, 32 random bytes)
 */
export function generateVaultKey(): string {
  return crypto.randomBytes(KEY_LENGTH).toString('base64');
}

/**
 * Turn a configured VAULT_KEY into key bytes.
 *
 * A base64 string that decodes to exactly 32 bytes is used as-is; anything
 * else is treated as a passphrase and stretched with scrypt.
 */
export function deriveVaultKey(secret: string, salt: string = 'memvault'): Buffer {
  if (!secret) {
    throw new VaultError(VaultErrorCode.INVALID_KEY, 'Vault key must not be empty');
  }

  if (BASE64_PATTERN.test(secret)) {
    const decoded = Buffer.from(secret, 'base64');
    if (decoded.length === KEY_LENGTH) {
      return decoded;
    }
  }

  return crypto.scryptSync(secret, salt, KEY_LENGTH);
}

function assertKey(key: Buffer): void {
  if (key.length !== KEY_LENGTH) {
    throw new VaultError(VaultErrorCode.INVALID_KEY, 'Invalid vault key length');
  }
}

/**
 * Encrypt a blob using AES-256-GCM.
 * A fresh IV is drawn per call, so output is not deterministic.
 */
export function encrypt(plaintext: Buffer, key: Buffer): Buffer {
  assertKey(key);

  const iv = crypto.randomBytes(IV_LENGTH);
  const cipher = crypto.createCipheriv(ALGORITHM, key, iv);

  const encrypted = Buffer.concat([
    cipher.update(plaintext),
    cipher.final()
  ]);

  return Buffer.concat([iv, cipher.getAuthTag(), encrypted]);
}

/**
 * Decrypt a blob produced by encrypt().
 * @throws AuthenticationError on a wrong key, a truncated blob or any tampering
 */
export function decrypt(blob: Buffer, key: Buffer): Buffer {
  assertKey(key);

  if (blob.length < HEADER_LENGTH) {
    throw new AuthenticationError('Ciphertext is truncated');
  }

  const iv = blob.subarray(0, IV_LENGTH);
  const authTag = blob.subarray(IV_LENGTH, HEADER_LENGTH);
  const encrypted = blob.subarray(HEADER_LENGTH);

  try {
    const decipher = crypto.createDecipheriv(ALGORITHM, key, iv);
    decipher.setAuthTag(authTag);

    return Buffer.concat([
      decipher.update(encrypted),
      decipher.final()
    ]);
  } catch (err) {
    throw new AuthenticationError(undefined, { cause: err });
  }
}

/**
 * Hash a string using SHA-256
 */
export function hashString(input: string): string {
  return crypto.createHash('sha256').update(input).digest('hex');
}

/**
 * Compare two hex digests without leaking timing.
 */
export function digestsEqual(a: string, b: string): boolean {
  const left = Buffer.from(a, 'hex');
  const right = Buffer.from(b, 'hex');
  if (left.length !== right.length || left.length === 0) {
    return false;
  }
  return crypto.timingSafeEqual(left, right);
}

/**
 * Generate a cryptographically secure random token
 */
export function generateToken(prefix: string = '', length: number = 32): string {
  const token = crypto.randomBytes(length).toString('hex');
  return prefix ? `${prefix}_${token}` : token;
}
