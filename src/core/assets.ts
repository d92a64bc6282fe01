/**
 * Asset loader for memvault
 *
 * A logical asset "X" may exist as plaintext at <root>/X and as ciphertext
 * at <root>/X.enc. Exactly one representation is read per load:
 *
 *   default            plaintext wins; ciphertext only when no plaintext
 *   requireEncrypted   plaintext is ignored; only ciphertext counts
 */

import fs from 'fs';
import path from 'path';
import { decrypt } from './crypto';
import {
  AssetNotFoundError,
  MissingKeyError,
  VaultError,
  VaultErrorCode,
} from './errors';
import type { AuditSink } from './audit';

export const ENCRYPTED_SUFFIX = '.enc';

/** The chat-history view reads only this many trailing characters */
export const DEFAULT_TAIL_CHARS = 15_000;

const MAX_ASSET_NAME_LENGTH = 1024;

export type Representation = 'plaintext' | 'encrypted';

export interface ResolvedAsset {
  representation: Representation;
  path: string;
}

export interface AssetLoaderOptions {
  /** Directory asset names are resolved against */
  root: string;
  /** Vault key; null when VAULT_KEY is not configured */
  key: Buffer | null;
  /** Ignore plaintext files entirely */
  requireEncrypted?: boolean;
  audit?: AuditSink;
}

/**
 * Validate an asset name.
 * Rejects empty, absolute and traversing names.
 */
export function validateAssetName(name: string): void {
  if (!name) {
    throw new VaultError(VaultErrorCode.INVALID_ASSET_NAME, 'Asset name must not be empty');
  }

  if (name.length > MAX_ASSET_NAME_LENGTH) {
    throw new VaultError(
      VaultErrorCode.INVALID_ASSET_NAME,
      `Asset name exceeds maximum length of ${MAX_ASSET_NAME_LENGTH} characters`
    );
  }

  if (name.startsWith('/') || /^[A-Za-z]:/.test(name)) {
    throw new VaultError(
      VaultErrorCode.INVALID_ASSET_NAME,
      `Asset name must be relative, got: "${name}"`
    );
  }

  if (name.split(/[/\\]/).includes('..')) {
    throw new VaultError(
      VaultErrorCode.INVALID_ASSET_NAME,
      `Asset name must not contain ".." segments: "${name}"`
    );
  }
}

export class AssetLoader {
  private root: string;
  private key: Buffer | null;
  private requireEncrypted: boolean;
  private audit?: AuditSink;

  constructor(options: AssetLoaderOptions) {
    this.root = path.resolve(options.root);
    this.key = options.key;
    this.requireEncrypted = options.requireEncrypted ?? false;
    this.audit = options.audit;
  }

  /**
   * Which representation load() would read, or null if there is none.
   */
  resolve(name: string): ResolvedAsset | null {
    const plainPath = this.resolvePath(name);
    const encryptedPath = plainPath + ENCRYPTED_SUFFIX;

    if (!this.requireEncrypted && isFile(plainPath)) {
      return { representation: 'plaintext', path: plainPath };
    }

    if (isFile(encryptedPath)) {
      return { representation: 'encrypted', path: encryptedPath };
    }

    return null;
  }

  /**
   * Load an asset's bytes.
   * @throws AssetNotFoundError when no representation exists
   * @throws MissingKeyError when the ciphertext is chosen but no key is set
   * @throws AuthenticationError when the ciphertext fails to decrypt
   */
  async load(name: string): Promise<Buffer> {
    const resolved = this.resolve(name);

    if (!resolved) {
      this.audit?.log({ kind: 'asset', asset: name, outcome: 'not_found' });
      throw new AssetNotFoundError(name);
    }

    if (resolved.representation === 'plaintext') {
      this.audit?.log({ kind: 'asset', asset: name, outcome: 'plaintext' });
      return fs.readFileSync(resolved.path);
    }

    if (!this.key) {
      this.audit?.log({ kind: 'asset', asset: name, outcome: 'missing_key' });
      throw new MissingKeyError(name);
    }

    const blob = fs.readFileSync(resolved.path);
    let plaintext: Buffer;
    try {
      plaintext = decrypt(blob, this.key);
    } catch (err) {
      this.audit?.log({ kind: 'asset', asset: name, outcome: 'auth_failed' });
      throw err;
    }
    this.audit?.log({ kind: 'asset', asset: name, outcome: 'decrypted' });
    return plaintext;
  }

  async loadText(name: string): Promise<string> {
    return (await this.load(name)).toString('utf8');
  }

  async loadJson<T = unknown>(name: string): Promise<T> {
    const text = await this.loadText(name);
    try {
      return JSON.parse(text) as T;
    } catch (err) {
      throw new VaultError(
        VaultErrorCode.MALFORMED_ASSET,
        `Asset "${name}" is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err }
      );
    }
  }

  /**
   * Last `maxChars` characters of a text asset (whole text if shorter).
   */
  async loadTail(name: string, maxChars: number = DEFAULT_TAIL_CHARS): Promise<string> {
    const chars = Array.from(await this.loadText(name));
    return chars.length > maxChars ? chars.slice(chars.length - maxChars).join('') : chars.join('');
  }

  /**
   * Resolve an asset name to a path inside the root.
   */
  private resolvePath(name: string): string {
    validateAssetName(name);

    const resolved = path.resolve(this.root, name);
    const rootWithSep = this.root.endsWith(path.sep) ? this.root : this.root + path.sep;

    if (!resolved.startsWith(rootWithSep)) {
      throw new VaultError(
        VaultErrorCode.INVALID_ASSET_NAME,
        `Asset "${name}" resolves outside the asset root`
      );
    }

    return resolved;
  }
}

function isFile(filePath: string): boolean {
  return fs.existsSync(filePath) && fs.statSync(filePath).isFile();
}
