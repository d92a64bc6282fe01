/**
 * Asset sealing
 * Writes an encrypted X.enc beside every private asset X so the
 * ciphertext can be committed while the plaintext stays ignored.
 */

import fs from 'fs';
import path from 'path';
import { encrypt } from './crypto';
import { ENCRYPTED_SUFFIX } from './assets';

export const DEFAULT_SEAL_EXTENSIONS = ['.jpg', '.jpeg', '.png', '.mp4', '.mov', '.json', '.txt'];

export interface SealOptions {
  root: string;
  key: Buffer;
  /** Restrict sealing to these paths (relative to root); default: walk root */
  files?: string[];
  extensions?: string[];
}

export interface SealResult {
  sealed: string[];
  failed: Array<{ file: string; error: string }>;
}

/**
 * Files under root that would be sealed. Skips ciphertext and
 * anything with "example" in its name.
 */
export function findSealCandidates(
  root: string,
  extensions: string[] = DEFAULT_SEAL_EXTENSIONS
): string[] {
  const resolvedRoot = path.resolve(root);
  if (!fs.existsSync(resolvedRoot)) {
    return [];
  }

  const wanted = extensions.map(e => e.toLowerCase());

  return walkDir(resolvedRoot)
    .filter(file => {
      const base = path.basename(file);
      if (base.endsWith(ENCRYPTED_SUFFIX) || base.includes('example')) {
        return false;
      }
      return wanted.includes(path.extname(base).toLowerCase());
    })
    .map(file => path.relative(resolvedRoot, file))
    .sort();
}

export function sealAssets(options: SealOptions): SealResult {
  const root = path.resolve(options.root);
  const files = options.files ?? findSealCandidates(root, options.extensions);
  const result: SealResult = { sealed: [], failed: [] };

  for (const file of files) {
    const source = path.resolve(root, file);
    try {
      const blob = encrypt(fs.readFileSync(source), options.key);
      fs.writeFileSync(source + ENCRYPTED_SUFFIX, blob);
      result.sealed.push(file);
    } catch (err) {
      result.failed.push({ file, error: err instanceof Error ? err.message : String(err) });
    }
  }

  return result;
}

function walkDir(dir: string): string[] {
  const results: string[] = [];

  for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      if (entry.name === 'node_modules' || entry.name.startsWith('.')) continue;
      results.push(...walkDir(fullPath));
    } else if (entry.isFile()) {
      results.push(fullPath);
    }
  }

  return results;
}
