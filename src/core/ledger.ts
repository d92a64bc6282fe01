/**
 * Rate-limit ledgers
 * Hold the failure count and timing of one protected action
 */

import fs from 'fs';
import path from 'path';
import { VaultError, VaultErrorCode } from './errors';

export interface Ledger {
  /** Epoch ms of the first failure in the current window, or null */
  windowStart: number | null;
  failures: number;
  /** Epoch ms of the last attempt, accepted or not */
  lastRequestAt: number | null;
}

export function emptyLedger(): Ledger {
  return { windowStart: null, failures: 0, lastRequestAt: null };
}

export interface LedgerUpdate {
  before: Ledger;
  after: Ledger;
}

/**
 * Storage for a guard's ledger. `update` re-reads and writes as one step,
 * so stores shared between guards or processes never lose a write.
 */
export interface LedgerStore {
  read(): Ledger;
  write(ledger: Ledger): void;
  update(mutate: (current: Ledger) => Ledger): LedgerUpdate;
}

export class MemoryLedgerStore implements LedgerStore {
  private ledger: Ledger;

  constructor(initial: Ledger = emptyLedger()) {
    this.ledger = { ...initial };
  }

  read(): Ledger {
    return { ...this.ledger };
  }

  write(ledger: Ledger): void {
    this.ledger = { ...ledger };
  }

  update(mutate: (current: Ledger) => Ledger): LedgerUpdate {
    const before = this.read();
    const after = { ...mutate(this.read()) };
    this.ledger = { ...after };
    return { before, after };
  }
}

const LOCK_RETRY_MS = 10;
const LOCK_TIMEOUT_MS = 2000;
/** A lock older than this belongs to a process that died holding it */
const LOCK_STALE_MS = 10_000;

/**
 * JSON-file ledger so lockouts survive restarts of short-lived processes
 * such as the CLI. One file holds the ledgers of every action.
 *
 * Writes happen under `<file>.lock`, taken with an exclusive create, and
 * land through a temp file and rename.
 */
export class FileLedgerStore implements LedgerStore {
  private persistFile: string;
  private action: string;

  constructor(persistFile: string, action: string) {
    this.persistFile = persistFile;
    this.action = action;
  }

  read(): Ledger {
    const entry = this.readAll()[this.action];
    return entry ? { ...entry } : emptyLedger();
  }

  write(ledger: Ledger): void {
    this.update(() => ledger);
  }

  update(mutate: (current: Ledger) => Ledger): LedgerUpdate {
    this.ensureDir();
    return this.withLock(() => {
      const all = this.readAll();
      const entry = all[this.action];
      const before = entry ? { ...entry } : emptyLedger();
      const after = { ...mutate({ ...before }) };
      all[this.action] = after;
      this.persist(all);
      return { before, after };
    });
  }

  private ensureDir(): void {
    const dir = path.dirname(this.persistFile);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
    }
  }

  private persist(all: Record<string, Ledger>): void {
    const tmpFile = `${this.persistFile}.${process.pid}.tmp`;
    fs.writeFileSync(tmpFile, JSON.stringify(all, null, 2), { mode: 0o600 });
    fs.renameSync(tmpFile, this.persistFile);
  }

  private withLock<T>(fn: () => T): T {
    const lockFile = `${this.persistFile}.lock`;
    const deadline = Date.now() + LOCK_TIMEOUT_MS;
    let fd: number | undefined;

    while (fd === undefined) {
      try {
        fd = fs.openSync(lockFile, 'wx', 0o600);
      } catch (error) {
        if (!isErrno(error, 'EEXIST')) {
          throw error;
        }
        if (isStale(lockFile)) {
          fs.rmSync(lockFile, { force: true });
          continue;
        }
        if (Date.now() >= deadline) {
          throw new VaultError(
            VaultErrorCode.CONFIG_ERROR,
            `Timed out waiting for rate-limit ledger lock ${lockFile}`
          );
        }
        sleepSync(LOCK_RETRY_MS);
      }
    }

    try {
      return fn();
    } finally {
      fs.closeSync(fd);
      fs.rmSync(lockFile, { force: true });
    }
  }

  private readAll(): Record<string, Ledger> {
    if (!fs.existsSync(this.persistFile)) {
      return {};
    }

    try {
      const parsed: unknown = JSON.parse(fs.readFileSync(this.persistFile, 'utf8'));
      const result: Record<string, Ledger> = {};
      if (parsed && typeof parsed === 'object' && !Array.isArray(parsed)) {
        for (const [action, value] of Object.entries(parsed)) {
          const ledger = toLedger(value);
          if (ledger) {
            result[action] = ledger;
          }
        }
      }
      return result;
    } catch (error) {
      console.error('Warning: Failed to load rate-limit ledger:', error);
      return {};
    }
  }
}

function toLedger(value: unknown): Ledger | null {
  if (!value || typeof value !== 'object') {
    return null;
  }
  const record = value as Record<string, unknown>;
  const failures = record.failures;
  if (typeof failures !== 'number' || !Number.isFinite(failures) || failures < 0) {
    return null;
  }
  return {
    failures,
    windowStart: typeof record.windowStart === 'number' ? record.windowStart : null,
    lastRequestAt: typeof record.lastRequestAt === 'number' ? record.lastRequestAt : null,
  };
}

function isErrno(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

function isStale(lockFile: string): boolean {
  try {
    return Date.now() - fs.statSync(lockFile).mtimeMs > LOCK_STALE_MS;
  } catch (error) {
    // Released between our create attempt and the stat
    if (isErrno(error, 'ENOENT')) {
      return false;
    }
    throw error;
  }
}

function sleepSync(ms: number): void {
  Atomics.wait(new Int32Array(new SharedArrayBuffer(4)), 0, 0, ms);
}
