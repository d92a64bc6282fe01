/**
 * Abuse guard for memvault
 * Enforces request spacing and a failure ceiling per protected action
 *
 * States:
 *   open       attempts allowed
 *   throttled  the previous attempt was less than minIntervalMs ago
 *   locked     failures reached maxFailures inside the current window
 *
 * The window opens at the first failure and lasts windowMs; when it elapses
 * the failure count drops back to zero. Successes never reset it.
 */

import { GuardState, RateLimitedError, TooFastError } from './errors';
import { Ledger, LedgerStore, MemoryLedgerStore } from './ledger';
import { Mutex } from './mutex';
import type { AuditSink } from './audit';

export interface GuardOptions {
  /** Name of the protected action (e.g. "unlock") */
  action: string;
  maxFailures?: number;
  windowMs?: number;
  minIntervalMs?: number;
  store?: LedgerStore;
  now?: () => number;
  audit?: AuditSink;
}

export interface GuardStatus {
  action: string;
  state: GuardState;
  failures: number;
  remainingAttempts: number;
  /** Coarse wait before the state changes; 0 when open */
  retryAfterSeconds: number;
}

export const DEFAULT_MAX_FAILURES = 10;
export const DEFAULT_WINDOW_MS = 60 * 60 * 1000;
export const DEFAULT_MIN_INTERVAL_MS = 500;

export class AbuseGuard {
  readonly action: string;

  private maxFailures: number;
  private windowMs: number;
  private minIntervalMs: number;
  private store: LedgerStore;
  private now: () => number;
  private audit?: AuditSink;
  private mutex = new Mutex();

  constructor(options: GuardOptions) {
    this.action = options.action;
    this.maxFailures = options.maxFailures ?? DEFAULT_MAX_FAILURES;
    this.windowMs = options.windowMs ?? DEFAULT_WINDOW_MS;
    this.minIntervalMs = options.minIntervalMs ?? DEFAULT_MIN_INTERVAL_MS;
    this.store = options.store ?? new MemoryLedgerStore();
    this.now = options.now ?? Date.now;
    this.audit = options.audit;
  }

  /**
   * Run a verification under the guard. A `false` result counts as a
   * failed attempt; a thrown error propagates without being counted.
   *
   * @throws TooFastError when called inside the spacing floor
   * @throws RateLimitedError while locked
   */
  attempt(verify: () => Promise<boolean>): Promise<boolean> {
    return this.guarded(verify, ok => !ok);
  }

  /**
   * Run an action that has no notion of a wrong answer (e.g. an ensemble
   * query). Spacing and lockout apply; nothing is ever counted.
   */
  run<T>(action: () => Promise<T>): Promise<T> {
    return this.guarded(action, () => false);
  }

  status(): GuardStatus {
    const now = this.now();
    const ledger = this.roll(this.store.read(), now);
    const remainingAttempts = Math.max(0, this.maxFailures - ledger.failures);

    if (ledger.failures >= this.maxFailures) {
      return {
        action: this.action,
        state: 'locked',
        failures: ledger.failures,
        remainingAttempts,
        retryAfterSeconds: this.lockRetryAfter(ledger, now),
      };
    }

    if (ledger.lastRequestAt !== null && now - ledger.lastRequestAt < this.minIntervalMs) {
      return {
        action: this.action,
        state: 'throttled',
        failures: ledger.failures,
        remainingAttempts,
        retryAfterSeconds: this.spacingRetryAfter(ledger.lastRequestAt, now),
      };
    }

    return {
      action: this.action,
      state: 'open',
      failures: ledger.failures,
      remainingAttempts,
      retryAfterSeconds: 0,
    };
  }

  private guarded<T>(fn: () => Promise<T>, isFailure: (result: T) => boolean): Promise<T> {
    return this.mutex.runExclusive(async () => {
      const now = this.now();
      const { before, after: ledger } = this.store.update(current => ({
        ...this.roll(current, now),
        lastRequestAt: now,
      }));
      const previous = before.lastRequestAt;

      if (previous !== null && now - previous < this.minIntervalMs) {
        this.audit?.log({ kind: 'guard', action: this.action, outcome: 'too_fast' });
        throw new TooFastError(this.action, this.spacingRetryAfter(previous, now));
      }

      if (ledger.failures >= this.maxFailures) {
        this.audit?.log({ kind: 'guard', action: this.action, outcome: 'rate_limited' });
        throw new RateLimitedError(this.action, this.lockRetryAfter(ledger, now));
      }

      const result = await fn();

      if (isFailure(result)) {
        // Re-read: another guard may have counted a failure meanwhile
        this.store.update(current => {
          const rolled = this.roll(current, now);
          return {
            ...rolled,
            failures: rolled.failures + 1,
            windowStart: rolled.windowStart ?? now,
          };
        });
      }

      return result;
    });
  }

  private roll(ledger: Ledger, now: number): Ledger {
    if (ledger.windowStart !== null && now - ledger.windowStart >= this.windowMs) {
      return { ...ledger, windowStart: null, failures: 0 };
    }
    return ledger;
  }

  /** Rounded up to whole seconds */
  private spacingRetryAfter(lastRequestAt: number, now: number): number {
    return Math.ceil((this.minIntervalMs - (now - lastRequestAt)) / 1000);
  }

  /** Rounded up to whole minutes */
  private lockRetryAfter(ledger: Ledger, now: number): number {
    const start = ledger.windowStart ?? now;
    const remainingMs = Math.max(0, start + this.windowMs - now);
    return Math.max(1, Math.ceil(remainingMs / 60_000)) * 60;
  }
}
