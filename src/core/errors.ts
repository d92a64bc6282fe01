/**
 * Error taxonomy for memvault
 *
 * Every error raised by the vault, the ensemble or the guard is a VaultError
 * carrying a VaultErrorCode, so callers can branch without matching messages.
 */

import type { AttemptRecord } from './ensemble';

export enum VaultErrorCode {
  /** Ciphertext failed authentication (wrong key or tampered blob) */
  AUTH_FAILED = 'AUTH_FAILED',
  /** An encrypted asset was requested but no vault key is configured */
  MISSING_KEY = 'MISSING_KEY',
  /** Neither representation of the asset exists */
  ASSET_NOT_FOUND = 'ASSET_NOT_FOUND',
  /** Asset name is empty, absolute, or escapes the asset root */
  INVALID_ASSET_NAME = 'INVALID_ASSET_NAME',
  /** Asset decoded but its content is not in the expected format */
  MALFORMED_ASSET = 'MALFORMED_ASSET',
  /** Key material has the wrong length or encoding */
  INVALID_KEY = 'INVALID_KEY',
  /** Every provider in the chain was skipped or failed */
  ENSEMBLE_EXHAUSTED = 'ENSEMBLE_EXHAUSTED',
  /** Failure ceiling reached for the current window */
  RATE_LIMITED = 'RATE_LIMITED',
  /** Attempt arrived before the minimum spacing elapsed */
  TOO_FAST = 'TOO_FAST',
  /** Invalid configuration value */
  CONFIG_ERROR = 'CONFIG_ERROR',
}

export class VaultError extends Error {
  readonly code: VaultErrorCode;

  constructor(code: VaultErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'VaultError';
    this.code = code;
  }
}

export class AuthenticationError extends VaultError {
  constructor(message = 'Ciphertext could not be authenticated', options?: { cause?: unknown }) {
    super(VaultErrorCode.AUTH_FAILED, message, options);
    this.name = 'AuthenticationError';
  }
}

export class MissingKeyError extends VaultError {
  readonly asset: string;

  constructor(asset: string) {
    super(
      VaultErrorCode.MISSING_KEY,
      `Asset "${asset}" is encrypted but no VAULT_KEY is configured`
    );
    this.name = 'MissingKeyError';
    this.asset = asset;
  }
}

export class AssetNotFoundError extends VaultError {
  readonly asset: string;

  constructor(asset: string) {
    super(VaultErrorCode.ASSET_NOT_FOUND, `Asset "${asset}" not found`);
    this.name = 'AssetNotFoundError';
    this.asset = asset;
  }
}

export class EnsembleExhaustedError extends VaultError {
  readonly trace: AttemptRecord[];

  constructor(trace: AttemptRecord[]) {
    const summary = trace
      .map(t => `${t.provider}: ${t.outcome}${t.errorKind ? ` (${t.errorKind})` : ''}`)
      .join('; ');
    super(
      VaultErrorCode.ENSEMBLE_EXHAUSTED,
      `All providers were skipped or failed${summary ? `: ${summary}` : ''}`
    );
    this.name = 'EnsembleExhaustedError';
    this.trace = trace;
  }
}

export type GuardState = 'open' | 'throttled' | 'locked';

/**
 * Base for guard rejections. Carries only the state and a coarse wait,
 * never the ledger's timestamps.
 */
export class GuardRejectionError extends VaultError {
  readonly action: string;
  readonly state: GuardState;
  readonly retryAfterSeconds: number;

  constructor(
    code: VaultErrorCode.RATE_LIMITED | VaultErrorCode.TOO_FAST,
    action: string,
    state: GuardState,
    retryAfterSeconds: number,
    message: string
  ) {
    super(code, message);
    this.name = 'GuardRejectionError';
    this.action = action;
    this.state = state;
    this.retryAfterSeconds = retryAfterSeconds;
  }
}

export class RateLimitedError extends GuardRejectionError {
  constructor(action: string, retryAfterSeconds: number) {
    super(
      VaultErrorCode.RATE_LIMITED,
      action,
      'locked',
      retryAfterSeconds,
      'System locked. Too many attempts. Try again later.'
    );
    this.name = 'RateLimitedError';
  }
}

export class TooFastError extends GuardRejectionError {
  constructor(action: string, retryAfterSeconds: number) {
    super(
      VaultErrorCode.TOO_FAST,
      action,
      'throttled',
      retryAfterSeconds,
      'Too many requests in a row. Slow down.'
    );
    this.name = 'TooFastError';
  }
}
