/**
 * memvault library surface
 *
 * Usage:
 *   import { loadConfig, createMemvault } from 'memvault';
 *
 *   const vault = createMemvault(await loadConfig());
 *   if (await vault.unlock(code)) {
 *     const memories = await vault.assets.loadJson('assets/memories.json');
 *     const reply = await vault.ask({ prompt, context: { responseFormat: 'json' } });
 *   }
 */

export { createMemvault } from './memvault';
export type { Memvault, MemvaultOptions, GuardedAction } from './memvault';

export { loadConfig, getConfigDir, DEFAULT_CHAIN } from './config';
export type { AppConfig, ChainEntryConfig, MemvaultYAMLConfig, RateLimitConfig } from './config';

export { encrypt, decrypt, deriveVaultKey, generateVaultKey, hashString } from './core/crypto';
export { AssetLoader, validateAssetName, ENCRYPTED_SUFFIX, DEFAULT_TAIL_CHARS } from './core/assets';
export type { AssetLoaderOptions, ResolvedAsset, Representation } from './core/assets';
export { sealAssets, findSealCandidates, DEFAULT_SEAL_EXTENSIONS } from './core/seal';
export type { SealOptions, SealResult } from './core/seal';

export { LLMEnsemble, DEFAULT_TIMEOUT_MS } from './core/ensemble';
export type {
  AttemptOutcome,
  AttemptRecord,
  EnsembleOptions,
  EnsembleRequest,
  EnsembleResult,
} from './core/ensemble';

export { AbuseGuard } from './core/guard';
export type { GuardOptions, GuardStatus } from './core/guard';
export { MemoryLedgerStore, FileLedgerStore, emptyLedger } from './core/ledger';
export type { Ledger, LedgerStore, LedgerUpdate } from './core/ledger';
export { UnlockGate, normalizeAccessCode, hashAccessCode } from './core/unlock';

export { AuditLogger } from './core/audit';
export type { AuditEvent, AuditInput, AuditKind, AuditSink } from './core/audit';

export {
  VaultError,
  VaultErrorCode,
  AuthenticationError,
  MissingKeyError,
  AssetNotFoundError,
  EnsembleExhaustedError,
  GuardRejectionError,
  RateLimitedError,
  TooFastError,
} from './core/errors';
export type { GuardState } from './core/errors';

export * from './llm';
export * from './secrets';
