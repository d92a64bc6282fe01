/**
 * Wires the vault, the ensemble and the guards from one AppConfig.
 *
 * Every entry point reachable by an untrusted caller goes through a guard:
 *   unlock()     "unlock" guard, wrong codes count toward lockout
 *   ask()        "query" guard, spacing and lockout only
 *   openAsset()  "asset" guard, spacing and lockout only
 */

import { AppConfig, getAuditDir } from './config';
import { AssetLoader } from './core/assets';
import { AuditLogger, AuditSink } from './core/audit';
import { EnsembleRequest, EnsembleResult, LLMEnsemble } from './core/ensemble';
import { AbuseGuard } from './core/guard';
import { FileLedgerStore, LedgerStore, MemoryLedgerStore } from './core/ledger';
import { UnlockGate } from './core/unlock';
import { buildProviders } from './llm';
import { FetchFn } from './llm/http';

export type GuardedAction = 'unlock' | 'query' | 'asset';

export interface MemvaultOptions {
  fetchFn?: FetchFn;
  now?: () => number;
  /** Defaults to an AuditLogger under <home>/logs; null disables auditing */
  audit?: AuditSink | null;
  /** Persist guard ledgers to this JSON file instead of memory */
  ledgerFile?: string;
}

export interface Memvault {
  config: AppConfig;
  assets: AssetLoader;
  ensemble: LLMEnsemble;
  gate: UnlockGate;
  guards: Record<GuardedAction, AbuseGuard>;
  unlock(code: string): Promise<boolean>;
  ask(request: EnsembleRequest): Promise<EnsembleResult>;
  openAsset(name: string): Promise<Buffer>;
}

export function createMemvault(config: AppConfig, options: MemvaultOptions = {}): Memvault {
  const audit = options.audit === undefined
    ? new AuditLogger(getAuditDir(config.home))
    : options.audit ?? undefined;

  const storeFor = (action: GuardedAction): LedgerStore =>
    options.ledgerFile ? new FileLedgerStore(options.ledgerFile, action) : new MemoryLedgerStore();

  const guardFor = (action: GuardedAction): AbuseGuard =>
    new AbuseGuard({
      action,
      maxFailures: config.rateLimit.maxFailures,
      windowMs: config.rateLimit.windowMs,
      minIntervalMs: config.rateLimit.minIntervalMs,
      store: storeFor(action),
      now: options.now,
      audit,
    });

  const guards: Record<GuardedAction, AbuseGuard> = {
    unlock: guardFor('unlock'),
    query: guardFor('query'),
    asset: guardFor('asset'),
  };

  const assets = new AssetLoader({
    root: config.assetsDir,
    key: config.vaultKey,
    requireEncrypted: config.requireEncrypted,
    audit,
  });

  const ensemble = new LLMEnsemble(buildProviders(config.providers, options.fetchFn), {
    timeoutMs: config.ensembleTimeoutMs,
    now: options.now,
    audit,
  });

  const gate = new UnlockGate({
    acceptedHashes: config.unlockCodeHashes,
    guard: guards.unlock,
    audit,
  });

  return {
    config,
    assets,
    ensemble,
    gate,
    guards,
    unlock: code => gate.unlock(code),
    ask: request => guards.query.run(() => ensemble.query(request)),
    openAsset: name => guards.asset.run(() => assets.load(name)),
  };
}
