/**
 * Configuration for memvault
 *
 * Layering: built-in defaults <- <home>/config.yaml <- environment.
 * Credentials go through the SecretResolver (<home>/secrets.yaml, then env).
 * Built once at start-up; nothing probes the environment afterwards.
 */

import fs from 'fs';
import path from 'path';
import os from 'os';
import yaml from 'js-yaml';
import { deriveVaultKey } from './core/crypto';
import { VaultError, VaultErrorCode } from './core/errors';
import { BACKENDS, BackendType, ProviderSlot, isBackendType } from './llm';
import { EnvSource, SecretResolver, YamlFileSource } from './secrets';

export interface ChainEntryConfig {
  name: string;
  backend: BackendType;
  model?: string;
  baseUrl?: string;
  /** Secret holding this entry's key; defaults to <NAME>_PROVIDER_KEY */
  keyEnv?: string;
}

export interface MemvaultYAMLConfig {
  version?: string;
  assetsDir?: string;
  requireEncrypted?: boolean;
  ensemble?: {
    timeoutSeconds?: number;
    chain?: ChainEntryConfig[];
  };
  rateLimit?: {
    maxFailures?: number;
    windowSeconds?: number;
    minIntervalSeconds?: number;
  };
}

export interface RateLimitConfig {
  maxFailures: number;
  windowMs: number;
  minIntervalMs: number;
}

export interface AppConfig {
  home: string;
  assetsDir: string;
  requireEncrypted: boolean;
  /** Null when VAULT_KEY is not configured */
  vaultKey: Buffer | null;
  providers: ProviderSlot[];
  ensembleTimeoutMs: number;
  rateLimit: RateLimitConfig;
  unlockCodeHashes: string[];
}

export const DEFAULT_CHAIN: ChainEntryConfig[] = [
  { name: 'gemini', backend: 'gemini', keyEnv: 'PRIMARY_PROVIDER_KEY' },
  { name: 'mistral', backend: 'mistral', keyEnv: 'FALLBACK_PROVIDER_KEY' },
  { name: 'groq', backend: 'groq', keyEnv: 'EMERGENCY_PROVIDER_KEY' },
];

const DEFAULTS = {
  maxFailures: 10,
  windowSeconds: 3600,
  minIntervalSeconds: 0.5,
  timeoutSeconds: 30,
  salt: 'memvault',
};

/**
 * Config directory: MEMVAULT_HOME or ~/.memvault
 */
export function getConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  return env.MEMVAULT_HOME || path.join(os.homedir(), '.memvault');
}

export function getAuditDir(home: string): string {
  return path.join(home, 'logs');
}

export function getLedgerFile(home: string): string {
  return path.join(home, 'ledger.json');
}

/**
 * Read <home>/config.yaml; an absent file yields an empty config.
 */
export function loadYAMLConfig(home: string): MemvaultYAMLConfig {
  const file = path.join(home, 'config.yaml');
  if (!fs.existsSync(file)) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(fs.readFileSync(file, 'utf8'));
  } catch (err) {
    throw new VaultError(
      VaultErrorCode.CONFIG_ERROR,
      `${file} is not valid YAML: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err }
    );
  }

  // YAML parses an empty document as undefined
  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new VaultError(VaultErrorCode.CONFIG_ERROR, `${file} must contain a mapping`);
  }
  return parsed as MemvaultYAMLConfig;
}

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  home?: string;
  cwd?: string;
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<AppConfig> {
  const env = options.env ?? process.env;
  const home = options.home ?? getConfigDir(env);
  const cwd = options.cwd ?? process.cwd();
  const file = loadYAMLConfig(home);

  const resolver = new SecretResolver([
    new YamlFileSource(path.join(home, 'secrets.yaml')),
    new EnvSource('env', { env }),
  ]);

  const chain = parseChain(file.ensemble?.chain ?? DEFAULT_CHAIN);
  const providers: ProviderSlot[] = [];
  for (const [index, entry] of chain.entries()) {
    const apiKey = await resolver.resolveFirst([
      entry.keyEnv ?? defaultKeyEnv(entry.name),
      BACKENDS[entry.backend].keyEnv,
    ]);
    providers.push({
      name: entry.name,
      priority: index + 1,
      backend: entry.backend,
      apiKey,
      model: entry.model,
      baseUrl: entry.baseUrl,
    });
  }

  const rawKey = await resolver.resolve('VAULT_KEY');
  const salt = (await resolver.resolve('VAULT_KEY_SALT')) ?? DEFAULTS.salt;
  const vaultKey = rawKey ? deriveVaultKey(rawKey, salt) : null;

  const hashes = await resolver.resolve('UNLOCK_CODE_HASHES');

  return {
    home,
    assetsDir: path.resolve(cwd, env.MEMVAULT_ASSETS_DIR || optionalString(file.assetsDir) || '.'),
    requireEncrypted: parseBoolean(
      'MEMVAULT_REQUIRE_ENCRYPTED',
      env.MEMVAULT_REQUIRE_ENCRYPTED,
      typeof file.requireEncrypted === 'boolean' ? file.requireEncrypted : false
    ),
    vaultKey,
    providers,
    ensembleTimeoutMs: secondsToMs(parsePositive(
      'ENSEMBLE_TIMEOUT_SECONDS',
      env.ENSEMBLE_TIMEOUT_SECONDS,
      file.ensemble?.timeoutSeconds ?? DEFAULTS.timeoutSeconds
    )),
    rateLimit: {
      maxFailures: parseCount(
        'RATE_LIMIT_MAX_FAILURES',
        env.RATE_LIMIT_MAX_FAILURES,
        file.rateLimit?.maxFailures ?? DEFAULTS.maxFailures
      ),
      windowMs: secondsToMs(parsePositive(
        'RATE_LIMIT_WINDOW_SECONDS',
        env.RATE_LIMIT_WINDOW_SECONDS,
        file.rateLimit?.windowSeconds ?? DEFAULTS.windowSeconds
      )),
      minIntervalMs: secondsToMs(parsePositive(
        'MIN_REQUEST_INTERVAL_SECONDS',
        env.MIN_REQUEST_INTERVAL_SECONDS,
        file.rateLimit?.minIntervalSeconds ?? DEFAULTS.minIntervalSeconds
      )),
    },
    unlockCodeHashes: parseHashes(hashes),
  };
}

export function defaultKeyEnv(name: string): string {
  return `${name.toUpperCase().replace(/[^A-Z0-9]/g, '_')}_PROVIDER_KEY`;
}

function parseChain(entries: unknown): ChainEntryConfig[] {
  if (!Array.isArray(entries) || entries.length === 0) {
    throw new VaultError(VaultErrorCode.CONFIG_ERROR, 'ensemble.chain must be a non-empty list');
  }

  const names = new Set<string>();
  return entries.map((entry, index) => {
    const record = entry && typeof entry === 'object' ? entry as Record<string, unknown> : {};
    const backend = record.backend;
    const name = typeof record.name === 'string' && record.name ? record.name : String(backend);

    if (typeof backend !== 'string' || !isBackendType(backend)) {
      throw new VaultError(
        VaultErrorCode.CONFIG_ERROR,
        `ensemble.chain[${index}]: unknown backend "${String(backend)}". Available: ${Object.keys(BACKENDS).join(', ')}`
      );
    }
    if (names.has(name)) {
      throw new VaultError(VaultErrorCode.CONFIG_ERROR, `ensemble.chain: duplicate name "${name}"`);
    }
    names.add(name);

    return {
      name,
      backend,
      model: optionalString(record.model),
      baseUrl: optionalString(record.baseUrl),
      keyEnv: optionalString(record.keyEnv),
    };
  });
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function parsePositive(name: string, raw: string | undefined, fallback: number): number {
  const value = raw === undefined || raw === '' ? fallback : Number(raw);
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    throw new VaultError(
      VaultErrorCode.CONFIG_ERROR,
      `${name} must be a positive number, got "${raw ?? String(fallback)}"`
    );
  }
  return value;
}

function parseBoolean(name: string, raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const normalized = raw.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  throw new VaultError(VaultErrorCode.CONFIG_ERROR, `${name} must be true or false, got "${raw}"`);
}

function parseHashes(raw: string | null): string[] {
  if (!raw) {
    return [];
  }
  return raw
    .split(',')
    .map(h => h.trim().toLowerCase())
    .filter(Boolean)
    .map(h => {
      if (!/^[0-9a-f]{64}$/.test(h)) {
        throw new VaultError(
          VaultErrorCode.CONFIG_ERROR,
          'UNLOCK_CODE_HASHES must be comma-separated SHA-256 hex digests'
        );
      }
      return h;
    });
}

function parseCount(name: string, raw: string | undefined, fallback: number): number {
  const value = parsePositive(name, raw, fallback);
  if (!Number.isInteger(value)) {
    throw new VaultError(
      VaultErrorCode.CONFIG_ERROR,
      `${name} must be a whole number of at least 1, got "${raw ?? String(fallback)}"`
    );
  }
  return value;
}

function secondsToMs(seconds: number): number {
  return Math.round(seconds * 1000);
}
