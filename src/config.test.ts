import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import path from 'path';
import os from 'os';
import { defaultKeyEnv, getConfigDir, loadConfig, loadYAMLConfig } from './config';
import { deriveVaultKey, generateVaultKey, hashString } from './core/crypto';
import { VaultError, VaultErrorCode } from './core/errors';

describe('loadConfig', () => {
  let home: string;
  let cwd: string;

  beforeEach(() => {
    home = fs.mkdtempSync(path.join(os.tmpdir(), 'memvault-home-'));
    cwd = fs.mkdtempSync(path.join(os.tmpdir(), 'memvault-cwd-'));
  });

  afterEach(() => {
    fs.rmSync(home, { recursive: true, force: true });
    fs.rmSync(cwd, { recursive: true, force: true });
  });

  it('applies defaults with an empty environment', async () => {
    const config = await loadConfig({ env: {}, home, cwd });

    expect(config).toEqual({
      home,
      assetsDir: cwd,
      requireEncrypted: false,
      vaultKey: null,
      providers: [
        { name: 'gemini', priority: 1, backend: 'gemini', apiKey: null, model: undefined, baseUrl: undefined },
        { name: 'mistral', priority: 2, backend: 'mistral', apiKey: null, model: undefined, baseUrl: undefined },
        { name: 'groq', priority: 3, backend: 'groq', apiKey: null, model: undefined, baseUrl: undefined },
      ],
      ensembleTimeoutMs: 30_000,
      rateLimit: { maxFailures: 10, windowMs: 3_600_000, minIntervalMs: 500 },
      unlockCodeHashes: [],
    });
  });

  it('reads role keys, falling back to vendor keys', async () => {
    const config = await loadConfig({
      env: {
        PRIMARY_PROVIDER_KEY: 'primary-key',
        GOOGLE_API_KEY: 'ignored-google-key',
        MISTRAL_API_KEY: 'vendor-mistral-key',
      },
      home,
      cwd,
    });

    expect(config.providers.map(p => p.apiKey)).toEqual(['primary-key', 'vendor-mistral-key', null]);
  });

  it('prefers secrets.yaml over the environment', async () => {
    fs.writeFileSync(path.join(home, 'secrets.yaml'), 'EMERGENCY_PROVIDER_KEY: file-key\n');
    const config = await loadConfig({ env: { EMERGENCY_PROVIDER_KEY: 'env-key' }, home, cwd });
    expect(config.providers[2].apiKey).toBe('file-key');
  });

  it('uses a base64 vault key directly', async () => {
    const raw = generateVaultKey();
    const config = await loadConfig({ env: { VAULT_KEY: raw }, home, cwd });
    expect(config.vaultKey?.equals(Buffer.from(raw, 'base64'))).toBe(true);
  });

  it('stretches a passphrase with the configured salt', async () => {
    const config = await loadConfig({
      env: { VAULT_KEY: 'test-secret', VAULT_KEY_SALT: 'pepper' },
      home,
      cwd,
    });
    expect(config.vaultKey?.equals(deriveVaultKey('test-secret', 'pepper'))).toBe(true);
  });

  it('parses unlock code hashes', async () => {
    const a = hashString('1jan2026');
    const b = hashString('sunflower');
    const config = await loadConfig({
      env: { UNLOCK_CODE_HASHES: ` ${a.toUpperCase()}, ${b},` },
      home,
      cwd,
    });
    expect(config.unlockCodeHashes).toEqual([a, b]);
  });

  it('rejects hashes that are not SHA-256 digests', async () => {
    await expect(loadConfig({ env: { UNLOCK_CODE_HASHES: 'sunflower' }, home, cwd }))
      .rejects.toThrow('UNLOCK_CODE_HASHES must be comma-separated SHA-256 hex digests');
  });

  it('reads rate-limit and timeout overrides from the environment', async () => {
    const config = await loadConfig({
      env: {
        RATE_LIMIT_MAX_FAILURES: '5',
        RATE_LIMIT_WINDOW_SECONDS: '60',
        MIN_REQUEST_INTERVAL_SECONDS: '0.25',
        ENSEMBLE_TIMEOUT_SECONDS: '12',
        MEMVAULT_REQUIRE_ENCRYPTED: 'yes',
        MEMVAULT_ASSETS_DIR: 'vault',
      },
      home,
      cwd,
    });

    expect(config.rateLimit).toEqual({ maxFailures: 5, windowMs: 60_000, minIntervalMs: 250 });
    expect(config.ensembleTimeoutMs).toBe(12_000);
    expect(config.requireEncrypted).toBe(true);
    expect(config.assetsDir).toBe(path.join(cwd, 'vault'));
  });

  it('rejects non-positive numbers', async () => {
    const err = await loadConfig({ env: { RATE_LIMIT_MAX_FAILURES: '0' }, home, cwd }).catch(e => e);
    expect(err).toBeInstanceOf(VaultError);
    expect(err.message).toBe('RATE_LIMIT_MAX_FAILURES must be a positive number, got "0"');

    await expect(loadConfig({ env: { ENSEMBLE_TIMEOUT_SECONDS: 'soon' }, home, cwd }))
      .rejects.toThrow('ENSEMBLE_TIMEOUT_SECONDS must be a positive number, got "soon"');
  });

  it('rejects a fractional failure ceiling', async () => {
    const err = await loadConfig({ env: { RATE_LIMIT_MAX_FAILURES: '0.5' }, home, cwd }).catch(e => e);
    expect(err).toBeInstanceOf(VaultError);
    expect(err.code).toBe(VaultErrorCode.CONFIG_ERROR);
    expect(err.message).toBe('RATE_LIMIT_MAX_FAILURES must be a whole number of at least 1, got "0.5"');

    fs.writeFileSync(path.join(home, 'config.yaml'), 'rateLimit:\n  maxFailures: 2.5\n');
    await expect(loadConfig({ env: {}, home, cwd }))
      .rejects.toThrow('RATE_LIMIT_MAX_FAILURES must be a whole number of at least 1, got "2.5"');
  });

  it('rejects unrecognised booleans', async () => {
    await expect(loadConfig({ env: { MEMVAULT_REQUIRE_ENCRYPTED: 'maybe' }, home, cwd }))
      .rejects.toThrow('MEMVAULT_REQUIRE_ENCRYPTED must be true or false, got "maybe"');
  });

  describe('config.yaml', () => {
    it('takes a custom chain and settings', async () => {
      fs.writeFileSync(path.join(home, 'config.yaml'), [
        'assetsDir: assets',
        'requireEncrypted: true',
        'ensemble:',
        '  timeoutSeconds: 5',
        '  chain:',
        '    - name: fast',
        '      backend: groq',
        '      model: llama-3.1-8b-instant',
        '    - name: backup',
        '      backend: gemini',
        '      keyEnv: BACKUP_KEY',
        'rateLimit:',
        '  maxFailures: 3',
        '',
      ].join('\n'));

      const config = await loadConfig({
        env: { FAST_PROVIDER_KEY: 'fast-key', BACKUP_KEY: 'backup-key' },
        home,
        cwd,
      });

      expect(config.providers).toEqual([
        {
          name: 'fast', priority: 1, backend: 'groq', apiKey: 'fast-key',
          model: 'llama-3.1-8b-instant', baseUrl: undefined,
        },
        {
          name: 'backup', priority: 2, backend: 'gemini', apiKey: 'backup-key',
          model: undefined, baseUrl: undefined,
        },
      ]);
      expect(config.assetsDir).toBe(path.join(cwd, 'assets'));
      expect(config.requireEncrypted).toBe(true);
      expect(config.ensembleTimeoutMs).toBe(5000);
      expect(config.rateLimit.maxFailures).toBe(3);
    });

    it('lets the environment override the file', async () => {
      fs.writeFileSync(path.join(home, 'config.yaml'), 'rateLimit:\n  maxFailures: 3\n');
      const config = await loadConfig({ env: { RATE_LIMIT_MAX_FAILURES: '7' }, home, cwd });
      expect(config.rateLimit.maxFailures).toBe(7);
    });

    it('rejects an unknown backend', async () => {
      fs.writeFileSync(
        path.join(home, 'config.yaml'),
        'ensemble:\n  chain:\n    - name: x\n      backend: openai\n'
      );
      await expect(loadConfig({ env: {}, home, cwd })).rejects.toThrow(
        'ensemble.chain[0]: unknown backend "openai". Available: gemini, mistral, groq'
      );
    });

    it('rejects duplicate chain names', async () => {
      fs.writeFileSync(
        path.join(home, 'config.yaml'),
        'ensemble:\n  chain:\n    - backend: groq\n    - backend: groq\n'
      );
      await expect(loadConfig({ env: {}, home, cwd })).rejects.toThrow(
        'ensemble.chain: duplicate name "groq"'
      );
    });

    it('rejects a file that is not a mapping', () => {
      fs.writeFileSync(path.join(home, 'config.yaml'), '- a\n');
      expect(() => loadYAMLConfig(home)).toThrow('must contain a mapping');
    });

    it('treats an empty file as no configuration', () => {
      fs.writeFileSync(path.join(home, 'config.yaml'), '');
      expect(loadYAMLConfig(home)).toEqual({});
    });
  });
});

describe('getConfigDir', () => {
  it('honours MEMVAULT_HOME', () => {
    expect(getConfigDir({ MEMVAULT_HOME: '/srv/memvault' })).toBe('/srv/memvault');
  });

  it('defaults to ~/.memvault', () => {
    expect(getConfigDir({})).toBe(path.join(os.homedir(), '.memvault'));
  });
});

describe('defaultKeyEnv', () => {
  it('derives the key variable from the entry name', () => {
    expect(defaultKeyEnv('primary')).toBe('PRIMARY_PROVIDER_KEY');
    expect(defaultKeyEnv('my-groq')).toBe('MY_GROQ_PROVIDER_KEY');
  });
});
