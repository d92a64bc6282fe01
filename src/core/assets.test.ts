import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import path from 'path';
import os from 'os';
import { AssetLoader, validateAssetName } from './assets';
import { encrypt, generateVaultKey } from './crypto';
import {
  AssetNotFoundError,
  AuthenticationError,
  MissingKeyError,
  VaultError,
  VaultErrorCode,
} from './errors';
import type { AuditInput, AuditSink } from './audit';

class RecordingAudit implements AuditSink {
  events: AuditInput[] = [];
  log(event: AuditInput): void {
    this.events.push(event);
  }
}

describe('AssetLoader', () => {
  let root: string;
  let key: Buffer;

  function write(name: string, data: Buffer | string): void {
    const file = path.join(root, name);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, data);
  }

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'memvault-assets-test-'));
    key = Buffer.from(generateVaultKey(), 'base64');
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  describe('precedence', () => {
    it('returns plaintext unmodified when only plaintext exists', async () => {
      write('whatsapp_chat.txt', 'hello\nworld');
      const loader = new AssetLoader({ root, key });
      expect((await loader.load('whatsapp_chat.txt')).toString()).toBe('hello\nworld');
    });

    it('decrypts the .enc file when no plaintext exists', async () => {
      write('assets/memories.json.enc', encrypt(Buffer.from('[{"id":1}]'), key));
      const loader = new AssetLoader({ root, key });
      expect((await loader.load('assets/memories.json')).toString()).toBe('[{"id":1}]');
    });

    it('prefers plaintext over ciphertext and never decrypts', async () => {
      write('memo.txt', 'plain copy');
      // Garbage ciphertext and no key: any decryption attempt would throw
      write('memo.txt.enc', Buffer.from('not a real blob'));
      const loader = new AssetLoader({ root, key: null });

      expect((await loader.load('memo.txt')).toString()).toBe('plain copy');
      expect(loader.resolve('memo.txt')).toEqual({
        representation: 'plaintext',
        path: path.join(root, 'memo.txt'),
      });
    });

    it('ignores plaintext when requireEncrypted is set', async () => {
      write('memo.txt', 'plain copy');
      write('memo.txt.enc', encrypt(Buffer.from('sealed copy'), key));
      const loader = new AssetLoader({ root, key, requireEncrypted: true });

      expect((await loader.load('memo.txt')).toString()).toBe('sealed copy');
      expect(loader.resolve('memo.txt')?.representation).toBe('encrypted');
    });

    it('reports not found under requireEncrypted when only plaintext exists', async () => {
      write('memo.txt', 'plain copy');
      const loader = new AssetLoader({ root, key, requireEncrypted: true });
      await expect(loader.load('memo.txt')).rejects.toBeInstanceOf(AssetNotFoundError);
    });

    it('does not treat a directory as a plaintext asset', async () => {
      fs.mkdirSync(path.join(root, 'photos'));
      write('photos.enc', encrypt(Buffer.from('dir-named blob'), key));
      const loader = new AssetLoader({ root, key });
      expect((await loader.load('photos')).toString()).toBe('dir-named blob');
    });
  });

  describe('failures', () => {
    it('throws AssetNotFoundError when neither representation exists', async () => {
      const loader = new AssetLoader({ root, key });
      const err = await loader.load('missing.json').catch(e => e);
      expect(err).toBeInstanceOf(AssetNotFoundError);
      expect(err.code).toBe(VaultErrorCode.ASSET_NOT_FOUND);
      expect(err.asset).toBe('missing.json');
    });

    it('throws MissingKeyError when ciphertext exists but no key is configured', async () => {
      write('memo.txt.enc', encrypt(Buffer.from('x'), key));
      const loader = new AssetLoader({ root, key: null });
      await expect(loader.load('memo.txt')).rejects.toBeInstanceOf(MissingKeyError);
    });

    it('propagates AuthenticationError for the wrong key', async () => {
      write('memo.txt.enc', encrypt(Buffer.from('x'), key));
      const otherKey = Buffer.from(generateVaultKey(), 'base64');
      const loader = new AssetLoader({ root, key: otherKey });
      await expect(loader.load('memo.txt')).rejects.toBeInstanceOf(AuthenticationError);
    });

    it('propagates AuthenticationError for a tampered blob', async () => {
      const blob = encrypt(Buffer.from('tamper target'), key);
      blob[blob.length - 1] ^= 0x80;
      write('memo.txt.enc', blob);
      const loader = new AssetLoader({ root, key });
      await expect(loader.load('memo.txt')).rejects.toBeInstanceOf(AuthenticationError);
    });

    it('rejects names that escape the root', async () => {
      const loader = new AssetLoader({ root, key });
      await expect(loader.load('../etc/passwd')).rejects.toThrow(/must not contain/);
      await expect(loader.load('/etc/passwd')).rejects.toThrow(/must be relative/);
    });
  });

  describe('helpers', () => {
    it('loadJson parses decrypted JSON', async () => {
      write('memories.json.enc', encrypt(Buffer.from('[{"file_path":"assets/a.jpg"}]'), key));
      const loader = new AssetLoader({ root, key });
      expect(await loader.loadJson('memories.json')).toEqual([{ file_path: 'assets/a.jpg' }]);
    });

    it('loadJson reports malformed content', async () => {
      write('broken.json', '{not json');
      const loader = new AssetLoader({ root, key });
      const err = await loader.loadJson('broken.json').catch(e => e);
      expect(err).toBeInstanceOf(VaultError);
      expect(err.code).toBe(VaultErrorCode.MALFORMED_ASSET);
    });

    it('loadTail keeps only the last characters', async () => {
      write('chat.txt', 'abcdefghij');
      const loader = new AssetLoader({ root, key });
      expect(await loader.loadTail('chat.txt', 4)).toBe('ghij');
      expect(await loader.loadTail('chat.txt', 50)).toBe('abcdefghij');
    });

    it('loadTail counts characters, not bytes', async () => {
      write('chat.txt', 'ab😀c');
      const loader = new AssetLoader({ root, key });
      expect(await loader.loadTail('chat.txt', 2)).toBe('😀c');
    });
  });

  describe('audit', () => {
    it('records which representation was used without contents', async () => {
      write('a.txt', 'secret words');
      write('b.txt.enc', encrypt(Buffer.from('more secret words'), key));
      const audit = new RecordingAudit();
      const loader = new AssetLoader({ root, key, audit });

      await loader.load('a.txt');
      await loader.load('b.txt');
      await loader.load('c.txt').catch(() => undefined);

      expect(audit.events).toEqual([
        { kind: 'asset', asset: 'a.txt', outcome: 'plaintext' },
        { kind: 'asset', asset: 'b.txt', outcome: 'decrypted' },
        { kind: 'asset', asset: 'c.txt', outcome: 'not_found' },
      ]);
    });

    it('records auth_failed only when decryption fails', async () => {
      const blob = encrypt(Buffer.from('sealed'), key);
      blob[blob.length - 1] ^= 0x01;
      write('bad.txt.enc', blob);
      write('good.txt.enc', encrypt(Buffer.from('sealed'), key));
      const events: AuditInput[] = [];
      const loader = new AssetLoader({
        root,
        key,
        audit: {
          log: event => {
            events.push(event);
            if (event.kind === 'asset' && event.outcome === 'decrypted') {
              throw new Error('disk full');
            }
          },
        },
      });

      await expect(loader.load('bad.txt')).rejects.toBeInstanceOf(AuthenticationError);
      await expect(loader.load('good.txt')).rejects.toThrow('disk full');

      expect(events).toEqual([
        { kind: 'asset', asset: 'bad.txt', outcome: 'auth_failed' },
        { kind: 'asset', asset: 'good.txt', outcome: 'decrypted' },
      ]);
    });
  });
});

describe('validateAssetName', () => {
  it('accepts relative names', () => {
    expect(() => validateAssetName('assets/photo.jpg')).not.toThrow();
    expect(() => validateAssetName('.hidden')).not.toThrow();
  });

  it('rejects empty, absolute and traversing names', () => {
    expect(() => validateAssetName('')).toThrow(VaultError);
    expect(() => validateAssetName('C:\\secrets')).toThrow(/must be relative/);
    expect(() => validateAssetName('a/../../b')).toThrow(/must not contain/);
  });

  it('rejects names exceeding max length', () => {
    expect(() => validateAssetName('a/'.repeat(600))).toThrow(/maximum length/);
  });
});
