import { describe, it, expect, beforeEach } from 'vitest';
import { UnlockGate, hashAccessCode, normalizeAccessCode } from './unlock';
import { AbuseGuard } from './guard';
import { hashString } from './crypto';
import { RateLimitedError, TooFastError } from './errors';
import type { AuditInput } from './audit';

describe('normalizeAccessCode', () => {
  it('collapses date-like codes to one canonical form', () => {
    expect(normalizeAccessCode('1st Jan, 2026')).toBe('1jan2026');
    expect(normalizeAccessCode(' 1-JAN-2026 ')).toBe('1jan2026');
    expect(normalizeAccessCode('1/jan/2026')).toBe('1jan2026');
    expect(normalizeAccessCode('22nd_march.2019')).toBe('22march2019');
  });

  it('keeps ordinal-looking letters that are part of a word', () => {
    expect(normalizeAccessCode('3 strawberries')).toBe('3strawberries');
  });

  it('hashes the normalized form', () => {
    expect(hashAccessCode('1st Jan, 2026')).toBe(hashString('1jan2026'));
  });
});

describe('UnlockGate', () => {
  let clock: number;
  let guard: AbuseGuard;
  let events: AuditInput[];
  let gate: UnlockGate;

  beforeEach(() => {
    clock = 0;
    events = [];
    guard = new AbuseGuard({ action: 'unlock', now: () => clock });
    gate = new UnlockGate({
      acceptedHashes: [hashAccessCode('1st jan 2026'), hashAccessCode('sunflower')],
      guard,
      audit: { log: event => events.push(event) },
    });
  });

  it('accepts any configured code in any spelling', async () => {
    await expect(gate.unlock('1-Jan-2026')).resolves.toBe(true);
    clock = 1000;
    await expect(gate.unlock('SUNFLOWER')).resolves.toBe(true);
  });

  it('rejects a wrong code and counts the failure', async () => {
    await expect(gate.unlock('2nd jan 2026')).resolves.toBe(false);
    expect(guard.status().failures).toBe(1);
  });

  it('rejects blank codes', async () => {
    await expect(gate.unlock('   ')).resolves.toBe(false);
    expect(guard.status().failures).toBe(1);
  });

  it('accepts uppercase configured digests', async () => {
    gate = new UnlockGate({
      acceptedHashes: [hashAccessCode('sunflower').toUpperCase()],
      guard,
    });
    await expect(gate.unlock('sunflower')).resolves.toBe(true);
  });

  it('locks out after ten wrong codes, even for the right one', async () => {
    for (let i = 0; i < 10; i++) {
      await gate.unlock(`wrong-${i}`);
      clock += 1000;
    }
    await expect(gate.unlock('sunflower')).rejects.toBeInstanceOf(RateLimitedError);
  });

  it('rejects rapid retries without checking the code', async () => {
    await gate.unlock('wrong');
    clock = 200;
    await expect(gate.unlock('sunflower')).rejects.toBeInstanceOf(TooFastError);
    expect(guard.status().failures).toBe(1);
  });

  it('audits the outcome without the code', async () => {
    await gate.unlock('sunflower');
    clock = 1000;
    await gate.unlock('daisy');

    expect(events).toEqual([
      { kind: 'unlock', action: 'unlock', outcome: 'granted' },
      { kind: 'unlock', action: 'unlock', outcome: 'denied' },
    ]);
  });

  it('reports whether any code is configured', () => {
    expect(gate.configured).toBe(true);
    expect(new UnlockGate({ acceptedHashes: [], guard }).configured).toBe(false);
  });

  it('denies everything when no code is configured', async () => {
    gate = new UnlockGate({ acceptedHashes: [], guard });
    await expect(gate.unlock('sunflower')).resolves.toBe(false);
  });
});
