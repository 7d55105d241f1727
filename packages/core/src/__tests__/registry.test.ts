import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ProviderRegistry } from '../registry/provider-registry.js';
import type { Logger } from '../types/index.js';

const BUILTINS = [
  'authorized_fintech_003',
  'certified_payment_processor_004',
  'licensed_lender_005',
  'trusted_bank_001',
  'verified_credit_union_002',
];

function mockLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'halyard-registry-'));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

function writeConfig(name: string, body: string): string {
  const path = join(dir, name);
  writeFileSync(path, body, 'utf8');
  return path;
}

// ── Loading ───────────────────────────────────────────────────────────────────
describe('ProviderRegistry loading', () => {
  it('uses the built-in allowlist without a config path', () => {
    const registry = new ProviderRegistry({ logger: mockLogger() });
    expect(registry.listProviders()).toEqual(BUILTINS);
    expect(registry.stats()).toEqual({
      total_providers: 5,
      allowlist_size: 5,
      source: 'builtin',
      config_path: null,
    });
  });

  it('reads string and object entries from a JSON file', () => {
    const path = writeConfig(
      'providers.json',
      JSON.stringify({ providers: ['zeta_bank', { id: 'alpha_lender', name: 'Alpha' }] }),
    );
    const registry = new ProviderRegistry({ configPath: path, logger: mockLogger() });
    expect(registry.listProviders()).toEqual(['alpha_lender', 'zeta_bank']);
    expect(registry.stats().source).toBe('file');
  });

  it('falls back with a warning when the file is missing', () => {
    const logger = mockLogger();
    const registry = new ProviderRegistry({ configPath: join(dir, 'absent.json'), logger });
    expect(registry.listProviders()).toEqual(BUILTINS);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it.each([
    ['not json', '{ providers: '],
    ['wrong shape', JSON.stringify({ providers: 'trusted_bank_001' })],
    ['bad entry', JSON.stringify({ providers: [42] })],
    ['blank id', JSON.stringify({ providers: [{ id: '  ' }] })],
  ])('falls back with a warning on %s', (_label, body) => {
    const logger = mockLogger();
    const registry = new ProviderRegistry({ configPath: writeConfig('bad.json', body), logger });
    expect(registry.stats().source).toBe('builtin');
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it('prefers an explicit list over the file', () => {
    const path = writeConfig('providers.json', JSON.stringify({ providers: ['from_file'] }));
    const registry = new ProviderRegistry({ configPath: path, providers: ['explicit_one'], logger: mockLogger() });
    expect(registry.listProviders()).toEqual(['explicit_one']);
    expect(registry.stats().source).toBe('explicit');
  });
});

// ── Lookup ────────────────────────────────────────────────────────────────────
describe('ProviderRegistry lookup', () => {
  const registry = new ProviderRegistry({ logger: mockLogger() });

  it('trims but stays case-sensitive', () => {
    expect(registry.isAllowed('trusted_bank_001')).toBe(true);
    expect(registry.isAllowed('  trusted_bank_001 ')).toBe(true);
    expect(registry.isAllowed('TRUSTED_BANK_001')).toBe(false);
  });

  it('never allows a blank id', () => {
    expect(registry.isAllowed('')).toBe(false);
    expect(registry.isAllowed('   ')).toBe(false);
  });

  it('explains the decision', () => {
    expect(registry.check(' licensed_lender_005 ')).toEqual({
      provider_id: 'licensed_lender_005',
      allowed: true,
      reason: 'Provider is in trust registry',
    });
    expect(registry.check('unknown_provider')).toEqual({
      provider_id: 'unknown_provider',
      allowed: false,
      reason: 'Provider not found in trust registry',
    });
  });
});

// ── Mutation ──────────────────────────────────────────────────────────────────
describe('ProviderRegistry mutation', () => {
  it('adds once, rejects blanks and duplicates', () => {
    const registry = new ProviderRegistry({ logger: mockLogger() });
    expect(registry.addProvider(' new_provider ')).toBe(true);
    expect(registry.addProvider('new_provider')).toBe(false);
    expect(registry.addProvider('  ')).toBe(false);
    expect(registry.isAllowed('new_provider')).toBe(true);
  });

  it('removes known providers only', () => {
    const registry = new ProviderRegistry({ logger: mockLogger() });
    expect(registry.removeProvider('trusted_bank_001')).toBe(true);
    expect(registry.removeProvider('trusted_bank_001')).toBe(false);
    expect(registry.stats().total_providers).toBe(4);
  });

  it('reload re-reads the file and drops runtime changes', () => {
    const path = writeConfig('providers.json', JSON.stringify({ providers: ['first'] }));
    const registry = new ProviderRegistry({ configPath: path, logger: mockLogger() });
    registry.addProvider('runtime_only');

    writeConfig('providers.json', JSON.stringify({ providers: ['first', 'second'] }));
    registry.reload();

    expect(registry.listProviders()).toEqual(['first', 'second']);
  });
});
