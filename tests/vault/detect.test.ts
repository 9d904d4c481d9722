import { describe, it, expect } from 'vitest';
import { createDefaultRegistry, ProviderRegistry } from '../../src/providers/index.js';
import { UNKNOWN_PROVIDER } from '../../src/types/index.js';
import { detect, normalizeHeader, scorePlugin } from '../../src/vault/detect.js';

const registry = createDefaultRegistry({ freeze: true });

const HEADERS: Record<string, string[]> = {
  protonpass: ['type', 'name', 'url', 'email', 'username', 'password', 'note', 'totp', 'createTime', 'modifyTime', 'vault'],
  bitwarden: [...registry.get('bitwarden').exportColumns],
  lastpass: [...registry.get('lastpass').exportColumns],
  chromium: ['name', 'url', 'username', 'password', 'note'],
  firefox: [...registry.get('firefox').exportColumns],
  dashlane: [...registry.get('dashlane').exportColumns],
  nordpass: [...registry.get('nordpass').exportColumns],
  roboform: [...registry.get('roboform').exportColumns],
  'apple-passwords': [...registry.get('apple-passwords').exportColumns],
  kaspersky: [...registry.get('kaspersky').exportColumns],
};

describe('normalizeHeader', () => {
  it('should trim, unquote, lower-case and drop punctuation', () => {
    expect(normalizeHeader(' "Website URL" ')).toBe('website url');
    expect(normalizeHeader('login_uri')).toBe('loginuri');
    expect(normalizeHeader('E-mail:  Address')).toBe('email address');
  });
});

describe('scorePlugin', () => {
  it('should score a full header as 1', () => {
    const match = scorePlugin(registry.get('chromium'), HEADERS.chromium);
    expect(match.score).toBe(1);
    expect(match.missingRequired).toEqual([]);
  });

  it('should give 0 but keep a partial score when a required column is missing', () => {
    const match = scorePlugin(registry.get('chromium'), ['url', 'username', 'password']);
    expect(match.score).toBe(0);
    expect(match.missingRequired).toEqual(['name']);
    expect(match.partialScore).toBeGreaterThan(0);
  });

  it('should count header columns the plugin does not know against it', () => {
    const match = scorePlugin(registry.get('chromium'), HEADERS.protonpass);
    expect(match.headerCoverage).toBeCloseTo(5 / 11);
    expect(match.score).toBeLessThan(1);
  });
});

describe('detect', () => {
  for (const [providerId, headers] of Object.entries(HEADERS)) {
    it(`should recognise a ${providerId} header`, () => {
      const result = detect(registry, headers);
      expect(result.status).toBe('matched');
      expect(result.providerId).toBe(providerId);
      expect(result.confidence).toBe(1);
    });
  }

  it('should ignore header case, quotes and punctuation', () => {
    const result = detect(registry, ['"Title"', 'url', 'USERNAME', 'Password', 'notes', 'otp-auth']);
    expect(result.providerId).toBe('apple-passwords');
  });

  it('should report a tie as ambiguous', () => {
    const result = detect(registry, ['url', 'username', 'password']);
    expect(result.status).toBe('ambiguous');
    expect(result.providerId).toBe(UNKNOWN_PROVIDER);
    expect(result.ambiguousCandidates).toEqual(['lastpass', 'firefox']);
  });

  it('should return unknown when no plugin has its required columns', () => {
    const result = detect(registry, ['foo', 'bar']);
    expect(result.status).toBe('unknown');
    expect(result.providerId).toBe(UNKNOWN_PROVIDER);
    expect(result.confidence).toBe(0);
  });

  it('should list partial candidates with missing columns', () => {
    const result = detect(registry, ['name', 'url', 'password']);
    expect(result.status).toBe('unknown');
    expect(result.matches.length).toBeGreaterThan(0);
    expect(result.explanation).toContain('missing required');
  });

  it('should return unknown below the threshold', () => {
    const result = detect(registry, HEADERS.chromium, { threshold: 1.1 });
    expect(result.status).toBe('unknown');
    expect(result.explanation).toContain('below the detection threshold');
  });

  it('should handle an empty header row and an empty registry', () => {
    expect(detect(registry, []).explanation).toBe('No headers provided');
    expect(detect(new ProviderRegistry(), ['url']).explanation).toBe('No provider plugins registered');
  });
});
