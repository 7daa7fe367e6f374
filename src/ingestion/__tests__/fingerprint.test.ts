import { createHash } from 'crypto';
import { describe, it, expect } from 'vitest';
import { computeFingerprint, normalizeForFingerprint, normalizeUrl } from '../fingerprint';

describe('normalizeForFingerprint', () => {
  it('lower-cases, collapses whitespace and trims', () => {
    expect(normalizeForFingerprint('  Markets\tRally \n\n Again ')).toBe('markets rally again');
  });
});

describe('computeFingerprint', () => {
  const base = { title: 'Markets Rally', content: 'Stocks rose on Monday.', source: 'Wire' };

  it('hashes the normalized fields joined by line feeds', () => {
    const expected = createHash('sha256').update('markets rally\nstocks rose on monday.\nwire').digest('hex');
    expect(computeFingerprint(base)).toBe(expected);
  });

  it('ignores case and whitespace differences', () => {
    const variant = { title: 'MARKETS   rally', content: ' Stocks rose\non Monday. ', source: 'wire' };
    expect(computeFingerprint(variant)).toBe(computeFingerprint(base));
  });

  it('distinguishes the same story from different sources', () => {
    expect(computeFingerprint({ ...base, source: 'Other Wire' })).not.toBe(computeFingerprint(base));
  });

  it('is a 64 character hex digest', () => {
    expect(computeFingerprint(base)).toMatch(/^[0-9a-f]{64}$/);
  });
});

describe('normalizeUrl', () => {
  it('drops tracking parameters and the fragment', () => {
    expect(normalizeUrl('https://news.example.com/story?utm_source=rss&utm_medium=feed#top')).toBe(
      'https://news.example.com/story'
    );
  });

  it('keeps meaningful query parameters', () => {
    expect(normalizeUrl('https://news.example.com/story?id=42&utm_campaign=x')).toBe(
      'https://news.example.com/story?id=42'
    );
  });

  it('returns unparseable input unchanged', () => {
    expect(normalizeUrl('not a url')).toBe('not a url');
  });
});
