import { describe, expect, it } from 'vitest';
import { parseNumberText } from './parser';
import { normalizeCandidates, normalizeNumber } from './normalizer';

describe('normalizeNumber', () => {
  it('passes a fully qualified number through unchanged', () => {
    expect(normalizeNumber('+18001234567', [])).toEqual({
      input: '+18001234567',
      number: '+18001234567',
      resolution: 'qualified',
    });
  });

  it('strips formatting from a qualified number', () => {
    expect(normalizeNumber('+44 20 7946 0958', [])).toMatchObject({ number: '+442079460958', resolution: 'qualified' });
  });

  it('borrows the country code of a verified number with the same last 10 digits', () => {
    expect(normalizeNumber('98954-31875', ['+15550001111', '+919895431875'])).toEqual({
      input: '98954-31875',
      number: '+919895431875',
      resolution: 'verified_match',
      matchedVerified: '+919895431875',
    });
  });

  it('matches on the suffix when the candidate carries a different prefix', () => {
    expect(normalizeNumber('09895431875', ['+919895431875'])).toMatchObject({
      number: '+919895431875',
      resolution: 'verified_match',
    });
  });

  it('takes the first verified number when several share a suffix', () => {
    const verified = ['+449895431875', '+919895431875'];
    expect(normalizeNumber('9895431875', verified)).toMatchObject({
      number: '+449895431875',
      matchedVerified: '+449895431875',
    });
    expect(normalizeNumber('9895431875', [...verified].reverse())).toMatchObject({ number: '+919895431875' });
  });

  it('defaults to +1 when nothing matches', () => {
    expect(normalizeNumber('(555) 123-4567', ['+919895431875'])).toEqual({
      input: '(555) 123-4567',
      number: '+15551234567',
      resolution: 'default_country',
    });
  });

  it('keeps only the last 10 digits of a long bare number without a match', () => {
    expect(normalizeNumber('919895431875', [])).toMatchObject({ number: '+19895431875', resolution: 'default_country' });
  });

  it('ignores verified entries that have no country code', () => {
    expect(normalizeNumber('9895431875', ['9895431875'])).toMatchObject({ resolution: 'default_country' });
  });

  it('rejects fewer than 10 digits', () => {
    expect(normalizeNumber('555-1234', [])).toEqual({
      input: '555-1234',
      reason: 'too_short',
      detail: 'Only 7 digits, need at least 10',
    });
  });

  it('rejects a short plus-prefixed number instead of treating it as qualified', () => {
    expect(normalizeNumber('+123456789', ['+1123456789'])).toMatchObject({ reason: 'too_short' });
  });
});

describe('normalizeCandidates', () => {
  it('normalizes the mixed example batch', () => {
    const candidates = parseNumberText('9895431875\n+18001234567');
    const { numbers, rejected } = normalizeCandidates(candidates, ['+919895431875']);
    expect(numbers.map((n) => n.number)).toEqual(['+919895431875', '+18001234567']);
    expect(numbers.map((n) => n.resolution)).toEqual(['verified_match', 'qualified']);
    expect(rejected).toEqual([]);
  });

  it('reports short and duplicate candidates', () => {
    const { numbers, rejected } = normalizeCandidates(['5551234567', '12345', '+1 555 123 4567'], []);
    expect(numbers.map((n) => n.number)).toEqual(['+15551234567']);
    expect(rejected).toEqual([
      { input: '12345', reason: 'too_short', detail: 'Only 5 digits, need at least 10' },
      { input: '+1 555 123 4567', reason: 'duplicate', detail: 'Same number as "5551234567" (+15551234567)' },
    ]);
  });

  it('is a pure function of its inputs', () => {
    const verified = ['+919895431875'];
    const candidates = ['9895431875', '5551234567'];
    expect(normalizeCandidates(candidates, verified)).toEqual(normalizeCandidates(candidates, verified));
    expect(verified).toEqual(['+919895431875']);
  });
});
