import { describe, expect, it } from 'vitest';
import { loadNoiseLists } from '../src/constants/noise.js';
import { NoiseFilter } from '../src/services/noiseFilter.js';
import { testNoiseFilter } from './helpers.js';

const filter = testNoiseFilter({
  stopwords: ['the'],
  buzzwords: ['game changer'],
  uiArtifacts: ['read more'],
  garbagePatterns: ['^\\d+\\s*(replies|comments?)$', 'https?://|www\\.'],
  publisherFragments: ['times', 'news'],
});

describe('NoiseFilter.cleanTopic', () => {
  it('lower-cases and collapses whitespace', () => {
    expect(filter.cleanTopic('  Interest   Rates ')).toBe('interest rates');
  });

  it('drops blacklisted phrases after normalizing them', () => {
    expect(filter.cleanTopic('Read   More')).toBeUndefined();
    expect(filter.cleanTopic('Game Changer')).toBeUndefined();
  });

  it('drops short, numeric-only and low-variety tokens', () => {
    expect(filter.cleanTopic('tax')).toBeUndefined();
    expect(filter.cleanTopic('2025-12')).toBeUndefined();
    expect(filter.cleanTopic('aaaaabbbb')).toBeUndefined();
  });

  it('drops tokens matching a garbage pattern', () => {
    expect(filter.cleanTopic('12 replies')).toBeUndefined();
    expect(filter.cleanTopic('see https://example.test')).toBeUndefined();
  });

  it('honours a custom minimum length', () => {
    expect(testNoiseFilter({}, 3).cleanTopic('Tax')).toBe('tax');
  });
});

describe('NoiseFilter.cleanOrganization', () => {
  it('keeps original casing', () => {
    expect(filter.cleanOrganization('Central  Bank')).toBe('Central Bank');
    expect(filter.cleanOrganization('IMF')).toBe('IMF');
  });

  it('drops two-letter acronyms with the low-variety rule but keeps longer ones', () => {
    expect(filter.cleanOrganization('UN')).toBeUndefined();
    expect(filter.cleanOrganization('EU')).toBeUndefined();
    expect(filter.cleanOrganization('IMF')).toBe('IMF');
  });

  it('rejects publishers and single characters', () => {
    expect(filter.cleanOrganization('Daily News Ltd')).toBeUndefined();
    expect(filter.cleanOrganization('X')).toBeUndefined();
  });

  it('matches publisher fragments case-insensitively', () => {
    expect(filter.isPublisher('The Sunday TIMES')).toBe(true);
    expect(filter.isPublisher('Ministry of Finance')).toBe(false);
    expect(filter.isPublisher('')).toBe(false);
  });
});

describe('bundled noise lists', () => {
  const bundled = new NoiseFilter({ lists: loadNoiseLists() });

  it('filters page chrome and publishers', () => {
    expect(bundled.cleanTopic('Click here')).toBeUndefined();
    expect(bundled.cleanTopic('45 comments')).toBeUndefined();
    expect(bundled.cleanOrganization('Daily Mirror')).toBeUndefined();
  });

  it('keeps ordinary topics', () => {
    expect(bundled.cleanTopic('Inflation')).toBe('inflation');
    expect(bundled.cleanOrganization('Central Bank')).toBe('Central Bank');
  });
});
