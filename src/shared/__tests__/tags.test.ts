import { describe, it, expect } from 'vitest';

import {
  deriveShortDescription,
  estimateTokensFromChars,
  extractTags,
  normalizeTags,
} from '../tags.js';

describe('extractTags', () => {
  it('splits on underscores', () => {
    expect(extractTags('fetch_weather_data')).toEqual(['data', 'fetch', 'weather']);
  });

  it('drops stopwords', () => {
    expect(extractTags('the-api-to-data')).toEqual(['api', 'data']);
  });

  it('splits on dots, slashes, colons and whitespace and lowercases', () => {
    expect(extractTags('Docs/Search:Index.v2 Beta')).toEqual(['beta', 'docs', 'index', 'search', 'v2']);
  });

  it('deduplicates and ignores empty segments', () => {
    expect(extractTags('__cache--cache__')).toEqual(['cache']);
  });

  it('returns nothing for a name made of stopwords', () => {
    expect(extractTags('get_the')).toEqual([]);
  });
});

describe('normalizeTags', () => {
  it('trims, lowercases, collapses whitespace and sorts', () => {
    expect(normalizeTags(['  Zeta ', 'alpha', 'Multi   Word', 'ALPHA', ''])).toEqual([
      'alpha',
      'multi word',
      'zeta',
    ]);
  });

  it('keeps stopwords unless asked to filter them', () => {
    expect(normalizeTags(['the', 'api'])).toEqual(['api', 'the']);
    expect(normalizeTags(['the', 'api'], { filterStopwords: true })).toEqual(['api']);
  });

  it('is idempotent', () => {
    const once = normalizeTags(['B', 'a', 'b']);
    expect(normalizeTags(once)).toEqual(once);
  });
});

describe('deriveShortDescription', () => {
  it('takes the first sentence', () => {
    expect(deriveShortDescription('Gets the forecast. Cached hourly.', 'x')).toBe('Gets the forecast.');
  });

  it('collapses whitespace first', () => {
    expect(deriveShortDescription('  Line one\n\n  continues?  Next', 'x')).toBe('Line one continues?');
  });

  it('keeps a description without a sentence break whole', () => {
    expect(deriveShortDescription('Version 1.2 of the tool', 'x')).toBe('Version 1.2 of the tool');
  });

  it('truncates long text with an ellipsis', () => {
    const short = deriveShortDescription('word '.repeat(50), 'x', 18);
    expect(short).toBe('word word word...');
  });

  it('humanizes the name without a description', () => {
    expect(deriveShortDescription(null, 'my_cool_tool')).toBe('My cool tool');
    expect(deriveShortDescription('   ', 'fetch-DATA')).toBe('Fetch data');
  });

  it('falls back to a fixed text for an empty name', () => {
    expect(deriveShortDescription(undefined, '__')).toBe('No description available.');
  });
});

describe('estimateTokensFromChars', () => {
  it('divides by 3.5 and truncates', () => {
    expect(estimateTokensFromChars(350)).toBe(100);
    expect(estimateTokensFromChars(10)).toBe(2);
    expect(estimateTokensFromChars(0)).toBe(0);
  });
});
