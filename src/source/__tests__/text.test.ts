import { describe, it, expect } from 'vitest';
import { collapseWhitespace, countWords, parseDate, stripHtml } from '../text.js';

describe('stripHtml', () => {
  it('removes tags and scripts and decodes entities', () => {
    expect(stripHtml('<p>Fish &amp; chips &lt;3</p><script>track()</script>')).toBe('Fish & chips <3');
  });

  it('decodes &amp; last', () => {
    expect(stripHtml('&amp;lt;')).toBe('&lt;');
  });

  it('normalizes quotes and spaces', () => {
    expect(stripHtml('It&#8217;s&nbsp;<em>&quot;fine&quot;</em>')).toBe('It\'s "fine"');
  });
});

describe('collapseWhitespace', () => {
  it('collapses runs and trims', () => {
    expect(collapseWhitespace('  a \n\t b  ')).toBe('a b');
  });
});

describe('countWords', () => {
  it('counts whitespace-separated words', () => {
    expect(countWords('  one two   three ')).toBe(3);
    expect(countWords('')).toBe(0);
  });
});

describe('parseDate', () => {
  it('normalizes to ISO-8601 UTC', () => {
    expect(parseDate('2025-01-15')).toBe('2025-01-15T00:00:00.000Z');
    expect(parseDate('2025-01-15T10:30:00+02:00')).toBe('2025-01-15T08:30:00.000Z');
  });

  it('returns null for missing or unparseable values', () => {
    expect(parseDate(null)).toBeNull();
    expect(parseDate('   ')).toBeNull();
    expect(parseDate('sometime last week')).toBeNull();
  });

  it('rejects dates without a year', () => {
    expect(parseDate('Jan 5')).toBeNull();
    expect(parseDate('January 5')).toBeNull();
    expect(parseDate('January 5, 2025')).not.toBeNull();
  });
});
