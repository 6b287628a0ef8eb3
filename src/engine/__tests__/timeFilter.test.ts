import { describe, it, expect } from 'vitest';
import { calculateWindow, describeWindow, filterByWindow, type TimeWindow } from '../timeFilter.js';
import type { Document } from '../../source/types.js';

const window: TimeWindow = {
  start: new Date('2025-01-01T00:00:00.000Z'),
  end: new Date('2025-01-15T00:00:00.000Z'),
};

function docAt(published_at: string | null, title = published_at ?? 'undated'): Document {
  return { source_name: 'Alpha', title, published_at, content: '', url: '' };
}

describe('filterByWindow', () => {
  it('includes both bounds', () => {
    const docs = [docAt('2025-01-01T00:00:00.000Z'), docAt('2025-01-15T00:00:00.000Z')];
    expect(filterByWindow(docs, window)).toHaveLength(2);
  });

  it('excludes documents just outside the window', () => {
    const docs = [docAt('2024-12-31T23:59:59.999Z'), docAt('2025-01-15T00:00:00.001Z')];
    expect(filterByWindow(docs, window)).toEqual([]);
  });

  it('drops dateless documents', () => {
    const docs = [docAt(null), docAt('2025-01-05T00:00:00.000Z')];
    expect(filterByWindow(docs, window).map((d) => d.title)).toEqual(['2025-01-05T00:00:00.000Z']);
  });

  it('is idempotent', () => {
    const docs = [docAt(null), docAt('2025-01-05T00:00:00.000Z'), docAt('2024-06-01T00:00:00.000Z')];
    const once = filterByWindow(docs, window);
    expect(filterByWindow(once, window)).toEqual(once);
  });
});

describe('calculateWindow', () => {
  it('ends now and reaches back the given days', () => {
    const now = new Date('2025-01-15T12:00:00.000Z');
    const w = calculateWindow(14, now);
    expect(w.start.toISOString()).toBe('2025-01-01T12:00:00.000Z');
    expect(w.end.toISOString()).toBe('2025-01-15T12:00:00.000Z');
  });
});

describe('describeWindow', () => {
  it('describes whole weeks', () => {
    expect(describeWindow(window)).toBe('the past 2 weeks (Jan 1 - Jan 15, 2025)');
  });

  it('adds the start year when the window crosses a year', () => {
    const w = { start: new Date('2024-12-29T00:00:00.000Z'), end: new Date('2025-01-05T00:00:00.000Z') };
    expect(describeWindow(w)).toBe('the past 1 week (Dec 29, 2024 - Jan 5, 2025)');
  });

  it('falls back to days', () => {
    const w = { start: new Date('2025-03-01T00:00:00.000Z'), end: new Date('2025-03-11T00:00:00.000Z') };
    expect(describeWindow(w)).toBe('the past 10 days (Mar 1 - Mar 11, 2025)');
  });
});
