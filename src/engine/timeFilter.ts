import type { Document } from '../source/types.js';

export interface TimeWindow {
  start: Date;
  end: Date;
}

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Documents published within [start, end], both ends inclusive. Dateless
 * documents never pass, whatever date they might really have.
 */
export function filterByWindow(documents: readonly Document[], window: TimeWindow): Document[] {
  const start = window.start.getTime();
  const end = window.end.getTime();

  return documents.filter((doc) => {
    if (doc.published_at === null) return false;
    const t = Date.parse(doc.published_at);
    return !Number.isNaN(t) && t >= start && t <= end;
  });
}

export function calculateWindow(days: number, now: Date = new Date()): TimeWindow {
  return {
    start: new Date(now.getTime() - days * DAY_MS),
    end: new Date(now.getTime()),
  };
}

function formatDay(date: Date, withYear: boolean): string {
  return date.toLocaleDateString('en-US', {
    month: 'short',
    day: 'numeric',
    ...(withYear ? { year: 'numeric' } : {}),
    timeZone: 'UTC',
  });
}

/**
 * Prompt-friendly description, e.g. "the past 2 weeks (Jan 1 - Jan 15, 2025)".
 */
export function describeWindow(window: TimeWindow): string {
  const days = Math.round((window.end.getTime() - window.start.getTime()) / DAY_MS);
  const span =
    days % 7 === 0 && days >= 7
      ? `${days / 7} week${days === 7 ? '' : 's'}`
      : `${days} day${days === 1 ? '' : 's'}`;
  const sameYear = window.start.getUTCFullYear() === window.end.getUTCFullYear();
  return `the past ${span} (${formatDay(window.start, !sameYear)} - ${formatDay(window.end, true)})`;
}
