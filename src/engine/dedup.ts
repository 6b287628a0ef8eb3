import type { Document } from '../source/types.js';
import { similarityRatio } from './similarity.js';

const TRACKING_PREFIXES = ['utm_', 'ref', 'source', 'fbclid', 'gclid', 'mc_', 'mkt_'];

/**
 * Canonical form of a post URL for identity checks: lower-case host without
 * www., no tracking params, sorted query, no fragment, no trailing slash.
 */
export function normalizeUrl(raw: string): string {
  let url: URL;
  try {
    url = new URL(raw.trim());
  } catch {
    return raw.trim();
  }

  const host = url.hostname.toLowerCase().replace(/^www\./, '');
  for (const key of [...url.searchParams.keys()]) {
    if (TRACKING_PREFIXES.some((p) => key.toLowerCase().startsWith(p))) {
      url.searchParams.delete(key);
    }
  }
  url.searchParams.sort();

  const pathname = url.pathname.replace(/\/+$/, '');
  const search = url.searchParams.toString();
  return `${url.protocol}//${host}${url.port ? `:${url.port}` : ''}${pathname}${search ? `?${search}` : ''}`;
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Base order for dedup: published_at ascending, then source_name. Title and
 * URL break the remaining ties so the order never depends on input order.
 * Dateless documents sort last.
 */
export function compareDocuments(a: Document, b: Document): number {
  if (a.published_at !== b.published_at) {
    if (a.published_at === null) return 1;
    if (b.published_at === null) return -1;
    const byDate = compareStrings(a.published_at, b.published_at);
    if (byDate !== 0) return byDate;
  }
  return (
    compareStrings(a.source_name, b.source_name) ||
    compareStrings(a.title, b.title) ||
    compareStrings(a.url, b.url)
  );
}

export interface DuplicateRecord {
  dropped: Pick<Document, 'source_name' | 'title' | 'url'>;
  kept: Pick<Document, 'source_name' | 'title' | 'url'>;
  reason: 'url' | 'content' | 'title';
  similarity: number;
}

export interface DedupResult {
  documents: Document[];
  duplicates_removed: number;
  duplicates: DuplicateRecord[];
}

function ref(doc: Document): DuplicateRecord['kept'] {
  return { source_name: doc.source_name, title: doc.title, url: doc.url };
}

interface SimilarMatch {
  doc: Document;
  reason: 'content' | 'title';
  similarity: number;
}

function findSimilar(candidate: Document, accepted: readonly Document[], threshold: number): SimilarMatch | null {
  const hasContent = candidate.content.trim() !== '';
  const hasTitle = candidate.title.trim() !== '';

  for (const existing of accepted) {
    if (hasContent && existing.content.trim()) {
      const similarity = similarityRatio(candidate.content, existing.content);
      if (similarity > threshold) return { doc: existing, reason: 'content', similarity };
    }
    if (hasTitle && existing.title.trim()) {
      const similarity = similarityRatio(candidate.title, existing.title);
      if (similarity > threshold) return { doc: existing, reason: 'title', similarity };
    }
  }
  return null;
}

/**
 * Collapse near-duplicates in one pass over the sorted batch. Each candidate
 * is compared with every document already accepted (never with rejected
 * ones), so in a chain A~B, B~C with A and C dissimilar, A and C survive.
 * A candidate is a duplicate when its URL matches an accepted one, or when
 * its content or its title is more similar than `threshold` to an accepted
 * document's. Content is only compared when both sides have some.
 */
export function deduplicate(documents: readonly Document[], threshold: number): DedupResult {
  const sorted = [...documents].sort(compareDocuments);
  const accepted: Document[] = [];
  const acceptedUrls = new Map<string, Document>();
  const duplicates: DuplicateRecord[] = [];

  for (const candidate of sorted) {
    const urlKey = candidate.url ? normalizeUrl(candidate.url) : '';
    const sameUrl = urlKey ? acceptedUrls.get(urlKey) : undefined;
    if (sameUrl) {
      duplicates.push({ dropped: ref(candidate), kept: ref(sameUrl), reason: 'url', similarity: 1 });
      continue;
    }

    const match = findSimilar(candidate, accepted, threshold);
    if (match) {
      duplicates.push({
        dropped: ref(candidate),
        kept: ref(match.doc),
        reason: match.reason,
        similarity: match.similarity,
      });
      continue;
    }

    accepted.push(candidate);
    if (urlKey) acceptedUrls.set(urlKey, candidate);
  }

  return { documents: accepted, duplicates_removed: duplicates.length, duplicates };
}
