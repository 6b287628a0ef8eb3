/**
 * HTML layout families the extractor knows, plus `feed` for RSS/Atom.
 */
export const EXTRACTION_STRATEGIES = [
  'post-list',
  'article-grid',
  'review-cards',
  'wordpress',
  'static-blog',
  'feed',
] as const;

export type ExtractionStrategy = (typeof EXTRACTION_STRATEGIES)[number];

export interface SourceDescriptor {
  readonly name: string;
  readonly url: string;
  readonly strategy: ExtractionStrategy;
  /** Syndication feed tried when the primary page yields nothing. */
  readonly fallback_url?: string;
}

export type FetchFailure =
  | { status: 'http_error'; code: number }
  | { status: 'timeout' }
  | { status: 'network_error'; message: string }
  | { status: 'disallowed' }
  | { status: 'cancelled' };

interface RawFetchBase {
  source_name: string;
  url: string;
  attempts: number;
}

/**
 * One network retrieval, possibly retried. `body` only exists on success.
 */
export type RawFetch =
  | (RawFetchBase & { status: 'success'; body: string })
  | (RawFetchBase & FetchFailure);

export interface Document {
  source_name: string;
  title: string;
  /** ISO-8601 UTC, or null when the source gave no parseable date. */
  published_at: string | null;
  content: string;
  /** Absolute link to the post; empty when the markup had none. */
  url: string;
}

export interface ExtractionWarning {
  source_name: string;
  url: string;
  message: string;
}

export interface ExtractionResult {
  documents: Document[];
  warnings: ExtractionWarning[];
}

export function describeFailure(fetch: RawFetch): string {
  switch (fetch.status) {
    case 'success':
      return 'ok';
    case 'http_error':
      return `HTTP ${fetch.code}`;
    case 'timeout':
      return 'timed out';
    case 'network_error':
      return `network error: ${fetch.message}`;
    case 'disallowed':
      return 'disallowed by robots.txt';
    case 'cancelled':
      return 'cancelled';
  }
}
