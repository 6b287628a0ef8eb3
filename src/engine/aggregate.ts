import type { Config } from '../shared/config.js';
import { InsufficientContentError } from '../shared/errors.js';
import type { Document } from '../source/types.js';
import { isoDay } from '../shared/utils.js';
import { deduplicate, type DuplicateRecord } from './dedup.js';
import type { TimeWindow } from './timeFilter.js';

export interface SourceFailure {
  source_name: string;
  reason: string;
}

export interface Corpus {
  readonly documents: readonly Readonly<Document>[];
  /** ISO-8601 bounds, both inclusive. */
  readonly requested_window: { readonly start: string; readonly end: string };
  readonly sources_attempted: number;
  readonly sources_succeeded: number;
  readonly sources_failed: number;
  readonly duplicates_removed: number;
  readonly failures: readonly SourceFailure[];
  readonly duplicates: readonly DuplicateRecord[];
}

export interface AggregateInput {
  window: TimeWindow;
  sources_attempted: number;
  sources_succeeded: number;
  failures: readonly SourceFailure[];
  similarity_threshold: number;
}

/**
 * Build the run's Corpus from time-filtered documents of every source.
 * The result is frozen and shares nothing with the input.
 */
export function aggregateDocuments(documents: readonly Document[], input: AggregateInput): Corpus {
  const { documents: unique, duplicates_removed, duplicates } = deduplicate(
    documents,
    input.similarity_threshold,
  );

  return Object.freeze({
    documents: Object.freeze(unique.map((d) => Object.freeze({ ...d }))),
    requested_window: Object.freeze({
      start: input.window.start.toISOString(),
      end: input.window.end.toISOString(),
    }),
    sources_attempted: input.sources_attempted,
    sources_succeeded: input.sources_succeeded,
    sources_failed: input.sources_attempted - input.sources_succeeded,
    duplicates_removed,
    failures: Object.freeze(input.failures.map((f) => Object.freeze({ ...f }))),
    duplicates: Object.freeze(duplicates),
  });
}

export function sourcesRepresented(corpus: Corpus): string[] {
  return [...new Set(corpus.documents.map((d) => d.source_name))].sort();
}

function day(iso: string | null): string {
  return iso ? isoDay(new Date(iso)) : 'undated';
}

/**
 * Render the corpus as one attributed Markdown bundle. Output depends only on
 * the corpus.
 */
export function renderCorpus(corpus: Corpus): string {
  const lines: string[] = [];
  const sources = sourcesRepresented(corpus);

  lines.push('# VC Blog Posts Collection', '');
  lines.push(`**Window:** ${day(corpus.requested_window.start)} to ${day(corpus.requested_window.end)}`);
  lines.push(`**Total Posts:** ${corpus.documents.length}`);
  lines.push(`**Sources:** ${sources.length > 0 ? sources.join(', ') : 'none'}`);
  lines.push('', '---');

  for (const doc of corpus.documents) {
    lines.push('', `## ${doc.title}`);
    lines.push(`**Source:** ${doc.source_name} | **Date:** ${day(doc.published_at)}`);
    if (doc.url) lines.push(`**URL:** ${doc.url}`);
    if (doc.content) lines.push('', doc.content);
    lines.push('', '---');
  }

  return `${lines.join('\n')}\n`;
}

/**
 * Refuse to hand a thin corpus to script generation. This is the only
 * failure the collection core raises to its caller.
 */
export function assertSufficientContent(corpus: Corpus, thresholds: Config['aggregate']): void {
  const represented = sourcesRepresented(corpus).length;
  const counts = {
    sources_attempted: corpus.sources_attempted,
    sources_succeeded: corpus.sources_succeeded,
    sources_represented: represented,
    documents: corpus.documents.length,
  };

  if (corpus.sources_succeeded === 0) {
    throw new InsufficientContentError(
      `All ${corpus.sources_attempted} sources failed to fetch`,
      counts,
    );
  }

  if (corpus.documents.length < thresholds.min_documents || represented < thresholds.min_sources) {
    throw new InsufficientContentError(
      `Only ${corpus.documents.length} posts from ${represented} sources in the window ` +
        `(need at least ${thresholds.min_documents} posts from ${thresholds.min_sources} sources)`,
      counts,
    );
  }
}
