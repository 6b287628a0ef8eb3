import type { Config } from '../shared/config.js';
import { PipelineCancelledError } from '../shared/errors.js';
import { logger as rootLogger, type Logger } from '../shared/logger.js';
import { generateId } from '../shared/utils.js';
import { extractDocuments } from '../source/extract.js';
import { fetchOptionsFromConfig, fetchSource } from '../source/fetcher.js';
import { runPool } from '../source/pool.js';
import { RobotsCache } from '../source/robots.js';
import {
  describeFailure,
  type Document,
  type ExtractionResult,
  type ExtractionWarning,
  type RawFetch,
  type SourceDescriptor,
} from '../source/types.js';
import { aggregateDocuments, type Corpus, type SourceFailure } from './aggregate.js';
import { filterByWindow, type TimeWindow } from './timeFilter.js';

const FEED_ACCEPT = 'application/rss+xml, application/atom+xml, application/xml, text/xml, */*';

export interface FetchSummary {
  url: string;
  status: RawFetch['status'];
  attempts: number;
  detail: string;
}

export interface SourceOutcome {
  source_name: string;
  primary: FetchSummary;
  fallback?: FetchSummary;
  /** Which fetch the documents came from; null when none were extracted. */
  via: 'primary' | 'fallback' | null;
  succeeded: boolean;
  documents: number;
  warnings: ExtractionWarning[];
}

export interface CollectionReport {
  run_id: string;
  sources: SourceOutcome[];
  documents_extracted: number;
  dateless_dropped: number;
  outside_window: number;
  in_window: number;
  duration_ms: number;
}

export interface CollectOptions {
  window: TimeWindow;
  signal?: AbortSignal;
  runId?: string;
  logger?: Logger;
}

export interface CollectResult {
  corpus: Corpus;
  report: CollectionReport;
}

export function throwIfCancelled(signal: AbortSignal | undefined, stage: string): void {
  if (signal?.aborted) {
    throw new PipelineCancelledError(stage);
  }
}

function summarize(fetch: RawFetch): FetchSummary {
  return { url: fetch.url, status: fetch.status, attempts: fetch.attempts, detail: describeFailure(fetch) };
}

/**
 * Fetch, extract, window and deduplicate every source for one run.
 *
 * Fetching is a scatter/gather step: all primaries resolve (succeed, exhaust
 * retries, or get skipped) before any extraction starts, and the same holds
 * for the fallback feeds. Extraction, filtering and aggregation then run
 * sequentially over the gathered results. Individual source failures end up
 * in the report; cancellation between stages throws PipelineCancelledError.
 */
export async function collectCorpus(
  sources: readonly SourceDescriptor[],
  config: Config,
  options: CollectOptions,
): Promise<CollectResult> {
  const startTime = Date.now();
  const runId = options.runId ?? generateId();
  const log = (options.logger ?? rootLogger).child({ runId });
  const { signal, window } = options;

  throwIfCancelled(signal, 'fetching sources');

  const robots = config.scrape.respect_robots
    ? new RobotsCache({
        userAgent: config.scrape.user_agent,
        agentToken: config.scrape.robots_agent,
        timeoutMs: config.scrape.fetch_timeout_ms,
      })
    : undefined;
  const fetchOptions = fetchOptionsFromConfig(config.scrape, robots);

  log.info({ sources: sources.length, concurrency: config.scrape.concurrency }, 'Fetching sources');
  const primaries = await runPool(sources, config.scrape.concurrency, (source) =>
    fetchSource(source.name, source.url, fetchOptions, signal),
  );

  throwIfCancelled(signal, 'extraction');

  const primaryResults: ExtractionResult[] = [];
  for (const [i, source] of sources.entries()) {
    const raw = primaries[i];
    primaryResults.push(raw ? await extractDocuments(raw, source) : { documents: [], warnings: [] });
  }

  const needFallback = sources
    .map((source, i) => ({ source, i }))
    .filter(({ source, i }) => source.fallback_url && primaryResults[i]?.documents.length === 0);

  const fallbackFetches = new Map<number, RawFetch>();
  if (needFallback.length > 0) {
    log.info({ sources: needFallback.map(({ source }) => source.name) }, 'Trying fallback feeds');
    const fetched = await runPool(needFallback, config.scrape.concurrency, ({ source }) =>
      fetchSource(source.name, source.fallback_url ?? source.url, { ...fetchOptions, accept: FEED_ACCEPT }, signal),
    );
    needFallback.forEach(({ i }, k) => {
      const raw = fetched[k];
      if (raw) fallbackFetches.set(i, raw);
    });
  }

  throwIfCancelled(signal, 'fallback extraction');

  const outcomes: SourceOutcome[] = [];
  const failures: SourceFailure[] = [];
  const extracted: Document[] = [];

  for (const [i, source] of sources.entries()) {
    const primary = primaries[i];
    const primaryResult = primaryResults[i];
    if (!primary || !primaryResult) continue;

    const fallback = fallbackFetches.get(i);
    const fallbackResult = fallback ? await extractDocuments(fallback, source, 'feed') : undefined;

    let documents = primaryResult.documents;
    let via: SourceOutcome['via'] = documents.length > 0 ? 'primary' : null;
    if (fallbackResult && fallbackResult.documents.length > 0) {
      documents = fallbackResult.documents;
      via = 'fallback';
    }

    const succeeded = primary.status === 'success' || fallback?.status === 'success';
    const outcome: SourceOutcome = {
      source_name: source.name,
      primary: summarize(primary),
      fallback: fallback ? summarize(fallback) : undefined,
      via,
      succeeded,
      documents: documents.length,
      warnings: [...primaryResult.warnings, ...(fallbackResult?.warnings ?? [])],
    };
    outcomes.push(outcome);
    extracted.push(...documents);

    if (succeeded) {
      log.info({ source: source.name, via, documents: documents.length }, 'Source collected');
    } else {
      const reason = fallback
        ? `${outcome.primary.detail}; fallback ${describeFailure(fallback)}`
        : outcome.primary.detail;
      failures.push({ source_name: source.name, reason });
      log.warn({ source: source.name, reason }, 'Source failed');
    }
  }

  const inWindow = filterByWindow(extracted, window);
  const dateless = extracted.filter((d) => d.published_at === null).length;

  const corpus = aggregateDocuments(inWindow, {
    window,
    sources_attempted: sources.length,
    sources_succeeded: outcomes.filter((o) => o.succeeded).length,
    failures,
    similarity_threshold: config.aggregate.similarity_threshold,
  });

  const report: CollectionReport = {
    run_id: runId,
    sources: outcomes,
    documents_extracted: extracted.length,
    dateless_dropped: dateless,
    outside_window: extracted.length - dateless - inWindow.length,
    in_window: inWindow.length,
    duration_ms: Date.now() - startTime,
  };

  log.info(
    {
      sourcesAttempted: corpus.sources_attempted,
      sourcesSucceeded: corpus.sources_succeeded,
      extracted: report.documents_extracted,
      inWindow: report.in_window,
      duplicatesRemoved: corpus.duplicates_removed,
      documents: corpus.documents.length,
      durationMs: report.duration_ms,
    },
    'Collection complete',
  );

  return { corpus, report };
}
