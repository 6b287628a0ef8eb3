import { logger } from '../shared/logger.js';
import type { ExtractionResult, ExtractionStrategy, RawFetch, SourceDescriptor } from './types.js';
import { STRATEGIES } from './strategies.js';

/**
 * Run the strategy for `source` (or an explicit override, such as `feed`
 * for a fallback fetch) over a fetched body. Only successful fetches carry
 * a body; anything else extracts to nothing.
 */
export async function extractDocuments(
  raw: RawFetch,
  source: SourceDescriptor,
  strategy: ExtractionStrategy = source.strategy,
): Promise<ExtractionResult> {
  if (raw.status !== 'success') {
    return { documents: [], warnings: [] };
  }

  const extract = STRATEGIES[strategy];
  let result: ExtractionResult;
  try {
    result = await extract(raw.body, source, raw.url);
  } catch (err) {
    // Strategies are written not to throw; a parser crash still only
    // degrades this one source.
    result = {
      documents: [],
      warnings: [
        {
          source_name: source.name,
          url: raw.url,
          message: `Extraction failed: ${err instanceof Error ? err.message : String(err)}`,
        },
      ],
    };
  }

  for (const w of result.warnings) {
    logger.warn({ source: w.source_name, url: w.url, strategy }, w.message);
  }

  const dateless = result.documents.filter((d) => d.published_at === null).length;
  logger.debug(
    { source: source.name, strategy, documents: result.documents.length, dateless },
    'Extracted documents',
  );

  return result;
}
