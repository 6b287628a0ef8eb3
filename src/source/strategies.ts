import { JSDOM } from 'jsdom';
import Parser from 'rss-parser';
import type { Document, ExtractionResult, ExtractionStrategy, SourceDescriptor } from './types.js';
import { collapseWhitespace, parseDate, stripHtml } from './text.js';

/**
 * A strategy turns one fetched body into Documents. Strategies do no I/O and
 * report layout mismatches as warnings instead of throwing.
 */
export type StrategyFn = (
  body: string,
  source: SourceDescriptor,
  pageUrl: string,
) => Promise<ExtractionResult>;

export interface LayoutSelectors {
  article: string;
  title: string;
  date: string;
  content: string;
}

export type HtmlLayout = Exclude<ExtractionStrategy, 'feed'>;

export const HTML_LAYOUTS: Readonly<Record<HtmlLayout, LayoutSelectors>> = {
  'post-list': {
    article: 'article.post',
    title: 'h2.post-title',
    date: 'time',
    content: 'div.post-content',
  },
  'article-grid': {
    article: 'article',
    title: 'h3',
    date: 'time',
    content: 'div.article-content',
  },
  'review-cards': {
    article: 'div.article-item',
    title: 'h2',
    date: 'span.date',
    content: 'div.content',
  },
  wordpress: {
    article: 'article',
    title: 'h1.entry-title, h2.entry-title',
    date: 'time.entry-date',
    content: 'div.entry-content, div.entry-summary',
  },
  'static-blog': {
    article: 'article',
    title: 'h1, h2',
    date: 'time',
    content: 'div.post-content, div.content',
  },
};

function resolveLink(href: string | null | undefined, base: string): string | null {
  if (!href) return null;
  try {
    return new URL(href, base).toString();
  } catch {
    return null;
  }
}

function elementText(el: Element | null): string {
  return el ? collapseWhitespace(el.textContent ?? '') : '';
}

function warning(source: SourceDescriptor, pageUrl: string, message: string): ExtractionResult {
  return { documents: [], warnings: [{ source_name: source.name, url: pageUrl, message }] };
}

export function selectorStrategy(selectors: LayoutSelectors): StrategyFn {
  return async (body, source, pageUrl) => {
    const { document } = new JSDOM(body, { url: pageUrl }).window;
    for (const node of Array.from(document.querySelectorAll('script, style, noscript'))) {
      node.remove();
    }

    const articles = Array.from(document.querySelectorAll(selectors.article));
    if (articles.length === 0) {
      return warning(source, pageUrl, `No elements matched "${selectors.article}"; the page layout may have changed`);
    }

    const documents: Document[] = [];
    for (const article of articles) {
      const titleEl = article.querySelector(selectors.title);
      const title = elementText(titleEl);
      if (!title) continue;

      const dateEl = article.querySelector(selectors.date);
      const published_at = parseDate(dateEl?.getAttribute('datetime')?.trim() || dateEl?.textContent);

      const link =
        resolveLink(titleEl?.closest('a')?.getAttribute('href'), pageUrl) ??
        resolveLink(titleEl?.querySelector('a[href]')?.getAttribute('href'), pageUrl) ??
        resolveLink(article.querySelector('a[href]')?.getAttribute('href'), pageUrl) ??
        '';

      documents.push({
        source_name: source.name,
        title,
        published_at,
        content: elementText(article.querySelector(selectors.content)),
        url: link,
      });
    }

    if (documents.length === 0) {
      return warning(
        source,
        pageUrl,
        `${articles.length} elements matched "${selectors.article}" but none had a "${selectors.title}" title`,
      );
    }

    return { documents, warnings: [] };
  };
}

const feedParser = new Parser<Record<string, unknown>, { contentEncoded?: string }>({
  customFields: {
    item: [['content:encoded', 'contentEncoded']],
  },
});

export const feedStrategy: StrategyFn = async (body, source, pageUrl) => {
  let feed: Awaited<ReturnType<typeof feedParser.parseString>>;
  try {
    feed = await feedParser.parseString(body);
  } catch (err) {
    return warning(source, pageUrl, `Feed could not be parsed: ${err instanceof Error ? err.message : String(err)}`);
  }

  const documents: Document[] = [];
  for (const entry of feed.items ?? []) {
    const title = collapseWhitespace(entry.title ?? '');
    if (!title) continue;

    documents.push({
      source_name: source.name,
      title,
      published_at: parseDate(entry.isoDate ?? entry.pubDate),
      content: stripHtml(entry.contentEncoded ?? entry.content ?? entry.contentSnippet ?? ''),
      url: resolveLink(entry.link?.trim(), pageUrl) ?? '',
    });
  }

  if (documents.length === 0) {
    return warning(source, pageUrl, 'Feed contained no usable entries');
  }
  return { documents, warnings: [] };
};

/**
 * Dispatch table over the closed set of strategies.
 */
export const STRATEGIES: Readonly<Record<ExtractionStrategy, StrategyFn>> = {
  'post-list': selectorStrategy(HTML_LAYOUTS['post-list']),
  'article-grid': selectorStrategy(HTML_LAYOUTS['article-grid']),
  'review-cards': selectorStrategy(HTML_LAYOUTS['review-cards']),
  wordpress: selectorStrategy(HTML_LAYOUTS.wordpress),
  'static-blog': selectorStrategy(HTML_LAYOUTS['static-blog']),
  feed: feedStrategy,
};
