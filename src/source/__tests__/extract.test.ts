import { describe, it, expect, vi, afterEach } from 'vitest';
import { extractDocuments } from '../extract.js';
import { STRATEGIES } from '../strategies.js';
import type { RawFetch, SourceDescriptor } from '../types.js';

const source: SourceDescriptor = {
  name: 'Example',
  url: 'https://example.com/',
  strategy: 'static-blog',
  fallback_url: 'https://example.com/index.xml',
};

const HTML = `<article><h2>Static Post</h2><time datetime="2025-01-02">Jan 2</time>
<div class="content">Static body</div><a href="/posts/static">read</a></article>`;

const FEED = `<?xml version="1.0"?><rss version="2.0"><channel><title>Feed</title>
<item><title>Feed Post</title><link>https://example.com/posts/feed</link>
<pubDate>Thu, 02 Jan 2025 00:00:00 GMT</pubDate><description>Feed body</description></item>
</channel></rss>`;

function success(body: string, url = source.url): RawFetch {
  return { source_name: source.name, url, attempts: 1, status: 'success', body };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('extractDocuments', () => {
  it('uses the source strategy by default', async () => {
    const { documents } = await extractDocuments(success(HTML), source);
    expect(documents).toEqual([
      {
        source_name: 'Example',
        title: 'Static Post',
        published_at: '2025-01-02T00:00:00.000Z',
        content: 'Static body',
        url: 'https://example.com/posts/static',
      },
    ]);
  });

  it('accepts a strategy override for fallback feeds', async () => {
    const { documents } = await extractDocuments(success(FEED, 'https://example.com/index.xml'), source, 'feed');
    expect(documents.map((d) => d.title)).toEqual(['Feed Post']);
  });

  it('extracts nothing from a failed fetch', async () => {
    const failed: RawFetch = { source_name: 'Example', url: source.url, attempts: 4, status: 'timeout' };
    expect(await extractDocuments(failed, source)).toEqual({ documents: [], warnings: [] });
  });

  it('turns a strategy crash into a warning', async () => {
    vi.spyOn(STRATEGIES, 'static-blog').mockRejectedValueOnce(new Error('parser exploded'));

    const result = await extractDocuments(success(HTML), source);

    expect(result.documents).toEqual([]);
    expect(result.warnings).toEqual([
      { source_name: 'Example', url: 'https://example.com/', message: 'Extraction failed: parser exploded' },
    ]);
  });
});
