import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { PODCAST_STAGES, runPodcast } from '../podcast.js';
import { ConfigSchema, type Config } from '../../shared/config.js';
import { InsufficientContentError, LlmError, PipelineCancelledError } from '../../shared/errors.js';
import type { LlmResponse } from '../../llm/client.js';
import type { SourceDescriptor } from '../../source/types.js';

const SCRIPT = [
  'Two firms spent the week arguing about seed prices. One partner thinks valuations have run too far.',
  'Another sees durable revenue at the top of the market. That gap between leaders and laggards keeps growing.',
  'Discipline will matter more than speed this year. Efficient founders will keep their options open.',
].join('\n\n');

const now = new Date('2025-01-15T00:00:00.000Z');

const sources: SourceDescriptor[] = [
  { name: 'Alpha', url: 'https://alpha.example/feed', strategy: 'feed' },
  { name: 'Beta', url: 'https://beta.example/feed', strategy: 'feed' },
  { name: 'Gamma', url: 'https://gamma.example/feed', strategy: 'feed' },
];

function feed(title: string, date: string, body: string): string {
  return `<?xml version="1.0"?><rss version="2.0"><channel><title>Feed</title>
<item><title>${title}</title><link>https://posts.example/${title}</link><pubDate>${date}</pubDate>
<description>${body}</description></item></channel></rss>`;
}

const FEEDS: Record<string, string> = {
  'https://alpha.example/feed': feed('Seed', '2025-01-10T08:00:00Z', 'Seed prices are rising quickly.'),
  'https://beta.example/feed': feed('Growth', '2025-01-12T08:00:00Z', 'Growth rounds are slowing down.'),
  'https://gamma.example/feed': feed('Exits', '2025-01-13T08:00:00Z', 'Exit markets reopened for software.'),
};

let tmpDir: string;
let config: Config;

function stubFeeds(routes: Record<string, string>) {
  vi.stubGlobal(
    'fetch',
    vi.fn((input: string | URL | Request) => {
      const body = routes[String(input)];
      return Promise.resolve(body ? new Response(body, { status: 200 }) : new Response('gone', { status: 404 }));
    }),
  );
}

function makeDeps() {
  const chat = vi.fn(async (): Promise<LlmResponse> => ({ content: SCRIPT, model: 'test-model', token_count: 1 }));
  const synthesize = vi.fn(async () => Buffer.from('ID3 fake audio'));
  return { config, sources, llm: { chat }, speech: { synthesize }, chat, synthesize };
}

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'vcpod-podcast-'));
  config = ConfigSchema.parse({
    scrape: { max_retries: 0, respect_robots: false },
    script: { min_words: 20 },
    output: { dir: tmpDir, filename_prefix: 'ep' },
  });
});

afterEach(() => {
  vi.unstubAllGlobals();
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe('runPodcast', () => {
  it('runs every stage and saves the episode', async () => {
    stubFeeds(FEEDS);
    const deps = makeDeps();
    const stages: string[] = [];

    const result = await runPodcast(deps, {
      days: 14,
      topic: 'Seed Rounds',
      now,
      onStage: (stage, index, total) => stages.push(`${index}/${total} ${stage}`),
    });

    expect(stages).toEqual(PODCAST_STAGES.map((s, i) => `${i + 1}/5 ${s}`));
    expect(result.corpus.documents.map((d) => d.title)).toEqual(['Seed', 'Growth', 'Exits']);
    expect(result.script_words).toBe(50);
    expect(result.estimated_minutes).toBeCloseTo(50 / 150);
    expect(path.basename(result.path)).toMatch(/^ep_\d{8}_\d{4}_seed_rounds\.mp3$/);
    expect(fs.readFileSync(result.path, 'utf-8')).toBe('ID3 fake audio');
    expect(deps.synthesize).toHaveBeenCalledWith(SCRIPT, undefined);

    const firstCall = deps.chat.mock.calls[0];
    expect(JSON.stringify(firstCall)).toContain('Seed prices are rising quickly.');
  });

  it('stops before script generation when content is thin', async () => {
    stubFeeds({
      'https://alpha.example/feed': feed('Seed', '2025-01-10T08:00:00Z', 'Seed prices are rising quickly.'),
    });
    const deps = makeDeps();

    await expect(runPodcast(deps, { days: 14, topic: 'seed', now })).rejects.toThrow(InsufficientContentError);
    expect(deps.chat).not.toHaveBeenCalled();
    expect(fs.readdirSync(tmpDir)).toEqual([]);
  });

  it('honours cancellation', async () => {
    stubFeeds({});
    const deps = makeDeps();
    const controller = new AbortController();
    controller.abort();

    await expect(runPodcast(deps, { days: 7, topic: 'seed', now, signal: controller.signal })).rejects.toThrow(
      PipelineCancelledError,
    );
    expect(deps.synthesize).not.toHaveBeenCalled();
  });

  it('reports a cancel during script generation as a cancelled run', async () => {
    stubFeeds(FEEDS);
    const controller = new AbortController();
    const deps = makeDeps();
    const chat = vi.fn(async (): Promise<LlmResponse> => {
      controller.abort();
      throw new LlmError('LLM request cancelled');
    });

    await expect(
      runPodcast({ ...deps, llm: { chat } }, { days: 14, topic: 'seed', now, signal: controller.signal }),
    ).rejects.toThrow('Run cancelled during script generation');
    expect(chat).toHaveBeenCalledTimes(1);
    expect(deps.synthesize).not.toHaveBeenCalled();
    expect(fs.readdirSync(tmpDir)).toEqual([]);
  });
});
