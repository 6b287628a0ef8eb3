import type { Config } from '../shared/config.js';
import { logger } from '../shared/logger.js';
import { generateId } from '../shared/utils.js';
import type { SourceDescriptor } from '../source/types.js';
import type { LlmClient } from '../llm/client.js';
import type { SpeechClient } from '../audio/tts.js';
import { writeArtifact } from '../audio/writer.js';
import { assertSufficientContent, renderCorpus, type Corpus } from './aggregate.js';
import { collectCorpus, throwIfCancelled, type CollectionReport } from './collect.js';
import { estimateSpeakingMinutes, generateScript } from './script.js';
import { calculateWindow, describeWindow } from './timeFilter.js';
import { countWords } from '../source/text.js';

export const PODCAST_STAGES = [
  'Scraping VC blogs',
  'Aggregating content',
  'Generating script',
  'Creating audio',
  'Saving file',
] as const;

export type PodcastStage = (typeof PODCAST_STAGES)[number];

export interface PodcastDeps {
  config: Config;
  sources: readonly SourceDescriptor[];
  llm: Pick<LlmClient, 'chat'>;
  speech: Pick<SpeechClient, 'synthesize'>;
}

export interface PodcastRequest {
  days: number;
  topic: string;
  now?: Date;
  signal?: AbortSignal;
  onStage?: (stage: PodcastStage, index: number, total: number) => void;
}

export interface PodcastResult {
  path: string;
  corpus: Corpus;
  report: CollectionReport;
  script_words: number;
  estimated_minutes: number;
}

/**
 * One full episode: collect, check there is enough material, write the
 * script, synthesize it and save the audio. Cancellation is honoured between
 * stages and inside the network-bound ones.
 */
export async function runPodcast(deps: PodcastDeps, request: PodcastRequest): Promise<PodcastResult> {
  const { config, sources, llm, speech } = deps;
  const { signal } = request;
  const now = request.now ?? new Date();
  const runId = generateId();
  const stage = (name: PodcastStage) =>
    request.onStage?.(name, PODCAST_STAGES.indexOf(name) + 1, PODCAST_STAGES.length);

  const window = calculateWindow(request.days, now);
  logger.info({ runId, days: request.days, topic: request.topic }, 'Starting podcast run');

  stage('Scraping VC blogs');
  const { corpus, report } = await collectCorpus(sources, config, { window, signal, runId });

  stage('Aggregating content');
  assertSufficientContent(corpus, config.aggregate);
  const rendered = renderCorpus(corpus);

  throwIfCancelled(signal, 'script generation');
  stage('Generating script');
  const script = await generateScript(
    llm,
    { renderedCorpus: rendered, topic: request.topic, windowDescription: describeWindow(window) },
    config.script,
    signal,
  );

  throwIfCancelled(signal, 'speech synthesis');
  stage('Creating audio');
  const audio = await speech.synthesize(script, signal);

  throwIfCancelled(signal, 'saving');
  stage('Saving file');
  const path = writeArtifact(audio, { topic: request.topic, now, extension: config.tts.format }, config.output);

  return {
    path,
    corpus,
    report,
    script_words: countWords(script),
    estimated_minutes: estimateSpeakingMinutes(script),
  };
}
