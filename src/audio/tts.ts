import type { Config } from '../shared/config.js';
import { PipelineCancelledError, SpeechSynthesisError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { sleep } from '../shared/utils.js';
import { joinUrl } from '../llm/client.js';

export type AudioFormat = Config['tts']['format'];

const MIN_AUDIO_BYTES = 1024;

/**
 * Split text into pieces of at most `maxChars`, preferring paragraph breaks,
 * then sentence ends, then spaces.
 */
export function chunkText(text: string, maxChars: number): string[] {
  const chunks: string[] = [];
  let current = '';

  const push = (unit: string, separator: string) => {
    if (!current) {
      current = unit;
    } else if (current.length + separator.length + unit.length <= maxChars) {
      current += separator + unit;
    } else {
      chunks.push(current);
      current = unit;
    }
  };

  const paragraphs = text
    .split(/\n\s*\n/)
    .map((p) => p.trim())
    .filter((p) => p.length > 0);

  for (const paragraph of paragraphs) {
    if (paragraph.length <= maxChars) {
      push(paragraph, '\n\n');
      continue;
    }
    splitParagraph(paragraph, maxChars).forEach((piece, i) => push(piece, i === 0 ? '\n\n' : ' '));
  }

  if (current) chunks.push(current);
  return chunks;
}

function splitParagraph(paragraph: string, maxChars: number): string[] {
  const pieces: string[] = [];
  for (const sentence of paragraph.split(/(?<=[.!?])\s+/)) {
    if (sentence.length <= maxChars) {
      pieces.push(sentence);
      continue;
    }
    let line = '';
    for (const word of sentence.split(/\s+/)) {
      for (let i = 0; i < word.length; i += maxChars) {
        const part = word.slice(i, i + maxChars);
        if (!line) line = part;
        else if (line.length + 1 + part.length <= maxChars) line += ` ${part}`;
        else {
          pieces.push(line);
          line = part;
        }
      }
    }
    if (line) pieces.push(line);
  }
  return pieces;
}

export interface AudioValidation {
  ok: boolean;
  reason?: string;
}

export function validateAudio(audio: Uint8Array, format: AudioFormat): AudioValidation {
  if (audio.length === 0) return { ok: false, reason: 'empty audio data' };
  if (audio.length < MIN_AUDIO_BYTES) {
    return { ok: false, reason: `audio too small (${audio.length} bytes)` };
  }
  if (format === 'mp3') {
    const id3 = audio[0] === 0x49 && audio[1] === 0x44 && audio[2] === 0x33;
    const frameSync = audio[0] === 0xff && ((audio[1] ?? 0) & 0xe0) === 0xe0;
    if (!id3 && !frameSync) return { ok: false, reason: 'invalid MP3 header' };
  }
  return { ok: true };
}

type ChunkAttempt =
  | { kind: 'ok'; audio: Buffer }
  | { kind: 'retry'; reason: string; retryAfterMs?: number }
  | { kind: 'fail'; reason: string; status?: number };

function parseRetryAfter(value: string | null): number | undefined {
  if (!value) return undefined;
  const seconds = Number(value);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : undefined;
}

export class SpeechClient {
  constructor(private readonly config: Config['tts']) {}

  isConfigured(): boolean {
    return this.config.api_key.length > 0;
  }

  /**
   * Convert narration text to audio bytes. Long text is synthesized chunk by
   * chunk and concatenated; rate limits and server errors are retried with
   * exponential backoff.
   */
  async synthesize(text: string, signal?: AbortSignal): Promise<Buffer> {
    if (!text.trim()) {
      throw new SpeechSynthesisError('Cannot convert empty script to audio');
    }

    const chunks = chunkText(text, this.config.max_chars);
    logger.info({ chunks: chunks.length, chars: text.length, voice: this.config.voice }, 'Synthesizing speech');

    const parts: Buffer[] = [];
    for (const [index, chunk] of chunks.entries()) {
      if (signal?.aborted) {
        throw new PipelineCancelledError('speech synthesis', 'during');
      }
      parts.push(await this.synthesizeChunk(chunk, index, signal));
    }

    const audio = Buffer.concat(parts);
    const validation = validateAudio(audio, this.config.format);
    if (!validation.ok) {
      throw new SpeechSynthesisError(`Generated audio failed validation: ${validation.reason ?? 'unknown'}`, {
        bytes: audio.length,
      });
    }

    logger.info({ bytes: audio.length }, 'Speech synthesized');
    return audio;
  }

  private async synthesizeChunk(input: string, index: number, signal?: AbortSignal): Promise<Buffer> {
    const maxAttempts = this.config.max_retries + 1;

    for (let attempt = 1; ; attempt++) {
      const result = await this.requestChunk(input, signal);
      if (result.kind === 'ok') return result.audio;
      if (signal?.aborted) {
        throw new PipelineCancelledError('speech synthesis', 'during');
      }

      if (result.kind === 'fail' || attempt >= maxAttempts) {
        throw new SpeechSynthesisError(`Speech synthesis failed for chunk ${index + 1}: ${result.reason}`, {
          chunk: index,
          attempts: attempt,
          ...(result.kind === 'fail' && result.status ? { status: result.status } : {}),
        });
      }

      const backoff = this.config.retry_base_ms * 2 ** (attempt - 1);
      const retryAfter = result.kind === 'retry' ? result.retryAfterMs : undefined;
      const delay = Math.max(backoff, retryAfter ?? 0);
      logger.warn({ chunk: index, attempt, delayMs: delay, reason: result.reason }, 'Speech request failed, retrying');
      try {
        await sleep(delay, signal);
      } catch (err) {
        if (signal?.aborted) {
          throw new PipelineCancelledError('speech synthesis', 'during');
        }
        throw err;
      }
    }
  }

  private async requestChunk(input: string, signal?: AbortSignal): Promise<ChunkAttempt> {
    const url = joinUrl(this.config.base_url, '/audio/speech');
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.config.timeout_ms);
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const response = await fetch(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.config.api_key}`,
        },
        body: JSON.stringify({
          model: this.config.model,
          voice: this.config.voice,
          input,
          response_format: this.config.format,
          speed: this.config.speed,
        }),
        signal: controller.signal,
      });

      if (response.status === 429 || response.status >= 500) {
        await response.body?.cancel().catch(() => undefined);
        return {
          kind: 'retry',
          reason: response.status === 429 ? 'rate limited (429)' : `server error (${response.status})`,
          retryAfterMs: parseRetryAfter(response.headers.get('retry-after')),
        };
      }

      if (!response.ok) {
        const body = await response.text().catch(() => '');
        return { kind: 'fail', reason: `HTTP ${response.status}: ${body.slice(0, 200)}`, status: response.status };
      }

      return { kind: 'ok', audio: Buffer.from(await response.arrayBuffer()) };
    } catch (err) {
      if (signal?.aborted) return { kind: 'fail', reason: 'cancelled' };
      return { kind: 'retry', reason: controller.signal.aborted ? 'request timed out' : errorMessage(err) };
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}
