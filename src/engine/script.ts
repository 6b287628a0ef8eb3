import type { Config } from '../shared/config.js';
import { PipelineCancelledError, ScriptGenerationError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { countWords } from '../source/text.js';
import type { LlmClient } from '../llm/client.js';
import { buildScriptMessages } from '../llm/prompts.js';

export const WORDS_PER_MINUTE = 150;

export interface ScriptInput {
  renderedCorpus: string;
  topic: string;
  windowDescription: string;
}

export interface ScriptValidation {
  ok: boolean;
  reason?: string;
}

const BULLET_PREFIXES = ['-', '*', '•', '1.', '2.', '3.'];

/**
 * Quality gate for a generated narration: long enough, prose rather than
 * lists, split into paragraphs, made of sentences.
 */
export function validateScript(script: string, minWords: number): ScriptValidation {
  if (!script.trim()) {
    return { ok: false, reason: 'empty script' };
  }

  const words = countWords(script);
  if (words < minWords) {
    return { ok: false, reason: `too short (${words} words, min ${minWords})` };
  }

  const lines = script.split('\n');
  const bulletLines = lines.filter((line) => {
    const t = line.trim();
    return BULLET_PREFIXES.some((p) => t.startsWith(p));
  }).length;
  if (bulletLines > lines.length * 0.3) {
    return { ok: false, reason: 'too many bullet points' };
  }

  const paragraphs = script.split('\n\n').filter((p) => p.trim());
  if (paragraphs.length < 3) {
    return { ok: false, reason: 'insufficient paragraph structure' };
  }

  const sentences = script.split('. ').length - 1;
  if (sentences < words / 30) {
    return { ok: false, reason: 'insufficient sentence structure' };
  }

  return { ok: true };
}

export function estimateSpeakingMinutes(script: string): number {
  return countWords(script) / WORDS_PER_MINUTE;
}

/**
 * Ask the model for a narration, retrying on request failures and on
 * scripts that fail validation.
 */
export async function generateScript(
  client: Pick<LlmClient, 'chat'>,
  input: ScriptInput,
  options: Config['script'],
  signal?: AbortSignal,
): Promise<string> {
  const messages = buildScriptMessages({ ...input, targetWords: options.target_words });
  let lastProblem = 'no attempts made';

  for (let attempt = 1; attempt <= options.max_attempts; attempt++) {
    if (signal?.aborted) {
      throw new PipelineCancelledError('script generation', 'during');
    }

    logger.info({ attempt, maxAttempts: options.max_attempts }, 'Generating script');
    let script: string;
    try {
      script = (await client.chat(messages, signal)).content.trim();
    } catch (err) {
      if (signal?.aborted) {
        throw new PipelineCancelledError('script generation', 'during');
      }
      lastProblem = errorMessage(err);
      logger.warn({ attempt, error: lastProblem }, 'Script generation request failed');
      continue;
    }

    const validation = validateScript(script, options.min_words);
    if (validation.ok) {
      logger.info({ words: countWords(script) }, 'Script generated');
      return script;
    }

    lastProblem = `quality check failed: ${validation.reason ?? 'unknown'}`;
    logger.warn({ attempt, reason: validation.reason }, 'Script quality check failed');
  }

  throw new ScriptGenerationError(
    `Failed to generate a usable script after ${options.max_attempts} attempts: ${lastProblem}`,
    { attempts: options.max_attempts },
  );
}
