import { z } from 'zod';
import { logger } from '../shared/logger.js';
import { LlmError } from '../shared/errors.js';
import type { Config } from '../shared/config.js';

export interface LlmMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LlmResponse {
  content: string;
  model: string;
  token_count: number;
}

// OpenAI-compatible chat completions API response shape (partial)
const ChatCompletionSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullish() }).optional() }))
    .optional(),
  model: z.string().optional(),
  usage: z.object({ total_tokens: z.number().optional() }).optional(),
});

export const DEFAULT_OPENAI_BASE_URL = 'https://api.openai.com/v1';

export function joinUrl(baseUrl: string, pathname: string): string {
  return `${(baseUrl || DEFAULT_OPENAI_BASE_URL).replace(/\/+$/, '')}${pathname}`;
}

export class LlmClient {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly model: string;
  private readonly maxTokens: number;
  private readonly temperature: number;
  private readonly timeoutMs: number;

  constructor(config: Config['llm']) {
    this.baseUrl = config.base_url;
    this.apiKey = config.api_key;
    this.model = config.model;
    this.maxTokens = config.max_tokens;
    this.temperature = config.temperature;
    this.timeoutMs = config.timeout_ms;
  }

  isConfigured(): boolean {
    return this.apiKey.length > 0;
  }

  async chat(messages: LlmMessage[], signal?: AbortSignal): Promise<LlmResponse> {
    const url = joinUrl(this.baseUrl, '/chat/completions');
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify({
          model: this.model,
          messages,
          max_tokens: this.maxTokens,
          temperature: this.temperature,
        }),
        signal: controller.signal,
      });
    } catch (err) {
      if (signal?.aborted) throw new LlmError('LLM request cancelled', { url });
      if (controller.signal.aborted) {
        throw new LlmError(`LLM request timed out after ${this.timeoutMs}ms`, { url, model: this.model });
      }
      throw new LlmError(`LLM request failed: ${err instanceof Error ? err.message : String(err)}`, {
        url,
        model: this.model,
      });
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }

    if (!response.ok) {
      const text = await response.text().catch(() => '');
      throw new LlmError(`LLM API error: ${response.status} ${response.statusText}`, {
        status: response.status,
        body: text.slice(0, 500),
        url,
      });
    }

    let json: unknown;
    try {
      json = await response.json();
    } catch {
      throw new LlmError('LLM response is not valid JSON', { url });
    }
    const parsed = ChatCompletionSchema.safeParse(json);
    if (!parsed.success) {
      throw new LlmError('LLM response has an unexpected shape', { url });
    }
    const data = parsed.data;

    const content = data.choices?.[0]?.message?.content;
    if (!content) {
      throw new LlmError('LLM returned empty content', { response: JSON.stringify(data).slice(0, 200) });
    }

    const tokenCount = data.usage?.total_tokens ?? 0;
    logger.debug({ model: data.model, tokens: tokenCount }, 'LLM call completed');

    return { content, model: data.model ?? this.model, token_count: tokenCount };
  }
}
