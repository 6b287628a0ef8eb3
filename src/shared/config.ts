import { z } from 'zod';
import { cosmiconfig } from 'cosmiconfig';
import fs from 'node:fs';
import path from 'node:path';
import { stringify as yamlStringify } from 'yaml';
import { resolvePath, getVcpodDir } from './utils.js';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (compatible; VCPodcastBot/1.0; +https://github.com/vcpod/vcpod)';

export const ConfigSchema = z.object({
  scrape: z
    .object({
      concurrency: z.number().int().min(1).max(8).default(5),
      fetch_timeout_ms: z.number().int().positive().default(20000),
      max_retries: z.number().int().min(0).max(10).default(3),
      retry_base_ms: z.number().int().min(0).default(1000),
      retry_jitter: z.boolean().default(true),
      user_agent: z.string().min(1).default(DEFAULT_USER_AGENT),
      robots_agent: z.string().min(1).default('VCPodcastBot'),
      respect_robots: z.boolean().default(true),
    })
    .default({}),

  aggregate: z
    .object({
      similarity_threshold: z.number().min(0).max(1).default(0.85),
      min_documents: z.number().int().min(1).default(2),
      min_sources: z.number().int().min(1).default(3),
    })
    .default({}),

  llm: z
    .object({
      base_url: z.string().default(''),
      api_key: z.string().default(''),
      model: z.string().default('gpt-4.1-mini'),
      max_tokens: z.number().int().positive().default(4096),
      temperature: z.number().min(0).max(2).default(0.7),
      timeout_ms: z.number().int().positive().default(120000),
    })
    .default({}),

  script: z
    .object({
      target_words: z.number().int().positive().default(2000),
      min_words: z.number().int().positive().default(100),
      max_attempts: z.number().int().min(1).default(3),
    })
    .default({}),

  tts: z
    .object({
      base_url: z.string().default(''),
      api_key: z.string().default(''),
      model: z.string().default('tts-1-hd'),
      voice: z.string().default('nova'),
      format: z.enum(['mp3', 'opus', 'aac', 'flac']).default('mp3'),
      speed: z.number().min(0.25).max(4).default(1),
      max_chars: z.number().int().min(200).max(4096).default(4000),
      max_retries: z.number().int().min(0).default(3),
      retry_base_ms: z.number().int().min(0).default(2000),
      timeout_ms: z.number().int().positive().default(120000),
    })
    .default({}),

  output: z
    .object({
      dir: z.string().default('~/Desktop'),
      filename_prefix: z.string().min(1).default('vc_podcast'),
    })
    .default({}),

  sources_file: z.string().optional(),
});

export type Config = z.infer<typeof ConfigSchema>;

export function generateDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

export function generateDefaultConfigYaml(): string {
  return yamlStringify(generateDefaultConfig());
}

export function writeDefaultConfig(configPath: string): void {
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, generateDefaultConfigYaml(), 'utf-8');
}

export function getDefaultConfigPath(): string {
  return path.join(getVcpodDir(), 'config.yaml');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const existing = raw[key];
  const next = isRecord(existing) ? { ...existing } : {};
  raw[key] = next;
  return next;
}

/**
 * Apply VCPOD_* environment overrides on top of the file config.
 */
export function applyEnvOverrides(
  rawConfig: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env,
): Record<string, unknown> {
  const raw = { ...rawConfig };

  const llmOverrides: Array<[string, string | undefined]> = [
    ['api_key', env['VCPOD_LLM_API_KEY']],
    ['base_url', env['VCPOD_LLM_BASE_URL']],
    ['model', env['VCPOD_LLM_MODEL']],
  ];
  const ttsOverrides: Array<[string, string | undefined]> = [
    ['api_key', env['VCPOD_TTS_API_KEY'] ?? env['VCPOD_LLM_API_KEY']],
    ['base_url', env['VCPOD_TTS_BASE_URL']],
  ];

  for (const [key, value] of llmOverrides) {
    if (value) section(raw, 'llm')[key] = value;
  }
  for (const [key, value] of ttsOverrides) {
    if (value) section(raw, 'tts')[key] = value;
  }
  if (env['VCPOD_OUTPUT_DIR']) {
    section(raw, 'output')['dir'] = env['VCPOD_OUTPUT_DIR'];
  }

  return raw;
}

export function parseConfig(rawConfig: unknown): Config {
  const parsed = ConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', {
      errors: parsed.error.flatten().fieldErrors,
    });
  }
  return parsed.data;
}

/**
 * Load the configuration once at process start. The returned object is
 * passed explicitly to everything that needs it.
 */
export async function loadConfig(): Promise<Config> {
  const explorer = cosmiconfig('vcpod', {
    searchPlaces: ['vcpod.config.yaml', 'vcpod.config.yml', '.vcpodrc.yaml', '.vcpodrc.yml'],
  });

  const envConfigPath = process.env['VCPOD_CONFIG'];
  const defaultConfigPath = getDefaultConfigPath();

  let rawConfig: Record<string, unknown> = {};

  if (envConfigPath) {
    const resolved = resolvePath(envConfigPath);
    if (!fs.existsSync(resolved)) {
      throw new ConfigError(`Config file not found: ${resolved}`);
    }
    const loaded: unknown = (await explorer.load(resolved))?.config;
    if (isRecord(loaded)) rawConfig = loaded;
  } else if (fs.existsSync(defaultConfigPath)) {
    const loaded: unknown = (await explorer.load(defaultConfigPath))?.config;
    if (isRecord(loaded)) rawConfig = loaded;
  } else {
    logger.debug('No config file found, using defaults');
  }

  return parseConfig(applyEnvOverrides(rawConfig));
}
