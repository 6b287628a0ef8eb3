import { z } from 'zod';
import fs from 'node:fs';
import path from 'node:path';
import { parse as yamlParse } from 'yaml';
import { getPackageRoot, resolvePath } from '../shared/utils.js';
import { ConfigError } from '../shared/errors.js';
import { EXTRACTION_STRATEGIES, type SourceDescriptor } from './types.js';

const httpUrl = z
  .string()
  .url()
  .refine((u) => /^https?:\/\//i.test(u), { message: 'must be an http(s) URL' });

const SourceDescriptorSchema = z.object({
  name: z.string().trim().min(1),
  url: httpUrl,
  strategy: z.enum(EXTRACTION_STRATEGIES),
  fallback_url: httpUrl.optional(),
});

const RegistrySchema = z.object({
  sources: z.array(SourceDescriptorSchema).min(1),
});

export function getBuiltinRegistryPath(): string {
  return path.join(getPackageRoot(), 'sources', 'vc_blogs.yaml');
}

/**
 * Validate a raw registry document. Any malformed entry is fatal: nothing is
 * fetched until the whole table is known to be sound.
 */
export function parseSourceRegistry(raw: unknown): readonly SourceDescriptor[] {
  const parsed = RegistrySchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError('Invalid source registry', {
      errors: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    });
  }

  const seen = new Set<string>();
  for (const source of parsed.data.sources) {
    if (seen.has(source.name)) {
      throw new ConfigError(`Duplicate source name in registry: ${source.name}`);
    }
    seen.add(source.name);
  }

  return Object.freeze(parsed.data.sources.map((s) => Object.freeze({ ...s })));
}

export function loadSourceRegistry(file?: string): readonly SourceDescriptor[] {
  const filePath = file ? resolvePath(file) : getBuiltinRegistryPath();
  if (!fs.existsSync(filePath)) {
    throw new ConfigError(`Source registry not found: ${filePath}`);
  }

  let raw: unknown;
  try {
    raw = yamlParse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Source registry is not valid YAML: ${filePath}`, {
      error: err instanceof Error ? err.message : String(err),
    });
  }

  return parseSourceRegistry(raw);
}
