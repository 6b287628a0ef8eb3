import fs from 'node:fs';
import path from 'node:path';
import type { Config } from '../shared/config.js';
import { ArtifactError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { resolvePath } from '../shared/utils.js';

const MAX_COLLISIONS = 1000;
const TOPIC_MAX_CHARS = 30;

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

export function slugifyTopic(topic: string): string {
  const slug = topic
    .toLowerCase()
    .replace(/[^a-z0-9]/g, '_')
    .slice(0, TOPIC_MAX_CHARS)
    .replace(/_+/g, '_')
    .replace(/^_+|_+$/g, '');
  return slug || 'general';
}

/**
 * `<prefix>_YYYYMMDD_HHMM_<topic>.<ext>`, using local time.
 */
export function buildFilename(prefix: string, topic: string, now: Date, extension = 'mp3'): string {
  const stamp =
    `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}` +
    `_${pad(now.getHours())}${pad(now.getMinutes())}`;
  return `${prefix}_${stamp}_${slugifyTopic(topic)}.${extension}`;
}

/**
 * First free path among `file`, `file_2`, `file_3`, ...
 */
export function resolveCollision(filePath: string): string {
  if (!fs.existsSync(filePath)) return filePath;

  const { dir, name, ext } = path.parse(filePath);
  for (let counter = 2; counter <= MAX_COLLISIONS; counter++) {
    const candidate = path.join(dir, `${name}_${counter}${ext}`);
    if (!fs.existsSync(candidate)) {
      logger.info({ file: path.basename(candidate) }, 'Filename collision, using a numbered name');
      return candidate;
    }
  }
  throw new ArtifactError('Too many filename collisions', { path: filePath });
}

function writeInto(dir: string, filename: string, audio: Uint8Array): string {
  fs.mkdirSync(dir, { recursive: true });
  const target = resolveCollision(path.join(dir, filename));
  fs.writeFileSync(target, audio, { flag: 'wx' });
  return target;
}

export interface ArtifactRequest {
  topic: string;
  now?: Date;
  extension?: string;
}

/**
 * Write the episode into the configured output directory, falling back to
 * the working directory when that fails. Returns the final path.
 */
export function writeArtifact(audio: Uint8Array, request: ArtifactRequest, output: Config['output']): string {
  if (audio.length === 0) {
    throw new ArtifactError('Cannot save empty audio data');
  }

  const filename = buildFilename(output.filename_prefix, request.topic, request.now ?? new Date(), request.extension);
  const primaryDir = resolvePath(output.dir);

  try {
    const written = writeInto(primaryDir, filename, audio);
    logger.info({ path: written }, 'Audio saved');
    return written;
  } catch (err) {
    if (err instanceof ArtifactError) throw err;
    logger.warn({ dir: primaryDir, error: errorMessage(err) }, 'Could not write to output directory, trying working directory');

    try {
      const written = writeInto(process.cwd(), filename, audio);
      logger.info({ path: written }, 'Audio saved to fallback location');
      return written;
    } catch (fallbackErr) {
      throw new ArtifactError(
        `Failed to save audio file: ${errorMessage(err)}. Fallback also failed: ${errorMessage(fallbackErr)}`,
        { dir: primaryDir },
      );
    }
  }
}
