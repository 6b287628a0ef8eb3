import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { buildFilename, resolveCollision, slugifyTopic, writeArtifact } from '../writer.js';
import { ArtifactError } from '../../shared/errors.js';

let tmpDir: string;
const now = new Date(2025, 0, 5, 9, 7);
const audio = new Uint8Array([1, 2, 3, 4]);

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'vcpod-writer-'));
});

afterEach(() => {
  vi.restoreAllMocks();
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe('slugifyTopic', () => {
  it('keeps lower-case alphanumerics joined by underscores', () => {
    expect(slugifyTopic('Artificial Intelligence!')).toBe('artificial_intelligence');
  });

  it('falls back to general', () => {
    expect(slugifyTopic('???')).toBe('general');
  });

  it('truncates to 30 characters', () => {
    expect(slugifyTopic('a'.repeat(40))).toBe('a'.repeat(30));
  });
});

describe('buildFilename', () => {
  it('uses prefix, local timestamp and topic', () => {
    expect(buildFilename('vc_podcast', 'Artificial Intelligence!', now)).toBe(
      'vc_podcast_20250105_0907_artificial_intelligence.mp3',
    );
    expect(buildFilename('ep', 'AI', now, 'opus')).toBe('ep_20250105_0907_ai.opus');
  });
});

describe('resolveCollision', () => {
  it('numbers colliding files', () => {
    const file = path.join(tmpDir, 'episode.mp3');
    expect(resolveCollision(file)).toBe(file);
    fs.writeFileSync(file, 'x');
    fs.writeFileSync(path.join(tmpDir, 'episode_2.mp3'), 'x');
    expect(resolveCollision(file)).toBe(path.join(tmpDir, 'episode_3.mp3'));
  });
});

describe('writeArtifact', () => {
  it('writes into the output directory and never overwrites', () => {
    const output = { dir: path.join(tmpDir, 'out'), filename_prefix: 'ep' };

    const first = writeArtifact(audio, { topic: 'AI', now }, output);
    const second = writeArtifact(audio, { topic: 'AI', now }, output);

    expect(first).toBe(path.join(tmpDir, 'out', 'ep_20250105_0907_ai.mp3'));
    expect(second).toBe(path.join(tmpDir, 'out', 'ep_20250105_0907_ai_2.mp3'));
    expect(fs.readFileSync(first)).toEqual(Buffer.from(audio));
  });

  it('falls back to the working directory', () => {
    const blocker = path.join(tmpDir, 'not-a-dir');
    fs.writeFileSync(blocker, 'x');
    const cwd = path.join(tmpDir, 'cwd');
    fs.mkdirSync(cwd);
    vi.spyOn(process, 'cwd').mockReturnValue(cwd);

    const written = writeArtifact(audio, { topic: 'AI', now }, { dir: path.join(blocker, 'sub'), filename_prefix: 'ep' });

    expect(written).toBe(path.join(cwd, 'ep_20250105_0907_ai.mp3'));
  });

  it('refuses empty audio', () => {
    expect(() => writeArtifact(new Uint8Array(0), { topic: 'AI', now }, { dir: tmpDir, filename_prefix: 'ep' })).toThrow(
      ArtifactError,
    );
  });
});
