export class VcpodError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'VcpodError';
  }
}

export class ConfigError extends VcpodError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

export class SourceError extends VcpodError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'SOURCE_ERROR', details);
    this.name = 'SourceError';
  }
}

export interface ContentCounts {
  sources_attempted: number;
  sources_succeeded: number;
  sources_represented: number;
  documents: number;
}

/**
 * The one hard stop of the collection core: too little survived fetching,
 * filtering and dedup to write an episode about.
 */
export class InsufficientContentError extends VcpodError {
  constructor(
    message: string,
    public readonly counts: ContentCounts,
  ) {
    super(message, 'INSUFFICIENT_CONTENT', { ...counts });
    this.name = 'InsufficientContentError';
  }
}

export class PipelineCancelledError extends VcpodError {
  constructor(stage: string, phase: 'before' | 'during' = 'before') {
    super(`Run cancelled ${phase} ${stage}`, 'CANCELLED', { stage, phase });
    this.name = 'PipelineCancelledError';
  }
}

export class LlmError extends VcpodError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'LLM_ERROR', details);
    this.name = 'LlmError';
  }
}

export class ScriptGenerationError extends VcpodError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'SCRIPT_ERROR', details);
    this.name = 'ScriptGenerationError';
  }
}

export class SpeechSynthesisError extends VcpodError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'TTS_ERROR', details);
    this.name = 'SpeechSynthesisError';
  }
}

export class ArtifactError extends VcpodError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'ARTIFACT_ERROR', details);
    this.name = 'ArtifactError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
