/**
 * Error classes for the subtitle pipeline
 */

export type PipelineStage =
  | 'setup'
  | 'formats'
  | 'acquire'
  | 'subtitles'
  | 'transcribe'
  | 'normalize'
  | 'mux';

/**
 * Base class for all pipeline errors
 */
export class PipelineError extends Error {
  code: string;
  stage: PipelineStage;
  fatal: boolean;
  details?: Record<string, unknown>;

  constructor(
    message: string,
    stage: PipelineStage,
    code = 'pipeline_error',
    details?: Record<string, unknown>,
    fatal = true
  ) {
    super(message);
    this.name = 'PipelineError';
    this.code = code;
    this.stage = stage;
    this.fatal = fatal;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toString(): string {
    return `[${this.stage}] ${this.message} (code: ${this.code})`;
  }
}

export class MissingCredentialsError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'setup', 'missing_credentials', details);
    this.name = 'MissingCredentialsError';
  }
}

export class InvalidVideoUrlError extends PipelineError {
  constructor(url: string) {
    super(`Not a recognized video URL: ${url}`, 'setup', 'invalid_video_url', { url });
    this.name = 'InvalidVideoUrlError';
  }
}

/**
 * The filtered format catalog is empty
 */
export class NoUsableFormatsError extends PipelineError {
  constructor(details?: Record<string, unknown>) {
    super('No usable video formats found', 'formats', 'no_usable_formats', details);
    this.name = 'NoUsableFormatsError';
  }
}

export class MissingVideoAssetError extends PipelineError {
  constructor(path: string) {
    super(`No video file found at ${path}`, 'acquire', 'missing_video_asset', { path });
    this.name = 'MissingVideoAssetError';
  }
}

/**
 * Branch signal: no manually authored subtitles, transcription follows
 */
export class NoManualSubtitlesError extends PipelineError {
  constructor(details?: Record<string, unknown>) {
    super('No manually uploaded subtitles found', 'subtitles', 'no_manual_subtitles', details, false);
    this.name = 'NoManualSubtitlesError';
  }
}

export class MissingAudioAssetError extends PipelineError {
  constructor(path: string) {
    super(`No valid audio file for transcription at ${path}`, 'transcribe', 'missing_audio_asset', {
      path,
    });
    this.name = 'MissingAudioAssetError';
  }
}

export class TranscriptionFailedError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'transcribe', 'transcription_failed', details);
    this.name = 'TranscriptionFailedError';
  }
}

export class NoSubtitleBlocksError extends PipelineError {
  constructor(path?: string) {
    super('No valid subtitle blocks found', 'normalize', 'no_subtitle_blocks', path ? { path } : undefined);
    this.name = 'NoSubtitleBlocksError';
  }
}

export class SubtitleReformatFailedError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'normalize', 'subtitle_reformat_failed', details);
    this.name = 'SubtitleReformatFailedError';
  }
}

export class MuxFailedError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'mux', 'mux_failed', details);
    this.name = 'MuxFailedError';
  }
}

export type InterruptSignal = 'SIGINT' | 'SIGTERM';

export const SIGNAL_EXIT_CODES: Record<InterruptSignal, number> = { SIGINT: 130, SIGTERM: 143 };

/**
 * The user stopped the run (e.g. Ctrl+C at a prompt); exits with the signal's code
 */
export class RunInterruptedError extends PipelineError {
  signal: InterruptSignal;
  exitCode: number;

  constructor(signal: InterruptSignal, stage: PipelineStage = 'setup') {
    super(`Interrupted by ${signal}`, stage, 'interrupted', { signal });
    this.name = 'RunInterruptedError';
    this.signal = signal;
    this.exitCode = SIGNAL_EXIT_CODES[signal];
  }
}

/**
 * An external process exited unsuccessfully or could not be started
 */
export class ToolError extends Error {
  tool: string;
  exitCode?: number;
  stderr: string;
  notFound: boolean;

  constructor(tool: string, message: string, opts: { exitCode?: number; stderr?: string; notFound?: boolean } = {}) {
    super(message);
    this.name = 'ToolError';
    this.tool = tool;
    this.exitCode = opts.exitCode;
    this.stderr = opts.stderr ?? '';
    this.notFound = opts.notFound ?? false;
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/**
 * Wrap anything that is not already a PipelineError so the failing stage is always known.
 */
export function toPipelineError(e: unknown, stage: PipelineStage): PipelineError {
  if (e instanceof PipelineError) return e;
  const details: Record<string, unknown> = {};
  if (e instanceof ToolError) {
    details.tool = e.tool;
    details.exitCode = e.exitCode;
    details.stderrSnippet = e.stderr.slice(-400);
  }
  return new PipelineError(errorMessage(e), stage, 'stage_failed', details);
}
