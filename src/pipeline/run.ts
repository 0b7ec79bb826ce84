import { acquireVideo, resolveSelection } from "./acquire";
import { createPipelineContext, type InterruptOptions, registerInterruptCleanup, releaseContext } from "./context";
import {
  errorMessage,
  NoManualSubtitlesError,
  PipelineError,
  type PipelineStage,
  RunInterruptedError,
  toPipelineError,
} from "./errors";
import { resolveFormats } from "./formats";
import { sanitizeTitle, toVideoId } from "./ids";
import { error, info, warn } from "./log";
import { muxFinal } from "./mux";
import { normalizeSubtitleFile } from "./srt";
import { selectManualSubtitles } from "./subtitles";
import { transcribeToSrt } from "./transcribe";
import type { PipelineConfig, PipelineDeps, StreamDescriptor, SubtitleSource } from "./types";

export interface RunPipelineOptions {
  config: PipelineConfig;
  deps: PipelineDeps;
  /** Returns a 1-based index into the format menu; 0 picks automatically. */
  chooseFormat?: (formats: StreamDescriptor[]) => number | Promise<number>;
  /** Signal handling overrides; `false` leaves signals alone. */
  interrupt?: InterruptOptions | false;
}

export interface RunPipelineResult {
  outputPath: string;
  subtitleSource: SubtitleSource;
  segments: number;
  degraded: boolean;
}

async function stage<T>(name: PipelineStage, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (e: unknown) {
    throw toPipelineError(e, name);
  }
}

async function resolveTitle(url: string, videoId: string, deps: PipelineDeps): Promise<string> {
  try {
    return sanitizeTitle(await deps.source.fetchTitle(url), videoId);
  } catch (e: unknown) {
    warn("run.title.fail", { videoId, error: errorMessage(e) });
    return sanitizeTitle(videoId);
  }
}

/**
 * One sequential run: formats → acquire → manual subtitles or transcription →
 * normalize → mux. The scratch directory is removed however the run ends.
 */
export async function runPipeline(url: string, opts: RunPipelineOptions): Promise<RunPipelineResult> {
  const { config, deps } = opts;
  const videoId = toVideoId(url);
  const title = await resolveTitle(url, videoId, deps);
  const ctx = await createPipelineContext(config, { url, videoId, title });
  const detach = opts.interrupt === false ? () => undefined : registerInterruptCleanup(ctx, opts.interrupt);
  const startTs = Date.now();
  info("run.start", { videoId, title, scratchDir: ctx.scratchDir, output: ctx.outputPath });

  try {
    const formats = await stage("formats", async () => resolveFormats(await deps.source.listFormats(url)));
    const index = opts.chooseFormat ? await opts.chooseFormat(formats) : 0;
    const selection = resolveSelection(formats, index);
    const acquired = await stage("acquire", () => acquireVideo(ctx, selection, deps));
    if (acquired.degraded) {
      warn("run.degraded", { reason: "audio could not be merged; output is video-only" });
    }

    let subtitleSource: SubtitleSource;
    try {
      subtitleSource = await stage("subtitles", () => selectManualSubtitles(ctx, config.subtitles.language, deps));
    } catch (e: unknown) {
      if (!(e instanceof NoManualSubtitlesError)) throw e;
      warn("run.subtitles.none", { videoId, next: "transcribe" });
      await stage("transcribe", () => transcribeToSrt(ctx, deps));
      subtitleSource = "transcribed";
    }

    ctx.subtitles = await stage("normalize", () => normalizeSubtitleFile(ctx.subtitlePath, deps.transcoder));
    const outputPath = await stage("mux", () =>
      muxFinal(ctx, acquired.asset, ctx.subtitlePath, config.subtitles, deps)
    );

    info("run.complete", { videoId, outputPath, subtitleSource, durationMs: Date.now() - startTs });
    return {
      outputPath,
      subtitleSource,
      segments: ctx.subtitles.length,
      degraded: acquired.degraded,
    };
  } catch (e: unknown) {
    const err = e instanceof PipelineError ? e : toPipelineError(e, "setup");
    if (err instanceof RunInterruptedError) {
      warn("run.interrupted", { videoId, signal: err.signal, stage: err.stage });
      throw err;
    }
    error("run.fail", { videoId, stage: err.stage, code: err.code, error: err.message, ...err.details });
    throw err;
  } finally {
    detach();
    await releaseContext(ctx);
  }
}
