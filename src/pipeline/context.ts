import fs from 'fs-extra';
import path from 'path';
import { type InterruptSignal, SIGNAL_EXIT_CODES } from './errors';
import { info, warn } from './log';
import { MATROSKA_EXTENSION } from './mkvmerge';
import type { MediaAsset, MediaKind, PipelineConfig, PipelineContext } from './types';

export interface ContextInit {
    url: string;
    videoId: string;
    title: string; // already sanitized
}

/** Creates the per-run scratch directory and lays out every path the run will use. */
export async function createPipelineContext(config: PipelineConfig, init: ContextInit): Promise<PipelineContext> {
    await fs.ensureDir(config.scratchRoot);
    await fs.ensureDir(config.outputDir);
    const scratchDir = await fs.mkdtemp(path.join(config.scratchRoot, 'subembed-'));
    const { title } = init;
    const container = MATROSKA_EXTENSION;
    return {
        url: init.url,
        videoId: init.videoId,
        title,
        container,
        scratchDir,
        outputDir: config.outputDir,
        outputPath: path.join(config.outputDir, `${title}.${container}`),
        videoPath: path.join(scratchDir, `${title}.${container}`),
        audioPath: path.join(scratchDir, `${title}.m4a`),
        subtitlePath: path.join(scratchDir, `${title}.srt`),
    };
}

/** Present means the file exists and is non-empty. */
export async function probeAsset(p: string, kind: MediaKind): Promise<MediaAsset> {
    try {
        const st = await fs.stat(p);
        return { path: p, kind, present: st.isFile() && st.size > 0 };
    } catch {
        return { path: p, kind, present: false };
    }
}

export async function releaseContext(ctx: PipelineContext): Promise<void> {
    await fs.remove(ctx.scratchDir);
    info('context.released', { scratchDir: ctx.scratchDir });
}

export const INTERRUPT_SIGNALS: readonly InterruptSignal[] = ['SIGINT', 'SIGTERM'];

export interface SignalSource {
    on(event: InterruptSignal, listener: () => void): unknown;
    off(event: InterruptSignal, listener: () => void): unknown;
}

export interface InterruptOptions {
    source?: SignalSource;
    exit?: (code: number) => void;
}

/**
 * On SIGINT/SIGTERM the scratch directory is removed synchronously before the
 * process exits. Returns a function that detaches the handlers.
 */
export function registerInterruptCleanup(ctx: PipelineContext, opts: InterruptOptions = {}): () => void {
    const source: SignalSource = opts.source ?? process;
    const exit = opts.exit ?? ((code: number) => process.exit(code));
    const handlers = INTERRUPT_SIGNALS.map((signal) => {
        const handler = () => {
            warn('run.interrupted', { signal, scratchDir: ctx.scratchDir });
            fs.removeSync(ctx.scratchDir);
            exit(SIGNAL_EXIT_CODES[signal]);
        };
        source.on(signal, handler);
        return [signal, handler] as const;
    });
    return () => {
        for (const [signal, handler] of handlers) source.off(signal, handler);
    };
}
