import fs from 'fs-extra';
import path from 'path';
import { errorMessage, MissingVideoAssetError } from './errors';
import { audioCodecFor } from './ffmpeg';
import { probeAsset } from './context';
import { info, startStep, warn } from './log';
import type { FormatSelection, MediaAsset, PipelineContext, PipelineDeps, StreamDescriptor } from './types';

export const BEST_SELECTOR = 'bestvideo+bestaudio/best';
export const BEST_AUDIO_SELECTOR = 'bestaudio/best';
export const AUDIO_FORMAT = 'm4a';

export interface AcquireResult {
    asset: MediaAsset;
    /** True when a video-only stream had to be kept without audio. */
    degraded: boolean;
}

/** 0 means automatic; an index outside 1..N falls back to best with a warning. */
export function resolveSelection(formats: StreamDescriptor[], index: number): FormatSelection {
    if (index === 0) return { kind: 'best' };
    const format = Number.isInteger(index) ? formats[index - 1] : undefined;
    if (!format) {
        warn('acquire.selection.invalid', { index, available: formats.length });
        return { kind: 'best' };
    }
    return { kind: 'format', format };
}

/**
 * Reuses `ctx.audio` when it is present; otherwise downloads the best audio
 * stream. Returns null instead of throwing when nothing usable arrives.
 */
export async function acquireAudio(ctx: PipelineContext, deps: Pick<PipelineDeps, 'source'>): Promise<MediaAsset | null> {
    if (ctx.audio?.present) {
        info('acquire.audio.reuse', { path: ctx.audio.path });
        return ctx.audio;
    }
    const timer = startStep('acquire.audio', { videoId: ctx.videoId });
    try {
        await deps.source.fetch(ctx.url, BEST_AUDIO_SELECTOR, ctx.audioPath, {
            audioOnly: true,
            extractFormat: AUDIO_FORMAT,
        });
    } catch (e: unknown) {
        warn('acquire.audio.fail', { videoId: ctx.videoId, error: errorMessage(e) });
    }
    const asset = await probeAsset(ctx.audioPath, 'audio');
    timer.end({ present: asset.present });
    if (!asset.present) return null;
    ctx.audio = asset;
    return asset;
}

async function acquireVideoOnly(
    ctx: PipelineContext,
    format: StreamDescriptor,
    deps: Pick<PipelineDeps, 'source' | 'transcoder'>
): Promise<AcquireResult> {
    warn('acquire.videoOnly', { id: format.id, note: 'audio will be downloaded separately and merged' });
    const videoOnlyPath = path.join(ctx.scratchDir, `${ctx.title}_video.${format.extension || 'webm'}`);
    await deps.source.fetch(ctx.url, format.id, videoOnlyPath);
    const videoOnly = await probeAsset(videoOnlyPath, 'video');
    if (!videoOnly.present) {
        throw new MissingVideoAssetError(videoOnlyPath);
    }

    const audio = await acquireAudio(ctx, deps);
    if (!audio) {
        warn('acquire.degraded', { reason: 'audio missing', output: videoOnlyPath });
        return { asset: videoOnly, degraded: true };
    }

    const policy = { video: 'copy', audio: audioCodecFor(audio.path) } as const;
    info('acquire.merge', { video: videoOnlyPath, audio: audio.path, policy });
    await deps.transcoder.remux(videoOnlyPath, audio.path, ctx.videoPath, policy);
    await fs.remove(videoOnlyPath);
    return { asset: await probeAsset(ctx.videoPath, 'merged'), degraded: false };
}

/**
 * Fetches the chosen stream into the scratch directory. The returned asset is
 * guaranteed present; otherwise MissingVideoAssetError is thrown.
 */
export async function acquireVideo(
    ctx: PipelineContext,
    selection: FormatSelection,
    deps: Pick<PipelineDeps, 'source' | 'transcoder'>
): Promise<AcquireResult> {
    const timer = startStep('acquire.video', {
        videoId: ctx.videoId,
        selection: selection.kind === 'best' ? 'best' : selection.format.id,
    });
    let result: AcquireResult;
    if (selection.kind === 'best') {
        await deps.source.fetch(ctx.url, BEST_SELECTOR, ctx.videoPath, { mergeFormat: ctx.container });
        result = { asset: await probeAsset(ctx.videoPath, 'merged'), degraded: false };
    } else if (selection.format.classification === 'video-only') {
        result = await acquireVideoOnly(ctx, selection.format, deps);
    } else {
        await deps.source.fetch(ctx.url, selection.format.id, ctx.videoPath, { mergeFormat: ctx.container });
        result = { asset: await probeAsset(ctx.videoPath, 'merged'), degraded: false };
    }
    if (!result.asset.present) {
        throw new MissingVideoAssetError(result.asset.path);
    }
    ctx.video = result.asset;
    timer.end({ path: result.asset.path, degraded: result.degraded });
    return result;
}
