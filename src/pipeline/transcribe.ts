import fs from 'fs-extra';
import { errorMessage, MissingAudioAssetError, TranscriptionFailedError } from './errors';
import { acquireAudio } from './acquire';
import { info, startStep } from './log';
import { serializeSrt, toSegments } from './srt';
import type { PipelineContext, PipelineDeps, SubtitleTrack } from './types';

export const VERBATIM_PROMPT =
    'Transcribe everything exactly as spoken, with no censorship of profanity, slurs and sensitive language.';

/**
 * Generates subtitles from the audio track and writes them as SRT to
 * `ctx.subtitlePath`. Audio is reused from the context or downloaded first.
 */
export async function transcribeToSrt(
    ctx: PipelineContext,
    deps: Pick<PipelineDeps, 'source' | 'speech'>
): Promise<SubtitleTrack> {
    const audio = await acquireAudio(ctx, deps);
    if (!audio) {
        throw new MissingAudioAssetError(ctx.audioPath);
    }

    const timer = startStep('transcribe', { videoId: ctx.videoId, audio: audio.path });
    let segments: SubtitleTrack;
    try {
        const timed = await deps.speech.transcribe(audio.path, {
            wordTimestamps: true,
            verbatimPrompt: VERBATIM_PROMPT,
        });
        segments = toSegments(timed);
    } catch (e: unknown) {
        if (e instanceof TranscriptionFailedError) throw e;
        throw new TranscriptionFailedError(`Speech engine failed: ${errorMessage(e)}`, { audio: audio.path });
    }

    await fs.writeFile(ctx.subtitlePath, serializeSrt(segments));
    const st = await fs.stat(ctx.subtitlePath).catch(() => null);
    if (!st || st.size === 0) {
        throw new TranscriptionFailedError('Failed to generate subtitles: output is empty', {
            path: ctx.subtitlePath,
        });
    }
    timer.end({ segments: segments.length });
    info('transcribe.complete', { path: ctx.subtitlePath, segments: segments.length });
    return segments;
}
