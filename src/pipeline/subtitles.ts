import fs from 'fs-extra';
import path from 'path';
import { errorMessage, NoManualSubtitlesError } from './errors';
import { info, startStep, warn } from './log';
import type { PipelineContext, PipelineDeps, SubtitleSource } from './types';

function escapeRegExp(s: string) {
    return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * True when a `<name>.<lang>[-region].vtt` file carries the wanted language tag.
 * With `exact`, a regional variant such as `en-GB` does not count.
 */
export function hasLanguageTag(file: string, language: string, exact = false): boolean {
    const base = path.basename(file);
    const region = exact ? '' : '([-_][\\w-]+)?';
    return new RegExp(`\\.${escapeRegExp(language)}${region}\\.[a-z0-9]+$`, 'i').test(base);
}

export function pickSubtitleFile(
    files: string[],
    language: string
): { kind: 'vtt' | 'srt'; path: string } | null {
    const vtts = files.filter((f) => path.extname(f).toLowerCase() === '.vtt');
    const vtt =
        vtts.find((f) => hasLanguageTag(f, language, true)) ?? vtts.find((f) => hasLanguageTag(f, language));
    if (vtt) return { kind: 'vtt', path: vtt };
    const srt = files.find((f) => path.extname(f).toLowerCase() === '.srt');
    if (srt) return { kind: 'srt', path: srt };
    return null;
}

/**
 * Looks for manually authored subtitles and leaves them as SRT at
 * `ctx.subtitlePath`. Throws NoManualSubtitlesError when there are none, which
 * sends the run down the transcription path.
 */
export async function selectManualSubtitles(
    ctx: PipelineContext,
    language: string,
    deps: Pick<PipelineDeps, 'source' | 'transcoder'>
): Promise<SubtitleSource> {
    const timer = startStep('subtitles.manual', { videoId: ctx.videoId, language });
    const pattern = path.join(ctx.scratchDir, `${ctx.title}.%(ext)s`);
    let files: string[] = [];
    try {
        files = await deps.source.fetchSubtitles(ctx.url, `${language}.*`, pattern);
    } catch (e: unknown) {
        warn('subtitles.manual.fail', { videoId: ctx.videoId, error: errorMessage(e) });
    }
    const picked = pickSubtitleFile(files, language);
    timer.end({ found: files.length, picked: picked?.path ?? null });
    if (!picked) {
        throw new NoManualSubtitlesError({ files });
    }
    if (picked.kind === 'vtt') {
        info('subtitles.convert', { from: picked.path, to: ctx.subtitlePath });
        await deps.transcoder.convert(picked.path, ctx.subtitlePath);
        await fs.remove(picked.path);
        return 'converted';
    }
    if (picked.path !== ctx.subtitlePath) {
        await fs.move(picked.path, ctx.subtitlePath, { overwrite: true });
    }
    info('subtitles.manual', { path: ctx.subtitlePath });
    return 'manual';
}
