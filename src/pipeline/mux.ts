import fs from 'fs-extra';
import path from 'path';
import { probeAsset } from './context';
import { errorMessage, MuxFailedError } from './errors';
import { info, startStep } from './log';
import type { MediaAsset, PackageTrack, PipelineContext, PipelineDeps, SubtitleOptions } from './types';

/** The packager writes here first; the destination only ever receives a finished file. */
export function stagingPath(ctx: PipelineContext): string {
    return path.join(ctx.scratchDir, 'package', `${ctx.title}.${ctx.container}`);
}

/**
 * Writes the final container to `ctx.outputPath`. With a subtitle file the
 * track is embedded as the default, forced text track and the file removed.
 */
export async function muxFinal(
    ctx: PipelineContext,
    media: MediaAsset,
    subtitlePath: string | null,
    subtitle: SubtitleOptions,
    deps: Pick<PipelineDeps, 'packager'>
): Promise<string> {
    const subFile = subtitlePath !== null && (await fs.pathExists(subtitlePath)) ? subtitlePath : null;
    const tracks: PackageTrack[] = [{ kind: 'media', path: media.path }];
    if (subFile) {
        tracks.push({
            kind: 'subtitle',
            path: subFile,
            language: subtitle.trackLanguage,
            name: subtitle.trackName,
            isDefault: true,
            isForced: true,
        });
    }
    const staged = stagingPath(ctx);
    await fs.emptyDir(path.dirname(staged));
    const timer = startStep('mux', { output: ctx.outputPath, subtitles: subFile !== null });
    try {
        await deps.packager.package(staged, tracks);
    } catch (e: unknown) {
        await fs.remove(staged);
        throw new MuxFailedError(`Packaging failed: ${errorMessage(e)}`, { output: ctx.outputPath });
    }
    if (!(await probeAsset(staged, 'merged')).present) {
        await fs.remove(staged);
        throw new MuxFailedError(`Final output was not produced at ${ctx.outputPath}`, { output: ctx.outputPath });
    }
    await fs.move(staged, ctx.outputPath, { overwrite: true });
    info('mux.published', { from: staged, to: ctx.outputPath });
    if (subFile) {
        await fs.remove(subFile);
    }
    timer.end();
    return ctx.outputPath;
}
