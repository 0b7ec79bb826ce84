import { runTool, type ToolRunner } from './exec';
import { warn } from './log';
import type { ContainerPackager, PackageTrack } from './types';

/** mkvmerge always writes Matroska. */
export const MATROSKA_EXTENSION = 'mkv';

function yesNo(v: boolean) {
    return v ? 'yes' : 'no';
}

export function packageArgs(outputPath: string, tracks: PackageTrack[]): string[] {
    const args = ['-o', outputPath];
    for (const t of tracks) {
        if (t.kind === 'subtitle') {
            // Track options precede the file they apply to; track 0 is the only track of an .srt
            args.push(
                '--language',
                `0:${t.language}`,
                '--track-name',
                `0:${t.name}`,
                '--default-track',
                `0:${yesNo(t.isDefault)}`,
                '--forced-track',
                `0:${yesNo(t.isForced)}`
            );
        }
        args.push(t.path);
    }
    return args;
}

export class MkvmergePackager implements ContainerPackager {
    constructor(
        private readonly bin = 'mkvmerge',
        private readonly run: ToolRunner = runTool
    ) {}

    async package(outputPath: string, tracks: PackageTrack[]): Promise<string> {
        const res = await this.run(this.bin, packageArgs(outputPath, tracks), { okExitCodes: [1] });
        if (res.exitCode === 1) {
            warn('mkvmerge.warnings', { outputPath, stdoutSnippet: res.stdout.slice(-400) });
        }
        return outputPath;
    }
}
