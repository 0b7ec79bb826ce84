import path from 'path';
import { runTool, type ToolRunner } from './exec';
import type { CodecPolicy, ConvertOptions, MediaTranscoder } from './types';

// Audio files whose stream Matroska takes as is
const MATROSKA_AUDIO = ['m4a', 'aac', 'mp3', 'opus', 'ogg', 'webm', 'flac', 'mka', 'wav'];

export function audioCodecFor(audioPath: string): CodecPolicy['audio'] {
    const ext = path.extname(audioPath).slice(1).toLowerCase();
    return MATROSKA_AUDIO.includes(ext) ? 'copy' : 'aac';
}

export class FfmpegTranscoder implements MediaTranscoder {
    constructor(
        private readonly bin = 'ffmpeg',
        private readonly run: ToolRunner = runTool
    ) {}

    private base(): string[] {
        return ['-y', '-loglevel', 'error', '-hide_banner', '-nostdin'];
    }

    async convert(inputPath: string, outputPath: string, options: ConvertOptions = {}): Promise<void> {
        const args = [...this.base(), '-i', inputPath];
        if (options.subtitleCodec) args.push('-c:s', options.subtitleCodec);
        args.push(outputPath);
        await this.run(this.bin, args);
    }

    async remux(videoPath: string, audioPath: string, outputPath: string, policy: CodecPolicy): Promise<void> {
        await this.run(this.bin, [
            ...this.base(),
            '-i',
            videoPath,
            '-i',
            audioPath,
            '-map',
            '0:v:0',
            '-map',
            '1:a:0',
            '-c:v',
            policy.video,
            '-c:a',
            policy.audio,
            outputPath,
        ]);
    }
}
