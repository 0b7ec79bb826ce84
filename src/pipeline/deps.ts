import { FfmpegTranscoder } from './ffmpeg';
import { MkvmergePackager } from './mkvmerge';
import type { PipelineConfig, PipelineDeps } from './types';
import { FasterWhisperEngine } from './whisper';
import { createYtDlpClient } from './ytdlp';

/** Wires the real external tools. Rejects with MissingCredentialsError when no cookies file is usable. */
export async function createDefaultDeps(config: PipelineConfig): Promise<PipelineDeps> {
    return {
        source: await createYtDlpClient(config.ytdlp),
        transcoder: new FfmpegTranscoder(config.ffmpegBin),
        packager: new MkvmergePackager(config.mkvmergeBin),
        speech: new FasterWhisperEngine(config.whisper),
    };
}
