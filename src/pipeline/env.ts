import * as dotenv from 'dotenv';
import os from 'os';
import path from 'path';
import type { PipelineConfig } from './types';
import { isLogLevel, type LogFormat, type LogLevel } from './log';

dotenv.config();

type EnvSource = Record<string, string | undefined>;

function expandHome(p: string): string {
    if (p === '~') return os.homedir();
    if (p.startsWith('~/')) return path.join(os.homedir(), p.slice(2));
    return p;
}

function splitArgs(v: string | undefined): string[] {
    return (v || '')
        .split(' ')
        .map((s) => s.trim())
        .filter(Boolean);
}

export interface LoggingConfig {
    level: LogLevel;
    format: LogFormat;
    file: string;
}

/** Builds the explicit pipeline configuration; the pipeline itself never reads process.env. */
export function readConfig(env: EnvSource = process.env): PipelineConfig {
    return {
        outputDir: path.resolve(expandHome(env.OUTPUT_DIR || '~/Downloads')),
        scratchRoot: path.resolve(expandHome(env.SCRATCH_ROOT || os.tmpdir())),
        subtitles: {
            language: env.SUBTITLE_LANG || 'en',
            trackLanguage: env.SUBTITLE_TRACK_LANG || 'eng',
            trackName: env.SUBTITLE_TRACK_NAME || 'English Subtitles',
        },
        ytdlp: {
            bin: env.YTDLP_BIN || 'yt-dlp',
            // Optional: interpreter with yt_dlp installed, used only when the binary is missing
            pythonBin: env.YTDLP_PYTHON_BIN || '',
            cookiesFile: env.YTDLP_COOKIES_FILE === undefined
                ? expandHome('~/cookies.txt')
                : expandHome(env.YTDLP_COOKIES_FILE),
            userAgent: env.YTDLP_USER_AGENT || '',
            extraArgs: splitArgs(env.YTDLP_EXTRA_ARGS),
        },
        ffmpegBin: env.FFMPEG_BIN || 'ffmpeg',
        mkvmergeBin: env.MKVMERGE_BIN || 'mkvmerge',
        whisper: {
            pythonBin: env.WHISPER_PYTHON_BIN || 'python3',
            modelDir: path.resolve(expandHome(env.WHISPER_MODEL_DIR || '~/whisper-env/models')),
            preferredModel: env.WHISPER_MODEL || 'large-v2',
            fallbackModel: env.WHISPER_FALLBACK_MODEL || 'small',
            computeType: env.WHISPER_COMPUTE_TYPE || 'int8',
        },
    };
}

export function readLoggingConfig(env: EnvSource = process.env): LoggingConfig {
    const level = env.LOG_LEVEL;
    return {
        level: isLogLevel(level) ? level : 'info',
        format: env.LOG_FORMAT === 'pretty' ? 'pretty' : 'json',
        file: env.LOG_FILE ? expandHome(env.LOG_FILE) : '',
    };
}
