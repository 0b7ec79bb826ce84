import fs from 'fs-extra';
import path from 'path';
import { MissingCredentialsError, ToolError } from './errors';
import { runTool, type ToolResult, type ToolRunner } from './exec';
import { debug, warn } from './log';
import type { FetchOptions, MediaSourceClient, YtDlpOptions } from './types';

const SUBTITLE_EXTENSIONS = new Set(['.vtt', '.srt', '.ass', '.ttml', '.srv3', '.json3']);

/** yt-dlp backed media source. Requires a cookies file; see {@link createYtDlpClient}. */
export class YtDlpClient implements MediaSourceClient {
    constructor(
        private readonly opts: YtDlpOptions,
        private readonly run: ToolRunner = runTool
    ) {}

    private baseArgs(): string[] {
        const extra = ['--cookies', this.opts.cookiesFile];
        if (this.opts.userAgent) {
            extra.push('--user-agent', this.opts.userAgent);
        }
        return [...extra, ...this.opts.extraArgs];
    }

    /**
     * Tries the configured binary, then `yt-dlp` on PATH, then `python -m yt_dlp`.
     * Only a missing executable moves on to the next candidate.
     */
    async exec(args: string[]): Promise<ToolResult> {
        const full = [...this.baseArgs(), ...args];
        const candidates: Array<[string, string[]]> = [[this.opts.bin, full]];
        if (this.opts.bin !== 'yt-dlp') candidates.push(['yt-dlp', full]);
        if (this.opts.pythonBin) candidates.push([this.opts.pythonBin, ['-m', 'yt_dlp', ...full]]);
        candidates.push(['python3', ['-m', 'yt_dlp', ...full]]);

        const tried: string[] = [];
        for (const [cmd, a] of candidates) {
            tried.push(cmd);
            try {
                return await this.run(cmd, a, { onLine: (line) => debug('ytdlp.out', { line }) });
            } catch (e: unknown) {
                if (e instanceof ToolError && e.notFound) continue;
                throw e;
            }
        }
        throw new ToolError('yt-dlp', `yt-dlp is not installed. Tried: ${tried.join(', ')}`, { notFound: true });
    }

    async listFormats(url: string): Promise<string> {
        const res = await this.exec(['-F', url]);
        return res.stdout;
    }

    async fetch(url: string, selector: string, destination: string, options: FetchOptions = {}): Promise<string> {
        const args = ['-f', selector];
        if (options.mergeFormat) args.push('--merge-output-format', options.mergeFormat);
        if (options.audioOnly) {
            args.push('--extract-audio');
            if (options.extractFormat) args.push('--audio-format', options.extractFormat);
        }
        args.push('-o', destination, url);
        await this.exec(args);
        return destination;
    }

    async fetchTitle(url: string): Promise<string> {
        const res = await this.exec(['--skip-download', '--print', 'title', url]);
        return res.stdout.trim();
    }

    async fetchSubtitles(url: string, languageFilter: string, destinationPattern: string): Promise<string[]> {
        const dir = path.dirname(destinationPattern);
        await fs.ensureDir(dir);
        const before = new Set(await fs.readdir(dir));
        await this.exec([
            '--write-subs',
            '--skip-download',
            '--sub-langs',
            languageFilter,
            '-o',
            destinationPattern,
            url,
        ]);
        const written = (await fs.readdir(dir))
            .filter((f) => !before.has(f) && SUBTITLE_EXTENSIONS.has(path.extname(f).toLowerCase()))
            .sort()
            .map((f) => path.join(dir, f));
        debug('ytdlp.subtitles.written', { files: written });
        return written;
    }
}

/** Fails fast when the cookies file is unset or missing. */
export async function createYtDlpClient(opts: YtDlpOptions, run?: ToolRunner): Promise<YtDlpClient> {
    if (!opts.cookiesFile) {
        throw new MissingCredentialsError('YTDLP_COOKIES_FILE is not set. Export your browser cookies first.');
    }
    if (!(await fs.pathExists(opts.cookiesFile))) {
        warn('ytdlp.cookies.missing', { path: opts.cookiesFile });
        throw new MissingCredentialsError(`Cookies file not found at ${opts.cookiesFile}.`, {
            path: opts.cookiesFile,
        });
    }
    return new YtDlpClient(opts, run);
}
