import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { vi } from 'vitest';
import type {
  CodecPolicy,
  ContainerPackager,
  ConvertOptions,
  FetchOptions,
  MediaSourceClient,
  MediaTranscoder,
  PackageTrack,
  PipelineConfig,
  PipelineContext,
  SpeechEngine,
  TimedText,
  TranscribeRequest,
} from '../../src/pipeline/types';

export async function makeTempDir(prefix = 'subembed-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export function testConfig(root: string): PipelineConfig {
  return {
    outputDir: path.join(root, 'out'),
    scratchRoot: path.join(root, 'scratch'),
    subtitles: { language: 'en', trackLanguage: 'eng', trackName: 'English Subtitles' },
    ytdlp: { bin: 'yt-dlp', pythonBin: '', cookiesFile: path.join(root, 'cookies.txt'), userAgent: '', extraArgs: [] },
    ffmpegBin: 'ffmpeg',
    mkvmergeBin: 'mkvmerge',
    whisper: {
      pythonBin: 'python3',
      modelDir: path.join(root, 'models'),
      preferredModel: 'large-v2',
      fallbackModel: 'small',
      computeType: 'int8',
    },
  };
}

export async function testContext(root: string, title = 'Sample Clip'): Promise<PipelineContext> {
  const scratchDir = path.join(root, 'scratch');
  const outputDir = path.join(root, 'out');
  await fs.ensureDir(scratchDir);
  await fs.ensureDir(outputDir);
  return {
    url: 'https://www.youtube.com/watch?v=abcdef123',
    videoId: 'abcdef123',
    title,
    container: 'mkv',
    scratchDir,
    outputDir,
    outputPath: path.join(outputDir, `${title}.mkv`),
    videoPath: path.join(scratchDir, `${title}.mkv`),
    audioPath: path.join(scratchDir, `${title}.m4a`),
    subtitlePath: path.join(scratchDir, `${title}.srt`),
  };
}

export const SAMPLE_CATALOG = [
  '[info] Available formats for abcdef123:',
  'ID  EXT   RESOLUTION FPS CH |   FILESIZE   TBR PROTO | VCODEC          VBR ACODEC      ABR ASR MORE INFO',
  '----------------------------------------------------------------------------------------------------',
  'sb0 mhtml 48x27        0    |                  mhtml | images                                  storyboard',
  '139 m4a   audio only      2 |    1.54MiB   49k https | audio only          mp4a.40.5   49k 22k low, m4a_dash',
  '18  mp4   640x360     25  2 |    6.62MiB  360k https | avc1.42001E         mp4a.40.2       44k 360p',
  '136 mp4   1280x720    25    |   18.90MiB 1020k https | avc1.4d401f   1020k video only          720p, mp4_dash',
  '137 mp4   1920x1080   25    |   64.07MiB 3478k https | avc1.640028   3478k video only          1080p, mp4_dash',
  '248 webm  1920x1080   25    |   40.13MiB 2178k https | vp9           2178k video only          1080p, webm_dash',
].join('\n');

export interface FakeSourceOptions {
  catalog?: string;
  title?: string;
  /** Files (basename → content) written by fetchSubtitles into the pattern's directory. */
  subtitles?: Record<string, string>;
  failAudio?: boolean;
  failSubtitles?: boolean;
}

/** In-process media source: every fetch writes a small placeholder file. */
export class FakeSource implements MediaSourceClient {
  calls: Array<{ selector: string; destination: string; options: FetchOptions }> = [];
  subtitleRequests = 0;

  constructor(private readonly opts: FakeSourceOptions = {}) {}

  async listFormats(): Promise<string> {
    return this.opts.catalog ?? SAMPLE_CATALOG;
  }

  async fetch(_url: string, selector: string, destination: string, options: FetchOptions = {}): Promise<string> {
    this.calls.push({ selector, destination, options });
    if (options.audioOnly && this.opts.failAudio) {
      throw new Error('ERROR: Requested format is not available');
    }
    await fs.outputFile(destination, `media:${selector}`);
    return destination;
  }

  async fetchTitle(): Promise<string> {
    return this.opts.title ?? 'Sample: Clip!';
  }

  async fetchSubtitles(_url: string, _lang: string, destinationPattern: string): Promise<string[]> {
    this.subtitleRequests += 1;
    if (this.opts.failSubtitles) throw new Error('ERROR: unable to download subtitles');
    const dir = path.dirname(destinationPattern);
    const written: string[] = [];
    for (const [name, content] of Object.entries(this.opts.subtitles ?? {})) {
      const p = path.join(dir, name);
      await fs.outputFile(p, content);
      written.push(p);
    }
    return written;
  }
}

/** Copies inputs through; VTT headers are stripped the way a real converter would. */
export class FakeTranscoder implements MediaTranscoder {
  converts: Array<{ input: string; output: string; options: ConvertOptions }> = [];
  remuxes: Array<{ video: string; audio: string; output: string; policy: CodecPolicy }> = [];

  async convert(input: string, output: string, options: ConvertOptions = {}): Promise<void> {
    this.converts.push({ input, output, options });
    const text = await fs.readFile(input, 'utf8');
    await fs.outputFile(output, text.replace(/^WEBVTT[^\n]*\n+/, '').replace(/(\d{2}:\d{2}:\d{2})\.(\d{3})/g, '$1,$2'));
  }

  async remux(video: string, audio: string, output: string, policy: CodecPolicy): Promise<void> {
    this.remuxes.push({ video, audio, output, policy });
    await fs.outputFile(output, 'merged');
  }
}

export class FakePackager implements ContainerPackager {
  calls: Array<{ output: string; tracks: PackageTrack[] }> = [];

  constructor(private readonly produce = true) {}

  async package(output: string, tracks: PackageTrack[]): Promise<string> {
    this.calls.push({ output, tracks });
    if (this.produce) await fs.outputFile(output, 'mkv');
    return output;
  }
}

export class FakeSpeech implements SpeechEngine {
  transcribe = vi.fn(async (_audio: string, _opts: TranscribeRequest): Promise<TimedText[]> => this.segments);

  constructor(private readonly segments: TimedText[] = [
    { start: 0, end: 2.5, text: ' Hello there. ' },
    { start: 2.5, end: 75.4005, text: 'General Kenobi.' },
  ]) {}
}
