import fs from 'fs-extra';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { TranscriptionFailedError } from '../src/pipeline/errors';
import type { RunOptions, ToolResult } from '../src/pipeline/exec';
import { audioCodecFor, FfmpegTranscoder } from '../src/pipeline/ffmpeg';
import { MkvmergePackager, packageArgs } from '../src/pipeline/mkvmerge';
import { FasterWhisperEngine, parseRunnerOutput, selectWhisperModel } from '../src/pipeline/whisper';
import type { WhisperOptions } from '../src/pipeline/types';
import { makeTempDir } from './helpers/fakes';

function fakeRun(impl?: (file: string, args: string[]) => Promise<ToolResult>) {
  return vi.fn(async (file: string, args: string[], _opts?: RunOptions): Promise<ToolResult> => {
    if (impl) return impl(file, args);
    return { stdout: '', stderr: '', exitCode: 0 };
  });
}

describe('FfmpegTranscoder', () => {
  it('converts subtitles with an explicit codec', async () => {
    const run = fakeRun();
    await new FfmpegTranscoder('ffmpeg', run).convert('/s/cleaned.srt', '/s/formatted.srt', { subtitleCodec: 'srt' });
    expect(run.mock.calls[0][0]).toBe('ffmpeg');
    expect(run.mock.calls[0][1]).toEqual([
      '-y', '-loglevel', 'error', '-hide_banner', '-nostdin', '-i', '/s/cleaned.srt', '-c:s', 'srt', '/s/formatted.srt',
    ]);
  });

  it('remuxes with a stream copy for video', async () => {
    const run = fakeRun();
    await new FfmpegTranscoder('/usr/bin/ffmpeg', run).remux('/s/v.webm', '/s/a.opus', '/s/out.mp4', {
      video: 'copy',
      audio: 'aac',
    });
    expect(run.mock.calls[0][0]).toBe('/usr/bin/ffmpeg');
    expect(run.mock.calls[0][1].slice(5)).toEqual([
      '-i', '/s/v.webm', '-i', '/s/a.opus', '-map', '0:v:0', '-map', '1:a:0', '-c:v', 'copy', '-c:a', 'aac', '/s/out.mp4',
    ]);
  });

  it('re-encodes audio only when Matroska cannot hold it as is', () => {
    expect(audioCodecFor('/s/a.m4a')).toBe('copy');
    expect(audioCodecFor('/s/a.OPUS')).toBe('copy');
    expect(audioCodecFor('/s/a.wma')).toBe('aac');
  });
});

describe('MkvmergePackager', () => {
  const tracks = [
    { kind: 'media' as const, path: '/s/v.mkv' },
    {
      kind: 'subtitle' as const,
      path: '/s/v.srt',
      language: 'eng',
      name: 'English Subtitles',
      isDefault: true,
      isForced: true,
    },
  ];

  it('puts subtitle track options before the subtitle file', () => {
    expect(packageArgs('/out/v.mkv', tracks)).toEqual([
      '-o', '/out/v.mkv', '/s/v.mkv',
      '--language', '0:eng', '--track-name', '0:English Subtitles', '--default-track', '0:yes', '--forced-track', '0:yes',
      '/s/v.srt',
    ]);
  });

  it('accepts exit code 1 as success with warnings', async () => {
    const run = fakeRun(async () => ({ stdout: 'Warning: ...', stderr: '', exitCode: 1 }));
    expect(await new MkvmergePackager('mkvmerge', run).package('/out/v.mkv', tracks)).toBe('/out/v.mkv');
    expect(run.mock.calls[0][2]).toEqual({ okExitCodes: [1] });
  });
});

describe('whisper engine', () => {
  let root: string;
  let opts: WhisperOptions;

  beforeEach(async () => {
    root = await makeTempDir();
    opts = {
      pythonBin: 'python3',
      modelDir: path.join(root, 'models'),
      preferredModel: 'large-v2',
      fallbackModel: 'small',
      computeType: 'int8',
    };
  });

  afterEach(async () => {
    await fs.remove(root);
  });

  it('falls back to the small model when large weights are not cached', async () => {
    expect(await selectWhisperModel(opts)).toBe('small');
  });

  it('prefers the large model when its weights exist', async () => {
    await fs.ensureDir(path.join(opts.modelDir, 'large-v2'));
    expect(await selectWhisperModel(opts)).toBe('large-v2');
  });

  it('recognizes the hub cache folder layout', async () => {
    await fs.ensureDir(path.join(opts.modelDir, 'models--Systran--faster-whisper-large-v2'));
    expect(await selectWhisperModel(opts)).toBe('large-v2');
  });

  it('runs the runner script and reads its JSON output', async () => {
    const audio = path.join(root, 'clip.m4a');
    const run = fakeRun(async (_file, args) => {
      const out = args[args.indexOf('--output') + 1];
      await fs.writeJson(out, {
        language: 'en',
        segments: [
          { start: 0, end: 1.5, text: '  Hi.  ' },
          { start: 1.5, end: 3, text: 'Bye.' },
        ],
      });
      return { stdout: '', stderr: '', exitCode: 0 };
    });
    const engine = new FasterWhisperEngine(opts, run, '/app/scripts/runner.py');

    const segments = await engine.transcribe(audio, { wordTimestamps: true, verbatimPrompt: 'verbatim' });

    expect(segments).toEqual([
      { start: 0, end: 1.5, text: 'Hi.' },
      { start: 1.5, end: 3, text: 'Bye.' },
    ]);
    expect(run.mock.calls[0][0]).toBe('python3');
    expect(run.mock.calls[0][1]).toEqual([
      '/app/scripts/runner.py',
      '--audio', audio,
      '--model', 'small',
      '--model-dir', opts.modelDir,
      '--compute-type', 'int8',
      '--prompt', 'verbatim',
      '--output', `${audio}.segments.json`,
      '--word-timestamps',
    ]);
    expect(await fs.pathExists(`${audio}.segments.json`)).toBe(false);
  });

  it('fails when the runner writes no output', async () => {
    const engine = new FasterWhisperEngine(opts, fakeRun(), '/app/scripts/runner.py');
    await expect(
      engine.transcribe(path.join(root, 'clip.m4a'), { wordTimestamps: true, verbatimPrompt: 'v' })
    ).rejects.toThrow(TranscriptionFailedError);
  });

  it('rejects runner output without a segments array', () => {
    expect(() => parseRunnerOutput({ language: 'en' })).toThrow('no segments array');
    expect(parseRunnerOutput({ segments: [{ start: 0, end: 1, text: 'ok' }, { start: 'x' }] })).toEqual([
      { start: 0, end: 1, text: 'ok' },
    ]);
  });
});
