import fs from 'fs-extra';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { acquireAudio, acquireVideo, BEST_SELECTOR, resolveSelection } from '../src/pipeline/acquire';
import { MissingVideoAssetError } from '../src/pipeline/errors';
import { resolveFormats } from '../src/pipeline/formats';
import type { MediaSourceClient, PipelineContext } from '../src/pipeline/types';
import { FakeSource, FakeTranscoder, makeTempDir, SAMPLE_CATALOG, testContext } from './helpers/fakes';

const formats = resolveFormats(SAMPLE_CATALOG);

describe('resolveSelection', () => {
  it('treats 0 as automatic', () => {
    expect(resolveSelection(formats, 0)).toEqual({ kind: 'best' });
  });

  it('maps a 1-based index onto the menu', () => {
    expect(resolveSelection(formats, 2)).toEqual({ kind: 'format', format: formats[1] });
  });

  it('falls back to best for out-of-range or fractional input', () => {
    expect(resolveSelection(formats, 9)).toEqual({ kind: 'best' });
    expect(resolveSelection(formats, -1)).toEqual({ kind: 'best' });
    expect(resolveSelection(formats, 1.5)).toEqual({ kind: 'best' });
  });
});

describe('acquireVideo', () => {
  let root: string;
  let ctx: PipelineContext;

  beforeEach(async () => {
    root = await makeTempDir();
    ctx = await testContext(root);
  });

  afterEach(async () => {
    await fs.remove(root);
  });

  it('fetches best video+audio merged into the container', async () => {
    const source = new FakeSource();
    const res = await acquireVideo(ctx, { kind: 'best' }, { source, transcoder: new FakeTranscoder() });

    expect(source.calls).toEqual([
      { selector: BEST_SELECTOR, destination: ctx.videoPath, options: { mergeFormat: 'mkv' } },
    ]);
    expect(res).toEqual({ asset: { path: ctx.videoPath, kind: 'merged', present: true }, degraded: false });
    expect(ctx.video).toEqual(res.asset);
  });

  it('fetches a combined format by id', async () => {
    const source = new FakeSource();
    await acquireVideo(ctx, { kind: 'format', format: formats[0] }, { source, transcoder: new FakeTranscoder() });
    expect(source.calls[0]).toEqual({ selector: '18', destination: ctx.videoPath, options: { mergeFormat: 'mkv' } });
  });

  it('downloads audio for a video-only format and merges with stream copy', async () => {
    const source = new FakeSource();
    const transcoder = new FakeTranscoder();
    const videoOnlyPath = path.join(ctx.scratchDir, 'Sample Clip_video.mp4');

    const res = await acquireVideo(ctx, { kind: 'format', format: formats[1] }, { source, transcoder });

    expect(source.calls.map((c) => c.selector)).toEqual(['137', 'bestaudio/best']);
    expect(source.calls[1]).toEqual({
      selector: 'bestaudio/best',
      destination: ctx.audioPath,
      options: { audioOnly: true, extractFormat: 'm4a' },
    });
    expect(transcoder.remuxes).toEqual([
      { video: videoOnlyPath, audio: ctx.audioPath, output: ctx.videoPath, policy: { video: 'copy', audio: 'copy' } },
    ]);
    expect(res).toEqual({ asset: { path: ctx.videoPath, kind: 'merged', present: true }, degraded: false });
    expect(await fs.pathExists(videoOnlyPath)).toBe(false);
    expect(ctx.audio).toEqual({ path: ctx.audioPath, kind: 'audio', present: true });
  });

  it('reuses audio already held by the context', async () => {
    await fs.writeFile(ctx.audioPath, 'audio');
    ctx.audio = { path: ctx.audioPath, kind: 'audio', present: true };
    const source = new FakeSource();

    await acquireVideo(ctx, { kind: 'format', format: formats[2] }, { source, transcoder: new FakeTranscoder() });

    expect(source.calls.map((c) => c.selector)).toEqual(['248']);
  });

  it('keeps the video-only stream when audio cannot be fetched', async () => {
    const source = new FakeSource({ failAudio: true });
    const transcoder = new FakeTranscoder();

    const res = await acquireVideo(ctx, { kind: 'format', format: formats[2] }, { source, transcoder });

    expect(res).toEqual({
      asset: { path: path.join(ctx.scratchDir, 'Sample Clip_video.webm'), kind: 'video', present: true },
      degraded: true,
    });
    expect(transcoder.remuxes).toHaveLength(0);
    expect(ctx.audio).toBeUndefined();
  });

  it('raises MissingVideoAsset when nothing was written', async () => {
    const source: MediaSourceClient = {
      listFormats: async () => SAMPLE_CATALOG,
      fetch: async (_url, _selector, destination) => destination,
      fetchTitle: async () => 'x',
      fetchSubtitles: async () => [],
    };
    await expect(acquireVideo(ctx, { kind: 'best' }, { source, transcoder: new FakeTranscoder() })).rejects.toThrow(
      MissingVideoAssetError
    );
  });
});

describe('acquireAudio', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    await fs.remove(root);
  });

  it('returns null when the download fails', async () => {
    const ctx = await testContext(root);
    expect(await acquireAudio(ctx, { source: new FakeSource({ failAudio: true }) })).toBeNull();
  });

  it('treats an empty audio file as absent', async () => {
    const ctx = await testContext(root);
    const source: MediaSourceClient = {
      listFormats: async () => '',
      fetch: async (_url, _selector, destination) => {
        await fs.outputFile(destination, '');
        return destination;
      },
      fetchTitle: async () => 'x',
      fetchSubtitles: async () => [],
    };
    expect(await acquireAudio(ctx, { source })).toBeNull();
  });
});
