import fs from 'fs-extra';
import path from 'path';
import { errorMessage, NoSubtitleBlocksError, SubtitleReformatFailedError } from './errors';
import { debug, info, warn } from './log';
import type { MediaTranscoder, SubtitleSegment, SubtitleTrack, TimedText } from './types';

export const TIMESTAMP_PAIR = /^\d{2}:\d{2}:\d{2},\d{3}\s*-->\s*\d{2}:\d{2}:\d{2},\d{3}/;
const TIMING_LINE = /^(\d{2,}):(\d{2}):(\d{2}),(\d{3})\s*-->\s*(\d{2,}):(\d{2}):(\d{2}),(\d{3})/;

function pad(n: number, width = 2) {
    return String(n).padStart(width, '0');
}

/**
 * Seconds → `HH:MM:SS,mmm`. Milliseconds are truncated, never rounded:
 * 75.4005 → `00:01:15,400`.
 */
export function formatSrtTime(seconds: number): string {
    const safe = Number.isFinite(seconds) ? Math.max(0, seconds) : 0;
    // The epsilon absorbs binary representation error (1.001 * 1000 = 1000.9999…)
    const totalMs = Math.floor(safe * 1000 + 1e-6);
    const ms = totalMs % 1000;
    const totalSec = Math.floor(totalMs / 1000);
    return `${pad(Math.floor(totalSec / 3600))}:${pad(Math.floor((totalSec % 3600) / 60))}:${pad(totalSec % 60)},${pad(ms, 3)}`;
}

export function parseSrtTime(h: string, m: string, s: string, ms: string): number {
    return Number(h) * 3600 + Number(m) * 60 + Number(s) + Number(ms) / 1000;
}

export function toSegments(timed: TimedText[]): SubtitleTrack {
    return timed.map((t, i) => ({ index: i + 1, start: t.start, end: t.end, text: t.text.trim() }));
}

export function serializeSrt(track: SubtitleTrack): string {
    return track
        .map((seg, i) => `${i + 1}\n${formatSrtTime(seg.start)} --> ${formatSrtTime(seg.end)}\n${seg.text}\n`)
        .join('\n');
}

/**
 * Reconstruction pass. Drops bare index lines, renumbers every timestamp line
 * from 1, keeps caption text and blank separators. Idempotent.
 */
export function reconstructSrt(raw: string): string {
    const out: string[] = [];
    let index = 1;
    let content = 0;
    for (const rawLine of raw.replace(/^\uFEFF/, '').split(/\r?\n/)) {
        const line = rawLine.trim();
        if (/^\d+$/.test(line)) continue;
        if (TIMESTAMP_PAIR.test(line)) {
            out.push(String(index));
            index += 1;
            out.push(line);
            content += 1;
        } else if (line) {
            out.push(line);
            content += 1;
        } else {
            out.push('');
        }
    }
    if (content === 0) {
        throw new NoSubtitleBlocksError();
    }
    return out.join('\n');
}

/**
 * Strict parser: every block needs an index line, a timing line and at least
 * one text line; start ≤ end and starts never decrease. Overlapping cues are
 * clamped so each ends where the next begins. Indices come out as 1..N.
 */
export function parseSrt(text: string): SubtitleTrack {
    const blocks = text
        .replace(/^\uFEFF/, '')
        .replace(/\r\n/g, '\n')
        .split(/\n\s*\n/)
        .map((b) => b.trim())
        .filter(Boolean);

    const track: SubtitleSegment[] = [];
    for (const [n, block] of blocks.entries()) {
        const lines = block.split('\n').map((l) => l.trim());
        if (!/^\d+$/.test(lines[0])) {
            throw new Error(`Block ${n + 1}: expected an index line, got "${lines[0]}"`);
        }
        const timing = (lines[1] ?? '').match(TIMING_LINE);
        if (!timing) {
            throw new Error(`Block ${n + 1}: malformed timing line "${lines[1] ?? ''}"`);
        }
        const textLines = lines.slice(2).filter(Boolean);
        if (textLines.length === 0) {
            throw new Error(`Block ${n + 1}: no caption text`);
        }
        const start = parseSrtTime(timing[1], timing[2], timing[3], timing[4]);
        const end = parseSrtTime(timing[5], timing[6], timing[7], timing[8]);
        if (start > end) {
            throw new Error(`Block ${n + 1}: start ${formatSrtTime(start)} is after end ${formatSrtTime(end)}`);
        }
        const prev = track[track.length - 1];
        if (prev && start < prev.start) {
            throw new Error(`Block ${n + 1}: starts before the previous cue`);
        }
        if (prev && prev.end > start) {
            debug('srt.overlap.clamp', { index: prev.index, end: prev.end, nextStart: start });
            prev.end = start;
        }
        track.push({ index: track.length + 1, start, end, text: textLines.join('\n') });
    }
    return track;
}

/**
 * Validation pass: run the reconstructed file through the transcoder's SRT
 * encoder, then parse and re-serialize it strictly into `outputPath`.
 */
export async function validateSrt(
    inputPath: string,
    outputPath: string,
    transcoder: MediaTranscoder
): Promise<SubtitleTrack> {
    const formatted = path.join(path.dirname(inputPath), 'formatted.srt');
    try {
        return await reformatAndParse(inputPath, formatted, outputPath, transcoder);
    } finally {
        await fs.remove(formatted);
    }
}

async function reformatAndParse(
    inputPath: string,
    formatted: string,
    outputPath: string,
    transcoder: MediaTranscoder
): Promise<SubtitleTrack> {
    try {
        await transcoder.convert(inputPath, formatted, { subtitleCodec: 'srt' });
    } catch (e: unknown) {
        throw new SubtitleReformatFailedError(`Failed to reformat SRT: ${errorMessage(e)}`, { inputPath });
    }
    if (!(await fs.pathExists(formatted))) {
        throw new SubtitleReformatFailedError('Reformatted SRT was not produced', { inputPath });
    }
    let track: SubtitleTrack;
    try {
        track = parseSrt(await fs.readFile(formatted, 'utf8'));
    } catch (e: unknown) {
        throw new SubtitleReformatFailedError(`Reformatted SRT is invalid: ${errorMessage(e)}`, { inputPath });
    }
    if (track.length === 0) {
        throw new SubtitleReformatFailedError('Reformatted SRT has no cues', { inputPath });
    }
    await fs.writeFile(outputPath, serializeSrt(track));
    return track;
}

/** Reconstruct then validate `subtitlePath` in place; intermediates live beside it. */
export async function normalizeSubtitleFile(
    subtitlePath: string,
    transcoder: MediaTranscoder,
    outputPath: string = subtitlePath
): Promise<SubtitleTrack> {
    const raw = await fs.readFile(subtitlePath, 'utf8');
    let cleaned: string;
    try {
        cleaned = reconstructSrt(raw);
    } catch (e: unknown) {
        if (e instanceof NoSubtitleBlocksError) {
            warn('normalize.empty', { path: subtitlePath });
            throw new NoSubtitleBlocksError(subtitlePath);
        }
        throw e;
    }
    const cleanedPath = path.join(path.dirname(subtitlePath), 'cleaned.srt');
    await fs.writeFile(cleanedPath, cleaned);
    let track: SubtitleTrack;
    try {
        track = await validateSrt(cleanedPath, outputPath, transcoder);
    } finally {
        await fs.remove(cleanedPath);
    }
    info('normalize.complete', { path: outputPath, segments: track.length });
    return track;
}
