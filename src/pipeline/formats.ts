import { NoUsableFormatsError } from './errors';
import type { StreamDescriptor } from './types';

export const MIN_VIDEO_ONLY_HEIGHT = 1080;

export interface CatalogEntry {
    id: string;
    extension: string;
    resolution: string;
    line: string;
}

/**
 * Parses a `yt-dlp -F` listing. Format rows are the lines whose first column
 * starts with a digit; headers, separators and `[info]` lines are skipped.
 */
export function parseFormatCatalog(text: string): CatalogEntry[] {
    const entries: CatalogEntry[] = [];
    for (const raw of text.split(/\r?\n/)) {
        const line = raw.trim();
        if (!/^[0-9]/.test(line)) continue;
        const [id, extension = '', resolution = ''] = line.split(/\s+/);
        entries.push({ id, extension, resolution, line });
    }
    return entries;
}

/** `1920x1080` → 1080, `1080p` → 1080, anything else → null. */
export function parseHeight(resolution: string): number | null {
    const m = resolution.match(/^(?:\d+x)?(\d+)p?$/);
    return m ? Number(m[1]) : null;
}

function isPlayable(line: string): boolean {
    return !/audio only/.test(line) && !/mhtml/.test(line);
}

export function resolveFormats(catalog: string): StreamDescriptor[] {
    const parsed = parseFormatCatalog(catalog);
    const out: StreamDescriptor[] = [];
    for (const entry of parsed) {
        if (!isPlayable(entry.line)) continue;
        const videoOnly = /video only/.test(entry.line);
        const height = parseHeight(entry.resolution);
        if (videoOnly && height !== null && height < MIN_VIDEO_ONLY_HEIGHT) continue;
        out.push({
            index: out.length + 1,
            id: entry.id,
            extension: entry.extension,
            resolution: entry.resolution,
            height,
            hasAudio: !videoOnly,
            classification: videoOnly ? 'video-only' : 'combined',
            note: entry.line,
        });
    }
    if (out.length === 0) {
        throw new NoUsableFormatsError({ catalogRows: parsed.length });
    }
    return out;
}

export function describeFormat(d: StreamDescriptor): string {
    const kind =
        d.classification === 'video-only'
            ? '(Video-only: audio will be downloaded separately and merged)'
            : '(Combined video+audio)';
    return `${d.index} - ID:${d.id} | EXT:${d.extension} | RES:${d.resolution} | ${kind}`;
}
