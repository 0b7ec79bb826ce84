const WATCH_URL = /^https:\/\/(www\.|m\.)?youtube\.com\/watch\?v=[a-zA-Z0-9_-]+/;
const SHORT_URL = /^https:\/\/youtu\.be\/[a-zA-Z0-9_-]+/;

export function isVideoUrl(url: string): boolean {
  return WATCH_URL.test(url) || SHORT_URL.test(url);
}

export function toVideoId(videoOrUrl: string): string {
  // Extracts YouTube video ID from URL or returns the input if it looks like an ID
  const urlMatch = videoOrUrl.match(/[?&]v=([a-zA-Z0-9_-]{6,})/);
  if (urlMatch) return urlMatch[1];
  const short = videoOrUrl.match(/youtu\.be\/([a-zA-Z0-9_-]{6,})/);
  if (short) return short[1];
  return videoOrUrl;
}

/**
 * Reduce a remote title to a filesystem-safe name: anything outside
 * `[A-Za-z0-9 ._-]` becomes a space, whitespace runs collapse and the ends are trimmed.
 */
export function sanitizeTitle(raw: string, fallback = 'video'): string {
  const cleaned = raw
    .replace(/[^a-zA-Z0-9 ._-]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
  return cleaned || fallback;
}
