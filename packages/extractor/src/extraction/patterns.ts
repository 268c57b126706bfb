// Media reference patterns shared by the page extractors

/** First absolute HLS manifest URL, query string included */
export const M3U8_PATTERN = /(https?:\/\/[^\s"']+\.m3u8[^\s"']*)/;

/** `file: "..."`, `src = '...'` style assignments of a direct media URL */
export const ASSIGNMENT_PATTERN = /(?:file|src|source|url)[\s:=]+["']([^"']+\.(?:mp4|webm|m3u8))["']/i;

/** Substrings that mark an iframe as an embedded player */
export const PLAYER_IFRAME_HINTS = ['player', 'embed', 'video', 'stream'];

const SCHEME = /^[a-z][a-z\d+.-]*:/i;

export function findM3u8Url(text: string): string | null {
  const match = M3U8_PATTERN.exec(text);
  return match ? match[1] : null;
}

export function findAssignedMediaUrl(text: string): string | null {
  const match = ASSIGNMENT_PATTERN.exec(text);
  return match ? match[1] : null;
}

export function isPlayerIframe(src: string): boolean {
  const lower = src.toLowerCase();
  return PLAYER_IFRAME_HINTS.some((hint) => lower.includes(hint));
}

/**
 * Resolve a media reference against the page it was found on.
 * URLs that already carry a scheme are returned unchanged.
 */
export function resolveMediaUrl(reference: string, pageUrl: string): string {
  const trimmed = reference.trim();
  if (SCHEME.test(trimmed)) {
    return trimmed;
  }

  try {
    return new URL(trimmed, pageUrl).toString();
  } catch {
    // Unparseable page URL; hand back what the page contained
    return trimmed;
  }
}
