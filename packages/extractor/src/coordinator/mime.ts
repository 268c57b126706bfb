import type { MediaKind } from '@streamcast/shared';

const MIME_BY_EXTENSION: Record<string, string> = {
  m3u8: 'application/x-mpegURL',
  mpd: 'application/dash+xml',
  mp4: 'video/mp4',
  webm: 'video/webm',
  mp3: 'audio/mpeg',
  flac: 'audio/flac',
  ogg: 'audio/ogg',
  opus: 'audio/ogg',
  m4a: 'audio/mp4',
};

function extensionOf(url: string): string | null {
  let path: string;
  try {
    path = new URL(url).pathname;
  } catch {
    path = url.split(/[?#]/)[0];
  }
  const match = /\.([a-z0-9]+)$/i.exec(path);
  return match ? match[1].toLowerCase() : null;
}

/**
 * Guess the MIME type the cast device should be told about from the URL's
 * file extension. Nothing is fetched, so the guess can be wrong.
 */
export function inferMimeType(url: string, kind: MediaKind = 'video'): string {
  const extension = extensionOf(url);
  if (extension && extension in MIME_BY_EXTENSION) {
    return MIME_BY_EXTENSION[extension];
  }
  return kind === 'audio' ? 'audio/mpeg' : 'video/mp4';
}
