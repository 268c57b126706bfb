// Media URL resolution through a yt-dlp-class metadata source
import type { ErrorCode, ExtractionResult, StreamTarget, VideoInfo } from '@streamcast/shared';
import type { VideoExtractor } from '../extraction/types';
import { failed, resolved } from '../extraction/result';
import { DEFAULT_USER_AGENT } from '../fetcher/user-agents';
import { formatError, metadataLogger } from '../utils/logger';
import type { MetadataSource, RawVideoInfo } from './types';
import type { WorkerPool } from './worker-pool';

export const PREFERRED_FORMAT = 'best[ext=mp4]/best';

export interface MetadataExtractorOptions {
  source: MetadataSource;
  pool: WorkerPool;
  userAgent?: string;
  format?: string;
}

/**
 * Choose the playable URL from an info document: the first playlist entry,
 * else the item's own URL, else the last format that has one, else the
 * adaptive manifest.
 */
export function selectVideoUrl(info: RawVideoInfo): string | null {
  if (info.entries) {
    const first = info.entries[0];
    return first?.url || first?.webpage_url || null;
  }

  if (info.url) {
    return info.url;
  }

  // Formats are listed worst to best
  const formats = info.formats ?? [];
  for (let i = formats.length - 1; i >= 0; i--) {
    const url = formats[i].url;
    if (url) {
      return url;
    }
  }

  return info.manifest_url || null;
}

export function toVideoInfo(info: RawVideoInfo): VideoInfo {
  return {
    title: info.title || 'Unknown',
    duration: info.duration ?? null,
    thumbnail: info.thumbnail || null,
    description: info.description ?? '',
    uploader: info.uploader ?? '',
    url: info.url || info.webpage_url || null,
    isLive: info.is_live ?? false,
    formatCount: info.formats?.length ?? 0,
  };
}

function isUnsupportedUrl(error: unknown): boolean {
  return formatError(error).includes('Unsupported URL');
}

export class MetadataExtractor implements VideoExtractor {
  readonly method = 'metadata' as const;

  private readonly source: MetadataSource;
  private readonly pool: WorkerPool;
  private readonly userAgent: string;
  private readonly format: string;
  private unavailableLogged = false;

  constructor(
    private readonly target: StreamTarget,
    options: MetadataExtractorOptions,
  ) {
    this.source = options.source;
    this.pool = options.pool;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.format = options.format ?? PREFERRED_FORMAT;
  }

  get isAvailable(): boolean {
    return this.source.capability.available;
  }

  async extract(): Promise<ExtractionResult> {
    const fetched = await this.fetchInfo();
    if (!fetched.ok) {
      return failed(this.method, fetched.errorCode, fetched.detail);
    }

    const videoUrl = selectVideoUrl(fetched.info);
    if (!videoUrl) {
      metadataLogger.warn(`No playable URL in metadata for ${this.target.url}`);
      return failed(this.method, 'EXTRACT_NO_MATCH', 'Metadata carried no playable URL');
    }

    const shape = fetched.info.entries ? 'playlist entry' : 'video';
    metadataLogger.info(`Extracted ${shape} URL: ${videoUrl.slice(0, 100)}`);
    return resolved(this.method, videoUrl, `Resolved ${shape}`);
  }

  async getVideoUrl(): Promise<string | null> {
    const result = await this.extract();
    return result.resolvedUrl;
  }

  /**
   * Descriptive metadata only; independent of getVideoUrl()
   */
  async getVideoInfo(): Promise<VideoInfo | null> {
    const fetched = await this.fetchInfo();
    return fetched.ok ? toVideoInfo(fetched.info) : null;
  }

  // The pool is shared; nothing is owned per extractor
  async close(): Promise<void> {}

  private async fetchInfo(): Promise<
    { ok: true; info: RawVideoInfo } | { ok: false; errorCode: ErrorCode; detail: string }
  > {
    const { url } = this.target;

    if (!this.source.capability.available) {
      if (!this.unavailableLogged) {
        metadataLogger.error(`Metadata extractor not available: ${this.source.capability.detail}`);
        this.unavailableLogged = true;
      } else {
        metadataLogger.debug('Metadata extractor not available');
      }
      return { ok: false, errorCode: 'CAPABILITY_UNAVAILABLE', detail: this.source.capability.detail };
    }

    try {
      const info = await this.pool.run(() =>
        this.source.extractInfo(url, { format: this.format, userAgent: this.userAgent, geoBypass: true }),
      );
      return { ok: true, info };
    } catch (error) {
      if (isUnsupportedUrl(error)) {
        metadataLogger.warn(
          `Unsupported URL: ${url}. This is usually a homepage or listing page; navigate to a specific video page first`,
        );
        return { ok: false, errorCode: 'METADATA_UNSUPPORTED_URL', detail: formatError(error) };
      }
      metadataLogger.error(`Error extracting metadata for ${url}: ${formatError(error)}`, error);
      return { ok: false, errorCode: 'METADATA_EXTRACTION_FAILED', detail: formatError(error) };
    }
  }
}
