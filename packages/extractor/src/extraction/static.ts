// Media discovery in raw HTML, no script execution
import * as cheerio from 'cheerio';
import { Agent, type Dispatcher } from 'undici';
import type { ExtractionResult, StreamTarget } from '@streamcast/shared';
import type { VideoExtractor } from './types';
import { findAssignedMediaUrl, findM3u8Url, isPlayerIframe, resolveMediaUrl } from './patterns';
import { failed, resolved } from './result';
import { fetchPage } from '../fetcher/http';
import type { PageResponse } from '../fetcher/types';
import { BROWSER_USER_AGENT } from '../fetcher/user-agents';
import { formatError, staticLogger } from '../utils/logger';

export interface StaticExtractorOptions {
  timeoutMs?: number;  // default 30000
  userAgent?: string;
  /** Shared dispatcher; when omitted the extractor owns an Agent and closes it */
  dispatcher?: Dispatcher;
}

export type MediaReferenceSource = 'video' | 'iframe' | 'script-m3u8' | 'script-assignment';

export interface MediaReference {
  url: string;
  source: MediaReferenceSource;
}

/**
 * Search parsed HTML for a media reference. Checked in order, first match wins:
 * the first <video> (its src, else a nested <source>), the first iframe that
 * looks like an embedded player, then script bodies for an m3u8 URL or a media
 * URL assignment. The returned URL is absolute.
 */
export function findMediaReference(html: string, pageUrl: string): MediaReference | null {
  const $ = cheerio.load(html);

  const video = $('video').first();
  if (video.length > 0) {
    const src = video.attr('src') || video.find('source').first().attr('src');
    if (src) {
      return { url: resolveMediaUrl(src, pageUrl), source: 'video' };
    }
  }

  const iframeSrc = $('iframe')
    .toArray()
    .map((el) => $(el).attr('src'))
    .find((src): src is string => !!src && isPlayerIframe(src));
  if (iframeSrc) {
    return { url: resolveMediaUrl(iframeSrc, pageUrl), source: 'iframe' };
  }

  const scripts = $('script').toArray();
  for (const script of scripts) {
    const body = $(script).html();
    if (!body) continue;

    const manifest = findM3u8Url(body);
    if (manifest) {
      return { url: resolveMediaUrl(manifest, pageUrl), source: 'script-m3u8' };
    }

    const assigned = findAssignedMediaUrl(body);
    if (assigned) {
      return { url: resolveMediaUrl(assigned, pageUrl), source: 'script-assignment' };
    }
  }

  return null;
}

export class StaticPageExtractor implements VideoExtractor {
  readonly method = 'static' as const;

  private readonly timeoutMs: number;
  private readonly userAgent: string;
  private readonly sharedDispatcher: Dispatcher | null;
  private agent: Agent | null = null;
  private readonly inFlight = new Set<AbortController>();

  constructor(
    private readonly target: StreamTarget,
    options: StaticExtractorOptions = {},
  ) {
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.userAgent = options.userAgent ?? BROWSER_USER_AGENT;
    this.sharedDispatcher = options.dispatcher ?? null;
  }

  /**
   * HTTP client reused across sequential calls on this extractor
   */
  private getDispatcher(): Dispatcher {
    if (this.sharedDispatcher) {
      return this.sharedDispatcher;
    }
    if (!this.agent) {
      this.agent = new Agent({ connect: { timeout: this.timeoutMs } });
    }
    return this.agent;
  }

  async extract(): Promise<ExtractionResult> {
    const { url } = this.target;

    const controller = new AbortController();
    this.inFlight.add(controller);
    let page: PageResponse;
    try {
      page = await fetchPage({
        url,
        timeoutMs: this.timeoutMs,
        userAgent: this.userAgent,
        referer: url,
        dispatcher: this.getDispatcher(),
        signal: controller.signal,
      });
    } finally {
      this.inFlight.delete(controller);
    }

    if (page.status !== 200 || page.body === null) {
      const detail = page.errorDetail ?? `HTTP ${page.status}`;
      staticLogger.warn(`Failed to fetch ${url}: ${detail}`);
      return failed(this.method, page.errorCode ?? 'UNKNOWN', detail);
    }

    let reference: MediaReference | null;
    try {
      reference = findMediaReference(page.body, url);
    } catch (error) {
      staticLogger.error(`Error parsing ${url}: ${formatError(error)}`, error);
      return failed(this.method, 'EXTRACT_PARSE_ERROR', formatError(error));
    }

    if (!reference) {
      staticLogger.warn(`No video URL found on page: ${url}`);
      return failed(this.method, 'EXTRACT_NO_MATCH', 'No media reference in page HTML');
    }

    staticLogger.info(`Found video URL (${reference.source}): ${reference.url}`);
    return resolved(this.method, reference.url, `Matched ${reference.source}`);
  }

  async getVideoUrl(): Promise<string | null> {
    const result = await this.extract();
    return result.resolvedUrl;
  }

  /**
   * Aborts any fetch still running, so a caller's deadline never waits on the
   * remote host
   */
  async close(): Promise<void> {
    for (const controller of this.inFlight) {
      controller.abort();
    }
    this.inFlight.clear();

    const agent = this.agent;
    this.agent = null;
    if (!agent) {
      return;
    }
    try {
      await agent.destroy();
    } catch (error) {
      staticLogger.error(`Error closing HTTP agent: ${formatError(error)}`, error);
    }
  }
}
