// Media discovery in a live, script-rendered page
import type { ExtractionResult, StreamTarget } from '@streamcast/shared';
import type { VideoExtractor } from './types';
import { findM3u8Url, resolveMediaUrl } from './patterns';
import { failed, resolved } from './result';
import { AutomationDriver } from '../automation/driver';
import { toCssSelector } from '../automation/selectors';
import type { BrowserLauncher } from '../automation/types';
import { automatedLogger, formatError } from '../utils/logger';
import { delay } from '../utils/delay';

export interface AutomatedExtractorOptions {
  launcher: BrowserLauncher;
  userAgent?: string;
  bodyTimeoutMs?: number;  // default 10000
  popupTimeoutMs?: number;  // default 2000
  contentSettleMs?: number;  // default 3000
  navigationSettleMs?: number;
  clickSettleMs?: number;
}

/**
 * Loads the stream page in a headless browser, dismisses overlays, then
 * inspects the rendered DOM. Owns exactly one browser session, which is torn
 * down at the end of every extract() call.
 */
export class AutomatedPageExtractor implements VideoExtractor {
  readonly method = 'automated' as const;

  private readonly driver: AutomationDriver;
  private readonly bodyTimeoutMs: number;
  private readonly popupTimeoutMs: number;
  private readonly contentSettleMs: number;

  constructor(
    private readonly target: StreamTarget,
    options: AutomatedExtractorOptions,
  ) {
    this.driver = new AutomationDriver({
      launcher: options.launcher,
      userAgent: options.userAgent,
      navigationSettleMs: options.navigationSettleMs,
      clickSettleMs: options.clickSettleMs,
    });
    this.bodyTimeoutMs = options.bodyTimeoutMs ?? 10000;
    this.popupTimeoutMs = options.popupTimeoutMs ?? 2000;
    this.contentSettleMs = options.contentSettleMs ?? 3000;
  }

  get isAvailable(): boolean {
    return this.driver.isAvailable;
  }

  async extract(): Promise<ExtractionResult> {
    try {
      return await this.locate();
    } catch (error) {
      automatedLogger.error(`Error extracting from ${this.target.url}: ${formatError(error)}`, error);
      return failed(this.method, 'AUTOMATION_CRASH', formatError(error));
    } finally {
      await this.driver.close();
    }
  }

  async getVideoUrl(): Promise<string | null> {
    const result = await this.extract();
    return result.resolvedUrl;
  }

  async close(): Promise<void> {
    await this.driver.close();
  }

  private async locate(): Promise<ExtractionResult> {
    const { url, popupSelectors, videoSelectors } = this.target;

    if (!(await this.driver.navigate(url))) {
      return failed(this.method, this.driver.lastError ?? 'AUTOMATION_NAVIGATION_FAILED', `Could not load ${url}`);
    }

    if (!(await this.driver.waitForElement('body', this.bodyTimeoutMs))) {
      return failed(this.method, this.driver.lastError ?? 'AUTOMATION_TIMEOUT', 'Page body never appeared');
    }

    // Popups are optional; a selector that never matches is skipped
    for (const selector of popupSelectors) {
      if (await this.driver.clickElement(toCssSelector(selector), this.popupTimeoutMs)) {
        automatedLogger.info(`Closed popup: ${selector}`);
      }
    }

    await delay(this.contentSettleMs);

    for (const selector of videoSelectors) {
      const element = await this.driver.findElement(toCssSelector(selector));
      if (element?.src) {
        const videoUrl = resolveMediaUrl(element.src, url);
        automatedLogger.info(`Found video element (${selector}): ${videoUrl}`);
        return resolved(this.method, videoUrl, `Matched selector ${selector}`);
      }
    }

    const source = await this.driver.getPageSource();
    const manifest = source ? findM3u8Url(source) : null;
    if (manifest) {
      automatedLogger.info(`Found m3u8 URL in page source: ${manifest}`);
      return resolved(this.method, manifest, 'Matched m3u8 in page source');
    }

    automatedLogger.warn(`No video URL found with automation: ${url}`);
    return failed(this.method, 'EXTRACT_NO_MATCH', 'No media reference in rendered page');
  }
}
