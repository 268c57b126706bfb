// Playwright-backed browser sessions
import { existsSync } from 'fs';
import { chromium, type Browser, type Page } from 'playwright-core';
import type { ElementInfo } from '@streamcast/shared';
import type { BrowserLauncher, BrowserSession, CapabilityProbe, LaunchOptions, WaitState } from './types';
import { automationLogger, formatError } from '../utils/logger';

export interface PlaywrightLauncherOptions {
  /** Chromium binary; playwright's managed browser location when omitted */
  executablePath?: string | null;
}

/**
 * Runs inside the page, so it must not reference anything outside its own body
 */
function describeElement(el: Element): ElementInfo {
  return {
    text: (el.textContent || '').trim(),
    tag: el.tagName.toLowerCase(),
    href: el.getAttribute('href'),
    src: el.getAttribute('src'),
    class: el.getAttribute('class'),
    id: el.getAttribute('id'),
  };
}

/**
 * Runs `body` as the body of a function, so a script hands its value back
 * with `return`. Evaluated inside the page.
 */
export function runScriptBody(body: string): unknown {
  return new Function(body)();
}

export class PlaywrightSession implements BrowserSession {
  constructor(
    private readonly browser: Browser,
    private readonly page: Page,
  ) {}

  async goto(url: string, timeoutMs: number): Promise<void> {
    await this.page.goto(url, { timeout: timeoutMs, waitUntil: 'load' });
  }

  async waitForSelector(selector: string, state: WaitState, timeoutMs: number): Promise<void> {
    await this.page.waitForSelector(selector, { state, timeout: timeoutMs });
  }

  async click(selector: string, timeoutMs: number): Promise<void> {
    await this.page.click(selector, { timeout: timeoutMs });
  }

  async evaluate(script: string): Promise<unknown> {
    return this.page.evaluate(runScriptBody, script);
  }

  async querySelector(selector: string): Promise<ElementInfo | null> {
    const handle = await this.page.$(selector);
    if (!handle) {
      return null;
    }
    try {
      return await handle.evaluate(describeElement);
    } finally {
      await handle.dispose();
    }
  }

  async querySelectorAll(selector: string): Promise<ElementInfo[]> {
    const handles = await this.page.$$(selector);
    try {
      return await Promise.all(handles.map((handle) => handle.evaluate(describeElement)));
    } finally {
      await Promise.all(handles.map((handle) => handle.dispose()));
    }
  }

  async content(): Promise<string> {
    return this.page.content();
  }

  currentUrl(): string {
    return this.page.url();
  }

  async screenshot(path: string): Promise<void> {
    await this.page.screenshot({ path, fullPage: false });
  }

  async close(): Promise<void> {
    await this.browser.close();
  }
}

/**
 * Launches headless Chromium through playwright-core. playwright-core ships no
 * browser, so availability depends on a binary being present on disk.
 */
export class PlaywrightLauncher implements BrowserLauncher {
  constructor(private readonly options: PlaywrightLauncherOptions = {}) {}

  probe(): CapabilityProbe {
    let executable: string;
    try {
      executable = this.options.executablePath || chromium.executablePath();
    } catch (error) {
      return { available: false, detail: `No Chromium build for this platform: ${formatError(error)}` };
    }

    if (!executable || !existsSync(executable)) {
      return {
        available: false,
        detail: `Chromium executable not found at ${executable || '(unset)'}. Set BROWSER_EXECUTABLE_PATH or install playwright browsers`,
      };
    }

    return { available: true, detail: executable };
  }

  async launch(options: LaunchOptions): Promise<BrowserSession> {
    const browser = await chromium.launch({
      headless: options.headless,
      executablePath: this.options.executablePath || undefined,
      args: options.args,
    });

    try {
      const context = await browser.newContext({
        userAgent: options.userAgent,
        viewport: options.viewport,
        locale: 'en-US',
      });
      const page = await context.newPage();
      return new PlaywrightSession(browser, page);
    } catch (error) {
      // Never leave a half-started browser behind
      await browser.close().catch((closeError: unknown) => {
        automationLogger.error(`Error closing half-started browser: ${formatError(closeError)}`, closeError);
      });
      throw error;
    }
  }
}
