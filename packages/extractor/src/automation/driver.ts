// Async facade over a single headless browser session
import type { ElementInfo, ErrorCode } from '@streamcast/shared';
import type { BrowserLauncher, BrowserSession, CapabilityProbe, LaunchOptions } from './types';
import { DEFAULT_USER_AGENT } from '../fetcher/user-agents';
import { automationLogger, formatError } from '../utils/logger';
import { delay } from '../utils/delay';

export interface AutomationDriverOptions {
  launcher: BrowserLauncher;
  userAgent?: string;
  navigationTimeoutMs?: number;  // default 30000
  navigationSettleMs?: number;  // default 2000
  clickSettleMs?: number;  // default 1000
}

export const DEFAULT_ELEMENT_TIMEOUT_MS = 10000;

const LAUNCH_ARGS = [
  '--no-sandbox',
  '--disable-setuid-sandbox',
  '--disable-dev-shm-usage',
  '--disable-gpu',
  '--window-size=1920,1080',
];

/**
 * Scripts run for each recognized scroll direction
 */
function scrollScript(direction: string, amount: number): string | null {
  switch (direction.toLowerCase()) {
    case 'down':
      return `window.scrollBy(0, ${amount});`;
    case 'up':
      return `window.scrollBy(0, -${amount});`;
    case 'top':
      return 'window.scrollTo(0, 0);';
    case 'bottom':
      return 'window.scrollTo(0, document.body.scrollHeight);';
    default:
      return null;
  }
}

/**
 * Classify a browser error message into the error taxonomy
 */
export function classifyAutomationError(error: unknown): ErrorCode {
  const msg = formatError(error).toLowerCase();
  if (msg.includes('timeout')) return 'AUTOMATION_TIMEOUT';
  if (msg.includes('net::err_name_not_resolved')) return 'FETCH_DNS';
  if (msg.includes('net::err_connection')) return 'FETCH_CONNECTION';
  return 'AUTOMATION_CRASH';
}

/**
 * AutomationDriver owns at most one browser session.
 *
 * The session is launched lazily on first navigation and torn down by close().
 * Every primitive fails soft: errors are logged and turned into false, null or
 * an empty list. Calls against one driver must be issued sequentially; the
 * driver does no queuing of its own.
 */
export class AutomationDriver {
  readonly capability: CapabilityProbe;

  private readonly launcher: BrowserLauncher;
  private readonly launchOptions: LaunchOptions;
  private readonly navigationTimeoutMs: number;
  private readonly navigationSettleMs: number;
  private readonly clickSettleMs: number;

  private session: BrowserSession | null = null;
  private lastUrl: string | null = null;
  private unavailableLogged = false;
  // Bumped by close() so a launch still in flight is discarded
  private generation = 0;
  private lastErrorCode: ErrorCode | null = null;

  constructor(options: AutomationDriverOptions) {
    this.launcher = options.launcher;
    this.navigationTimeoutMs = options.navigationTimeoutMs ?? 30000;
    this.navigationSettleMs = options.navigationSettleMs ?? 2000;
    this.clickSettleMs = options.clickSettleMs ?? 1000;
    this.launchOptions = {
      headless: true,
      viewport: { width: 1920, height: 1080 },
      userAgent: options.userAgent ?? DEFAULT_USER_AGENT,
      args: LAUNCH_ARGS,
    };

    // Probed once; every operation short-circuits on this result
    this.capability = this.launcher.probe();
  }

  get isAvailable(): boolean {
    return this.capability.available;
  }

  get isActive(): boolean {
    return this.session !== null;
  }

  /**
   * Error code of the most recent failed operation
   */
  get lastError(): ErrorCode | null {
    return this.lastErrorCode;
  }

  async initialize(): Promise<boolean> {
    if (!this.capability.available) {
      this.lastErrorCode = 'CAPABILITY_UNAVAILABLE';
      if (!this.unavailableLogged) {
        automationLogger.error(`Headless browser not available: ${this.capability.detail}`);
        this.unavailableLogged = true;
      } else {
        automationLogger.debug('Headless browser not available');
      }
      return false;
    }

    if (this.session) {
      return true;
    }

    const generation = this.generation;
    let session: BrowserSession;
    try {
      session = await this.launcher.launch(this.launchOptions);
    } catch (error) {
      this.lastErrorCode = 'AUTOMATION_LAUNCH_FAILED';
      automationLogger.error(`Error initializing browser: ${formatError(error)}`, error);
      return false;
    }

    if (generation !== this.generation) {
      automationLogger.warn('Driver closed while the browser was starting');
      await this.terminate(session);
      return false;
    }

    this.session = session;
    this.lastErrorCode = null;
    automationLogger.info('Browser session started');
    return true;
  }

  async navigate(url: string): Promise<boolean> {
    if (!this.session && !(await this.initialize())) {
      return false;
    }

    const ok = await this.run(`navigating to ${url}`, false, async (session) => {
      await session.goto(url, this.navigationTimeoutMs);
      this.lastUrl = url;
      return true;
    });
    if (!ok) {
      if (this.lastErrorCode === 'AUTOMATION_CRASH') {
        this.lastErrorCode = 'AUTOMATION_NAVIGATION_FAILED';
      }
      return false;
    }

    automationLogger.info(`Navigated to: ${url}`);
    await delay(this.navigationSettleMs);
    return true;
  }

  async clickElement(selector: string, timeoutMs: number = DEFAULT_ELEMENT_TIMEOUT_MS): Promise<boolean> {
    const clicked = await this.run(`clicking element ${selector}`, false, async (session) => {
      await session.click(selector, timeoutMs);
      return true;
    });
    if (!clicked) {
      return false;
    }

    automationLogger.info(`Clicked element: ${selector}`);
    await delay(this.clickSettleMs);
    return true;
  }

  /**
   * Scroll the page. An unrecognized direction runs no script and still
   * reports success.
   */
  async scrollPage(direction: string = 'down', amount: number = 500): Promise<boolean> {
    return this.run('scrolling page', false, async (session) => {
      const script = scrollScript(direction, amount);
      if (script !== null) {
        await session.evaluate(script);
      }
      automationLogger.info(`Scrolled page: ${direction}`);
      return true;
    });
  }

  async executeScript(script: string): Promise<unknown> {
    return this.run('executing script', null, async (session) => {
      const result = await session.evaluate(script);
      automationLogger.info('Executed script successfully');
      return result ?? null;
    });
  }

  async waitForElement(selector: string, timeoutMs: number = DEFAULT_ELEMENT_TIMEOUT_MS): Promise<boolean> {
    return this.run(`waiting for element ${selector}`, false, async (session) => {
      await session.waitForSelector(selector, 'attached', timeoutMs);
      automationLogger.debug(`Element found: ${selector}`);
      return true;
    });
  }

  async getPageSource(): Promise<string | null> {
    return this.run('getting page source', null, (session) => session.content());
  }

  async getCurrentUrl(): Promise<string | null> {
    if (!this.session) {
      return this.lastUrl;
    }

    const url = await this.run('getting current URL', null, async (session) => session.currentUrl());
    if (url !== null) {
      this.lastUrl = url;
    }
    return url ?? this.lastUrl;
  }

  async getElements(selector: string): Promise<ElementInfo[]> {
    const elements = await this.run<ElementInfo[]>(`getting elements ${selector}`, [], (session) => session.querySelectorAll(selector));
    automationLogger.debug(`Found ${elements.length} elements matching: ${selector}`);
    return elements;
  }

  /**
   * First element matching the selector, or null
   */
  async findElement(selector: string): Promise<ElementInfo | null> {
    return this.run(`finding element ${selector}`, null, (session) => session.querySelector(selector));
  }

  async takeScreenshot(filePath: string): Promise<boolean> {
    return this.run('taking screenshot', false, async (session) => {
      await session.screenshot(filePath);
      automationLogger.info(`Screenshot saved to: ${filePath}`);
      return true;
    });
  }

  /**
   * Terminate the session. Safe to call repeatedly; the handle is dropped even
   * when the browser fails to exit cleanly.
   */
  async close(): Promise<void> {
    this.generation++;
    const session = this.session;
    if (!session) {
      return;
    }

    this.session = null;
    await this.terminate(session);
  }

  private async terminate(session: BrowserSession): Promise<void> {
    try {
      await session.close();
      automationLogger.info('Browser closed');
    } catch (error) {
      automationLogger.error(`Error closing browser: ${formatError(error)}`, error);
    }
  }

  /**
   * Run one primitive against the live session, converting any failure into
   * the given fallback value.
   */
  private async run<T>(action: string, fallback: T, operation: (session: BrowserSession) => Promise<T>): Promise<T> {
    const session = this.session;
    if (!session) {
      this.lastErrorCode = this.capability.available ? 'AUTOMATION_CRASH' : 'CAPABILITY_UNAVAILABLE';
      automationLogger.error(`Browser not initialized (${action})`);
      return fallback;
    }

    try {
      return await operation(session);
    } catch (error) {
      this.lastErrorCode = classifyAutomationError(error);
      automationLogger.error(`Error ${action}: ${formatError(error)}`, error);
      return fallback;
    }
  }
}
