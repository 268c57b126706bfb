// Browser automation seam types
import type { ElementInfo } from '@streamcast/shared';

/**
 * Result of checking once whether an external capability is installed
 */
export interface CapabilityProbe {
  available: boolean;
  detail: string;
}

export type WaitState = 'attached' | 'visible';

/**
 * One live browser process with a single page. Implemented over
 * playwright-core in production and by in-process fakes in tests.
 */
export interface BrowserSession {
  goto(url: string, timeoutMs: number): Promise<void>;
  waitForSelector(selector: string, state: WaitState, timeoutMs: number): Promise<void>;
  /** Waits until the element is visible, stable and enabled, then clicks it */
  click(selector: string, timeoutMs: number): Promise<void>;
  /** Runs `script` as a function body; its `return` value is the result */
  evaluate(script: string): Promise<unknown>;
  /** First element matching the selector, or null when nothing matches */
  querySelector(selector: string): Promise<ElementInfo | null>;
  querySelectorAll(selector: string): Promise<ElementInfo[]>;
  content(): Promise<string>;
  currentUrl(): string;
  screenshot(path: string): Promise<void>;
  close(): Promise<void>;
}

export interface LaunchOptions {
  headless: boolean;
  viewport: { width: number; height: number };
  userAgent: string;
  args: string[];
}

export interface BrowserLauncher {
  probe(): CapabilityProbe;
  launch(options: LaunchOptions): Promise<BrowserSession>;
}
