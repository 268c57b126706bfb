import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import type { ElementInfo } from '@streamcast/shared';
import { AutomationDriver, DEFAULT_ELEMENT_TIMEOUT_MS } from '@streamcast/extractor';

/**
 * Remote control over one long-lived browser session.
 *
 * The driver does no locking of its own, so every call is chained behind the
 * previous one and commands reach the page strictly in arrival order.
 */
@Injectable()
export class BrowserControlService implements OnModuleDestroy {
  private readonly logger = new Logger(BrowserControlService.name);
  private tail: Promise<unknown> = Promise.resolve();

  constructor(private readonly driver: AutomationDriver) {}

  async onModuleDestroy() {
    await this.serialize(() => this.driver.close());
  }

  navigate(url: string): Promise<boolean> {
    return this.serialize(() => this.driver.navigate(url));
  }

  clickElement(selector: string, timeoutMs: number = DEFAULT_ELEMENT_TIMEOUT_MS): Promise<boolean> {
    return this.serialize(() => this.driver.clickElement(selector, timeoutMs));
  }

  scrollPage(direction: string, amount: number): Promise<boolean> {
    return this.serialize(() => this.driver.scrollPage(direction, amount));
  }

  executeScript(script: string): Promise<unknown> {
    return this.serialize(() => this.driver.executeScript(script));
  }

  waitForElement(selector: string, timeoutMs: number = DEFAULT_ELEMENT_TIMEOUT_MS): Promise<boolean> {
    return this.serialize(() => this.driver.waitForElement(selector, timeoutMs));
  }

  getPageSource(): Promise<string | null> {
    return this.serialize(() => this.driver.getPageSource());
  }

  getCurrentUrl(): Promise<string | null> {
    return this.serialize(() => this.driver.getCurrentUrl());
  }

  getElements(selector: string): Promise<ElementInfo[]> {
    return this.serialize(() => this.driver.getElements(selector));
  }

  takeScreenshot(filePath: string): Promise<boolean> {
    return this.serialize(() => this.driver.takeScreenshot(filePath));
  }

  private serialize<T>(operation: () => Promise<T>): Promise<T> {
    const result = this.tail.then(operation);
    // Later calls still run after a rejected one
    this.tail = result.catch((error: unknown) => {
      this.logger.debug(`Browser command failed: ${error instanceof Error ? error.message : String(error)}`);
    });
    return result;
  }
}
