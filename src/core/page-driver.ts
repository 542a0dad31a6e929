/**
 * Page Driver - the narrow browser surface an AuthenticatedSession needs
 *
 * PlaywrightLauncher provides the real implementation. Playwright is loaded
 * lazily so a missing install surfaces as an InitError when a monitor starts,
 * not as an import failure at process start.
 */

import type { Browser, Page } from 'playwright-core';
import type { BrowserConfig } from '../utils/config-schemas.js';
import { InitError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export type AttributeRecord = Record<string, string | null>;

/**
 * Every method takes an explicit bounded wait and rejects when it elapses.
 */
export interface PageDriver {
  goto(url: string, timeoutMs: number): Promise<void>;
  waitForSelector(selector: string, timeoutMs: number): Promise<void>;
  waitForUrl(matches: (url: string) => boolean, timeoutMs: number): Promise<void>;
  fill(selector: string, value: string, timeoutMs: number): Promise<void>;
  click(selector: string, timeoutMs: number): Promise<void>;
  /** True when at least one element matches, without waiting. */
  exists(selector: string): Promise<boolean>;
  /** Read the named attributes from every element matching `selector`. */
  readAttributes(selector: string, attributes: readonly string[]): Promise<AttributeRecord[]>;
  currentUrl(): string;
}

/**
 * A launched browser and its single page
 */
export interface BrowserHandle {
  readonly page: PageDriver;
  close(): Promise<void>;
}

export interface BrowserLauncher {
  launch(): Promise<BrowserHandle>;
}

const USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

class PlaywrightPageDriver implements PageDriver {
  constructor(private page: Page) {}

  async goto(url: string, timeoutMs: number): Promise<void> {
    await this.page.goto(url, { timeout: timeoutMs, waitUntil: 'domcontentloaded' });
  }

  async waitForSelector(selector: string, timeoutMs: number): Promise<void> {
    await this.page.waitForSelector(selector, { timeout: timeoutMs, state: 'visible' });
  }

  async waitForUrl(matches: (url: string) => boolean, timeoutMs: number): Promise<void> {
    await this.page.waitForURL((url) => matches(url.href), { timeout: timeoutMs });
  }

  async fill(selector: string, value: string, timeoutMs: number): Promise<void> {
    await this.page.fill(selector, value, { timeout: timeoutMs });
  }

  async click(selector: string, timeoutMs: number): Promise<void> {
    await this.page.click(selector, { timeout: timeoutMs });
  }

  async exists(selector: string): Promise<boolean> {
    return (await this.page.$(selector)) !== null;
  }

  async readAttributes(selector: string, attributes: readonly string[]): Promise<AttributeRecord[]> {
    return this.page.$$eval(
      selector,
      (elements, names) =>
        elements.map((element) => {
          const record: Record<string, string | null> = {};
          for (const name of names) {
            record[name] = element.getAttribute(name);
          }
          return record;
        }),
      [...attributes]
    );
  }

  currentUrl(): string {
    return this.page.url();
  }
}

/**
 * Launches a local Chromium, or connects to a remote one when `endpoint` is set.
 */
export class PlaywrightLauncher implements BrowserLauncher {
  constructor(private config: BrowserConfig) {}

  async launch(): Promise<BrowserHandle> {
    let browser: Browser;
    try {
      const pw = await import('playwright-core');
      browser = this.config.endpoint
        ? await pw.chromium.connect(this.config.endpoint)
        : await pw.chromium.launch({
            headless: this.config.headless,
            executablePath: this.config.executablePath,
          });
    } catch (error) {
      logger.browser.error('Browser launch failed', { error, endpoint: this.config.endpoint });
      throw new InitError(`Browser could not be started: ${errorMessage(error)}`, { cause: error });
    }

    try {
      const context = await browser.newContext({
        userAgent: USER_AGENT,
        viewport: { width: 1920, height: 1080 },
      });
      const page = await context.newPage();
      logger.browser.debug('Browser page ready', { remote: Boolean(this.config.endpoint) });

      return {
        page: new PlaywrightPageDriver(page),
        close: () => browser.close(),
      };
    } catch (error) {
      await browser.close();
      throw new InitError(`Browser page could not be created: ${errorMessage(error)}`, { cause: error });
    }
  }
}
