/**
 * Authenticated Session - one browser page logged into the booking site
 *
 * A session mutates hidden browser state (cookies, current page), so each
 * active monitor owns exactly one and never shares it.
 */

import type { Credentials } from '../types/index.js';
import { AuthError, InitError, NavigationError, errorMessage } from '../utils/errors.js';
import { logger, type Logger } from '../utils/logger.js';
import { TIMEOUTS } from '../utils/timeouts.js';
import type { AttributeRecord, BrowserHandle, BrowserLauncher, PageDriver } from './page-driver.js';
import type { SiteProfile } from './site-profile.js';

export interface SelectorSpec {
  selector: string;
  attributes: readonly string[];
}

export interface AuthenticatedSessionOptions {
  launcher: BrowserLauncher;
  site: SiteProfile;
  /** Bounded wait for every browser action */
  boundedWaitMs?: number;
  /** Used only to tag log lines */
  userId?: string;
}

/**
 * The subset of a session the appointment extractor drives.
 */
export interface ResultsView {
  click(selector: string): Promise<void>;
  fill(selector: string, value: string): Promise<void>;
  extract(spec: SelectorSpec): Promise<AttributeRecord[]>;
}

export class AuthenticatedSession implements ResultsView {
  private handle: BrowserHandle | null = null;
  private authenticated = false;
  private readonly launcher: BrowserLauncher;
  private readonly site: SiteProfile;
  private readonly boundedWaitMs: number;
  private readonly log: Logger;

  constructor(options: AuthenticatedSessionOptions) {
    this.launcher = options.launcher;
    this.site = options.site;
    this.boundedWaitMs = options.boundedWaitMs ?? TIMEOUTS.BOUNDED_WAIT;
    this.log = options.userId ? logger.session.child({ userId: options.userId }) : logger.session;
  }

  get isOpen(): boolean {
    return this.handle !== null;
  }

  get isAuthenticated(): boolean {
    return this.authenticated;
  }

  /**
   * Acquire the browser. No-op when already open.
   *
   * @throws InitError when the browser cannot be provisioned
   */
  async open(): Promise<void> {
    if (this.handle) {
      return;
    }
    try {
      this.handle = await this.launcher.launch();
    } catch (error) {
      if (error instanceof InitError) {
        throw error;
      }
      throw new InitError(`Browser could not be started: ${errorMessage(error)}`, { cause: error });
    }
    this.log.debug('Session opened');
  }

  /**
   * Log in unless already authenticated.
   *
   * @throws AuthError with reason `unreachable`, `invalid_credentials` or `unexpected_page`
   */
  async login(credentials: Credentials): Promise<void> {
    if (this.authenticated) {
      return;
    }
    const page = this.requirePage();
    const { selectors } = this.site;

    try {
      await page.goto(this.site.loginUrl, this.boundedWaitMs);
      await page.waitForSelector(selectors.username, this.boundedWaitMs);
    } catch (error) {
      throw new AuthError(`Login page unreachable: ${errorMessage(error)}`, 'unreachable', { cause: error });
    }

    try {
      await page.fill(selectors.username, credentials.username, this.boundedWaitMs);
      await page.fill(selectors.password, credentials.password, this.boundedWaitMs);
      await page.click(selectors.submit, this.boundedWaitMs);
    } catch (error) {
      throw new AuthError(`Login form could not be submitted: ${errorMessage(error)}`, 'unreachable', {
        cause: error,
      });
    }

    try {
      await page.waitForUrl((url) => this.isPostLoginUrl(url), this.boundedWaitMs);
    } catch (error) {
      if (await this.safeExists(page, selectors.loginError)) {
        throw new AuthError('Login rejected: invalid credentials', 'invalid_credentials', { cause: error });
      }
      throw new AuthError(`Login ended on unexpected page: ${page.currentUrl()}`, 'unexpected_page', {
        cause: error,
      });
    }

    this.authenticated = true;
    this.log.info('Logged in to booking site');
  }

  /**
   * @throws NavigationError when the page does not load within the bounded wait
   */
  async navigate(url: string): Promise<void> {
    const page = this.requirePage();
    try {
      await page.goto(url, this.boundedWaitMs);
    } catch (error) {
      throw new NavigationError(`Navigation to ${url} failed: ${errorMessage(error)}`, url, { cause: error });
    }

    // Expired site session: the next login() call must submit credentials again
    if (this.authenticated && page.currentUrl().startsWith(this.site.loginUrl)) {
      this.authenticated = false;
      throw new NavigationError(`Redirected to login while loading ${url}`, url);
    }
  }

  async click(selector: string): Promise<void> {
    const page = this.requirePage();
    try {
      await page.click(selector, this.boundedWaitMs);
    } catch (error) {
      throw new NavigationError(`Click on ${selector} failed: ${errorMessage(error)}`, selector, { cause: error });
    }
  }

  async fill(selector: string, value: string): Promise<void> {
    const page = this.requirePage();
    try {
      await page.fill(selector, value, this.boundedWaitMs);
    } catch (error) {
      throw new NavigationError(`Fill of ${selector} failed: ${errorMessage(error)}`, selector, { cause: error });
    }
  }

  /**
   * Read attributes from every element matching the selector. An empty page yields [].
   */
  async extract(spec: SelectorSpec): Promise<AttributeRecord[]> {
    const page = this.requirePage();
    try {
      return await page.readAttributes(spec.selector, spec.attributes);
    } catch (error) {
      throw new NavigationError(`Extraction of ${spec.selector} failed: ${errorMessage(error)}`, spec.selector, {
        cause: error,
      });
    }
  }

  /**
   * Release the browser. Safe to call repeatedly.
   */
  async close(): Promise<void> {
    const handle = this.handle;
    this.handle = null;
    this.authenticated = false;
    if (!handle) {
      return;
    }
    try {
      await handle.close();
      this.log.debug('Session closed');
    } catch (error) {
      this.log.warn('Browser close failed', { error: errorMessage(error) });
    }
  }

  private isPostLoginUrl(url: string): boolean {
    return this.site.successUrlMarkers.some((marker) => url.includes(marker));
  }

  private async safeExists(page: PageDriver, selector: string): Promise<boolean> {
    try {
      return await page.exists(selector);
    } catch {
      return false;
    }
  }

  private requirePage(): PageDriver {
    if (!this.handle) {
      throw new NavigationError('Session is not open');
    }
    return this.handle.page;
  }
}

/**
 * Open `session`, run `fn`, and close the session on every exit path.
 */
export async function withAuthenticatedSession<T>(
  session: AuthenticatedSession,
  fn: (session: AuthenticatedSession) => Promise<T>
): Promise<T> {
  await session.open();
  try {
    return await fn(session);
  } finally {
    await session.close();
  }
}
