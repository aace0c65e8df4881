/**
 * Browser Automation Service
 *
 * Owns the connection to a single Chromium process, either launched locally
 * through puppeteer-core or reached over the DevTools protocol, and hands out
 * isolated sessions to the login workflow.
 */

import puppeteer from 'puppeteer-core';
import type { Browser } from 'puppeteer-core';
import type { BrowserConfig } from '../config';
import type { BrowserSession, SessionFactory, SessionOptions } from './browser-session';
import { PuppeteerSession } from './puppeteer-session';
import { delay, errorMessage } from '../utils';

export interface BrowserServiceConfig extends BrowserConfig {
  pollIntervalMs: number;
}

const VIEWPORT = { width: 1366, height: 768, deviceScaleFactor: 1 };

const USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

const LAUNCH_ARGS = [
  '--no-sandbox',
  '--disable-setuid-sandbox',
  '--disable-dev-shm-usage',
  '--disable-gpu',
  '--disable-blink-features=AutomationControlled',
  '--disable-extensions',
  '--disable-background-networking',
  '--disable-sync',
  '--disable-translate',
  '--disable-notifications',
  '--no-first-run',
  '--no-default-browser-check',
  `--window-size=${VIEWPORT.width},${VIEWPORT.height}`
];

class BrowserService implements SessionFactory {
  private static instance: BrowserService | undefined;
  private browser: Browser | null = null;
  private launching: Promise<Browser> | null = null;
  private sessions: Map<string, BrowserSession> = new Map();

  constructor(private readonly config: BrowserServiceConfig) {}

  /**
   * Get singleton instance of BrowserService
   */
  static getInstance(config: BrowserServiceConfig): BrowserService {
    if (!BrowserService.instance) {
      BrowserService.instance = new BrowserService(config);
    }
    return BrowserService.instance;
  }

  private get isRemote(): boolean {
    return Boolean(this.config.wsEndpoint || this.config.browserURL);
  }

  /**
   * Launch or connect to the browser. Concurrent callers share one attempt.
   */
  async launch(): Promise<Browser> {
    if (this.browser?.connected) {
      return this.browser;
    }

    if (!this.launching) {
      this.launching = this.start().finally(() => {
        this.launching = null;
      });
    }
    return this.launching;
  }

  private async start(): Promise<Browser> {
    let browser: Browser;

    if (this.config.wsEndpoint) {
      console.log('[BrowserService] Connecting to remote browser:', this.config.wsEndpoint);
      browser = await puppeteer.connect({ browserWSEndpoint: this.config.wsEndpoint });
    } else if (this.config.browserURL) {
      console.log('[BrowserService] Connecting to remote browser:', this.config.browserURL);
      browser = await puppeteer.connect({ browserURL: this.config.browserURL });
    } else {
      console.log('[BrowserService] Launching local browser:', this.config.executablePath);
      browser = await puppeteer.launch({
        executablePath: this.config.executablePath,
        headless: this.config.headless,
        defaultViewport: VIEWPORT,
        args: LAUNCH_ARGS,
        ignoreDefaultArgs: ['--enable-automation']
      });
    }

    browser.on('disconnected', () => {
      console.log('[BrowserService] Browser disconnected');
      if (this.browser === browser) {
        this.browser = null;
      }
    });

    this.browser = browser;
    console.log('[BrowserService] Browser ready');
    return browser;
  }

  /**
   * Probe the browser until it is reachable, giving up after the configured
   * number of attempts.
   */
  async waitUntilReady(): Promise<void> {
    const attempts = this.config.connectAttempts;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        await this.launch();
        return;
      } catch (error) {
        console.log(`[BrowserService] Browser not ready (${attempt}/${attempts}): ${errorMessage(error)}`);
        if (attempt < attempts) {
          await delay(this.config.connectDelayMs);
        }
      }
    }

    throw new Error(`Browser not available after ${attempts} attempts`);
  }

  /**
   * Open a fresh, isolated session. The caller owns it and must close it.
   */
  async openSession(options: SessionOptions = {}): Promise<BrowserSession> {
    const browser = await this.launch();
    const context = await browser.createBrowserContext();

    try {
      const page = await context.newPage();
      await page.setViewport(VIEWPORT);
      await page.setUserAgent(USER_AGENT);
      page.setDefaultTimeout(this.config.navigationTimeoutMs);

      const session = new PuppeteerSession(context, page, {
        navigationTimeoutMs: this.config.navigationTimeoutMs,
        pollIntervalMs: this.config.pollIntervalMs,
        responseUrls: options.responseUrls ?? [],
        onClose: id => this.sessions.delete(id)
      });
      this.sessions.set(session.id, session);
      console.log(`[BrowserService] Session ${session.id} opened (${this.sessions.size} active)`);
      return session;
    } catch (error) {
      await context.close().catch((closeError: unknown) => {
        console.error('[BrowserService] Failed to close context after setup error:', closeError);
      });
      throw error;
    }
  }

  activeSessionCount(): number {
    return this.sessions.size;
  }

  /**
   * Check if browser is currently running
   */
  isRunning(): boolean {
    return this.browser !== null && this.browser.connected;
  }

  /**
   * Close all sessions and the browser. A remote browser is only disconnected.
   */
  async close(): Promise<void> {
    for (const session of [...this.sessions.values()]) {
      try {
        await session.close();
      } catch (error) {
        console.error(`[BrowserService] Failed to close session ${session.id}:`, error);
      }
    }

    const browser = this.browser;
    this.browser = null;
    if (!browser) {
      return;
    }

    if (this.isRemote) {
      await browser.disconnect();
      console.log('[BrowserService] Disconnected from remote browser');
    } else {
      await browser.close();
      console.log('[BrowserService] Browser closed');
    }
  }
}

// Export singleton instance getter
export const getBrowserService = (config: BrowserServiceConfig): BrowserService => {
  return BrowserService.getInstance(config);
};

export default BrowserService;
