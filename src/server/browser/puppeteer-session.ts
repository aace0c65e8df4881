/**
 * Puppeteer Session
 *
 * One isolated browser context with a single page. Cookies, storage and
 * cache are private to the context and discarded when the session closes.
 */

import { randomUUID } from 'crypto';
import { TimeoutError } from 'puppeteer-core';
import type { BrowserContext, Frame, HTTPResponse, Page } from 'puppeteer-core';
import {
  type BrowserSession,
  BrowserTimeoutError,
  type DomLocator,
  type ElementLocator,
  describeLocator,
  isDomLocator
} from './browser-session';
import { errorMessage, pollUntil } from '../utils';

export interface PuppeteerSessionOptions {
  navigationTimeoutMs: number;
  pollIntervalMs: number;
  /** Only responses whose URL contains one of these are captured */
  responseUrls: string[];
  onClose?: (sessionId: string) => void;
}

interface CapturedResponse {
  url: string;
  body: Promise<string | null>;
}

function quote(value: string): string {
  return JSON.stringify(value);
}

/**
 * Translate a DOM locator into a Puppeteer selector string.
 */
export function toSelector(locator: DomLocator): string {
  switch (locator.kind) {
    case 'id':
      return `[id=${quote(locator.id)}]`;
    case 'css':
      return locator.selector;
    case 'xpath':
      return `::-p-xpath(${quote(locator.expression)})`;
    case 'text':
      return `::-p-text(${quote(locator.text)})`;
  }
}

export class PuppeteerSession implements BrowserSession {
  readonly id: string = randomUUID();
  private responses: CapturedResponse[] = [];
  private closed = false;

  constructor(
    private readonly context: BrowserContext,
    private readonly page: Page,
    private readonly options: PuppeteerSessionOptions
  ) {
    if (options.responseUrls.length > 0) {
      page.on('response', response => this.capture(response));
    }
  }

  async navigate(url: string): Promise<void> {
    try {
      await this.page.goto(url, {
        waitUntil: 'domcontentloaded',
        timeout: this.options.navigationTimeoutMs
      });
    } catch (error) {
      if (error instanceof TimeoutError) {
        throw new BrowserTimeoutError(`Navigation to ${url} timed out`);
      }
      throw error;
    }
  }

  async waitFor(locator: ElementLocator, timeoutMs: number): Promise<boolean> {
    if (!isDomLocator(locator)) {
      const value = await pollUntil(() => this.read(locator), {
        timeoutMs,
        intervalMs: this.options.pollIntervalMs
      });
      return value !== null;
    }

    const deadline = Date.now() + timeoutMs;
    try {
      const frame = await this.resolveFrame(locator, timeoutMs);
      if (!frame) {
        return false;
      }
      const remaining = Math.max(deadline - Date.now(), 1);
      const handle = await frame.waitForSelector(toSelector(locator), { timeout: remaining });
      if (!handle) {
        return false;
      }
      await handle.dispose();
      return true;
    } catch (error) {
      if (error instanceof TimeoutError) {
        return false;
      }
      throw error;
    }
  }

  async type(locator: DomLocator, text: string): Promise<void> {
    const frame = await this.requireFrame(locator);
    await frame.type(toSelector(locator), text);
  }

  async click(locator: DomLocator): Promise<void> {
    const frame = await this.requireFrame(locator);
    await frame.click(toSelector(locator));
  }

  async read(locator: ElementLocator): Promise<string | null> {
    if (locator.kind === 'cookie') {
      const cookies = await this.page.cookies();
      const cookie = cookies.find(c => c.name.startsWith(locator.namePrefix));
      return cookie ? cookie.value : null;
    }

    if (locator.kind === 'response') {
      const matches = this.responses.filter(r => r.url.includes(locator.urlIncludes));
      const latest = matches[matches.length - 1];
      return latest ? latest.body : null;
    }

    const frame = await this.resolveFrame(locator);
    if (!frame) {
      return null;
    }

    const handle = await frame.$(toSelector(locator));
    if (!handle) {
      return null;
    }

    try {
      return await handle.evaluate((el, attribute) => {
        if (attribute) {
          return el.getAttribute(attribute);
        }
        if (el instanceof HTMLInputElement || el instanceof HTMLTextAreaElement) {
          return el.value;
        }
        return el.textContent?.trim() ?? null;
      }, locator.attribute ?? null);
    } finally {
      await handle.dispose();
    }
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    try {
      await this.context.close();
    } finally {
      this.responses = [];
      this.options.onClose?.(this.id);
    }
  }

  /**
   * Frame the locator points into. Without a timeout the iframe must already
   * be attached; with one, it is waited for.
   */
  private async resolveFrame(locator: DomLocator, timeoutMs?: number): Promise<Frame | null> {
    if (!locator.frame) {
      return this.page.mainFrame();
    }

    const handle = timeoutMs === undefined
      ? await this.page.$(locator.frame)
      : await this.page.waitForSelector(locator.frame, { timeout: timeoutMs });
    if (!handle) {
      return null;
    }

    try {
      return await handle.contentFrame();
    } finally {
      await handle.dispose();
    }
  }

  private async requireFrame(locator: DomLocator): Promise<Frame> {
    const frame = await this.resolveFrame(locator);
    if (!frame) {
      throw new Error(`Frame not found for ${describeLocator(locator)}`);
    }
    return frame;
  }

  private capture(response: HTTPResponse): void {
    const resourceType = response.request().resourceType();
    if (resourceType !== 'xhr' && resourceType !== 'fetch') {
      return;
    }

    const url = response.url();
    if (!this.options.responseUrls.some(fragment => url.includes(fragment))) {
      return;
    }

    this.responses.push({
      url,
      body: response.text().catch((error: unknown) => {
        console.log(`[BrowserService] Response body unavailable for ${url}: ${errorMessage(error)}`);
        return null;
      })
    });
  }
}
