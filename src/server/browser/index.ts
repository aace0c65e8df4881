/**
 * Browser Automation Module
 *
 * Exports the Puppeteer-backed session factory and the session capability
 * the login workflow is written against.
 */

export { default as BrowserService, getBrowserService } from './browser-service';
export type { BrowserServiceConfig } from './browser-service';
export { PuppeteerSession, toSelector } from './puppeteer-session';
export { BrowserTimeoutError, describeLocator, isDomLocator } from './browser-session';
export type {
  BrowserSession,
  SessionFactory,
  SessionOptions,
  ElementLocator,
  DomLocator
} from './browser-session';
