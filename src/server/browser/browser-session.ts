/**
 * Browser Session Types
 *
 * The capability the login workflow drives. Implemented on top of Puppeteer
 * by PuppeteerSession and by in-process fakes in tests.
 */

interface DomLocatorOptions {
  /** CSS selector of the iframe the element lives in */
  frame?: string;
  /** Read this attribute instead of the element's value or text */
  attribute?: string;
}

export type ElementLocator =
  | ({ kind: 'id'; id: string } & DomLocatorOptions)
  | ({ kind: 'css'; selector: string } & DomLocatorOptions)
  | ({ kind: 'xpath'; expression: string } & DomLocatorOptions)
  | ({ kind: 'text'; text: string } & DomLocatorOptions)
  | { kind: 'cookie'; namePrefix: string }
  | { kind: 'response'; urlIncludes: string };

export type DomLocator = Extract<ElementLocator, { kind: 'id' | 'css' | 'xpath' | 'text' }>;

export function isDomLocator(locator: ElementLocator): locator is DomLocator {
  return locator.kind !== 'cookie' && locator.kind !== 'response';
}

export function describeLocator(locator: ElementLocator): string {
  switch (locator.kind) {
    case 'id':
      return `#${locator.id}`;
    case 'css':
      return locator.selector;
    case 'xpath':
      return `xpath ${locator.expression}`;
    case 'text':
      return `text "${locator.text}"`;
    case 'cookie':
      return `cookie ${locator.namePrefix}*`;
    case 'response':
      return `response ${locator.urlIncludes}`;
  }
}

export interface BrowserSession {
  readonly id: string;

  navigate(url: string): Promise<void>;

  /** Resolves true as soon as the locator matches, false once timeoutMs has passed */
  waitFor(locator: ElementLocator, timeoutMs: number): Promise<boolean>;

  type(locator: DomLocator, text: string): Promise<void>;

  click(locator: DomLocator): Promise<void>;

  /**
   * Current value of the locator, or null when it does not match.
   * Inputs yield their value, other elements their trimmed text, cookies their
   * value and responses their body.
   */
  read(locator: ElementLocator): Promise<string | null>;

  close(): Promise<void>;
}

export interface SessionOptions {
  /** URL fragments of XHR/fetch responses to keep for `response` locators */
  responseUrls?: string[];
}

export interface SessionFactory {
  openSession(options?: SessionOptions): Promise<BrowserSession>;
}

/**
 * Raised by a session when the browser gives up waiting, e.g. on a navigation
 * that does not finish in time.
 */
export class BrowserTimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BrowserTimeoutError';
  }
}
