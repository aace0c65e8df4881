import { beforeEach, describe, expect, it, vi } from 'vitest';
import { TimeoutError } from 'puppeteer-core';
import type { BrowserContext, HTTPResponse, Page } from 'puppeteer-core';
import { BrowserTimeoutError, PuppeteerSession, describeLocator, toSelector } from '../src/server/browser';

vi.mock('puppeteer-core', () => ({
  default: { launch: vi.fn(), connect: vi.fn() },
  TimeoutError: class TimeoutError extends Error {}
}));

function fakeResponse(url: string, resourceType: string, body: string) {
  return {
    url: () => url,
    request: () => ({ resourceType: () => resourceType }),
    text: async () => body
  } as unknown as HTTPResponse;
}

function setup(responseUrls: string[] = []) {
  let onResponse: ((response: HTTPResponse) => void) | undefined;
  const frame = { waitForSelector: vi.fn(), $: vi.fn() };
  const page = {
    on: vi.fn((event: string, handler: (response: HTTPResponse) => void) => {
      if (event === 'response') {
        onResponse = handler;
      }
    }),
    goto: vi.fn(async () => null),
    cookies: vi.fn(async () => [
      { name: 'session', value: 'other' },
      { name: 'at_77892', value: 'test-token' }
    ]),
    mainFrame: () => frame,
    $: vi.fn(),
    waitForSelector: vi.fn()
  };
  const context = { close: vi.fn(async () => {}) };
  const onClose = vi.fn();

  const session = new PuppeteerSession(
    context as unknown as BrowserContext,
    page as unknown as Page,
    { navigationTimeoutMs: 1000, pollIntervalMs: 5, responseUrls, onClose }
  );

  return {
    session,
    page,
    frame,
    context,
    onClose,
    emitResponse: (response: HTTPResponse) => onResponse?.(response)
  };
}

describe('toSelector', () => {
  it('matches ids through an attribute selector', () => {
    expect(toSelector({ kind: 'id', id: 'CC_INPUT_0' })).toBe('[id="CC_INPUT_0"]');
  });

  it('passes css selectors through', () => {
    expect(toSelector({ kind: 'css', selector: 'button.beta-chayns-button' })).toBe('button.beta-chayns-button');
  });

  it('wraps xpath and text in Puppeteer pseudo selectors', () => {
    expect(toSelector({ kind: 'xpath', expression: "//button[contains(text(), 'Anmelden')]" })).toBe(
      `::-p-xpath("//button[contains(text(), 'Anmelden')]")`
    );
    expect(toSelector({ kind: 'text', text: 'Anmelden' })).toBe('::-p-text("Anmelden")');
  });
});

describe('describeLocator', () => {
  it('names every kind of locator', () => {
    expect(describeLocator({ kind: 'id', id: 'CC_INPUT_3', frame: 'iframe' })).toBe('#CC_INPUT_3');
    expect(describeLocator({ kind: 'cookie', namePrefix: 'at_' })).toBe('cookie at_*');
    expect(describeLocator({ kind: 'response', urlIncludes: '/token' })).toBe('response /token');
  });
});

describe('PuppeteerSession', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  it('reads the first cookie with a matching prefix', async () => {
    const { session } = setup();

    await expect(session.read({ kind: 'cookie', namePrefix: 'at_' })).resolves.toBe('test-token');
    await expect(session.read({ kind: 'cookie', namePrefix: 'rt_' })).resolves.toBeNull();
  });

  it('reads the latest captured XHR or fetch response', async () => {
    const { session, emitResponse } = setup(['/auth/token']);

    emitResponse(fakeResponse('https://login.example.com/auth/token', 'fetch', '{"token":"first"}'));
    emitResponse(fakeResponse('https://login.example.com/auth/token', 'xhr', '{"token":"second"}'));
    emitResponse(fakeResponse('https://login.example.com/auth/token.png', 'image', 'binary'));

    await expect(session.read({ kind: 'response', urlIncludes: '/auth/token' })).resolves.toBe('{"token":"second"}');
  });

  it('keeps only responses from the configured URLs', async () => {
    const { session, emitResponse } = setup(['/auth/token']);

    emitResponse(fakeResponse('https://login.example.com/api/profile', 'fetch', '{"user":{}}'));

    await expect(session.read({ kind: 'response', urlIncludes: '/api/profile' })).resolves.toBeNull();
  });

  it('does not listen for responses when none are configured', () => {
    const { page } = setup();

    expect(page.on).not.toHaveBeenCalled();
  });

  it('waits for a cookie by polling', async () => {
    const { session, page } = setup();
    page.cookies.mockResolvedValueOnce([]).mockResolvedValueOnce([]);

    await expect(session.waitFor({ kind: 'cookie', namePrefix: 'at_' }, 500)).resolves.toBe(true);
    expect(page.cookies).toHaveBeenCalledTimes(3);
  });

  it('reports a missing element when the selector wait times out', async () => {
    const { session, frame } = setup();
    frame.waitForSelector.mockRejectedValue(new TimeoutError('Waiting for selector failed'));

    await expect(session.waitFor({ kind: 'css', selector: '.missing' }, 50)).resolves.toBe(false);
  });

  it('propagates other selector errors', async () => {
    const { session, frame } = setup();
    frame.waitForSelector.mockRejectedValue(new Error('Execution context was destroyed'));

    await expect(session.waitFor({ kind: 'css', selector: '.gone' }, 50)).rejects.toThrow(
      'Execution context was destroyed'
    );
  });

  it('turns navigation timeouts into BrowserTimeoutError', async () => {
    const { session, page } = setup();
    page.goto.mockRejectedValueOnce(new TimeoutError('Navigation timeout of 1000 ms exceeded'));

    const navigation = session.navigate('https://chayns.de');

    await expect(navigation).rejects.toBeInstanceOf(BrowserTimeoutError);
    await expect(navigation).rejects.toThrow('Navigation to https://chayns.de timed out');
  });

  it('reads nothing from a frame that is not attached', async () => {
    const { session, page } = setup();
    page.$.mockResolvedValue(null);

    await expect(session.read({ kind: 'id', id: 'CC_INPUT_0', frame: 'iframe.login' })).resolves.toBeNull();
    expect(page.$).toHaveBeenCalledWith('iframe.login');
  });

  it('closes its context once and reports the close', async () => {
    const { session, context, onClose } = setup();

    await session.close();
    await session.close();

    expect(context.close).toHaveBeenCalledTimes(1);
    expect(onClose).toHaveBeenCalledTimes(1);
    expect(onClose).toHaveBeenCalledWith(session.id);
  });
});
