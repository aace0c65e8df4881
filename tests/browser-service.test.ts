import { beforeEach, describe, expect, it, vi } from 'vitest';
import puppeteer from 'puppeteer-core';
import type { Browser } from 'puppeteer-core';
import { BrowserService, type BrowserServiceConfig } from '../src/server/browser';

vi.mock('puppeteer-core', () => ({
  default: { launch: vi.fn(), connect: vi.fn() },
  TimeoutError: class TimeoutError extends Error {}
}));

const CONFIG: BrowserServiceConfig = {
  executablePath: '/usr/bin/chromium',
  headless: true,
  connectAttempts: 3,
  connectDelayMs: 0,
  navigationTimeoutMs: 1000,
  pollIntervalMs: 5
};

function fakeBrowser() {
  const handlers = new Map<string, () => void>();
  const page = {
    on: vi.fn(),
    setViewport: vi.fn(async () => {}),
    setUserAgent: vi.fn(async () => {}),
    setDefaultTimeout: vi.fn()
  };
  const context = {
    newPage: vi.fn(async () => page),
    close: vi.fn(async () => {})
  };
  const browser = {
    connected: true,
    on: vi.fn((event: string, handler: () => void) => {
      handlers.set(event, handler);
    }),
    createBrowserContext: vi.fn(async () => context),
    close: vi.fn(async () => {}),
    disconnect: vi.fn(async () => {})
  };

  return {
    browser,
    context,
    page,
    asBrowser: () => browser as unknown as Browser,
    disconnect: () => {
      browser.connected = false;
      handlers.get('disconnected')?.();
    }
  };
}

describe('BrowserService', () => {
  beforeEach(() => {
    vi.mocked(puppeteer.launch).mockReset();
    vi.mocked(puppeteer.connect).mockReset();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  it('launches a local browser once for concurrent callers', async () => {
    const fake = fakeBrowser();
    vi.mocked(puppeteer.launch).mockResolvedValue(fake.asBrowser());
    const service = new BrowserService(CONFIG);

    const [first, second] = await Promise.all([service.launch(), service.launch()]);

    expect(first).toBe(second);
    expect(puppeteer.launch).toHaveBeenCalledTimes(1);
    expect(puppeteer.launch).toHaveBeenCalledWith(
      expect.objectContaining({ executablePath: '/usr/bin/chromium', headless: true })
    );
    expect(service.isRunning()).toBe(true);
  });

  it('connects to a remote browser and only disconnects on close', async () => {
    const fake = fakeBrowser();
    vi.mocked(puppeteer.connect).mockResolvedValue(fake.asBrowser());
    const service = new BrowserService({ ...CONFIG, browserURL: 'http://chrome:9222' });

    await service.launch();
    await service.close();

    expect(puppeteer.connect).toHaveBeenCalledWith({ browserURL: 'http://chrome:9222' });
    expect(puppeteer.launch).not.toHaveBeenCalled();
    expect(fake.browser.disconnect).toHaveBeenCalledTimes(1);
    expect(fake.browser.close).not.toHaveBeenCalled();
    expect(service.isRunning()).toBe(false);
  });

  it('relaunches after the browser disconnects', async () => {
    const first = fakeBrowser();
    const second = fakeBrowser();
    vi.mocked(puppeteer.launch)
      .mockResolvedValueOnce(first.asBrowser())
      .mockResolvedValueOnce(second.asBrowser());
    const service = new BrowserService(CONFIG);

    await service.launch();
    first.disconnect();
    expect(service.isRunning()).toBe(false);

    const browser = await service.launch();

    expect(browser).toBe(second.asBrowser());
    expect(puppeteer.launch).toHaveBeenCalledTimes(2);
  });

  it('gives every session its own browser context and tracks open sessions', async () => {
    const fake = fakeBrowser();
    vi.mocked(puppeteer.launch).mockResolvedValue(fake.asBrowser());
    const service = new BrowserService(CONFIG);

    const a = await service.openSession();
    const b = await service.openSession();

    expect(a.id).not.toBe(b.id);
    expect(fake.browser.createBrowserContext).toHaveBeenCalledTimes(2);
    expect(service.activeSessionCount()).toBe(2);

    await a.close();
    await a.close();

    expect(fake.context.close).toHaveBeenCalledTimes(1);
    expect(service.activeSessionCount()).toBe(1);
  });

  it('captures responses only for sessions that ask for them', async () => {
    const fake = fakeBrowser();
    vi.mocked(puppeteer.launch).mockResolvedValue(fake.asBrowser());
    const service = new BrowserService(CONFIG);

    await service.openSession();
    expect(fake.page.on).not.toHaveBeenCalled();

    await service.openSession({ responseUrls: ['/auth/token'] });
    expect(fake.page.on).toHaveBeenCalledTimes(1);
    expect(fake.page.on).toHaveBeenCalledWith('response', expect.any(Function));
  });

  it('still closes the browser when a session fails to close', async () => {
    const fake = fakeBrowser();
    fake.context.close.mockRejectedValueOnce(new Error('context already gone'));
    vi.mocked(puppeteer.launch).mockResolvedValue(fake.asBrowser());
    const service = new BrowserService(CONFIG);
    await service.openSession();
    await service.openSession();

    await service.close();

    expect(fake.context.close).toHaveBeenCalledTimes(2);
    expect(fake.browser.close).toHaveBeenCalledTimes(1);
    expect(service.activeSessionCount()).toBe(0);
    expect(service.isRunning()).toBe(false);
  });

  it('closes the context when page setup fails', async () => {
    const fake = fakeBrowser();
    fake.context.newPage.mockRejectedValueOnce(new Error('page crashed'));
    vi.mocked(puppeteer.launch).mockResolvedValue(fake.asBrowser());
    const service = new BrowserService(CONFIG);

    await expect(service.openSession()).rejects.toThrow('page crashed');

    expect(fake.context.close).toHaveBeenCalledTimes(1);
    expect(service.activeSessionCount()).toBe(0);
  });

  it('retries until the browser is reachable', async () => {
    const fake = fakeBrowser();
    vi.mocked(puppeteer.launch)
      .mockRejectedValueOnce(new Error('ECONNREFUSED'))
      .mockResolvedValueOnce(fake.asBrowser());
    const service = new BrowserService(CONFIG);

    await service.waitUntilReady();

    expect(puppeteer.launch).toHaveBeenCalledTimes(2);
    expect(service.isRunning()).toBe(true);
  });

  it('gives up after the configured number of attempts', async () => {
    vi.mocked(puppeteer.launch).mockRejectedValue(new Error('ECONNREFUSED'));
    const service = new BrowserService({ ...CONFIG, connectAttempts: 2 });

    await expect(service.waitUntilReady()).rejects.toThrow('Browser not available after 2 attempts');
    expect(puppeteer.launch).toHaveBeenCalledTimes(2);
  });
});
