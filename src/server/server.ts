// Load environment variables from .env file
import * as dotenv from 'dotenv';
import * as path from 'path';
dotenv.config({ path: path.join(__dirname, '../../.env') });

import { createApp } from './app';
import { getBrowserService } from './browser';
import { loadConfig } from './config';
import { ChaynsLoginWorkflow, buildPageContract } from './login';

async function main(): Promise<void> {
  const config = loadConfig();

  const browserService = getBrowserService({
    ...config.browser,
    pollIntervalMs: config.timeouts.pollIntervalMs
  });

  console.log('[Server] Waiting for browser...');
  await browserService.waitUntilReady();

  const loginWorkflow = new ChaynsLoginWorkflow(browserService, {
    page: buildPageContract(config.chayns),
    timeouts: config.timeouts
  });

  const app = createApp({
    loginWorkflow,
    browser: browserService,
    loginRoute: config.loginRoute
  });

  const server = app.listen(config.port, () => {
    console.log(`[Server] Login service running on port ${config.port} (POST ${config.loginRoute})`);
  });

  const shutdown = (signal: NodeJS.Signals): void => {
    console.log(`[Server] ${signal} received, shutting down`);
    server.close();
    browserService.close()
      .then(() => process.exit(0))
      .catch(error => {
        console.error('[Server] Failed to close browser:', error);
        process.exit(1);
      });
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch(error => {
  console.error('[Server] Startup failed:', error);
  process.exit(1);
});
