/**
 * Browser Controller
 *
 * Reports the state of the browser behind the login workflow.
 */

import type { Request, Response } from 'express';
import type { BrowserStatusResponse } from '../types';

export interface BrowserStatusSource {
  isRunning(): boolean;
  activeSessionCount(): number;
}

export function createBrowserController(browser: BrowserStatusSource) {
  /**
   * GET /browser/status
   * Get browser status. Open sessions are counted, not limited.
   */
  async function getStatus(req: Request, res: Response<BrowserStatusResponse>): Promise<void> {
    res.json({
      running: browser.isRunning(),
      activeSessions: browser.activeSessionCount()
    });
  }

  return { getStatus };
}
