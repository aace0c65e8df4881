/**
 * Health Controller
 */

import type { Request, Response } from 'express';
import type { HealthResponse } from '../types';

/**
 * GET /health
 */
export async function getHealth(req: Request, res: Response<HealthResponse>): Promise<void> {
  res.json({ status: 'ok' });
}
