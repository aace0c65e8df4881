/**
 * API Types
 *
 * Request and response types for API endpoints.
 */

export interface ErrorResponse {
  error: string;
  details?: string;
  stack?: string;
}

// POST <login route>
export interface LoginResponse {
  email: string;
  userid: number;
  personid: string;
  token: string;
}

// GET /browser/status
export interface BrowserStatusResponse {
  running: boolean;
  activeSessions: number;
}

// GET /health
export interface HealthResponse {
  status: 'ok';
}
