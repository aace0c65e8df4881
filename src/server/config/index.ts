/**
 * Service Configuration
 *
 * Reads the process environment (populated from .env by dotenv in server.ts)
 * into a typed configuration object.
 */

export interface BrowserConfig {
  /** WebSocket endpoint of an already running browser */
  wsEndpoint?: string;
  /** HTTP DevTools URL of an already running browser, e.g. http://chrome:9222 */
  browserURL?: string;
  executablePath: string;
  headless: boolean;
  connectAttempts: number;
  connectDelayMs: number;
  navigationTimeoutMs: number;
}

export interface LoginTimeouts {
  elementMs: number;
  optionalElementMs: number;
  outcomeMs: number;
  pollIntervalMs: number;
}

export interface ChaynsConfig {
  loginPageUrl: string;
  profilePageUrl: string;
  tokenResponseUrl?: string;
}

export interface ServiceConfig {
  port: number;
  loginRoute: string;
  browser: BrowserConfig;
  chayns: ChaynsConfig;
  timeouts: LoginTimeouts;
}

type Env = Record<string, string | undefined>;

function readString(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function readInt(env: Env, name: string, fallback: number, min = 0): number {
  const raw = readString(env, name);
  if (raw === undefined) {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function readBoolean(env: Env, name: string, fallback: boolean): boolean {
  const raw = readString(env, name);
  if (raw === undefined) {
    return fallback;
  }

  switch (raw.toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
      return true;
    case 'false':
    case '0':
    case 'no':
      return false;
    default:
      throw new Error(`${name} must be a boolean, got "${raw}"`);
  }
}

export function loadConfig(env: Env = process.env): ServiceConfig {
  const loginRoute = readString(env, 'LOGIN_ROUTE') ?? '/aichat/chayns/login';
  if (!loginRoute.startsWith('/')) {
    throw new Error(`LOGIN_ROUTE must start with "/", got "${loginRoute}"`);
  }

  return {
    port: readInt(env, 'PORT', 5557, 1),
    loginRoute,
    browser: {
      wsEndpoint: readString(env, 'BROWSER_WS_ENDPOINT'),
      browserURL: readString(env, 'BROWSER_URL'),
      executablePath: readString(env, 'CHROME_EXECUTABLE_PATH') ?? '/usr/bin/chromium',
      headless: readBoolean(env, 'BROWSER_HEADLESS', true),
      connectAttempts: readInt(env, 'BROWSER_CONNECT_ATTEMPTS', 10, 1),
      connectDelayMs: readInt(env, 'BROWSER_CONNECT_DELAY_MS', 5000),
      navigationTimeoutMs: readInt(env, 'NAVIGATION_TIMEOUT_MS', 30000, 1)
    },
    chayns: {
      loginPageUrl: readString(env, 'CHAYNS_LOGIN_URL') ?? 'https://chayns.de',
      profilePageUrl: readString(env, 'CHAYNS_PROFILE_URL') ?? 'https://chayns.de/id',
      tokenResponseUrl: readString(env, 'CHAYNS_TOKEN_RESPONSE_URL')
    },
    timeouts: {
      elementMs: readInt(env, 'ELEMENT_TIMEOUT_MS', 20000, 1),
      optionalElementMs: readInt(env, 'OPTIONAL_ELEMENT_TIMEOUT_MS', 3000, 1),
      outcomeMs: readInt(env, 'LOGIN_OUTCOME_TIMEOUT_MS', 30000, 1),
      pollIntervalMs: readInt(env, 'LOGIN_POLL_INTERVAL_MS', 500, 1)
    }
  };
}
