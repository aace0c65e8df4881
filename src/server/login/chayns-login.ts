/**
 * chayns Login Workflow
 *
 * Logs into chayns with one isolated browser session and reads the access
 * token and user identifiers. One attempt per call; no retries.
 *
 * Sequence:
 * 1. Open the login page and click the login entry button
 * 2. Wait for the login iframe, skip the remembered-account list if shown
 * 3. Submit username, then password
 * 4. Poll for a token (success) or an error message (invalid credentials)
 * 5. Read the user JSON from the profile page
 */

import {
  type BrowserSession,
  BrowserTimeoutError,
  type DomLocator,
  type SessionFactory,
  describeLocator
} from '../browser';
import type { LoginTimeouts } from '../config';
import { errorMessage, isRecord, pollUntil } from '../utils';
import type { ChaynsPageContract, TokenSource } from './chayns-page';
import {
  type ChaynsUser,
  type LoginCredential,
  type LoginFailureReason,
  type LoginResult,
  LoginStepError,
  type LoginWorkflow
} from './login.types';

export interface ChaynsLoginOptions {
  page: ChaynsPageContract;
  timeouts: LoginTimeouts;
}

type LoginOutcome =
  | { kind: 'token'; token: string }
  | { kind: 'rejected'; message: string };

function extractToken(source: TokenSource, value: string): string | null {
  if (source.format === 'raw') {
    return value || null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch {
    return null;
  }

  const token = isRecord(parsed) ? parsed['token'] : undefined;
  return typeof token === 'string' && token ? token : null;
}

/**
 * Build the user from the profile page's JSON, `{ user: { userId, personId, email? } }`.
 * Falls back to the submitted username when the page carries no email.
 */
export function parseProfile(raw: string | null, token: string, username: string): ChaynsUser {
  if (!raw) {
    throw new LoginStepError('IncompleteResult', 'Profile data is empty');
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    throw new LoginStepError('IncompleteResult', 'Profile data is not valid JSON');
  }

  const user = isRecord(data) ? data['user'] : undefined;
  if (!isRecord(user)) {
    throw new LoginStepError('IncompleteResult', 'Profile data has no user');
  }

  const rawUserId = user['userId'];
  const userId = typeof rawUserId === 'number' || (typeof rawUserId === 'string' && rawUserId.trim() !== '')
    ? Number(rawUserId)
    : NaN;
  if (!Number.isInteger(userId)) {
    throw new LoginStepError('IncompleteResult', 'Profile data has no valid userId');
  }

  const rawPersonId = user['personId'];
  const personId = typeof rawPersonId === 'string' || typeof rawPersonId === 'number'
    ? String(rawPersonId)
    : '';
  if (!personId) {
    throw new LoginStepError('IncompleteResult', 'Profile data has no personId');
  }

  if (!token) {
    throw new LoginStepError('IncompleteResult', 'Access token is empty');
  }

  const rawEmail = user['email'];
  const email = typeof rawEmail === 'string' && rawEmail ? rawEmail : username;

  return { email, userId, personId, token };
}

export class ChaynsLoginWorkflow implements LoginWorkflow {
  constructor(
    private readonly sessions: SessionFactory,
    private readonly options: ChaynsLoginOptions
  ) {}

  private responseUrls(): string[] {
    const urls: string[] = [];
    for (const source of this.options.page.tokenSources) {
      if (source.locator.kind === 'response') {
        urls.push(source.locator.urlIncludes);
      }
    }
    return urls;
  }

  async attemptLogin(credential: LoginCredential): Promise<LoginResult> {
    let session: BrowserSession;
    try {
      session = await this.sessions.openSession({ responseUrls: this.responseUrls() });
    } catch (error) {
      return this.fail('AutomationToolError', `Failed to open browser session: ${errorMessage(error)}`);
    }

    console.log(`[ChaynsLogin] Session ${session.id}: login attempt for ${credential.username}`);

    try {
      const user = await this.run(session, credential);
      console.log(`[ChaynsLogin] Session ${session.id}: login succeeded (userId ${user.userId})`);
      return { success: true, user };
    } catch (error) {
      if (error instanceof LoginStepError) {
        return this.fail(error.reason, error.message, session.id);
      }
      if (error instanceof BrowserTimeoutError) {
        return this.fail('Timeout', error.message, session.id);
      }
      return this.fail('AutomationToolError', `Browser automation failed: ${errorMessage(error)}`, session.id);
    } finally {
      await this.release(session);
    }
  }

  private async run(session: BrowserSession, credential: LoginCredential): Promise<ChaynsUser> {
    const { page, timeouts } = this.options;

    await session.navigate(page.loginPageUrl);

    const loginButton = await this.waitForAny(session, page.loginButtons, 'Login button');
    await session.click(loginButton);

    await this.require(session, page.loginFrame, 'Login frame');

    if (await session.waitFor(page.otherUserTile, timeouts.optionalElementMs)) {
      console.log(`[ChaynsLogin] Session ${session.id}: choosing another account`);
      await session.click(page.otherUserTile);
    }

    await this.require(session, page.usernameInput, 'Username field');
    await session.type(page.usernameInput, credential.username);
    await this.require(session, page.usernameSubmit, 'Username submit button');
    await session.click(page.usernameSubmit);

    await this.require(session, page.passwordInput, 'Password field');
    await session.type(page.passwordInput, credential.password);
    await this.require(session, page.passwordSubmit, 'Password submit button');
    await session.click(page.passwordSubmit);

    const outcome = await this.waitForOutcome(session);
    if (outcome.kind === 'rejected') {
      throw new LoginStepError('InvalidCredentials', outcome.message);
    }

    await session.navigate(page.profilePageUrl);
    await this.require(session, page.profileData, 'Profile data');
    const raw = await session.read(page.profileData);

    return parseProfile(raw, outcome.token, credential.username);
  }

  private async waitForOutcome(session: BrowserSession): Promise<LoginOutcome> {
    const { page, timeouts } = this.options;

    const outcome = await pollUntil<LoginOutcome>(async () => {
      for (const source of page.tokenSources) {
        const value = await session.read(source.locator);
        const token = value === null ? null : extractToken(source, value);
        if (token) {
          return { kind: 'token', token };
        }
      }

      // The error container may be rendered empty before any attempt
      const message = await session.read(page.errorMessage);
      if (message) {
        return { kind: 'rejected', message };
      }
      return null;
    }, { timeoutMs: timeouts.outcomeMs, intervalMs: timeouts.pollIntervalMs });

    if (!outcome) {
      throw new LoginStepError('Timeout', `No login result within ${timeouts.outcomeMs} ms`);
    }
    return outcome;
  }

  private async require(session: BrowserSession, locator: DomLocator, what: string): Promise<void> {
    const found = await session.waitFor(locator, this.options.timeouts.elementMs);
    if (!found) {
      throw new LoginStepError('ElementNotFound', `${what} not found (${describeLocator(locator)})`);
    }
  }

  private async waitForAny(session: BrowserSession, locators: DomLocator[], what: string): Promise<DomLocator> {
    const { timeouts } = this.options;

    const match = await pollUntil(async () => {
      for (const locator of locators) {
        if ((await session.read(locator)) !== null) {
          return locator;
        }
      }
      return null;
    }, { timeoutMs: timeouts.elementMs, intervalMs: timeouts.pollIntervalMs });

    if (!match) {
      const tried = locators.map(describeLocator).join(', ');
      throw new LoginStepError('ElementNotFound', `${what} not found (${tried})`);
    }
    return match;
  }

  private async release(session: BrowserSession): Promise<void> {
    try {
      await session.close();
    } catch (error) {
      console.error(`[ChaynsLogin] Session ${session.id}: failed to close:`, error);
    }
  }

  private fail(reason: LoginFailureReason, error: string, sessionId?: string): LoginResult {
    const prefix = sessionId ? `[ChaynsLogin] Session ${sessionId}` : '[ChaynsLogin]';
    console.error(`${prefix}: login failed (${reason}): ${error}`);
    return { success: false, reason, error };
  }
}
