/**
 * Login Types
 *
 * Input and result of a single login attempt.
 */

export interface LoginCredential {
  username: string;
  password: string;
}

export interface ChaynsUser {
  email: string;
  userId: number;
  personId: string;
  token: string;
}

export type LoginFailureReason =
  | 'ElementNotFound'
  | 'InvalidCredentials'
  | 'IncompleteResult'
  | 'Timeout'
  | 'AutomationToolError';

export type LoginResult =
  | { success: true; user: ChaynsUser }
  | { success: false; reason: LoginFailureReason; error: string };

export interface LoginWorkflow {
  /** Resolves with a result for every outcome; never rejects */
  attemptLogin(credential: LoginCredential): Promise<LoginResult>;
}

/**
 * A step of the workflow that cannot continue. Converted into a failed
 * LoginResult at the workflow boundary.
 */
export class LoginStepError extends Error {
  constructor(public readonly reason: LoginFailureReason, message: string) {
    super(message);
    this.name = 'LoginStepError';
  }
}
