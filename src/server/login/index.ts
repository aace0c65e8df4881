/**
 * Login Module
 */

export { ChaynsLoginWorkflow, parseProfile } from './chayns-login';
export type { ChaynsLoginOptions } from './chayns-login';
export { CHAYNS_PAGE, buildPageContract } from './chayns-page';
export type { ChaynsPageContract, TokenSource } from './chayns-page';
export { LoginStepError } from './login.types';
export type {
  ChaynsUser,
  LoginCredential,
  LoginFailureReason,
  LoginResult,
  LoginWorkflow
} from './login.types';
