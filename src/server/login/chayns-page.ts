/**
 * chayns Page Contract
 *
 * URLs and locators the login workflow relies on. The login form lives in an
 * iframe served from login.chayns.net; these selectors need adjusting when
 * chayns changes its markup.
 */

import type { DomLocator, ElementLocator } from '../browser';
import type { ChaynsConfig } from '../config';

export interface TokenSource {
  locator: ElementLocator;
  /** raw: the value is the token; json: the value is a JSON object with a string `token` */
  format: 'raw' | 'json';
}

export interface ChaynsPageContract {
  loginPageUrl: string;
  profilePageUrl: string;
  /** Tried together; the first one present is clicked */
  loginButtons: DomLocator[];
  loginFrame: DomLocator;
  /** "Use another account" tile shown when a previous login is remembered */
  otherUserTile: DomLocator;
  usernameInput: DomLocator;
  usernameSubmit: DomLocator;
  passwordInput: DomLocator;
  passwordSubmit: DomLocator;
  errorMessage: DomLocator;
  tokenSources: TokenSource[];
  /** Hidden input holding the user JSON on the profile page */
  profileData: DomLocator;
}

const LOGIN_FRAME = "iframe[src*='login.chayns.net']";

export const CHAYNS_PAGE: ChaynsPageContract = {
  loginPageUrl: 'https://chayns.de',
  profilePageUrl: 'https://chayns.de/id',
  loginButtons: [
    { kind: 'css', selector: 'button.beta-chayns-button' },
    { kind: 'xpath', expression: "//button[contains(text(), 'Anmelden')]" }
  ],
  loginFrame: { kind: 'css', selector: LOGIN_FRAME },
  otherUserTile: {
    kind: 'xpath',
    expression: '/html/body/div[1]/div/div[1]/div/div[2]/div[2]/div/div/div[2]',
    frame: LOGIN_FRAME
  },
  usernameInput: { kind: 'id', id: 'CC_INPUT_0', frame: LOGIN_FRAME },
  usernameSubmit: { kind: 'css', selector: '.form__email__wrapper__button', frame: LOGIN_FRAME },
  passwordInput: { kind: 'id', id: 'CC_INPUT_3', frame: LOGIN_FRAME },
  passwordSubmit: { kind: 'css', selector: '.form__password-wrapper__button', frame: LOGIN_FRAME },
  errorMessage: { kind: 'css', selector: '.form__error, .cc__input__error', frame: LOGIN_FRAME },
  tokenSources: [{ locator: { kind: 'cookie', namePrefix: 'at_' }, format: 'raw' }],
  profileData: { kind: 'css', selector: "input[type='hidden']" }
};

/**
 * Page contract with the configured URLs applied.
 */
export function buildPageContract(config: ChaynsConfig): ChaynsPageContract {
  const tokenSources = [...CHAYNS_PAGE.tokenSources];
  if (config.tokenResponseUrl) {
    tokenSources.push({
      locator: { kind: 'response', urlIncludes: config.tokenResponseUrl },
      format: 'json'
    });
  }

  return {
    ...CHAYNS_PAGE,
    loginPageUrl: config.loginPageUrl,
    profilePageUrl: config.profilePageUrl,
    tokenSources
  };
}
