/**
 * @file StaticTokenProvider.ts
 * @brief Serves access tokens held in settings.
 *
 * @description
 * Token acquisition and refresh belong to the host application, which writes
 * fresh tokens into the settings (or calls `setToken`) before loads run.
 *
 * @license See LICENSE.md
 */

import { AccountKind } from '../../types';
import { AuthError } from '../../types/errors';
import { PlannerSettings } from '../../types/settings';
import { AccessTokenProvider } from '../../providers/Provider';

export class StaticTokenProvider implements AccessTokenProvider {
  private accounts: PlannerSettings['accounts'];

  constructor(accounts: PlannerSettings['accounts']) {
    this.accounts = { ...accounts };
  }

  isLinked(account: AccountKind): boolean {
    return this.accounts[account] !== undefined;
  }

  async getAccessToken(account: AccountKind): Promise<string> {
    const token = this.accounts[account]?.accessToken;
    if (!token) {
      throw new AuthError('noAccessToken');
    }
    return token;
  }

  /** Links the account when `token` is given; `undefined` unlinks it. */
  setToken(account: AccountKind, token: string | null | undefined): void {
    if (token === undefined) {
      delete this.accounts[account];
    } else {
      this.accounts[account] = { accessToken: token };
    }
  }
}
