/**
 * JWT Token Management
 */

import jwt from 'jsonwebtoken';
import { JWTAuthConfig } from '../types';
import { AuthenticationError } from '../errors';

/**
 * Seconds before `exp` at which a token already counts as expired.
 */
const EXPIRY_BUFFER_SECONDS = 60;

export class JWTManager {
  private token: string;
  private readonly refreshToken?: () => Promise<string | undefined>;

  constructor(config: JWTAuthConfig) {
    this.token = config.token;
    this.refreshToken = config.refresh;
  }

  /**
   * Current token, refreshed first when it has expired.
   */
  async getToken(): Promise<string> {
    if (this.isExpired(this.token)) {
      const refreshed = await this.refresh();
      if (!refreshed) {
        throw new AuthenticationError(
          'JWT has expired',
          undefined,
          'No refresh callback supplied a new token'
        );
      }
    }
    return this.token;
  }

  /**
   * Ask the refresh callback for a new token. Resolves false when there is
   * no callback or it has nothing new.
   */
  async refresh(): Promise<boolean> {
    if (!this.refreshToken) {
      return false;
    }
    const token = await this.refreshToken();
    if (!token || token === this.token) {
      return false;
    }
    this.token = token;
    return true;
  }

  /**
   * Expiry from the token's `exp` claim. Tokens that are not decodable JWTs
   * or carry no `exp` are never considered expired.
   */
  isExpired(token: string): boolean {
    const payload = jwt.decode(token);
    if (payload === null || typeof payload === 'string' || payload.exp === undefined) {
      return false;
    }
    const now = Math.floor(Date.now() / 1000);
    return payload.exp <= now + EXPIRY_BUFFER_SECONDS;
  }
}
