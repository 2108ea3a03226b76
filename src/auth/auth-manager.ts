/**
 * Authentication Manager
 */

import { AuthConfig } from '../types';
import { JWTManager } from './jwt-manager';
import { AuthenticationError, ConfigurationError } from '../errors';

export const CLIENT_KEY_ID_HEADER = 'X-Rune-Client-Key-ID';
export const CLIENT_ACCESS_KEY_HEADER = 'X-Rune-Client-Access-Key';
export const ACCESS_TOKEN_ID_HEADER = 'X-Rune-User-Access-Token-Id';
export const ACCESS_TOKEN_SECRET_HEADER = 'X-Rune-User-Access-Token-Secret';
export const JWT_HEADER = 'X-Rune-User-Access-Token';

export class AuthManager {
  private config: AuthConfig;
  private jwtManager?: JWTManager;

  constructor(config: AuthConfig) {
    const validation = AuthManager.validateConfig(config);
    if (!validation.isValid) {
      throw new ConfigurationError(
        'Invalid authentication configuration',
        validation.errors.map(message => ({
          field: 'auth',
          message,
          code: 'required',
        }))
      );
    }
    this.config = config;

    if (config.type === 'jwt') {
      this.jwtManager = new JWTManager(config);
    }
  }

  get method(): AuthConfig['type'] {
    return this.config.type;
  }

  /**
   * Get authentication headers for HTTP requests
   */
  async getAuthHeaders(): Promise<Record<string, string>> {
    switch (this.config.type) {
      case 'client_keys':
        return {
          [CLIENT_KEY_ID_HEADER]: this.config.clientKeyId,
          [CLIENT_ACCESS_KEY_HEADER]: this.config.clientAccessKey,
        };

      case 'access_token':
        return {
          [ACCESS_TOKEN_ID_HEADER]: this.config.accessTokenId,
          [ACCESS_TOKEN_SECRET_HEADER]: this.config.accessTokenSecret,
        };

      case 'jwt': {
        if (!this.jwtManager) {
          throw new AuthenticationError('JWT manager not initialized');
        }
        return { [JWT_HEADER]: await this.jwtManager.getToken() };
      }
    }
  }

  /**
   * Refresh hook invoked by the transports after an authentication failure.
   * Resolves true when new credentials are in place and the request is
   * worth sending again. Key pairs and access tokens are static.
   */
  async refreshAuth(): Promise<boolean> {
    if (this.config.type === 'jwt' && this.jwtManager) {
      return this.jwtManager.refresh();
    }
    return false;
  }

  /**
   * Validate authentication configuration
   */
  static validateConfig(config: AuthConfig): {
    isValid: boolean;
    errors: string[];
  } {
    const errors: string[] = [];

    switch (config.type) {
      case 'client_keys':
        if (!config.clientKeyId) {
          errors.push('Client key id is required');
        }
        if (!config.clientAccessKey) {
          errors.push('Client access key is required');
        }
        break;

      case 'access_token':
        if (!config.accessTokenId) {
          errors.push('Access token id is required');
        }
        if (!config.accessTokenSecret) {
          errors.push('Access token secret is required');
        }
        break;

      case 'jwt':
        if (!config.token) {
          errors.push('JWT is required');
        }
        break;
    }

    return {
      isValid: errors.length === 0,
      errors,
    };
  }
}
