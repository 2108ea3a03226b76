/**
 * Client configuration
 *
 * Base URLs and credentials, from options or from a YAML file. The auth
 * method is inferred from the credentials when it is not given.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { parse as parseYaml } from 'yaml';
import {
  AUTH_METHOD_ACCESS_TOKEN,
  AUTH_METHOD_CLIENT_KEYS,
  AUTH_METHOD_JWT,
  AuthConfig,
  AuthMethod,
  ConfigOptions,
  RawRecord,
  ValidationError,
  ValidationResult,
} from '../types';
import { ConfigurationError } from '../errors';
import { toCamelCase } from '../core/casing';
import { ResponseHandler, isRecord } from '../utils/response-handler';

export const DEFAULT_CONFIG_PATH = '~/.rune/config';
export const DEFAULT_GRAPH_URL = 'https://graph.runelabs.io';
export const DEFAULT_STREAM_URL = 'https://stream.runelabs.io';
export const DEFAULT_TIMEOUT = 30000;

const AUTH_METHODS: readonly AuthMethod[] = [
  AUTH_METHOD_CLIENT_KEYS,
  AUTH_METHOD_ACCESS_TOKEN,
  AUTH_METHOD_JWT,
];

function isAuthMethod(value: unknown): value is AuthMethod {
  return AUTH_METHODS.some(method => method === value);
}

function expandHome(filename: string): string {
  return filename === '~' || filename.startsWith('~/')
    ? path.join(os.homedir(), filename.slice(1))
    : filename;
}

function trimTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

/**
 * Auth methods with a complete set of credentials.
 */
function completeCredentials(options: ConfigOptions): AuthMethod[] {
  const sets: Array<[AuthMethod, Array<string | undefined>]> = [
    [AUTH_METHOD_CLIENT_KEYS, [options.clientKeyId, options.clientAccessKey]],
    [AUTH_METHOD_ACCESS_TOKEN, [options.accessTokenId, options.accessTokenSecret]],
    [AUTH_METHOD_JWT, [options.jwt]],
  ];

  const complete: AuthMethod[] = [];
  for (const [method, values] of sets) {
    if (values.every(value => !!value)) {
      complete.push(method);
    }
  }
  return complete;
}

export class Config {
  readonly authMethod: AuthMethod;
  readonly auth: AuthConfig;
  readonly graphUrl: string;
  readonly streamUrl: string;
  readonly timeout: number;
  readonly retryAttempts: number;
  readonly retryDelay: number;
  readonly userAgent: string;
  readonly headers: Record<string, string>;

  constructor(options: ConfigOptions) {
    const validation = Config.validate(options);
    if (!validation.isValid) {
      throw new ConfigurationError(
        'Invalid client configuration',
        validation.errors
      );
    }

    this.authMethod = Config.resolveAuthMethod(options);
    this.auth = Config.buildAuth(this.authMethod, options);
    this.graphUrl = trimTrailingSlash(options.graphUrl ?? DEFAULT_GRAPH_URL);
    this.streamUrl = trimTrailingSlash(options.streamUrl ?? DEFAULT_STREAM_URL);
    this.timeout = options.timeout ?? DEFAULT_TIMEOUT;
    this.retryAttempts = options.retryAttempts ?? 3;
    this.retryDelay = options.retryDelay ?? 1000;
    this.userAgent = options.userAgent ?? 'runeq-js/1.0.0';
    this.headers = options.headers ?? {};
  }

  /**
   * Load options from a YAML file (default `~/.rune/config`). Keys may be
   * snake_case, as written by the command line tools.
   */
  static fromFile(filename: string = DEFAULT_CONFIG_PATH): Config {
    const resolved = expandHome(filename);
    let text: string;
    try {
      text = fs.readFileSync(resolved, 'utf8');
    } catch (error) {
      throw new ConfigurationError(
        `Unable to read configuration file ${resolved}: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    const parsed: unknown = parseYaml(text);
    if (!isRecord(parsed)) {
      throw new ConfigurationError(
        `Configuration file ${resolved} must contain a mapping`
      );
    }
    return new Config(Config.optionsFromRecord(parsed));
  }

  /**
   * Map a loosely typed record (e.g. parsed YAML) onto options. Values of
   * the wrong type are dropped.
   */
  static optionsFromRecord(record: RawRecord): ConfigOptions {
    const values: RawRecord = {};
    for (const [key, value] of Object.entries(record)) {
      values[toCamelCase(key)] = value;
    }

    const str = (key: string) => ResponseHandler.optionalString(values[key]);
    const num = (key: string) => ResponseHandler.optionalNumber(values[key]);
    const authMethod = values['authMethod'];

    const options: ConfigOptions = {
      authMethod: isAuthMethod(authMethod) ? authMethod : undefined,
      clientKeyId: str('clientKeyId'),
      clientAccessKey: str('clientAccessKey'),
      accessTokenId: str('accessTokenId'),
      accessTokenSecret: str('accessTokenSecret'),
      jwt: str('jwt'),
      graphUrl: str('graphUrl'),
      streamUrl: str('streamUrl'),
      timeout: num('timeout'),
      retryAttempts: num('retryAttempts'),
      retryDelay: num('retryDelay'),
      userAgent: str('userAgent'),
    };

    const headers = values['headers'];
    if (isRecord(headers)) {
      options.headers = {};
      for (const [name, value] of Object.entries(headers)) {
        if (typeof value === 'string') {
          options.headers[name] = value;
        }
      }
    }

    return options;
  }

  private static resolveAuthMethod(options: ConfigOptions): AuthMethod {
    if (options.authMethod) {
      return options.authMethod;
    }
    const complete = completeCredentials(options);
    const [method] = complete;
    if (method === undefined) {
      throw new ConfigurationError(
        'Cannot infer auth method: a complete set of credentials was not provided.'
      );
    }
    return method;
  }

  private static buildAuth(method: AuthMethod, options: ConfigOptions): AuthConfig {
    switch (method) {
      case 'client_keys':
        return {
          type: 'client_keys',
          clientKeyId: options.clientKeyId ?? '',
          clientAccessKey: options.clientAccessKey ?? '',
        };
      case 'access_token':
        return {
          type: 'access_token',
          accessTokenId: options.accessTokenId ?? '',
          accessTokenSecret: options.accessTokenSecret ?? '',
        };
      case 'jwt':
        return {
          type: 'jwt',
          token: options.jwt ?? '',
          refresh: options.refreshJwt,
        };
    }
  }

  /**
   * Validate configuration options
   */
  static validate(options: ConfigOptions): ValidationResult {
    const errors: ValidationError[] = [];

    if (options.authMethod === undefined) {
      const complete = completeCredentials(options);
      if (complete.length > 1) {
        errors.push({
          field: 'authMethod',
          message:
            'Cannot infer auth method: multiple credentials were provided. Specify authMethod to disambiguate.',
          code: 'ambiguous',
        });
      } else if (complete.length === 0) {
        errors.push({
          field: 'authMethod',
          message:
            'Cannot infer auth method: a complete set of credentials was not provided.',
          code: 'required',
        });
      }
    } else if (!isAuthMethod(options.authMethod)) {
      errors.push({
        field: 'authMethod',
        message: `Invalid authMethod "${String(options.authMethod)}": expected one of (${AUTH_METHODS.join(', ')})`,
        code: 'invalid-value',
      });
    } else {
      const complete = completeCredentials(options);
      if (!complete.includes(options.authMethod)) {
        errors.push({
          field: 'authMethod',
          message: `Credentials for auth method "${options.authMethod}" are not set`,
          code: 'required',
        });
      }
    }

    for (const field of ['graphUrl', 'streamUrl'] as const) {
      const url = options[field];
      if (url === undefined) {
        continue;
      }
      try {
        new URL(url);
      } catch {
        errors.push({
          field,
          message: `${field} must be a valid URL`,
          code: 'invalid-url',
        });
      }
    }

    if (
      options.timeout !== undefined &&
      (options.timeout <= 0 || options.timeout > 300000)
    ) {
      errors.push({
        field: 'timeout',
        message: 'Timeout must be between 1 and 300000 milliseconds',
        code: 'invalid-range',
      });
    }

    if (
      options.retryAttempts !== undefined &&
      (options.retryAttempts < 1 || options.retryAttempts > 10)
    ) {
      errors.push({
        field: 'retryAttempts',
        message: 'Retry attempts must be between 1 and 10',
        code: 'invalid-range',
      });
    }

    return {
      isValid: errors.length === 0,
      errors,
    };
  }
}
