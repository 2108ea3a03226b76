/**
 * Unit tests for Config
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Config, DEFAULT_GRAPH_URL, DEFAULT_STREAM_URL } from './config';
import { ConfigurationError } from '../errors';

const clientKeys = { clientKeyId: 'test-key-id', clientAccessKey: 'test-secret' };

describe('Config', () => {
  describe('constructor', () => {
    it('should apply defaults', () => {
      const config = new Config(clientKeys);

      expect(config.graphUrl).toBe(DEFAULT_GRAPH_URL);
      expect(config.streamUrl).toBe(DEFAULT_STREAM_URL);
      expect(config.timeout).toBe(30000);
      expect(config.retryAttempts).toBe(3);
      expect(config.retryDelay).toBe(1000);
      expect(config.userAgent).toBe('runeq-js/1.0.0');
      expect(config.headers).toEqual({});
    });

    it('should trim trailing slashes from base URLs', () => {
      const config = new Config({
        ...clientKeys,
        graphUrl: 'https://graph.example.test/',
        streamUrl: 'https://stream.example.test//',
      });

      expect(config.graphUrl).toBe('https://graph.example.test');
      expect(config.streamUrl).toBe('https://stream.example.test');
    });

    it.each([
      [clientKeys, 'client_keys'],
      [{ accessTokenId: 'test-token-id', accessTokenSecret: 'test-secret' }, 'access_token'],
      [{ jwt: 'test-jwt' }, 'jwt'],
    ])('should infer the auth method from %j', (options, method) => {
      expect(new Config(options).authMethod).toBe(method);
    });

    it('should build the matching auth config', () => {
      expect(new Config(clientKeys).auth).toEqual({
        type: 'client_keys',
        clientKeyId: 'test-key-id',
        clientAccessKey: 'test-secret',
      });
    });

    it('should let an explicit auth method pick among several credentials', () => {
      const config = new Config({ ...clientKeys, jwt: 'test-jwt', authMethod: 'jwt' });

      expect(config.authMethod).toBe('jwt');
      expect(config.auth).toEqual({ type: 'jwt', token: 'test-jwt', refresh: undefined });
    });

    it('should throw ConfigurationError for invalid options', () => {
      expect(() => new Config({ clientKeyId: 'test-key-id' })).toThrow(ConfigurationError);
      expect(() => new Config({ clientKeyId: 'test-key-id' })).toThrow(
        'Invalid client configuration'
      );
    });
  });

  describe('validate', () => {
    it('should accept a complete set of credentials', () => {
      expect(Config.validate(clientKeys)).toEqual({ isValid: true, errors: [] });
    });

    it('should refuse to guess between several credentials', () => {
      const result = Config.validate({ ...clientKeys, jwt: 'test-jwt' });

      expect(result.isValid).toBe(false);
      expect(result.errors).toEqual([
        {
          field: 'authMethod',
          message:
            'Cannot infer auth method: multiple credentials were provided. Specify authMethod to disambiguate.',
          code: 'ambiguous',
        },
      ]);
    });

    it('should require a complete set of credentials', () => {
      const result = Config.validate({ accessTokenId: 'test-token-id' });

      expect(result.errors.map(error => error.message)).toEqual([
        'Cannot infer auth method: a complete set of credentials was not provided.',
      ]);
    });

    it('should require the credentials of an explicit auth method', () => {
      const result = Config.validate({ ...clientKeys, authMethod: 'access_token' });

      expect(result.errors.map(error => error.message)).toEqual([
        'Credentials for auth method "access_token" are not set',
      ]);
    });

    it('should check URLs and ranges', () => {
      const result = Config.validate({
        ...clientKeys,
        graphUrl: 'not a url',
        timeout: 0,
        retryAttempts: 11,
      });

      expect(result.errors.map(error => error.field)).toEqual([
        'graphUrl',
        'timeout',
        'retryAttempts',
      ]);
      expect(result.errors[0]?.message).toBe('graphUrl must be a valid URL');
    });
  });

  describe('optionsFromRecord', () => {
    it('should accept snake_case keys and drop mistyped values', () => {
      const options = Config.optionsFromRecord({
        auth_method: 'client_keys',
        client_key_id: 'test-key-id',
        client_access_key: 'test-secret',
        timeout: 'fast',
        retry_attempts: 5,
        headers: { 'X-Test': '1', 'X-Ignored': 2 },
      });

      expect(options).toMatchObject({
        authMethod: 'client_keys',
        clientKeyId: 'test-key-id',
        clientAccessKey: 'test-secret',
        timeout: undefined,
        retryAttempts: 5,
        headers: { 'X-Test': '1' },
      });
    });

    it('should ignore an unknown auth method', () => {
      expect(Config.optionsFromRecord({ auth_method: 'password' }).authMethod).toBeUndefined();
    });
  });

  describe('fromFile', () => {
    let directory: string;

    beforeEach(() => {
      directory = fs.mkdtempSync(path.join(os.tmpdir(), 'runeq-config-'));
    });

    afterEach(() => {
      fs.rmSync(directory, { recursive: true, force: true });
    });

    function writeConfig(contents: string): string {
      const filename = path.join(directory, 'config');
      fs.writeFileSync(filename, contents);
      return filename;
    }

    it('should load a YAML file', () => {
      const filename = writeConfig(
        [
          'access_token_id: test-token-id',
          'access_token_secret: test-secret',
          'stream_url: https://stream.example.test/',
          'headers:',
          '  X-Test: "1"',
          '',
        ].join('\n')
      );

      const config = Config.fromFile(filename);

      expect(config.authMethod).toBe('access_token');
      expect(config.streamUrl).toBe('https://stream.example.test');
      expect(config.graphUrl).toBe(DEFAULT_GRAPH_URL);
      expect(config.headers).toEqual({ 'X-Test': '1' });
    });

    it('should report a missing file', () => {
      const filename = path.join(directory, 'missing');

      expect(() => Config.fromFile(filename)).toThrow(
        `Unable to read configuration file ${filename}`
      );
    });

    it('should require a mapping', () => {
      const filename = writeConfig('- a\n- b\n');

      expect(() => Config.fromFile(filename)).toThrow(
        `Configuration file ${filename} must contain a mapping`
      );
    });
  });
});
