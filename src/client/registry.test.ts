/**
 * Unit tests for the process-wide clients
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  defaultSession,
  globalGraphClient,
  globalStreamClient,
  initialize,
  reset,
} from './registry';
import { InitializationError } from '../errors';
import { GraphClient } from '../graph/graph-client';
import { StreamClient } from '../stream/stream-client';
import { getOrg } from '../resources/orgs';
import { getStreamData } from '../resources/stream';
import { silentLogger } from '../utils/logger';
import { createFakeAdapter } from '../test/test-utils';

const clientKeys = { clientKeyId: 'test-key-id', clientAccessKey: 'test-secret' };

describe('registry', () => {
  afterEach(() => {
    reset();
  });

  it('should refuse to hand out clients before initialization', async () => {
    expect(() => defaultSession()).toThrow(InitializationError);
    expect(() => globalGraphClient()).toThrow(InitializationError);
    expect(() => globalStreamClient()).toThrow(InitializationError);
    expect(() => getStreamData('s1')).toThrow(InitializationError);
    await expect(getOrg('o1')).rejects.toThrow(InitializationError);
  });

  it('should build the default clients from options', () => {
    const session = initialize(clientKeys, { caching: false, logger: silentLogger });

    expect(defaultSession()).toBe(session);
    expect(session.caching).toBe(false);
    expect(globalGraphClient()).toBeInstanceOf(GraphClient);
    expect(globalStreamClient()).toBeInstanceOf(StreamClient);
    expect(globalGraphClient().config.authMethod).toBe('client_keys');
  });

  it('should load options from a config file', () => {
    const directory = fs.mkdtempSync(path.join(os.tmpdir(), 'runeq-registry-'));
    const filename = path.join(directory, 'config');
    fs.writeFileSync(filename, 'jwt: test-jwt\ngraph_url: https://graph.example.test\n');

    try {
      initialize(filename, { logger: silentLogger });

      expect(globalGraphClient().config.authMethod).toBe('jwt');
      expect(globalGraphClient().config.graphUrl).toBe('https://graph.example.test');
      expect(defaultSession().caching).toBe(true);
    } finally {
      fs.rmSync(directory, { recursive: true, force: true });
    }
  });

  it('should serve resource functions through the default client', async () => {
    const { adapter, requests } = createFakeAdapter([
      { status: 200, data: { data: { org: { id: 'org-o1,org', displayName: 'Test Lab' } } } },
    ]);
    initialize(clientKeys, { adapter, logger: silentLogger });

    const org = await getOrg('o1');

    expect(org.id).toBe('o1');
    expect(requests[0]?.baseURL).toBe('https://graph.runelabs.io');
  });

  it('should forget the clients on reset', () => {
    initialize(clientKeys, { logger: silentLogger });

    reset();

    expect(() => defaultSession()).toThrow(InitializationError);
  });
});
