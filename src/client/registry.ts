/**
 * Process-wide clients
 *
 * `initialize` builds the default metadata client, stream client and
 * session that the resource functions fall back to when no client is
 * passed explicitly.
 */

import { ConfigOptions } from '../types';
import { InitializationError } from '../errors';
import { Config } from '../config/config';
import { ClientOptions, GraphClient } from '../graph/graph-client';
import { StreamClient } from '../stream/stream-client';
import { Session, SessionOptions } from './session';

export interface InitializeOptions extends ClientOptions {
  caching?: SessionOptions['caching'];
}

interface Clients {
  graph: GraphClient;
  stream: StreamClient;
  session: Session;
}

let clients: Clients | null = null;

/**
 * Configure the default clients from options, or from a YAML config file
 * (`~/.rune/config` when neither is given).
 *
 * @throws ConfigurationError when the configuration is invalid
 */
export function initialize(
  source?: ConfigOptions | string,
  options: InitializeOptions = {}
): Session {
  const config =
    source === undefined || typeof source === 'string'
      ? Config.fromFile(source)
      : new Config(source);
  return initializeWithConfig(config, options);
}

export function initializeWithConfig(
  config: Config,
  options: InitializeOptions = {}
): Session {
  const graph = new GraphClient(config, options);
  const stream = new StreamClient(config, options);
  const session = new Session(graph, {
    caching: options.caching,
    authMethod: config.authMethod,
    logger: options.logger,
  });
  clients = { graph, stream, session };
  return session;
}

function requireClients(): Clients {
  if (clients === null) {
    throw new InitializationError();
  }
  return clients;
}

export function defaultSession(): Session {
  return requireClients().session;
}

export function globalGraphClient(): GraphClient {
  return requireClients().graph;
}

export function globalStreamClient(): StreamClient {
  return requireClients().stream;
}

/**
 * Forget the default clients.
 */
export function reset(): void {
  clients = null;
}
