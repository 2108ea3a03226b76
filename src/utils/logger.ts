/**
 * Logging
 *
 * Components take any object with the four console methods; the console
 * itself is the default.
 */

import { Logger } from '../types';

export const defaultLogger: Logger = console;

const noop = (): void => undefined;

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};
