/**
 * Time conversions shared by the session and the stream/event functions.
 * The APIs speak unix seconds (floats).
 */

import { TimeInput } from '../types';

export function toUnixSeconds(time: TimeInput): number {
  return time instanceof Date ? time.getTime() / 1000 : time;
}

export function optionalUnixSeconds(
  time: TimeInput | undefined
): number | undefined {
  return time === undefined ? undefined : toUnixSeconds(time);
}

export function nowInSeconds(): number {
  return Date.now() / 1000;
}
