/**
 * Query client exports
 */

export { Session } from './session';
export type { SessionOptions } from './session';
export { PatientQuery } from './patient-query';
export { DeviceQuery } from './device-query';
export {
  initialize,
  initializeWithConfig,
  defaultSession,
  globalGraphClient,
  globalStreamClient,
  reset,
} from './registry';
export type { InitializeOptions } from './registry';
