/**
 * Resource functions: each call fetches its full result from the API.
 */

export {
  getPatient,
  getAllPatients,
  getDevice,
  getPatientDevices,
  getAllDevices,
} from './patients';
export { getOrg, getOrgs } from './orgs';
export { getCurrentUser } from './users';
export {
  getProject,
  getProjects,
  getProjectPatients,
  getCohortPatients,
} from './projects';
export {
  MAX_QUERY_RANGE_SECS,
  getPatientEvents,
  getPatientActivityEvents,
  getPatientMedicationEvents,
  getPatientSymptomEvents,
  getPatientWellbeingEvents,
} from './events';
export type { EventClassificationFilter, EventQueryOptions } from './events';
export {
  getAllStreamTypes,
  getStreamMetadata,
  getPatientStreamMetadata,
} from './stream-metadata';
export type { PatientStreamFilters } from './stream-metadata';
export {
  getStreamData,
  getStreamAvailability,
  getStreamDailyAggregate,
  getStreamAggregateWindow,
} from './stream';
export type {
  StreamAvailabilityOptions,
  StreamDataOptions,
  TimestampFormat,
} from './stream';
