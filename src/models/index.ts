/**
 * Entity model exports
 */

export { Patient, PatientCollection } from './patient';
export { Device, DeviceCollection, DeviceType } from './device';
export { Org, Membership, User } from './user';
export { Project, Cohort, ProjectPatient, CohortPatient, Metric } from './project';
export { Event } from './event';
export type { EventClassification } from './event';
export {
  Dimension,
  StreamType,
  StreamMetadata,
  StreamMetadataCollection,
} from './stream-metadata';
export type { StreamMetadataFilter } from './stream-metadata';
