/**
 * GraphQL statements used against the metadata API.
 */

const DEVICE_FIELDS = `
  id
  alias
  createdAt
  disabled
  disabledAt
  updatedAt
  deviceType {
    id
    displayName
  }
`;

const PATIENT_FIELDS = `
  id
  codeName
  createdAt
`;

const STREAM_TYPE_FIELDS = `
  id
  name
  description
  shape {
    dimensions {
      identifier
      dataType
      quantityName
      quantityAbbrev
      unitName
      unitAbbrev
    }
  }
`;

const STREAM_FIELDS = `
  id
  createdAt
  algorithm
  deviceId
  patientId
  streamType {
    ${STREAM_TYPE_FIELDS}
  }
  parameters {
    key
    value
  }
  minTime
  maxTime
`;

const METRIC_FIELDS = `
  id
  type
  dataType
  value
  timeInterval
  createdAt
  updatedAt
`;

const PROJECT_FIELDS = `
  id
  title
  status
  description
  type
  createdAt
  updatedAt
  startedAt
  createdBy
  updatedBy
`;

export const FETCH_PATIENT = `
  query fetchPatient($patientId: ID!) {
    patient(id: $patientId) {
      ${PATIENT_FIELDS}
    }
  }
`;

export const LIST_PATIENTS = `
  query listPatients($cursor: Cursor) {
    org {
      patientAccessList(cursor: $cursor) {
        pageInfo {
          endCursor
        }
        patientAccess {
          patient {
            ${PATIENT_FIELDS}
          }
        }
      }
    }
  }
`;

export const LIST_PATIENT_DEVICES = `
  query listPatientDevices($patientId: ID!, $withDisabled: Boolean!, $cursor: Cursor) {
    patient(id: $patientId) {
      deviceList(withDisabled: $withDisabled, cursor: $cursor) {
        devices {
          ${DEVICE_FIELDS}
        }
        pageInfo {
          endCursor
        }
      }
    }
  }
`;

export const WHOAMI_PATIENT = `
  query whoamiPatient {
    patient {
      ${PATIENT_FIELDS}
    }
  }
`;

export const WHOAMI_USER = `
  query whoamiUser {
    user {
      id
      created
      displayName
      email
      username
      defaultMembership {
        id
        created
        org {
          id
          created
          displayName
        }
      }
    }
  }
`;

export const GET_PATIENT_WITH_DEVICES = `
  query getPatient($patientId: ID!, $cursor: Cursor) {
    patient(id: $patientId) {
      ${PATIENT_FIELDS}
      deviceList(cursor: $cursor) {
        pageInfo {
          endCursor
        }
        devices {
          ${DEVICE_FIELDS}
        }
      }
    }
  }
`;

export const GET_ALL_PATIENTS_WITH_DEVICES = `
  query getPatientList($patientCursor: Cursor, $deviceCursor: Cursor) {
    org {
      patientAccessList(cursor: $patientCursor) {
        pageInfo {
          endCursor
        }
        patientAccess {
          patient {
            ${PATIENT_FIELDS}
            deviceList(cursor: $deviceCursor) {
              pageInfo {
                endCursor
              }
              devices {
                ${DEVICE_FIELDS}
              }
            }
          }
        }
      }
    }
  }
`;

export const GET_ORG = `
  query getOrg($orgId: ID) {
    org(orgId: $orgId) {
      id
      created
      displayName
    }
  }
`;

export const GET_ORG_MEMBERSHIPS = `
  query getOrgMemberships($cursor: Cursor) {
    user {
      membershipList(cursor: $cursor) {
        pageInfo {
          endCursor
        }
        memberships {
          id
          created
          org {
            id
            created
            displayName
          }
        }
      }
    }
  }
`;

export const GET_CURRENT_USER = `
  query getUser {
    user {
      id
      created
      displayName
      email
      defaultMembership {
        id
        created
        org {
          id
          created
          displayName
        }
      }
    }
  }
`;

export const GET_PROJECT = `
  query getProject($id: ID) {
    project(id: $id) {
      ${PROJECT_FIELDS}
      cohortList {
        cohorts {
          id
          title
          description
          createdAt
          updatedAt
          createdBy
          updatedBy
        }
      }
    }
  }
`;

export const GET_PROJECTS = `
  query getProjects($cursor: DateTimeUUIDCursor) {
    org {
      id
      projectList(cursor: $cursor) {
        projects {
          ${PROJECT_FIELDS}
        }
        pageInfo {
          endCursor
        }
      }
    }
  }
`;

export const GET_PROJECT_PATIENTS = `
  query getProjectPatients($id: ID, $cursorInput: CursorInput) {
    project(id: $id) {
      projectPatientList(cursorInput: $cursorInput) {
        projectPatients {
          patient {
            id
          }
          metricList {
            metrics {
              ${METRIC_FIELDS}
            }
          }
          codeName
          createdAt
          updatedAt
          createdBy
          updatedBy
        }
        pageInfo {
          codeNameEndCursor
        }
      }
    }
  }
`;

export const GET_COHORT_PATIENTS = `
  query getCohortPatients($id: ID, $cursorInput: CursorInput) {
    cohort(id: $id) {
      id
      cohortPatientList(cursorInput: $cursorInput) {
        cohortPatients {
          patient {
            id
          }
          metricList {
            metrics {
              ${METRIC_FIELDS}
            }
          }
          codeName
          createdAt
          updatedAt
          createdBy
          updatedBy
        }
        pageInfo {
          codeNameEndCursor
        }
      }
    }
  }
`;

export const GET_EVENT_LIST = `
  query getEventList(
    $patientId: ID!,
    $cursor: Cursor,
    $startTime: Float!,
    $endTime: Float!,
    $includeFilters: [EventClassificationFilter]
  ) {
    patient(id: $patientId) {
      eventList(
        startTime: $startTime,
        endTime: $endTime,
        cursor: $cursor,
        includeFilters: $includeFilters
      ) {
        events {
          id
          displayName
          customDetail {
            displayName
          }
          duration {
            startTime
            endTime
            endTimeMax
          }
          payload
          classification {
            namespace
            category
            enum
          }
          tags {
            name
          }
          method
          createdAt
          updatedAt
        }
        pageInfo {
          endCursor
        }
      }
    }
  }
`;

export const GET_STREAM_TYPES = `
  query getStreamTypes {
    streamTypeList {
      streamTypes {
        ${STREAM_TYPE_FIELDS}
      }
    }
  }
`;

export const GET_STREAMS_BY_IDS = `
  query getStreamListByIds($streamIds: [String]) {
    streamListByIds(streamIds: $streamIds) {
      pageInfo {
        endCursor
      }
      streams {
        ${STREAM_FIELDS}
      }
    }
  }
`;

export const GET_STREAM_LIST = `
  query getStreamList($cursor: Cursor, $filters: StreamQueryFilters) {
    streamList(filters: $filters, cursor: $cursor) {
      pageInfo {
        endCursor
      }
      streams {
        ${STREAM_FIELDS}
      }
    }
  }
`;
