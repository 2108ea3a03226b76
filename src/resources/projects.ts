/**
 * Projects, their cohorts, and the patients enrolled in each.
 */

import { MetadataTransport, RawRecord } from '../types';
import { EntityCollection } from '../core/collection';
import { collectCursor } from '../core/paginator';
import { NotFoundError } from '../errors';
import { globalGraphClient } from '../client/registry';
import {
  GET_COHORT_PATIENTS,
  GET_PROJECT,
  GET_PROJECT_PATIENTS,
  GET_PROJECTS,
} from '../graph/queries';
import { CohortPatient, Project, ProjectPatient } from '../models/project';
import { ResponseHandler } from '../utils/response-handler';

/**
 * Flatten a project record: `cohortList.cohorts` becomes `cohorts`.
 */
function projectAttributes(record: RawRecord): RawRecord {
  const attributes = { ...record };
  if ('cohortList' in attributes) {
    attributes['cohorts'] = ResponseHandler.records(
      ResponseHandler.record(attributes['cohortList'])['cohorts']
    );
    delete attributes['cohortList'];
  }
  return attributes;
}

/**
 * Flatten an enrollment record: the patient's id moves to the top level and
 * `metricList.metrics` becomes `metrics`.
 */
function enrollmentAttributes(record: RawRecord): RawRecord {
  const attributes = { ...record };
  attributes['id'] = ResponseHandler.record(record['patient'])['id'];
  attributes['metrics'] = ResponseHandler.records(
    ResponseHandler.record(record['metricList'])['metrics']
  );
  delete attributes['patient'];
  delete attributes['metricList'];
  return attributes;
}

/**
 * @throws NotFoundError when the API has no such project
 */
export async function getProject(
  projectId: string,
  client: MetadataTransport = globalGraphClient()
): Promise<Project> {
  const data = await client.execute(GET_PROJECT, { id: projectId });
  const [project] = ResponseHandler.records([data['project']]);
  if (project === undefined) {
    throw new NotFoundError(`project not found: ${projectId}`);
  }
  return new Project(projectAttributes(project));
}

/**
 * Every project the current user has access to.
 */
export async function getProjects(
  client: MetadataTransport = globalGraphClient()
): Promise<EntityCollection<Project>> {
  const records = await collectCursor(async cursor => {
    const data = await client.execute(GET_PROJECTS, { cursor });
    const connection = ResponseHandler.path(data, 'org', 'projectList');
    return {
      items: ResponseHandler.records(connection['projects']),
      endCursor: ResponseHandler.endCursor(connection),
    };
  });

  const projects = new EntityCollection(
    Project,
    records.map(record => new Project(projectAttributes(record)))
  );
  projects.markComplete();
  return projects;
}

/**
 * Enrollment lists page on code names: the next request carries
 * `cursorInput.codeNameCursor`.
 */
async function collectEnrollments(
  client: MetadataTransport,
  statement: string,
  id: string,
  root: 'project' | 'cohort'
): Promise<RawRecord[]> {
  const listField = root === 'project' ? 'projectPatientList' : 'cohortPatientList';
  const itemsField = root === 'project' ? 'projectPatients' : 'cohortPatients';

  return collectCursor(async cursor => {
    const data = await client.execute(statement, {
      id,
      cursorInput: cursor === null ? null : { codeNameCursor: cursor },
    });
    const connection = ResponseHandler.path(data, root, listField);
    return {
      items: ResponseHandler.records(connection[itemsField]).map(enrollmentAttributes),
      endCursor: ResponseHandler.endCursor(connection, 'codeNameEndCursor'),
    };
  });
}

/**
 * Patients of a project, each with its data availability metrics.
 */
export async function getProjectPatients(
  projectId: string,
  client: MetadataTransport = globalGraphClient()
): Promise<EntityCollection<ProjectPatient>> {
  const records = await collectEnrollments(client, GET_PROJECT_PATIENTS, projectId, 'project');
  const patients = new EntityCollection(
    ProjectPatient,
    records.map(record => new ProjectPatient(record))
  );
  patients.markComplete();
  return patients;
}

export async function getCohortPatients(
  cohortId: string,
  client: MetadataTransport = globalGraphClient()
): Promise<EntityCollection<CohortPatient>> {
  const records = await collectEnrollments(client, GET_COHORT_PATIENTS, cohortId, 'cohort');
  const patients = new EntityCollection(
    CohortPatient,
    records.map(record => new CohortPatient(record))
  );
  patients.markComplete();
  return patients;
}
