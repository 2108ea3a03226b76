/**
 * Organizations: research labs, clinical sites and the like.
 */

import { MetadataTransport } from '../types';
import { EntityCollection } from '../core/collection';
import { collectCursor } from '../core/paginator';
import { NotFoundError } from '../errors';
import { globalGraphClient } from '../client/registry';
import { GET_ORG, GET_ORG_MEMBERSHIPS } from '../graph/queries';
import { Org } from '../models/user';
import { ResponseHandler } from '../utils/response-handler';

/**
 * @throws NotFoundError when the API has no such org
 */
export async function getOrg(
  orgId: string,
  client: MetadataTransport = globalGraphClient()
): Promise<Org> {
  const data = await client.execute(GET_ORG, { orgId: Org.qualify(orgId) });
  const [org] = ResponseHandler.records([data['org']]);
  if (org === undefined) {
    throw new NotFoundError(`org not found: ${orgId}`);
  }
  return new Org(org);
}

/**
 * Every org the current user is a member of.
 */
export async function getOrgs(
  client: MetadataTransport = globalGraphClient()
): Promise<EntityCollection<Org>> {
  const records = await collectCursor(async cursor => {
    const data = await client.execute(GET_ORG_MEMBERSHIPS, { cursor });
    const connection = ResponseHandler.path(data, 'user', 'membershipList');
    return {
      items: ResponseHandler.records(connection['memberships']).map(membership =>
        ResponseHandler.record(membership['org'])
      ),
      endCursor: ResponseHandler.endCursor(connection),
    };
  });

  const orgs = new EntityCollection(Org, records.map(record => new Org(record)));
  orgs.markComplete();
  return orgs;
}
