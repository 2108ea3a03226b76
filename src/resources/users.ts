/**
 * Platform users.
 */

import { MetadataTransport } from '../types';
import { NotFoundError } from '../errors';
import { globalGraphClient } from '../client/registry';
import { GET_CURRENT_USER } from '../graph/queries';
import { User } from '../models/user';
import { ResponseHandler } from '../utils/response-handler';

/**
 * The user the configured credentials belong to, with the default
 * membership's org as `activeOrg`.
 *
 * @throws NotFoundError when the credentials do not belong to a user
 */
export async function getCurrentUser(
  client: MetadataTransport = globalGraphClient()
): Promise<User> {
  const data = await client.execute(GET_CURRENT_USER);
  const [user] = ResponseHandler.records([data['user']]);
  if (user === undefined) {
    throw new NotFoundError('no user for the configured credentials');
  }
  return new User(user);
}
