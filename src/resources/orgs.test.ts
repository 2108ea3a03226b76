/**
 * Unit tests for the org and user resource functions
 */

import { getOrg, getOrgs } from './orgs';
import { getCurrentUser } from './users';
import { GET_CURRENT_USER, GET_ORG, GET_ORG_MEMBERSHIPS } from '../graph/queries';
import { NotFoundError } from '../errors';
import { FakeMetadataTransport, connection } from '../test/test-utils';

describe('org resources', () => {
  it('should fetch an org by its qualified id', async () => {
    const backend = new FakeMetadataTransport().respondWith({
      org: { id: 'org-o1,org', displayName: 'Test Lab', created: 1600000000 },
    });

    const org = await getOrg('o1', backend);

    expect(org.id).toBe('o1');
    expect(org.displayName).toBe('Test Lab');
    expect(org.createdAt).toBe(1600000000);
    expect(backend.calls).toEqual([{ statement: GET_ORG, variables: { orgId: 'org-o1,org' } }]);
  });

  it('should throw NotFoundError for a missing org', async () => {
    const backend = new FakeMetadataTransport().respondWith({ org: null });

    await expect(getOrg('o9', backend)).rejects.toThrow('org not found: o9');
  });

  it('should list the orgs of every membership page', async () => {
    const backend = new FakeMetadataTransport().respondWith(
      {
        user: {
          membershipList: connection(
            'memberships',
            [{ org: { id: 'org-o1,org', displayName: 'First' } }],
            'c1'
          ),
        },
      },
      {
        user: {
          membershipList: connection('memberships', [
            { org: { id: 'org-o2,org', displayName: 'Second' } },
          ]),
        },
      }
    );

    const orgs = await getOrgs(backend);

    expect(orgs.complete).toBe(true);
    expect(orgs.toArray().map(org => org.displayName)).toEqual(['First', 'Second']);
    expect(backend.callsTo(GET_ORG_MEMBERSHIPS).map(call => call.variables)).toEqual([
      { cursor: null },
      { cursor: 'c1' },
    ]);
  });
});

describe('user resources', () => {
  it('should return the current user with the active org', async () => {
    const backend = new FakeMetadataTransport().route(GET_CURRENT_USER, () => ({
      user: {
        id: 'user-u1',
        displayName: 'Test User',
        defaultMembership: { id: 'membership-m1', org: { id: 'org-o1,org', displayName: 'Lab' } },
      },
    }));

    const user = await getCurrentUser(backend);

    expect(user.id).toBe('u1');
    expect(user.displayName).toBe('Test User');
    expect(user.activeOrg?.displayName).toBe('Lab');
  });

  it('should throw NotFoundError when the credentials have no user', async () => {
    const backend = new FakeMetadataTransport().respondWith({ user: null });

    await expect(getCurrentUser(backend)).rejects.toThrow(NotFoundError);
  });
});
