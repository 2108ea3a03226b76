/**
 * Organizations, users and the memberships tying them together.
 */

import { Entity, RelationMap } from '../core/entity';
import { ResourceId } from '../core/resource-id';

export class Org extends Entity {
  static readonly resource: string = 'org';

  get displayName(): string | undefined {
    return this.optionalString('displayName');
  }

  /**
   * Absolute org key as the metadata API expects it (`org-<id>,org`).
   */
  static qualify(id: string): string {
    const principal = id.includes('-') ? id : `org-${id}`;
    return principal.includes(',') ? principal : `${principal},org`;
  }

  static override identify(rawId: string): ResourceId {
    return ResourceId.parse(Org.qualify(rawId));
  }
}

export class Membership extends Entity {
  static readonly resource: string = 'membership';
  static readonly relations: RelationMap = Object.freeze({ org: Org });

  get org(): Org | undefined {
    const org = this.has('org') ? this.get('org') : undefined;
    return org instanceof Org ? org : undefined;
  }
}

export class User extends Entity {
  static readonly resource: string = 'user';
  static readonly relations: RelationMap = Object.freeze({
    defaultMembership: Membership,
  });

  get displayName(): string | undefined {
    return this.optionalString('displayName');
  }

  get email(): string | undefined {
    return this.optionalString('email');
  }

  get defaultMembership(): Membership | undefined {
    const membership = this.has('defaultMembership')
      ? this.get('defaultMembership')
      : undefined;
    return membership instanceof Membership ? membership : undefined;
  }

  /**
   * The org the user acts in by default.
   */
  get activeOrg(): Org | undefined {
    return this.defaultMembership?.org;
  }
}
