import type { Actor } from '../types/observation';

export const PRIVILEGES = {
  VIEW_OBS: 'View Observations',
  ADD_OBS: 'Add Observations',
  EDIT_OBS: 'Edit Observations',
  DELETE_OBS: 'Delete Observations',
  PURGE_OBS: 'Purge Observations',
  VIEW_PERSON: 'View Person'
} as const;

export type Privilege = (typeof PRIVILEGES)[keyof typeof PRIVILEGES];

/**
 * Authorization port: answers whether an actor holds a named privilege.
 */
export interface PrivilegeChecker {
  hasPrivilege(actor: Actor, privilege: Privilege): boolean | Promise<boolean>;
}

export const SUPERUSER_ROLE = 'admin';

export const DEFAULT_ROLE_PRIVILEGES: Record<string, string[]> = {
  doctor: [
    PRIVILEGES.VIEW_OBS,
    PRIVILEGES.ADD_OBS,
    PRIVILEGES.EDIT_OBS,
    PRIVILEGES.DELETE_OBS,
    PRIVILEGES.VIEW_PERSON
  ],
  nurse: [PRIVILEGES.VIEW_OBS, PRIVILEGES.ADD_OBS, PRIVILEGES.EDIT_OBS, PRIVILEGES.VIEW_PERSON],
  patient: []
};

/**
 * Grants privileges by role. The admin role holds every privilege; roles
 * missing from the map hold none.
 */
export class RolePrivilegeChecker implements PrivilegeChecker {
  private readonly grants: Map<string, Set<string>>;

  constructor(rolePrivileges: Record<string, string[]> = DEFAULT_ROLE_PRIVILEGES) {
    this.grants = new Map(
      Object.entries(rolePrivileges).map(([role, privileges]) => [role, new Set(privileges)])
    );
  }

  hasPrivilege(actor: Actor, privilege: Privilege): boolean {
    if (actor.role === SUPERUSER_ROLE) {
      return true;
    }
    return this.grants.get(actor.role)?.has(privilege) ?? false;
  }
}
