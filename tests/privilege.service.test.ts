import { describe, it, expect } from 'vitest';
import { PRIVILEGES, RolePrivilegeChecker } from '../src/services/privilege.service';
import { admin, doctor, nurse, patientActor } from './helpers';

describe('RolePrivilegeChecker', () => {
  const checker = new RolePrivilegeChecker();

  it('grants clinicians view access to persons', () => {
    expect(checker.hasPrivilege(doctor, PRIVILEGES.VIEW_PERSON)).toBe(true);
    expect(checker.hasPrivilege(nurse, PRIVILEGES.VIEW_PERSON)).toBe(true);
    expect(checker.hasPrivilege(patientActor, PRIVILEGES.VIEW_PERSON)).toBe(false);
  });

  it('reserves purging for the admin role', () => {
    expect(checker.hasPrivilege(admin, PRIVILEGES.PURGE_OBS)).toBe(true);
    expect(checker.hasPrivilege(doctor, PRIVILEGES.PURGE_OBS)).toBe(false);
  });

  it('uses a configured role map instead of the defaults', () => {
    const custom = new RolePrivilegeChecker({ clerk: [PRIVILEGES.VIEW_OBS] });

    expect(custom.hasPrivilege({ id: 'clerk-1', role: 'clerk' }, PRIVILEGES.VIEW_OBS)).toBe(true);
    expect(custom.hasPrivilege(doctor, PRIVILEGES.VIEW_OBS)).toBe(false);
    expect(custom.hasPrivilege(admin, PRIVILEGES.DELETE_OBS)).toBe(true);
  });
});
