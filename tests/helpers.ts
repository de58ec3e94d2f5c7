import { ObsService } from '../src/services/obs.service';
import { StoreAggregationEvaluator } from '../src/services/aggregation.service';
import { RolePrivilegeChecker } from '../src/services/privilege.service';
import AuditService, { type AuditEvent, type AuditSink } from '../src/services/audit.service';
import { MemoryObsStore } from '../src/repositories/memory-obs.store';
import type { ObsInput } from '../src/schemas/observation.schema';
import type { Actor, ObsValue, Person } from '../src/types/observation';

export const plainPerson: Person = { personId: 1, kind: 'PERSON', identifiers: ['P-0001'] };
export const patient: Person = { personId: 2, kind: 'PATIENT', identifiers: ['MRN-1001', 'ALT-77'] };
export const user: Person = { personId: 3, kind: 'USER', identifiers: ['USR-9'] };

export const WEIGHT = { conceptId: 5089, name: 'WEIGHT (KG)' };
export const CD4 = { conceptId: 5497, name: 'CD4 COUNT' };
export const DIAGNOSIS = { conceptId: 6042 };
export const MALARIA = { conceptId: 123 };

export const doctor: Actor = { id: 'doc-1', role: 'doctor' };
export const nurse: Actor = { id: 'nurse-1', role: 'nurse' };
export const admin: Actor = { id: 'admin-1', role: 'admin' };
export const patientActor: Actor = { id: 'pat-1', role: 'patient' };

export const numeric = (valueNumeric: number): ObsValue => ({ type: 'numeric', valueNumeric });

export const obsInput = (overrides: Partial<ObsInput> = {}): ObsInput => ({
  person: patient,
  concept: WEIGHT,
  obsDatetime: new Date('2024-03-01T09:00:00.000Z'),
  value: numeric(70),
  ...overrides
});

/**
 * Clock that starts at `start` and moves one minute forward on every call.
 */
export const steppingClock = (start = '2024-06-01T12:00:00.000Z') => {
  let current = new Date(start).getTime();
  return () => {
    const now = new Date(current);
    current += 60_000;
    return now;
  };
};

export class RecordingSink implements AuditSink {
  readonly events: Array<AuditEvent & { timestamp: string }> = [];

  record(event: AuditEvent & { timestamp: string }): void {
    this.events.push(event);
  }

  actions(): string[] {
    return this.events.map((event) => event.action);
  }
}

export const buildService = (store = new MemoryObsStore({ mimeTypes: [{ mimeTypeId: 3, mimeType: 'image/png' }] })) => {
  const sink = new RecordingSink();
  const service = new ObsService({
    store,
    evaluator: new StoreAggregationEvaluator(store),
    privileges: new RolePrivilegeChecker(),
    audit: new AuditService(sink),
    clock: steppingClock()
  });
  return { service, store, sink };
};
