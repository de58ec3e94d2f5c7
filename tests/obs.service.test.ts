import { describe, it, expect, beforeEach } from 'vitest';
import type { Obs } from '../src/types/observation';
import { MemoryObsStore } from '../src/repositories/memory-obs.store';
import { AuthorizationError, NotFoundError, PersistenceError, ValidationError } from '../src/utils/errors';
import { PATIENT, USER } from '../src/utils/personType';
import {
  CD4,
  DIAGNOSIS,
  MALARIA,
  WEIGHT,
  admin,
  buildService,
  doctor,
  numeric,
  obsInput,
  patient,
  patientActor,
  plainPerson,
  user
} from './helpers';

const ids = (observations: Obs[]) => observations.map((obs) => obs.obsId);

describe('ObsService', () => {
  describe('createObs', () => {
    it('assigns an id and round-trips every persisted field', async () => {
      const { service } = buildService();

      const created = await service.createObs(obsInput({ comment: 'post-op' }), doctor);
      const fetched = await service.getObs(created.obsId);

      expect(created.obsId).toBe(1);
      expect(fetched).toEqual(created);
      expect(fetched).toMatchObject({
        person: patient,
        concept: WEIGHT,
        value: { type: 'numeric', valueNumeric: 70 },
        obsDatetime: new Date('2024-03-01T09:00:00.000Z'),
        comment: 'post-op',
        voided: false,
        dateCreated: new Date('2024-06-01T12:00:00.000Z'),
        creator: 'doc-1'
      });
    });

    it('defaults obsDatetime to the creation time', async () => {
      const { service } = buildService();

      const created = await service.createObs(obsInput({ obsDatetime: undefined }));

      expect(created.obsDatetime).toEqual(new Date('2024-06-01T12:00:00.000Z'));
    });

    it('rejects an observation without a concept', async () => {
      const { service, store } = buildService();
      const input = obsInput();
      Reflect.deleteProperty(input, 'concept');

      await expect(service.createObs(input)).rejects.toMatchObject({
        name: 'ValidationError',
        issues: [{ field: 'concept', message: 'Required' }]
      });
      expect(await store.find({})).toEqual([]);
    });

    it('rejects an observation without a subject or value', async () => {
      const { service } = buildService();
      const withoutPerson = obsInput();
      Reflect.deleteProperty(withoutPerson, 'person');
      const withoutValue = obsInput();
      Reflect.deleteProperty(withoutValue, 'value');

      await expect(service.createObs(withoutPerson)).rejects.toBeInstanceOf(ValidationError);
      await expect(service.createObs(withoutValue)).rejects.toBeInstanceOf(ValidationError);
    });

    it('rejects a numeric value that is not a finite number', async () => {
      const { service } = buildService();

      await expect(service.createObs(obsInput({ value: numeric(Number.NaN) }))).rejects.toBeInstanceOf(ValidationError);
    });

    it('requires complex values to reference a known mime type', async () => {
      const { service } = buildService();
      const complex = (mimeTypeId: number) =>
        obsInput({ value: { type: 'complex', valueComplex: 'aGVsbG8=', mimeType: { mimeTypeId } } });

      await expect(service.createObs(complex(99))).rejects.toBeInstanceOf(ValidationError);
      const created = await service.createObs(complex(3));
      expect(created.value).toEqual({ type: 'complex', valueComplex: 'aGVsbG8=', mimeType: { mimeTypeId: 3 } });
    });

    it('surfaces store failures as PersistenceError', async () => {
      class BrokenStore extends MemoryObsStore {
        async insertMany(): Promise<Obs[]> {
          throw new Error('disk full');
        }
      }
      const { service } = buildService(new BrokenStore());

      const failure = service.createObs(obsInput());

      await expect(failure).rejects.toBeInstanceOf(PersistenceError);
      await expect(failure).rejects.toThrow('createObs failed: disk full');
    });
  });

  describe('createObsGroup', () => {
    it('stamps one allocated group id on every member', async () => {
      const { service, sink } = buildService();
      await service.createObs(obsInput({ concept: CD4 }));

      const members = await service.createObsGroup(
        [obsInput(), obsInput({ concept: CD4, value: numeric(410) }), obsInput({ value: { type: 'text', valueText: 'fasting' } })],
        doctor
      );

      expect(members.map((obs) => obs.obsGroupId)).toEqual([1, 1, 1]);
      const group = await service.findObsByGroupId(1);
      expect(ids(group).sort()).toEqual([2, 3, 4]);
      expect(group.every((obs) => obs.obsGroupId === 1)).toBe(true);
      expect(sink.events.at(-1)).toMatchObject({ action: 'OBS_GROUP_CREATE', obsIds: [2, 3, 4], details: { obsGroupId: 1 } });
    });

    it('applies a group id carried by one member to all members', async () => {
      const { service } = buildService();

      const members = await service.createObsGroup([obsInput({ obsGroupId: 42 }), obsInput()]);

      expect(members.map((obs) => obs.obsGroupId)).toEqual([42, 42]);
    });

    it('allocates past a group id supplied on a single observation', async () => {
      const { service } = buildService();
      const loose = await service.createObs(obsInput({ obsGroupId: 1 }));

      const members = await service.createObsGroup([obsInput(), obsInput()]);

      expect(members.map((obs) => obs.obsGroupId)).toEqual([2, 2]);
      expect(ids(await service.findObsByGroupId(1))).toEqual([loose.obsId]);
      expect(ids(await service.findObsByGroupId(2))).toEqual([2, 3]);
    });

    it('allocates past a group id supplied by an earlier group', async () => {
      const { service } = buildService();
      await service.createObsGroup([obsInput({ obsGroupId: 1 }), obsInput()]);

      const members = await service.createObsGroup([obsInput(), obsInput()]);

      expect(members.map((obs) => obs.obsGroupId)).toEqual([2, 2]);
      expect(ids(await service.findObsByGroupId(1))).toEqual([1, 2]);
      expect(ids(await service.findObsByGroupId(2))).toEqual([3, 4]);
    });

    it('allocates past a group id set by an update', async () => {
      const { service } = buildService();
      const created = await service.createObs(obsInput());
      await service.updateObs({ ...created, obsGroupId: 5 });

      const members = await service.createObsGroup([obsInput()]);

      expect(members[0].obsGroupId).toBe(6);
    });

    it('rejects an empty group', async () => {
      const { service } = buildService();

      await expect(service.createObsGroup([])).rejects.toBeInstanceOf(ValidationError);
    });

    it('rejects members carrying different group ids and writes nothing', async () => {
      const { service, store } = buildService();

      await expect(
        service.createObsGroup([obsInput({ obsGroupId: 5 }), obsInput({ obsGroupId: 6 })])
      ).rejects.toThrow('Group members carry different group ids');
      expect(await store.find({})).toEqual([]);
    });

    it('leaves no partial group behind when a write fails midway', async () => {
      class FlakyStore extends MemoryObsStore {
        private writes = 0;

        protected writeRow(rows: Map<number, Obs>, row: Obs): void {
          this.writes += 1;
          if (this.writes === 2) {
            throw new Error('connection reset');
          }
          super.writeRow(rows, row);
        }
      }
      const { service, store } = buildService(new FlakyStore());

      await expect(service.createObsGroup([obsInput(), obsInput(), obsInput()])).rejects.toBeInstanceOf(PersistenceError);

      expect(await service.findObsByGroupId(1)).toEqual([]);
      expect(await store.find({})).toEqual([]);
    });
  });

  describe('retrieval', () => {
    it('fails with NotFoundError for an unknown id', async () => {
      const { service } = buildService();

      await expect(service.getObs(7)).rejects.toBeInstanceOf(NotFoundError);
    });

    it('rejects ids that are not positive integers', async () => {
      const { service } = buildService();

      await expect(service.getObs(0)).rejects.toBeInstanceOf(ValidationError);
    });

    it('looks up mime types', async () => {
      const { service } = buildService();

      expect(await service.getMimeTypes()).toEqual([{ mimeTypeId: 3, mimeType: 'image/png' }]);
      expect(await service.getMimeType(3)).toEqual({ mimeTypeId: 3, mimeType: 'image/png' });
      await expect(service.getMimeType(4)).rejects.toThrow('MimeType 4 not found');
    });
  });

  describe('updateObs', () => {
    it('saves edited fields', async () => {
      const { service } = buildService();
      const created = await service.createObs(obsInput());

      const updated = await service.updateObs({ ...created, value: numeric(72), comment: 'rechecked' }, doctor);

      expect(updated.value).toEqual(numeric(72));
      expect(updated.comment).toBe('rechecked');
      expect(await service.getObs(created.obsId)).toEqual(updated);
    });

    it('fails with NotFoundError for an unknown id', async () => {
      const { service } = buildService();

      await expect(service.updateObs({ ...obsInput(), obsId: 99 })).rejects.toBeInstanceOf(NotFoundError);
    });

    it('keeps void state and creation stamps from the stored row', async () => {
      const { service } = buildService();
      const created = await service.createObs(obsInput(), doctor);
      const voided = await service.voidObs(created, 'entered twice', doctor);
      const tampered: Obs = { ...voided, voided: false, creator: 'someone-else' };

      const updated = await service.updateObs(tampered);

      expect(updated.voided).toBe(true);
      expect(updated.voidReason).toBe('entered twice');
      expect(updated.creator).toBe('doc-1');
    });
  });

  describe('voidObs / unvoidObs', () => {
    it('requires a non-empty reason', async () => {
      const { service } = buildService();
      const created = await service.createObs(obsInput());

      await expect(service.voidObs(created, '')).rejects.toBeInstanceOf(ValidationError);
      await expect(service.voidObs(created, '   ')).rejects.toBeInstanceOf(ValidationError);
      expect((await service.getObs(created.obsId)).voided).toBe(false);
    });

    it('records reason, date and actor', async () => {
      const { service } = buildService();
      const created = await service.createObs(obsInput());

      const voided = await service.voidObs(created, 'duplicate entry', doctor);

      expect(voided).toMatchObject({
        voided: true,
        voidReason: 'duplicate entry',
        voidedDate: new Date('2024-06-01T12:01:00.000Z'),
        voidedBy: 'doc-1'
      });
    });

    it('orders voided observations by voided date, newest first', async () => {
      const { service } = buildService();
      const a = await service.createObs(obsInput());
      const b = await service.createObs(obsInput());
      await service.createObs(obsInput());

      await service.voidObs(a, 'wrong patient');
      await service.voidObs(b, 'duplicate entry');
      expect(ids(await service.getVoidedObservations())).toEqual([b.obsId, a.obsId]);

      // voiding again overwrites reason and date
      const revoided = await service.voidObs(a, 'wrong concept');
      expect(revoided.voidReason).toBe('wrong concept');
      expect(ids(await service.getVoidedObservations())).toEqual([a.obsId, b.obsId]);
    });

    it('excludes voided observations from regular queries', async () => {
      const { service } = buildService();
      const a = await service.createObs(obsInput());
      const b = await service.createObs(obsInput());

      await service.voidObs(a, 'error');

      expect(ids(await service.getObservationsByPerson(patient))).toEqual([b.obsId]);
      expect((await service.getObs(a.obsId)).voided).toBe(true);
    });

    it('unvoid restores the observation to its pre-void state', async () => {
      const { service, sink } = buildService();
      const created = await service.createObs(obsInput());
      await service.voidObs(created, 'r', doctor);

      const restored = await service.unvoidObs(created, doctor);

      expect(restored).toEqual(created);
      expect(restored.voided).toBe(false);
      expect(restored.voidReason).toBeUndefined();
      expect(restored.voidedDate).toBeUndefined();
      expect(restored.voidedBy).toBeUndefined();
      expect(sink.actions()).toEqual(['OBS_CREATE', 'OBS_VOID', 'OBS_UNVOID']);
    });

    it('unvoid of a non-voided observation changes nothing', async () => {
      const { service, sink } = buildService();
      const created = await service.createObs(obsInput());

      expect(await service.unvoidObs(created.obsId)).toEqual(created);
      expect(sink.actions()).toEqual(['OBS_CREATE']);
    });
  });

  describe('deleteObs', () => {
    it('removes the row and fails on a second delete', async () => {
      const { service, sink } = buildService();
      const created = await service.createObs(obsInput());
      await service.voidObs(created, 'bad import');

      await service.deleteObs(created, admin);

      await expect(service.getObs(created.obsId)).rejects.toBeInstanceOf(NotFoundError);
      await expect(service.deleteObs(created, admin)).rejects.toBeInstanceOf(NotFoundError);
      expect(sink.events.at(-1)).toMatchObject({ action: 'OBS_DELETE', obsIds: [1], personId: 2 });
    });
  });

  describe('queries', () => {
    let ctx: ReturnType<typeof buildService>;

    beforeEach(async () => {
      ctx = buildService();
      const { service } = ctx;
      // 1: patient weight 3 at location 10, encounter 100
      await service.createObs(obsInput({
        value: numeric(3),
        location: { locationId: 10 },
        encounter: { encounterId: 100 },
        obsDatetime: new Date('2024-01-03T00:00:00.000Z')
      }));
      // 2: plain person weight 1 at location 10
      await service.createObs(obsInput({
        person: plainPerson,
        value: numeric(1),
        location: { locationId: 10 },
        obsDatetime: new Date('2024-01-01T00:00:00.000Z')
      }));
      // 3: user weight 7 at location 20
      await service.createObs(obsInput({
        person: user,
        value: numeric(7),
        location: { locationId: 20 },
        obsDatetime: new Date('2024-01-02T00:00:00.000Z')
      }));
      // 4: patient diagnosis answered with malaria, encounter 100
      await service.createObs(obsInput({
        concept: DIAGNOSIS,
        value: { type: 'coded', valueCoded: MALARIA },
        encounter: { encounterId: 100 },
        obsDatetime: new Date('2024-01-04T00:00:00.000Z')
      }));
      // 5: user diagnosis answered with malaria
      await service.createObs(obsInput({
        person: user,
        concept: DIAGNOSIS,
        value: { type: 'coded', valueCoded: MALARIA },
        obsDatetime: new Date('2024-01-05T00:00:00.000Z')
      }));
    });

    it('sorts numeric answers by value', async () => {
      const answers = await ctx.service.getNumericAnswersForConcept(WEIGHT, true, 0);

      expect(answers).toEqual([
        { obsId: 2, obsDatetime: new Date('2024-01-01T00:00:00.000Z'), valueNumeric: 1 },
        { obsId: 1, obsDatetime: new Date('2024-01-03T00:00:00.000Z'), valueNumeric: 3 },
        { obsId: 3, obsDatetime: new Date('2024-01-02T00:00:00.000Z'), valueNumeric: 7 }
      ]);
    });

    it('sorts numeric answers by observation time when not sorting by value', async () => {
      const answers = await ctx.service.getNumericAnswersForConcept(WEIGHT, false);

      expect(answers.map((answer) => answer.obsId)).toEqual([2, 3, 1]);
    });

    it('applies the person-type mask to numeric answers', async () => {
      const answers = await ctx.service.getNumericAnswersForConcept(WEIGHT, true, PATIENT | USER);

      expect(answers.map((answer) => answer.valueNumeric)).toEqual([3, 7]);
    });

    it('filters by concept and location with a sort key', async () => {
      const { service } = ctx;

      expect(ids(await service.getObservationsByConceptAndLocation(WEIGHT, { locationId: 10 }))).toEqual([1, 2]);
      expect(ids(await service.getObservationsByConceptAndLocation(WEIGHT, { locationId: 10 }, 'obsDatetime'))).toEqual([2, 1]);
      expect(ids(await service.getObservationsByConceptAndLocation(WEIGHT, { locationId: 10 }, null, PATIENT | USER))).toEqual([1]);
    });

    it('filters by concept with a sort key and rejects unknown keys', async () => {
      const { service } = ctx;

      expect(ids(await service.getObservationsByConcept(WEIGHT))).toEqual([1, 2, 3]);
      expect(ids(await service.getObservationsByConcept(WEIGHT, 'valueNumeric'))).toEqual([2, 1, 3]);
      await expect(service.getObservationsByConcept(WEIGHT, 'drop table')).rejects.toBeInstanceOf(ValidationError);
    });

    it('finds observations answered by a concept', async () => {
      const { service } = ctx;

      expect(ids(await service.getObservationsAnsweredByConcept(MALARIA))).toEqual([4, 5]);
      expect(ids(await service.getObservationsAnsweredByConcept(MALARIA, USER))).toEqual([5]);
    });

    it('filters by person, person and concept, and encounter', async () => {
      const { service } = ctx;

      expect(ids(await service.getObservationsByPerson(patient))).toEqual([1, 4]);
      expect(ids(await service.getObservationsByPersonAndConcept(patient, WEIGHT))).toEqual([1]);
      expect(ids(await service.getObservationsByEncounter({ encounterId: 100 }))).toEqual([1, 4]);
    });

    it('returns empty collections for zero matches', async () => {
      const { service } = ctx;

      expect(await service.getObservationsByEncounter({ encounterId: 999 })).toEqual([]);
      expect(await service.getObservationsByConcept(CD4)).toEqual([]);
      expect(await service.getVoidedObservations()).toEqual([]);
      expect(await service.findObsByGroupId(77)).toEqual([]);
    });

    it('returns the last n observations newest first', async () => {
      const { service } = ctx;
      await service.createObs(obsInput({ concept: CD4, value: numeric(200), obsDatetime: new Date('2024-02-01T00:00:00.000Z') }));
      await service.createObs(obsInput({ concept: CD4, value: numeric(350), obsDatetime: new Date('2024-02-03T00:00:00.000Z') }));
      await service.createObs(obsInput({ concept: CD4, value: numeric(300), obsDatetime: new Date('2024-02-02T00:00:00.000Z') }));

      const lastTwo = await service.getLastNObservations(2, patient, CD4);

      expect(lastTwo.map((obs) => obs.value)).toEqual([numeric(350), numeric(300)]);
      expect(await service.getLastNObservations(10, patient, CD4)).toHaveLength(3);
      expect(await service.getLastNObservations(0, patient, CD4)).toEqual([]);
      await expect(service.getLastNObservations(-1, patient, CD4)).rejects.toBeInstanceOf(ValidationError);
    });

    it('searches by obs id or exact subject identifier, ignoring case', async () => {
      const { service } = ctx;

      expect(ids(await service.findObservations('mrn-1001', false))).toEqual([1, 4]);
      expect(ids(await service.findObservations(' ALT-77 ', false))).toEqual([1, 4]);
      expect(ids(await service.findObservations('2', false))).toEqual([2]);
      expect(await service.findObservations('MRN-10', false)).toEqual([]);
      expect(await service.findObservations('   ', false)).toEqual([]);
      expect(await service.findObservations('USR-9', false, PATIENT)).toEqual([]);
    });

    it('includes voided matches in a search only when asked', async () => {
      const { service } = ctx;
      await service.voidObs(1, 'wrong encounter');

      expect(ids(await service.findObservations('MRN-1001', false))).toEqual([4]);
      expect(ids(await service.findObservations('MRN-1001', true))).toEqual([1, 4]);
    });

    it('lists distinct values for a concept', async () => {
      const { service } = ctx;
      await service.createObs(obsInput({ person: user, value: numeric(3) }));

      expect(await service.getDistinctObservationValues(WEIGHT)).toEqual(['1', '3', '7']);
      expect(await service.getDistinctObservationValues(WEIGHT, USER)).toEqual(['3', '7']);
      expect(await service.getDistinctObservationValues(DIAGNOSIS)).toEqual(['123']);
    });
  });

  describe('getAggregatedObservations', () => {
    it('delegates to the evaluator for callers holding View Person', async () => {
      const { service } = buildService();
      await service.createObs(obsInput({ concept: CD4, value: numeric(200), obsDatetime: new Date('2024-02-01T00:00:00.000Z') }));
      await service.createObs(obsInput({ concept: CD4, value: numeric(350), obsDatetime: new Date('2024-02-03T00:00:00.000Z') }));
      await service.createObs(obsInput({ concept: CD4, value: numeric(300), obsDatetime: new Date('2024-02-02T00:00:00.000Z') }));

      const result = await service.getAggregatedObservations(
        doctor,
        patient,
        { type: 'lastN', options: { count: 2 } },
        CD4,
        { type: 'none' }
      );

      expect(ids(result)).toEqual([2, 3]);
    });

    it('refuses callers without View Person', async () => {
      const { service, sink } = buildService();

      await expect(
        service.getAggregatedObservations(patientActor, patient, { type: 'all' }, CD4, { type: 'none' })
      ).rejects.toBeInstanceOf(AuthorizationError);
      expect(sink.events).toHaveLength(1);
      expect(sink.events[0]).toMatchObject({ action: 'OBS_ACCESS_DENIED', personId: 2 });
    });

    it('passes evaluator validation errors through unchanged', async () => {
      const { service } = buildService();

      await expect(
        service.getAggregatedObservations(doctor, patient, { type: 'median' }, CD4, { type: 'none' })
      ).rejects.toBeInstanceOf(ValidationError);
    });
  });
});
