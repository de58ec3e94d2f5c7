import type {
  Actor,
  Aggregation,
  ConceptRef,
  Constraint,
  EncounterRef,
  LocationRef,
  MimeType,
  NewObs,
  NumericAnswer,
  Obs,
  Person
} from '../types/observation';
import type { ObsCriteria, ObsOrder, ObsStore } from '../repositories/obs.store';
import type { AggregationEvaluator } from './aggregation.service';
import { PRIVILEGES, type PrivilegeChecker } from './privilege.service';
import AuditService from './audit.service';
import {
  type ObsInput,
  type ObsUpdate,
  obsGroupSchema,
  obsInputSchema,
  obsUpdateSchema,
  sortKeySchema
} from '../schemas/observation.schema';
import { AuthorizationError, NotFoundError, ValidationError, toPersistenceError } from '../utils/errors';
import { PersonTypeMask } from '../utils/personType';
import { parseInput } from '../utils/validation';
import { moduleLogger } from '../utils/logger';

const logger = moduleLogger('obs-service');

export interface ObsServiceDeps {
  store: ObsStore;
  evaluator: AggregationEvaluator;
  privileges: PrivilegeChecker;
  audit?: AuditService;
  clock?: () => Date;
}

/** An observation or its id. */
export type ObsReference = number | Pick<Obs, 'obsId'>;

/** A mask instance, its integer bits, or nothing for "any subject". */
export type PersonTypeArg = PersonTypeMask | number | null | undefined;

const DEFAULT_ORDER: ObsOrder[] = [{ key: 'obsId', direction: 'asc' }];

const toMask = (personType: PersonTypeArg): PersonTypeMask =>
  personType instanceof PersonTypeMask ? personType : PersonTypeMask.fromBits(personType);

const idOf = (ref: ObsReference): number => {
  const obsId = typeof ref === 'number' ? ref : ref.obsId;
  if (!Number.isSafeInteger(obsId) || obsId <= 0) {
    throw new ValidationError('Invalid observation id', [{ field: 'obsId', message: 'must be a positive integer' }]);
  }
  return obsId;
};

const resolveSort = (sort: string | null | undefined): ObsOrder[] => {
  if (sort === null || sort === undefined || sort.trim() === '') {
    return DEFAULT_ORDER;
  }
  const key = parseInput(sortKeySchema, sort.trim(), `Unsupported sort key: ${sort}`);
  return [{ key, direction: 'asc' }];
};

/**
 * Observation lifecycle and query service.
 *
 * Holds no state of its own: persistence, aggregation and authorization are
 * delegated to the injected ports. Voided observations stay in storage and
 * are left out of queries unless a query asks for them.
 */
export class ObsService {
  private readonly store: ObsStore;
  private readonly evaluator: AggregationEvaluator;
  private readonly privileges: PrivilegeChecker;
  private readonly audit: AuditService;
  private readonly clock: () => Date;

  constructor(deps: ObsServiceDeps) {
    this.store = deps.store;
    this.evaluator = deps.evaluator;
    this.privileges = deps.privileges;
    this.audit = deps.audit ?? new AuditService();
    this.clock = deps.clock ?? (() => new Date());
  }

  // ---------------------------------------------------------------------------
  // Creation
  // ---------------------------------------------------------------------------

  async createObs(input: ObsInput, actor?: Actor): Promise<Obs> {
    const parsed = parseInput(obsInputSchema, input, 'Invalid observation');
    await this.assertMimeTypesExist([parsed]);

    const created = await this.withStore('createObs', () => this.store.insert(this.toNewObs(parsed, this.clock(), actor)));

    this.audit.log({ action: 'OBS_CREATE', actor, obsIds: [created.obsId], personId: created.person.personId });
    return created;
  }

  /**
   * Writes every member with one shared group id, allocating one when no
   * member carries it. Either the whole group is stored or nothing is.
   */
  async createObsGroup(inputs: ObsInput[], actor?: Actor): Promise<Obs[]> {
    const members = parseInput(obsGroupSchema, inputs, 'Invalid observation group');

    const suppliedIds = new Set<number>();
    for (const member of members) {
      if (member.obsGroupId !== undefined) suppliedIds.add(member.obsGroupId);
    }
    if (suppliedIds.size > 1) {
      throw new ValidationError('Group members carry different group ids', [
        { field: 'obsGroupId', message: `found ${[...suppliedIds].join(', ')}` }
      ]);
    }
    await this.assertMimeTypesExist(members);

    const obsGroupId =
      suppliedIds.size === 1
        ? [...suppliedIds][0]
        : await this.withStore('allocate group id', () => this.store.nextGroupId());
    const now = this.clock();
    const rows = members.map((member) => ({ ...this.toNewObs(member, now, actor), obsGroupId }));

    const created = await this.withStore('createObsGroup', () => this.store.insertMany(rows));

    logger.debug('Observation group created', { obsGroupId, size: created.length });
    this.audit.log({
      action: 'OBS_GROUP_CREATE',
      actor,
      obsIds: created.map((obs) => obs.obsId),
      details: { obsGroupId }
    });
    return created;
  }

  // ---------------------------------------------------------------------------
  // Retrieval
  // ---------------------------------------------------------------------------

  /** Returns the observation whether or not it is voided. */
  async getObs(ref: ObsReference): Promise<Obs> {
    return this.requireObs(idOf(ref));
  }

  async getMimeTypes(): Promise<MimeType[]> {
    return this.withStore('getMimeTypes', () => this.store.listMimeTypes());
  }

  async getMimeType(mimeTypeId: number): Promise<MimeType> {
    const found = await this.withStore('getMimeType', () => this.store.findMimeTypeById(mimeTypeId));
    if (!found) {
      throw new NotFoundError('MimeType', mimeTypeId);
    }
    return found;
  }

  // ---------------------------------------------------------------------------
  // Mutation
  // ---------------------------------------------------------------------------

  /**
   * Saves caller-editable fields. Void state and creation stamps are kept
   * from the stored row.
   */
  async updateObs(input: ObsUpdate, actor?: Actor): Promise<Obs> {
    const parsed = parseInput(obsUpdateSchema, input, 'Invalid observation');
    const existing = await this.requireObs(parsed.obsId);
    await this.assertMimeTypesExist([parsed]);

    const next: Obs = {
      obsId: existing.obsId,
      person: parsed.person,
      concept: parsed.concept,
      location: parsed.location,
      encounter: parsed.encounter,
      obsDatetime: parsed.obsDatetime ?? existing.obsDatetime,
      value: parsed.value,
      obsGroupId: parsed.obsGroupId,
      comment: parsed.comment,
      accessionNumber: parsed.accessionNumber,
      voided: existing.voided,
      voidReason: existing.voidReason,
      voidedDate: existing.voidedDate,
      voidedBy: existing.voidedBy,
      dateCreated: existing.dateCreated,
      creator: existing.creator
    };

    const updated = await this.withStore('updateObs', () => this.store.update(next));
    if (!updated) {
      throw new NotFoundError('Obs', parsed.obsId);
    }

    this.audit.log({ action: 'OBS_UPDATE', actor, obsIds: [updated.obsId], personId: updated.person.personId });
    return updated;
  }

  /**
   * Soft-deletes an observation. Voiding an already voided observation
   * replaces its reason and date.
   */
  async voidObs(ref: ObsReference, reason: string, actor?: Actor): Promise<Obs> {
    const trimmed = typeof reason === 'string' ? reason.trim() : '';
    if (trimmed === '') {
      throw new ValidationError('A void reason is required', [{ field: 'reason', message: 'must not be empty' }]);
    }
    const existing = await this.requireObs(idOf(ref));

    const next: Obs = {
      ...existing,
      voided: true,
      voidReason: trimmed,
      voidedDate: this.clock(),
      voidedBy: actor?.id
    };
    const voided = await this.saveLifecycle('voidObs', next);

    this.audit.log({
      action: 'OBS_VOID',
      actor,
      obsIds: [voided.obsId],
      personId: voided.person.personId,
      reason: trimmed,
      details: { wasVoided: existing.voided }
    });
    return voided;
  }

  async unvoidObs(ref: ObsReference, actor?: Actor): Promise<Obs> {
    const existing = await this.requireObs(idOf(ref));
    if (!existing.voided) {
      return existing;
    }

    const { voidReason, voidedDate, voidedBy, ...rest } = existing;
    const restored = await this.saveLifecycle('unvoidObs', { ...rest, voided: false });

    this.audit.log({
      action: 'OBS_UNVOID',
      actor,
      obsIds: [restored.obsId],
      personId: restored.person.personId,
      details: { previousReason: voidReason, voidedDate: voidedDate?.toISOString(), voidedBy }
    });
    return restored;
  }

  /**
   * Physically removes an observation, bypassing the audit trail that
   * voiding keeps. Reserved for administrative correction; use `voidObs`
   * everywhere else.
   */
  async deleteObs(ref: ObsReference, actor?: Actor): Promise<void> {
    const obsId = idOf(ref);
    const existing = await this.requireObs(obsId);

    const removed = await this.withStore('deleteObs', () => this.store.deleteById(obsId));
    if (!removed) {
      throw new NotFoundError('Obs', obsId);
    }

    this.audit.log({
      action: 'OBS_DELETE',
      actor,
      obsIds: [obsId],
      personId: existing.person.personId,
      details: { conceptId: existing.concept.conceptId, voided: existing.voided }
    });
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  async getObservationsByPerson(person: Pick<Person, 'personId'>): Promise<Obs[]> {
    return this.query('getObservationsByPerson', { personId: person.personId, voided: false });
  }

  async getObservationsByConceptAndLocation(
    concept: ConceptRef,
    location: LocationRef,
    sort?: string | null,
    personType?: PersonTypeArg
  ): Promise<Obs[]> {
    return this.query(
      'getObservationsByConceptAndLocation',
      {
        conceptId: concept.conceptId,
        locationId: location.locationId,
        voided: false,
        personType: toMask(personType)
      },
      resolveSort(sort)
    );
  }

  async getObservationsByPersonAndConcept(person: Pick<Person, 'personId'>, concept: ConceptRef): Promise<Obs[]> {
    return this.query('getObservationsByPersonAndConcept', {
      personId: person.personId,
      conceptId: concept.conceptId,
      voided: false
    });
  }

  /** Most recent first; at most `n` observations. */
  async getLastNObservations(n: number, person: Pick<Person, 'personId'>, concept: ConceptRef): Promise<Obs[]> {
    if (!Number.isInteger(n) || n < 0) {
      throw new ValidationError('Invalid observation count', [{ field: 'n', message: 'must be a non-negative integer' }]);
    }
    if (n === 0) {
      return [];
    }
    return this.withStore('getLastNObservations', () =>
      this.store.find(
        { personId: person.personId, conceptId: concept.conceptId, voided: false },
        {
          orderBy: [
            { key: 'obsDatetime', direction: 'desc' },
            { key: 'obsId', direction: 'desc' }
          ],
          limit: n
        }
      )
    );
  }

  async getObservationsByConcept(concept: ConceptRef, sort?: string | null, personType?: PersonTypeArg): Promise<Obs[]> {
    return this.query(
      'getObservationsByConcept',
      { conceptId: concept.conceptId, voided: false, personType: toMask(personType) },
      resolveSort(sort)
    );
  }

  /** Observations whose coded answer is `answer`. */
  async getObservationsAnsweredByConcept(answer: ConceptRef, personType?: PersonTypeArg): Promise<Obs[]> {
    return this.query('getObservationsAnsweredByConcept', {
      valueCodedId: answer.conceptId,
      voided: false,
      personType: toMask(personType)
    });
  }

  async getNumericAnswersForConcept(
    concept: ConceptRef,
    sortByValue: boolean,
    personType?: PersonTypeArg
  ): Promise<NumericAnswer[]> {
    const orderBy: ObsOrder[] = sortByValue
      ? [{ key: 'valueNumeric', direction: 'asc' }]
      : [{ key: 'obsDatetime', direction: 'asc' }];
    const rows = await this.query(
      'getNumericAnswersForConcept',
      { conceptId: concept.conceptId, numericOnly: true, voided: false, personType: toMask(personType) },
      orderBy
    );
    return rows.flatMap((obs) =>
      obs.value.type === 'numeric'
        ? [{ obsId: obs.obsId, obsDatetime: obs.obsDatetime, valueNumeric: obs.value.valueNumeric }]
        : []
    );
  }

  async getObservationsByEncounter(encounter: EncounterRef): Promise<Obs[]> {
    return this.query('getObservationsByEncounter', { encounterId: encounter.encounterId, voided: false });
  }

  /** Voided observations, most recently voided first. */
  async getVoidedObservations(): Promise<Obs[]> {
    return this.query('getVoidedObservations', { voided: true }, [{ key: 'voidedDate', direction: 'desc' }]);
  }

  /**
   * Exact-match search. A string of digits matches that observation id; any
   * search also matches subjects holding an identifier equal to it, ignoring
   * case.
   */
  async findObservations(search: string, includeVoided: boolean, personType?: PersonTypeArg): Promise<Obs[]> {
    const term = search.trim();
    if (term === '') {
      return [];
    }
    const asId = /^\d+$/.test(term) ? Number(term) : undefined;
    const obsId = asId !== undefined && Number.isSafeInteger(asId) ? asId : undefined;

    return this.query('findObservations', {
      search: { obsId, identifier: term },
      voided: includeVoided ? undefined : false,
      personType: toMask(personType)
    });
  }

  async getDistinctObservationValues(concept: ConceptRef, personType?: PersonTypeArg): Promise<string[]> {
    const criteria: ObsCriteria = { conceptId: concept.conceptId, voided: false, personType: toMask(personType) };
    return this.withStore('getDistinctObservationValues', () => this.store.distinctValues(criteria));
  }

  /** Every member of the group, voided members included. */
  async findObsByGroupId(obsGroupId: number): Promise<Obs[]> {
    if (!Number.isSafeInteger(obsGroupId) || obsGroupId <= 0) {
      throw new ValidationError('Invalid group id', [{ field: 'obsGroupId', message: 'must be a positive integer' }]);
    }
    return this.query('findObsByGroupId', { obsGroupId });
  }

  /**
   * Observations of `person` for `concept` reduced by the evaluator. The
   * caller must hold the View Person privilege.
   */
  async getAggregatedObservations(
    actor: Actor,
    person: Pick<Person, 'personId'>,
    aggregation: Aggregation,
    concept: ConceptRef,
    constraint: Constraint
  ): Promise<Obs[]> {
    const allowed = await this.privileges.hasPrivilege(actor, PRIVILEGES.VIEW_PERSON);
    if (!allowed) {
      this.audit.log({
        action: 'OBS_ACCESS_DENIED',
        actor,
        obsIds: [],
        personId: person.personId,
        details: { privilege: PRIVILEGES.VIEW_PERSON }
      });
      throw new AuthorizationError(PRIVILEGES.VIEW_PERSON);
    }

    return this.withStore('getAggregatedObservations', () =>
      this.evaluator.evaluate({ person, concept, aggregation, constraint })
    );
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private toNewObs(input: ObsInput, now: Date, actor?: Actor): NewObs {
    return {
      person: input.person,
      concept: input.concept,
      location: input.location,
      encounter: input.encounter,
      obsDatetime: input.obsDatetime ?? now,
      value: input.value,
      obsGroupId: input.obsGroupId,
      comment: input.comment,
      accessionNumber: input.accessionNumber,
      voided: false,
      dateCreated: now,
      creator: actor?.id
    };
  }

  private async requireObs(obsId: number): Promise<Obs> {
    const found = await this.withStore('getObs', () => this.store.findById(obsId));
    if (!found) {
      throw new NotFoundError('Obs', obsId);
    }
    return found;
  }

  private async saveLifecycle(operation: string, next: Obs): Promise<Obs> {
    const saved = await this.withStore(operation, () => this.store.update(next));
    if (!saved) {
      throw new NotFoundError('Obs', next.obsId);
    }
    return saved;
  }

  private async assertMimeTypesExist(inputs: Array<Pick<ObsInput, 'value'>>): Promise<void> {
    const ids = new Set<number>();
    for (const { value } of inputs) {
      if (value.type === 'complex') ids.add(value.mimeType.mimeTypeId);
    }
    for (const mimeTypeId of ids) {
      const found = await this.withStore('getMimeType', () => this.store.findMimeTypeById(mimeTypeId));
      if (!found) {
        throw new ValidationError('Unknown mime type for complex value', [
          { field: 'value.mimeType.mimeTypeId', message: `mime type ${mimeTypeId} does not exist` }
        ]);
      }
    }
  }

  private async query(operation: string, criteria: ObsCriteria, orderBy: ObsOrder[] = DEFAULT_ORDER): Promise<Obs[]> {
    return this.withStore(operation, () => this.store.find(criteria, { orderBy }));
  }

  private async withStore<T>(operation: string, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (error) {
      const wrapped = toPersistenceError(operation, error);
      if (wrapped !== error) {
        logger.error('Observation store failure', { operation, error });
      }
      throw wrapped;
    }
  }
}

export default ObsService;
