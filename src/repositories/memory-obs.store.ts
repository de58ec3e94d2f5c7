import { valueAsString } from '../types/observation';
import type { MimeType, NewObs, Obs } from '../types/observation';
import type { ObsCriteria, ObsOrder, ObsQueryOptions, ObsStore } from './obs.store';

type SortValue = number | null;

const sortValue = (obs: Obs, key: ObsOrder['key']): SortValue => {
  switch (key) {
    case 'obsId':
      return obs.obsId;
    case 'obsDatetime':
      return obs.obsDatetime.getTime();
    case 'dateCreated':
      return obs.dateCreated.getTime();
    case 'personId':
      return obs.person.personId;
    case 'conceptId':
      return obs.concept.conceptId;
    case 'valueNumeric':
      return obs.value.type === 'numeric' ? obs.value.valueNumeric : null;
    case 'voidedDate':
      return obs.voidedDate ? obs.voidedDate.getTime() : null;
  }
};

// Nulls sort last in either direction, the way PostgreSQL orders ASC NULLS LAST.
export const compareObs = (orderBy: ObsOrder[]) => (a: Obs, b: Obs): number => {
  for (const { key, direction } of orderBy) {
    const left = sortValue(a, key);
    const right = sortValue(b, key);
    if (left === right) continue;
    if (left === null) return 1;
    if (right === null) return -1;
    const diff = left < right ? -1 : 1;
    return direction === 'asc' ? diff : -diff;
  }
  return a.obsId - b.obsId;
};

export const matchesCriteria = (obs: Obs, criteria: ObsCriteria): boolean => {
  if (criteria.personId !== undefined && obs.person.personId !== criteria.personId) return false;
  if (criteria.conceptId !== undefined && obs.concept.conceptId !== criteria.conceptId) return false;
  if (criteria.locationId !== undefined && obs.location?.locationId !== criteria.locationId) return false;
  if (criteria.encounterId !== undefined && obs.encounter?.encounterId !== criteria.encounterId) return false;
  if (criteria.obsGroupId !== undefined && obs.obsGroupId !== criteria.obsGroupId) return false;
  if (criteria.voided !== undefined && obs.voided !== criteria.voided) return false;
  if (criteria.numericOnly && obs.value.type !== 'numeric') return false;
  if (criteria.valueCodedId !== undefined) {
    if (obs.value.type !== 'coded' || obs.value.valueCoded.conceptId !== criteria.valueCodedId) {
      return false;
    }
  }
  if (criteria.personType && !criteria.personType.matches(obs.person)) return false;
  if (criteria.search) {
    const { obsId, identifier } = criteria.search;
    const wanted = identifier.toLowerCase();
    const byId = obsId !== undefined && obs.obsId === obsId;
    const byIdentifier = obs.person.identifiers.some((value) => value.toLowerCase() === wanted);
    if (!byId && !byIdentifier) return false;
  }
  return true;
};

export interface MemoryObsStoreOptions {
  mimeTypes?: MimeType[];
}

/**
 * In-process store. Writes go to a copy of the row map which replaces the live
 * one only when every row of the call has been written, so readers never see
 * part of a batch.
 */
export class MemoryObsStore implements ObsStore {
  private rows = new Map<number, Obs>();
  private lastObsId = 0;
  private lastGroupId = 0;
  private readonly mimeTypes: MimeType[];

  constructor(options: MemoryObsStoreOptions = {}) {
    this.mimeTypes = (options.mimeTypes ?? []).map((mimeType) => ({ ...mimeType }));
  }

  async insert(obs: NewObs): Promise<Obs> {
    const [created] = await this.insertMany([obs]);
    return created;
  }

  async insertMany(obs: NewObs[]): Promise<Obs[]> {
    const staged = new Map(this.rows);
    let nextId = this.lastObsId;
    const created = obs.map((member) => {
      nextId += 1;
      const row: Obs = { ...structuredClone(member), obsId: nextId };
      this.writeRow(staged, row);
      return row;
    });
    this.rows = staged;
    this.lastObsId = nextId;
    this.reserveGroupIds(created);
    return created.map((row) => structuredClone(row));
  }

  /** Never hands out an id already carried by a stored row. */
  async nextGroupId(): Promise<number> {
    this.lastGroupId += 1;
    return this.lastGroupId;
  }

  async findById(obsId: number): Promise<Obs | null> {
    const row = this.rows.get(obsId);
    return row ? structuredClone(row) : null;
  }

  async update(obs: Obs): Promise<Obs | null> {
    if (!this.rows.has(obs.obsId)) {
      return null;
    }
    const staged = new Map(this.rows);
    this.writeRow(staged, structuredClone(obs));
    this.rows = staged;
    this.reserveGroupIds([obs]);
    return structuredClone(obs);
  }

  async deleteById(obsId: number): Promise<boolean> {
    if (!this.rows.has(obsId)) {
      return false;
    }
    const staged = new Map(this.rows);
    staged.delete(obsId);
    this.rows = staged;
    return true;
  }

  async find(criteria: ObsCriteria, options: ObsQueryOptions = {}): Promise<Obs[]> {
    const matched = [...this.rows.values()]
      .filter((obs) => matchesCriteria(obs, criteria))
      .sort(compareObs(options.orderBy ?? []));
    const limited = options.limit === undefined ? matched : matched.slice(0, options.limit);
    return limited.map((row) => structuredClone(row));
  }

  async distinctValues(criteria: ObsCriteria): Promise<string[]> {
    const values = [...this.rows.values()]
      .filter((obs) => matchesCriteria(obs, criteria))
      .map((obs) => valueAsString(obs.value));
    return [...new Set(values)].sort();
  }

  async listMimeTypes(): Promise<MimeType[]> {
    return this.mimeTypes.map((mimeType) => ({ ...mimeType }));
  }

  async findMimeTypeById(mimeTypeId: number): Promise<MimeType | null> {
    const found = this.mimeTypes.find((mimeType) => mimeType.mimeTypeId === mimeTypeId);
    return found ? { ...found } : null;
  }

  // Caller-supplied group ids move the allocator past them.
  private reserveGroupIds(written: Obs[]): void {
    for (const { obsGroupId } of written) {
      if (obsGroupId !== undefined && obsGroupId > this.lastGroupId) {
        this.lastGroupId = obsGroupId;
      }
    }
  }

  protected writeRow(rows: Map<number, Obs>, row: Obs): void {
    rows.set(row.obsId, row);
  }
}
