import type { MimeType, NewObs, Obs, ObsSortKey } from '../types/observation';
import type { PersonTypeMask } from '../utils/personType';

/**
 * Predicates a store query can combine. Absent fields do not filter.
 */
export interface ObsCriteria {
  personId?: number;
  conceptId?: number;
  locationId?: number;
  encounterId?: number;
  obsGroupId?: number;
  valueCodedId?: number;
  /** `undefined` matches voided and non-voided rows alike. */
  voided?: boolean;
  numericOnly?: boolean;
  personType?: PersonTypeMask;
  search?: ObsSearch;
}

/**
 * Exact-match free-text search: `obsId` equality and/or a case-insensitive
 * equality against any of the subject's identifiers.
 */
export interface ObsSearch {
  obsId?: number;
  identifier: string;
}

export interface ObsOrder {
  key: ObsSortKey | 'voidedDate';
  direction: 'asc' | 'desc';
}

export interface ObsQueryOptions {
  orderBy?: ObsOrder[];
  limit?: number;
}

/**
 * Persistence port for observations and mime types.
 *
 * Lookups by id report absence as `null` (or `false` for deletes) so callers
 * can tell "not found" apart from an empty result set.
 */
export interface ObsStore {
  insert(obs: NewObs): Promise<Obs>;

  /**
   * Writes every observation or none of them.
   */
  insertMany(obs: NewObs[]): Promise<Obs[]>;

  nextGroupId(): Promise<number>;

  findById(obsId: number): Promise<Obs | null>;

  update(obs: Obs): Promise<Obs | null>;

  deleteById(obsId: number): Promise<boolean>;

  find(criteria: ObsCriteria, options?: ObsQueryOptions): Promise<Obs[]>;

  distinctValues(criteria: ObsCriteria): Promise<string[]>;

  listMimeTypes(): Promise<MimeType[]>;

  findMimeTypeById(mimeTypeId: number): Promise<MimeType | null>;
}
