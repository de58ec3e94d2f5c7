/**
 * Observation domain types
 *
 * An observation (Obs) is a single recorded clinical fact: one subject, one
 * question concept and one typed value, optionally tied to an encounter, a
 * location and a group of sibling observations.
 */

export type PersonKind = 'PERSON' | 'PATIENT' | 'USER';

export interface Person {
  personId: number;
  kind: PersonKind;
  identifiers: string[];
}

export interface ConceptRef {
  conceptId: number;
  name?: string;
}

export interface LocationRef {
  locationId: number;
}

export interface EncounterRef {
  encounterId: number;
}

export interface MimeType {
  mimeTypeId: number;
  mimeType: string;
  description?: string;
}

export type ObsValue =
  | { type: 'coded'; valueCoded: ConceptRef }
  | { type: 'numeric'; valueNumeric: number }
  | { type: 'text'; valueText: string }
  | { type: 'datetime'; valueDatetime: Date }
  | { type: 'complex'; valueComplex: string; mimeType: Pick<MimeType, 'mimeTypeId'> };

export interface Obs {
  obsId: number;
  person: Person;
  concept: ConceptRef;
  location?: LocationRef;
  encounter?: EncounterRef;
  obsDatetime: Date;
  value: ObsValue;
  obsGroupId?: number;
  comment?: string;
  accessionNumber?: string;

  // Lifecycle
  voided: boolean;
  voidReason?: string;
  voidedDate?: Date;
  voidedBy?: string;

  dateCreated: Date;
  creator?: string;
}

/**
 * An observation that has not been written yet. Storage assigns `obsId`.
 */
export type NewObs = Omit<Obs, 'obsId'>;

/** Row shape returned by numeric answer queries. */
export interface NumericAnswer {
  obsId: number;
  obsDatetime: Date;
  valueNumeric: number;
}

/**
 * Caller identity as established by the transport layer.
 */
export interface Actor {
  id: string;
  role: string;
}

/**
 * Opaque descriptor of how observations are combined. The service never
 * looks inside; it only forwards it to the evaluator.
 */
export interface Aggregation {
  type: string;
  options?: Record<string, unknown>;
}

/**
 * Opaque descriptor of which observations participate in an aggregation.
 */
export interface Constraint {
  type: string;
  options?: Record<string, unknown>;
}

export const OBS_SORT_KEYS = [
  'obsId',
  'obsDatetime',
  'dateCreated',
  'personId',
  'conceptId',
  'valueNumeric'
] as const;

export type ObsSortKey = (typeof OBS_SORT_KEYS)[number];

/**
 * Renders an observation value the way distinct-value queries report it.
 */
export const valueAsString = (value: ObsValue): string => {
  switch (value.type) {
    case 'coded':
      return String(value.valueCoded.conceptId);
    case 'numeric':
      return String(value.valueNumeric);
    case 'text':
      return value.valueText;
    case 'datetime':
      return value.valueDatetime.toISOString();
    case 'complex':
      return value.valueComplex;
  }
};
