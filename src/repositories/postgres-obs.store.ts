import { z } from 'zod';
import type { Fragment, Sql } from '../utils/db';
import { timed } from '../utils/apm';
import { PersistenceError } from '../utils/errors';
import type { MimeType, NewObs, Obs, ObsValue } from '../types/observation';
import type { ObsCriteria, ObsOrder, ObsQueryOptions, ObsStore } from './obs.store';

const ORDER_COLUMNS: Record<ObsOrder['key'], string> = {
  obsId: 'o.obs_id',
  obsDatetime: 'o.obs_datetime',
  dateCreated: 'o.date_created',
  personId: 'o.person_id',
  conceptId: 'o.concept_id',
  valueNumeric: 'o.value_numeric',
  voidedDate: 'o.voided_date'
};

const obsRowSchema = z.object({
  obs_id: z.number().int(),
  person_id: z.number().int(),
  person_kind: z.enum(['PERSON', 'PATIENT', 'USER']),
  concept_id: z.number().int(),
  concept_name: z.string().nullable(),
  location_id: z.number().int().nullable(),
  encounter_id: z.number().int().nullable(),
  obs_datetime: z.date(),
  value_type: z.enum(['coded', 'numeric', 'text', 'datetime', 'complex']),
  value_coded: z.number().int().nullable(),
  value_coded_name: z.string().nullable(),
  value_numeric: z.number().nullable(),
  value_text: z.string().nullable(),
  value_datetime: z.date().nullable(),
  value_complex: z.string().nullable(),
  mime_type_id: z.number().int().nullable(),
  obs_group_id: z.number().int().nullable(),
  comment: z.string().nullable(),
  accession_number: z.string().nullable(),
  voided: z.boolean(),
  void_reason: z.string().nullable(),
  voided_date: z.date().nullable(),
  voided_by: z.string().nullable(),
  date_created: z.date(),
  creator: z.string().nullable(),
  identifiers: z.array(z.string())
});

type ObsRow = z.infer<typeof obsRowSchema>;

type ObsWriteRow = {
  person_id: number;
  person_kind: string;
  concept_id: number;
  concept_name: string | null;
  location_id: number | null;
  encounter_id: number | null;
  obs_datetime: Date;
  value_type: string;
  value_coded: number | null;
  value_coded_name: string | null;
  value_numeric: number | null;
  value_text: string | null;
  value_datetime: Date | null;
  value_complex: string | null;
  mime_type_id: number | null;
  obs_group_id: number | null;
  comment: string | null;
  accession_number: string | null;
  voided: boolean;
  void_reason: string | null;
  voided_date: Date | null;
  voided_by: string | null;
  date_created: Date;
  creator: string | null;
};

const toWriteRow = (obs: NewObs): ObsWriteRow => {
  const { value } = obs;
  return {
    person_id: obs.person.personId,
    person_kind: obs.person.kind,
    concept_id: obs.concept.conceptId,
    concept_name: obs.concept.name ?? null,
    location_id: obs.location?.locationId ?? null,
    encounter_id: obs.encounter?.encounterId ?? null,
    obs_datetime: obs.obsDatetime,
    value_type: value.type,
    value_coded: value.type === 'coded' ? value.valueCoded.conceptId : null,
    value_coded_name: value.type === 'coded' ? value.valueCoded.name ?? null : null,
    value_numeric: value.type === 'numeric' ? value.valueNumeric : null,
    value_text: value.type === 'text' ? value.valueText : null,
    value_datetime: value.type === 'datetime' ? value.valueDatetime : null,
    value_complex: value.type === 'complex' ? value.valueComplex : null,
    mime_type_id: value.type === 'complex' ? value.mimeType.mimeTypeId : null,
    obs_group_id: obs.obsGroupId ?? null,
    comment: obs.comment ?? null,
    accession_number: obs.accessionNumber ?? null,
    voided: obs.voided,
    void_reason: obs.voidReason ?? null,
    voided_date: obs.voidedDate ?? null,
    voided_by: obs.voidedBy ?? null,
    date_created: obs.dateCreated,
    creator: obs.creator ?? null
  };
};

const corrupt = (row: ObsRow, column: string): PersistenceError =>
  new PersistenceError(`obs ${row.obs_id} has value_type ${row.value_type} but no ${column}`, undefined);

const toValue = (row: ObsRow): ObsValue => {
  switch (row.value_type) {
    case 'coded':
      if (row.value_coded === null) throw corrupt(row, 'value_coded');
      return {
        type: 'coded',
        valueCoded: { conceptId: row.value_coded, ...(row.value_coded_name ? { name: row.value_coded_name } : {}) }
      };
    case 'numeric':
      if (row.value_numeric === null) throw corrupt(row, 'value_numeric');
      return { type: 'numeric', valueNumeric: row.value_numeric };
    case 'text':
      if (row.value_text === null) throw corrupt(row, 'value_text');
      return { type: 'text', valueText: row.value_text };
    case 'datetime':
      if (row.value_datetime === null) throw corrupt(row, 'value_datetime');
      return { type: 'datetime', valueDatetime: row.value_datetime };
    case 'complex':
      if (row.value_complex === null || row.mime_type_id === null) throw corrupt(row, 'value_complex');
      return { type: 'complex', valueComplex: row.value_complex, mimeType: { mimeTypeId: row.mime_type_id } };
  }
};

const toObs = (raw: unknown): Obs => {
  const row = obsRowSchema.parse(raw);
  const obs: Obs = {
    obsId: row.obs_id,
    person: { personId: row.person_id, kind: row.person_kind, identifiers: row.identifiers },
    concept: { conceptId: row.concept_id, ...(row.concept_name ? { name: row.concept_name } : {}) },
    obsDatetime: row.obs_datetime,
    value: toValue(row),
    voided: row.voided,
    dateCreated: row.date_created
  };
  if (row.location_id !== null) obs.location = { locationId: row.location_id };
  if (row.encounter_id !== null) obs.encounter = { encounterId: row.encounter_id };
  if (row.obs_group_id !== null) obs.obsGroupId = row.obs_group_id;
  if (row.comment !== null) obs.comment = row.comment;
  if (row.accession_number !== null) obs.accessionNumber = row.accession_number;
  if (row.void_reason !== null) obs.voidReason = row.void_reason;
  if (row.voided_date !== null) obs.voidedDate = row.voided_date;
  if (row.voided_by !== null) obs.voidedBy = row.voided_by;
  if (row.creator !== null) obs.creator = row.creator;
  return obs;
};

const mimeTypeRowSchema = z.object({
  mime_type_id: z.number().int(),
  mime_type: z.string(),
  description: z.string().nullable()
});

const toMimeType = (raw: unknown): MimeType => {
  const row = mimeTypeRowSchema.parse(raw);
  return {
    mimeTypeId: row.mime_type_id,
    mimeType: row.mime_type,
    ...(row.description !== null ? { description: row.description } : {})
  };
};

/**
 * Observation store on PostgreSQL through postgres.js.
 *
 * Identifiers are read from `person_identifier`, which belongs to the person
 * subsystem. A batch insert is a single multi-row INSERT, so it commits or
 * fails as a whole.
 */
export class PostgresObsStore implements ObsStore {
  constructor(private readonly sql: Sql) {}

  async insert(obs: NewObs): Promise<Obs> {
    const [created] = await this.insertMany([obs]);
    return created;
  }

  async insertMany(obs: NewObs[]): Promise<Obs[]> {
    const rows = obs.map(toWriteRow);
    const inserted = await timed('obs.insertMany', () =>
      this.sql`INSERT INTO obs ${this.sql(rows)} RETURNING obs_id`
    );
    const ids = inserted.map((row) => z.number().int().parse(row.obs_id));
    return this.select(this.sql`o.obs_id = ANY(${this.sql.array(ids)})`, this.sql`ORDER BY o.obs_id`);
  }

  async nextGroupId(): Promise<number> {
    // Group ids supplied by callers bypass the sequence; allocate above them.
    const [row] = await timed('obs.nextGroupId', () => this.sql`
      SELECT setval(
        'obs_group_id_seq',
        GREATEST(nextval('obs_group_id_seq'), (SELECT COALESCE(MAX(obs_group_id), 0) + 1 FROM obs))
      )::int AS id
    `);
    return z.number().int().parse(row.id);
  }

  async findById(obsId: number): Promise<Obs | null> {
    const [found] = await this.select(this.sql`o.obs_id = ${obsId}`, this.sql``);
    return found ?? null;
  }

  async update(obs: Obs): Promise<Obs | null> {
    const row = toWriteRow(obs);
    const updated = await timed('obs.update', () =>
      this.sql`UPDATE obs SET ${this.sql(row)} WHERE obs_id = ${obs.obsId} RETURNING obs_id`
    );
    if (updated.length === 0) {
      return null;
    }
    return this.findById(obs.obsId);
  }

  async deleteById(obsId: number): Promise<boolean> {
    const deleted = await timed('obs.delete', () =>
      this.sql`DELETE FROM obs WHERE obs_id = ${obsId} RETURNING obs_id`
    );
    return deleted.length > 0;
  }

  async find(criteria: ObsCriteria, options: ObsQueryOptions = {}): Promise<Obs[]> {
    const order = (options.orderBy ?? [])
      .map(({ key, direction }) => `${ORDER_COLUMNS[key]} ${direction === 'asc' ? 'ASC' : 'DESC'} NULLS LAST`)
      .concat('o.obs_id ASC')
      .join(', ');
    const limit = options.limit !== undefined ? this.sql`LIMIT ${options.limit}` : this.sql``;
    return this.select(this.where(criteria), this.sql`ORDER BY ${this.sql.unsafe(order)} ${limit}`);
  }

  async distinctValues(criteria: ObsCriteria): Promise<string[]> {
    const rows = await timed('obs.distinctValues', () => this.sql`
      SELECT DISTINCT
        CASE o.value_type
          WHEN 'coded' THEN o.value_coded::text
          WHEN 'numeric' THEN o.value_numeric::text
          WHEN 'text' THEN o.value_text
          WHEN 'datetime' THEN to_char(o.value_datetime AT TIME ZONE 'UTC', 'YYYY-MM-DD"T"HH24:MI:SS.MS"Z"')
          WHEN 'complex' THEN o.value_complex
        END AS value
      FROM obs o
      WHERE ${this.where(criteria)}
      ORDER BY value
    `);
    return rows.map((row) => z.string().parse(row.value));
  }

  async listMimeTypes(): Promise<MimeType[]> {
    const rows = await timed('mimeType.list', () =>
      this.sql`SELECT mime_type_id, mime_type, description FROM mime_type ORDER BY mime_type_id`
    );
    return rows.map(toMimeType);
  }

  async findMimeTypeById(mimeTypeId: number): Promise<MimeType | null> {
    const [row] = await timed('mimeType.findById', () =>
      this.sql`SELECT mime_type_id, mime_type, description FROM mime_type WHERE mime_type_id = ${mimeTypeId}`
    );
    return row ? toMimeType(row) : null;
  }

  private async select(condition: Fragment, tail: Fragment): Promise<Obs[]> {
    const rows = await timed('obs.select', () => this.sql`
      SELECT o.*,
        COALESCE(
          (SELECT array_agg(pi.identifier ORDER BY pi.identifier)
             FROM person_identifier pi
            WHERE pi.person_id = o.person_id),
          '{}'
        ) AS identifiers
      FROM obs o
      WHERE ${condition}
      ${tail}
    `);
    return rows.map(toObs);
  }

  private where(criteria: ObsCriteria): Fragment {
    const { sql } = this;
    const parts: Fragment[] = [];

    if (criteria.personId !== undefined) parts.push(sql`o.person_id = ${criteria.personId}`);
    if (criteria.conceptId !== undefined) parts.push(sql`o.concept_id = ${criteria.conceptId}`);
    if (criteria.locationId !== undefined) parts.push(sql`o.location_id = ${criteria.locationId}`);
    if (criteria.encounterId !== undefined) parts.push(sql`o.encounter_id = ${criteria.encounterId}`);
    if (criteria.obsGroupId !== undefined) parts.push(sql`o.obs_group_id = ${criteria.obsGroupId}`);
    if (criteria.valueCodedId !== undefined) {
      parts.push(sql`o.value_type = 'coded' AND o.value_coded = ${criteria.valueCodedId}`);
    }
    if (criteria.voided !== undefined) parts.push(sql`o.voided = ${criteria.voided}`);
    if (criteria.numericOnly) parts.push(sql`o.value_type = 'numeric'`);

    // Every subject is a person, so a mask holding PERSON matches all rows.
    const mask = criteria.personType;
    if (mask && !mask.isAny && !mask.has('PERSON')) {
      parts.push(sql`o.person_kind = ANY(${sql.array(mask.kinds())})`);
    }

    if (criteria.search) {
      const { obsId, identifier } = criteria.search;
      const byIdentifier = sql`EXISTS (
        SELECT 1 FROM person_identifier pi
         WHERE pi.person_id = o.person_id AND lower(pi.identifier) = lower(${identifier})
      )`;
      parts.push(obsId !== undefined ? sql`(o.obs_id = ${obsId} OR ${byIdentifier})` : byIdentifier);
    }

    if (parts.length === 0) {
      return sql`TRUE`;
    }
    let result = sql`(${parts[0]})`;
    for (let i = 1; i < parts.length; i++) {
      result = sql`${result} AND (${parts[i]})`;
    }
    return result;
  }
}
