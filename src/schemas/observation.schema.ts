import { z } from 'zod';
import { OBS_SORT_KEYS } from '../types/observation';

const id = z.number().int().positive();

export const personSchema = z.object({
  personId: id,
  kind: z.enum(['PERSON', 'PATIENT', 'USER']).default('PERSON'),
  identifiers: z.array(z.string().trim().min(1)).default([])
});

export const conceptRefSchema = z.object({
  conceptId: id,
  name: z.string().min(1).optional()
});

export const obsValueSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('coded'), valueCoded: conceptRefSchema }),
  z.object({ type: z.literal('numeric'), valueNumeric: z.number().finite() }),
  z.object({ type: z.literal('text'), valueText: z.string().min(1) }),
  z.object({ type: z.literal('datetime'), valueDatetime: z.coerce.date() }),
  z.object({
    type: z.literal('complex'),
    valueComplex: z.string().min(1),
    mimeType: z.object({ mimeTypeId: id })
  })
]);

/**
 * An observation as a caller submits it. Lifecycle fields are not accepted
 * here; they only change through void/unvoid.
 */
export const obsInputSchema = z.object({
  person: personSchema,
  concept: conceptRefSchema,
  location: z.object({ locationId: id }).optional(),
  encounter: z.object({ encounterId: id }).optional(),
  obsDatetime: z.coerce.date().optional(),
  value: obsValueSchema,
  obsGroupId: id.optional(),
  comment: z.string().optional(),
  accessionNumber: z.string().optional()
});

export const obsUpdateSchema = obsInputSchema.extend({
  obsId: id
});

export const obsGroupSchema = z.array(obsInputSchema).min(1, 'An observation group needs at least one member');

export const voidRequestSchema = z.object({
  reason: z.string().trim().min(1, 'A void reason is required')
});

export const sortKeySchema = z.enum(OBS_SORT_KEYS);

const descriptorSchema = z.object({
  type: z.string().min(1),
  options: z.record(z.string(), z.unknown()).optional()
});

export const aggregateRequestSchema = z.object({
  conceptId: id,
  aggregation: descriptorSchema,
  constraint: descriptorSchema.default({ type: 'none' })
});

export type ObsInput = z.infer<typeof obsInputSchema>;
export type ObsUpdate = z.infer<typeof obsUpdateSchema>;
