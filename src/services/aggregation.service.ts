import { z } from 'zod';
import type { Aggregation, ConceptRef, Constraint, Obs, Person } from '../types/observation';
import type { ObsStore } from '../repositories/obs.store';
import { parseInput } from '../utils/validation';

export interface EvaluationRequest {
  person: Pick<Person, 'personId'>;
  concept: ConceptRef;
  aggregation: Aggregation;
  constraint: Constraint;
}

/**
 * Evaluator port: reduces a subject's observations for one concept according
 * to caller-supplied aggregation and constraint descriptors.
 */
export interface AggregationEvaluator {
  evaluate(request: EvaluationRequest): Promise<Obs[]>;
}

const constraintSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('none'), options: z.object({}).passthrough().optional() }),
  z.object({
    type: z.literal('dateRange'),
    options: z
      .object({
        from: z.coerce.date().optional(),
        to: z.coerce.date().optional()
      })
      .default({})
  }),
  z.object({
    type: z.literal('numericRange'),
    options: z
      .object({
        min: z.number().finite().optional(),
        max: z.number().finite().optional()
      })
      .default({})
  })
]);

const aggregationSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('all') }),
  z.object({ type: z.literal('first') }),
  z.object({ type: z.literal('last') }),
  z.object({ type: z.literal('min') }),
  z.object({ type: z.literal('max') }),
  z.object({
    type: z.literal('lastN'),
    options: z.object({ count: z.number().int().min(0) })
  })
]);

type ParsedConstraint = z.infer<typeof constraintSchema>;
type ParsedAggregation = z.infer<typeof aggregationSchema>;

const numericValue = (obs: Obs): number | undefined =>
  obs.value.type === 'numeric' ? obs.value.valueNumeric : undefined;

const applyConstraint = (candidates: Obs[], constraint: ParsedConstraint): Obs[] => {
  switch (constraint.type) {
    case 'none':
      return candidates;
    case 'dateRange': {
      const { from, to } = constraint.options;
      return candidates.filter(
        (obs) => (!from || obs.obsDatetime >= from) && (!to || obs.obsDatetime <= to)
      );
    }
    case 'numericRange': {
      const { min, max } = constraint.options;
      return candidates.filter((obs) => {
        const value = numericValue(obs);
        return value !== undefined && (min === undefined || value >= min) && (max === undefined || value <= max);
      });
    }
  }
};

const extreme = (candidates: Obs[], pick: 'min' | 'max'): Obs[] => {
  let best: { obs: Obs; value: number } | undefined;
  for (const obs of candidates) {
    const value = numericValue(obs);
    if (value === undefined) continue;
    if (!best || (pick === 'min' ? value < best.value : value > best.value)) {
      best = { obs, value };
    }
  }
  return best ? [best.obs] : [];
};

// Candidates arrive oldest first.
const applyAggregation = (candidates: Obs[], aggregation: ParsedAggregation): Obs[] => {
  switch (aggregation.type) {
    case 'all':
      return candidates;
    case 'first':
      return candidates.slice(0, 1);
    case 'last':
      return candidates.slice(-1);
    case 'lastN':
      return aggregation.options.count === 0 ? [] : candidates.slice(-aggregation.options.count).reverse();
    case 'min':
    case 'max':
      return extreme(candidates, aggregation.type);
  }
};

/**
 * Evaluates descriptors against the observation store: non-voided
 * observations of the subject for the concept, constrained then aggregated.
 */
export class StoreAggregationEvaluator implements AggregationEvaluator {
  constructor(private readonly store: ObsStore) {}

  async evaluate({ person, concept, aggregation, constraint }: EvaluationRequest): Promise<Obs[]> {
    const parsedAggregation = parseInput(aggregationSchema, aggregation, `Unsupported aggregation: ${aggregation.type}`);
    const parsedConstraint = parseInput(constraintSchema, constraint, `Unsupported constraint: ${constraint.type}`);

    const candidates = await this.store.find(
      { personId: person.personId, conceptId: concept.conceptId, voided: false },
      { orderBy: [{ key: 'obsDatetime', direction: 'asc' }] }
    );

    return applyAggregation(applyConstraint(candidates, parsedConstraint), parsedAggregation);
  }
}
