import { describe, it, expect, beforeEach } from 'vitest';
import { StoreAggregationEvaluator } from '../src/services/aggregation.service';
import { MemoryObsStore } from '../src/repositories/memory-obs.store';
import type { Aggregation, Constraint, NewObs, Obs, ObsValue, Person } from '../src/types/observation';
import { ValidationError } from '../src/utils/errors';
import { CD4, numeric, patient, user } from './helpers';

const row = (person: Person, value: ObsValue, obsDatetime: string, voided = false): NewObs => ({
  person,
  concept: CD4,
  obsDatetime: new Date(obsDatetime),
  value,
  voided,
  dateCreated: new Date('2024-03-01T00:00:00.000Z')
});

const ids = (observations: Obs[]) => observations.map((obs) => obs.obsId);

describe('StoreAggregationEvaluator', () => {
  let evaluator: StoreAggregationEvaluator;

  const evaluate = (aggregation: Aggregation, constraint: Constraint = { type: 'none' }) =>
    evaluator.evaluate({ person: patient, concept: CD4, aggregation, constraint });

  beforeEach(async () => {
    const store = new MemoryObsStore();
    await store.insertMany([
      row(patient, numeric(200), '2024-02-01T00:00:00.000Z'), // 1
      row(patient, numeric(350), '2024-02-03T00:00:00.000Z'), // 2
      row(patient, numeric(300), '2024-02-02T00:00:00.000Z'), // 3
      row(patient, numeric(999), '2024-02-04T00:00:00.000Z', true), // 4, voided
      row(user, numeric(50), '2024-02-01T00:00:00.000Z'), // 5, other subject
      row(patient, { type: 'text', valueText: 'sample lost' }, '2024-02-05T00:00:00.000Z') // 6
    ]);
    evaluator = new StoreAggregationEvaluator(store);
  });

  it('returns the subject\'s non-voided observations oldest first', async () => {
    expect(ids(await evaluate({ type: 'all' }))).toEqual([1, 3, 2, 6]);
  });

  it('picks the first and last observation in time', async () => {
    expect(ids(await evaluate({ type: 'first' }))).toEqual([1]);
    expect(ids(await evaluate({ type: 'last' }))).toEqual([6]);
  });

  it('picks the observations holding the extreme numeric values', async () => {
    expect(ids(await evaluate({ type: 'min' }))).toEqual([1]);
    expect(ids(await evaluate({ type: 'max' }))).toEqual([2]);
  });

  it('returns the latest n observations newest first', async () => {
    expect(ids(await evaluate({ type: 'lastN', options: { count: 2 } }))).toEqual([6, 2]);
    expect(await evaluate({ type: 'lastN', options: { count: 0 } })).toEqual([]);
  });

  it('restricts candidates to an inclusive date range', async () => {
    const constraint = { type: 'dateRange', options: { from: '2024-02-02T00:00:00.000Z', to: '2024-02-03T00:00:00.000Z' } };

    expect(ids(await evaluate({ type: 'all' }, constraint))).toEqual([3, 2]);
  });

  it('restricts candidates to numeric values within bounds', async () => {
    expect(ids(await evaluate({ type: 'all' }, { type: 'numericRange', options: { min: 250 } }))).toEqual([3, 2]);
    expect(ids(await evaluate({ type: 'all' }, { type: 'numericRange', options: { max: 250 } }))).toEqual([1]);
    expect(ids(await evaluate({ type: 'last' }, { type: 'numericRange', options: {} }))).toEqual([2]);
  });

  it('rejects descriptors it does not understand', async () => {
    await expect(evaluate({ type: 'median' })).rejects.toThrow('Unsupported aggregation: median');
    await expect(evaluate({ type: 'all' }, { type: 'between' })).rejects.toThrow('Unsupported constraint: between');
    await expect(evaluate({ type: 'lastN', options: { count: -1 } })).rejects.toBeInstanceOf(ValidationError);
  });
});
