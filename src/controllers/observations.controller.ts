import type { Request, Response } from 'express';
import { z } from 'zod';
import type ObsService from '../services/obs.service';
import type { Actor, Obs } from '../types/observation';
import {
  aggregateRequestSchema,
  obsGroupSchema,
  obsInputSchema,
  obsUpdateSchema,
  voidRequestSchema
} from '../schemas/observation.schema';
import { commonSchemas, parseInput } from '../utils/validation';
import { AuthorizationError } from '../utils/errors';

const idParams = z.object({ id: commonSchemas.id });
const groupParams = z.object({ groupId: commonSchemas.id });
const personParams = z.object({ personId: commonSchemas.id });
const conceptParams = z.object({ conceptId: commonSchemas.id });
const encounterParams = z.object({ encounterId: commonSchemas.id });

const personTypeQuery = z.object({ personType: commonSchemas.personType });

const searchQuery = z.object({
  q: z.string().default(''),
  includeVoided: commonSchemas.booleanFlag.default(false),
  personType: commonSchemas.personType
});

const byPersonQuery = z.object({ conceptId: commonSchemas.id.optional() });

const latestQuery = z.object({
  conceptId: commonSchemas.id,
  n: z.coerce.number().int().min(0).default(1)
});

const byConceptQuery = z.object({
  locationId: commonSchemas.id.optional(),
  sort: z.string().optional(),
  personType: commonSchemas.personType
});

const numericQuery = z.object({
  sortByValue: commonSchemas.booleanFlag.default(true),
  personType: commonSchemas.personType
});

const actorOf = (req: Request): Actor => {
  if (!req.actor) {
    throw new AuthorizationError('authenticated session');
  }
  return req.actor;
};

const list = (res: Response, observations: Obs[]) =>
  res.json({ observations, totalCount: observations.length });

// Observation handlers. Errors propagate to the error handler in app.ts.
export const createObservationsController = (service: ObsService) => ({
  createObservation: async (req: Request, res: Response) => {
    const input = parseInput(obsInputSchema, req.body, 'Invalid observation');
    const observation = await service.createObs(input, actorOf(req));
    res.status(201).json({ observation });
  },

  createObservationGroup: async (req: Request, res: Response) => {
    const members = parseInput(obsGroupSchema, req.body?.observations, 'Invalid observation group');
    const observations = await service.createObsGroup(members, actorOf(req));
    res.status(201).json({ obsGroupId: observations[0].obsGroupId, observations });
  },

  getObservation: async (req: Request, res: Response) => {
    const { id } = parseInput(idParams, req.params);
    res.json({ observation: await service.getObs(id) });
  },

  updateObservation: async (req: Request, res: Response) => {
    const { id } = parseInput(idParams, req.params);
    const input = parseInput(obsUpdateSchema, { ...req.body, obsId: id }, 'Invalid observation');
    res.json({ observation: await service.updateObs(input, actorOf(req)) });
  },

  voidObservation: async (req: Request, res: Response) => {
    const { id } = parseInput(idParams, req.params);
    const { reason } = parseInput(voidRequestSchema, req.body);
    res.json({ observation: await service.voidObs(id, reason, actorOf(req)) });
  },

  unvoidObservation: async (req: Request, res: Response) => {
    const { id } = parseInput(idParams, req.params);
    res.json({ observation: await service.unvoidObs(id, actorOf(req)) });
  },

  deleteObservation: async (req: Request, res: Response) => {
    const { id } = parseInput(idParams, req.params);
    await service.deleteObs(id, actorOf(req));
    res.status(204).end();
  },

  getMimeTypes: async (_req: Request, res: Response) => {
    res.json({ mimeTypes: await service.getMimeTypes() });
  },

  getMimeType: async (req: Request, res: Response) => {
    const { id } = parseInput(idParams, req.params);
    res.json({ mimeType: await service.getMimeType(id) });
  },

  getByPerson: async (req: Request, res: Response) => {
    const { personId } = parseInput(personParams, req.params);
    const { conceptId } = parseInput(byPersonQuery, req.query);
    const observations =
      conceptId === undefined
        ? await service.getObservationsByPerson({ personId })
        : await service.getObservationsByPersonAndConcept({ personId }, { conceptId });
    list(res, observations);
  },

  getLatestForPerson: async (req: Request, res: Response) => {
    const { personId } = parseInput(personParams, req.params);
    const { conceptId, n } = parseInput(latestQuery, req.query);
    list(res, await service.getLastNObservations(n, { personId }, { conceptId }));
  },

  aggregateForPerson: async (req: Request, res: Response) => {
    const { personId } = parseInput(personParams, req.params);
    const body = parseInput(aggregateRequestSchema, req.body);
    const observations = await service.getAggregatedObservations(
      actorOf(req),
      { personId },
      body.aggregation,
      { conceptId: body.conceptId },
      body.constraint
    );
    list(res, observations);
  },

  getByConcept: async (req: Request, res: Response) => {
    const { conceptId } = parseInput(conceptParams, req.params);
    const { locationId, sort, personType } = parseInput(byConceptQuery, req.query);
    const observations =
      locationId === undefined
        ? await service.getObservationsByConcept({ conceptId }, sort, personType)
        : await service.getObservationsByConceptAndLocation({ conceptId }, { locationId }, sort, personType);
    list(res, observations);
  },

  getAnsweredByConcept: async (req: Request, res: Response) => {
    const { conceptId } = parseInput(conceptParams, req.params);
    const { personType } = parseInput(personTypeQuery, req.query);
    list(res, await service.getObservationsAnsweredByConcept({ conceptId }, personType));
  },

  getNumericAnswers: async (req: Request, res: Response) => {
    const { conceptId } = parseInput(conceptParams, req.params);
    const { sortByValue, personType } = parseInput(numericQuery, req.query);
    const answers = await service.getNumericAnswersForConcept({ conceptId }, sortByValue, personType);
    res.json({ answers, totalCount: answers.length });
  },

  getDistinctValues: async (req: Request, res: Response) => {
    const { conceptId } = parseInput(conceptParams, req.params);
    const { personType } = parseInput(personTypeQuery, req.query);
    res.json({ values: await service.getDistinctObservationValues({ conceptId }, personType) });
  },

  getByEncounter: async (req: Request, res: Response) => {
    const { encounterId } = parseInput(encounterParams, req.params);
    list(res, await service.getObservationsByEncounter({ encounterId }));
  },

  getVoided: async (_req: Request, res: Response) => {
    list(res, await service.getVoidedObservations());
  },

  search: async (req: Request, res: Response) => {
    const { q, includeVoided, personType } = parseInput(searchQuery, req.query);
    list(res, await service.findObservations(q, includeVoided, personType));
  },

  getGroup: async (req: Request, res: Response) => {
    const { groupId } = parseInput(groupParams, req.params);
    list(res, await service.findObsByGroupId(groupId));
  }
});
