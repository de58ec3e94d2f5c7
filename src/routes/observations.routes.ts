import express from 'express';
import { authenticateToken, requirePrivilege } from '../middlewares/authMiddleware';
import { createObservationsController } from '../controllers/observations.controller';
import type ObsService from '../services/obs.service';
import { PRIVILEGES, type PrivilegeChecker } from '../services/privilege.service';

export interface ObservationsRouterDeps {
  service: ObsService;
  privileges: PrivilegeChecker;
  jwtSecret: string;
}

export const createObservationsRouter = ({ service, privileges, jwtSecret }: ObservationsRouterDeps) => {
  const router = express.Router();
  const obsCtrl = createObservationsController(service);

  const canView = requirePrivilege(privileges, PRIVILEGES.VIEW_OBS);
  const canAdd = requirePrivilege(privileges, PRIVILEGES.ADD_OBS);
  const canEdit = requirePrivilege(privileges, PRIVILEGES.EDIT_OBS);
  const canVoid = requirePrivilege(privileges, PRIVILEGES.DELETE_OBS);
  const canPurge = requirePrivilege(privileges, PRIVILEGES.PURGE_OBS);

  router.use(authenticateToken(jwtSecret));

  // Creation
  router.post('/', canAdd, obsCtrl.createObservation);
  router.post('/groups', canAdd, obsCtrl.createObservationGroup);
  router.get('/groups/:groupId', canView, obsCtrl.getGroup);

  // Search and listings (declared before /:id so they are not read as ids)
  router.get('/voided', canView, obsCtrl.getVoided);
  router.get('/search', canView, obsCtrl.search);
  router.get('/mime-types', canView, obsCtrl.getMimeTypes);
  router.get('/mime-types/:id', canView, obsCtrl.getMimeType);

  // By subject
  router.get('/persons/:personId', canView, obsCtrl.getByPerson);
  router.get('/persons/:personId/latest', canView, obsCtrl.getLatestForPerson);
  router.post('/persons/:personId/aggregate', canView, obsCtrl.aggregateForPerson);

  // By concept
  router.get('/concepts/:conceptId', canView, obsCtrl.getByConcept);
  router.get('/concepts/:conceptId/answered-by', canView, obsCtrl.getAnsweredByConcept);
  router.get('/concepts/:conceptId/numeric', canView, obsCtrl.getNumericAnswers);
  router.get('/concepts/:conceptId/distinct-values', canView, obsCtrl.getDistinctValues);

  // By encounter
  router.get('/encounters/:encounterId', canView, obsCtrl.getByEncounter);

  // Single observation lifecycle
  router.get('/:id', canView, obsCtrl.getObservation);
  router.put('/:id', canEdit, obsCtrl.updateObservation);
  router.post('/:id/void', canVoid, obsCtrl.voidObservation);
  router.post('/:id/unvoid', canVoid, obsCtrl.unvoidObservation);
  // Hard delete bypasses the audit trail; administrators only by default
  router.delete('/:id', canPurge, obsCtrl.deleteObservation);

  return router;
};

export default createObservationsRouter;
