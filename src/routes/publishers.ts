// =============================================================================
// GAZETTE - Publisher Routes
//
//   GET   /api/publishers             - List houses (public)
//   POST  /api/publishers             - Create house (staff)
//   GET   /api/publishers/dashboard   - Owner's overview (publisher)
//   PATCH /api/publishers/:id         - Edit details (staff)
//   POST  /api/publishers/:id/members - Add editor/journalist by username (owner)
// =============================================================================

import { Router } from 'express';
import { authenticate } from '../middleware/authenticate';
import { requireRole } from '../middleware/role-guard';
import { createPublisher, listPublishers, updatePublisher } from '../services/accounts';
import { addTeamMember, getPublisherDashboard } from '../services/membership';
import { AppDependencies } from '../types/app';
import { isTeamRole } from '../types/roles';
import { route, sendError, stringField, withActor } from './handlers';

export function publisherRoutes({ store }: AppDependencies): Router {
  const router = Router();

  router.get('/', route(async (_req, res) => {
    res.json(await listPublishers(store));
  }));

  router.post('/', authenticate(store), requireRole('staff'), withActor(async (req, res, actor) => {
    const result = await createPublisher(store, {
      actor,
      name: stringField(req.body, 'name') ?? '',
      description: stringField(req.body, 'description'),
      website: stringField(req.body, 'website'),
      ownerId: stringField(req.body, 'ownerId') ?? '',
    });
    if (!result.ok) {
      sendError(res, result.error);
      return;
    }
    res.status(201).json(result.value);
  }));

  router.get('/dashboard', authenticate(store), requireRole('publisher'), withActor(async (_req, res, actor) => {
    const result = await getPublisherDashboard(store, actor);
    if (!result.ok) {
      sendError(res, result.error);
      return;
    }
    res.json(result.value);
  }));

  router.patch('/:id', authenticate(store), requireRole('staff'), withActor(async (req, res, actor) => {
    const result = await updatePublisher(store, {
      actor,
      publisherId: req.params.id,
      patch: {
        name: stringField(req.body, 'name'),
        description: stringField(req.body, 'description'),
        website: stringField(req.body, 'website'),
      },
    });
    if (!result.ok) {
      sendError(res, result.error);
      return;
    }
    res.json(result.value);
  }));

  router.post('/:id/members', authenticate(store), withActor(async (req, res, actor) => {
    const role = stringField(req.body, 'role');
    if (!isTeamRole(role)) {
      sendError(res, { kind: 'ValidationFailed', field: 'role' });
      return;
    }

    const result = await addTeamMember(store, {
      actor,
      publisherId: req.params.id,
      username: stringField(req.body, 'username') ?? '',
      role,
    });
    if (!result.ok) {
      sendError(res, result.error);
      return;
    }
    res.status(result.value.outcome === 'added' ? 201 : 200).json(result.value);
  }));

  return router;
}
