// =============================================================================
// GAZETTE - Subscription Routes (readers)
//
//   GET    /api/subscriptions      - Caller's subscriptions
//   POST   /api/subscriptions      - { publisherId } or { journalistId }
//   DELETE /api/subscriptions/:id  - Unsubscribe (owner only)
// =============================================================================

import { Router } from 'express';
import { authenticate } from '../middleware/authenticate';
import { listSubscriptions, subscribe, unsubscribe } from '../services/subscriptions';
import { AppDependencies } from '../types/app';
import { nullableStringField, sendError, withActor } from './handlers';

export function subscriptionRoutes({ store }: AppDependencies): Router {
  const router = Router();
  router.use(authenticate(store));

  router.get('/', withActor(async (_req, res, actor) => {
    const result = await listSubscriptions(store, actor);
    if (!result.ok) {
      sendError(res, result.error);
      return;
    }
    res.json(result.value);
  }));

  router.post('/', withActor(async (req, res, actor) => {
    const result = await subscribe(store, {
      reader: actor,
      request: {
        publisherId: nullableStringField(req.body, 'publisherId'),
        journalistId: nullableStringField(req.body, 'journalistId'),
      },
    });
    if (!result.ok) {
      sendError(res, result.error);
      return;
    }
    res.status(result.value.outcome === 'subscribed' ? 201 : 200).json(result.value);
  }));

  router.delete('/:id', withActor(async (req, res, actor) => {
    const result = await unsubscribe(store, { reader: actor, subscriptionId: req.params.id });
    if (!result.ok) {
      sendError(res, result.error);
      return;
    }
    res.status(204).end();
  }));

  return router;
}
