// =============================================================================
// GAZETTE - Newsletter Routes
//
//   GET  /api/newsletters      - Feed for the caller (anonymous: most recent)
//   GET  /api/newsletters/:id  - Single newsletter (public)
//   POST /api/newsletters      - Create newsletter (journalist), optional coverImage
// =============================================================================

import { Router } from 'express';
import { authenticate, optionalAuthenticate } from '../middleware/authenticate';
import { discardUpload, imageUpload } from '../middleware/image-upload';
import { createNewsletter, getNewsletter, listNewslettersFor } from '../services/catalogue';
import { AppDependencies } from '../types/app';
import '../types/auth';
import { nullableStringField, route, sendError, stringField, withActor } from './handlers';

export function newsletterRoutes({ store }: AppDependencies): Router {
  const router = Router();

  router.get('/', optionalAuthenticate(store), route(async (req, res) => {
    res.json(await listNewslettersFor(store, req.user ?? null));
  }));

  router.get('/:id', route(async (req, res) => {
    const result = await getNewsletter(store, req.params.id);
    if (!result.ok) {
      sendError(res, result.error);
      return;
    }
    res.json(result.value);
  }));

  router.post('/', authenticate(store), imageUpload('coverImage'), withActor(async (req, res, actor) => {
    const result = await createNewsletter(store, {
      actor,
      draft: {
        title: stringField(req.body, 'title') ?? '',
        content: stringField(req.body, 'content') ?? '',
        publisherId: nullableStringField(req.body, 'publisherId') ?? null,
        coverImage: req.file?.filename ?? null,
      },
    });
    if (!result.ok) {
      await discardUpload(req);
      sendError(res, result.error);
      return;
    }
    res.status(201).json(result.value);
  }));

  return router;
}
