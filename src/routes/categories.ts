// =============================================================================
// GAZETTE - Category Routes
//
//   GET /api/categories - Seeded article categories (public)
// =============================================================================

import { Router } from 'express';
import { listCategories } from '../services/catalogue';
import { AppDependencies } from '../types/app';
import { route } from './handlers';

export function categoryRoutes({ store }: AppDependencies): Router {
  const router = Router();

  router.get('/', route(async (_req, res) => {
    res.json(await listCategories(store));
  }));

  return router;
}
