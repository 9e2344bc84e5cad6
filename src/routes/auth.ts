// =============================================================================
// GAZETTE - Authentication Routes
//
//   POST /api/auth/register              - Create account (role chosen here)
//   POST /api/auth/login                 - Username + password → JWT
//   GET  /api/auth/session               - Current user
//   POST /api/auth/password-reset        - Request a reset link
//   GET  /api/auth/password-reset/:token - Is this token still usable?
//   POST /api/auth/password-reset/:token - Set a new password
// =============================================================================

import { Router } from 'express';
import { authenticate, signAccessToken } from '../middleware/authenticate';
import { registerUser, verifyCredentials } from '../services/accounts';
import { checkResetToken, requestPasswordReset, resetPassword } from '../services/password-reset';
import { AppDependencies } from '../types/app';
import { isUserRole } from '../types/roles';
import { nullableStringField, route, sendError, stringField, withActor } from './handlers';

export function authRoutes({ store, mailer }: AppDependencies): Router {
  const router = Router();

  router.post('/register', route(async (req, res) => {
    const role = stringField(req.body, 'role');
    if (!isUserRole(role)) {
      sendError(res, { kind: 'ValidationFailed', field: 'role' });
      return;
    }

    const result = await registerUser(store, {
      username: stringField(req.body, 'username') ?? '',
      email: stringField(req.body, 'email') ?? '',
      firstName: stringField(req.body, 'firstName') ?? '',
      lastName: stringField(req.body, 'lastName') ?? '',
      password: stringField(req.body, 'password') ?? '',
      role,
      publisherId: nullableStringField(req.body, 'publisherId'),
      publisherName: nullableStringField(req.body, 'publisherName'),
      publisherDescription: nullableStringField(req.body, 'publisherDescription'),
      publisherWebsite: nullableStringField(req.body, 'publisherWebsite'),
    });
    if (!result.ok) {
      sendError(res, result.error);
      return;
    }

    res.status(201).json({
      token: signAccessToken(result.value.user),
      user: result.value.user,
      publisher: result.value.publisher,
    });
  }));

  router.post('/login', route(async (req, res) => {
    const username = stringField(req.body, 'username');
    const password = stringField(req.body, 'password');
    if (!username || !password) {
      res.status(400).json({ error: 'ValidationFailed', field: 'credentials' });
      return;
    }

    const result = await verifyCredentials(store, { username, password });
    if (!result.ok) {
      res.status(401).json({ error: 'InvalidCredentials' });
      return;
    }

    res.json({ token: signAccessToken(result.value), user: result.value });
  }));

  router.get('/session', authenticate(store), withActor(async (_req, res, actor) => {
    res.json({ user: actor });
  }));

  router.post('/password-reset', route(async (req, res) => {
    const email = stringField(req.body, 'email');
    if (!email) {
      sendError(res, { kind: 'ValidationFailed', field: 'email' });
      return;
    }
    res.status(202).json(await requestPasswordReset(store, mailer, email));
  }));

  router.get('/password-reset/:token', route(async (req, res) => {
    const result = await checkResetToken(store, req.params.token);
    if (!result.ok) {
      sendError(res, result.error);
      return;
    }
    res.json({ valid: true });
  }));

  router.post('/password-reset/:token', route(async (req, res) => {
    const result = await resetPassword(store, {
      token: req.params.token,
      password: stringField(req.body, 'password') ?? '',
      confirmation: stringField(req.body, 'confirmation') ?? '',
    });
    if (!result.ok) {
      sendError(res, result.error);
      return;
    }
    res.json({ reset: true });
  }));

  return router;
}
