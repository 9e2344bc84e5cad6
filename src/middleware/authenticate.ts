// =============================================================================
// GAZETTE - Authentication Middleware
//
// Verifies the JWT bearer token and attaches the current user record to the
// request. The acting identity then travels explicitly into every service
// call; nothing downstream reads ambient session state.
// =============================================================================

import { NextFunction, Request, RequestHandler, Response } from 'express';
import jwt from 'jsonwebtoken';
import { v4 as uuidv4 } from 'uuid';
import { config } from '../config';
import '../types/auth';
import { User } from '../types/publishing';
import { IPublishingStore } from '../types/store';
import { errorMessage, log } from '../utils/log';

/** Issue an access token for `user`. */
export function signAccessToken(user: User): string {
  return jwt.sign({ role: user.role }, config.jwt.secret, {
    subject: user.id,
    jwtid: uuidv4(),
    expiresIn: config.jwt.expirySeconds,
  });
}

type TokenCheck =
  | { status: 'absent' }
  | { status: 'invalid'; error: string }
  | { status: 'valid'; userId: string };

function readBearerToken(req: Request): TokenCheck {
  const authHeader = req.headers.authorization;
  if (!authHeader?.startsWith('Bearer ')) {
    return { status: 'absent' };
  }

  try {
    const payload = jwt.verify(authHeader.slice(7), config.jwt.secret);
    if (typeof payload === 'string' || typeof payload.sub !== 'string') {
      return { status: 'invalid', error: 'Invalid token' };
    }
    return { status: 'valid', userId: payload.sub };
  } catch (err) {
    if (err instanceof jwt.TokenExpiredError) {
      return { status: 'invalid', error: 'Token expired' };
    }
    if (err instanceof jwt.JsonWebTokenError) {
      return { status: 'invalid', error: 'Invalid token' };
    }
    throw err;
  }
}

/**
 * Require a valid bearer token belonging to an existing user.
 */
export function authenticate(store: IPublishingStore): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const check = readBearerToken(req);
    if (check.status === 'absent') {
      res.status(401).json({ error: 'Authentication required' });
      return;
    }
    if (check.status === 'invalid') {
      res.status(401).json({ error: check.error });
      return;
    }

    store.getUser(check.userId)
      .then((user) => {
        if (!user) {
          res.status(401).json({ error: 'Account no longer exists' });
          return;
        }
        req.user = user;
        next();
      })
      .catch((err: unknown) => {
        log.error('Auth', `User lookup failed: ${errorMessage(err)}`);
        next(err);
      });
  };
}

/**
 * Attach the user when a valid token is present; anonymous requests pass
 * through. A malformed or expired token is still rejected.
 */
export function optionalAuthenticate(store: IPublishingStore): RequestHandler {
  const strict = authenticate(store);
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!req.headers.authorization) {
      next();
      return;
    }
    strict(req, res, next);
  };
}
