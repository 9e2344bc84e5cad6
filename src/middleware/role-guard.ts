// =============================================================================
// GAZETTE - Role Guard Middleware
//
// Coarse route-level filter: requireRole('staff'). Entity-level rules
// (ownership, publisher membership) are decided by the access-control gate
// inside the services.
// =============================================================================

import { NextFunction, Request, RequestHandler, Response } from 'express';
import '../types/auth';
import { UserRole } from '../types/roles';

/**
 * Returns middleware that verifies the user holds one of the specified
 * roles. Must be used AFTER authenticate middleware.
 */
export function requireRole(...roles: UserRole[]): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!req.user) {
      res.status(401).json({ error: 'Authentication required' });
      return;
    }

    if (!roles.includes(req.user.role)) {
      res.status(403).json({
        error: 'Forbidden',
        reason: 'insufficient_role',
        required: roles,
        current: req.user.role,
      });
      return;
    }

    next();
  };
}
