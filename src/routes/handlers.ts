// =============================================================================
// GAZETTE - Route Helpers
//
// Async handler wrappers, body/query readers, and the mapping from core error
// kinds to HTTP responses. Bodies carry the stable kind and reason codes;
// wording is left to clients.
// =============================================================================

import { NextFunction, Request, RequestHandler, Response } from 'express';
import '../types/auth';
import { User } from '../types/publishing';
import { CoreError, CoreErrorKind } from '../types/result';

const STATUS_BY_KIND: Record<CoreErrorKind, number> = {
  NotFound: 404,
  Forbidden: 403,
  NotOwner: 403,
  AmbiguousTarget: 400,
  ValidationFailed: 400,
  RoleMismatch: 422,
  NoPublisherScope: 422,
  InvalidTransition: 409,
  AlreadyDecided: 409,
  Conflict: 409,
};

export function statusFor(error: CoreError): number {
  return STATUS_BY_KIND[error.kind];
}

/** `{ error: kind, ...detail }`, e.g. `{ error: 'Forbidden', reason: 'not_editor' }` */
export function sendError(res: Response, error: CoreError): void {
  const { kind, ...detail } = error;
  res.status(statusFor(error)).json({ error: kind, ...detail });
}

/** Public route: forwards rejections to the error handler. */
export function route(
  handler: (req: Request, res: Response) => Promise<void>,
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}

/** Authenticated route: hands the acting user to the handler explicitly. */
export function withActor(
  handler: (req: Request, res: Response, actor: User) => Promise<void>,
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const actor = req.user;
    if (!actor) {
      res.status(401).json({ error: 'Authentication required' });
      return;
    }
    handler(req, res, actor).catch(next);
  };
}

// ── Input readers ──────────────────────────────────────────────────────

function field(body: unknown, key: string): unknown {
  if (typeof body !== 'object' || body === null) return undefined;
  if (!Object.prototype.hasOwnProperty.call(body, key)) return undefined;
  const value: unknown = Reflect.get(body, key);
  return value;
}

export function stringField(body: unknown, key: string): string | undefined {
  const value = field(body, key);
  return typeof value === 'string' ? value : undefined;
}

/** Present-and-null is kept distinct from absent. */
export function nullableStringField(body: unknown, key: string): string | null | undefined {
  const value = field(body, key);
  if (value === null) return null;
  return typeof value === 'string' ? value : undefined;
}

export function queryString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

export function queryPage(value: unknown): number {
  const page = Number(queryString(value) ?? '1');
  return Number.isFinite(page) && page >= 1 ? Math.floor(page) : 1;
}
