// =============================================================================
// GAZETTE - Operation Results
//
// Every core operation returns a tagged result. Error kinds are stable codes;
// the HTTP layer decides how to present them.
// =============================================================================

import { DenialReason } from './authorization';

export type CoreError =
  | { kind: 'RoleMismatch' }
  | { kind: 'InvalidTransition' }
  | { kind: 'NoPublisherScope' }
  | { kind: 'AmbiguousTarget' }
  | { kind: 'NotOwner' }
  | { kind: 'AlreadyDecided' }
  | { kind: 'NotFound'; entity: EntityName }
  | { kind: 'Forbidden'; reason: DenialReason }
  | { kind: 'ValidationFailed'; field: string }
  | { kind: 'Conflict'; field: string };

export type CoreErrorKind = CoreError['kind'];

export type EntityName =
  | 'user'
  | 'publisher'
  | 'category'
  | 'article'
  | 'newsletter'
  | 'subscription'
  | 'reset_token';

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: CoreError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T = never>(error: CoreError): Result<T> {
  return { ok: false, error };
}

export function notFound<T = never>(entity: EntityName): Result<T> {
  return fail({ kind: 'NotFound', entity });
}

export function invalid<T = never>(field: string): Result<T> {
  return fail({ kind: 'ValidationFailed', field });
}
