// =============================================================================
// GAZETTE - Role & Membership Model
//
// Pure predicates over a user's role and a publisher's team. Policy lives in
// the access-control gate; nothing here checks who is asking.
// =============================================================================

import { Publisher, User } from '../../types/publishing';
import { TeamRole } from '../../types/roles';
import { Result, fail, ok } from '../../types/result';

export const isReader = (user: User): boolean => user.role === 'reader';
export const isJournalist = (user: User): boolean => user.role === 'journalist';
export const isEditor = (user: User): boolean => user.role === 'editor';
export const isPublisher = (user: User): boolean => user.role === 'publisher';
export const isStaff = (user: User): boolean => user.role === 'staff';

export function isOwnerOf(user: User, publisher: Publisher | null): boolean {
  return publisher !== null && publisher.ownerId === user.id;
}

export function isEditorOf(user: User, publisher: Publisher | null): boolean {
  return publisher !== null && publisher.editorIds.includes(user.id);
}

export function isJournalistOf(user: User, publisher: Publisher | null): boolean {
  return publisher !== null && publisher.journalistIds.includes(user.id);
}

export type MembershipChange =
  | { outcome: 'added'; publisher: Publisher }
  | { outcome: 'already_member'; publisher: Publisher };

/** Add an editor to a publisher snapshot. */
export function addEditor(publisher: Publisher, user: User): Result<MembershipChange> {
  return addMember(publisher, user, 'editor');
}

/** Add a journalist to a publisher snapshot. */
export function addJournalist(publisher: Publisher, user: User): Result<MembershipChange> {
  return addMember(publisher, user, 'journalist');
}

export function addMember(
  publisher: Publisher,
  user: User,
  role: TeamRole,
): Result<MembershipChange> {
  if (user.role !== role) {
    return fail({ kind: 'RoleMismatch' });
  }

  const members = role === 'editor' ? publisher.editorIds : publisher.journalistIds;
  if (members.includes(user.id)) {
    return ok({ outcome: 'already_member', publisher });
  }

  const next: Publisher =
    role === 'editor'
      ? { ...publisher, editorIds: [...publisher.editorIds, user.id] }
      : { ...publisher, journalistIds: [...publisher.journalistIds, user.id] };

  return ok({ outcome: 'added', publisher: next });
}
