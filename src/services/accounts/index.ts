// =============================================================================
// GAZETTE - Accounts & Publishing Houses
//
// Registration with role selection, credential checks, and staff-side
// publisher administration.
//
// Registration side effects by role:
//   publisher   creates a house owned by the new user (name required, unique)
//   editor      joins the chosen house's editors (house required)
//   journalist  joins the chosen house's journalists (house optional)
//   reader      none
// Staff accounts are provisioned out of band, never self-registered.
// =============================================================================

import bcrypt from 'bcryptjs';
import { authorize } from '../../authorization/gate';
import { Publisher, User } from '../../types/publishing';
import { SELF_REGISTRABLE_ROLES, UserRole } from '../../types/roles';
import { Result, fail, invalid, notFound, ok } from '../../types/result';
import { IPublishingStore, PublisherDetailsPatch } from '../../types/store';
import { config } from '../../config';
import { log } from '../../utils/log';
import { recordAuditEvent } from '../audit';
import { isPublisher } from '../membership/model';

export interface RegistrationRequest {
  username: string;
  email: string;
  firstName: string;
  lastName: string;
  password: string;
  role: UserRole;
  /** House to join (editor, journalist) */
  publisherId?: string | null;
  /** House to found (publisher) */
  publisherName?: string | null;
  publisherDescription?: string | null;
  publisherWebsite?: string | null;
}

export interface Registration {
  user: User;
  publisher: Publisher | null;
}

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

export function hashPassword(password: string): Promise<string> {
  return bcrypt.hash(password, config.auth.bcryptRounds);
}

export async function registerUser(
  store: IPublishingStore,
  request: RegistrationRequest,
): Promise<Result<Registration>> {
  const username = request.username.trim();
  const email = request.email.trim().toLowerCase();

  if (!username) return invalid('username');
  if (!EMAIL_PATTERN.test(email)) return invalid('email');
  if (request.password.length < config.auth.minPasswordLength) return invalid('password');
  if (!SELF_REGISTRABLE_ROLES.includes(request.role)) return invalid('role');

  // Resolve the house before creating anything
  let joining: Publisher | null = null;
  const publisherName = request.publisherName?.trim() ?? '';

  if (request.role === 'publisher') {
    if (!publisherName) return invalid('publisherName');
    if (await store.findPublisherByName(publisherName)) {
      return fail({ kind: 'Conflict', field: 'publisherName' });
    }
  } else if (request.role === 'editor' || request.role === 'journalist') {
    if (request.publisherId) {
      joining = await store.getPublisher(request.publisherId);
      if (!joining) return notFound('publisher');
    } else if (request.role === 'editor') {
      return invalid('publisherId');
    }
  }

  const user = await store.createUser({
    username,
    email,
    firstName: request.firstName.trim(),
    lastName: request.lastName.trim(),
    role: request.role,
    passwordHash: await hashPassword(request.password),
  });
  if (!user) return fail({ kind: 'Conflict', field: 'username' });

  let publisher: Publisher | null = null;
  if (request.role === 'publisher') {
    publisher = await store.createPublisher({
      name: publisherName,
      description: request.publisherDescription?.trim() ?? '',
      website: request.publisherWebsite?.trim() ?? '',
      ownerId: user.id,
    });
    if (!publisher) {
      // Name taken between the check and the insert. An owner without a
      // house is unusable, so the account goes too.
      await store.deleteUser(user.id);
      log.warn('Accounts', 'Publisher name claimed concurrently', { username, publisherName });
      return fail({ kind: 'Conflict', field: 'publisherName' });
    }
  } else if (joining && (request.role === 'editor' || request.role === 'journalist')) {
    await store.addPublisherMember(joining.id, user.id, request.role);
    publisher = await store.getPublisher(joining.id);
  }

  await recordAuditEvent(store, {
    category: 'account',
    eventType: 'user.registered',
    actor: user,
    targetType: 'user',
    targetId: user.id,
    metadata: { role: user.role, publisherId: publisher?.id ?? null },
  });

  return ok({ user, publisher });
}

/**
 * Check a username/password pair. Unknown users and wrong passwords fail
 * identically.
 */
export async function verifyCredentials(
  store: IPublishingStore,
  params: { username: string; password: string },
): Promise<Result<User>> {
  const user = await store.getUserByUsername(params.username.trim());
  const hash = user ? await store.getPasswordHash(user.id) : null;

  if (!user || !hash || !(await bcrypt.compare(params.password, hash))) {
    return invalid('credentials');
  }
  return ok(user);
}

// ── Publisher administration (staff) ─────────────────────────────────────

export async function createPublisher(
  store: IPublishingStore,
  params: {
    actor: User;
    name: string;
    description?: string;
    website?: string;
    ownerId: string;
  },
): Promise<Result<Publisher>> {
  const decision = authorize(params.actor, 'publisher:create', null);
  if (!decision.allowed) return fail({ kind: 'Forbidden', reason: decision.reason });

  const name = params.name.trim();
  if (!name) return invalid('name');

  const owner = await store.getUser(params.ownerId);
  if (!owner) return notFound('user');
  if (!isPublisher(owner)) return fail({ kind: 'RoleMismatch' });

  const publisher = await store.createPublisher({
    name,
    description: params.description?.trim() ?? '',
    website: params.website?.trim() ?? '',
    ownerId: owner.id,
  });
  if (!publisher) return fail({ kind: 'Conflict', field: 'name' });
  return ok(publisher);
}

/** Name, description and website only; the owner is fixed. */
export async function updatePublisher(
  store: IPublishingStore,
  params: { actor: User; publisherId: string; patch: PublisherDetailsPatch },
): Promise<Result<Publisher>> {
  const existing = await store.getPublisher(params.publisherId);
  if (!existing) return notFound('publisher');

  const decision = authorize(params.actor, 'publisher:edit', existing);
  if (!decision.allowed) return fail({ kind: 'Forbidden', reason: decision.reason });

  const name = params.patch.name?.trim();
  if (name !== undefined && !name) return invalid('name');
  if (name && name.toLowerCase() !== existing.name.toLowerCase()) {
    const clash = await store.findPublisherByName(name);
    if (clash && clash.id !== existing.id) return fail({ kind: 'Conflict', field: 'name' });
  }

  const updated = await store.updatePublisher(existing.id, {
    name,
    description: params.patch.description?.trim(),
    website: params.patch.website?.trim(),
  });
  if (updated) return ok(updated);
  // Still there means the new name was claimed after the check above
  return (await store.getPublisher(existing.id)) ? fail({ kind: 'Conflict', field: 'name' }) : notFound('publisher');
}

export function listPublishers(store: IPublishingStore): Promise<Publisher[]> {
  return store.listPublishers();
}
