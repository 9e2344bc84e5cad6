// =============================================================================
// GAZETTE - Test Fixtures
//
// Seed helpers that write straight to the in-memory store, plus mailers
// that record or fail.
// =============================================================================

import { IMailer, MailMessage } from '../../src/services/password-reset';
import { Article, ArticleStatus, Publisher, User } from '../../src/types/publishing';
import { UserRole } from '../../src/types/roles';
import { MemoryPublishingStore } from './memory-store';

let counter = 0;

// ── Snapshot builders (no store) ────────────────────────────────────────

const EPOCH = new Date('2024-01-01T00:00:00Z');

export function makeUser(role: UserRole, id: string): User {
  return {
    id,
    username: id,
    email: `${id}@example.com`,
    firstName: id,
    lastName: 'Test',
    role,
    createdAt: EPOCH,
  };
}

export function makePublisher(
  id: string,
  team: { ownerId: string; editorIds?: string[]; journalistIds?: string[] },
): Publisher {
  return {
    id,
    name: id,
    description: '',
    website: '',
    ownerId: team.ownerId,
    editorIds: team.editorIds ?? [],
    journalistIds: team.journalistIds ?? [],
    createdAt: EPOCH,
  };
}

export function makeArticle(
  id: string,
  fields: { authorId: string; publisherId: string | null; status?: ArticleStatus },
): Article {
  return {
    id,
    authorId: fields.authorId,
    publisherId: fields.publisherId,
    categoryId: null,
    title: 'Tide tables revised',
    summary: '',
    content: 'New tables take effect in spring.',
    heroImage: null,
    status: fields.status ?? 'draft',
    reviewedBy: null,
    reviewedAt: null,
    createdAt: EPOCH,
    updatedAt: EPOCH,
  };
}

// ── Store seeding ───────────────────────────────────────────────────────

/** Users seeded this way cannot log in; use the register route for that. */
export async function seedUser(
  store: MemoryPublishingStore,
  role: UserRole,
  username?: string,
): Promise<User> {
  counter += 1;
  const name = username ?? `${role}${counter}`;
  const user = await store.createUser({
    username: name,
    email: `${name}@example.com`,
    firstName: name,
    lastName: 'Test',
    role,
    passwordHash: 'not-a-bcrypt-hash',
  });
  if (!user) throw new Error(`Seed user ${name} already exists`);
  return user;
}

export interface SeededHouse {
  owner: User;
  publisher: Publisher;
  editor: User;
  journalist: User;
}

/** A house with one editor and one journalist on its team. */
export async function seedHouse(store: MemoryPublishingStore, name: string): Promise<SeededHouse> {
  const owner = await seedUser(store, 'publisher');
  const editor = await seedUser(store, 'editor');
  const journalist = await seedUser(store, 'journalist');

  const created = await store.createPublisher({ name, description: '', website: '', ownerId: owner.id });
  if (!created) throw new Error(`Seed publisher ${name} already exists`);
  await store.addPublisherMember(created.id, editor.id, 'editor');
  await store.addPublisherMember(created.id, journalist.id, 'journalist');

  const publisher = await store.getPublisher(created.id);
  if (!publisher) throw new Error('Seed publisher vanished');
  return { owner, publisher, editor, journalist };
}

export async function seedArticle(
  store: MemoryPublishingStore,
  author: User,
  publisher: Publisher | null,
  overrides: Partial<Pick<Article, 'title' | 'content' | 'status' | 'categoryId'>> = {},
): Promise<Article> {
  const draft = await store.insertArticle({
    authorId: author.id,
    publisherId: publisher?.id ?? null,
    categoryId: overrides.categoryId ?? null,
    title: overrides.title ?? 'Harbour bridge reopens',
    summary: '',
    content: overrides.content ?? 'Traffic resumed on Monday.',
  });
  if (!overrides.status || overrides.status === 'draft') return draft;

  const saved = await store.saveArticleIfStatus({ ...draft, status: overrides.status }, 'draft');
  if (!saved) throw new Error('Seed article status change failed');
  return saved;
}

/** Clock that advances one minute per reading, from a fixed start. */
export function steppingClock(start = new Date('2024-03-01T09:00:00Z')): () => Date {
  let tick = 0;
  return () => new Date(start.getTime() + tick++ * 60_000);
}

export class RecordingMailer implements IMailer {
  readonly sent: MailMessage[] = [];

  async send(message: MailMessage): Promise<void> {
    this.sent.push(message);
  }
}

/** Holds every message until `release` is called. */
export class StalledMailer implements IMailer {
  readonly sent: MailMessage[] = [];
  private readonly gate: Promise<void>;
  release: () => void = () => {};

  constructor() {
    this.gate = new Promise((resolve) => {
      this.release = resolve;
    });
  }

  async send(message: MailMessage): Promise<void> {
    await this.gate;
    this.sent.push(message);
  }
}

/** Let detached work queued by the last call run to completion. */
export function settle(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export class FailingMailer implements IMailer {
  attempts = 0;

  async send(): Promise<void> {
    this.attempts += 1;
    throw new Error('SMTP unavailable');
  }
}
