// =============================================================================
// GAZETTE - Persistence Interface
//
// The core reads snapshots through this interface and writes through the
// conditional operations below. Implementations must enforce the uniqueness
// and compare-and-set guarantees documented on each method; the core relies
// on them for correctness under concurrent requests.
//
// Implementations:
//   PgPublishingStore - PostgreSQL via pg (src/db/pg-store.ts)
// =============================================================================

import {
  Article,
  ArticleStatus,
  Category,
  Newsletter,
  PasswordResetToken,
  Publisher,
  Subscription,
  SubscriptionTarget,
  User,
} from './publishing';
import { TeamRole, UserRole } from './roles';

export interface NewUserRecord {
  username: string;
  email: string;
  firstName: string;
  lastName: string;
  role: UserRole;
  passwordHash: string;
}

export interface NewPublisherRecord {
  name: string;
  description: string;
  website: string;
  ownerId: string;
}

export interface PublisherDetailsPatch {
  name?: string;
  description?: string;
  website?: string;
}

export interface NewArticleRecord {
  authorId: string;
  publisherId: string | null;
  categoryId: string | null;
  title: string;
  summary: string;
  content: string;
  heroImage?: string | null;
}

export interface NewNewsletterRecord {
  authorId: string;
  publisherId: string | null;
  title: string;
  content: string;
  coverImage?: string | null;
}

export interface ArticleFilter {
  status?: ArticleStatus;
  authorId?: string;
  publisherId?: string;
  /** Articles of these publishers, OR'd with `status` when both are given */
  visibleToEditorOf?: string[];
  categoryName?: string;
  publisherName?: string;
  /** Case-insensitive match on title or content */
  text?: string;
  limit: number;
  offset: number;
}

export interface NewsletterFilter {
  authorId?: string;
  publisherId?: string;
  limit: number;
}

export interface Page<T> {
  rows: T[];
  total: number;
}

export type AuditCategory = 'workflow' | 'membership' | 'subscription' | 'account';

export interface AuditRecord {
  id: string;
  category: AuditCategory;
  eventType: string;
  actorId: string | null;
  actorRole: UserRole | null;
  targetType: string;
  targetId: string;
  metadata: Record<string, unknown>;
  eventHash: string;
  occurredAt: Date;
}

export interface IPublishingStore {
  // ── Users ───────────────────────────────────────────────────────────
  /** Returns null when the username or email is already taken. */
  createUser(record: NewUserRecord): Promise<User | null>;
  /** Removes an account that never got past registration. */
  deleteUser(id: string): Promise<void>;
  getUser(id: string): Promise<User | null>;
  getUserByUsername(username: string): Promise<User | null>;
  getUserByEmail(email: string): Promise<User | null>;
  getPasswordHash(userId: string): Promise<string | null>;
  updatePasswordHash(userId: string, passwordHash: string): Promise<void>;

  // ── Publishers ──────────────────────────────────────────────────────
  /** Returns null when a publisher with the same name (any case) exists. */
  createPublisher(record: NewPublisherRecord): Promise<Publisher | null>;
  /** Returns null when the publisher is missing or the new name is taken. */
  updatePublisher(id: string, patch: PublisherDetailsPatch): Promise<Publisher | null>;
  getPublisher(id: string): Promise<Publisher | null>;
  findPublisherByName(name: string): Promise<Publisher | null>;
  findPublisherOwnedBy(userId: string): Promise<Publisher | null>;
  listPublishers(): Promise<Publisher[]>;
  listPublishersEditedBy(userId: string): Promise<Publisher[]>;
  /**
   * Idempotent insert. Returns false when the user already holds that
   * team role, including when a concurrent insert won the race.
   */
  addPublisherMember(publisherId: string, userId: string, role: TeamRole): Promise<boolean>;

  // ── Categories ──────────────────────────────────────────────────────
  listCategories(): Promise<Category[]>;
  getCategory(id: string): Promise<Category | null>;

  // ── Articles ────────────────────────────────────────────────────────
  insertArticle(record: NewArticleRecord): Promise<Article>;
  getArticle(id: string): Promise<Article | null>;
  listArticles(filter: ArticleFilter): Promise<Page<Article>>;
  /**
   * Write `next` only if the stored status still equals `expected`.
   * Returns null when another writer changed the status first.
   */
  saveArticleIfStatus(next: Article, expected: ArticleStatus): Promise<Article | null>;
  countArticlesByPublisher(publisherId: string): Promise<number>;

  // ── Newsletters ─────────────────────────────────────────────────────
  insertNewsletter(record: NewNewsletterRecord): Promise<Newsletter>;
  getNewsletter(id: string): Promise<Newsletter | null>;
  listNewsletters(filter: NewsletterFilter): Promise<Newsletter[]>;
  /** Newsletters whose publisher OR author is in the given sets. */
  listNewslettersInScope(
    publisherIds: string[],
    journalistIds: string[],
    limit: number,
  ): Promise<Newsletter[]>;

  // ── Subscriptions ───────────────────────────────────────────────────
  /**
   * Upsert on (reader, target). `created` is false when the row already
   * existed; a uniqueness violation is reported the same way.
   */
  insertSubscription(
    readerId: string,
    target: SubscriptionTarget,
  ): Promise<{ subscription: Subscription; created: boolean }>;
  getSubscription(id: string): Promise<Subscription | null>;
  listSubscriptions(readerId: string): Promise<Subscription[]>;
  deleteSubscription(id: string): Promise<void>;
  countPublisherSubscribers(publisherId: string): Promise<number>;

  // ── Password reset tokens ───────────────────────────────────────────
  insertResetToken(userId: string, token: string): Promise<PasswordResetToken>;
  getResetToken(token: string): Promise<PasswordResetToken | null>;
  /** Marks the token used. Returns false if it was already used. */
  consumeResetToken(token: string): Promise<boolean>;

  // ── Audit ───────────────────────────────────────────────────────────
  appendAuditRecord(record: AuditRecord): Promise<void>;
}
