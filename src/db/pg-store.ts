// =============================================================================
// GAZETTE - PostgreSQL Store
//
// IPublishingStore over pg. Concurrency guarantees come from the database:
//   subscriptions      partial unique indexes + ON CONFLICT DO NOTHING
//   team membership    primary key + ON CONFLICT DO NOTHING
//   article decisions  UPDATE … WHERE status = <expected>
//   reset tokens       UPDATE … WHERE is_used = false
// Lookups by id answer null for anything that is not a uuid, so ids from
// URLs and request bodies never reach a uuid column unparsed.
// Schema: db/schema.sql
// =============================================================================

import { QueryResultRow } from 'pg';
import { v4 as uuidv4, validate as isUuid } from 'uuid';
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
} from '../types/publishing';
import { TeamRole, parseRole } from '../types/roles';
import {
  ArticleFilter,
  AuditRecord,
  IPublishingStore,
  NewArticleRecord,
  NewNewsletterRecord,
  NewPublisherRecord,
  NewUserRecord,
  NewsletterFilter,
  Page,
  PublisherDetailsPatch,
} from '../types/store';

/** The slice of pg.Pool the store needs. */
export interface Queryable {
  query(text: string, params?: unknown[]): Promise<{ rows: QueryResultRow[]; rowCount: number | null }>;
}

const ARTICLE_STATUSES: readonly ArticleStatus[] = ['draft', 'pending', 'published', 'rejected'];

// ── Row mapping ────────────────────────────────────────────────────────

function toDate(value: unknown): Date {
  return value instanceof Date ? value : new Date(String(value));
}

function toNullableDate(value: unknown): Date | null {
  return value === null || value === undefined ? null : toDate(value);
}

function toNullableId(value: unknown): string | null {
  return value === null || value === undefined ? null : String(value);
}

function toIdList(value: unknown): string[] {
  return Array.isArray(value) ? value.map(String) : [];
}

function toStatus(value: unknown): ArticleStatus {
  const status = ARTICLE_STATUSES.find((s) => s === value);
  if (!status) throw new Error(`Unknown article status: ${String(value)}`);
  return status;
}

export function toUser(row: QueryResultRow): User {
  return {
    id: String(row.id),
    username: String(row.username),
    email: String(row.email),
    firstName: String(row.first_name ?? ''),
    lastName: String(row.last_name ?? ''),
    role: parseRole(row.role),
    createdAt: toDate(row.created_at),
  };
}

export function toPublisher(row: QueryResultRow): Publisher {
  return {
    id: String(row.id),
    name: String(row.name),
    description: String(row.description ?? ''),
    website: String(row.website ?? ''),
    ownerId: String(row.owner_id),
    editorIds: toIdList(row.editor_ids),
    journalistIds: toIdList(row.journalist_ids),
    createdAt: toDate(row.created_at),
  };
}

export function toArticle(row: QueryResultRow): Article {
  return {
    id: String(row.id),
    authorId: String(row.author_id),
    publisherId: toNullableId(row.publisher_id),
    categoryId: toNullableId(row.category_id),
    title: String(row.title),
    summary: String(row.summary ?? ''),
    content: String(row.content),
    heroImage: toNullableId(row.hero_image),
    status: toStatus(row.status),
    reviewedBy: toNullableId(row.reviewed_by),
    reviewedAt: toNullableDate(row.reviewed_at),
    createdAt: toDate(row.created_at),
    updatedAt: toDate(row.updated_at),
  };
}

export function toNewsletter(row: QueryResultRow): Newsletter {
  return {
    id: String(row.id),
    authorId: String(row.author_id),
    publisherId: toNullableId(row.publisher_id),
    title: String(row.title),
    content: String(row.content),
    coverImage: toNullableId(row.cover_image),
    createdAt: toDate(row.created_at),
  };
}

export function toSubscription(row: QueryResultRow): Subscription {
  const target: SubscriptionTarget = row.publisher_id
    ? { kind: 'publisher', publisherId: String(row.publisher_id) }
    : { kind: 'journalist', journalistId: String(row.journalist_id) };
  return {
    id: String(row.id),
    readerId: String(row.reader_id),
    target,
    createdAt: toDate(row.created_at),
  };
}

function toResetToken(row: QueryResultRow): PasswordResetToken {
  return {
    id: String(row.id),
    userId: String(row.user_id),
    token: String(row.token),
    createdAt: toDate(row.created_at),
    isUsed: Boolean(row.is_used),
  };
}

export function isUniqueViolation(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === '23505';
}

/** Escape LIKE wildcards in user input. */
function likePattern(text: string): string {
  return `%${text.replace(/[\\%_]/g, '\\$&')}%`;
}

// ── Queries ────────────────────────────────────────────────────────────

const PUBLISHER_SELECT = `
  SELECT p.id, p.name, p.description, p.website, p.owner_id, p.created_at,
         ARRAY(SELECT m.user_id::text FROM publisher_members m
               WHERE m.publisher_id = p.id AND m.team_role = 'editor'
               ORDER BY m.added_at) AS editor_ids,
         ARRAY(SELECT m.user_id::text FROM publisher_members m
               WHERE m.publisher_id = p.id AND m.team_role = 'journalist'
               ORDER BY m.added_at) AS journalist_ids
  FROM publishers p`;

const USER_COLUMNS = 'id, username, email, first_name, last_name, role, created_at';

export class PgPublishingStore implements IPublishingStore {
  constructor(private readonly db: Queryable) {}

  // ── Users ───────────────────────────────────────────────────────────

  async createUser(record: NewUserRecord): Promise<User | null> {
    const result = await this.db.query(
      `INSERT INTO users (id, username, email, first_name, last_name, role, password_hash)
       VALUES ($1, $2, $3, $4, $5, $6, $7)
       ON CONFLICT DO NOTHING
       RETURNING ${USER_COLUMNS}`,
      [
        uuidv4(), record.username, record.email, record.firstName,
        record.lastName, record.role, record.passwordHash,
      ]
    );
    return result.rows.length > 0 ? toUser(result.rows[0]) : null;
  }

  async deleteUser(id: string): Promise<void> {
    await this.db.query(`DELETE FROM users WHERE id = $1`, [id]);
  }

  async getUser(id: string): Promise<User | null> {
    if (!isUuid(id)) return null;
    const result = await this.db.query(`SELECT ${USER_COLUMNS} FROM users WHERE id = $1`, [id]);
    return result.rows.length > 0 ? toUser(result.rows[0]) : null;
  }

  async getUserByUsername(username: string): Promise<User | null> {
    const result = await this.db.query(`SELECT ${USER_COLUMNS} FROM users WHERE username = $1`, [username]);
    return result.rows.length > 0 ? toUser(result.rows[0]) : null;
  }

  async getUserByEmail(email: string): Promise<User | null> {
    const result = await this.db.query(
      `SELECT ${USER_COLUMNS} FROM users WHERE lower(email) = lower($1)`,
      [email]
    );
    return result.rows.length > 0 ? toUser(result.rows[0]) : null;
  }

  async getPasswordHash(userId: string): Promise<string | null> {
    const result = await this.db.query(`SELECT password_hash FROM users WHERE id = $1`, [userId]);
    return result.rows.length > 0 ? String(result.rows[0].password_hash) : null;
  }

  async updatePasswordHash(userId: string, passwordHash: string): Promise<void> {
    await this.db.query(`UPDATE users SET password_hash = $1 WHERE id = $2`, [passwordHash, userId]);
  }

  // ── Publishers ──────────────────────────────────────────────────────

  async createPublisher(record: NewPublisherRecord): Promise<Publisher | null> {
    const result = await this.db.query(
      `INSERT INTO publishers (id, name, description, website, owner_id)
       VALUES ($1, $2, $3, $4, $5)
       ON CONFLICT DO NOTHING
       RETURNING id, name, description, website, owner_id, created_at`,
      [uuidv4(), record.name, record.description, record.website, record.ownerId]
    );
    return result.rows.length > 0 ? toPublisher(result.rows[0]) : null;
  }

  async updatePublisher(id: string, patch: PublisherDetailsPatch): Promise<Publisher | null> {
    if (!isUuid(id)) return null;
    try {
      const result = await this.db.query(
        `UPDATE publishers
         SET name = COALESCE($2, name),
             description = COALESCE($3, description),
             website = COALESCE($4, website)
         WHERE id = $1`,
        [id, patch.name ?? null, patch.description ?? null, patch.website ?? null]
      );
      return result.rowCount ? this.getPublisher(id) : null;
    } catch (err) {
      // Renamed onto a name another house took after the caller's check
      if (isUniqueViolation(err)) return null;
      throw err;
    }
  }

  async getPublisher(id: string): Promise<Publisher | null> {
    if (!isUuid(id)) return null;
    const result = await this.db.query(`${PUBLISHER_SELECT} WHERE p.id = $1`, [id]);
    return result.rows.length > 0 ? toPublisher(result.rows[0]) : null;
  }

  async findPublisherByName(name: string): Promise<Publisher | null> {
    const result = await this.db.query(`${PUBLISHER_SELECT} WHERE lower(p.name) = lower($1)`, [name]);
    return result.rows.length > 0 ? toPublisher(result.rows[0]) : null;
  }

  async findPublisherOwnedBy(userId: string): Promise<Publisher | null> {
    const result = await this.db.query(
      `${PUBLISHER_SELECT} WHERE p.owner_id = $1 ORDER BY p.created_at LIMIT 1`,
      [userId]
    );
    return result.rows.length > 0 ? toPublisher(result.rows[0]) : null;
  }

  async listPublishers(): Promise<Publisher[]> {
    const result = await this.db.query(`${PUBLISHER_SELECT} ORDER BY p.name`);
    return result.rows.map(toPublisher);
  }

  async listPublishersEditedBy(userId: string): Promise<Publisher[]> {
    const result = await this.db.query(
      `${PUBLISHER_SELECT}
       WHERE EXISTS (SELECT 1 FROM publisher_members m
                     WHERE m.publisher_id = p.id AND m.user_id = $1 AND m.team_role = 'editor')
       ORDER BY p.name`,
      [userId]
    );
    return result.rows.map(toPublisher);
  }

  async addPublisherMember(publisherId: string, userId: string, role: TeamRole): Promise<boolean> {
    const result = await this.db.query(
      `INSERT INTO publisher_members (publisher_id, user_id, team_role)
       VALUES ($1, $2, $3)
       ON CONFLICT DO NOTHING`,
      [publisherId, userId, role]
    );
    return (result.rowCount ?? 0) > 0;
  }

  // ── Categories ──────────────────────────────────────────────────────

  async listCategories(): Promise<Category[]> {
    const result = await this.db.query(`SELECT id, name FROM categories ORDER BY name`);
    return result.rows.map((row) => ({ id: String(row.id), name: String(row.name) }));
  }

  async getCategory(id: string): Promise<Category | null> {
    if (!isUuid(id)) return null;
    const result = await this.db.query(`SELECT id, name FROM categories WHERE id = $1`, [id]);
    return result.rows.length > 0
      ? { id: String(result.rows[0].id), name: String(result.rows[0].name) }
      : null;
  }

  // ── Articles ────────────────────────────────────────────────────────

  async insertArticle(record: NewArticleRecord): Promise<Article> {
    const result = await this.db.query(
      `INSERT INTO articles
         (id, author_id, publisher_id, category_id, title, summary, content, hero_image, status)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, 'draft')
       RETURNING *`,
      [
        uuidv4(), record.authorId, record.publisherId, record.categoryId,
        record.title, record.summary, record.content, record.heroImage ?? null,
      ]
    );
    return toArticle(result.rows[0]);
  }

  async getArticle(id: string): Promise<Article | null> {
    if (!isUuid(id)) return null;
    const result = await this.db.query(`SELECT * FROM articles WHERE id = $1`, [id]);
    return result.rows.length > 0 ? toArticle(result.rows[0]) : null;
  }

  async listArticles(filter: ArticleFilter): Promise<Page<Article>> {
    const conditions: string[] = [];
    const params: unknown[] = [];
    let paramIndex = 1;

    if (filter.status && filter.visibleToEditorOf) {
      conditions.push(`(a.status = $${paramIndex++} OR a.publisher_id = ANY($${paramIndex++}::uuid[]))`);
      params.push(filter.status, filter.visibleToEditorOf);
    } else if (filter.status) {
      conditions.push(`a.status = $${paramIndex++}`);
      params.push(filter.status);
    } else if (filter.visibleToEditorOf) {
      conditions.push(`a.publisher_id = ANY($${paramIndex++}::uuid[])`);
      params.push(filter.visibleToEditorOf);
    }
    if (filter.authorId) {
      conditions.push(`a.author_id = $${paramIndex++}`);
      params.push(filter.authorId);
    }
    if (filter.publisherId) {
      conditions.push(`a.publisher_id = $${paramIndex++}`);
      params.push(filter.publisherId);
    }
    if (filter.categoryName) {
      conditions.push(`c.name = $${paramIndex++}`);
      params.push(filter.categoryName);
    }
    if (filter.publisherName) {
      conditions.push(`p.name = $${paramIndex++}`);
      params.push(filter.publisherName);
    }
    if (filter.text) {
      conditions.push(`(a.title ILIKE $${paramIndex} OR a.content ILIKE $${paramIndex})`);
      paramIndex++;
      params.push(likePattern(filter.text));
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    params.push(filter.limit, filter.offset);

    const result = await this.db.query(
      `SELECT a.*, COUNT(*) OVER () AS total_count
       FROM articles a
       LEFT JOIN categories c ON c.id = a.category_id
       LEFT JOIN publishers p ON p.id = a.publisher_id
       ${where}
       ORDER BY a.created_at DESC, a.id DESC
       LIMIT $${paramIndex++} OFFSET $${paramIndex++}`,
      params
    );

    return {
      rows: result.rows.map(toArticle),
      total: result.rows.length > 0 ? Number(result.rows[0].total_count) : 0,
    };
  }

  async saveArticleIfStatus(next: Article, expected: ArticleStatus): Promise<Article | null> {
    const result = await this.db.query(
      `UPDATE articles
       SET title = $2, summary = $3, content = $4, category_id = $5,
           status = $6, reviewed_by = $7, reviewed_at = $8, updated_at = $9
       WHERE id = $1 AND status = $10
       RETURNING *`,
      [
        next.id, next.title, next.summary, next.content, next.categoryId,
        next.status, next.reviewedBy, next.reviewedAt, next.updatedAt, expected,
      ]
    );
    return result.rows.length > 0 ? toArticle(result.rows[0]) : null;
  }

  async countArticlesByPublisher(publisherId: string): Promise<number> {
    const result = await this.db.query(
      `SELECT COUNT(*)::int AS count FROM articles WHERE publisher_id = $1`,
      [publisherId]
    );
    return Number(result.rows[0]?.count ?? 0);
  }

  // ── Newsletters ─────────────────────────────────────────────────────

  async insertNewsletter(record: NewNewsletterRecord): Promise<Newsletter> {
    const result = await this.db.query(
      `INSERT INTO newsletters (id, author_id, publisher_id, title, content, cover_image)
       VALUES ($1, $2, $3, $4, $5, $6)
       RETURNING *`,
      [uuidv4(), record.authorId, record.publisherId, record.title, record.content, record.coverImage ?? null]
    );
    return toNewsletter(result.rows[0]);
  }

  async getNewsletter(id: string): Promise<Newsletter | null> {
    if (!isUuid(id)) return null;
    const result = await this.db.query(`SELECT * FROM newsletters WHERE id = $1`, [id]);
    return result.rows.length > 0 ? toNewsletter(result.rows[0]) : null;
  }

  async listNewsletters(filter: NewsletterFilter): Promise<Newsletter[]> {
    const conditions: string[] = [];
    const params: unknown[] = [];
    let paramIndex = 1;

    if (filter.authorId) {
      conditions.push(`author_id = $${paramIndex++}`);
      params.push(filter.authorId);
    }
    if (filter.publisherId) {
      conditions.push(`publisher_id = $${paramIndex++}`);
      params.push(filter.publisherId);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    params.push(filter.limit);

    const result = await this.db.query(
      `SELECT * FROM newsletters ${where}
       ORDER BY created_at DESC, id DESC
       LIMIT $${paramIndex}`,
      params
    );
    return result.rows.map(toNewsletter);
  }

  async listNewslettersInScope(
    publisherIds: string[],
    journalistIds: string[],
    limit: number,
  ): Promise<Newsletter[]> {
    const result = await this.db.query(
      `SELECT DISTINCT n.* FROM newsletters n
       WHERE n.publisher_id = ANY($1::uuid[]) OR n.author_id = ANY($2::uuid[])
       ORDER BY n.created_at DESC, n.id DESC
       LIMIT $3`,
      [publisherIds, journalistIds, limit]
    );
    return result.rows.map(toNewsletter);
  }

  // ── Subscriptions ───────────────────────────────────────────────────

  async insertSubscription(
    readerId: string,
    target: SubscriptionTarget,
  ): Promise<{ subscription: Subscription; created: boolean }> {
    const [column, targetId] = target.kind === 'publisher'
      ? ['publisher_id', target.publisherId]
      : ['journalist_id', target.journalistId];

    try {
      const inserted = await this.db.query(
        `INSERT INTO subscriptions (id, reader_id, ${column})
         VALUES ($1, $2, $3)
         ON CONFLICT (reader_id, ${column}) WHERE ${column} IS NOT NULL DO NOTHING
         RETURNING *`,
        [uuidv4(), readerId, targetId]
      );
      if (inserted.rows.length > 0) {
        return { subscription: toSubscription(inserted.rows[0]), created: true };
      }
    } catch (err) {
      if (!isUniqueViolation(err)) throw err;
    }

    const existing = await this.db.query(
      `SELECT * FROM subscriptions WHERE reader_id = $1 AND ${column} = $2`,
      [readerId, targetId]
    );
    if (existing.rows.length === 0) {
      throw new Error(`Subscription conflict for reader ${readerId} but no existing row`);
    }
    return { subscription: toSubscription(existing.rows[0]), created: false };
  }

  async getSubscription(id: string): Promise<Subscription | null> {
    if (!isUuid(id)) return null;
    const result = await this.db.query(`SELECT * FROM subscriptions WHERE id = $1`, [id]);
    return result.rows.length > 0 ? toSubscription(result.rows[0]) : null;
  }

  async listSubscriptions(readerId: string): Promise<Subscription[]> {
    const result = await this.db.query(
      `SELECT * FROM subscriptions WHERE reader_id = $1 ORDER BY created_at, id`,
      [readerId]
    );
    return result.rows.map(toSubscription);
  }

  async deleteSubscription(id: string): Promise<void> {
    await this.db.query(`DELETE FROM subscriptions WHERE id = $1`, [id]);
  }

  async countPublisherSubscribers(publisherId: string): Promise<number> {
    const result = await this.db.query(
      `SELECT COUNT(*)::int AS count FROM subscriptions WHERE publisher_id = $1`,
      [publisherId]
    );
    return Number(result.rows[0]?.count ?? 0);
  }

  // ── Password reset tokens ───────────────────────────────────────────

  async insertResetToken(userId: string, token: string): Promise<PasswordResetToken> {
    const result = await this.db.query(
      `INSERT INTO password_reset_tokens (id, user_id, token)
       VALUES ($1, $2, $3)
       RETURNING *`,
      [uuidv4(), userId, token]
    );
    return toResetToken(result.rows[0]);
  }

  async getResetToken(token: string): Promise<PasswordResetToken | null> {
    const result = await this.db.query(`SELECT * FROM password_reset_tokens WHERE token = $1`, [token]);
    return result.rows.length > 0 ? toResetToken(result.rows[0]) : null;
  }

  async consumeResetToken(token: string): Promise<boolean> {
    const result = await this.db.query(
      `UPDATE password_reset_tokens SET is_used = true
       WHERE token = $1 AND is_used = false`,
      [token]
    );
    return (result.rowCount ?? 0) > 0;
  }

  // ── Audit ───────────────────────────────────────────────────────────

  async appendAuditRecord(record: AuditRecord): Promise<void> {
    await this.db.query(
      `INSERT INTO audit_trail
         (id, category, event_type, actor_id, actor_role,
          target_type, target_id, metadata, event_hash, event_time)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)`,
      [
        record.id,
        record.category,
        record.eventType,
        record.actorId,
        record.actorRole,
        record.targetType,
        record.targetId,
        JSON.stringify(record.metadata),
        record.eventHash,
        record.occurredAt,
      ]
    );
  }
}
