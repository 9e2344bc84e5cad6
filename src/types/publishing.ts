// =============================================================================
// GAZETTE - Publishing Entities
//
// Snapshots handed to the core by the persistence layer. The core never
// mutates these in place; transitions return new snapshots.
// =============================================================================

import { UserRole } from './roles';

export interface User {
  id: string;
  username: string;
  email: string;
  firstName: string;
  lastName: string;
  role: UserRole;
  createdAt: Date;
}

/** Publishing house with its owner and team */
export interface Publisher {
  id: string;
  name: string;
  description: string;
  website: string;
  /** Set once at creation */
  ownerId: string;
  editorIds: string[];
  journalistIds: string[];
  createdAt: Date;
}

export interface Category {
  id: string;
  name: string;
}

/**
 * Article lifecycle:
 *   draft → pending → published
 *                   → rejected
 * `published` and `rejected` are terminal.
 */
export type ArticleStatus = 'draft' | 'pending' | 'published' | 'rejected';

export const TERMINAL_STATUSES: readonly ArticleStatus[] = ['published', 'rejected'];

export interface Article {
  id: string;
  authorId: string;
  publisherId: string | null;
  categoryId: string | null;
  title: string;
  summary: string;
  content: string;
  /** Stored file name under the upload directory */
  heroImage: string | null;
  status: ArticleStatus;
  /** Editor who approved or rejected the article */
  reviewedBy: string | null;
  reviewedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

/** Content-only fields an author or editor may change */
export interface ArticleContentPatch {
  title?: string;
  summary?: string;
  content?: string;
  categoryId?: string | null;
}

export interface NewArticle {
  title: string;
  summary: string;
  content: string;
  publisherId: string | null;
  categoryId: string | null;
  heroImage?: string | null;
}

export interface Newsletter {
  id: string;
  authorId: string;
  publisherId: string | null;
  title: string;
  content: string;
  coverImage: string | null;
  createdAt: Date;
}

export interface NewNewsletter {
  title: string;
  content: string;
  publisherId: string | null;
  coverImage?: string | null;
}

/** Exactly one of publisher or journalist */
export type SubscriptionTarget =
  | { kind: 'publisher'; publisherId: string }
  | { kind: 'journalist'; journalistId: string };

export interface Subscription {
  id: string;
  readerId: string;
  target: SubscriptionTarget;
  createdAt: Date;
}

export interface PasswordResetToken {
  id: string;
  userId: string;
  token: string;
  createdAt: Date;
  isUsed: boolean;
}

export function isApproved(article: Article): boolean {
  return article.status === 'published';
}

export function isTerminal(status: ArticleStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}
