// =============================================================================
// GAZETTE - Article Workflow State Machine
//
//   draft ──submit──▶ pending ──approve──▶ published
//                             └─reject───▶ rejected
//
// Published and rejected are terminal. There is no path back to draft;
// a rejected piece is rewritten as a new article.
//
// Every transition is a pure function of (article, actor, publisher) that
// returns the next snapshot. Persisting it, and re-checking the prior status
// at write time, is the caller's job (see ./articles.ts).
// =============================================================================

import { authorize } from '../../authorization/gate';
import { ArticleScope } from '../../types/authorization';
import { Article, ArticleContentPatch, ArticleStatus, User, isTerminal } from '../../types/publishing';
import { Result, fail, ok } from '../../types/result';

/** Legal edges of the state machine. */
export const TRANSITIONS: Readonly<Record<ArticleStatus, readonly ArticleStatus[]>> = {
  draft: ['pending'],
  pending: ['published', 'rejected'],
  published: [],
  rejected: [],
};

export function canTransition(from: ArticleStatus, to: ArticleStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

/** draft → pending. Only the author may submit. */
export function submit(article: Article, actor: User, now: Date = new Date()): Result<Article> {
  if (article.authorId !== actor.id) {
    return fail({ kind: 'NotOwner' });
  }
  if (!canTransition(article.status, 'pending')) {
    return fail({ kind: 'InvalidTransition' });
  }
  return ok({ ...article, status: 'pending', updatedAt: now });
}

/** pending → published, recording the approving editor. */
export function approve(scope: ArticleScope, actor: User, now: Date = new Date()): Result<Article> {
  return decide(scope, actor, 'published', now);
}

/** pending → rejected, recording the rejecting editor. */
export function reject(scope: ArticleScope, actor: User, now: Date = new Date()): Result<Article> {
  return decide(scope, actor, 'rejected', now);
}

function decide(
  scope: ArticleScope,
  actor: User,
  outcome: 'published' | 'rejected',
  now: Date,
): Result<Article> {
  const { article } = scope;

  // Unaffiliated articles have no editorial scope, whoever asks.
  if (scope.publisher === null) {
    return fail({ kind: 'NoPublisherScope' });
  }

  const decision = authorize(actor, outcome === 'published' ? 'article:approve' : 'article:reject', scope);
  if (!decision.allowed) {
    return fail({ kind: 'Forbidden', reason: decision.reason });
  }

  if (isTerminal(article.status)) {
    return fail({ kind: 'AlreadyDecided' });
  }
  if (!canTransition(article.status, outcome)) {
    return fail({ kind: 'InvalidTransition' });
  }

  return ok({
    ...article,
    status: outcome,
    reviewedBy: actor.id,
    reviewedAt: now,
    updatedAt: now,
  });
}

/**
 * Content-only change. Allowed while the article is not terminal, for the
 * author or an editor of its publisher. Status is never touched.
 */
export function edit(
  scope: ArticleScope,
  actor: User,
  patch: ArticleContentPatch,
  now: Date = new Date(),
): Result<Article> {
  const decision = authorize(actor, 'article:edit', scope);
  if (!decision.allowed) {
    return fail({ kind: 'Forbidden', reason: decision.reason });
  }

  const { article } = scope;
  if (isTerminal(article.status)) {
    return fail({ kind: 'InvalidTransition' });
  }

  return ok({
    ...article,
    title: patch.title ?? article.title,
    summary: patch.summary ?? article.summary,
    content: patch.content ?? article.content,
    categoryId: patch.categoryId === undefined ? article.categoryId : patch.categoryId,
    updatedAt: now,
  });
}
