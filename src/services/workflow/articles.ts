// =============================================================================
// GAZETTE - Article Workflow Service
//
// Loads the article and its publisher, runs the pure transition from
// ./state-machine, then persists with a compare-and-set on the status the
// transition was computed from. If another request moved the article in the
// meantime the write is refused:
//   approve/reject → AlreadyDecided
//   submit/edit    → InvalidTransition
// =============================================================================

import { authorize } from '../../authorization/gate';
import { ArticleScope } from '../../types/authorization';
import { Article, ArticleContentPatch, NewArticle, User } from '../../types/publishing';
import { Result, fail, invalid, notFound, ok } from '../../types/result';
import { IPublishingStore } from '../../types/store';
import { log } from '../../utils/log';
import { recordAuditEvent } from '../audit';
import * as machine from './state-machine';

/** Article with its publisher snapshot, or NotFound. */
export async function loadArticleScope(
  store: IPublishingStore,
  articleId: string,
): Promise<Result<ArticleScope>> {
  const article = await store.getArticle(articleId);
  if (!article) return notFound('article');

  const publisher = article.publisherId ? await store.getPublisher(article.publisherId) : null;
  return ok({ article, publisher });
}

/**
 * Create a draft. Only journalists may author articles; the publisher and
 * category, when given, must exist.
 */
export async function createArticle(
  store: IPublishingStore,
  params: { actor: User; draft: NewArticle },
): Promise<Result<Article>> {
  const { actor, draft } = params;

  const decision = authorize(actor, 'article:create', null);
  if (!decision.allowed) return fail({ kind: 'Forbidden', reason: decision.reason });

  if (!draft.title.trim()) return invalid('title');
  if (!draft.content.trim()) return invalid('content');

  if (draft.publisherId && !(await store.getPublisher(draft.publisherId))) {
    return notFound('publisher');
  }
  if (draft.categoryId && !(await store.getCategory(draft.categoryId))) {
    return notFound('category');
  }

  const article = await store.insertArticle({
    authorId: actor.id,
    publisherId: draft.publisherId,
    categoryId: draft.categoryId,
    title: draft.title.trim(),
    summary: draft.summary,
    content: draft.content,
    heroImage: draft.heroImage ?? null,
  });

  log.info('Workflow', 'Draft created', { articleId: article.id, authorId: actor.id });
  return ok(article);
}

export async function submitArticle(
  store: IPublishingStore,
  params: { actor: User; articleId: string },
): Promise<Result<Article>> {
  const scope = await loadArticleScope(store, params.articleId);
  if (!scope.ok) return scope;

  const next = machine.submit(scope.value.article, params.actor);
  if (!next.ok) return next;

  const saved = await store.saveArticleIfStatus(next.value, scope.value.article.status);
  if (!saved) return fail({ kind: 'InvalidTransition' });

  await recordAuditEvent(store, {
    category: 'workflow',
    eventType: 'article.submitted',
    actor: params.actor,
    targetType: 'article',
    targetId: saved.id,
    metadata: { publisherId: saved.publisherId },
  });

  return ok(saved);
}

export function approveArticle(
  store: IPublishingStore,
  params: { actor: User; articleId: string },
): Promise<Result<Article>> {
  return decideArticle(store, params, 'approve');
}

export function rejectArticle(
  store: IPublishingStore,
  params: { actor: User; articleId: string },
): Promise<Result<Article>> {
  return decideArticle(store, params, 'reject');
}

async function decideArticle(
  store: IPublishingStore,
  params: { actor: User; articleId: string },
  decision: 'approve' | 'reject',
): Promise<Result<Article>> {
  const scope = await loadArticleScope(store, params.articleId);
  if (!scope.ok) return scope;

  const next = decision === 'approve'
    ? machine.approve(scope.value, params.actor)
    : machine.reject(scope.value, params.actor);
  if (!next.ok) return next;

  // Only a still-pending row may be decided; a concurrent decision wins.
  const saved = await store.saveArticleIfStatus(next.value, 'pending');
  if (!saved) {
    log.warn('Workflow', 'Lost race on article decision', {
      articleId: params.articleId,
      editorId: params.actor.id,
      decision,
    });
    return fail({ kind: 'AlreadyDecided' });
  }

  await recordAuditEvent(store, {
    category: 'workflow',
    eventType: decision === 'approve' ? 'article.approved' : 'article.rejected',
    actor: params.actor,
    targetType: 'article',
    targetId: saved.id,
    metadata: { publisherId: saved.publisherId, authorId: saved.authorId },
  });

  log.info('Workflow', `Article ${saved.status}`, { articleId: saved.id, editorId: params.actor.id });
  return ok(saved);
}

export async function editArticle(
  store: IPublishingStore,
  params: { actor: User; articleId: string; patch: ArticleContentPatch },
): Promise<Result<Article>> {
  const { patch } = params;
  if (patch.title !== undefined && !patch.title.trim()) return invalid('title');
  if (patch.content !== undefined && !patch.content.trim()) return invalid('content');
  if (patch.categoryId && !(await store.getCategory(patch.categoryId))) {
    return notFound('category');
  }

  const scope = await loadArticleScope(store, params.articleId);
  if (!scope.ok) return scope;

  const next = machine.edit(scope.value, params.actor, patch);
  if (!next.ok) return next;

  const saved = await store.saveArticleIfStatus(next.value, scope.value.article.status);
  if (!saved) return fail({ kind: 'InvalidTransition' });
  return ok(saved);
}

/** Single article, subject to the view rule. */
export async function viewArticle(
  store: IPublishingStore,
  params: { actor: User; articleId: string },
): Promise<Result<Article>> {
  const scope = await loadArticleScope(store, params.articleId);
  if (!scope.ok) return scope;

  const decision = authorize(params.actor, 'article:view', scope.value);
  if (!decision.allowed) return fail({ kind: 'Forbidden', reason: decision.reason });
  return ok(scope.value.article);
}
