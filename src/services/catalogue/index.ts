// =============================================================================
// GAZETTE - Content Catalogue
//
// Read paths over articles and newsletters, plus newsletter creation
// (newsletters have no workflow: created means visible).
//
// Article listing by role, the same rows authorize('article:view') admits:
//   reader      published only
//   journalist  own articles, any status
//   editor      published, plus everything of the houses they edit
//   publisher   published only (house drafts belong to its editors)
//   staff       everything
// =============================================================================

import { authorize } from '../../authorization/gate';
import { Article, Category, NewNewsletter, Newsletter, User } from '../../types/publishing';
import { Result, fail, invalid, notFound, ok } from '../../types/result';
import { ArticleFilter, IPublishingStore, Page } from '../../types/store';
import { config } from '../../config';
import { resolveVisibleNewsletters } from '../subscriptions';

export interface PageRequest {
  page?: number;
}

export interface ArticlePage extends Page<Article> {
  page: number;
  pageCount: number;
}

function paging(request: PageRequest): { page: number; limit: number; offset: number } {
  const page = Math.max(1, Math.floor(request.page ?? 1));
  const limit = config.feeds.articlePageSize;
  return { page, limit, offset: (page - 1) * limit };
}

function toArticlePage(result: Page<Article>, page: number, limit: number): ArticlePage {
  return {
    ...result,
    page,
    pageCount: Math.max(1, Math.ceil(result.total / limit)),
  };
}

async function visibilityFilter(
  store: IPublishingStore,
  actor: User,
): Promise<Omit<ArticleFilter, 'limit' | 'offset'>> {
  switch (actor.role) {
    case 'reader':
    case 'publisher':
      return { status: 'published' };
    case 'journalist':
      return { authorId: actor.id };
    case 'editor': {
      const houses = await store.listPublishersEditedBy(actor.id);
      return { status: 'published', visibleToEditorOf: houses.map((p) => p.id) };
    }
    case 'staff':
      return {};
  }
}

export async function listArticlesFor(
  store: IPublishingStore,
  params: { actor: User } & PageRequest,
): Promise<ArticlePage> {
  const { page, limit, offset } = paging(params);
  const filter = await visibilityFilter(store, params.actor);
  return toArticlePage(await store.listArticles({ ...filter, limit, offset }), page, limit);
}

/** Public search over published articles. */
export async function searchPublishedArticles(
  store: IPublishingStore,
  params: { query?: string; category?: string; publisher?: string } & PageRequest,
): Promise<ArticlePage> {
  const { page, limit, offset } = paging(params);
  const result = await store.listArticles({
    status: 'published',
    text: params.query?.trim() || undefined,
    categoryName: params.category || undefined,
    publisherName: params.publisher || undefined,
    limit,
    offset,
  });
  return toArticlePage(result, page, limit);
}

export async function createNewsletter(
  store: IPublishingStore,
  params: { actor: User; draft: NewNewsletter },
): Promise<Result<Newsletter>> {
  const { actor, draft } = params;

  const decision = authorize(actor, 'newsletter:create', null);
  if (!decision.allowed) return fail({ kind: 'Forbidden', reason: decision.reason });

  if (!draft.title.trim()) return invalid('title');
  if (!draft.content.trim()) return invalid('content');
  if (draft.publisherId && !(await store.getPublisher(draft.publisherId))) {
    return notFound('publisher');
  }

  const newsletter = await store.insertNewsletter({
    authorId: actor.id,
    publisherId: draft.publisherId,
    title: draft.title.trim(),
    content: draft.content,
    coverImage: draft.coverImage ?? null,
  });
  return ok(newsletter);
}

export async function getNewsletter(
  store: IPublishingStore,
  newsletterId: string,
): Promise<Result<Newsletter>> {
  const newsletter = await store.getNewsletter(newsletterId);
  return newsletter ? ok(newsletter) : notFound('newsletter');
}

/**
 * Journalists see their own newsletters, readers their subscription feed,
 * everyone else (including anonymous visitors) the most recent ones.
 */
export async function listNewslettersFor(
  store: IPublishingStore,
  actor: User | null,
): Promise<Newsletter[]> {
  if (actor?.role === 'journalist') {
    return store.listNewsletters({ authorId: actor.id, limit: config.feeds.newsletterFeedLimit });
  }
  if (actor?.role === 'reader') {
    return resolveVisibleNewsletters(store, actor);
  }
  return store.listNewsletters({ limit: config.feeds.recentNewsletterLimit });
}

export function listCategories(store: IPublishingStore): Promise<Category[]> {
  return store.listCategories();
}
