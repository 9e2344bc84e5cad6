// =============================================================================
// GAZETTE - Article Routes
//
//   GET    /api/articles              - Articles visible to the caller (paged)
//   GET    /api/articles/search       - Public search over published articles
//   POST   /api/articles              - Create draft (journalist), optional heroImage
//   GET    /api/articles/:id          - Single article, subject to view rule
//   PATCH  /api/articles/:id          - Edit content (author / house editor)
//   POST   /api/articles/:id/submit   - draft → pending (author)
//   POST   /api/articles/:id/approve  - pending → published (house editor)
//   POST   /api/articles/:id/reject   - pending → rejected (house editor)
// =============================================================================

import { Router } from 'express';
import { authenticate } from '../middleware/authenticate';
import { discardUpload, imageUpload } from '../middleware/image-upload';
import { listArticlesFor, searchPublishedArticles } from '../services/catalogue';
import {
  approveArticle,
  createArticle,
  editArticle,
  rejectArticle,
  submitArticle,
  viewArticle,
} from '../services/workflow';
import { AppDependencies } from '../types/app';
import { Article, ArticleContentPatch, User } from '../types/publishing';
import { Result } from '../types/result';
import { IPublishingStore } from '../types/store';
import {
  nullableStringField,
  queryPage,
  queryString,
  route,
  sendError,
  stringField,
  withActor,
} from './handlers';

type Transition = (
  store: IPublishingStore,
  params: { actor: User; articleId: string },
) => Promise<Result<Article>>;

export function articleRoutes({ store }: AppDependencies): Router {
  const router = Router();

  // Registered before authenticate and before /:id
  router.get('/search', route(async (req, res) => {
    res.json(await searchPublishedArticles(store, {
      query: queryString(req.query.q),
      category: queryString(req.query.category),
      publisher: queryString(req.query.publisher),
      page: queryPage(req.query.page),
    }));
  }));

  router.use(authenticate(store));

  router.get('/', withActor(async (req, res, actor) => {
    res.json(await listArticlesFor(store, { actor, page: queryPage(req.query.page) }));
  }));

  router.post('/', imageUpload('heroImage'), withActor(async (req, res, actor) => {
    const result = await createArticle(store, {
      actor,
      draft: {
        title: stringField(req.body, 'title') ?? '',
        summary: stringField(req.body, 'summary') ?? '',
        content: stringField(req.body, 'content') ?? '',
        publisherId: nullableStringField(req.body, 'publisherId') ?? null,
        categoryId: nullableStringField(req.body, 'categoryId') ?? null,
        heroImage: req.file?.filename ?? null,
      },
    });
    if (!result.ok) {
      await discardUpload(req);
      sendError(res, result.error);
      return;
    }
    res.status(201).json(result.value);
  }));

  router.get('/:id', withActor(async (req, res, actor) => {
    const result = await viewArticle(store, { actor, articleId: req.params.id });
    if (!result.ok) {
      sendError(res, result.error);
      return;
    }
    res.json(result.value);
  }));

  router.patch('/:id', withActor(async (req, res, actor) => {
    const patch: ArticleContentPatch = {
      title: stringField(req.body, 'title'),
      summary: stringField(req.body, 'summary'),
      content: stringField(req.body, 'content'),
      categoryId: nullableStringField(req.body, 'categoryId'),
    };
    const result = await editArticle(store, { actor, articleId: req.params.id, patch });
    if (!result.ok) {
      sendError(res, result.error);
      return;
    }
    res.json(result.value);
  }));

  const transitions: Record<string, Transition> = {
    submit: submitArticle,
    approve: approveArticle,
    reject: rejectArticle,
  };

  for (const [name, transition] of Object.entries(transitions)) {
    router.post(`/:id/${name}`, withActor(async (req, res, actor) => {
      const result = await transition(store, { actor, articleId: req.params.id });
      if (!result.ok) {
        sendError(res, result.error);
        return;
      }
      res.json(result.value);
    }));
  }

  return router;
}
