// =============================================================================
// GAZETTE - Test Suite 09: Catalogue & Search
// =============================================================================

import { listArticlesFor, searchPublishedArticles } from '../src/services/catalogue';
import { viewArticle } from '../src/services/workflow';
import { Article, User } from '../src/types/publishing';
import { api, json, startServer, TestServer, tokenFor } from './helpers';
import { SeededHouse, seedArticle, seedHouse, seedUser, steppingClock } from './support/fixtures';
import { MemoryPublishingStore } from './support/memory-store';

interface Catalogue {
  store: MemoryPublishingStore;
  quay: SeededHouse;
  hill: SeededHouse;
  articles: Record<'draft' | 'pending' | 'sport' | 'rival' | 'market' | 'freelance', Article>;
}

async function seedCatalogue(store: MemoryPublishingStore): Promise<Catalogue> {
  const quay = await seedHouse(store, 'Quay Gazette');
  const hill = await seedHouse(store, 'Hill Courier');
  const sport = store.addCategory('Sport');

  const articles = {
    draft: await seedArticle(store, quay.journalist, quay.publisher),
    pending: await seedArticle(store, quay.journalist, quay.publisher, { status: 'pending' }),
    sport: await seedArticle(store, quay.journalist, quay.publisher, {
      status: 'published',
      title: 'Regatta results',
      categoryId: sport.id,
    }),
    rival: await seedArticle(store, hill.journalist, hill.publisher, { status: 'pending' }),
    market: await seedArticle(store, hill.journalist, hill.publisher, {
      status: 'published',
      title: 'Market prices',
      content: 'After the regatta, prices rose.',
    }),
    freelance: await seedArticle(store, quay.journalist, null, { status: 'published', title: 'Freelance piece' }),
  };

  return { store, quay, hill, articles };
}

function ids(list: Article[]): string[] {
  return list.map((a) => a.id);
}

describe('Catalogue Visibility', () => {
  let catalogue: Catalogue;

  beforeAll(async () => {
    catalogue = await seedCatalogue(new MemoryPublishingStore(steppingClock()));
  });

  async function visibleTo(actor: User): Promise<string[]> {
    return ids((await listArticlesFor(catalogue.store, { actor })).rows);
  }

  test('readers see published articles, newest first', async () => {
    const reader = await seedUser(catalogue.store, 'reader');
    const { market, sport, freelance } = catalogue.articles;
    expect(await visibleTo(reader)).toEqual([freelance.id, market.id, sport.id]);
  });

  test('journalists see their own articles in every state', async () => {
    const { draft, pending, sport, freelance } = catalogue.articles;
    expect(await visibleTo(catalogue.quay.journalist)).toEqual([freelance.id, sport.id, pending.id, draft.id]);
  });

  test('editors see published articles plus everything of their houses', async () => {
    const { draft, pending, sport, market, freelance } = catalogue.articles;
    expect(await visibleTo(catalogue.quay.editor))
      .toEqual([freelance.id, market.id, sport.id, pending.id, draft.id]);
  });

  test('publisher owners see only published articles, their house included', async () => {
    const { sport, market, freelance } = catalogue.articles;
    expect(await visibleTo(catalogue.hill.owner)).toEqual([freelance.id, market.id, sport.id]);
  });

  test('every listed article passes the single-article view rule', async () => {
    for (const actor of [catalogue.quay.owner, catalogue.quay.editor, catalogue.quay.journalist]) {
      for (const articleId of await visibleTo(actor)) {
        expect((await viewArticle(catalogue.store, { actor, articleId })).ok).toBe(true);
      }
    }
  });

  test('staff see everything', async () => {
    const staff = await seedUser(catalogue.store, 'staff');
    const page = await listArticlesFor(catalogue.store, { actor: staff });
    expect(page.total).toBe(6);
    expect(page.pageCount).toBe(1);
  });
});

describe('Published Search', () => {
  let catalogue: Catalogue;

  beforeAll(async () => {
    catalogue = await seedCatalogue(new MemoryPublishingStore(steppingClock()));
  });

  test('text matches title or content, case-insensitively', async () => {
    const { market, sport } = catalogue.articles;
    const page = await searchPublishedArticles(catalogue.store, { query: 'REGATTA' });
    expect(ids(page.rows)).toEqual([market.id, sport.id]);
  });

  test('drafts and pending articles never match', async () => {
    const page = await searchPublishedArticles(catalogue.store, { query: 'Harbour bridge' });
    expect(page.rows).toEqual([]);
    expect(page.total).toBe(0);
  });

  test('filters by category and publisher name', async () => {
    const { sport, market } = catalogue.articles;
    expect(ids((await searchPublishedArticles(catalogue.store, { category: 'Sport' })).rows)).toEqual([sport.id]);
    expect(ids((await searchPublishedArticles(catalogue.store, { publisher: 'Hill Courier' })).rows))
      .toEqual([market.id]);
  });

  test('pages hold ten articles', async () => {
    const store = new MemoryPublishingStore(steppingClock());
    const journalist = await seedUser(store, 'journalist');
    for (let i = 0; i < 12; i++) {
      await seedArticle(store, journalist, null, { status: 'published', title: `Story ${i}` });
    }

    const second = await searchPublishedArticles(store, { page: 2 });
    expect(second.total).toBe(12);
    expect(second.page).toBe(2);
    expect(second.pageCount).toBe(2);
    expect(second.rows.map((a) => a.title)).toEqual(['Story 1', 'Story 0']);
  });
});

describe('Catalogue over HTTP', () => {
  let server: TestServer;
  let catalogue: Catalogue;

  beforeAll(async () => {
    const store = new MemoryPublishingStore(steppingClock());
    catalogue = await seedCatalogue(store);
    server = await startServer({ store });
  });

  afterAll(async () => {
    await server.close();
  });

  test('search is public', async () => {
    const res = await api(server, 'GET', '/api/articles/search?q=regatta&page=1');
    expect(res.status).toBe(200);

    const body = await json(res);
    expect(body.total).toBe(2);
    expect(body.page).toBe(1);
    expect(body.rows.map((a: { id: string }) => a.id)).toEqual([catalogue.articles.market.id, catalogue.articles.sport.id]);
  });

  test('nonsense page numbers fall back to the first page', async () => {
    const res = await api(server, 'GET', '/api/articles/search?page=-3');
    expect((await json(res)).page).toBe(1);
  });

  test('article list requires authentication', async () => {
    const res = await api(server, 'GET', '/api/articles');
    expect(res.status).toBe(401);
  });

  test('publisher owner gets no unpublished house articles', async () => {
    const res = await api(server, 'GET', '/api/articles', undefined, tokenFor(catalogue.quay.owner));
    expect(res.status).toBe(200);

    const body = await json(res);
    expect(body.total).toBe(3);
    expect(body.rows.map((a: { status: string }) => a.status)).toEqual(['published', 'published', 'published']);
  });

  test('article list is scoped to the caller', async () => {
    const res = await api(server, 'GET', '/api/articles', undefined, tokenFor(catalogue.quay.journalist));
    expect(res.status).toBe(200);
    expect((await json(res)).total).toBe(4);
  });
});
