// =============================================================================
// GAZETTE - Test Suite 11: Hero & Cover Images
// =============================================================================

import fs from 'fs';
import path from 'path';
import { config } from '../src/config';
import { imageExtension } from '../src/middleware/image-upload';
import { User } from '../src/types/publishing';
import { api, json, startServer, TestServer, tokenFor } from './helpers';
import { seedUser } from './support/fixtures';

const STORED_PNG = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}\.png$/;

interface Attachment {
  field: string;
  type: string;
  content: string;
  name: string;
}

function multipart(fields: Record<string, string>, attachment?: Attachment): FormData {
  const form = new FormData();
  for (const [key, value] of Object.entries(fields)) {
    form.append(key, value);
  }
  if (attachment) {
    form.append(attachment.field, new Blob([attachment.content], { type: attachment.type }), attachment.name);
  }
  return form;
}

function png(field: string): Attachment {
  return { field, type: 'image/png', content: '\x89PNG\r\n\x1a\nfake-pixels', name: 'lights.png' };
}

function storedFiles(): string[] {
  return fs.existsSync(config.uploads.dir) ? fs.readdirSync(config.uploads.dir) : [];
}

const ARTICLE_FIELDS = { title: 'Harbour lights', content: 'The lamps were relit.' };

describe('Image Types', () => {
  test('the four web image types are accepted', () => {
    expect(imageExtension('image/jpeg')).toBe('.jpg');
    expect(imageExtension('image/png')).toBe('.png');
    expect(imageExtension('image/gif')).toBe('.gif');
    expect(imageExtension('image/webp')).toBe('.webp');
  });

  test('anything else is refused', () => {
    expect(imageExtension('image/svg+xml')).toBeNull();
    expect(imageExtension('application/pdf')).toBeNull();
  });
});

describe('Image Uploads over HTTP', () => {
  let server: TestServer;
  let journalist: User;

  beforeAll(async () => {
    server = await startServer();
    journalist = await seedUser(server.store, 'journalist');
  });

  afterAll(async () => {
    await server.close();
  });

  async function post(route: string, form: FormData, actor: User): Promise<Response> {
    return fetch(`${server.baseUrl}${route}`, {
      method: 'POST',
      headers: { Authorization: `Bearer ${tokenFor(actor)}` },
      body: form,
    });
  }

  test('article with a hero image stores and serves the file', async () => {
    const res = await post('/api/articles', multipart(ARTICLE_FIELDS, png('heroImage')), journalist);
    expect(res.status).toBe(201);

    const article = await json(res);
    expect(article.title).toBe('Harbour lights');
    expect(article.heroImage).toMatch(STORED_PNG);
    expect(fs.existsSync(path.join(config.uploads.dir, article.heroImage))).toBe(true);

    const served = await fetch(`${server.baseUrl}/media/${article.heroImage}`);
    expect(served.status).toBe(200);
    expect(served.headers.get('content-type')).toBe('image/png');
  });

  test('JSON creation still works and has no hero image', async () => {
    const res = await api(server, 'POST', '/api/articles', ARTICLE_FIELDS, tokenFor(journalist));
    expect(res.status).toBe(201);
    expect((await json(res)).heroImage).toBeNull();
  });

  test('newsletter with a cover image', async () => {
    const form = multipart({ title: 'Weekly tides', content: 'High water at noon.' }, png('coverImage'));
    const res = await post('/api/newsletters', form, journalist);
    expect(res.status).toBe(201);
    expect((await json(res)).coverImage).toMatch(STORED_PNG);
  });

  test('non-image type is refused', async () => {
    const pdf = { field: 'heroImage', type: 'application/pdf', content: '%PDF-1.4', name: 'notes.pdf' };
    const res = await post('/api/articles', multipart(ARTICLE_FIELDS, pdf), journalist);
    expect(res.status).toBe(400);
    expect(await json(res)).toEqual({ error: 'ValidationFailed', field: 'heroImage' });
  });

  test('image over 5 MB is refused', async () => {
    const huge = {
      field: 'heroImage',
      type: 'image/jpeg',
      content: 'x'.repeat(5 * 1024 * 1024 + 1),
      name: 'huge.jpg',
    };
    const res = await post('/api/articles', multipart(ARTICLE_FIELDS, huge), journalist);
    expect(res.status).toBe(400);
    expect(await json(res)).toEqual({ error: 'ValidationFailed', field: 'heroImage' });
  });

  test('file under another field name is refused', async () => {
    const res = await post('/api/articles', multipart(ARTICLE_FIELDS, png('coverImage')), journalist);
    expect(res.status).toBe(400);
    expect(await json(res)).toEqual({ error: 'ValidationFailed', field: 'heroImage' });
  });

  test('refused creation leaves no stored file', async () => {
    const reader = await seedUser(server.store, 'reader');
    const before = storedFiles().length;

    const res = await post('/api/articles', multipart(ARTICLE_FIELDS, png('heroImage')), reader);
    expect(res.status).toBe(403);
    expect(await json(res)).toEqual({ error: 'Forbidden', reason: 'not_journalist' });
    expect(storedFiles()).toHaveLength(before);
  });
});
