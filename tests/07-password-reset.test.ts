// =============================================================================
// GAZETTE - Test Suite 07: Password Reset
// =============================================================================

import bcrypt from 'bcryptjs';
import {
  checkResetToken,
  generateResetToken,
  isValid,
  requestPasswordReset,
  resetLink,
  resetPassword,
} from '../src/services/password-reset';
import { PasswordResetToken } from '../src/types/publishing';
import { api, json, startServer, TestServer } from './helpers';
import { FailingMailer, RecordingMailer, seedUser, settle, StalledMailer } from './support/fixtures';
import { MemoryPublishingStore } from './support/memory-store';

const ISSUED = new Date('2024-06-01T08:00:00Z');

function token(fields: Partial<PasswordResetToken> = {}): PasswordResetToken {
  return { id: 't1', userId: 'u1', token: 'reset-token', createdAt: ISSUED, isUsed: false, ...fields };
}

function minutesAfter(minutes: number): Date {
  return new Date(ISSUED.getTime() + minutes * 60_000);
}

describe('Reset Token Validity', () => {
  test('valid inside the window', () => {
    expect(isValid(token(), minutesAfter(0), 60)).toBe(true);
    expect(isValid(token(), minutesAfter(59), 60)).toBe(true);
    expect(isValid(token(), minutesAfter(60), 60)).toBe(true);
  });

  test('expired after the window', () => {
    expect(isValid(token(), minutesAfter(61), 60)).toBe(false);
  });

  test('used tokens are never valid', () => {
    expect(isValid(token({ isUsed: true }), minutesAfter(1), 60)).toBe(false);
  });

  test('tokens from the future are not valid', () => {
    expect(isValid(token(), minutesAfter(-1), 60)).toBe(false);
  });

  test('generated tokens are url-safe and distinct', () => {
    const a = generateResetToken();
    const b = generateResetToken();
    expect(a).toMatch(/^[A-Za-z0-9_-]{43}$/);
    expect(a).not.toBe(b);
  });

  test('reset link is built from the site URL', () => {
    expect(resetLink('abc_123')).toBe('http://gazette.test/reset-password/abc_123/');
  });
});

describe('Reset Flow', () => {
  test('request mails a link carrying the stored token', async () => {
    const store = new MemoryPublishingStore();
    const mailer = new RecordingMailer();
    const user = await seedUser(store, 'reader', 'forgetful');

    expect(await requestPasswordReset(store, mailer, '  Forgetful@Example.com ')).toEqual({ requested: true });
    await settle();

    expect(mailer.sent).toHaveLength(1);
    expect(mailer.sent[0].to).toBe('forgetful@example.com');
    const [stored] = [...store.resetTokens.values()];
    expect(stored.userId).toBe(user.id);
    expect(mailer.sent[0].text).toContain(resetLink(stored.token));
  });

  test('unknown address looks the same and sends nothing', async () => {
    const store = new MemoryPublishingStore();
    const mailer = new RecordingMailer();

    expect(await requestPasswordReset(store, mailer, 'nobody@example.com')).toEqual({ requested: true });
    await settle();
    expect(mailer.sent).toEqual([]);
    expect(store.resetTokens.size).toBe(0);
  });

  test('mail failure is hidden from the caller', async () => {
    const store = new MemoryPublishingStore();
    const mailer = new FailingMailer();
    await seedUser(store, 'reader', 'unlucky');

    expect(await requestPasswordReset(store, mailer, 'unlucky@example.com')).toEqual({ requested: true });
    await settle();
    expect(mailer.attempts).toBe(1);
    expect(store.resetTokens.size).toBe(1);
  });

  test('known address answers without waiting for delivery', async () => {
    const store = new MemoryPublishingStore();
    const mailer = new StalledMailer();
    await seedUser(store, 'reader', 'patient');

    expect(await requestPasswordReset(store, mailer, 'patient@example.com')).toEqual({ requested: true });
    expect(mailer.sent).toEqual([]);

    mailer.release();
    await settle();
    expect(mailer.sent.map((m) => m.to)).toEqual(['patient@example.com']);
  });

  test('reset stores a new hash and consumes the token', async () => {
    const store = new MemoryPublishingStore();
    const user = await seedUser(store, 'reader');
    await store.insertResetToken(user.id, 'single-use');

    const result = await resetPassword(store, {
      token: 'single-use',
      password: 'new-test-password',
      confirmation: 'new-test-password',
    });
    expect(result).toEqual({ ok: true, value: { userId: user.id } });

    const hash = await store.getPasswordHash(user.id);
    expect(hash && (await bcrypt.compare('new-test-password', hash))).toBe(true);
    expect(store.auditEvents()).toEqual(['user.password_reset']);

    expect(await resetPassword(store, {
      token: 'single-use',
      password: 'another-password',
      confirmation: 'another-password',
    })).toEqual({ ok: false, error: { kind: 'NotFound', entity: 'reset_token' } });
  });

  test('expired token is refused', async () => {
    const store = new MemoryPublishingStore(() => ISSUED);
    const user = await seedUser(store, 'reader');
    await store.insertResetToken(user.id, 'stale');

    expect(await checkResetToken(store, 'stale', minutesAfter(61)))
      .toEqual({ ok: false, error: { kind: 'NotFound', entity: 'reset_token' } });
    expect(await resetPassword(store, {
      token: 'stale',
      password: 'new-test-password',
      confirmation: 'new-test-password',
      now: minutesAfter(61),
    })).toEqual({ ok: false, error: { kind: 'NotFound', entity: 'reset_token' } });
  });

  test('password rules are checked before the token', async () => {
    const store = new MemoryPublishingStore();
    expect(await resetPassword(store, { token: 'missing', password: 'short', confirmation: 'short' }))
      .toEqual({ ok: false, error: { kind: 'ValidationFailed', field: 'password' } });
    expect(await resetPassword(store, { token: 'missing', password: 'long-enough', confirmation: 'different' }))
      .toEqual({ ok: false, error: { kind: 'ValidationFailed', field: 'confirmation' } });
  });
});

describe('Password Reset over HTTP', () => {
  let server: TestServer;
  let mailer: RecordingMailer;

  beforeAll(async () => {
    mailer = new RecordingMailer();
    server = await startServer({ mailer });
  });

  afterAll(async () => {
    await server.close();
  });

  test('request, check, reset, then log in with the new password', async () => {
    await api(server, 'POST', '/api/auth/register', {
      username: 'resetter',
      email: 'resetter@example.com',
      firstName: 'Re',
      lastName: 'Setter',
      password: 'test-password',
      role: 'reader',
    });

    const requested = await api(server, 'POST', '/api/auth/password-reset', { email: 'resetter@example.com' });
    expect(requested.status).toBe(202);
    expect(await json(requested)).toEqual({ requested: true });
    await settle();

    const [stored] = [...server.store.resetTokens.values()];
    const path = `/api/auth/password-reset/${stored.token}`;

    const checked = await api(server, 'GET', path);
    expect(checked.status).toBe(200);
    expect(await json(checked)).toEqual({ valid: true });

    const reset = await api(server, 'POST', path, { password: 'fresh-password', confirmation: 'fresh-password' });
    expect(reset.status).toBe(200);
    expect(await json(reset)).toEqual({ reset: true });

    const reused = await api(server, 'GET', path);
    expect(reused.status).toBe(404);

    const login = await api(server, 'POST', '/api/auth/login', { username: 'resetter', password: 'fresh-password' });
    expect(login.status).toBe(200);
  });

  test('unknown token returns 404', async () => {
    const res = await api(server, 'GET', '/api/auth/password-reset/not-issued');
    expect(res.status).toBe(404);
    expect(await json(res)).toEqual({ error: 'NotFound', entity: 'reset_token' });
  });

  test('missing email is a validation error', async () => {
    const res = await api(server, 'POST', '/api/auth/password-reset', {});
    expect(res.status).toBe(400);
    expect(await json(res)).toEqual({ error: 'ValidationFailed', field: 'email' });
  });
});
