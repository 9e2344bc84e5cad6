// =============================================================================
// GAZETTE - Password Reset
//
// Tokens are single-use and expire after a configured window. Requesting a
// reset answers the same way whether or not the address belongs to an
// account, and whether or not the email could be sent; delivery failures
// are only logged.
// =============================================================================

import { randomBytes } from 'crypto';
import { PasswordResetToken, User } from '../../types/publishing';
import { Result, invalid, notFound, ok } from '../../types/result';
import { IPublishingStore } from '../../types/store';
import { config } from '../../config';
import { errorMessage, log } from '../../utils/log';
import { recordAuditEvent } from '../audit';
import { hashPassword } from '../accounts';
import { IMailer } from './mailer';

export { ConsoleMailer } from './mailer';
export type { IMailer, MailMessage } from './mailer';

const TOKEN_BYTES = 32;

export function generateResetToken(): string {
  return randomBytes(TOKEN_BYTES).toString('base64url');
}

/** Unused and younger than the expiry window. */
export function isValid(
  token: PasswordResetToken,
  now: Date = new Date(),
  ttlMinutes: number = config.passwordReset.ttlMinutes,
): boolean {
  if (token.isUsed) return false;
  const ageMs = now.getTime() - token.createdAt.getTime();
  return ageMs >= 0 && ageMs <= ttlMinutes * 60 * 1000;
}

export function resetLink(token: string): string {
  return `${config.siteUrl}/reset-password/${encodeURIComponent(token)}/`;
}

/**
 * Issue a token and mail the link. The result never reveals whether the
 * address matched an account or whether the mail went out, and both paths
 * return after the same single lookup: issuing and delivery run detached.
 */
export async function requestPasswordReset(
  store: IPublishingStore,
  mailer: IMailer,
  email: string,
): Promise<{ requested: true }> {
  const user = await store.getUserByEmail(email.trim().toLowerCase());
  if (!user) {
    log.debug('PasswordReset', 'Reset requested for unknown address');
    return { requested: true };
  }

  sendResetEmail(store, mailer, user).catch((err: unknown) => {
    log.error('PasswordReset', 'Email sending failed', { userId: user.id, error: errorMessage(err) });
  });

  return { requested: true };
}

async function sendResetEmail(store: IPublishingStore, mailer: IMailer, user: User): Promise<void> {
  const token = await store.insertResetToken(user.id, generateResetToken());
  await mailer.send({
    to: user.email,
    subject: 'Password Reset Request',
    text: `Click the link to reset your password: ${resetLink(token.token)}`,
  });
}

/** Look up a token and confirm it can still be used. */
export async function checkResetToken(
  store: IPublishingStore,
  token: string,
  now: Date = new Date(),
): Promise<Result<PasswordResetToken>> {
  const record = await store.getResetToken(token);
  if (!record || !isValid(record, now)) return notFound('reset_token');
  return ok(record);
}

export async function resetPassword(
  store: IPublishingStore,
  params: { token: string; password: string; confirmation: string; now?: Date },
): Promise<Result<{ userId: string }>> {
  if (params.password.length < config.auth.minPasswordLength) return invalid('password');
  if (params.password !== params.confirmation) return invalid('confirmation');

  const checked = await checkResetToken(store, params.token, params.now);
  if (!checked.ok) return checked;

  // Consume first: of two concurrent resets only one gets past this line.
  if (!(await store.consumeResetToken(params.token))) {
    return notFound('reset_token');
  }

  await store.updatePasswordHash(checked.value.userId, await hashPassword(params.password));

  const user = await store.getUser(checked.value.userId);
  await recordAuditEvent(store, {
    category: 'account',
    eventType: 'user.password_reset',
    actor: user,
    targetType: 'user',
    targetId: checked.value.userId,
  });

  return ok({ userId: checked.value.userId });
}
