// =============================================================================
// GAZETTE - Subscription Services
//
// Readers follow publishing houses or individual journalists. Following the
// same source twice is a no-op reported as `already_subscribed`; holding a
// publisher and one of its journalists at once is allowed, and the feed
// deduplicates the overlap.
// =============================================================================

import { authorize } from '../../authorization/gate';
import { Newsletter, Subscription, SubscriptionTarget, User } from '../../types/publishing';
import { Result, fail, notFound, ok } from '../../types/result';
import { IPublishingStore } from '../../types/store';
import { config } from '../../config';
import { recordAuditEvent } from '../audit';
import { isJournalist, isReader } from '../membership/model';
import { partitionSubscriptions, selectVisibleNewsletters } from './resolver';

export { partitionSubscriptions, selectVisibleNewsletters, compareNewest } from './resolver';

/** Raw subscribe request: callers pass whichever ids the form carried. */
export interface SubscribeRequest {
  publisherId?: string | null;
  journalistId?: string | null;
}

export type SubscribeOutcome = 'subscribed' | 'already_subscribed';

/** Exactly one of publisher/journalist, or AmbiguousTarget. */
export function parseSubscriptionTarget(request: SubscribeRequest): Result<SubscriptionTarget> {
  const publisherId = request.publisherId || null;
  const journalistId = request.journalistId || null;

  if (publisherId && !journalistId) return ok({ kind: 'publisher', publisherId });
  if (journalistId && !publisherId) return ok({ kind: 'journalist', journalistId });
  return fail({ kind: 'AmbiguousTarget' });
}

export async function subscribe(
  store: IPublishingStore,
  params: { reader: User; request: SubscribeRequest },
): Promise<Result<{ outcome: SubscribeOutcome; subscription: Subscription }>> {
  const { reader } = params;

  const decision = authorize(reader, 'subscription:create', null);
  if (!decision.allowed) return fail({ kind: 'Forbidden', reason: decision.reason });

  const target = parseSubscriptionTarget(params.request);
  if (!target.ok) return target;

  if (target.value.kind === 'publisher') {
    if (!(await store.getPublisher(target.value.publisherId))) return notFound('publisher');
  } else {
    const journalist = await store.getUser(target.value.journalistId);
    if (!journalist) return notFound('user');
    if (!isJournalist(journalist)) return fail({ kind: 'RoleMismatch' });
  }

  const { subscription, created } = await store.insertSubscription(reader.id, target.value);
  if (!created) {
    return ok({ outcome: 'already_subscribed', subscription });
  }

  await recordAuditEvent(store, {
    category: 'subscription',
    eventType: 'subscription.created',
    actor: reader,
    targetType: 'subscription',
    targetId: subscription.id,
    metadata: { ...target.value },
  });

  return ok({ outcome: 'subscribed', subscription });
}

export async function unsubscribe(
  store: IPublishingStore,
  params: { reader: User; subscriptionId: string },
): Promise<Result<Subscription>> {
  const subscription = await store.getSubscription(params.subscriptionId);
  if (!subscription) return notFound('subscription');

  const decision = authorize(params.reader, 'subscription:delete', subscription);
  if (!decision.allowed) {
    return decision.reason === 'not_subscription_owner'
      ? fail({ kind: 'NotOwner' })
      : fail({ kind: 'Forbidden', reason: decision.reason });
  }

  await store.deleteSubscription(subscription.id);

  await recordAuditEvent(store, {
    category: 'subscription',
    eventType: 'subscription.deleted',
    actor: params.reader,
    targetType: 'subscription',
    targetId: subscription.id,
  });

  return ok(subscription);
}

export async function listSubscriptions(
  store: IPublishingStore,
  reader: User,
): Promise<Result<Subscription[]>> {
  if (!isReader(reader)) return fail({ kind: 'Forbidden', reason: 'not_reader' });
  return ok(await store.listSubscriptions(reader.id));
}

/**
 * The reader's newsletter feed: subscribed publishers' and journalists'
 * newsletters, newest first.
 */
export async function resolveVisibleNewsletters(
  store: IPublishingStore,
  reader: User,
  options: { limit?: number } = {},
): Promise<Newsletter[]> {
  const limit = options.limit ?? config.feeds.newsletterFeedLimit;
  const scope = partitionSubscriptions(await store.listSubscriptions(reader.id));

  if (scope.publisherIds.length === 0 && scope.journalistIds.length === 0) {
    return [];
  }

  const candidates = await store.listNewslettersInScope(scope.publisherIds, scope.journalistIds, limit);
  return selectVisibleNewsletters(candidates, scope, limit);
}
