// =============================================================================
// GAZETTE - Newsletter Feed Resolution
//
// A reader's feed is the union of newsletters from subscribed publishers and
// subscribed journalists, deduplicated, newest first, capped.
// =============================================================================

import { Newsletter, Subscription } from '../../types/publishing';

export interface SubscriptionScope {
  publisherIds: string[];
  journalistIds: string[];
}

/** Split subscriptions into the two kinds of followed source. */
export function partitionSubscriptions(subscriptions: Subscription[]): SubscriptionScope {
  const publisherIds = new Set<string>();
  const journalistIds = new Set<string>();

  for (const { target } of subscriptions) {
    switch (target.kind) {
      case 'publisher':
        publisherIds.add(target.publisherId);
        break;
      case 'journalist':
        journalistIds.add(target.journalistId);
        break;
    }
  }

  return { publisherIds: [...publisherIds], journalistIds: [...journalistIds] };
}

export function isInScope(newsletter: Newsletter, scope: SubscriptionScope): boolean {
  return (
    (newsletter.publisherId !== null && scope.publisherIds.includes(newsletter.publisherId)) ||
    scope.journalistIds.includes(newsletter.authorId)
  );
}

/** Newest first; ties broken by id so repeated calls agree. */
export function compareNewest(a: Newsletter, b: Newsletter): number {
  const delta = b.createdAt.getTime() - a.createdAt.getTime();
  if (delta !== 0) return delta;
  return a.id < b.id ? 1 : a.id > b.id ? -1 : 0;
}

/**
 * Filter candidates down to the reader's feed. Candidates may come from
 * several queries and contain duplicates or out-of-scope rows.
 */
export function selectVisibleNewsletters(
  candidates: Newsletter[],
  scope: SubscriptionScope,
  limit: number,
): Newsletter[] {
  const byId = new Map<string, Newsletter>();
  for (const newsletter of candidates) {
    if (isInScope(newsletter, scope) && !byId.has(newsletter.id)) {
      byId.set(newsletter.id, newsletter);
    }
  }
  return [...byId.values()].sort(compareNewest).slice(0, Math.max(0, limit));
}
