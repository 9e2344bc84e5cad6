// =============================================================================
// GAZETTE - Publisher Team Management
//
// The publisher dashboard flow: an owner adds registered editors and
// journalists to their house by username. The insert is idempotent at the
// persistence boundary, so a retried or concurrent request reports
// `already_member` instead of failing.
// =============================================================================

import { authorize } from '../../authorization/gate';
import { Article, Newsletter, Publisher, User } from '../../types/publishing';
import { TeamRole } from '../../types/roles';
import { Result, fail, notFound, ok } from '../../types/result';
import { IPublishingStore } from '../../types/store';
import { recordAuditEvent } from '../audit';
import { addMember, isPublisher } from './model';

export type TeamMemberOutcome = 'added' | 'already_member';

export async function addTeamMember(
  store: IPublishingStore,
  params: {
    actor: User;
    publisherId: string;
    username: string;
    role: TeamRole;
  },
): Promise<Result<{ outcome: TeamMemberOutcome; member: User }>> {
  const publisher = await store.getPublisher(params.publisherId);
  if (!publisher) return notFound('publisher');

  const decision = authorize(params.actor, 'publisher:manage_team', publisher);
  if (!decision.allowed) return fail({ kind: 'Forbidden', reason: decision.reason });

  const member = await store.getUserByUsername(params.username);
  if (!member) return notFound('user');

  const change = addMember(publisher, member, params.role);
  if (!change.ok) return change;
  if (change.value.outcome === 'already_member') {
    return ok({ outcome: 'already_member', member });
  }

  const inserted = await store.addPublisherMember(publisher.id, member.id, params.role);
  if (!inserted) {
    return ok({ outcome: 'already_member', member });
  }

  await recordAuditEvent(store, {
    category: 'membership',
    eventType: `publisher.${params.role}_added`,
    actor: params.actor,
    targetType: 'publisher',
    targetId: publisher.id,
    metadata: { memberId: member.id },
  });

  return ok({ outcome: 'added', member });
}

export interface PublisherDashboard {
  publisher: Publisher;
  editors: User[];
  journalists: User[];
  recentArticles: Article[];
  recentNewsletters: Newsletter[];
  articleCount: number;
  subscriberCount: number;
}

/**
 * Overview of the house owned by `actor`. Recent articles are the published
 * ones; drafts and pending work stay with the house editors.
 */
export async function getPublisherDashboard(
  store: IPublishingStore,
  actor: User,
): Promise<Result<PublisherDashboard>> {
  if (!isPublisher(actor)) {
    return fail({ kind: 'Forbidden', reason: 'not_publisher_owner' });
  }

  const publisher = await store.findPublisherOwnedBy(actor.id);
  if (!publisher) return notFound('publisher');

  const [editors, journalists, articles, recentNewsletters, articleCount, subscriberCount] =
    await Promise.all([
      loadUsers(store, publisher.editorIds),
      loadUsers(store, publisher.journalistIds),
      store.listArticles({ status: 'published', publisherId: publisher.id, limit: 10, offset: 0 }),
      store.listNewsletters({ publisherId: publisher.id, limit: 5 }),
      store.countArticlesByPublisher(publisher.id),
      store.countPublisherSubscribers(publisher.id),
    ]);

  return ok({
    publisher,
    editors,
    journalists,
    recentArticles: articles.rows,
    recentNewsletters,
    articleCount,
    subscriberCount,
  });
}

async function loadUsers(store: IPublishingStore, ids: string[]): Promise<User[]> {
  const users = await Promise.all(ids.map((id) => store.getUser(id)));
  return users.filter((u): u is User => u !== null);
}
