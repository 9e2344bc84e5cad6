// =============================================================================
// GAZETTE - Access Control Gate
//
// Single decision point consulted before every state-changing operation.
// Pure: reads the actor and target snapshots, never mutates or queries.
//
// Rules (per action):
//   article:create          journalist
//   article:edit            author, or editor of the article's publisher
//   article:approve/reject  editor of the article's publisher (publisher set)
//   article:view            published, or author / publisher editor / staff
//   newsletter:create       journalist
//   publisher:manage_team   owner of the publisher
//   publisher:create/edit   staff
//   subscription:create     reader
//   subscription:delete     reader owning the subscription
// =============================================================================

import { Action, ActionTargets, ArticleScope, Decision, DenialReason } from '../types/authorization';
import { Publisher, Subscription, User } from '../types/publishing';
import {
  isEditor,
  isEditorOf,
  isJournalist,
  isOwnerOf,
  isReader,
  isStaff,
} from '../services/membership/model';

const ALLOW: Decision = { allowed: true };

function deny(reason: DenialReason): Decision {
  return { allowed: false, reason };
}

type Rule<A extends Action> = (actor: User, target: ActionTargets[A]) => Decision;

function canReview(actor: User, { publisher }: ArticleScope): Decision {
  if (publisher === null) return deny('no_publisher_scope');
  if (!isEditor(actor)) return deny('not_editor');
  if (!isEditorOf(actor, publisher)) return deny('not_publisher_editor');
  return ALLOW;
}

function onlyJournalists(actor: User): Decision {
  return isJournalist(actor) ? ALLOW : deny('not_journalist');
}

function onlyStaff(actor: User): Decision {
  return isStaff(actor) ? ALLOW : deny('not_staff');
}

const RULES: { [A in Action]: Rule<A> } = {
  'article:create': onlyJournalists,

  'article:edit': (actor, { article, publisher }) =>
    article.authorId === actor.id || isEditorOf(actor, publisher)
      ? ALLOW
      : deny('not_author_or_publisher_editor'),

  'article:approve': canReview,
  'article:reject': canReview,

  'article:view': (actor, { article, publisher }) => {
    if (article.status === 'published') return ALLOW;
    if (isReader(actor)) return deny('not_visible');
    if (article.authorId === actor.id || isEditorOf(actor, publisher) || isStaff(actor)) {
      return ALLOW;
    }
    return deny('not_visible');
  },

  'newsletter:create': onlyJournalists,

  'publisher:manage_team': (actor, publisher: Publisher) =>
    isOwnerOf(actor, publisher) ? ALLOW : deny('not_publisher_owner'),

  'publisher:create': onlyStaff,
  'publisher:edit': onlyStaff,

  'subscription:create': (actor) => (isReader(actor) ? ALLOW : deny('not_reader')),

  'subscription:delete': (actor, subscription: Subscription) => {
    if (!isReader(actor)) return deny('not_reader');
    if (subscription.readerId !== actor.id) return deny('not_subscription_owner');
    return ALLOW;
  },
};

/**
 * Decide whether `actor` may perform `action` on `target`.
 * Denials always carry a reason code.
 */
export function authorize<A extends Action>(
  actor: User,
  action: A,
  target: ActionTargets[A],
): Decision {
  const rule: Rule<A> = RULES[action];
  return rule(actor, target);
}
