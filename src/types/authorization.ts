// =============================================================================
// GAZETTE - Access Control Types
//
// Every content operation asks the gate for a Decision before it mutates
// anything. The action name selects the shape of the target.
// =============================================================================

import { Article, Publisher, Subscription } from './publishing';

/** Article together with the publishing house that scopes it */
export interface ArticleScope {
  article: Article;
  /** Null when the article is unaffiliated */
  publisher: Publisher | null;
}

/**
 * Target shape per action. Actions with no target entity take `null`.
 */
export interface ActionTargets {
  'article:create': null;
  'article:edit': ArticleScope;
  'article:approve': ArticleScope;
  'article:reject': ArticleScope;
  'article:view': ArticleScope;
  'newsletter:create': null;
  'publisher:manage_team': Publisher;
  'publisher:create': null;
  'publisher:edit': Publisher;
  'subscription:create': null;
  'subscription:delete': Subscription;
}

export type Action = keyof ActionTargets;

/** Machine-readable denial codes. */
export type DenialReason =
  | 'not_journalist'
  | 'not_author_or_publisher_editor'
  | 'no_publisher_scope'
  | 'not_editor'
  | 'not_publisher_editor'
  | 'not_visible'
  | 'not_publisher_owner'
  | 'not_staff'
  | 'not_reader'
  | 'not_subscription_owner';

export type Decision =
  | { allowed: true }
  | { allowed: false; reason: DenialReason };
