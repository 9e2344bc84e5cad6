// =============================================================================
// GAZETTE - Audit Service
//
// Append-only trail of editorial and account events. Each record carries a
// SHA-512 hash of its contents so later tampering is detectable.
//
// Categories:
//   workflow:     article submissions, approvals, rejections
//   membership:   publisher team changes
//   subscription: reader follows and unfollows
//   account:      registrations, password resets
// =============================================================================

import { createHash } from 'crypto';
import { v4 as uuidv4 } from 'uuid';
import { User } from '../types/publishing';
import { AuditCategory, AuditRecord, IPublishingStore } from '../types/store';
import { log } from '../utils/log';

interface AuditEvent {
  category: AuditCategory;
  eventType: string;
  actor: User | null;
  targetType: string;
  targetId: string;
  metadata?: Record<string, unknown>;
}

/** Hash over the event fields, in a fixed key order. */
export function hashAuditEvent(record: Omit<AuditRecord, 'eventHash'>): string {
  const hashInput = JSON.stringify({
    id: record.id,
    timestamp: record.occurredAt.toISOString(),
    category: record.category,
    eventType: record.eventType,
    actorId: record.actorId,
    targetType: record.targetType,
    targetId: record.targetId,
    metadata: record.metadata,
  });
  return createHash('sha512').update(hashInput).digest('hex');
}

/**
 * Record an audit event. Returns the stored record.
 */
export async function recordAuditEvent(
  store: IPublishingStore,
  event: AuditEvent,
): Promise<AuditRecord> {
  const unhashed: Omit<AuditRecord, 'eventHash'> = {
    id: uuidv4(),
    category: event.category,
    eventType: event.eventType,
    actorId: event.actor?.id ?? null,
    actorRole: event.actor?.role ?? null,
    targetType: event.targetType,
    targetId: event.targetId,
    metadata: event.metadata ?? {},
    occurredAt: new Date(),
  };
  const record: AuditRecord = { ...unhashed, eventHash: hashAuditEvent(unhashed) };

  await store.appendAuditRecord(record);
  log.debug('Audit', record.eventType, { targetId: record.targetId });
  return record;
}
