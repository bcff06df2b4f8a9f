/**
 * Audit and Logging Types
 *
 * Every agreement transition, negotiation step and enforcement action is
 * logged and irreversible in audit history.
 */

/**
 * Audit event types
 */
export enum AuditEventType {
  AGREEMENT_CREATED = 'agreement_created',
  AGREEMENT_EXTENDED = 'agreement_extended',
  AGREEMENT_WARNING = 'agreement_warning',
  AGREEMENT_EXPIRED = 'agreement_expired',
  AGREEMENT_VIOLATED = 'agreement_violated',
  AGREEMENT_COMPLETED = 'agreement_completed',
  AGREEMENT_DEACTIVATED = 'agreement_deactivated',
  NEGOTIATION_STARTED = 'negotiation_started',
  NEGOTIATION_ROUND = 'negotiation_round',
  NEGOTIATION_DECLINED = 'negotiation_declined',
  NEGOTIATION_ABANDONED = 'negotiation_abandoned',
  GRACE_PERIOD_STARTED = 'grace_period_started',
  ENFORCEMENT_EXECUTED = 'enforcement_executed',
  ENFORCEMENT_FAILED = 'enforcement_failed',
  CAPABILITY_FALLBACK = 'capability_fallback',
  CAPABILITY_UNAVAILABLE = 'capability_unavailable',
  CUSTOM = 'custom',
}

/**
 * Audit event entry
 */
export interface AuditEvent {
  /** Unique event identifier */
  event_id: string;
  /** Event timestamp */
  timestamp: Date;
  /** Type of audit event */
  event_type: AuditEventType;
  /** Agreement or negotiation session this event relates to */
  subject_id: string;
  /** Actor who triggered the event */
  actor: string;
  /** Reason for the transition, when there is one */
  reason?: string;
  /** Additional event details */
  details: Record<string, unknown>;
}

/**
 * Audit log query options
 */
export interface AuditQueryOptions {
  subject_id?: string;
  event_type?: AuditEventType;
  actor?: string;
  start_time?: Date;
  end_time?: Date;
  limit?: number;
  offset?: number;
}
