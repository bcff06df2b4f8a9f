/**
 * Audit Logger
 *
 * All agreement transitions, negotiation steps and enforcement decisions
 * are logged and irreversible in audit history.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  Agreement,
  AuditEvent,
  AuditEventType,
  AuditQueryOptions,
  ExtensionApproval,
} from '../types';

/** Compliance transitions recorded by the tracker */
export type ComplianceAuditType =
  | AuditEventType.AGREEMENT_WARNING
  | AuditEventType.AGREEMENT_EXPIRED
  | AuditEventType.AGREEMENT_VIOLATED
  | AuditEventType.AGREEMENT_COMPLETED;

/** Negotiation steps */
export type NegotiationAuditType =
  | AuditEventType.NEGOTIATION_STARTED
  | AuditEventType.NEGOTIATION_ROUND
  | AuditEventType.NEGOTIATION_DECLINED
  | AuditEventType.NEGOTIATION_ABANDONED;

/** Enforcement steps */
export type EnforcementAuditType =
  | AuditEventType.GRACE_PERIOD_STARTED
  | AuditEventType.ENFORCEMENT_EXECUTED
  | AuditEventType.ENFORCEMENT_FAILED;

export class AuditLogger {
  private events: AuditEvent[] = [];

  /**
   * Logs agreement creation
   */
  logAgreementCreated(agreement: Agreement, actor: string): void {
    this.log({
      event_type: AuditEventType.AGREEMENT_CREATED,
      subject_id: agreement.agreement_id,
      actor,
      details: {
        event_type: agreement.event_type,
        subject_key: agreement.subject_key,
        agreed_duration_seconds: agreement.agreed_duration_seconds,
        outcome: agreement.outcome,
        expires_at: agreement.expires_at.toISOString(),
      },
    });
  }

  /**
   * Logs an approved extension
   */
  logAgreementExtended(
    agreement: Agreement,
    additionalSeconds: number,
    approval: ExtensionApproval
  ): void {
    this.log({
      event_type: AuditEventType.AGREEMENT_EXTENDED,
      subject_id: agreement.agreement_id,
      actor: approval.approved_by,
      details: {
        additional_seconds: additionalSeconds,
        agreed_duration_seconds: agreement.agreed_duration_seconds,
        expires_at: agreement.expires_at.toISOString(),
        user_text: approval.user_text,
      },
    });
  }

  /**
   * Logs deactivation (completion, enforcement, supersession)
   */
  logAgreementDeactivated(agreement: Agreement, actor: string, reason: string): void {
    this.log({
      event_type: AuditEventType.AGREEMENT_DEACTIVATED,
      subject_id: agreement.agreement_id,
      actor,
      reason,
      details: {
        is_violated: agreement.is_violated,
        violation_count: agreement.violation_count,
      },
    });
  }

  /**
   * Logs a compliance transition observed by the tracker
   */
  logComplianceTransition(
    type: ComplianceAuditType,
    agreement: Agreement,
    details: Record<string, unknown> = {}
  ): void {
    this.log({
      event_type: type,
      subject_id: agreement.agreement_id,
      actor: 'compliance-tracker',
      details: {
        subject_key: agreement.subject_key,
        expires_at: agreement.expires_at.toISOString(),
        ...details,
      },
    });
  }

  /**
   * Logs a negotiation step
   */
  logNegotiation(
    type: NegotiationAuditType,
    sessionId: string,
    details: Record<string, unknown> = {}
  ): void {
    this.log({
      event_type: type,
      subject_id: sessionId,
      actor: 'negotiation-engine',
      details,
    });
  }

  /**
   * Logs an enforcement step
   */
  logEnforcement(
    type: EnforcementAuditType,
    agreementId: string,
    details: Record<string, unknown> = {},
    reason?: string
  ): void {
    this.log({
      event_type: type,
      subject_id: agreementId,
      actor: 'enforcement-controller',
      reason,
      details,
    });
  }

  /**
   * Logs capability resolution events (fallbacks and misses)
   */
  logCapability(
    type: AuditEventType.CAPABILITY_FALLBACK | AuditEventType.CAPABILITY_UNAVAILABLE,
    capability: string,
    details: Record<string, unknown> = {}
  ): void {
    this.log({
      event_type: type,
      subject_id: capability,
      actor: 'capability-registry',
      details,
    });
  }

  /**
   * Logs a custom event
   */
  logCustomEvent(name: string, details: Record<string, unknown>, subjectId = 'system'): void {
    this.log({
      event_type: AuditEventType.CUSTOM,
      subject_id: subjectId,
      actor: 'system',
      details: {
        name,
        ...details,
      },
    });
  }

  /**
   * Core logging method
   */
  private log(eventData: Omit<AuditEvent, 'event_id' | 'timestamp'>): void {
    const event: AuditEvent = {
      event_id: uuidv4(),
      timestamp: new Date(),
      ...eventData,
    };

    this.events.push(event);
  }

  /**
   * Queries audit log
   * Results keep insertion order, newest first
   */
  query(options: AuditQueryOptions = {}): AuditEvent[] {
    const { start_time: startTime, end_time: endTime } = options;
    let results = [...this.events];

    if (options.subject_id) {
      results = results.filter((e) => e.subject_id === options.subject_id);
    }

    if (options.event_type) {
      results = results.filter((e) => e.event_type === options.event_type);
    }

    if (options.actor) {
      results = results.filter((e) => e.actor === options.actor);
    }

    if (startTime) {
      results = results.filter((e) => e.timestamp >= startTime);
    }

    if (endTime) {
      results = results.filter((e) => e.timestamp <= endTime);
    }

    results.reverse();

    // Apply pagination
    const offset = options.offset ?? 0;
    const limit = options.limit ?? results.length;

    return results.slice(offset, offset + limit);
  }

  /**
   * Gets all events for an agreement
   */
  getAgreementHistory(agreementId: string): AuditEvent[] {
    return this.query({ subject_id: agreementId });
  }

  /**
   * Gets all violations
   */
  getViolations(options: Omit<AuditQueryOptions, 'event_type'> = {}): AuditEvent[] {
    return this.query({
      ...options,
      event_type: AuditEventType.AGREEMENT_VIOLATED,
    });
  }

  /**
   * Export audit log (immutable)
   */
  export(): AuditEvent[] {
    return [...this.events];
  }

  /**
   * Get event count
   */
  getEventCount(): number {
    return this.events.length;
  }
}
