/**
 * Agreement Lifecycle Manager
 *
 * Manages agreement state transitions:
 * Created (active) → Violated → Deactivated
 *                  ↘ Deactivated (completed)
 *
 * Agreements are mutated in place and never re-activated; a new agreement
 * must be created instead.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  Agreement,
  AgreementDraft,
  ExtensionApproval,
} from '../types';
import { AgreementValidator } from './validator';
import { AuditLogger } from '../audit/logger';
import {
  ErrorCategory,
  ErrorCode,
  ErrorSeverity,
  FocusAgreementsError,
  InvalidAgreementStateError,
} from '../errors';

export interface AgreementLifecycleOptions {
  /** Time source (default: wall clock) */
  clock?: () => Date;
}

export class AgreementLifecycleManager {
  private clock: () => Date;

  constructor(
    private auditLogger: AuditLogger,
    options: AgreementLifecycleOptions = {}
  ) {
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Creates a new active agreement
   */
  create(draft: AgreementDraft, actor: string = 'negotiation-engine'): Agreement {
    const createdAt = draft.created_at ?? this.clock();
    const agreement: Agreement = {
      agreement_id: uuidv4(),
      subject_key: draft.subject_key ?? null,
      event_type: draft.event_type,
      severity: draft.severity,
      agreed_duration_seconds: draft.agreed_duration_seconds,
      created_at: createdAt,
      expires_at: new Date(createdAt.getTime() + draft.agreed_duration_seconds * 1000),
      negotiation_transcript: [...(draft.transcript ?? [])],
      outcome: draft.outcome,
      is_active: true,
      is_violated: false,
      violation_count: 0,
      metadata: { ...(draft.metadata ?? {}) },
    };

    const validation = AgreementValidator.validate(agreement);
    if (!validation.valid) {
      throw new FocusAgreementsError(
        `Invalid agreement draft: ${validation.errors.join(', ')}`,
        ErrorCode.AGREEMENT_INVALID,
        ErrorCategory.VALIDATION,
        ErrorSeverity.MEDIUM,
        { operation: 'create' }
      );
    }

    this.auditLogger.logAgreementCreated(agreement, actor);

    return agreement;
  }

  /**
   * Records a violation on an active agreement
   */
  markViolated(agreement: Agreement): Agreement {
    this.requireActive(agreement, 'mark violated');

    agreement.is_violated = true;
    agreement.violation_count += 1;

    return agreement;
  }

  /**
   * Deactivates an agreement (completed, enforced or superseded).
   * Returns false when it was already inactive.
   */
  deactivate(agreement: Agreement, actor: string, reason: string): boolean {
    if (!agreement.is_active) {
      return false;
    }

    agreement.is_active = false;
    this.auditLogger.logAgreementDeactivated(agreement, actor, reason);

    return true;
  }

  /**
   * Extends an active agreement on the user's approval.
   * The only path that changes the agreed duration.
   */
  extend(
    agreement: Agreement,
    additionalSeconds: number,
    approval: ExtensionApproval
  ): Agreement {
    this.requireActive(agreement, 'extend');

    if (agreement.is_violated) {
      throw new InvalidAgreementStateError(
        'Cannot extend a violated agreement awaiting enforcement',
        { agreement_id: agreement.agreement_id, operation: 'extend' }
      );
    }

    if (!Number.isFinite(additionalSeconds) || additionalSeconds <= 0) {
      throw new InvalidAgreementStateError(
        `Extension must be a positive number of seconds, got ${additionalSeconds}`,
        { agreement_id: agreement.agreement_id, operation: 'extend' }
      );
    }

    if (!approval.approved_by || approval.approved_by.trim() === '') {
      throw new InvalidAgreementStateError(
        'Extension requires the approving user',
        { agreement_id: agreement.agreement_id, operation: 'extend' }
      );
    }

    agreement.agreed_duration_seconds += additionalSeconds;
    agreement.expires_at = new Date(agreement.expires_at.getTime() + additionalSeconds * 1000);

    const previous = agreement.metadata['extensions'];
    agreement.metadata['extensions'] = [
      ...(Array.isArray(previous) ? previous : []),
      {
        additional_seconds: additionalSeconds,
        approved_by: approval.approved_by,
        approved_at: this.clock().toISOString(),
      },
    ];

    this.auditLogger.logAgreementExtended(agreement, additionalSeconds, approval);

    return agreement;
  }

  /**
   * Checks if the agreed time is up
   */
  isExpired(agreement: Agreement, now: Date = this.clock()): boolean {
    return now.getTime() >= agreement.expires_at.getTime();
  }

  /**
   * Seconds left before expiry (0 once expired)
   */
  secondsRemaining(agreement: Agreement, now: Date = this.clock()): number {
    return Math.max(0, (agreement.expires_at.getTime() - now.getTime()) / 1000);
  }

  /**
   * Share of the agreed time already used, 0-100
   */
  progressPercentage(agreement: Agreement, now: Date = this.clock()): number {
    const total = agreement.expires_at.getTime() - agreement.created_at.getTime();
    if (total <= 0) {
      return 100;
    }

    const elapsed = now.getTime() - agreement.created_at.getTime();
    return Math.min(100, Math.max(0, Math.floor((elapsed / total) * 100)));
  }

  /**
   * One-line description for logs
   */
  describe(agreement: Agreement): string {
    let status = agreement.is_active ? 'ACTIVE' : 'INACTIVE';
    if (agreement.is_violated) {
      status = 'VIOLATED';
    }

    const target = agreement.subject_key ?? 'device';
    return `Agreement(${agreement.event_type}, ${target}, ${agreement.agreed_duration_seconds}s, ${status})`;
  }

  private requireActive(agreement: Agreement, operation: string): void {
    if (!agreement.is_active) {
      throw new InvalidAgreementStateError(
        `Cannot ${operation} an inactive agreement`,
        { agreement_id: agreement.agreement_id, operation }
      );
    }
  }
}
