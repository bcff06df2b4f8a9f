/**
 * Compliance Tracker
 *
 * Classifies every active agreement on each poll tick:
 *
 *   SAFE → WARNING → EXPIRED ─┬→ COMPLETED (no matching activity)
 *                             └→ VIOLATED  (activity past the grace period)
 *
 * Callbacks are edge-triggered and fire at most once per agreement.
 * One agreement failing never stops the others from being evaluated.
 */

import { v4 as uuidv4 } from 'uuid';
import { ActivitySignal, Agreement, AuditEventType } from '../types';
import { AuditLogger } from '../audit/logger';
import { AgreementLifecycleManager } from '../agreements/lifecycle';
import {
  CentralErrorHandler,
  ErrorCategory,
  ErrorCode,
  ErrorSeverity,
  FocusAgreementsError,
  MalformedActivitySignalError,
} from '../errors';
import {
  AgreementStatus,
  ComplianceHooks,
  ComplianceState,
  ComplianceTickResult,
  ComplianceTrackerConfig,
  ComplianceTransition,
  ComplianceTransitionType,
  DEFAULT_COMPLIANCE_CONFIG,
  TrackerSummary,
} from './types';

const SOURCE = 'compliance-tracker';

/** Which edges have already fired for an agreement */
interface FiredEdges {
  warning: boolean;
  expired: boolean;
  violation: boolean;
}

/** Grouping key for agreements governing the same subject */
function subjectGroup(agreement: Agreement): string {
  return agreement.subject_key === null ? '\u0000device' : agreement.subject_key.toLowerCase();
}

function byCreation(a: Agreement, b: Agreement): number {
  const delta = a.created_at.getTime() - b.created_at.getTime();
  if (delta !== 0) {
    return delta;
  }
  return a.agreement_id < b.agreement_id ? -1 : a.agreement_id > b.agreement_id ? 1 : 0;
}

export class ComplianceTracker {
  private agreements: Map<string, Agreement> = new Map();
  private fired: Map<string, FiredEdges> = new Map();
  private warningWindowMs: number;
  private gracePeriodMs: number;
  private clock: () => Date;

  constructor(
    private lifecycle: AgreementLifecycleManager,
    private auditLogger: AuditLogger,
    private errorHandler: CentralErrorHandler,
    config: ComplianceTrackerConfig = {}
  ) {
    this.warningWindowMs =
      (config.warningWindowSeconds ?? DEFAULT_COMPLIANCE_CONFIG.warningWindowSeconds) * 1000;
    this.gracePeriodMs =
      (config.gracePeriodSeconds ?? DEFAULT_COMPLIANCE_CONFIG.gracePeriodSeconds) * 1000;
    this.clock = config.clock ?? (() => new Date());
  }

  /**
   * Add an agreement to the working set
   */
  add(agreement: Agreement): void {
    this.agreements.set(agreement.agreement_id, agreement);
    if (!this.fired.has(agreement.agreement_id)) {
      this.fired.set(agreement.agreement_id, { warning: false, expired: false, violation: false });
    }
  }

  /**
   * Remove an agreement from the working set
   */
  remove(agreementId: string): boolean {
    this.fired.delete(agreementId);
    return this.agreements.delete(agreementId);
  }

  /**
   * Re-arm the warning and expiry callbacks after the agreement's
   * expiry moved
   */
  rearm(agreementId: string): boolean {
    const edges = this.fired.get(agreementId);
    if (!edges || edges.violation) {
      return false;
    }
    edges.warning = false;
    edges.expired = false;
    return true;
  }

  /**
   * Get a tracked agreement
   */
  get(agreementId: string): Agreement | null {
    return this.agreements.get(agreementId) ?? null;
  }

  /**
   * Active agreements in visit order
   */
  getActive(): Agreement[] {
    return this.ordered().filter((a) => a.is_active);
  }

  /**
   * Active agreements whose time is up
   */
  getExpired(now: Date = this.clock()): Agreement[] {
    return this.getActive().filter((a) => this.lifecycle.isExpired(a, now));
  }

  /**
   * Evaluate every active agreement against one activity signal
   */
  checkCompliance(signal: ActivitySignal | null, hooks: ComplianceHooks): ComplianceTickResult {
    const tickId = uuidv4();
    const transitions: ComplianceTransition[] = [];
    const errors: FocusAgreementsError[] = [];

    const malformed = this.validateSignal(signal);
    if (malformed) {
      errors.push(this.errorHandler.handleError(malformed));
      return {
        tick_id: tickId,
        observed_at: this.clock(),
        skipped: true,
        agreements_checked: 0,
        transitions,
        errors,
      };
    }

    const now = signal ? signal.observed_at : this.clock();
    const record = (agreement: Agreement, transition: ComplianceTransitionType): void => {
      transitions.push({ agreement_id: agreement.agreement_id, transition });
    };
    const fire = (agreement: Agreement, callback: () => void | Promise<void>): void => {
      this.invokeHook(agreement, callback, errors);
    };

    this.resolveOverlaps(hooks, record, fire);

    const active = this.getActive();
    for (const agreement of active) {
      try {
        this.evaluate(agreement, signal, now, hooks, record, fire);
      } catch (error) {
        errors.push(
          this.errorHandler.handleError(error, {
            agreement_id: agreement.agreement_id,
            operation: 'checkCompliance',
            source_component: SOURCE,
          })
        );
      }
    }

    return {
      tick_id: tickId,
      observed_at: now,
      skipped: false,
      agreements_checked: active.length,
      transitions,
      errors,
    };
  }

  /**
   * Drop inactive agreements from the working set
   * Returns how many were removed
   */
  cleanupInactive(): number {
    let removed = 0;
    for (const agreement of Array.from(this.agreements.values())) {
      if (!agreement.is_active) {
        this.remove(agreement.agreement_id);
        removed++;
      }
    }
    return removed;
  }

  /**
   * Status of one agreement, or null when not tracked
   */
  getStatus(agreementId: string, now: Date = this.clock()): AgreementStatus | null {
    const agreement = this.agreements.get(agreementId);
    if (!agreement) {
      return null;
    }

    return {
      agreement_id: agreement.agreement_id,
      subject_key: agreement.subject_key,
      event_type: agreement.event_type,
      state: this.stateAt(agreement, now),
      seconds_remaining: this.lifecycle.secondsRemaining(agreement, now),
      progress_percentage: this.lifecycle.progressPercentage(agreement, now),
      expires_at: agreement.expires_at,
      violation_count: agreement.violation_count,
    };
  }

  /**
   * Counts across the working set
   */
  getSummary(now: Date = this.clock()): TrackerSummary {
    const all = Array.from(this.agreements.values());

    return {
      total: all.length,
      active: all.filter((a) => a.is_active).length,
      expired: all.filter((a) => a.is_active && this.lifecycle.isExpired(a, now)).length,
      violated: all.filter((a) => a.is_violated).length,
      completed: all.filter((a) => !a.is_active && !a.is_violated).length,
      total_violations: all.reduce((sum, a) => sum + a.violation_count, 0),
    };
  }

  private evaluate(
    agreement: Agreement,
    signal: ActivitySignal | null,
    now: Date,
    hooks: ComplianceHooks,
    record: (agreement: Agreement, transition: ComplianceTransitionType) => void,
    fire: (agreement: Agreement, callback: () => void | Promise<void>) => void
  ): void {
    const edges = this.edgesFor(agreement);
    if (agreement.is_violated) {
      // Waiting on enforcement
      return;
    }

    const nowMs = now.getTime();
    const expiresMs = agreement.expires_at.getTime();

    if (nowMs < expiresMs - this.warningWindowMs) {
      return;
    }

    if (nowMs < expiresMs) {
      if (!edges.warning) {
        edges.warning = true;
        const remaining = this.lifecycle.secondsRemaining(agreement, now);
        this.auditLogger.logComplianceTransition(AuditEventType.AGREEMENT_WARNING, agreement, {
          seconds_remaining: remaining,
        });
        record(agreement, ComplianceTransitionType.WARNING);
        fire(agreement, () => hooks.onWarning(agreement, remaining));
      }
      return;
    }

    if (!edges.expired) {
      edges.expired = true;
      this.auditLogger.logComplianceTransition(AuditEventType.AGREEMENT_EXPIRED, agreement);
      record(agreement, ComplianceTransitionType.EXPIRED);
      fire(agreement, () => hooks.onExpired(agreement));
    }

    const active = this.matches(agreement, signal);
    const pastGrace = nowMs >= expiresMs + this.gracePeriodMs;

    if (!active) {
      this.complete(agreement, 'completed', ComplianceTransitionType.COMPLETED, hooks, record, fire);
      return;
    }

    if (pastGrace && !edges.violation) {
      edges.violation = true;
      this.lifecycle.markViolated(agreement);
      this.auditLogger.logComplianceTransition(AuditEventType.AGREEMENT_VIOLATED, agreement, {
        violation_count: agreement.violation_count,
        observed_subject: signal?.subject_key ?? null,
      });
      record(agreement, ComplianceTransitionType.VIOLATED);
      fire(agreement, () => hooks.onViolation(agreement));
    }
  }

  /**
   * Among active, non-violated agreements on the same subject only the
   * one expiring last stays; the rest are closed as superseded.
   */
  private resolveOverlaps(
    hooks: ComplianceHooks,
    record: (agreement: Agreement, transition: ComplianceTransitionType) => void,
    fire: (agreement: Agreement, callback: () => void | Promise<void>) => void
  ): void {
    const latest = new Map<string, Agreement>();
    const candidates = this.getActive().filter((a) => !a.is_violated);

    for (const agreement of candidates) {
      const key = subjectGroup(agreement);
      const current = latest.get(key);
      if (!current || agreement.expires_at.getTime() >= current.expires_at.getTime()) {
        latest.set(key, agreement);
      }
    }

    for (const agreement of candidates) {
      if (latest.get(subjectGroup(agreement)) === agreement) {
        continue;
      }
      try {
        this.complete(agreement, 'superseded', ComplianceTransitionType.SUPERSEDED, hooks, record, fire);
      } catch (error) {
        this.errorHandler.handleError(error, {
          agreement_id: agreement.agreement_id,
          operation: 'resolveOverlaps',
          source_component: SOURCE,
        });
      }
    }
  }

  private complete(
    agreement: Agreement,
    reason: string,
    transition: ComplianceTransitionType,
    hooks: ComplianceHooks,
    record: (agreement: Agreement, transition: ComplianceTransitionType) => void,
    fire: (agreement: Agreement, callback: () => void | Promise<void>) => void
  ): void {
    if (!this.lifecycle.deactivate(agreement, SOURCE, reason)) {
      return;
    }

    this.auditLogger.logComplianceTransition(AuditEventType.AGREEMENT_COMPLETED, agreement, {
      reason,
    });
    record(agreement, transition);

    const { onCompleted } = hooks;
    if (onCompleted) {
      fire(agreement, () => onCompleted(agreement));
    }
  }

  private invokeHook(
    agreement: Agreement,
    callback: () => void | Promise<void>,
    errors: FocusAgreementsError[]
  ): void {
    const report = (error: unknown): FocusAgreementsError =>
      this.errorHandler.handleError(
        new FocusAgreementsError(
          `Compliance callback failed: ${error instanceof Error ? error.message : String(error)}`,
          ErrorCode.COMPLIANCE_CALLBACK_FAILED,
          ErrorCategory.COMPLIANCE,
          ErrorSeverity.MEDIUM,
          { agreement_id: agreement.agreement_id, source_component: SOURCE },
          { recoverable: true, cause: error }
        )
      );

    try {
      const result = callback();
      if (result instanceof Promise) {
        result.catch((error: unknown) => {
          report(error);
        });
      }
    } catch (error) {
      errors.push(report(error));
    }
  }

  private matches(agreement: Agreement, signal: ActivitySignal | null): boolean {
    if (!signal) {
      return false;
    }
    // Whole-device agreements count any activity
    if (agreement.subject_key === null) {
      return true;
    }
    if (!signal.subject_key) {
      return false;
    }
    return signal.subject_key.toLowerCase().includes(agreement.subject_key.toLowerCase());
  }

  private stateAt(agreement: Agreement, now: Date): ComplianceState {
    if (agreement.is_violated) {
      return ComplianceState.VIOLATED;
    }
    if (!agreement.is_active) {
      return ComplianceState.INACTIVE;
    }
    if (this.lifecycle.isExpired(agreement, now)) {
      return ComplianceState.EXPIRED;
    }
    if (now.getTime() >= agreement.expires_at.getTime() - this.warningWindowMs) {
      return ComplianceState.WARNING;
    }
    return ComplianceState.SAFE;
  }

  private validateSignal(signal: ActivitySignal | null): MalformedActivitySignalError | null {
    if (signal === null) {
      return null;
    }

    if (!(signal.observed_at instanceof Date) || Number.isNaN(signal.observed_at.getTime())) {
      return new MalformedActivitySignalError('Activity signal has no valid observed_at', {
        operation: 'checkCompliance',
        source_component: SOURCE,
      });
    }

    if (signal.subject_key !== undefined && typeof signal.subject_key !== 'string') {
      return new MalformedActivitySignalError('Activity signal subject_key must be a string', {
        operation: 'checkCompliance',
        source_component: SOURCE,
      });
    }

    return null;
  }

  private edgesFor(agreement: Agreement): FiredEdges {
    let edges = this.fired.get(agreement.agreement_id);
    if (!edges) {
      edges = { warning: false, expired: false, violation: false };
      this.fired.set(agreement.agreement_id, edges);
    }
    return edges;
  }

  private ordered(): Agreement[] {
    return Array.from(this.agreements.values()).sort(byCreation);
  }
}
