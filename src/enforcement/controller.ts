/**
 * Enforcement Controller
 *
 * Escalates an overrun agreement: a grace-period notice first, then the
 * terminal close action through the close_resource capability. The
 * terminal action runs at most once per successful enforcement; failed
 * attempts are retried up to maxAttempts.
 */

import { Agreement, AuditEventType } from '../types';
import { AuditLogger } from '../audit/logger';
import { AgreementLifecycleManager } from '../agreements/lifecycle';
import { CapabilityRegistry, NotificationUrgency } from '../capabilities';
import {
  CentralErrorHandler,
  EnforcementFailedError,
  ErrorCategory,
  ErrorCode,
  ErrorSeverity,
  FocusAgreementsError,
  NoCapabilityAvailableError,
} from '../errors';
import {
  DEFAULT_ENFORCEMENT_CONFIG,
  EnforceOptions,
  EnforcementControllerConfig,
  EnforcementOutcome,
  EnforcementPhase,
  EnforcementResult,
  EnforcementState,
} from './types';

const SOURCE = 'enforcement-controller';

function describeTarget(agreement: Agreement): string {
  return agreement.subject_key ?? 'this device';
}

function warningTime(secondsRemaining: number): string {
  const minutes = Math.floor(secondsRemaining / 60);
  if (minutes > 0) {
    return `${minutes} minute(s)`;
  }
  return `${Math.floor(secondsRemaining)} seconds`;
}

export class EnforcementController {
  private states: Map<string, EnforcementState> = new Map();
  private gracePeriodMs: number;
  private maxAttempts: number;
  private renotifyIntervalMs: number;
  private clock: () => Date;

  constructor(
    private lifecycle: AgreementLifecycleManager,
    private registry: CapabilityRegistry,
    private auditLogger: AuditLogger,
    private errorHandler: CentralErrorHandler,
    config: EnforcementControllerConfig = {}
  ) {
    this.gracePeriodMs =
      (config.gracePeriodSeconds ?? DEFAULT_ENFORCEMENT_CONFIG.gracePeriodSeconds) * 1000;
    this.maxAttempts = config.maxAttempts ?? DEFAULT_ENFORCEMENT_CONFIG.maxAttempts;
    this.renotifyIntervalMs =
      (config.renotifyIntervalSeconds ?? DEFAULT_ENFORCEMENT_CONFIG.renotifyIntervalSeconds) *
      1000;
    this.clock = config.clock ?? (() => new Date());
  }

  /**
   * Drive enforcement of one agreement a step forward
   */
  async enforce(agreement: Agreement, options: EnforceOptions = {}): Promise<EnforcementOutcome> {
    const now = options.now ?? this.clock();
    const state = this.stateFor(agreement);

    if (state.phase === EnforcementPhase.ENFORCED || state.phase === EnforcementPhase.FAILED) {
      return this.outcome(state, EnforcementResult.ALREADY_ENFORCED);
    }

    if (state.in_flight) {
      return this.outcome(state, EnforcementResult.IN_PROGRESS);
    }

    if (!agreement.is_active) {
      this.states.delete(agreement.agreement_id);
      return this.outcome(state, EnforcementResult.INACTIVE);
    }

    state.forced = state.forced || options.force === true;

    if (!state.forced) {
      if (!this.lifecycle.isExpired(agreement, now)) {
        this.states.delete(agreement.agreement_id);
        return this.outcome(state, EnforcementResult.NOT_DUE);
      }

      const graceRemainingMs = this.graceEndsAt(agreement) - now.getTime();
      if (graceRemainingMs > 0) {
        return this.continueGrace(state, now, graceRemainingMs / 1000);
      }
    }

    return this.attempt(state, now);
  }

  /**
   * Re-drive every agreement in its grace period or awaiting a retry
   */
  async processPending(now: Date = this.clock()): Promise<EnforcementOutcome[]> {
    const pending = Array.from(this.states.values()).filter(
      (s) =>
        s.phase === EnforcementPhase.GRACE_PERIOD_ACTIVE || s.phase === EnforcementPhase.ENFORCING
    );

    const outcomes: EnforcementOutcome[] = [];
    for (const state of pending) {
      outcomes.push(await this.enforce(state.agreement, { now }));
    }
    return outcomes;
  }

  /**
   * Forget enforced and failed agreements. Returns how many were dropped.
   */
  cleanupFinished(): number {
    let removed = 0;
    for (const [id, state] of this.states) {
      if (
        !state.in_flight &&
        (state.phase === EnforcementPhase.ENFORCED || state.phase === EnforcementPhase.FAILED)
      ) {
        this.states.delete(id);
        removed++;
      }
    }
    return removed;
  }

  /**
   * Drop a grace period, e.g. after the user complied
   */
  cancelGracePeriod(agreementId: string): boolean {
    const state = this.states.get(agreementId);
    if (!state || state.phase !== EnforcementPhase.GRACE_PERIOD_ACTIVE) {
      return false;
    }
    this.states.delete(agreementId);
    return true;
  }

  /**
   * Seconds left in an active grace period, or null when not in one
   */
  getGracePeriodRemaining(agreementId: string, now: Date = this.clock()): number | null {
    const state = this.states.get(agreementId);
    if (!state || state.phase !== EnforcementPhase.GRACE_PERIOD_ACTIVE) {
      return null;
    }
    return Math.max(0, (this.graceEndsAt(state.agreement) - now.getTime()) / 1000);
  }

  /**
   * Enforcement bookkeeping for an agreement
   */
  getState(agreementId: string): EnforcementState | null {
    const state = this.states.get(agreementId);
    return state ? { ...state } : null;
  }

  /**
   * Send the pre-expiry warning notice
   */
  async sendWarning(agreement: Agreement, secondsRemaining: number): Promise<boolean> {
    const message =
      `⏰ Warning: ${warningTime(secondsRemaining)} remaining\n` +
      `Activity: ${agreement.event_type}\n` +
      `Target: ${describeTarget(agreement)}`;

    return this.notify(message, NotificationUrgency.NORMAL, agreement);
  }

  private async continueGrace(
    state: EnforcementState,
    now: Date,
    graceSecondsRemaining: number
  ): Promise<EnforcementOutcome> {
    const { agreement } = state;

    if (state.phase === EnforcementPhase.NOT_STARTED) {
      state.phase = EnforcementPhase.GRACE_PERIOD_ACTIVE;
      state.grace_started_at = now;
      state.last_notified_at = now;

      this.auditLogger.logEnforcement(AuditEventType.GRACE_PERIOD_STARTED, agreement.agreement_id, {
        grace_seconds_remaining: graceSecondsRemaining,
      });
      await this.notify(this.graceMessage(agreement, graceSecondsRemaining), NotificationUrgency.HIGH, agreement);

      return this.outcome(state, EnforcementResult.GRACE_STARTED, graceSecondsRemaining);
    }

    const lastNotified = state.last_notified_at?.getTime() ?? 0;
    if (now.getTime() - lastNotified >= this.renotifyIntervalMs) {
      state.last_notified_at = now;
      await this.notify(this.graceMessage(agreement, graceSecondsRemaining), NotificationUrgency.HIGH, agreement);
    }

    return this.outcome(state, EnforcementResult.GRACE_ACTIVE, graceSecondsRemaining);
  }

  private async attempt(state: EnforcementState, now: Date): Promise<EnforcementOutcome> {
    const { agreement } = state;
    state.in_flight = true;
    state.phase = EnforcementPhase.ENFORCING;
    state.attempts++;

    let succeeded: boolean;
    try {
      succeeded = await this.runTerminalAction(state);
    } finally {
      state.in_flight = false;
    }

    if (succeeded) {
      state.phase = EnforcementPhase.ENFORCED;
      state.last_error = null;
      this.auditLogger.logEnforcement(AuditEventType.ENFORCEMENT_EXECUTED, agreement.agreement_id, {
        attempts: state.attempts,
        forced: state.forced,
        subject_key: agreement.subject_key,
        at: now.toISOString(),
      });
      this.lifecycle.deactivate(agreement, SOURCE, 'enforced');
      return this.outcome(state, EnforcementResult.ENFORCED);
    }

    if (state.attempts < this.maxAttempts) {
      return this.outcome(state, EnforcementResult.RETRY_SCHEDULED);
    }

    state.phase = EnforcementPhase.FAILED;
    this.auditLogger.logEnforcement(
      AuditEventType.ENFORCEMENT_FAILED,
      agreement.agreement_id,
      { attempts: state.attempts, subject_key: agreement.subject_key },
      state.last_error ?? undefined
    );
    this.lifecycle.deactivate(agreement, SOURCE, 'enforcement_failed');
    this.errorHandler.handleError(
      new EnforcementFailedError(
        `Could not close ${describeTarget(agreement)} after ${state.attempts} attempts`,
        { agreement_id: agreement.agreement_id, capability: 'close_resource', source_component: SOURCE }
      )
    );
    await this.notify(
      `I couldn't close ${describeTarget(agreement)}. Please close it yourself.`,
      NotificationUrgency.HIGH,
      agreement
    );

    return this.outcome(state, EnforcementResult.FAILED);
  }

  /**
   * One close attempt. Whole-device agreements have nothing to close and
   * are enforced by notification alone.
   */
  private async runTerminalAction(state: EnforcementState): Promise<boolean> {
    const { agreement } = state;

    if (agreement.subject_key === null) {
      const delivered = await this.notify(
        "Time's up. Please put the device down now.",
        NotificationUrgency.HIGH,
        agreement
      );
      if (!delivered) {
        state.last_error = 'notification not delivered';
      }
      return delivered;
    }

    const closer = await this.registry.resolveService('close_resource');
    if (!closer) {
      const error = new NoCapabilityAvailableError('close_resource', {
        agreement_id: agreement.agreement_id,
        source_component: SOURCE,
      });
      state.last_error = error.message;
      this.errorHandler.handleError(error);
      return false;
    }

    try {
      const closed = await closer.instance.close(agreement.subject_key);
      if (closed) {
        this.registry.reportSuccess('close_resource', closer.service_id);
        return true;
      }
      state.last_error = `${closer.service_id} did not close ${agreement.subject_key}`;
    } catch (error) {
      state.last_error = error instanceof Error ? error.message : String(error);
      this.registry.reportFailure('close_resource', closer.service_id, state.last_error);
    }

    this.errorHandler.handleError(
      new FocusAgreementsError(
        `Close attempt ${state.attempts} failed: ${state.last_error}`,
        ErrorCode.ENFORCEMENT_ATTEMPT_FAILED,
        ErrorCategory.ENFORCEMENT,
        ErrorSeverity.LOW,
        { agreement_id: agreement.agreement_id, capability: 'close_resource', source_component: SOURCE },
        { recoverable: true }
      )
    );
    return false;
  }

  private async notify(
    message: string,
    urgency: NotificationUrgency,
    agreement: Agreement
  ): Promise<boolean> {
    const notifier = await this.registry.resolveService('notify');
    if (!notifier) {
      this.errorHandler.handleError(
        new NoCapabilityAvailableError('notify', {
          agreement_id: agreement.agreement_id,
          source_component: SOURCE,
        })
      );
      return false;
    }

    try {
      await notifier.instance.notify(message, urgency);
      this.registry.reportSuccess('notify', notifier.service_id);
      return true;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.registry.reportFailure('notify', notifier.service_id, reason);
      this.errorHandler.handleError(
        new FocusAgreementsError(
          `Notification failed: ${reason}`,
          ErrorCode.CAPABILITY_CALL_FAILED,
          ErrorCategory.CAPABILITY,
          ErrorSeverity.LOW,
          { agreement_id: agreement.agreement_id, capability: 'notify', source_component: SOURCE },
          { recoverable: true, cause: error }
        )
      );
      return false;
    }
  }

  private graceMessage(agreement: Agreement, graceSecondsRemaining: number): string {
    return `⏳ Time's up for ${describeTarget(agreement)}. Closing in ${Math.ceil(graceSecondsRemaining)} seconds.`;
  }

  private graceEndsAt(agreement: Agreement): number {
    return agreement.expires_at.getTime() + this.gracePeriodMs;
  }

  private stateFor(agreement: Agreement): EnforcementState {
    let state = this.states.get(agreement.agreement_id);
    if (!state) {
      state = {
        agreement,
        phase: EnforcementPhase.NOT_STARTED,
        grace_started_at: null,
        last_notified_at: null,
        attempts: 0,
        forced: false,
        in_flight: false,
        last_error: null,
      };
      this.states.set(agreement.agreement_id, state);
    }
    return state;
  }

  private outcome(
    state: EnforcementState,
    result: EnforcementResult,
    graceSecondsRemaining?: number
  ): EnforcementOutcome {
    const outcome: EnforcementOutcome = {
      agreement_id: state.agreement.agreement_id,
      result,
      attempts: state.attempts,
    };
    if (graceSecondsRemaining !== undefined) {
      outcome.grace_seconds_remaining = graceSecondsRemaining;
    }
    if (state.last_error !== null) {
      outcome.error = state.last_error;
    }
    return outcome;
  }
}
