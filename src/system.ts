/**
 * Focus Agreement System
 *
 * Main integration point. Wires negotiation, compliance tracking,
 * enforcement, capabilities, audit and the polling loop together, and
 * persists every agreement change through the persistence capability.
 */

import {
  Agreement,
  AuditEvent,
  BehavioralEvent,
  ExtensionApproval,
} from './types';
import { AuditLogger } from './audit/logger';
import { AgreementLifecycleManager } from './agreements/lifecycle';
import {
  CentralErrorHandler,
  ErrorCategory,
  ErrorCode,
  ErrorHandlerConfig,
  ErrorSeverity,
  FocusAgreementsError,
} from './errors';
import { CapabilityRegistry, CapabilityRegistryConfig } from './capabilities';
import {
  NegotiationEngine,
  NegotiationEngineConfig,
  NegotiationSession,
  NegotiationStep,
} from './negotiation';
import {
  AgreementStatus,
  ComplianceTracker,
  ComplianceTrackerConfig,
  ComplianceTransitionType,
  TrackerSummary,
} from './compliance';
import {
  EnforcementController,
  EnforcementControllerConfig,
  EnforcementOutcome,
  EnforcementResult,
} from './enforcement';
import {
  ActivitySource,
  ComplianceMonitor,
  ComplianceMonitorConfig,
  ComplianceMonitorStats,
  MonitorTickResult,
} from './monitor';

export interface FocusAgreementSystemConfig {
  /** Where the current-activity signal comes from (default: no activity) */
  activitySource?: ActivitySource;
  /** Grace period shared by compliance and enforcement (default: 30 s) */
  gracePeriodSeconds?: number;
  negotiation?: Omit<NegotiationEngineConfig, 'clock'>;
  compliance?: Omit<ComplianceTrackerConfig, 'clock' | 'gracePeriodSeconds'>;
  enforcement?: Omit<EnforcementControllerConfig, 'clock' | 'gracePeriodSeconds'>;
  capabilities?: Omit<CapabilityRegistryConfig, 'clock'>;
  monitor?: Omit<ComplianceMonitorConfig, 'clock' | 'hooks'>;
  errorHandler?: Partial<ErrorHandlerConfig>;
  /** Time source for every component (default: wall clock) */
  clock?: () => Date;
}

const NO_ACTIVITY: ActivitySource = {
  getCurrentActivity: () => null,
};

export class FocusAgreementSystem {
  private auditLogger: AuditLogger;
  private errorHandler: CentralErrorHandler;
  private registry: CapabilityRegistry;
  private lifecycle: AgreementLifecycleManager;
  private negotiation: NegotiationEngine;
  private tracker: ComplianceTracker;
  private controller: EnforcementController;
  private monitor: ComplianceMonitor;
  private agreements: Map<string, Agreement> = new Map();

  constructor(config: FocusAgreementSystemConfig = {}) {
    const clock = config.clock ?? (() => new Date());
    const gracePeriodSeconds = config.gracePeriodSeconds;

    this.auditLogger = new AuditLogger();
    this.errorHandler = new CentralErrorHandler(config.errorHandler);
    this.registry = new CapabilityRegistry(this.auditLogger, { ...config.capabilities, clock });
    this.lifecycle = new AgreementLifecycleManager(this.auditLogger, { clock });
    this.negotiation = new NegotiationEngine(this.lifecycle, this.auditLogger, {
      ...config.negotiation,
      clock,
    });
    this.tracker = new ComplianceTracker(this.lifecycle, this.auditLogger, this.errorHandler, {
      ...config.compliance,
      gracePeriodSeconds,
      clock,
    });
    this.controller = new EnforcementController(
      this.lifecycle,
      this.registry,
      this.auditLogger,
      this.errorHandler,
      { ...config.enforcement, gracePeriodSeconds, clock }
    );
    this.monitor = new ComplianceMonitor(
      this.tracker,
      this.controller,
      config.activitySource ?? NO_ACTIVITY,
      this.errorHandler,
      {
        ...config.monitor,
        clock,
        hooks: {
          onWarning: async (agreement, secondsRemaining) => {
            await this.controller.sendWarning(agreement, secondsRemaining);
          },
        },
      }
    );

    this.monitor.onTickComplete((result) => this.persistChanged(result));
  }

  /**
   * Negotiation Methods
   */

  /**
   * Open a negotiation for a detected behavior.
   * High-severity behavior is blocked and enforced at once.
   */
  async handleEvent(event: BehavioralEvent): Promise<NegotiationStep> {
    const step = this.negotiation.start(event);
    await this.speak(step.message);

    if (step.kind === 'blocked') {
      await this.track(step.agreement);
      await this.enforce(step.agreement, true);
    }

    return step;
  }

  /**
   * Pass the user's reply to an open negotiation
   */
  async respond(sessionId: string, reply: string): Promise<NegotiationStep> {
    const step = this.negotiation.respond(sessionId, reply);
    await this.speak(step.message);

    if (step.kind === 'agreed') {
      await this.track(step.agreement);
    }

    return step;
  }

  abandonNegotiation(sessionId: string): void {
    this.negotiation.abandon(sessionId);
  }

  getNegotiation(sessionId: string): NegotiationSession | null {
    return this.negotiation.getSession(sessionId);
  }

  /**
   * Agreement Methods
   */

  getAgreement(agreementId: string): Agreement | null {
    return this.agreements.get(agreementId) ?? null;
  }

  getActiveAgreements(): Agreement[] {
    return this.tracker.getActive();
  }

  /**
   * Extend an active agreement with the user's approval
   */
  async extendAgreement(
    agreementId: string,
    additionalSeconds: number,
    approval: ExtensionApproval
  ): Promise<Agreement> {
    const agreement = this.requireAgreement(agreementId);
    this.lifecycle.extend(agreement, additionalSeconds, approval);
    this.tracker.rearm(agreementId);
    this.controller.cancelGracePeriod(agreementId);
    await this.persist(agreement);
    return agreement;
  }

  getStatus(agreementId: string): AgreementStatus | null {
    return this.tracker.getStatus(agreementId);
  }

  getSummary(): TrackerSummary {
    return this.tracker.getSummary();
  }

  /**
   * Reload recent agreements through the load capability and resume
   * tracking the active ones. Returns how many were resumed.
   */
  async restoreRecent(limit = 50): Promise<number> {
    const loader = await this.registry.resolve('load_recent_agreements');
    if (!loader) {
      return 0;
    }

    let resumed = 0;
    for (const agreement of await loader.loadRecent(limit)) {
      if (this.agreements.has(agreement.agreement_id)) {
        continue;
      }
      this.agreements.set(agreement.agreement_id, agreement);
      if (agreement.is_active) {
        this.tracker.add(agreement);
        resumed++;
      }
    }
    return resumed;
  }

  /**
   * Monitoring Methods
   */

  startMonitoring(): void {
    this.monitor.start();
  }

  stopMonitoring(): void {
    this.monitor.stop();
  }

  isMonitoring(): boolean {
    return this.monitor.isRunning();
  }

  /**
   * Run one compliance tick now
   */
  async tick(): Promise<MonitorTickResult | null> {
    return this.monitor.runTick();
  }

  getMonitorStats(): ComplianceMonitorStats {
    return this.monitor.getStats();
  }

  /**
   * Component Access
   */

  getCapabilityRegistry(): CapabilityRegistry {
    return this.registry;
  }

  getErrorHandler(): CentralErrorHandler {
    return this.errorHandler;
  }

  getEnforcementController(): EnforcementController {
    return this.controller;
  }

  getAuditLog(): AuditEvent[] {
    return this.auditLogger.export();
  }

  getAgreementHistory(agreementId: string): AuditEvent[] {
    return this.auditLogger.getAgreementHistory(agreementId);
  }

  private async track(agreement: Agreement): Promise<void> {
    this.agreements.set(agreement.agreement_id, agreement);
    this.tracker.add(agreement);
    await this.persist(agreement);
  }

  private async enforce(agreement: Agreement, force: boolean): Promise<EnforcementOutcome> {
    const outcome = await this.controller.enforce(agreement, { force });
    if (!agreement.is_active) {
      await this.persist(agreement);
    }
    return outcome;
  }

  /**
   * Persist every agreement a tick changed
   */
  private async persistChanged(result: MonitorTickResult): Promise<void> {
    const changed = new Set<string>(
      result.compliance.transitions
        .filter((t) => t.transition !== ComplianceTransitionType.WARNING)
        .map((t) => t.agreement_id)
    );
    for (const outcome of result.enforcement) {
      if (outcome.result === EnforcementResult.ENFORCED || outcome.result === EnforcementResult.FAILED) {
        changed.add(outcome.agreement_id);
      }
    }

    for (const agreementId of changed) {
      const agreement = this.agreements.get(agreementId);
      if (agreement) {
        await this.persist(agreement);
      }
    }
  }

  /**
   * Save through the persist_agreement capability; a missing store is
   * not an error, a failing one is reported
   */
  private async persist(agreement: Agreement): Promise<void> {
    const store = await this.registry.resolveService('persist_agreement');
    if (!store) {
      return;
    }

    try {
      await store.instance.save(agreement);
      this.registry.reportSuccess('persist_agreement', store.service_id);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.registry.reportFailure('persist_agreement', store.service_id, reason);
      this.errorHandler.handleError(
        new FocusAgreementsError(
          `Failed to persist agreement: ${reason}`,
          ErrorCode.STORAGE_WRITE_FAILED,
          ErrorCategory.STORAGE,
          ErrorSeverity.MEDIUM,
          { agreement_id: agreement.agreement_id, capability: 'persist_agreement' },
          { recoverable: true, cause: error }
        )
      );
    }
  }

  /**
   * Say a monitor line, falling back to the console without a voice
   */
  private async speak(text: string): Promise<void> {
    const voice = await this.registry.resolveService('synthesize_speech');
    if (voice) {
      try {
        await voice.instance.synthesize(text);
        this.registry.reportSuccess('synthesize_speech', voice.service_id);
        return;
      } catch (error) {
        this.registry.reportFailure(
          'synthesize_speech',
          voice.service_id,
          error instanceof Error ? error.message : String(error)
        );
      }
    }

    console.log(`[focus-monitor] ${text}`);
  }

  private requireAgreement(agreementId: string): Agreement {
    const agreement = this.agreements.get(agreementId);
    if (!agreement) {
      throw new FocusAgreementsError(
        `Agreement not found: ${agreementId}`,
        ErrorCode.AGREEMENT_NOT_FOUND,
        ErrorCategory.AGREEMENT,
        ErrorSeverity.MEDIUM,
        { agreement_id: agreementId }
      );
    }
    return agreement;
  }
}

