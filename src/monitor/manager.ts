/**
 * Compliance Monitor
 *
 * The single polling loop: pulls the activity signal, runs the compliance
 * check, and hands expired and violated agreements to the enforcement
 * controller. Can run periodically or be ticked manually.
 */

import { v4 as uuidv4 } from 'uuid';
import { Agreement, AgreementOutcome } from '../types';
import { ComplianceTracker } from '../compliance/tracker';
import { ComplianceHooks, ComplianceTickResult } from '../compliance/types';
import { EnforcementController } from '../enforcement/controller';
import { EnforcementOutcome, EnforcementResult } from '../enforcement/types';
import { CentralErrorHandler } from '../errors';
import {
  ActivitySource,
  ComplianceMonitorConfig,
  ComplianceMonitorStats,
  MonitorTickResult,
  TickCompletionListener,
} from './types';

const SOURCE = 'compliance-monitor';

export class ComplianceMonitor {
  private tickIntervalMs: number;
  private hooks: Partial<ComplianceHooks>;
  private clock: () => Date;
  private intervalId: ReturnType<typeof setInterval> | null = null;
  private ticking = false;
  private tickListeners: TickCompletionListener[] = [];
  private lastTickAt: Date | null = null;
  private ticksCompleted = 0;
  private ticksOverlapped = 0;
  private totalViolations = 0;
  private totalEnforcements = 0;
  private totalErrors = 0;

  constructor(
    private tracker: ComplianceTracker,
    private controller: EnforcementController,
    private source: ActivitySource,
    private errorHandler: CentralErrorHandler,
    config: ComplianceMonitorConfig = {}
  ) {
    this.tickIntervalMs = config.tickIntervalMs ?? 5000;
    this.hooks = config.hooks ?? {};
    this.clock = config.clock ?? (() => new Date());
  }

  /**
   * Start periodic ticking
   */
  start(): void {
    if (this.intervalId !== null) {
      return;
    }

    this.scheduleTick();
    this.intervalId = setInterval(() => {
      this.scheduleTick();
    }, this.tickIntervalMs);
  }

  /**
   * Stop periodic ticking
   */
  stop(): void {
    if (this.intervalId !== null) {
      clearInterval(this.intervalId);
      this.intervalId = null;
    }
  }

  isRunning(): boolean {
    return this.intervalId !== null;
  }

  /**
   * Run one tick. Resolves to null when a previous tick is still running.
   */
  async runTick(): Promise<MonitorTickResult | null> {
    if (this.ticking) {
      this.ticksOverlapped++;
      return null;
    }

    this.ticking = true;
    try {
      return await this.tick();
    } finally {
      this.ticking = false;
    }
  }

  /**
   * Register a listener for tick completion
   */
  onTickComplete(listener: TickCompletionListener): () => void {
    this.tickListeners.push(listener);
    return () => {
      const index = this.tickListeners.indexOf(listener);
      if (index > -1) {
        this.tickListeners.splice(index, 1);
      }
    };
  }

  getTickInterval(): number {
    return this.tickIntervalMs;
  }

  getStats(): ComplianceMonitorStats {
    const nextTickAt =
      this.isRunning() && this.lastTickAt
        ? new Date(this.lastTickAt.getTime() + this.tickIntervalMs)
        : null;

    return {
      isRunning: this.isRunning(),
      lastTickAt: this.lastTickAt,
      nextTickAt,
      ticksCompleted: this.ticksCompleted,
      ticksOverlapped: this.ticksOverlapped,
      totalViolations: this.totalViolations,
      totalEnforcements: this.totalEnforcements,
      totalErrors: this.totalErrors,
    };
  }

  private scheduleTick(): void {
    this.runTick().catch((error: unknown) => {
      this.errorHandler.handleError(error, { operation: 'runTick', source_component: SOURCE });
    });
  }

  private async tick(): Promise<MonitorTickResult> {
    const tickId = uuidv4();
    const startedAt = this.clock();
    const errors: string[] = [];
    const expired: Agreement[] = [];
    const violated: Agreement[] = [];
    const enforcement: EnforcementOutcome[] = [];
    let compliance: ComplianceTickResult | null = null;

    const extra = this.hooks;
    const hooks: ComplianceHooks = {
      onWarning: (agreement, secondsRemaining) => extra.onWarning?.(agreement, secondsRemaining),
      onExpired: (agreement) => {
        expired.push(agreement);
        return extra.onExpired?.(agreement);
      },
      onViolation: (agreement) => {
        violated.push(agreement);
        return extra.onViolation?.(agreement);
      },
      onCompleted: (agreement) => {
        this.controller.cancelGracePeriod(agreement.agreement_id);
        return extra.onCompleted?.(agreement);
      },
    };

    try {
      const signal = await this.source.getCurrentActivity();
      compliance = this.tracker.checkCompliance(signal, hooks);
      errors.push(...compliance.errors.map((e) => e.message));

      if (!compliance.skipped) {
        const now = compliance.observed_at;
        enforcement.push(...(await this.controller.processPending(now)));

        const driven = new Set(enforcement.map((o) => o.agreement_id));
        for (const agreement of [...expired, ...violated]) {
          if (driven.has(agreement.agreement_id) || !agreement.is_active) {
            continue;
          }
          driven.add(agreement.agreement_id);
          enforcement.push(
            await this.controller.enforce(agreement, {
              now,
              force: agreement.outcome === AgreementOutcome.BLOCKED,
            })
          );
        }
      }
    } catch (error) {
      const handled = this.errorHandler.handleError(error, {
        operation: 'tick',
        source_component: SOURCE,
      });
      errors.push(handled.message);
    }

    const removed = this.tracker.cleanupInactive();
    this.controller.cleanupFinished();
    const completedAt = this.clock();

    this.lastTickAt = completedAt;
    this.ticksCompleted++;
    this.totalViolations += violated.length;
    this.totalEnforcements += enforcement.filter(
      (o) => o.result === EnforcementResult.ENFORCED
    ).length;
    this.totalErrors += errors.length;

    const result: MonitorTickResult = {
      tick_id: tickId,
      started_at: startedAt,
      completed_at: completedAt,
      compliance: compliance ?? {
        tick_id: tickId,
        observed_at: startedAt,
        skipped: true,
        agreements_checked: 0,
        transitions: [],
        errors: [],
      },
      enforcement,
      removed,
      errors,
    };

    for (const listener of this.tickListeners) {
      try {
        await listener(result);
      } catch (error) {
        console.error('Tick listener error:', error);
      }
    }

    return result;
  }
}
