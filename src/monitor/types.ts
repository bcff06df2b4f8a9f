/**
 * Compliance Monitor Types
 */

import { ActivitySignal } from '../types';
import { ComplianceHooks, ComplianceTickResult } from '../compliance/types';
import { EnforcementOutcome } from '../enforcement/types';

/**
 * Supplies the current-activity signal on each tick
 */
export interface ActivitySource {
  getCurrentActivity(): ActivitySignal | null | Promise<ActivitySignal | null>;
}

/**
 * Result of one monitor tick
 */
export interface MonitorTickResult {
  tick_id: string;
  started_at: Date;
  completed_at: Date;
  compliance: ComplianceTickResult;
  enforcement: EnforcementOutcome[];
  /** Inactive agreements dropped from the working set */
  removed: number;
  errors: string[];
}

/**
 * Listener for tick completion; the tick resolves after it settles
 */
export type TickCompletionListener = (result: MonitorTickResult) => void | Promise<void>;

/**
 * Compliance monitor configuration
 */
export interface ComplianceMonitorConfig {
  /** Interval between ticks in milliseconds (default: 5000) */
  tickIntervalMs?: number;
  /** Extra compliance callbacks, run after the monitor's own handling */
  hooks?: Partial<ComplianceHooks>;
  /** Time source (default: wall clock) */
  clock?: () => Date;
}

/**
 * Compliance monitor statistics
 */
export interface ComplianceMonitorStats {
  isRunning: boolean;
  lastTickAt: Date | null;
  nextTickAt: Date | null;
  ticksCompleted: number;
  /** Ticks dropped because the previous one was still running */
  ticksOverlapped: number;
  totalViolations: number;
  totalEnforcements: number;
  totalErrors: number;
}
