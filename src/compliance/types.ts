/**
 * Compliance Types
 */

import { Agreement } from '../types';
import { FocusAgreementsError } from '../errors';

/**
 * Edge-triggered compliance callbacks.
 * Each fires at most once per agreement.
 */
export interface ComplianceHooks {
  onWarning: (agreement: Agreement, secondsRemaining: number) => void | Promise<void>;
  onExpired: (agreement: Agreement) => void | Promise<void>;
  onViolation: (agreement: Agreement) => void | Promise<void>;
  onCompleted?: (agreement: Agreement) => void | Promise<void>;
}

/**
 * Where an agreement stands at a point in time
 */
export enum ComplianceState {
  SAFE = 'safe',
  WARNING = 'warning',
  EXPIRED = 'expired',
  VIOLATED = 'violated',
  INACTIVE = 'inactive',
}

/**
 * Transition observed during a tick
 */
export enum ComplianceTransitionType {
  WARNING = 'warning',
  EXPIRED = 'expired',
  VIOLATED = 'violated',
  COMPLETED = 'completed',
  /** Replaced by a later agreement on the same subject */
  SUPERSEDED = 'superseded',
}

export interface ComplianceTransition {
  agreement_id: string;
  transition: ComplianceTransitionType;
}

/**
 * Outcome of one compliance check
 */
export interface ComplianceTickResult {
  tick_id: string;
  /** Tick time used for classification */
  observed_at: Date;
  /** True when the signal was malformed and nothing was evaluated */
  skipped: boolean;
  agreements_checked: number;
  transitions: ComplianceTransition[];
  errors: FocusAgreementsError[];
}

/**
 * Point-in-time status of one agreement
 */
export interface AgreementStatus {
  agreement_id: string;
  subject_key: string | null;
  event_type: string;
  state: ComplianceState;
  seconds_remaining: number;
  progress_percentage: number;
  expires_at: Date;
  violation_count: number;
}

/**
 * Summary of the working set
 */
export interface TrackerSummary {
  total: number;
  active: number;
  expired: number;
  violated: number;
  completed: number;
  total_violations: number;
}

/**
 * Compliance tracker configuration
 */
export interface ComplianceTrackerConfig {
  /** Warning window before expiry (default: 60 s) */
  warningWindowSeconds?: number;
  /** Tolerance after expiry before activity counts as a violation (default: 30 s) */
  gracePeriodSeconds?: number;
  /** Time source for ticks without a signal (default: wall clock) */
  clock?: () => Date;
}

export const DEFAULT_COMPLIANCE_CONFIG = {
  warningWindowSeconds: 60,
  gracePeriodSeconds: 30,
} as const;
