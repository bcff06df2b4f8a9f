/**
 * Enforcement Types
 */

import { Agreement } from '../types';

/**
 * Enforcement phase of one agreement
 *
 * not_started → grace_period_active → enforcing → enforced | failed
 */
export enum EnforcementPhase {
  NOT_STARTED = 'not_started',
  GRACE_PERIOD_ACTIVE = 'grace_period_active',
  /** At least one close attempt made, more allowed */
  ENFORCING = 'enforcing',
  ENFORCED = 'enforced',
  FAILED = 'failed',
}

/**
 * What a single enforce() call did
 */
export enum EnforcementResult {
  NOT_DUE = 'not_due',
  GRACE_STARTED = 'grace_started',
  GRACE_ACTIVE = 'grace_active',
  ENFORCED = 'enforced',
  RETRY_SCHEDULED = 'retry_scheduled',
  FAILED = 'failed',
  ALREADY_ENFORCED = 'already_enforced',
  IN_PROGRESS = 'in_progress',
  /** Deactivated elsewhere before enforcement began */
  INACTIVE = 'inactive',
}

export interface EnforcementOutcome {
  agreement_id: string;
  result: EnforcementResult;
  /** Close attempts made so far */
  attempts: number;
  /** Seconds left in the grace period, when in it */
  grace_seconds_remaining?: number;
  error?: string;
}

/**
 * Per-agreement enforcement bookkeeping
 */
export interface EnforcementState {
  agreement: Agreement;
  phase: EnforcementPhase;
  grace_started_at: Date | null;
  last_notified_at: Date | null;
  attempts: number;
  /** Set once a forced call has been made; the grace period no longer applies */
  forced: boolean;
  in_flight: boolean;
  last_error: string | null;
}

export interface EnforceOptions {
  /** Skip the grace period (zero-duration blocks) */
  force?: boolean;
  now?: Date;
}

/**
 * Enforcement controller configuration
 */
export interface EnforcementControllerConfig {
  /** Grace period after expiry (default: 30 s) */
  gracePeriodSeconds?: number;
  /** Close attempts before giving up (default: 3) */
  maxAttempts?: number;
  /** Minimum gap between grace-period reminders (default: 10 s) */
  renotifyIntervalSeconds?: number;
  /** Time source (default: wall clock) */
  clock?: () => Date;
}

export const DEFAULT_ENFORCEMENT_CONFIG = {
  gracePeriodSeconds: 30,
  maxAttempts: 3,
  renotifyIntervalSeconds: 10,
} as const;
