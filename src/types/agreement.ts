/**
 * Agreement Types
 *
 * Defines time-bound agreements negotiated between the monitor and the user
 * ("ten more minutes on this site"), the behavioral events that trigger a
 * negotiation, and the activity signals compliance is checked against.
 */

/**
 * Severity of an observed behavior
 */
export enum EventSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  /** Skips negotiation entirely and blocks immediately */
  HIGH = 'high',
}

/**
 * Well-known behavioral event types.
 * Event types are open strings; these are the ones with dedicated prompts.
 */
export enum KnownEventType {
  ENDLESS_SCROLLING = 'endless_scrolling',
  DISTRACTION_SITE = 'distraction_site',
  ADULT_CONTENT = 'adult_content',
}

/**
 * Who said a line during negotiation
 */
export enum TranscriptActor {
  MONITOR = 'monitor',
  USER = 'user',
}

/**
 * How an agreement came to be
 */
export enum AgreementOutcome {
  /** The user's own request was accepted */
  NEGOTIATED = 'negotiated',
  /** The monitor imposed a limit after running out of rounds */
  IMPOSED = 'imposed',
  /** High-severity behavior, zero-duration block without negotiation */
  BLOCKED = 'blocked',
}

/**
 * One turn of a negotiation
 */
export interface TranscriptTurn {
  actor: TranscriptActor;
  text: string;
  at: Date;
}

/**
 * Behavioral event emitted by the external detector. Read-only.
 */
export interface BehavioralEvent {
  readonly event_type: string;
  readonly severity: EventSeverity;
  /** URL or process name, absent for whole-device behavior */
  readonly subject_key?: string;
  /** How long the behavior has already been observed */
  readonly duration_seconds: number;
  readonly detected_at: Date;
  readonly metadata: Readonly<Record<string, unknown>>;
}

/**
 * Current-activity signal produced on each poll tick.
 * A null signal means no relevant activity.
 */
export interface ActivitySignal {
  /** What is in front of the user; absent when nothing identifiable is */
  subject_key?: string;
  observed_at: Date;
}

/**
 * Negotiated time agreement
 *
 * Identity is fixed at creation. The flags are mutated in place by the
 * compliance tracker and the enforcement controller so every holder of the
 * record observes the same state.
 */
export interface Agreement {
  /** Unique agreement identifier, never reused */
  readonly agreement_id: string;
  /** URL or process name governed by this agreement (null = whole device) */
  readonly subject_key: string | null;
  /** Tag of the behavior that triggered the negotiation */
  readonly event_type: string;
  /** Severity of the triggering behavior */
  readonly severity: EventSeverity;
  /** Agreed duration; changes only through an approved extension */
  agreed_duration_seconds: number;
  readonly created_at: Date;
  expires_at: Date;
  readonly negotiation_transcript: TranscriptTurn[];
  readonly outcome: AgreementOutcome;
  is_active: boolean;
  is_violated: boolean;
  violation_count: number;
  metadata: Record<string, unknown>;
}

/**
 * Input for creating an agreement
 */
export interface AgreementDraft {
  event_type: string;
  severity: EventSeverity;
  subject_key?: string | null;
  agreed_duration_seconds: number;
  outcome: AgreementOutcome;
  transcript?: TranscriptTurn[];
  metadata?: Record<string, unknown>;
  created_at?: Date;
}

/**
 * Record of the user approving an extension
 */
export interface ExtensionApproval {
  /** Who approved (normally the user) */
  approved_by: string;
  /** The user's own words, if any */
  user_text?: string;
}

/**
 * Agreement validation result
 */
export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}
