/**
 * Negotiation Types
 */

import { Agreement, BehavioralEvent, TranscriptTurn } from '../types';

/**
 * Negotiation session status
 */
export enum NegotiationStatus {
  AWAITING_RESPONSE = 'awaiting_response',
  AGREED = 'agreed',
  DECLINED = 'declined',
  ABANDONED = 'abandoned',
}

/**
 * Transient state of one negotiation
 */
export interface NegotiationSession {
  session_id: string;
  event: BehavioralEvent;
  /** Replies that did not settle the negotiation so far */
  round_number: number;
  max_rounds: number;
  /** Most recent counter-offer, in seconds */
  last_offer_seconds: number | null;
  transcript: TranscriptTurn[];
  status: NegotiationStatus;
  started_at: Date;
}

/**
 * The monitor needs another reply
 */
export interface NegotiationPrompt {
  kind: 'prompt';
  session_id: string;
  message: string;
  round_number: number;
  /** Set when the message carries a counter-offer */
  counter_offer_seconds: number | null;
}

/**
 * The negotiation produced an agreement
 */
export interface NegotiationAgreed {
  kind: 'agreed';
  session_id: string;
  message: string;
  agreement: Agreement;
}

/**
 * The user chose to stop; no agreement
 */
export interface NegotiationDeclined {
  kind: 'declined';
  session_id: string;
  message: string;
}

/**
 * High-severity behavior: blocked without negotiation
 */
export interface NegotiationBlocked {
  kind: 'blocked';
  message: string;
  agreement: Agreement;
}

/**
 * Result of starting or continuing a negotiation
 */
export type NegotiationStep =
  | NegotiationPrompt
  | NegotiationAgreed
  | NegotiationDeclined
  | NegotiationBlocked;

/**
 * Negotiation engine configuration
 */
export interface NegotiationEngineConfig {
  /** Unsettled replies allowed before a limit is imposed (default: 3) */
  maxRounds?: number;
  /** Maximum agreeable duration per event type, in seconds */
  ceilings?: Record<string, number>;
  /** Ceiling for event types without their own (default: 900) */
  defaultCeilingSeconds?: number;
  /** Lowest counter-offer the monitor makes (default: 60) */
  minimumOfferSeconds?: number;
  /** Imposed when no offer was ever made (default: 600, capped at the ceiling) */
  defaultImposedSeconds?: number;
  /** Time source (default: wall clock) */
  clock?: () => Date;
}

export const DEFAULT_NEGOTIATION_CONFIG = {
  maxRounds: 3,
  defaultCeilingSeconds: 900,
  minimumOfferSeconds: 60,
  defaultImposedSeconds: 600,
} as const;
