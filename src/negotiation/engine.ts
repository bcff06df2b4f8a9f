/**
 * Negotiation Engine
 *
 * Turns one behavioral event plus the user's replies into an agreement.
 * Each session advances only through respond(); a session is dropped as
 * soon as it reaches an outcome.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  AgreementOutcome,
  AuditEventType,
  BehavioralEvent,
  EventSeverity,
  TranscriptActor,
} from '../types';
import { AuditLogger } from '../audit/logger';
import { AgreementLifecycleManager } from '../agreements/lifecycle';
import { ConfigError, InvalidNegotiationStateError } from '../errors';
import {
  DEFAULT_NEGOTIATION_CONFIG,
  NegotiationAgreed,
  NegotiationBlocked,
  NegotiationDeclined,
  NegotiationEngineConfig,
  NegotiationPrompt,
  NegotiationSession,
  NegotiationStatus,
  NegotiationStep,
} from './types';
import { isDeclineReply, parseDurationSeconds } from './time-parser';
import {
  BLOCKED_MESSAGE,
  DECLINED_MESSAGE,
  REPROMPT_MESSAGE,
  acceptedMessage,
  counterOfferMessage,
  finalOfferMessage,
  imposedMessage,
  openingPrompt,
} from './prompts';

export class NegotiationEngine {
  private sessions: Map<string, NegotiationSession> = new Map();
  private maxRounds: number;
  private ceilings: Record<string, number>;
  private defaultCeilingSeconds: number;
  private minimumOfferSeconds: number;
  private defaultImposedSeconds: number;
  private clock: () => Date;

  constructor(
    private lifecycle: AgreementLifecycleManager,
    private auditLogger: AuditLogger,
    config: NegotiationEngineConfig = {}
  ) {
    this.maxRounds = config.maxRounds ?? DEFAULT_NEGOTIATION_CONFIG.maxRounds;
    this.ceilings = { ...(config.ceilings ?? {}) };
    this.defaultCeilingSeconds =
      config.defaultCeilingSeconds ?? DEFAULT_NEGOTIATION_CONFIG.defaultCeilingSeconds;
    this.minimumOfferSeconds =
      config.minimumOfferSeconds ?? DEFAULT_NEGOTIATION_CONFIG.minimumOfferSeconds;
    this.defaultImposedSeconds =
      config.defaultImposedSeconds ?? DEFAULT_NEGOTIATION_CONFIG.defaultImposedSeconds;
    this.clock = config.clock ?? (() => new Date());

    this.validateConfig();
  }

  /**
   * Start negotiating over an event.
   * High-severity events are blocked at once without a session.
   */
  start(event: BehavioralEvent, now: Date = this.clock()): NegotiationStep {
    if (event.severity === EventSeverity.HIGH) {
      return this.block(event, now);
    }

    const message = openingPrompt(event);
    const session: NegotiationSession = {
      session_id: uuidv4(),
      event,
      round_number: 0,
      max_rounds: this.maxRounds,
      last_offer_seconds: null,
      transcript: [{ actor: TranscriptActor.MONITOR, text: message, at: now }],
      status: NegotiationStatus.AWAITING_RESPONSE,
      started_at: now,
    };

    this.sessions.set(session.session_id, session);
    this.auditLogger.logNegotiation(AuditEventType.NEGOTIATION_STARTED, session.session_id, {
      event_type: event.event_type,
      subject_key: event.subject_key ?? null,
      duration_seconds: event.duration_seconds,
    });

    return {
      kind: 'prompt',
      session_id: session.session_id,
      message,
      round_number: 0,
      counter_offer_seconds: null,
    };
  }

  /**
   * Feed one user reply into a session
   */
  respond(sessionId: string, reply: string, now: Date = this.clock()): NegotiationStep {
    const session = this.requireOpen(sessionId);
    session.transcript.push({ actor: TranscriptActor.USER, text: reply, at: now });

    const ceiling = this.ceilingFor(session.event.event_type);
    const requested = parseDurationSeconds(reply);

    this.auditLogger.logNegotiation(AuditEventType.NEGOTIATION_ROUND, sessionId, {
      round_number: session.round_number,
      reply,
      requested_seconds: requested,
    });

    if (requested === null) {
      if (isDeclineReply(reply)) {
        return this.decline(session, now);
      }

      if (session.round_number < session.max_rounds) {
        session.round_number++;
        return this.prompt(session, REPROMPT_MESSAGE, null, now);
      }

      if (session.last_offer_seconds !== null) {
        return this.conclude(
          session,
          session.last_offer_seconds,
          AgreementOutcome.IMPOSED,
          finalOfferMessage(session.last_offer_seconds),
          now
        );
      }

      const imposed = Math.min(this.defaultImposedSeconds, ceiling);
      return this.conclude(session, imposed, AgreementOutcome.IMPOSED, imposedMessage(imposed), now);
    }

    if (requested <= ceiling) {
      return this.conclude(
        session,
        requested,
        AgreementOutcome.NEGOTIATED,
        acceptedMessage(requested),
        now
      );
    }

    const counter = this.counterOffer(requested, ceiling);
    session.round_number++;
    session.last_offer_seconds = counter;

    if (session.round_number >= session.max_rounds) {
      return this.conclude(session, counter, AgreementOutcome.IMPOSED, finalOfferMessage(counter), now);
    }

    return this.prompt(session, counterOfferMessage(requested, counter), counter, now);
  }

  /**
   * Discard a session without creating anything
   */
  abandon(sessionId: string): void {
    const session = this.requireOpen(sessionId);
    session.status = NegotiationStatus.ABANDONED;
    this.sessions.delete(sessionId);

    this.auditLogger.logNegotiation(AuditEventType.NEGOTIATION_ABANDONED, sessionId, {
      round_number: session.round_number,
    });
  }

  /**
   * Snapshot of an open session
   */
  getSession(sessionId: string): NegotiationSession | null {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return null;
    }
    return { ...session, transcript: [...session.transcript] };
  }

  /**
   * Ids of sessions still awaiting a reply
   */
  getOpenSessionIds(): string[] {
    return Array.from(this.sessions.keys());
  }

  /**
   * Ceiling applied to an event type
   */
  ceilingFor(eventType: string): number {
    return this.ceilings[eventType] ?? this.defaultCeilingSeconds;
  }

  /**
   * Counter-offer for a request above the ceiling
   */
  counterOffer(requestedSeconds: number, ceiling: number): number {
    return Math.max(Math.min(requestedSeconds / 2, ceiling), this.minimumOfferSeconds);
  }

  private block(event: BehavioralEvent, now: Date): NegotiationBlocked {
    const agreement = this.lifecycle.create({
      event_type: event.event_type,
      severity: event.severity,
      subject_key: event.subject_key ?? null,
      agreed_duration_seconds: 0,
      outcome: AgreementOutcome.BLOCKED,
      metadata: { ...event.metadata, event_duration_seconds: event.duration_seconds },
      created_at: now,
    });

    return { kind: 'blocked', message: BLOCKED_MESSAGE, agreement };
  }

  private prompt(
    session: NegotiationSession,
    message: string,
    counterOffer: number | null,
    now: Date
  ): NegotiationPrompt {
    session.transcript.push({ actor: TranscriptActor.MONITOR, text: message, at: now });

    return {
      kind: 'prompt',
      session_id: session.session_id,
      message,
      round_number: session.round_number,
      counter_offer_seconds: counterOffer,
    };
  }

  private conclude(
    session: NegotiationSession,
    seconds: number,
    outcome: AgreementOutcome,
    message: string,
    now: Date
  ): NegotiationAgreed {
    session.transcript.push({ actor: TranscriptActor.MONITOR, text: message, at: now });

    const { event } = session;
    const agreement = this.lifecycle.create({
      event_type: event.event_type,
      severity: event.severity,
      subject_key: event.subject_key ?? null,
      agreed_duration_seconds: seconds,
      outcome,
      transcript: session.transcript,
      metadata: {
        ...event.metadata,
        session_id: session.session_id,
        negotiation_rounds: session.round_number,
        event_duration_seconds: event.duration_seconds,
      },
      created_at: now,
    });

    session.status = NegotiationStatus.AGREED;
    this.sessions.delete(session.session_id);

    return { kind: 'agreed', session_id: session.session_id, message, agreement };
  }

  private decline(session: NegotiationSession, now: Date): NegotiationDeclined {
    session.transcript.push({ actor: TranscriptActor.MONITOR, text: DECLINED_MESSAGE, at: now });
    session.status = NegotiationStatus.DECLINED;
    this.sessions.delete(session.session_id);

    this.auditLogger.logNegotiation(AuditEventType.NEGOTIATION_DECLINED, session.session_id, {
      round_number: session.round_number,
    });

    return { kind: 'declined', session_id: session.session_id, message: DECLINED_MESSAGE };
  }

  private requireOpen(sessionId: string): NegotiationSession {
    const session = this.sessions.get(sessionId);
    if (!session || session.status !== NegotiationStatus.AWAITING_RESPONSE) {
      throw new InvalidNegotiationStateError(
        `Negotiation session ${sessionId} is not awaiting a response`,
        { session_id: sessionId, source_component: 'negotiation-engine' }
      );
    }
    return session;
  }

  private validateConfig(): void {
    const problems: string[] = [];

    if (!Number.isInteger(this.maxRounds) || this.maxRounds < 1) {
      problems.push('maxRounds must be a positive integer');
    }

    const positive: Array<[string, number]> = [
      ['defaultCeilingSeconds', this.defaultCeilingSeconds],
      ['minimumOfferSeconds', this.minimumOfferSeconds],
      ['defaultImposedSeconds', this.defaultImposedSeconds],
      ...Object.entries(this.ceilings).map(
        ([eventType, seconds]): [string, number] => [`ceilings.${eventType}`, seconds]
      ),
    ];
    for (const [name, value] of positive) {
      if (!Number.isFinite(value) || value <= 0) {
        problems.push(`${name} must be a positive number`);
      }
    }

    const lowestCeiling = Math.min(this.defaultCeilingSeconds, ...Object.values(this.ceilings));
    if (this.minimumOfferSeconds > lowestCeiling) {
      problems.push('minimumOfferSeconds cannot exceed any ceiling');
    }

    if (problems.length > 0) {
      throw new ConfigError(`Invalid negotiation config: ${problems.join('; ')}`, {
        source_component: 'negotiation-engine',
      });
    }
  }
}
