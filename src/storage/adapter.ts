/**
 * Storage Adapter Interface
 *
 * Defines the interface for agreement storage backends. Every adapter
 * also satisfies the persist_agreement and load_recent_agreements
 * capabilities, so it can be registered with the capability registry
 * directly.
 */

import {
  Agreement,
  AgreementOutcome,
  EventSeverity,
  TranscriptActor,
} from '../types';
import { AgreementLoader, AgreementPersister } from '../capabilities/types';
import { ErrorCode, StorageError } from '../errors';

/**
 * Serialized transcript turn
 */
export interface SerializedTranscriptTurn {
  actor: string;
  text: string;
  at: string; // ISO date string
}

/**
 * Serialized agreement format for storage
 * Converts Date objects to ISO strings for JSON compatibility
 */
export interface SerializedAgreement {
  agreement_id: string;
  subject_key: string | null;
  event_type: string;
  severity: string;
  agreed_duration_seconds: number;
  created_at: string; // ISO date string
  expires_at: string; // ISO date string
  negotiation_transcript: SerializedTranscriptTurn[];
  outcome: string;
  is_active: boolean;
  is_violated: boolean;
  violation_count: number;
  metadata: Record<string, unknown>;
}

/**
 * Storage adapter interface
 * All storage backends must implement this interface
 */
export interface AgreementStorageAdapter extends AgreementPersister, AgreementLoader {
  /**
   * Prepares the backend (e.g., open or create the file)
   */
  initialize(): Promise<void>;

  /**
   * Saves an agreement snapshot, replacing any earlier one
   */
  save(agreement: Agreement): Promise<void>;

  /**
   * Retrieves an agreement by ID
   */
  get(agreementId: string): Promise<Agreement | null>;

  getAll(): Promise<Agreement[]>;

  /**
   * Most recently created agreements first
   */
  loadRecent(limit: number): Promise<Agreement[]>;

  count(): Promise<number>;

  /**
   * Clears all agreements (for testing)
   */
  clear(): Promise<void>;

  close(): Promise<void>;
}

function parseEnum<T extends string>(values: readonly T[], value: string, field: string): T {
  const match = values.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new StorageError(
      `Invalid ${field} in stored agreement: ${value}`,
      ErrorCode.STORAGE_INTEGRITY_VIOLATION,
      { operation: 'deserialize' }
    );
  }
  return match;
}

function parseDate(value: string, field: string): Date {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new StorageError(
      `Invalid ${field} in stored agreement: ${value}`,
      ErrorCode.STORAGE_INTEGRITY_VIOLATION,
      { operation: 'deserialize' }
    );
  }
  return date;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isSerializedTurn(value: unknown): value is SerializedTranscriptTurn {
  return (
    isRecord(value) &&
    typeof value.actor === 'string' &&
    typeof value.text === 'string' &&
    typeof value.at === 'string'
  );
}

/**
 * Checks the shape of a stored agreement record
 */
export function isSerializedAgreement(value: unknown): value is SerializedAgreement {
  if (!isRecord(value)) {
    return false;
  }

  const transcript = value.negotiation_transcript;

  return (
    typeof value.agreement_id === 'string' &&
    (value.subject_key === null || typeof value.subject_key === 'string') &&
    typeof value.event_type === 'string' &&
    typeof value.severity === 'string' &&
    typeof value.agreed_duration_seconds === 'number' &&
    typeof value.created_at === 'string' &&
    typeof value.expires_at === 'string' &&
    Array.isArray(transcript) &&
    transcript.every(isSerializedTurn) &&
    typeof value.outcome === 'string' &&
    typeof value.is_active === 'boolean' &&
    typeof value.is_violated === 'boolean' &&
    typeof value.violation_count === 'number' &&
    isRecord(value.metadata)
  );
}

/**
 * Serializes an agreement for JSON storage
 */
export function serializeAgreement(agreement: Agreement): SerializedAgreement {
  return {
    agreement_id: agreement.agreement_id,
    subject_key: agreement.subject_key,
    event_type: agreement.event_type,
    severity: agreement.severity,
    agreed_duration_seconds: agreement.agreed_duration_seconds,
    created_at: agreement.created_at.toISOString(),
    expires_at: agreement.expires_at.toISOString(),
    negotiation_transcript: agreement.negotiation_transcript.map((turn) => ({
      actor: turn.actor,
      text: turn.text,
      at: turn.at.toISOString(),
    })),
    outcome: agreement.outcome,
    is_active: agreement.is_active,
    is_violated: agreement.is_violated,
    violation_count: agreement.violation_count,
    metadata: { ...agreement.metadata },
  };
}

/**
 * Deserializes a stored agreement
 */
export function deserializeAgreement(data: SerializedAgreement): Agreement {
  return {
    agreement_id: data.agreement_id,
    subject_key: data.subject_key,
    event_type: data.event_type,
    severity: parseEnum(Object.values(EventSeverity), data.severity, 'severity'),
    agreed_duration_seconds: data.agreed_duration_seconds,
    created_at: parseDate(data.created_at, 'created_at'),
    expires_at: parseDate(data.expires_at, 'expires_at'),
    negotiation_transcript: data.negotiation_transcript.map((turn) => ({
      actor: parseEnum(Object.values(TranscriptActor), turn.actor, 'transcript actor'),
      text: turn.text,
      at: parseDate(turn.at, 'transcript time'),
    })),
    outcome: parseEnum(Object.values(AgreementOutcome), data.outcome, 'outcome'),
    is_active: data.is_active,
    is_violated: data.is_violated,
    violation_count: data.violation_count,
    metadata: { ...data.metadata },
  };
}

/**
 * Independent copy of an agreement, so stored snapshots never share
 * state with live records
 */
export function cloneAgreement(agreement: Agreement): Agreement {
  return deserializeAgreement(serializeAgreement(agreement));
}

/**
 * Newest first by creation time, then by id
 */
export function selectRecent(agreements: Agreement[], limit: number): Agreement[] {
  return [...agreements]
    .sort((a, b) => {
      const delta = b.created_at.getTime() - a.created_at.getTime();
      if (delta !== 0) {
        return delta;
      }
      return a.agreement_id < b.agreement_id ? -1 : a.agreement_id > b.agreement_id ? 1 : 0;
    })
    .slice(0, Math.max(0, limit));
}
