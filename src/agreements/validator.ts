/**
 * Agreement Validator
 *
 * Validates agreement structure and invariants.
 */

import {
  Agreement,
  AgreementOutcome,
  EventSeverity,
  ValidationResult,
} from '../types';

export class AgreementValidator {
  /**
   * Validates a complete agreement
   */
  static validate(agreement: Agreement): ValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    if (!agreement.agreement_id || agreement.agreement_id.trim() === '') {
      errors.push('Agreement ID is required');
    }

    if (!agreement.event_type || agreement.event_type.trim() === '') {
      errors.push('Event type is required');
    }

    if (!Object.values(EventSeverity).includes(agreement.severity)) {
      errors.push(`Invalid severity: ${agreement.severity}`);
    }

    if (agreement.subject_key !== null && agreement.subject_key.trim() === '') {
      errors.push('Subject key must be null or a non-empty string');
    }

    this.validateTiming(agreement, errors);
    this.validateFlags(agreement, errors, warnings);

    return {
      valid: errors.length === 0,
      errors,
      warnings,
    };
  }

  /**
   * Validates duration and timestamps
   */
  private static validateTiming(agreement: Agreement, errors: string[]): void {
    const duration = agreement.agreed_duration_seconds;
    if (!Number.isFinite(duration) || duration < 0) {
      errors.push('Agreed duration must be a non-negative number of seconds');
    }

    if (Number.isNaN(agreement.created_at.getTime())) {
      errors.push('Creation time is invalid');
    }

    if (Number.isNaN(agreement.expires_at.getTime())) {
      errors.push('Expiry time is invalid');
    } else if (agreement.expires_at < agreement.created_at) {
      errors.push('Expiry time cannot be before creation time');
    }
  }

  /**
   * Validates violation flags and outcome consistency
   */
  private static validateFlags(
    agreement: Agreement,
    errors: string[],
    warnings: string[]
  ): void {
    if (!Number.isInteger(agreement.violation_count) || agreement.violation_count < 0) {
      errors.push('Violation count must be a non-negative integer');
    }

    if (agreement.is_violated && agreement.violation_count < 1) {
      errors.push('A violated agreement must have at least one recorded violation');
    }

    if (
      agreement.outcome === AgreementOutcome.BLOCKED &&
      agreement.agreed_duration_seconds !== 0
    ) {
      errors.push('Block agreements must have a zero duration');
    }

    if (
      agreement.outcome === AgreementOutcome.BLOCKED &&
      agreement.negotiation_transcript.length > 0
    ) {
      warnings.push('Block agreements are not negotiated; transcript will be ignored');
    }
  }
}
