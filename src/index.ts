/**
 * Focus Agreements
 *
 * Time-bound agreements negotiated between an automated focus monitor and
 * its user ("ten more minutes on this site"), with compliance tracking and
 * escalation from warning to grace period to enforcement when the user
 * overruns them.
 *
 * @packageDocumentation
 */

// Main system
export { FocusAgreementSystem, FocusAgreementSystemConfig } from './system';

// Types
export * from './types';

// Agreements
export { AgreementLifecycleManager, AgreementLifecycleOptions } from './agreements/lifecycle';
export { AgreementValidator } from './agreements/validator';

// Audit
export {
  AuditLogger,
  ComplianceAuditType,
  NegotiationAuditType,
  EnforcementAuditType,
} from './audit/logger';

// Negotiation
export * from './negotiation';

// Compliance
export * from './compliance';

// Enforcement
export * from './enforcement';

// Capabilities
export * from './capabilities';

// Monitoring loop
export * from './monitor';

// Storage
export {
  AgreementStorageAdapter,
  SerializedAgreement,
  SerializedTranscriptTurn,
  serializeAgreement,
  deserializeAgreement,
  isSerializedAgreement,
} from './storage/adapter';
export { MemoryStorageAdapter } from './storage/memory-adapter';
export { FileStorageAdapter, FileStorageConfig } from './storage/file-adapter';

// Errors
export * from './errors';
