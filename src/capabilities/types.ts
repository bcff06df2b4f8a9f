/**
 * Capability Types
 *
 * Named external operations the engine consumes through the registry.
 * Concrete adapters (voice services, browser control, dialogs, storage)
 * live outside the core and are registered at wiring time.
 */

import { Agreement } from '../types';

/**
 * Notification urgency
 */
export enum NotificationUrgency {
  LOW = 'low',
  NORMAL = 'normal',
  HIGH = 'high',
}

/**
 * Service availability status
 */
export enum ServiceStatus {
  AVAILABLE = 'available',
  DEGRADED = 'degraded',
  UNAVAILABLE = 'unavailable',
}

export interface SpeechSynthesizer {
  synthesize(text: string): Promise<void>;
}

export interface Notifier {
  notify(message: string, urgency: NotificationUrgency): Promise<void>;
}

export interface ResourceCloser {
  /** Closes the browser tab or process; resolves false when nothing was closed */
  close(subjectKey: string): Promise<boolean>;
}

export interface ImageCapturer {
  capture(): Promise<Uint8Array | null>;
}

export interface AgreementPersister {
  save(agreement: Agreement): Promise<void>;
}

export interface AgreementLoader {
  loadRecent(limit: number): Promise<Agreement[]>;
}

/**
 * Capability name → service interface
 */
export interface CapabilityMap {
  synthesize_speech: SpeechSynthesizer;
  notify: Notifier;
  close_resource: ResourceCloser;
  capture_user_image: ImageCapturer;
  persist_agreement: AgreementPersister;
  load_recent_agreements: AgreementLoader;
}

export type CapabilityName = keyof CapabilityMap;

export const CAPABILITY_NAMES: readonly CapabilityName[] = [
  'synthesize_speech',
  'notify',
  'close_resource',
  'capture_user_image',
  'persist_agreement',
  'load_recent_agreements',
];

/**
 * Explicit health probe supplied at registration
 */
export type HealthCheck = () => ServiceStatus | Promise<ServiceStatus>;

/**
 * Cached health of a registered service
 */
export interface ServiceHealth {
  status: ServiceStatus;
  last_checked: Date;
  response_time_ms: number;
  /** Consecutive failed checks or reported call failures */
  error_count: number;
  error?: string;
}

/**
 * A service registered for one capability
 */
export interface RegisteredService<K extends CapabilityName> {
  service_id: string;
  capability: K;
  instance: CapabilityMap[K];
  health_check?: HealthCheck;
  health: ServiceHealth;
}

/**
 * Service picked by resolution
 */
export interface ResolvedService<K extends CapabilityName> {
  service_id: string;
  instance: CapabilityMap[K];
}

export interface RegisterOptions {
  healthCheck?: HealthCheck;
}

/**
 * Listener for health status changes
 */
export type HealthChangeListener = (
  capability: CapabilityName,
  serviceId: string,
  health: ServiceHealth,
  previous: ServiceStatus
) => void;

/**
 * Registry configuration
 */
export interface CapabilityRegistryConfig {
  /** How long cached health stays fresh (default: 30000 ms) */
  healthRefreshIntervalMs?: number;
  /** Reported call failures before a service is marked unavailable (default: 3) */
  failureThreshold?: number;
  /** Time source (default: wall clock) */
  clock?: () => Date;
}

export interface RegistryStats {
  total_services: number;
  available: number;
  degraded: number;
  unavailable: number;
  services: Array<{
    capability: CapabilityName;
    service_id: string;
    status: ServiceStatus;
    error_count: number;
    response_time_ms: number;
  }>;
}
