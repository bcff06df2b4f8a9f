/**
 * Capability Registry
 *
 * Resolves named capabilities to registered services, trying a primary
 * service and then an ordered fallback list. Availability comes from a
 * cached ServiceHealth value refreshed on pull, never from probing the
 * service object itself.
 */

import { AuditLogger } from '../audit/logger';
import { AuditEventType } from '../types';
import { NoCapabilityAvailableError } from '../errors';
import {
  CAPABILITY_NAMES,
  CapabilityMap,
  CapabilityName,
  CapabilityRegistryConfig,
  HealthChangeListener,
  RegisterOptions,
  RegisteredService,
  RegistryStats,
  ResolvedService,
  ServiceHealth,
  ServiceStatus,
} from './types';

type ServiceTable = { [K in CapabilityName]: Map<string, RegisteredService<K>> };

export class CapabilityRegistry {
  private services: ServiceTable = {
    synthesize_speech: new Map(),
    notify: new Map(),
    close_resource: new Map(),
    capture_user_image: new Map(),
    persist_agreement: new Map(),
    load_recent_agreements: new Map(),
  };
  private chains: Partial<Record<CapabilityName, string[]>> = {};
  private healthListeners: HealthChangeListener[] = [];
  private healthRefreshIntervalMs: number;
  private failureThreshold: number;
  private clock: () => Date;

  constructor(
    private auditLogger: AuditLogger,
    config: CapabilityRegistryConfig = {}
  ) {
    this.healthRefreshIntervalMs = config.healthRefreshIntervalMs ?? 30000;
    this.failureThreshold = config.failureThreshold ?? 3;
    this.clock = config.clock ?? (() => new Date());
  }

  /**
   * Register a service for a capability.
   * Services with a health check are probed on first resolution.
   */
  register<K extends CapabilityName>(
    capability: K,
    serviceId: string,
    instance: CapabilityMap[K],
    options: RegisterOptions = {}
  ): void {
    const entry: RegisteredService<K> = {
      service_id: serviceId,
      capability,
      instance,
      health_check: options.healthCheck,
      health: {
        status: ServiceStatus.AVAILABLE,
        // Epoch marks the cached health as stale
        last_checked: options.healthCheck ? new Date(0) : this.clock(),
        response_time_ms: 0,
        error_count: 0,
      },
    };

    this.services[capability].set(serviceId, entry);
  }

  /**
   * Unregister a service
   */
  unregister(capability: CapabilityName, serviceId: string): boolean {
    return this.services[capability].delete(serviceId);
  }

  /**
   * Set the primary + fallback order for a capability.
   * Without one, registration order is used.
   */
  setFallbackChain(capability: CapabilityName, serviceIds: string[]): void {
    this.chains[capability] = [...serviceIds];
  }

  /**
   * Current resolution order for a capability
   */
  getFallbackChain(capability: CapabilityName): string[] {
    const explicit = this.chains[capability];
    if (explicit) {
      return [...explicit];
    }
    return Array.from(this.services[capability].keys());
  }

  /**
   * Resolve a capability through its fallback chain
   */
  async resolve<K extends CapabilityName>(capability: K): Promise<CapabilityMap[K] | null> {
    const resolved = await this.resolveService(capability);
    return resolved ? resolved.instance : null;
  }

  /**
   * Resolve a capability, keeping the id of the chosen service so callers
   * can report call failures against it
   */
  async resolveService<K extends CapabilityName>(capability: K): Promise<ResolvedService<K> | null> {
    const [primary, ...fallbacks] = this.getFallbackChain(capability);
    if (primary === undefined) {
      this.auditLogger.logCapability(AuditEventType.CAPABILITY_UNAVAILABLE, capability, {
        reason: 'no_services_registered',
      });
      return null;
    }

    const entry = await this.select(capability, primary, fallbacks);
    return entry ? { service_id: entry.service_id, instance: entry.instance } : null;
  }

  /**
   * Try the primary service, then each fallback in order.
   * Returns the first whose cached health is not unavailable.
   */
  async resolveWithFallback<K extends CapabilityName>(
    capability: K,
    primaryId: string,
    fallbackIds: string[]
  ): Promise<CapabilityMap[K] | null> {
    const entry = await this.select(capability, primaryId, fallbackIds);
    return entry ? entry.instance : null;
  }

  /**
   * Resolve or throw NoCapabilityAvailableError
   */
  async require<K extends CapabilityName>(capability: K): Promise<CapabilityMap[K]> {
    const service = await this.resolve(capability);
    if (service === null) {
      throw new NoCapabilityAvailableError(capability, {
        source_component: 'capability-registry',
      });
    }
    return service;
  }

  /**
   * Probe one service now, regardless of cache age
   */
  async checkHealth(capability: CapabilityName, serviceId: string): Promise<ServiceHealth> {
    const entry = this.services[capability].get(serviceId);
    if (!entry) {
      return {
        status: ServiceStatus.UNAVAILABLE,
        last_checked: this.clock(),
        response_time_ms: 0,
        error_count: 0,
        error: 'not_registered',
      };
    }

    return this.probe(entry);
  }

  /**
   * Probe every registered service
   */
  async checkAllHealth(): Promise<
    Array<{ capability: CapabilityName; service_id: string; health: ServiceHealth }>
  > {
    const results: Array<{
      capability: CapabilityName;
      service_id: string;
      health: ServiceHealth;
    }> = [];

    for (const entry of this.allEntries()) {
      const health = await this.probe(entry);
      results.push({ capability: entry.capability, service_id: entry.service_id, health });
    }

    return results;
  }

  /**
   * Cached health of a service, or null when not registered
   */
  getHealth(capability: CapabilityName, serviceId: string): ServiceHealth | null {
    const entry = this.services[capability].get(serviceId);
    return entry ? { ...entry.health } : null;
  }

  /**
   * Report a failed call. The service degrades, and becomes unavailable
   * after failureThreshold consecutive failures.
   */
  reportFailure(capability: CapabilityName, serviceId: string, error?: string): void {
    const entry = this.services[capability].get(serviceId);
    if (!entry) {
      return;
    }

    const errorCount = entry.health.error_count + 1;
    this.updateHealth(entry, {
      status:
        errorCount >= this.failureThreshold
          ? ServiceStatus.UNAVAILABLE
          : ServiceStatus.DEGRADED,
      last_checked: this.clock(),
      response_time_ms: entry.health.response_time_ms,
      error_count: errorCount,
      error,
    });
  }

  /**
   * Report a successful call, clearing accumulated failures
   */
  reportSuccess(capability: CapabilityName, serviceId: string): void {
    const entry = this.services[capability].get(serviceId);
    if (!entry) {
      return;
    }

    this.updateHealth(entry, {
      status: ServiceStatus.AVAILABLE,
      last_checked: this.clock(),
      response_time_ms: entry.health.response_time_ms,
      error_count: 0,
    });
  }

  /**
   * Subscribe to health status changes
   */
  onHealthChange(listener: HealthChangeListener): () => void {
    this.healthListeners.push(listener);
    return () => {
      const index = this.healthListeners.indexOf(listener);
      if (index > -1) {
        this.healthListeners.splice(index, 1);
      }
    };
  }

  /**
   * Registry statistics
   */
  getStats(): RegistryStats {
    const services = this.allEntries().map((entry) => ({
      capability: entry.capability,
      service_id: entry.service_id,
      status: entry.health.status,
      error_count: entry.health.error_count,
      response_time_ms: entry.health.response_time_ms,
    }));

    return {
      total_services: services.length,
      available: services.filter((s) => s.status === ServiceStatus.AVAILABLE).length,
      degraded: services.filter((s) => s.status === ServiceStatus.DEGRADED).length,
      unavailable: services.filter((s) => s.status === ServiceStatus.UNAVAILABLE).length,
      services,
    };
  }

  private async select<K extends CapabilityName>(
    capability: K,
    primaryId: string,
    fallbackIds: string[]
  ): Promise<RegisteredService<K> | null> {
    for (const serviceId of [primaryId, ...fallbackIds]) {
      const entry = this.services[capability].get(serviceId);
      if (!entry) {
        continue;
      }

      await this.refreshIfStale(entry);

      if (entry.health.status !== ServiceStatus.UNAVAILABLE) {
        if (serviceId !== primaryId) {
          this.auditLogger.logCapability(AuditEventType.CAPABILITY_FALLBACK, capability, {
            preferred: primaryId,
            selected: serviceId,
          });
        }
        return entry;
      }
    }

    this.auditLogger.logCapability(AuditEventType.CAPABILITY_UNAVAILABLE, capability, {
      tried: [primaryId, ...fallbackIds],
    });
    return null;
  }

  private async refreshIfStale(entry: RegisteredService<CapabilityName>): Promise<void> {
    const age = this.clock().getTime() - entry.health.last_checked.getTime();
    if (age < this.healthRefreshIntervalMs) {
      return;
    }

    if (entry.health_check) {
      await this.probe(entry);
      return;
    }

    // No probe: give an unavailable service one trial call. A further
    // failure takes it out again, a success clears it.
    if (entry.health.status === ServiceStatus.UNAVAILABLE) {
      this.updateHealth(entry, {
        ...entry.health,
        status: ServiceStatus.DEGRADED,
        last_checked: this.clock(),
        error_count: Math.max(0, this.failureThreshold - 1),
      });
    }
  }

  private async probe(entry: RegisteredService<CapabilityName>): Promise<ServiceHealth> {
    if (!entry.health_check) {
      // Nothing to probe; reported failures are the only signal
      return { ...entry.health };
    }

    const started = Date.now();
    let status: ServiceStatus;
    let error: string | undefined;

    try {
      status = await entry.health_check();
    } catch (probeError) {
      status = ServiceStatus.UNAVAILABLE;
      error = probeError instanceof Error ? probeError.message : String(probeError);
    }

    const health: ServiceHealth = {
      status,
      last_checked: this.clock(),
      response_time_ms: Date.now() - started,
      error_count:
        status === ServiceStatus.AVAILABLE ? 0 : entry.health.error_count + 1,
      error,
    };

    this.updateHealth(entry, health);
    return { ...health };
  }

  private updateHealth(entry: RegisteredService<CapabilityName>, health: ServiceHealth): void {
    const previous = entry.health.status;
    entry.health = health;

    if (previous !== health.status) {
      for (const listener of this.healthListeners) {
        try {
          listener(entry.capability, entry.service_id, { ...health }, previous);
        } catch (error) {
          console.error('Health listener error:', error);
        }
      }
    }
  }

  private listFor<K extends CapabilityName>(capability: K): RegisteredService<K>[] {
    return Array.from(this.services[capability].values());
  }

  private allEntries(): RegisteredService<CapabilityName>[] {
    return CAPABILITY_NAMES.flatMap((capability) => this.listFor(capability));
  }
}
