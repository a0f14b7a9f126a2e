import { ClusterStatus, ServerDefinition, ServerEntry } from '../../core/entities/Server.js';
import { createLogger, Logger } from '../../utils/logger.js';

/**
 * Consecutive errors after which a server is taken out of rotation
 */
export const MAX_CONSECUTIVE_ERRORS = 5;

export interface ServerRegistryOptions {
  errorThreshold?: number;
  // Weight of the newest sample in the response time moving average
  latencySmoothing?: number;
  logger?: Logger;
}

/**
 * Owns the health state of every configured inference server.
 *
 * Every mutator runs to completion synchronously, so an error increment and
 * the deactivation it triggers are observed together. Readers always get
 * copies, never the live entries.
 */
export class ServerRegistry {
  private entries: ServerEntry[];
  private byName: Map<string, ServerEntry> = new Map();
  private readonly errorThreshold: number;
  private readonly latencySmoothing: number;
  private readonly logger: Logger;
  private lastHealthCheckAt?: Date;
  private healthCheckIntervalMs?: number;

  constructor(definitions: ServerDefinition[], options: ServerRegistryOptions = {}) {
    this.errorThreshold = options.errorThreshold ?? MAX_CONSECUTIVE_ERRORS;
    this.latencySmoothing = options.latencySmoothing ?? 0.3;
    this.logger = options.logger ?? createLogger('ServerRegistry');

    this.entries = definitions.map((definition) => ({
      ...definition,
      active: true,
      consecutiveErrors: 0,
    }));

    for (const entry of this.entries) {
      if (this.byName.has(entry.name)) {
        throw new Error(`Duplicate server name: ${entry.name}`);
      }
      this.byName.set(entry.name, entry);
    }
  }

  /**
   * All servers in configuration order
   */
  list(): ServerEntry[] {
    return this.entries.map((entry) => ({ ...entry }));
  }

  /**
   * Active servers in configuration order
   */
  listActive(): ServerEntry[] {
    return this.entries.filter((entry) => entry.active).map((entry) => ({ ...entry }));
  }

  get(name: string): ServerEntry | null {
    const entry = this.byName.get(name);
    return entry ? { ...entry } : null;
  }

  get size(): number {
    return this.entries.length;
  }

  get activeCount(): number {
    return this.entries.filter((entry) => entry.active).length;
  }

  get threshold(): number {
    return this.errorThreshold;
  }

  /**
   * Record a successful request. Resets the error streak but never reactivates:
   * only a clean health probe brings a server back.
   */
  recordSuccess(name: string, latencyMs: number): void {
    const entry = this.require(name);
    entry.consecutiveErrors = 0;
    entry.lastError = undefined;
    this.updateLatency(entry, latencyMs);
  }

  /**
   * Record a failed request or probe.
   * @returns true when this failure took the server out of rotation
   */
  recordFailure(name: string, reason?: string): boolean {
    const entry = this.require(name);
    entry.consecutiveErrors++;
    entry.lastError = reason;

    if (entry.active && entry.consecutiveErrors >= this.errorThreshold) {
      entry.active = false;
      this.logger.warn(
        `Server ${name} marked as inactive after ${entry.consecutiveErrors} consecutive errors`
      );
      return true;
    }
    return false;
  }

  /**
   * Force a server in or out of rotation. Activation clears the error streak.
   */
  setActive(name: string, active: boolean): void {
    const entry = this.require(name);
    entry.active = active;
    if (active) {
      entry.consecutiveErrors = 0;
      entry.lastError = undefined;
    }
  }

  /**
   * Apply a clean health probe: active, error streak cleared, timing updated.
   * @returns true if the server was inactive before
   */
  markHealthy(name: string, latencyMs: number, checkedAt: Date = new Date()): boolean {
    const entry = this.require(name);
    const wasInactive = !entry.active;
    this.setActive(name, true);
    entry.lastCheckedAt = checkedAt;
    this.updateLatency(entry, latencyMs);
    return wasInactive;
  }

  /**
   * Apply a failed health probe through the same path as request failures
   */
  markUnhealthy(name: string, reason: string, checkedAt: Date = new Date()): boolean {
    const entry = this.require(name);
    entry.lastCheckedAt = checkedAt;
    return this.recordFailure(name, reason);
  }

  noteHealthCheck(at: Date, intervalMs?: number): void {
    this.lastHealthCheckAt = at;
    if (intervalMs !== undefined) {
      this.healthCheckIntervalMs = intervalMs;
    }
  }

  getStatus(): ClusterStatus {
    const servers = this.list();
    return {
      totalServers: servers.length,
      activeServers: servers.filter((server) => server.active).length,
      errorThreshold: this.errorThreshold,
      lastHealthCheckAt: this.lastHealthCheckAt,
      healthCheckIntervalMs: this.healthCheckIntervalMs,
      servers,
    };
  }

  private updateLatency(entry: ServerEntry, latencyMs: number): void {
    if (!Number.isFinite(latencyMs) || latencyMs < 0) return;
    entry.averageResponseTimeMs =
      entry.averageResponseTimeMs === undefined
        ? latencyMs
        : this.latencySmoothing * latencyMs +
          (1 - this.latencySmoothing) * entry.averageResponseTimeMs;
  }

  private require(name: string): ServerEntry {
    const entry = this.byName.get(name);
    if (!entry) {
      throw new Error(`Unknown server: ${name}`);
    }
    return entry;
  }
}
