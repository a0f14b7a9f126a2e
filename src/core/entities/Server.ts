/**
 * Inference server domain entities
 */

/**
 * Static server definition, loaded once from the servers file
 */
export interface ServerDefinition {
  readonly name: string;
  readonly url: string;
  readonly model: string;
  readonly timeoutMs: number;
  readonly maxRetries: number;
}

/**
 * Live health state of a configured server
 */
export interface ServerHealth {
  active: boolean;
  consecutiveErrors: number;
  lastCheckedAt?: Date;
  averageResponseTimeMs?: number;
  lastError?: string;
}

export type ServerEntry = ServerDefinition & ServerHealth;

export interface ClusterStatus {
  totalServers: number;
  activeServers: number;
  errorThreshold: number;
  lastHealthCheckAt?: Date;
  healthCheckIntervalMs?: number;
  servers: ServerEntry[];
}
