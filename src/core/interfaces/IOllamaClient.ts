import { ServerDefinition } from '../entities/Server.js';

export interface GenerationResult {
  content: string;
  latencyMs: number;
}

export interface ModelInfo {
  name: string;
  size?: number;
  modified_at?: string;
}

/**
 * Interface for the Ollama API client. The target server is chosen per call.
 */
export interface IOllamaClient {
  /**
   * Run observation extraction on one chunk of text
   */
  generate(server: ServerDefinition, text: string): Promise<GenerationResult>;

  /**
   * List the models a server can serve (capability probe)
   */
  listModels(server: ServerDefinition, timeoutMs?: number): Promise<ModelInfo[]>;
}

/**
 * Low-level reachability check, independent of the HTTP protocol
 */
export interface IReachabilityProbe {
  isReachable(server: ServerDefinition, timeoutMs: number): Promise<boolean>;
}
