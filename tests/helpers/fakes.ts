import { ServerDefinition } from '../../src/core/entities/Server.js';
import {
  GenerationResult,
  IOllamaClient,
  IReachabilityProbe,
  ModelInfo,
} from '../../src/core/interfaces/IOllamaClient.js';
import { Logger } from '../../src/utils/logger.js';

export type GenerateBehavior = (text: string, call: number) => Promise<GenerationResult>;

export function server(name: string, overrides: Partial<ServerDefinition> = {}): ServerDefinition {
  return {
    name,
    url: `http://${name.toLowerCase()}.test:11434`,
    model: 'gemma3',
    timeoutMs: 1000,
    maxRetries: 3,
    ...overrides,
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export function succeed(content: string, delayMs: number = 0): Promise<GenerationResult> {
  if (delayMs === 0) return Promise.resolve({ content, latencyMs: 1 });
  return new Promise((resolve) => setTimeout(() => resolve({ content, latencyMs: delayMs }), delayMs));
}

export function fail(message: string): Promise<GenerationResult> {
  return Promise.reject(new Error(message));
}

export function hang(): Promise<GenerationResult> {
  return new Promise(() => undefined);
}

/**
 * Scripted inference client. Servers without a script answer `<server>:<text>`.
 */
export class FakeOllamaClient implements IOllamaClient {
  readonly calls: Array<{ server: string; text: string }> = [];
  private behaviors: Map<string, GenerateBehavior> = new Map();
  private models: Map<string, ModelInfo[] | Error> = new Map();
  private inFlight = 0;
  maxInFlight = 0;

  onGenerate(serverName: string, behavior: GenerateBehavior): this {
    this.behaviors.set(serverName, behavior);
    return this;
  }

  setModels(serverName: string, models: ModelInfo[] | Error): this {
    this.models.set(serverName, models);
    return this;
  }

  callsTo(serverName: string): number {
    return this.calls.filter((call) => call.server === serverName).length;
  }

  async generate(target: ServerDefinition, text: string): Promise<GenerationResult> {
    this.calls.push({ server: target.name, text });
    const call = this.callsTo(target.name);
    const behavior = this.behaviors.get(target.name);

    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      return await (behavior ? behavior(text, call) : succeed(`${target.name}:${text}`));
    } finally {
      this.inFlight--;
    }
  }

  async listModels(target: ServerDefinition): Promise<ModelInfo[]> {
    const models = this.models.get(target.name) ?? [{ name: `${target.model}:latest` }];
    if (models instanceof Error) throw models;
    return models;
  }
}

export class FakeProbe implements IReachabilityProbe {
  private reachable: Map<string, boolean | 'hang'> = new Map();

  set(serverName: string, state: boolean | 'hang'): this {
    this.reachable.set(serverName, state);
    return this;
  }

  isReachable(target: ServerDefinition): Promise<boolean> {
    const state = this.reachable.get(target.name) ?? true;
    if (state === 'hang') return new Promise(() => undefined);
    return Promise.resolve(state);
  }
}
