import fetch, { FetchError, Response } from 'node-fetch';
import { ServerDefinition } from '../../core/entities/Server.js';
import { ENTITY_CATEGORIES } from '../../core/entities/Observation.js';
import { GenerationResult, IOllamaClient, ModelInfo } from '../../core/interfaces/IOllamaClient.js';
import { InferenceRequestError, InferenceTimeoutError } from '../../core/errors.js';

export const EXTRACTION_SYSTEM_PROMPT =
  'Extract observations from the text. An observation is a natural language statement that ' +
  'contains one or more entities and describes relationships or facts about them. For each ' +
  'observation, identify the most important entities mentioned in it and provide a single word ' +
  'that best describes the key relationship or fact. Try to limit to 2 entities per observation, ' +
  "but you may include more if multiple people's names are listed together or if the observation " +
  'requires more entities to be meaningful. Use these standardized categories: ' +
  `${ENTITY_CATEGORIES.join(', ')}. ` +
  'The label should be the actual name of the entity.';

/**
 * JSON schema Ollama uses to constrain the output
 */
export const OBSERVATION_FORMAT = {
  type: 'array',
  items: {
    type: 'object',
    properties: {
      observation: {
        type: 'string',
        description: 'A natural language statement that describes relationships or facts about entities',
      },
      relationship: {
        type: 'string',
        description: 'A single word that best describes the key relationship or fact',
      },
      entities: {
        type: 'array',
        items: {
          type: 'object',
          properties: {
            label: { type: 'string', description: 'The actual name of the entity' },
            category: { type: 'string', description: `One of: ${ENTITY_CATEGORIES.join(', ')}` },
          },
          required: ['label', 'category'],
        },
      },
    },
    required: ['observation', 'relationship', 'entities'],
  },
} as const;

interface OllamaChatResponse {
  model?: string;
  created_at?: string;
  message?: { role: string; content: string };
  done?: boolean;
}

interface OllamaTagsResponse {
  models?: ModelInfo[];
}

/**
 * Ollama API Client implementation.
 * Requests are deterministic (temperature 0, fixed seed) so re-running a chunk
 * on another server gives the same extraction.
 */
export class OllamaApiClient implements IOllamaClient {
  async generate(server: ServerDefinition, text: string): Promise<GenerationResult> {
    const startedAt = Date.now();

    const data = await this.request<OllamaChatResponse>(server, '/api/chat', server.timeoutMs, {
      method: 'POST',
      body: JSON.stringify({
        model: server.model,
        messages: [
          { role: 'system', content: EXTRACTION_SYSTEM_PROMPT },
          { role: 'user', content: `Extract observations from this text:\n\n${text}` },
        ],
        stream: false,
        format: OBSERVATION_FORMAT,
        options: {
          temperature: 0,
          top_p: 1.0,
          top_k: 1,
          repeat_penalty: 1.0,
          seed: 42,
        },
      }),
    });

    if (!data.message || typeof data.message.content !== 'string') {
      throw new InferenceRequestError(server.name, `Malformed chat response from ${server.name}`, 200);
    }

    return {
      content: data.message.content,
      latencyMs: Date.now() - startedAt,
    };
  }

  async listModels(server: ServerDefinition, timeoutMs: number = server.timeoutMs): Promise<ModelInfo[]> {
    const data = await this.request<OllamaTagsResponse>(server, '/api/tags', timeoutMs, {
      method: 'GET',
    });
    return data.models || [];
  }

  private async request<T>(
    server: ServerDefinition,
    path: string,
    timeoutMs: number,
    init: { method: 'GET' | 'POST'; body?: string }
  ): Promise<T> {
    const url = `${server.url.replace(/\/+$/, '')}${path}`;

    let res: Response;
    try {
      res = await fetch(url, {
        method: init.method,
        headers: { 'Content-Type': 'application/json' },
        body: init.body,
        timeout: timeoutMs,
      });
    } catch (error) {
      if (error instanceof FetchError && error.type === 'request-timeout') {
        throw new InferenceTimeoutError(server.name, timeoutMs);
      }
      throw new InferenceRequestError(
        server.name,
        `Request to ${server.name} failed: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    if (!res.ok) {
      throw new InferenceRequestError(server.name, `HTTP error! status: ${res.status}`, res.status);
    }

    try {
      return (await res.json()) as T;
    } catch (error) {
      if (error instanceof FetchError && error.type === 'body-timeout') {
        throw new InferenceTimeoutError(server.name, timeoutMs);
      }
      throw new InferenceRequestError(server.name, `Invalid JSON from ${server.name}`, res.status);
    }
  }
}
