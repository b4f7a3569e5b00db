/**
 * Ollama HTTP client for the extraction model (non-streaming).
 */

import { DEFAULT_OLLAMA_BASE_URL } from './models.js';

export interface OllamaOptions {
  temperature?: number;
  top_p?: number;
  num_predict?: number;
  stop?: string[];
}

export interface OllamaGenerateRequest {
  model: string;
  prompt: string;
  system?: string;
  stream?: boolean;
  format?: 'json';
  options?: OllamaOptions;
}

export interface OllamaGenerateResponse {
  model: string;
  created_at: string;
  response: string;
  done: boolean;
  total_duration?: number;
  eval_count?: number;
}

export interface OllamaChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface OllamaChatRequest {
  model: string;
  messages: OllamaChatMessage[];
  stream?: boolean;
  format?: 'json';
  options?: OllamaOptions;
}

export interface OllamaChatResponse {
  model: string;
  created_at: string;
  message: OllamaChatMessage;
  done: boolean;
  total_duration?: number;
  eval_count?: number;
}

interface OllamaTagsResponse {
  models?: Array<{ name: string }>;
}

/** Non-2xx answer from the Ollama server. */
export class OllamaRequestError extends Error {
  constructor(
    readonly endpoint: string,
    readonly status: number,
    readonly body: string,
  ) {
    super(`Ollama ${endpoint} failed: ${status} - ${body}`);
    this.name = 'OllamaRequestError';
  }
}

export class OllamaClient {
  private baseUrl: string;
  private defaultTimeout: number;

  constructor(baseUrl: string = DEFAULT_OLLAMA_BASE_URL, defaultTimeout: number = 120000) {
    this.baseUrl = baseUrl.replace(/\/$/, '');
    this.defaultTimeout = defaultTimeout;
  }

  /**
   * Single completion via /api/generate.
   */
  generate(request: OllamaGenerateRequest, timeout?: number): Promise<OllamaGenerateResponse> {
    return this.post<OllamaGenerateResponse>('generate', request, timeout);
  }

  /**
   * Chat completion via /api/chat.
   */
  chat(request: OllamaChatRequest, timeout?: number): Promise<OllamaChatResponse> {
    return this.post<OllamaChatResponse>('chat', request, timeout);
  }

  /**
   * True when the server answers; with `model`, also requires that model to be pulled.
   */
  async isAvailable(model?: string): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/api/tags`);
      if (!response.ok) return false;
      if (!model) return true;

      const data = (await response.json()) as OllamaTagsResponse;
      return (data.models ?? []).some((m) => m.name === model || m.name.startsWith(`${model}:`));
    } catch {
      return false;
    }
  }

  private async post<T>(endpoint: string, body: object, timeout?: number): Promise<T> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout ?? this.defaultTimeout);

    try {
      const response = await fetch(`${this.baseUrl}/api/${endpoint}`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ ...body, stream: false }),
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new OllamaRequestError(endpoint, response.status, await response.text());
      }

      return response.json() as Promise<T>;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
