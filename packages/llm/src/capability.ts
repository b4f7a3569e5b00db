/**
 * Completion capability - the "send prompt, receive text" contract the
 * extraction pipeline consumes.
 *
 * A capability may be a plain function or an object exposing any of
 * `invoke(prompt)`, `chat(prompt)`, `generate({ prompt })` or
 * `complete({ prompt })`, returning a string or one of several SDK response
 * shapes, synchronously or as a promise. Callers never branch on the shape:
 * `sendWithRetry` probes the calling conventions and `extractResponseText`
 * probes the response shapes, both in a fixed order.
 */

import { OllamaClient } from './client.js';
import { loadLlmSettings, type LlmSettings } from './models.js';

export type CompletionFn = (prompt: string) => unknown;

export interface CompletionMethods {
  invoke?(prompt: string): unknown;
  chat?(prompt: string): unknown;
  generate?(request: { prompt: string }): unknown;
  complete?(request: { prompt: string }): unknown;
}

export type CompletionCapability = CompletionFn | CompletionMethods;

export interface LogEvent {
  level: 'debug' | 'info' | 'warn' | 'error';
  message: string;
  data?: unknown;
}

export type LogFn = (event: LogEvent) => void;

export interface RetryPolicy {
  /** Additional attempts after the first one */
  retries: number;
  /** Fixed pause between attempts */
  delayMs: number;
}

export const defaultRetryPolicy: RetryPolicy = Object.freeze({ retries: 2, delayMs: 500 });

// ---------------------------------------------------------------------------
// Response shapes
// ---------------------------------------------------------------------------

/** Returns the text a response carries, or undefined when the shape does not apply. */
export type TextProbe = (response: unknown) => string | undefined;

function field(value: unknown, key: string): unknown {
  if (typeof value !== 'object' || value === null) return undefined;
  return Reflect.get(value, key);
}

function firstItem(value: unknown): unknown {
  return Array.isArray(value) && value.length > 0 ? value[0] : undefined;
}

function asText(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

export const responseTextProbes: readonly TextProbe[] = [
  // plain string
  (response) => asText(response),
  // { content: "..." }
  (response) => asText(field(response, 'content')),
  // { content: { parts: [{ text }] } }
  (response) => asText(field(firstItem(field(field(response, 'content'), 'parts')), 'text')),
  // { text: "..." }
  (response) => asText(field(response, 'text')),
  // OpenAI-style { choices: [{ message: { content } }] } or { choices: [{ text }] }
  (response) => {
    const choice = firstItem(field(response, 'choices'));
    return asText(field(field(choice, 'message'), 'content')) ?? asText(field(choice, 'text'));
  },
  // Ollama /api/chat
  (response) => asText(field(field(response, 'message'), 'content')),
  // Ollama /api/generate
  (response) => asText(field(response, 'response')),
];

/**
 * Extract the text payload from any supported response shape.
 */
export function extractResponseText(
  response: unknown,
  probes: readonly TextProbe[] = responseTextProbes,
): string | undefined {
  for (const probe of probes) {
    const text = probe(response);
    if (text !== undefined) return text;
  }
  return undefined;
}

// ---------------------------------------------------------------------------
// Calling conventions
// ---------------------------------------------------------------------------

type Invocation = (prompt: string) => unknown;

function boundMethod(target: unknown, name: string): ((arg: unknown) => unknown) | undefined {
  const candidate = field(target, name);
  if (typeof candidate !== 'function') return undefined;
  return (arg: unknown): unknown => candidate.call(target, arg);
}

/**
 * Calling conventions in probe order: invoke, call, chat, generate, complete.
 */
export function listInvocations(capability: CompletionCapability): Invocation[] {
  const invocations: Invocation[] = [];

  const invoke = boundMethod(capability, 'invoke');
  if (invoke) invocations.push((prompt) => invoke(prompt));

  if (typeof capability === 'function') {
    const call = capability;
    invocations.push((prompt) => call(prompt));
  }

  const chat = boundMethod(capability, 'chat');
  if (chat) invocations.push((prompt) => chat(prompt));

  for (const name of ['generate', 'complete']) {
    const method = boundMethod(capability, name);
    if (method) invocations.push((prompt) => method({ prompt }));
  }

  return invocations;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function describeError(err: unknown): string {
  return err instanceof Error ? `${err.name}: ${err.message}` : String(err);
}

/**
 * Send a prompt through whichever convention the capability exposes.
 * Each attempt tries every convention until one yields non-blank text;
 * a failed attempt is followed by up to `policy.retries` more after a fixed delay.
 * Returns '' when every attempt fails.
 */
export async function sendWithRetry(
  capability: CompletionCapability,
  prompt: string,
  policy: RetryPolicy = defaultRetryPolicy,
  log?: LogFn,
): Promise<string> {
  const invocations = listInvocations(capability);
  if (invocations.length === 0) {
    log?.({ level: 'warn', message: 'Completion capability exposes no calling convention' });
    return '';
  }

  const attempts = Math.max(0, policy.retries) + 1;
  let lastError: string | undefined;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    for (const invocation of invocations) {
      try {
        const response: unknown = await invocation(prompt);
        const text = extractResponseText(response);
        if (text !== undefined && text.trim()) return text;
        lastError = 'Response carried no text';
      } catch (err) {
        lastError = describeError(err);
      }
    }

    if (attempt < attempts) {
      log?.({
        level: 'debug',
        message: `Completion attempt ${attempt}/${attempts} failed; retrying`,
        data: { error: lastError },
      });
      await sleep(policy.delayMs);
    }
  }

  log?.({
    level: 'warn',
    message: `Completion failed after ${attempts} attempts`,
    data: { error: lastError },
  });
  return '';
}

// ---------------------------------------------------------------------------
// Default capability
// ---------------------------------------------------------------------------

/**
 * Build the Ollama-backed capability from settings (environment by default).
 * Returns null when the provider is disabled.
 */
export function createCompletionCapability(
  settings: LlmSettings = loadLlmSettings(),
): CompletionMethods | null {
  if (settings.provider === 'none') return null;

  const client = new OllamaClient(settings.baseUrl, settings.timeout);
  const options = { temperature: settings.temperature, num_predict: settings.maxTokens };

  return {
    chat: (prompt: string) =>
      client.chat({
        model: settings.model,
        messages: [{ role: 'user', content: prompt }],
        format: 'json',
        options,
      }),
    generate: ({ prompt }: { prompt: string }) =>
      client.generate({ model: settings.model, prompt, format: 'json', options }),
  };
}
