/**
 * @bidsignal/llm - completion capability contract, Ollama client and
 * parsing helpers for model output
 */

export {
  DEFAULT_OLLAMA_BASE_URL,
  DEFAULT_EXTRACTION_MODEL,
  llmProviderEnum,
  loadLlmSettings,
  type LlmProvider,
  type LlmSettings,
} from './models.js';

export {
  OllamaClient,
  OllamaRequestError,
  type OllamaOptions,
  type OllamaGenerateRequest,
  type OllamaGenerateResponse,
  type OllamaChatMessage,
  type OllamaChatRequest,
  type OllamaChatResponse,
} from './client.js';

export {
  buildPrompt,
  createPromptTemplate,
  executeTemplate,
  renderPrompt,
  structuredExtractionSystem,
  type PromptTemplate,
  type RenderedPrompt,
} from './prompts.js';

export {
  extractJson,
  findBalancedObject,
  parseLooseJson,
  parseJsonResponse,
  jsonFixers,
  type ParseResult,
} from './parse.js';

export {
  createCompletionCapability,
  defaultRetryPolicy,
  extractResponseText,
  listInvocations,
  responseTextProbes,
  sendWithRetry,
  sleep,
  type CompletionCapability,
  type CompletionFn,
  type CompletionMethods,
  type LogEvent,
  type LogFn,
  type RetryPolicy,
  type TextProbe,
} from './capability.js';
