/**
 * Shared types and interfaces for all agents.
 */

import type { ZodType, ZodTypeDef } from 'zod';
import type { LogEvent } from '@bidsignal/llm';

export type LogLevel = LogEvent['level'];

/** Echo order for LOG_LEVEL: a level is printed when it ranks at or above the threshold. */
export const LOG_LEVEL_RANK: Readonly<Record<LogLevel, number>> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface AgentLog extends LogEvent {
  timestamp: Date;
}

export interface AgentContext {
  runId?: string;
  timestamp: Date;
  metadata?: Record<string, unknown>;
}

export interface AgentResult<T> {
  success: boolean;
  data?: T;
  error?: string;
  /** Schema issues when the input was rejected, as `path: message` */
  issues?: string[];
  duration: number;
  context: AgentContext;
}

export interface AgentConfig {
  name: string;
  description: string;
  version: string;
  /** Extra attempts for each remote model call made by the agent */
  retries?: number;
}

export interface Agent<TInput, TOutput> {
  config: AgentConfig;
  inputSchema: ZodType<TInput, ZodTypeDef, unknown>;
  outputSchema: ZodType<TOutput, ZodTypeDef, unknown>;
  execute(input: unknown, context?: Partial<AgentContext>): Promise<AgentResult<TOutput>>;
}
