/**
 * Base agent: schema-checked execute, buffered logs, retry policy from config.
 */

import type { ZodType, ZodTypeDef } from 'zod';
import { defaultRetryPolicy, type LogFn, type RetryPolicy } from '@bidsignal/llm';
import {
  LOG_LEVEL_RANK,
  type Agent,
  type AgentConfig,
  type AgentContext,
  type AgentLog,
  type AgentResult,
  type LogLevel,
} from './types.js';

function echoThreshold(): number {
  const configured = process.env.LOG_LEVEL?.trim().toLowerCase();
  const match = Object.entries(LOG_LEVEL_RANK).find(([level]) => level === configured);
  return match ? match[1] : LOG_LEVEL_RANK.error;
}

export abstract class BaseAgent<TInput, TOutput> implements Agent<TInput, TOutput> {
  abstract config: AgentConfig;
  abstract inputSchema: ZodType<TInput, ZodTypeDef, unknown>;
  abstract outputSchema: ZodType<TOutput, ZodTypeDef, unknown>;

  protected logs: AgentLog[] = [];

  protected log(level: LogLevel, message: string, data?: unknown): void {
    this.logs.push({ timestamp: new Date(), level, message, data });

    if (LOG_LEVEL_RANK[level] < echoThreshold()) return;
    const line = `[${this.config.name}] [${level.toUpperCase()}] ${message}`;
    if (level === 'error' || level === 'warn') {
      console.error(line, data ?? '');
    } else {
      console.log(line, data ?? '');
    }
  }

  protected debug(message: string, data?: unknown): void {
    this.log('debug', message, data);
  }

  protected info(message: string, data?: unknown): void {
    this.log('info', message, data);
  }

  protected warn(message: string, data?: unknown): void {
    this.log('warn', message, data);
  }

  protected error(message: string, data?: unknown): void {
    this.log('error', message, data);
  }

  /** Log callback for pipeline functions that report into this agent's buffer. */
  protected get logSink(): LogFn {
    return (event) => this.log(event.level, event.message, event.data);
  }

  /** `config.retries` extra attempts per model call, with a fixed pause between them. */
  protected retryPolicy(delayMs: number = defaultRetryPolicy.delayMs): RetryPolicy {
    return { retries: this.config.retries ?? defaultRetryPolicy.retries, delayMs };
  }

  async execute(input: unknown, context?: Partial<AgentContext>): Promise<AgentResult<TOutput>> {
    const startTime = Date.now();
    this.logs = [];

    const fullContext: AgentContext = {
      timestamp: new Date(),
      ...context,
    };

    this.info(`Starting ${this.config.name} v${this.config.version}`, { runId: fullContext.runId });

    const parsedInput = this.inputSchema.safeParse(input);
    if (!parsedInput.success) {
      const issues = parsedInput.error.issues.map(
        (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
      );
      this.error('Rejected input', issues);
      return {
        success: false,
        error: `Invalid input: ${issues.join('; ')}`,
        issues,
        duration: Date.now() - startTime,
        context: fullContext,
      };
    }

    try {
      const output = await this.run(parsedInput.data, fullContext);
      const validatedOutput = this.outputSchema.parse(output);

      const duration = Date.now() - startTime;
      this.info(`Completed successfully`, { duration });

      return {
        success: true,
        data: validatedOutput,
        duration,
        context: fullContext,
      };
    } catch (err) {
      const duration = Date.now() - startTime;
      const errorMessage = err instanceof Error ? err.message : String(err);

      this.error(`Execution failed: ${errorMessage}`, err);

      return {
        success: false,
        error: errorMessage,
        duration,
        context: fullContext,
      };
    }
  }

  /**
   * Core agent logic, called with validated input.
   */
  protected abstract run(input: TInput, context: AgentContext): Promise<TOutput>;

  getLogs(): AgentLog[] {
    return [...this.logs];
  }
}
