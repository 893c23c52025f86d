/**
 * Generation Orchestrator
 *
 * Sends an assembled PromptPayload to a generation backend. Transient failures
 * are retried with exponential backoff; terminal failures and exhausted retries
 * come back as a failure result. The payload is never re-derived: every attempt
 * resends the same request object.
 */

import type {
  GenerationResult,
  PipelineWarning,
  PromptPayload,
} from '../../types/index.js';
import {
  BackendError,
  isBackendError,
  type CompletionRequest,
  type CompletionResponse,
  type LLMProvider,
} from '../services/llm-service.js';
import { errors, errorMessage, isRepodocError } from '../../utils/errors.js';
import logger from '../../utils/logger.js';

/**
 * Retry policy
 */
export interface RetryOptions {
  /** Retries after the first attempt */
  maxRetries?: number;
  /** Initial retry delay in ms */
  initialDelay?: number;
  /** Maximum retry delay in ms */
  maxDelay?: number;
  /** Per-attempt timeout in ms */
  timeout?: number;
  /** Override how backoff waits (tests) */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export const DEFAULT_RETRY_OPTIONS = {
  maxRetries: 3,
  initialDelay: 1000,
  maxDelay: 30000,
  timeout: 120000,
} as const;

/**
 * Wait for `ms`, resolving early when the signal aborts
 */
export function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Backend request for a payload
 */
export function toCompletionRequest(payload: PromptPayload): CompletionRequest {
  return Object.freeze({
    systemPrompt: payload.systemPrompt,
    userPrompt: payload.userPrompt,
    model: payload.model,
    temperature: payload.temperature,
    maxTokens: payload.maxOutputTokens,
  });
}

export class GenerationOrchestrator {
  private provider: LLMProvider;
  private maxRetries: number;
  private initialDelay: number;
  private maxDelay: number;
  private timeout: number;
  private sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(provider: LLMProvider, options: RetryOptions = {}) {
    this.provider = provider;
    this.maxRetries = Math.max(0, options.maxRetries ?? DEFAULT_RETRY_OPTIONS.maxRetries);
    this.initialDelay = options.initialDelay ?? DEFAULT_RETRY_OPTIONS.initialDelay;
    this.maxDelay = options.maxDelay ?? DEFAULT_RETRY_OPTIONS.maxDelay;
    this.timeout = options.timeout ?? DEFAULT_RETRY_OPTIONS.timeout;
    this.sleep = options.sleep ?? abortableSleep;
  }

  /**
   * Generate the document text for a payload. Backend errors are returned as
   * a failure result, never thrown.
   */
  async generate(
    payload: PromptPayload,
    signal?: AbortSignal,
    warnings: readonly PipelineWarning[] = []
  ): Promise<GenerationResult> {
    const request = toCompletionRequest(payload);
    let delay = this.initialDelay;
    let attempts = 0;
    let lastError: BackendError | null = null;

    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      if (signal?.aborted) {
        return { status: 'failure', error: errors.cancelled('generation'), attempts, warnings, payload };
      }

      attempts += 1;
      try {
        logger.debug(`Generation attempt ${attempts}/${this.maxRetries + 1} (${this.provider.name})`);
        const response = await this.executeWithTimeout(request, signal);

        return {
          status: 'success',
          text: response.content,
          model: response.model,
          attempts,
          usage: response.usage,
          warnings,
          payload,
        };
      } catch (error) {
        if (signal?.aborted) {
          return { status: 'failure', error: errors.cancelled('generation'), attempts, warnings, payload };
        }

        if (isRepodocError(error)) {
          return { status: 'failure', error, attempts, warnings, payload };
        }

        const backendError = isBackendError(error)
          ? error
          : new BackendError(errorMessage(error), 'malformed-request');
        lastError = backendError;

        if (!backendError.transient) {
          return {
            status: 'failure',
            error: errors.backendTerminal(backendError.message, backendError.detail, attempts),
            attempts,
            warnings,
            payload,
          };
        }

        if (attempt === this.maxRetries) {
          break;
        }

        logger.warning(`${errors.backendTransient(backendError.message).message}; retrying in ${delay}ms`);
        await this.sleep(delay, signal);

        delay = Math.min(delay * 2, this.maxDelay);
      }
    }

    const reason = lastError ? lastError.message : 'no attempt was made';
    return {
      status: 'failure',
      error: errors.backendTerminal(reason, lastError?.detail, attempts),
      attempts,
      warnings,
      payload,
    };
  }

  /**
   * Run one backend call, aborting it after the per-attempt timeout or when
   * the run is cancelled
   */
  private async executeWithTimeout(
    request: CompletionRequest,
    signal?: AbortSignal
  ): Promise<CompletionResponse> {
    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeout);
    const onAbort = (): void => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    const aborted = new Promise<never>((_, reject) => {
      controller.signal.addEventListener('abort', () => {
        reject(timedOut
          ? new BackendError(`Request timed out after ${this.timeout}ms`, 'timeout')
          : new BackendError('Request aborted', 'network'));
      }, { once: true });
    });

    try {
      return await Promise.race([
        this.provider.generateCompletion(request, controller.signal),
        aborted,
      ]);
    } catch (error) {
      if (timedOut) {
        throw new BackendError(`Request timed out after ${this.timeout}ms`, 'timeout');
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}
