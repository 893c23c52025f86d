/**
 * LLM Service
 *
 * Generation backends behind a single provider interface. Every HTTP failure is
 * mapped to a BackendError that says whether retrying can help.
 */

import { z } from 'zod';
import { errorMessage } from '../../utils/errors.js';

// ============================================================================
// TYPES
// ============================================================================

/**
 * Completion request parameters
 */
export interface CompletionRequest {
  systemPrompt: string;
  userPrompt: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
}

/**
 * Completion response
 */
export interface CompletionResponse {
  content: string;
  usage: {
    inputTokens: number;
    outputTokens: number;
    totalTokens: number;
  };
  model: string;
  finishReason: 'stop' | 'length' | 'error';
}

/**
 * LLM provider interface
 */
export interface LLMProvider {
  name: string;
  defaultModel: string;
  generateCompletion(request: CompletionRequest, signal?: AbortSignal): Promise<CompletionResponse>;
}

export type ProviderName = 'openai' | 'anthropic';

/**
 * Backend settings handed over by the configuration loader
 */
export interface ProviderConfig {
  provider: ProviderName;
  apiKey: string;
  model?: string;
  apiBase?: string;
}

// ============================================================================
// ERRORS
// ============================================================================

export type BackendErrorKind =
  | 'rate-limit'
  | 'timeout'
  | 'network'
  | 'server'
  | 'authentication'
  | 'malformed-request'
  | 'quota';

const TRANSIENT_KINDS: ReadonlySet<BackendErrorKind> = new Set([
  'rate-limit',
  'timeout',
  'network',
  'server',
]);

/**
 * Classified failure reported by a provider
 */
export class BackendError extends Error {
  constructor(
    message: string,
    public kind: BackendErrorKind,
    public status?: number,
    public detail?: string
  ) {
    super(message);
    this.name = 'BackendError';
  }

  /** Retrying the identical request may succeed */
  get transient(): boolean {
    return TRANSIENT_KINDS.has(this.kind);
  }
}

export function isBackendError(error: unknown): error is BackendError {
  return error instanceof BackendError;
}

/**
 * Map an HTTP error response to a BackendError
 */
export function classifyHttpError(status: number, body: string): BackendError {
  const detail = body.slice(0, 2000);

  if (status === 429) {
    return /insufficient_quota|quota|billing/i.test(body)
      ? new BackendError('Quota exhausted', 'quota', status, detail)
      : new BackendError('Rate limit exceeded', 'rate-limit', status, detail);
  }
  if (status === 401 || status === 403) {
    return new BackendError('Authentication failed', 'authentication', status, detail);
  }
  if (status === 408) {
    return new BackendError('Request timed out', 'timeout', status, detail);
  }
  if (status >= 500) {
    return new BackendError(`Server error (${status})`, 'server', status, detail);
  }
  return new BackendError(`Request rejected (${status})`, 'malformed-request', status, detail);
}

/**
 * Map a thrown fetch error (DNS, connection reset, abort) to a BackendError
 */
export function classifyFetchError(error: unknown, signal?: AbortSignal): BackendError {
  if (signal?.aborted) {
    return new BackendError('Request aborted', 'timeout');
  }
  const message = errorMessage(error);
  return new BackendError(`Network error: ${message}`, 'network');
}

// ============================================================================
// FETCH HELPERS
// ============================================================================

/**
 * Validate and normalise an API base URL.
 * Returns the cleaned URL or throws on invalid input.
 */
export function normalizeApiBase(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new Error(`Invalid API base URL: "${url}". Must be a valid URL (e.g., http://localhost:8000/v1).`);
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new Error(`Unsupported protocol in API base URL: "${parsed.protocol}". Only http and https are allowed.`);
  }

  return parsed.toString().replace(/\/+$/, '');
}

async function postJson(
  url: string,
  headers: Record<string, string>,
  body: unknown,
  signal?: AbortSignal
): Promise<unknown> {
  let response: Response;
  try {
    response = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...headers },
      body: JSON.stringify(body),
      signal,
    });
  } catch (error) {
    throw classifyFetchError(error, signal);
  }

  if (!response.ok) {
    throw classifyHttpError(response.status, await response.text());
  }

  try {
    return await response.json();
  } catch (error) {
    throw classifyFetchError(error, signal);
  }
}

// ============================================================================
// TOKEN ESTIMATION
// ============================================================================

/**
 * Estimate token count from text (rough approximation)
 * ~4 characters per token for English text
 */
export function estimateTokens(text: string): number {
  // Punctuation-heavy code runs closer to 2 characters per token
  const codePatterns = /[{}()\[\];:,.<>\/\\|`~!@#$%^&*=+]/g;
  const codeCharCount = (text.match(codePatterns) || []).length;
  const regularCharCount = text.length - codeCharCount;

  return Math.ceil(regularCharCount / 4 + codeCharCount / 2);
}

// ============================================================================
// ANTHROPIC PROVIDER
// ============================================================================

const anthropicResponseSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })),
  usage: z.object({ input_tokens: z.number(), output_tokens: z.number() }),
  model: z.string(),
  stop_reason: z.string().nullable().optional(),
});

/**
 * Anthropic Claude provider
 */
export class AnthropicProvider implements LLMProvider {
  name = 'anthropic';
  defaultModel: string;

  private apiKey: string;
  private baseUrl: string;

  constructor(apiKey: string, model = 'claude-3-5-sonnet-20241022', baseUrl?: string) {
    this.apiKey = apiKey;
    this.defaultModel = model;
    this.baseUrl = baseUrl ? normalizeApiBase(baseUrl) : 'https://api.anthropic.com/v1';
  }

  async generateCompletion(request: CompletionRequest, signal?: AbortSignal): Promise<CompletionResponse> {
    const data = await postJson(
      `${this.baseUrl}/messages`,
      {
        'x-api-key': this.apiKey,
        'anthropic-version': '2023-06-01',
      },
      {
        model: request.model ?? this.defaultModel,
        max_tokens: request.maxTokens ?? 1000,
        temperature: request.temperature ?? 0.7,
        system: request.systemPrompt,
        messages: [{ role: 'user', content: request.userPrompt }],
      },
      signal
    );

    const parsed = anthropicResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new BackendError('Unexpected response shape', 'server', undefined, parsed.error.message);
    }
    const message = parsed.data;

    const content = message.content
      .filter((c) => c.type === 'text')
      .map((c) => c.text ?? '')
      .join('');

    return {
      content,
      usage: {
        inputTokens: message.usage.input_tokens,
        outputTokens: message.usage.output_tokens,
        totalTokens: message.usage.input_tokens + message.usage.output_tokens,
      },
      model: message.model,
      finishReason: message.stop_reason === 'end_turn' ? 'stop' : message.stop_reason === 'max_tokens' ? 'length' : 'error',
    };
  }
}

// ============================================================================
// OPENAI PROVIDER
// ============================================================================

const openAIResponseSchema = z.object({
  choices: z.array(z.object({
    message: z.object({ content: z.string().nullable().optional() }).optional(),
    finish_reason: z.string().nullable().optional(),
  })),
  usage: z.object({
    prompt_tokens: z.number(),
    completion_tokens: z.number(),
    total_tokens: z.number(),
  }).optional(),
  model: z.string(),
});

/**
 * OpenAI chat-completions provider (also works with compatible servers via apiBase)
 */
export class OpenAIProvider implements LLMProvider {
  name = 'openai';
  defaultModel: string;

  private apiKey: string;
  private baseUrl: string;

  constructor(apiKey: string, model = 'gpt-4o', baseUrl?: string) {
    this.apiKey = apiKey;
    this.defaultModel = model;
    this.baseUrl = baseUrl ? normalizeApiBase(baseUrl) : 'https://api.openai.com/v1';
  }

  async generateCompletion(request: CompletionRequest, signal?: AbortSignal): Promise<CompletionResponse> {
    const data = await postJson(
      `${this.baseUrl}/chat/completions`,
      { Authorization: `Bearer ${this.apiKey}` },
      {
        model: request.model ?? this.defaultModel,
        messages: [
          { role: 'system', content: request.systemPrompt },
          { role: 'user', content: request.userPrompt },
        ],
        max_tokens: request.maxTokens ?? 1000,
        temperature: request.temperature ?? 0.7,
      },
      signal
    );

    const parsed = openAIResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new BackendError('Unexpected response shape', 'server', undefined, parsed.error.message);
    }

    const choice = parsed.data.choices[0];
    const usage = parsed.data.usage ?? { prompt_tokens: 0, completion_tokens: 0, total_tokens: 0 };

    return {
      content: choice?.message?.content ?? '',
      usage: {
        inputTokens: usage.prompt_tokens,
        outputTokens: usage.completion_tokens,
        totalTokens: usage.total_tokens,
      },
      model: parsed.data.model,
      finishReason: choice?.finish_reason === 'stop' ? 'stop' : choice?.finish_reason === 'length' ? 'length' : 'error',
    };
  }
}

// ============================================================================
// MOCK PROVIDER (for testing)
// ============================================================================

/**
 * One scripted reply of the mock provider
 */
export type MockOutcome =
  | { text: string }
  | { error: BackendError }
  | { hang: true };

/**
 * Mock provider for testing. Replies come from a queue of scripted outcomes,
 * then from the default response.
 */
export class MockLLMProvider implements LLMProvider {
  name = 'mock';
  defaultModel = 'mock-model';

  private outcomes: MockOutcome[] = [];
  private defaultResponse = '# Mock Project\n\nGenerated description.';
  public callHistory: CompletionRequest[] = [];

  setDefaultResponse(response: string): void {
    this.defaultResponse = response;
  }

  enqueue(...outcomes: MockOutcome[]): void {
    this.outcomes.push(...outcomes);
  }

  /**
   * Queue `count` failures of the given kind
   */
  failNext(count: number, kind: BackendErrorKind = 'server'): void {
    for (let i = 0; i < count; i++) {
      this.outcomes.push({ error: new BackendError(`Mock ${kind} failure`, kind, kind === 'server' ? 500 : undefined) });
    }
  }

  async generateCompletion(request: CompletionRequest, signal?: AbortSignal): Promise<CompletionResponse> {
    this.callHistory.push(request);

    const outcome = this.outcomes.shift() ?? { text: this.defaultResponse };

    if ('error' in outcome) {
      throw outcome.error;
    }

    if ('hang' in outcome) {
      return new Promise<CompletionResponse>((_, reject) => {
        if (signal?.aborted) {
          reject(new BackendError('Request aborted', 'timeout'));
          return;
        }
        signal?.addEventListener('abort', () => reject(new BackendError('Request aborted', 'timeout')), { once: true });
      });
    }

    const inputTokens = estimateTokens(request.systemPrompt + request.userPrompt);
    const outputTokens = estimateTokens(outcome.text);

    return {
      content: outcome.text,
      usage: {
        inputTokens,
        outputTokens,
        totalTokens: inputTokens + outputTokens,
      },
      model: request.model ?? this.defaultModel,
      finishReason: 'stop',
    };
  }

  reset(): void {
    this.callHistory = [];
    this.outcomes = [];
  }
}

// ============================================================================
// FACTORY FUNCTIONS
// ============================================================================

/**
 * Create a provider from loaded configuration
 */
export function createProvider(config: ProviderConfig): LLMProvider {
  if (config.provider === 'anthropic') {
    return new AnthropicProvider(config.apiKey, config.model ?? 'claude-3-5-sonnet-20241022', config.apiBase);
  }
  return new OpenAIProvider(config.apiKey, config.model ?? 'gpt-4o', config.apiBase);
}
