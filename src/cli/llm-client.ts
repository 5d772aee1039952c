/**
 * LLM completion clients over raw fetch.
 * The model name picks the provider: `claude-*` goes to Anthropic,
 * everything else to an OpenAI-compatible chat completions endpoint.
 */

import { z } from 'zod';
import { ConfigurationError, TransportError } from '../shared/types';
import { createLogger } from '../shared/logger';

const log = createLogger({ module: 'llm-client' });

export interface LLMCompletionOptions {
  model: string;
  temperature: number;
  maxTokens: number;
}

export interface LLMResponse {
  content: string;
  model: string;
  inputTokens: number;
  outputTokens: number;
}

export interface LLMClient {
  complete(system: string, user: string, options: LLMCompletionOptions): Promise<LLMResponse>;
}

const OpenAIResponseSchema = z.object({
  model: z.string().optional(),
  choices: z.array(z.object({
    message: z.object({ content: z.string().nullable().optional() }).optional(),
  })).optional(),
  usage: z.object({
    prompt_tokens: z.number().optional(),
    completion_tokens: z.number().optional(),
  }).optional(),
});

const AnthropicResponseSchema = z.object({
  model: z.string().optional(),
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })).optional(),
  usage: z.object({
    input_tokens: z.number().optional(),
    output_tokens: z.number().optional(),
  }).optional(),
});

const OPENAI_DEFAULT_BASE_URL = 'https://api.openai.com/v1';
const MAX_BACKOFF_MS = 30_000;

function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

function parseRetryAfter(header: string | null): number | undefined {
  if (!header) return undefined;
  const seconds = Number(header);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : undefined;
}

async function readBody<T>(response: Response, schema: z.ZodType<T>, provider: string): Promise<T> {
  let body: unknown;
  try {
    body = await response.json();
  } catch (err) {
    throw new TransportError({
      message: `${provider} returned a body that is not JSON`,
      retryable: false,
      cause: err instanceof Error ? err : undefined,
    });
  }
  const result = schema.safeParse(body);
  if (!result.success) {
    throw new TransportError({ message: `Unexpected ${provider} API response shape`, retryable: false });
  }
  return result.data;
}

async function post(url: string, headers: Record<string, string>, body: unknown, provider: string): Promise<Response> {
  let response: Response;
  try {
    response = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...headers },
      body: JSON.stringify(body),
    });
  } catch (err) {
    throw new TransportError({
      message: `${provider} request failed: ${err instanceof Error ? err.message : String(err)}`,
      retryable: true,
      cause: err instanceof Error ? err : undefined,
    });
  }

  if (!response.ok) {
    const text = await response.text();
    throw new TransportError({
      message: `${provider} API error ${response.status}: ${text}`,
      status: response.status,
      retryable: isRetryableStatus(response.status),
      retryAfterMs: parseRetryAfter(response.headers.get('retry-after')),
    });
  }

  return response;
}

/**
 * Create a fetch-based OpenAI chat completions client.
 */
export function createOpenAIClient(apiKey: string, baseUrl: string = OPENAI_DEFAULT_BASE_URL): LLMClient {
  const endpoint = `${baseUrl.replace(/\/+$/, '')}/chat/completions`;
  return {
    async complete(system: string, user: string, options: LLMCompletionOptions): Promise<LLMResponse> {
      const response = await post(
        endpoint,
        { Authorization: `Bearer ${apiKey}` },
        {
          model: options.model,
          temperature: options.temperature,
          max_tokens: options.maxTokens,
          messages: [
            { role: 'system', content: system },
            { role: 'user', content: user },
          ],
        },
        'OpenAI',
      );

      const data = await readBody(response, OpenAIResponseSchema, 'OpenAI');

      const content = data.choices?.[0]?.message?.content;
      if (typeof content !== 'string') {
        throw new TransportError({ message: 'No message content in OpenAI API response', retryable: false });
      }

      return {
        content,
        model: data.model ?? options.model,
        inputTokens: data.usage?.prompt_tokens ?? 0,
        outputTokens: data.usage?.completion_tokens ?? 0,
      };
    },
  };
}

/**
 * Create a fetch-based Anthropic LLM client.
 */
export function createAnthropicClient(apiKey: string): LLMClient {
  return {
    async complete(system: string, user: string, options: LLMCompletionOptions): Promise<LLMResponse> {
      const response = await post(
        'https://api.anthropic.com/v1/messages',
        { 'x-api-key': apiKey, 'anthropic-version': '2023-06-01' },
        {
          model: options.model,
          max_tokens: options.maxTokens,
          temperature: options.temperature,
          system,
          messages: [{ role: 'user', content: user }],
        },
        'Anthropic',
      );

      const data = await readBody(response, AnthropicResponseSchema, 'Anthropic');

      const textContent = data.content?.find((c) => c.type === 'text');
      if (!textContent || typeof textContent.text !== 'string') {
        throw new TransportError({ message: 'No text content in Anthropic API response', retryable: false });
      }

      return {
        content: textContent.text,
        model: data.model ?? options.model,
        inputTokens: data.usage?.input_tokens ?? 0,
        outputTokens: data.usage?.output_tokens ?? 0,
      };
    },
  };
}

export function isAnthropicModel(model: string): boolean {
  return model.toLowerCase().startsWith('claude');
}

/**
 * Pick a provider client for `model` using API keys from `env`.
 */
export function createCompletionClient(model: string, env: NodeJS.ProcessEnv = process.env): LLMClient {
  if (isAnthropicModel(model)) {
    const key = env.ANTHROPIC_API_KEY;
    if (!key) throw new ConfigurationError(`ANTHROPIC_API_KEY is required for model "${model}"`);
    return createAnthropicClient(key);
  }
  const key = env.OPENAI_API_KEY;
  if (!key) throw new ConfigurationError(`OPENAI_API_KEY is required for model "${model}"`);
  return createOpenAIClient(key, env.OPENAI_BASE_URL || undefined);
}

// === Retry ===

export interface RetryPolicy {
  maxRetries: number;
  baseDelayMs: number;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

export function backoffDelay(attempt: number, baseDelayMs: number, retryAfterMs?: number): number {
  const exponential = baseDelayMs * 2 ** attempt;
  return Math.min(retryAfterMs ?? exponential, MAX_BACKOFF_MS);
}

/**
 * Wrap a client so retryable TransportErrors (429, 5xx, network) are retried
 * with exponential backoff. Other errors and the final failure propagate.
 */
export function withRetry(client: LLMClient, policy: RetryPolicy): LLMClient {
  const sleep = policy.sleep ?? defaultSleep;
  return {
    async complete(system: string, user: string, options: LLMCompletionOptions): Promise<LLMResponse> {
      for (let attempt = 0; ; attempt++) {
        try {
          return await client.complete(system, user, options);
        } catch (err) {
          if (!(err instanceof TransportError) || !err.retryable || attempt >= policy.maxRetries) {
            throw err;
          }
          const delay = backoffDelay(attempt, policy.baseDelayMs, err.retryAfterMs);
          log.warn({ attempt: attempt + 1, status: err.status, delayMs: delay }, 'Retrying completion request');
          await sleep(delay);
        }
      }
    },
  };
}
