import OpenAI from 'openai';
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
} from 'openai/resources/chat/completions';

import { type AppConfig, requireCloudApiKey } from '../config';
import { BackendUnavailableError, describeError } from '../errors';
import type { Backend, RequestKind } from '../types';
import { logger } from '../util/logger';
import { exponentialBackoff } from '../util/retry';

export interface TextGenerator {
  readonly backend: Backend;
  complete(prompt: string): Promise<string>;
}

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export type ChatCompletionCreate = (
  body: ChatCompletionCreateParamsNonStreaming,
) => Promise<ChatCompletion>;

/** Role requests go to the local model server, resume requests to the cloud model. */
export const backendFor = (kind: RequestKind): Backend => (kind === 'role' ? 'local' : 'cloud');

const isTimeout = (error: unknown): boolean =>
  error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');

const buildGenerateEndpoint = (baseUrl: string): string => {
  const url = new URL(baseUrl);
  const basePath = url.pathname.replace(/\/+$/, '').replace(/\/api\/generate$/, '');
  url.pathname = `${basePath}/api/generate`;
  url.search = '';
  return url.toString();
};

type OllamaGeneratorOptions = {
  url: string;
  model: string;
  timeoutMs: number;
  fetchImpl?: FetchLike;
};

export class OllamaGenerator implements TextGenerator {
  readonly backend: Backend = 'local';

  private readonly endpoint: string;

  private readonly model: string;

  private readonly timeoutMs: number;

  private readonly fetchImpl: FetchLike;

  constructor({ url, model, timeoutMs, fetchImpl }: OllamaGeneratorOptions) {
    this.endpoint = buildGenerateEndpoint(url);
    this.model = model;
    this.timeoutMs = timeoutMs;
    this.fetchImpl = fetchImpl ?? ((input, init) => fetch(input, init));
  }

  async complete(prompt: string): Promise<string> {
    let response: Response;

    try {
      response = await this.fetchImpl(this.endpoint, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          model: this.model,
          prompt,
          stream: false,
        }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const reason = isTimeout(error)
        ? `timed out after ${this.timeoutMs}ms`
        : describeError(error);
      throw new BackendUnavailableError(this.backend, `Local model request failed: ${reason}`, {
        cause: error,
      });
    }

    if (!response.ok) {
      const detailText = await response.text().catch(() => '');
      throw new BackendUnavailableError(
        this.backend,
        `Local model request failed (status ${response.status}): ${detailText || response.statusText}`,
        { upstreamStatus: response.status },
      );
    }

    let data: unknown;

    try {
      data = await response.json();
    } catch (error) {
      throw new BackendUnavailableError(
        this.backend,
        `Failed to read local model response: ${describeError(error)}`,
        { cause: error },
      );
    }

    const text = typeof data === 'object' && data !== null && 'response' in data
      ? data.response
      : undefined;

    if (typeof text !== 'string') {
      throw new BackendUnavailableError(this.backend, 'Local model response did not include any text.');
    }

    return text;
  }
}

type CloudGeneratorOptions = {
  apiKey: string;
  baseUrl: string;
  model: string;
  timeoutMs: number;
  createCompletion?: ChatCompletionCreate;
};

export class CloudGenerator implements TextGenerator {
  readonly backend: Backend = 'cloud';

  private readonly model: string;

  private readonly createCompletion: ChatCompletionCreate;

  constructor({ apiKey, baseUrl, model, timeoutMs, createCompletion }: CloudGeneratorOptions) {
    this.model = model;

    if (createCompletion) {
      this.createCompletion = createCompletion;
    } else {
      const client = new OpenAI({
        apiKey,
        baseURL: baseUrl,
        timeout: timeoutMs,
        maxRetries: 0,
      });
      this.createCompletion = (body) => client.chat.completions.create(body);
    }
  }

  async complete(prompt: string): Promise<string> {
    let completion: ChatCompletion;

    try {
      completion = await this.createCompletion({
        model: this.model,
        temperature: 0.7,
        messages: [{ role: 'user', content: prompt }],
      });
    } catch (error) {
      const upstreamStatus = error instanceof OpenAI.APIError ? error.status : undefined;
      const reason = error instanceof OpenAI.APIConnectionTimeoutError
        ? 'request timed out'
        : describeError(error);
      throw new BackendUnavailableError(this.backend, `Cloud model request failed: ${reason}`, {
        upstreamStatus,
        cause: error,
      });
    }

    const content = completion.choices?.[0]?.message?.content;

    if (typeof content !== 'string') {
      throw new BackendUnavailableError(this.backend, 'Cloud model response did not include any text.');
    }

    return content;
  }
}

type RetryOptions = {
  maxAttempts?: number;
  initialDelayMs?: number;
};

export class GenerationClient {
  private readonly generators: Map<Backend, TextGenerator>;

  private readonly maxAttempts: number;

  private readonly initialDelayMs: number;

  constructor(generators: TextGenerator[], { maxAttempts = 1, initialDelayMs = 500 }: RetryOptions = {}) {
    this.generators = new Map(
      generators.map((generator): [Backend, TextGenerator] => [generator.backend, generator]),
    );
    this.maxAttempts = maxAttempts;
    this.initialDelayMs = initialDelayMs;
  }

  async generate(prompt: string, backend: Backend): Promise<string> {
    const generator = this.generators.get(backend);

    if (!generator) {
      throw new BackendUnavailableError(backend, `No ${backend} generation backend is configured.`);
    }

    return exponentialBackoff(
      () => generator.complete(prompt),
      {
        maxAttempts: this.maxAttempts,
        initialDelayMs: this.initialDelayMs,
        shouldRetry: (error) => error instanceof BackendUnavailableError && error.retryable,
        onRetry: (error, attempt, delayMs) =>
          logger.warn(`Generation attempt ${attempt} failed. Retrying in ${delayMs}ms.`, {
            backend,
            error: describeError(error),
          }),
      },
    );
  }
}

/**
 * Builds the client from configuration. The cloud backend is only wired in
 * when an API key is present; resume requests check for the key up front.
 */
export const createGenerationClient = (config: AppConfig): GenerationClient => {
  const generators: TextGenerator[] = [
    new OllamaGenerator({
      url: config.local.url,
      model: config.local.model,
      timeoutMs: config.generation.timeoutMs,
    }),
  ];

  if (config.cloud.apiKey) {
    generators.push(
      new CloudGenerator({
        apiKey: requireCloudApiKey(config),
        baseUrl: config.cloud.baseUrl,
        model: config.cloud.model,
        timeoutMs: config.generation.timeoutMs,
      }),
    );
  }

  return new GenerationClient(generators, { maxAttempts: config.generation.maxAttempts });
};
