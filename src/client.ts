/**
 * shopify-gql-extract
 *
 * GraphQL Client Module
 *
 * HTTP transport to the Admin API. Responses come back as envelopes (data,
 * errors, cost extensions) rather than being unwrapped, because field-level
 * errors and throttle accounting are interpreted further up.
 */

import * as z from 'zod';
import type { ExtractorConfig } from './config.js';
import { getConfig, resolveEndpoint } from './config.js';
import { UpstreamServiceError } from './errors.js';
import { getLogger } from './logger.js';

// ============================================================================
// Response envelope
// ============================================================================

const GraphQLErrorSchema = z.object({
  message: z.string(),
  path: z.array(z.union([z.string(), z.number()])).optional(),
  extensions: z
    .object({
      code: z.string().optional(),
    })
    .optional(),
});

const QueryCostSchema = z.object({
  requestedQueryCost: z.number().nullable().optional(),
  actualQueryCost: z.number().nullable().optional(),
  throttleStatus: z.object({
    maximumAvailable: z.number(),
    currentlyAvailable: z.number(),
    restoreRate: z.number(),
  }),
});

const GraphQLResponseSchema = z.object({
  data: z.unknown().optional(),
  errors: z.array(GraphQLErrorSchema).optional(),
  extensions: z
    .object({
      cost: QueryCostSchema.optional(),
    })
    .optional(),
});

/**
 * One entry of a response's `errors` array.
 */
export type GraphQLErrorEntry = z.infer<typeof GraphQLErrorSchema>;

/**
 * Cost accounting block reported under `extensions.cost`.
 */
export type QueryCost = z.infer<typeof QueryCostSchema>;

/**
 * A validated GraphQL response envelope.
 */
export type GraphQLResponse = z.infer<typeof GraphQLResponseSchema>;

const DataSchema = z.record(z.string(), z.unknown());

/**
 * Reads one root field out of a response's `data`.
 */
export function rootField(data: unknown, name: string): unknown {
  const result = DataSchema.safeParse(data);
  return result.success ? result.data[name] : undefined;
}

// ============================================================================
// Client
// ============================================================================

const RETRYABLE_STATUS_CODES = new Set([429, 500, 502, 503, 504]);
const RETRYABLE_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
]);
const INITIAL_BACKOFF_MS = 1000;
const MAX_BACKOFF_MS = 30000;

/**
 * Options for a GraphQL client.
 */
export interface GraphQLClientOptions {
  /** Endpoint override; defaults to the configured Admin API url */
  endpoint?: string;
  /** Custom fetch implementation */
  fetch?: typeof fetch;
  /** Per-request timeout in milliseconds */
  timeout?: number;
  /** Retries for throttled, 5xx and reset requests */
  maxRetries?: number;
  /** Extra headers sent with every request */
  headers?: Record<string, string>;
  /** Waits between retries */
  sleep?: (ms: number) => Promise<void>;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Abstract base class for Admin API clients.
 *
 * Credentials are injected by subclasses through {@link getAuthHeaders}.
 *
 * @example
 * ```typescript
 * class ProxyClient extends GraphQLClient {
 *   protected getAuthHeaders() {
 *     return { 'X-Proxy-Key': 'test-secret' };
 *   }
 * }
 * ```
 */
export abstract class GraphQLClient {
  readonly endpoint: string;
  protected readonly fetchImpl: typeof fetch;
  protected readonly timeout: number;
  protected readonly maxRetries: number;
  protected readonly sleep: (ms: number) => Promise<void>;

  constructor(
    protected readonly serviceName: string,
    protected readonly options: GraphQLClientOptions = {},
    config: ExtractorConfig = getConfig(),
  ) {
    this.endpoint = options.endpoint ?? resolveEndpoint(config);
    this.fetchImpl = options.fetch ?? fetch;
    this.timeout = options.timeout ?? config.requestTimeout;
    this.maxRetries = options.maxRetries ?? config.maxRetries;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Posts a document and returns the validated response envelope.
   *
   * GraphQL-level errors are returned, not thrown.
   *
   * @throws {UpstreamServiceError} On transport failure, timeout, or a
   * response without a usable GraphQL body
   */
  async execute(query: string, variables: Record<string, unknown> = {}): Promise<GraphQLResponse> {
    getLogger().debug({ service: this.serviceName, query, variables }, 'Sending GraphQL request');

    const response = await this.send(this.endpoint, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        ...this.getAuthHeaders(),
        ...this.options.headers,
      },
      body: JSON.stringify({ query, variables }),
    });

    const body = await this.readJson(response);
    const result = GraphQLResponseSchema.safeParse(body);

    if (!result.success || (!response.ok && !result.data.errors?.length)) {
      throw new UpstreamServiceError(
        response.ok
          ? 'Malformed GraphQL response'
          : `HTTP ${response.status}: ${response.statusText}`,
        this.serviceName,
        { status: response.status, body },
      );
    }

    return result.data;
  }

  /**
   * Downloads a newline-delimited file and yields it one line at a time.
   * Pre-signed urls carry their own credentials, so no auth headers are sent.
   *
   * @throws {UpstreamServiceError} If the download cannot be started
   */
  async *download(url: string): AsyncGenerator<string> {
    const response = await this.send(url, { method: 'GET' }, false);

    if (!response.ok) {
      throw new UpstreamServiceError(
        `HTTP ${response.status}: ${response.statusText}`,
        this.serviceName,
        { status: response.status, url },
      );
    }
    if (!response.body) return;

    yield* splitLines(response.body);
  }

  /**
   * Gets authentication headers for Admin API requests.
   */
  protected getAuthHeaders(): Record<string, string> {
    return {};
  }

  /**
   * Performs a request with timeout and retry.
   */
  protected async send(url: string, init: RequestInit, withTimeout = true): Promise<Response> {
    for (let attempt = 0; ; attempt++) {
      const controller = new AbortController();
      const timeoutId = withTimeout ? setTimeout(() => controller.abort(), this.timeout) : undefined;

      try {
        const response = await this.fetchImpl(url, { ...init, signal: controller.signal });

        if (RETRYABLE_STATUS_CODES.has(response.status) && attempt < this.maxRetries) {
          const backoff =
            parseRetryAfter(response.headers.get('retry-after')) ?? calculateBackoff(attempt);
          getLogger().warn(
            { service: this.serviceName, status: response.status, attempt: attempt + 1, backoffMs: backoff },
            'Retryable HTTP error, backing off',
          );
          await this.sleep(backoff);
          continue;
        }

        return response;
      } catch (error) {
        const errorCode = networkErrorCode(error);
        if (errorCode && RETRYABLE_ERROR_CODES.has(errorCode) && attempt < this.maxRetries) {
          const backoff = calculateBackoff(attempt);
          getLogger().warn(
            { service: this.serviceName, errorCode, attempt: attempt + 1, backoffMs: backoff },
            'Retryable network error, backing off',
          );
          await this.sleep(backoff);
          continue;
        }

        if (error instanceof Error && error.name === 'AbortError') {
          throw new UpstreamServiceError(`Request timeout after ${this.timeout}ms`, this.serviceName, {
            timeout: this.timeout,
          });
        }

        throw new UpstreamServiceError(
          error instanceof Error ? error.message : 'Unknown error occurred',
          this.serviceName,
          { originalError: error },
        );
      } finally {
        clearTimeout(timeoutId);
      }
    }
  }

  private async readJson(response: Response): Promise<unknown> {
    const text = await response.text();
    try {
      return JSON.parse(text);
    } catch {
      throw new UpstreamServiceError(
        `HTTP ${response.status}: response is not JSON`,
        this.serviceName,
        { status: response.status, body: text.slice(0, 500) },
      );
    }
  }
}

/**
 * Client authenticating with an Admin API access token.
 *
 * @example
 * ```typescript
 * const client = new AccessTokenClient('test-secret', { endpoint });
 * const { data } = await client.execute('{ shop { name } }');
 * ```
 */
export class AccessTokenClient extends GraphQLClient {
  constructor(
    private readonly accessToken: string,
    options?: GraphQLClientOptions,
    config?: ExtractorConfig,
  ) {
    super('admin-api', options, config);
  }

  protected override getAuthHeaders(): Record<string, string> {
    return { 'X-Shopify-Access-Token': this.accessToken };
  }
}

/**
 * Creates an access-token client from the current configuration.
 */
export function createClient(
  options: GraphQLClientOptions = {},
  config: ExtractorConfig = getConfig(),
): GraphQLClient {
  return new AccessTokenClient(config.accessToken, options, config);
}

// === Internal helpers ===

/**
 * Splits a byte stream into lines without buffering the whole body.
 */
export async function* splitLines(chunks: AsyncIterable<Uint8Array>): AsyncGenerator<string> {
  const decoder = new TextDecoder();
  let buffered = '';

  for await (const chunk of chunks) {
    buffered += decoder.decode(chunk, { stream: true });
    let newline = buffered.indexOf('\n');
    while (newline !== -1) {
      yield buffered.slice(0, newline).replace(/\r$/, '');
      buffered = buffered.slice(newline + 1);
      newline = buffered.indexOf('\n');
    }
  }

  buffered += decoder.decode();
  if (buffered.length > 0) yield buffered.replace(/\r$/, '');
}

function calculateBackoff(attempt: number): number {
  return Math.min(MAX_BACKOFF_MS, INITIAL_BACKOFF_MS * 2 ** attempt);
}

function parseRetryAfter(header: string | null): number | null {
  if (!header) return null;
  const seconds = Number.parseFloat(header);
  return Number.isNaN(seconds) ? null : seconds * 1000;
}

function networkErrorCode(error: unknown): string | undefined {
  if (!(error instanceof Error)) return undefined;
  const cause: unknown = error.cause;
  for (const candidate of [error, cause]) {
    if (typeof candidate === 'object' && candidate !== null && 'code' in candidate) {
      const { code } = candidate;
      if (typeof code === 'string') return code;
    }
  }
  return undefined;
}
