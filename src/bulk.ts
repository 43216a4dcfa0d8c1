/**
 * shopify-gql-extract
 *
 * Bulk Operation Module
 *
 * Lifecycle of an asynchronous bulk query: submit the document, poll the
 * shop's current bulk operation until it settles, then stream the result
 * file as newline-delimited JSON.
 */

import type { Logger } from 'pino';
import * as z from 'zod';
import type { GraphQLClient } from './client.js';
import { rootField } from './client.js';
import { BulkOperationError, BulkOperationTimeoutError, UpstreamServiceError } from './errors.js';
import { getLogger } from './logger.js';

/**
 * Status query for the shop's current bulk operation.
 */
export const BULK_STATUS_QUERY =
  'query { currentBulkOperation { id status errorCode createdAt completedAt ' +
  'objectCount fileSize url partialDataUrl } }';

const BulkJobSchema = z.object({
  id: z.string(),
  status: z.string(),
  errorCode: z.string().nullable().optional(),
  objectCount: z.string().nullable().optional(),
  url: z.string().nullable().optional(),
});

/**
 * A bulk operation as reported by the status query.
 */
export type BulkJob = z.infer<typeof BulkJobSchema>;

const SubmissionSchema = z.object({
  bulkOperation: z.object({ id: z.string() }).nullable().optional(),
  userErrors: z.array(z.object({ message: z.string() })).default([]),
});

const BulkLineSchema = z.record(z.string(), z.unknown());

/**
 * How a bulk operation settled.
 */
export type BulkOutcome =
  | { kind: 'url'; url: string }
  | { kind: 'empty'; reason: 'no-objects' | 'access-denied' | 'server-error' };

/**
 * Options for bulk operation handling.
 */
export interface BulkOperationOptions {
  /** Seconds between status polls (default: 10) */
  pollInterval?: number;
  /** Seconds before the operation is abandoned (default: 1800) */
  pollTimeout?: number;
  sleep?: (ms: number) => Promise<void>;
  /** Clock in milliseconds */
  now?: () => number;
  logger?: Logger;
}

/** FAILED codes that mean "nothing to extract" rather than a broken run */
const EMPTY_FAILURE_CODES: Record<string, BulkOutcome> = {
  ACCESS_DENIED: { kind: 'empty', reason: 'access-denied' },
  INTERNAL_SERVER_ERROR: { kind: 'empty', reason: 'server-error' },
};

/** States that will never produce a result url */
const ABANDONED_STATUSES = new Set(['CANCELED', 'EXPIRED']);

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Drives bulk operations for one credential.
 *
 * Only one bulk query may run per shop at a time, so a status report about
 * any other operation means another process shares the credential.
 *
 * @example
 * ```typescript
 * const bulk = new BulkOperationManager(client, { pollInterval: 5 });
 * for await (const record of bulk.run(buildQuery(orders, schema, { mode: 'bulk' }).query)) {
 *   emit(record);
 * }
 * ```
 */
export class BulkOperationManager {
  private readonly pollInterval: number;
  private readonly pollTimeout: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(
    private readonly client: GraphQLClient,
    options: BulkOperationOptions = {},
  ) {
    this.pollInterval = options.pollInterval ?? 10;
    this.pollTimeout = options.pollTimeout ?? 1800;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? getLogger();
  }

  /**
   * Submits a bulk query document and returns the created operation id.
   *
   * @throws {BulkOperationError} If the submission is rejected
   */
  async submit(document: string): Promise<string> {
    const response = await this.client.execute(document);
    this.logger.debug({ response }, 'Bulk operation submitted');

    if (response.errors?.length) {
      throw new BulkOperationError(
        `Bulk operation rejected: ${response.errors.map((e) => e.message).join(', ')}`,
        undefined,
        { errors: response.errors },
        'BULK_OPERATION_REJECTED',
      );
    }

    const submission = SubmissionSchema.safeParse(rootField(response.data, 'bulkOperationRunQuery'));
    if (!submission.success) {
      throw new BulkOperationError('Malformed bulk operation submission response', undefined, {
        data: response.data,
      });
    }
    if (submission.data.userErrors.length > 0 || !submission.data.bulkOperation) {
      throw new BulkOperationError(
        `Bulk operation rejected: ${submission.data.userErrors.map((e) => e.message).join(', ')}`,
        undefined,
        { userErrors: submission.data.userErrors },
        'BULK_OPERATION_REJECTED',
      );
    }

    return submission.data.bulkOperation.id;
  }

  /**
   * Reads the shop's current bulk operation.
   */
  async currentOperation(): Promise<BulkJob | null> {
    const response = await this.client.execute(BULK_STATUS_QUERY);
    const current = rootField(response.data, 'currentBulkOperation');
    if (current === null || current === undefined) return null;

    const job = BulkJobSchema.safeParse(current);
    if (!job.success) {
      throw new UpstreamServiceError('Malformed bulk operation status', 'admin-api', {
        status: current,
      });
    }
    return job.data;
  }

  /**
   * Polls until the operation settles.
   *
   * @throws {BulkOperationError} On id mismatch, an unrecognised failure, or
   * a completed operation with objects but no url
   * @throws {BulkOperationTimeoutError} When the poll timeout elapses
   */
  async poll(operationId: string): Promise<BulkOutcome> {
    const deadline = this.now() + this.pollTimeout * 1000;

    while (this.now() < deadline) {
      const job = await this.currentOperation();
      this.logger.info({ operationId, status: job?.status, objectCount: job?.objectCount }, 'Poll status');

      if (!job || job.id !== operationId) {
        throw new BulkOperationError(
          'The current bulk operation was not started by this process; ' +
            'check whether another service is using the bulk API with the same credential',
          operationId,
          { currentOperationId: job?.id ?? null },
          'BULK_OPERATION_MISMATCH',
        );
      }

      if (job.url) return { kind: 'url', url: job.url };

      if (job.status === 'COMPLETED') {
        if (job.objectCount === '0') return { kind: 'empty', reason: 'no-objects' };
        throw new BulkOperationError(
          `Bulk operation completed with ${job.objectCount ?? 'unknown'} objects but no download url`,
          operationId,
          { job },
        );
      }

      if (job.status === 'FAILED') {
        const outcome = job.errorCode ? EMPTY_FAILURE_CODES[job.errorCode] : undefined;
        if (outcome) return outcome;
        throw new BulkOperationError(
          `Bulk operation failed: ${job.errorCode ?? 'unknown error'}`,
          operationId,
          { job },
          'BULK_OPERATION_FAILED',
        );
      }

      if (ABANDONED_STATUSES.has(job.status)) {
        throw new BulkOperationError(
          `Bulk operation ${job.status.toLowerCase()}`,
          operationId,
          { job },
          'BULK_OPERATION_FAILED',
        );
      }

      await this.sleep(this.pollInterval * 1000);
    }

    throw new BulkOperationTimeoutError(operationId, this.pollTimeout);
  }

  /**
   * Streams the result file, parsing one line at a time.
   */
  async *stream(url: string): AsyncGenerator<Record<string, unknown>> {
    let lineNumber = 0;
    for await (const line of this.client.download(url)) {
      lineNumber++;
      if (line.trim() === '') continue;

      const record = BulkLineSchema.safeParse(parseJson(line));
      if (!record.success) {
        throw new UpstreamServiceError(`Malformed bulk result at line ${lineNumber}`, 'admin-api', {
          line: line.slice(0, 200),
        });
      }
      yield record.data;
    }
  }

  /**
   * Submits, polls and streams one bulk query. Empty outcomes yield nothing.
   */
  async *run(document: string): AsyncGenerator<Record<string, unknown>> {
    const operationId = await this.submit(document);
    const outcome = await this.poll(operationId);

    if (outcome.kind === 'empty') {
      this.logger.info({ operationId, reason: outcome.reason }, 'Bulk operation produced no data');
      return;
    }

    yield* this.stream(outcome.url);
  }
}

function parseJson(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch {
    return undefined;
  }
}
