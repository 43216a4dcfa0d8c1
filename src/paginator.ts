/**
 * shopify-gql-extract
 *
 * Adaptive Paginator Module
 *
 * Sizes each page from the cost the previous page reported, so that one
 * request spends roughly `costCap` points, and backs off when the remaining
 * budget drops below a reserve.
 *
 * The budget is shared by every consumer of the same credential; this
 * paginator only sees the snapshot attached to its own responses.
 */

import type { Logger } from 'pino';
import * as z from 'zod';
import type { GraphQLResponse } from './client.js';
import { rootField } from './client.js';
import { getLogger } from './logger.js';

/**
 * Mutable pagination state for one entity sync.
 */
export interface PaginationState {
  cursor: string | null;
  pageSize: number;
  lastQueryCost?: number;
  available?: number;
  restoreRate?: number;
  maximumAvailable: number;
  finished: boolean;
}

/**
 * Paging variables for the next request.
 */
export interface PageRequest {
  first: number;
  after: string | null;
}

/**
 * Options for the paginator.
 */
export interface PaginatorOptions {
  /** Points one request should spend (default: 1000) */
  costCap?: number;
  /** Largest page size accepted by the API (default: 250) */
  maxPageSize?: number;
  /** Budget ceiling assumed until a response reports one (default: 10000) */
  maximumAvailable?: number;
  /** Backpressure wait */
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

/**
 * Result of sizing the next page.
 */
export interface PagePlan {
  pageSize: number;
  /** Seconds to wait before sending, 0 when the budget is above the reserve */
  sleepSeconds: number;
}

const PageInfoSchema = z.object({
  pageInfo: z.object({
    hasNextPage: z.boolean(),
    endCursor: z.string().nullable().optional(),
  }),
});

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Cost-aware cursor paginator for connection queries.
 *
 * @example
 * ```typescript
 * const paginator = new AdaptivePaginator();
 * while (!paginator.finished) {
 *   const page = await paginator.nextPageRequest();
 *   const response = await client.execute(query, { ...variables, ...page });
 *   paginator.advance(response, 'orders');
 * }
 * ```
 */
export class AdaptivePaginator {
  private readonly state: PaginationState;
  private readonly costCap: number;
  private readonly maxPageSize: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: Logger;

  constructor(options: PaginatorOptions = {}) {
    this.costCap = options.costCap ?? 1000;
    this.maxPageSize = options.maxPageSize ?? 250;
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger ?? getLogger();
    this.state = {
      cursor: null,
      pageSize: 0,
      maximumAvailable: options.maximumAvailable ?? 10000,
      finished: false,
    };
  }

  get finished(): boolean {
    return this.state.finished;
  }

  /**
   * A snapshot of the current state.
   */
  get snapshot(): Readonly<PaginationState> {
    return { ...this.state };
  }

  /**
   * Sizes the next page from the last reported cost without waiting.
   *
   * With no cost data yet the page size is 1. Otherwise the reserve is
   * `max(ceiling / 4, 2 × costCap)`; below it, the plan includes the seconds
   * needed to restore up to the reserve.
   */
  plan(): PagePlan {
    const { lastQueryCost, available, restoreRate, maximumAvailable, pageSize } = this.state;
    if (lastQueryCost === undefined || available === undefined || pageSize === 0) {
      return { pageSize: 1, sleepSeconds: 0 };
    }

    const reserve = Math.max(Math.floor(maximumAvailable / 4), 2 * this.costCap);
    let sleepSeconds = 0;
    if (available < reserve && restoreRate !== undefined && restoreRate > 0) {
      sleepSeconds = Math.ceil((reserve - available) / restoreRate);
    }

    const perRecordCost = lastQueryCost / pageSize;
    const next =
      perRecordCost > 0 ? Math.floor(this.costCap / perRecordCost) : this.maxPageSize;

    return { pageSize: Math.min(this.maxPageSize, Math.max(1, next)), sleepSeconds };
  }

  /**
   * Returns the paging variables for the next request, waiting first if the
   * budget is below the reserve.
   */
  async nextPageRequest(): Promise<PageRequest> {
    const { pageSize, sleepSeconds } = this.plan();

    if (sleepSeconds > 0) {
      this.logger.info(
        { sleepSeconds, available: this.state.available },
        `Sleeping for ${sleepSeconds} seconds to restore query budget`,
      );
      await this.sleep(sleepSeconds * 1000);
    }

    this.state.pageSize = pageSize;
    this.logger.debug({ pageSize }, 'Next page size');
    return { first: pageSize, after: this.state.cursor };
  }

  /**
   * Records the cost accounting and continuation of a response.
   *
   * A response carrying top-level errors ends pagination without raising.
   *
   * @returns Whether another page should be requested
   */
  advance(response: GraphQLResponse, queryName: string): boolean {
    if (response.errors?.length) {
      this.state.finished = true;
      return false;
    }

    const cost = response.extensions?.cost;
    if (cost) {
      this.logger.debug({ cost }, 'Query cost profile');
      const queryCost = cost.requestedQueryCost ?? cost.actualQueryCost;
      if (queryCost !== null && queryCost !== undefined) this.state.lastQueryCost = queryCost;
      this.state.available = cost.throttleStatus.currentlyAvailable;
      this.state.restoreRate = cost.throttleStatus.restoreRate;
      this.state.maximumAvailable = cost.throttleStatus.maximumAvailable;
    }

    const connection = readConnection(response.data, queryName);
    if (connection?.pageInfo.hasNextPage && connection.pageInfo.endCursor) {
      this.state.cursor = connection.pageInfo.endCursor;
      return true;
    }

    this.state.finished = true;
    return false;
  }
}

function readConnection(data: unknown, queryName: string): z.infer<typeof PageInfoSchema> | undefined {
  const result = PageInfoSchema.safeParse(rootField(data, queryName));
  return result.success ? result.data : undefined;
}
