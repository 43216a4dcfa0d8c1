/**
 * shopify-gql-extract
 *
 * Extraction Module
 *
 * One generic routine drives every entity: build the query from the current
 * record schema, page through the connection (or run it as a bulk
 * operation), recover from field-level errors, and track the latest
 * replication-key value seen.
 */

import type { Logger } from 'pino';
import * as z from 'zod';
import type { BuiltQuery, ExtractionMode } from './builder.js';
import { buildQuery, withAuxiliaryProperties } from './builder.js';
import { BulkOperationManager } from './bulk.js';
import type { GraphQLClient, GraphQLResponse } from './client.js';
import { createClient, rootField } from './client.js';
import type { ExtractorConfig } from './config.js';
import { getConfig } from './config.js';
import type { EntityDescriptor } from './discovery.js';
import { discoverEntities } from './discovery.js';
import { ConfigurationError, FieldRecoveryError } from './errors.js';
import { getLogger } from './logger.js';
import type { PageRequest } from './paginator.js';
import { AdaptivePaginator } from './paginator.js';
import type { JsonSchema, RecordSchema } from './record-schema.js';
import { toJsonSchema } from './record-schema.js';
import { ErrorRecovery } from './recovery.js';
import { loadSchema } from './schema-cache.js';
import { TypeResolver } from './type-resolver.js';
import { isExtractorError } from './types.js';

/**
 * One extracted record.
 */
export type ExtractedRecord = Record<string, unknown>;

/**
 * Collaborators shared by every extraction.
 */
export interface ExtractionDependencies {
  client: GraphQLClient;
  config?: ExtractorConfig;
  sleep?: (ms: number) => Promise<void>;
  /** Clock in milliseconds, for bulk poll deadlines */
  now?: () => number;
  logger?: Logger;
}

/**
 * Per-run options for one entity.
 */
export interface EntityExtractionOptions {
  /** Top-level fields to extract; every field when omitted */
  selectedFields?: Iterable<string>;
  /** Lower bound on the replication key (defaults to the configured startDate) */
  since?: Date;
  /** Defaults to 'bulk' when the `bulk` setting is on */
  mode?: ExtractionMode;
  /** Receives the derived schema after every prune */
  onSchemaChange?: (schema: RecordSchema) => void;
}

/**
 * A discovered entity together with its inferred schema.
 */
export interface CatalogEntry {
  entity: EntityDescriptor;
  schema: RecordSchema;
  jsonSchema: JsonSchema;
  /** Paginated sub-collections not extracted with the entity */
  nestedConnections: string[];
}

const ConnectionSchema = z.object({
  edges: z.array(z.object({ node: z.record(z.string(), z.unknown()) })),
});

/**
 * Extraction context for one entity.
 *
 * Owns the entity's record schema and selected-field set for the run.
 * Pruning replaces the schema with a derived copy, so a field removed once
 * stays removed for every later query. The copy is also handed to
 * `onSchemaChange`, which is how {@link Extractor} keeps its catalog current.
 *
 * @example
 * ```typescript
 * const orders = new EntityExtraction(entity, schema, { client }, { since });
 * for await (const record of orders.records()) {
 *   emit(record);
 * }
 * saveCheckpoint(orders.checkpoint);
 * ```
 */
export class EntityExtraction {
  private currentSchema: RecordSchema;
  private selected: Set<string> | undefined;
  private latest: { value: string; time: number } | undefined;
  private readonly config: ExtractorConfig;
  private readonly mode: ExtractionMode;
  private readonly since: Date | undefined;
  private readonly logger: Logger;
  private readonly onSchemaChange: ((schema: RecordSchema) => void) | undefined;

  constructor(
    readonly entity: EntityDescriptor,
    schema: RecordSchema,
    private readonly deps: ExtractionDependencies,
    options: EntityExtractionOptions = {},
  ) {
    this.currentSchema = schema;
    this.selected = options.selectedFields ? new Set(options.selectedFields) : undefined;
    this.config = deps.config ?? getConfig();
    this.mode = options.mode ?? (this.config.bulk ? 'bulk' : 'interactive');
    this.since = options.since ?? this.config.startDate;
    this.logger = (deps.logger ?? getLogger()).child({ entity: entity.name });
    this.onSchemaChange = options.onSchemaChange;
  }

  get schema(): RecordSchema {
    return this.currentSchema;
  }

  get selectedFields(): string[] | undefined {
    return this.selected ? [...this.selected] : undefined;
  }

  /**
   * Latest replication-key value seen so far, if any.
   */
  get checkpoint(): string | undefined {
    return this.latest?.value;
  }

  jsonSchema(): JsonSchema {
    return toJsonSchema(this.currentSchema);
  }

  /**
   * Builds the query document from the current schema and selection.
   */
  buildQuery(): BuiltQuery {
    return buildQuery(this.entity, this.currentSchema, {
      mode: this.mode,
      selectedFields: this.selected,
      since: this.since,
    });
  }

  /**
   * Streams the entity's records.
   *
   * Fatal errors propagate from the iterator; skipped entities simply end.
   */
  async *records(): AsyncGenerator<ExtractedRecord> {
    this.logger.info({ mode: this.mode, since: this.since?.toISOString() }, 'Starting extraction');
    try {
      const source = this.mode === 'bulk' ? this.bulkRecords() : this.pagedRecords();
      for await (const record of source) {
        this.track(record);
        yield record;
      }
    } catch (error) {
      if (!(error instanceof FieldRecoveryError)) {
        this.logger.error(
          { err: error, code: isExtractorError(error) ? error.code : undefined },
          'Extraction failed',
        );
      }
      throw error;
    }
    this.logger.info({ checkpoint: this.checkpoint }, 'Finished extraction');
  }

  private async *pagedRecords(): AsyncGenerator<ExtractedRecord> {
    const paginator = new AdaptivePaginator({
      costCap: this.config.costCap,
      maxPageSize: this.config.maxPageSize,
      sleep: this.deps.sleep,
      logger: this.logger,
    });
    const recovery = new ErrorRecovery(this.entity, {
      pruneEnabled: this.config.ignoreAccessDenied,
      logger: this.deps.logger,
    });

    while (!paginator.finished) {
      const page = await paginator.nextPageRequest();
      const response = await this.executeWithRecovery(recovery, page);
      if (!response) return;

      yield* readNodes(response, this.entity.queryName);
      paginator.advance(response, this.entity.queryName);
    }
  }

  /**
   * Sends one page, pruning and replaying the same page until it comes back
   * clean. Resolves to undefined when the entity is skipped.
   */
  private async executeWithRecovery(
    recovery: ErrorRecovery,
    page: PageRequest,
  ): Promise<GraphQLResponse | undefined> {
    for (;;) {
      const built = this.buildQuery();
      this.logger.debug({ query: built.query, ...built.metadata }, 'Entity query');
      const response = await this.deps.client.execute(built.query, { ...built.variables, ...page });

      const decision = recovery.evaluate(response.errors);
      switch (decision.action) {
        case 'continue':
          return response;
        case 'skip':
          return undefined;
        case 'prune':
          this.currentSchema = recovery.prune(this.currentSchema, decision.paths);
          this.onSchemaChange?.(this.currentSchema);
          for (const path of decision.paths) {
            if (path.length === 1 && path[0] !== undefined) this.selected?.delete(path[0]);
          }
      }
    }
  }

  private async *bulkRecords(): AsyncGenerator<ExtractedRecord> {
    const manager = new BulkOperationManager(this.deps.client, {
      pollInterval: this.config.pollInterval,
      pollTimeout: this.config.pollTimeout,
      sleep: this.deps.sleep,
      now: this.deps.now,
      logger: this.logger,
    });
    yield* manager.run(this.buildQuery().query);
  }

  private track(record: ExtractedRecord): void {
    const key = this.entity.replicationKey;
    const value = key ? record[key] : undefined;
    if (typeof value !== 'string') return;

    const time = Date.parse(value);
    if (Number.isNaN(time)) return;
    if (!this.latest || time > this.latest.time) this.latest = { value, time };
  }
}

/**
 * Top-level entry point: discovers entities, infers their schemas and
 * creates extraction contexts.
 *
 * @example
 * ```typescript
 * configure({ store: 'my-store', accessToken: 'test-secret' });
 * const extractor = new Extractor();
 * const catalog = await extractor.discover();
 * for await (const record of extractor.extract('orders', { selectedFields: ['name'] })) {
 *   emit(record);
 * }
 * ```
 */
export class Extractor {
  private catalog: Promise<Map<string, CatalogEntry>> | undefined;
  private readonly deps: ExtractionDependencies;

  constructor(client?: GraphQLClient, options: Omit<ExtractionDependencies, 'client'> = {}) {
    const config = options.config ?? getConfig();
    this.deps = { ...options, config, client: client ?? createClient({}, config) };
  }

  /**
   * Discovers every extractable entity with its inferred schema.
   */
  async discover(): Promise<CatalogEntry[]> {
    return [...(await this.loadCatalog()).values()];
  }

  /**
   * Creates an extraction context for a discovered entity.
   *
   * @throws {ConfigurationError} If the entity is unknown
   */
  async extraction(name: string, options: EntityExtractionOptions = {}): Promise<EntityExtraction> {
    const catalog = await this.loadCatalog();
    const entry = catalog.get(name);
    if (!entry) {
      throw new ConfigurationError(`Unknown entity: ${name}`, 'entity');
    }
    return new EntityExtraction(entry.entity, entry.schema, this.deps, {
      ...options,
      onSchemaChange: (schema) => {
        catalog.set(name, { ...entry, schema, jsonSchema: toJsonSchema(schema) });
        options.onSchemaChange?.(schema);
      },
    });
  }

  /**
   * Streams the records of one entity.
   */
  async *extract(name: string, options: EntityExtractionOptions = {}): AsyncGenerator<ExtractedRecord> {
    const extraction = await this.extraction(name, options);
    yield* extraction.records();
  }

  private loadCatalog(): Promise<Map<string, CatalogEntry>> {
    this.catalog ??= this.buildCatalog().catch((error: unknown) => {
      this.catalog = undefined;
      throw error;
    });
    return this.catalog;
  }

  private async buildCatalog(): Promise<Map<string, CatalogEntry>> {
    const config = this.deps.config ?? getConfig();
    const logger = this.deps.logger ?? getLogger();
    const types = await loadSchema(this.deps.client);
    const { entities, entityTypes } = discoverEntities(types);
    const resolver = new TypeResolver(types, {
      ignoreDeprecated: config.ignoreDeprecated,
      relaxRequired: config.ignoreAccessDenied,
      entityTypes,
    });

    const catalog = new Map<string, CatalogEntry>();
    for (const entity of entities) {
      const resolved = resolver.resolve(entity.typeName);
      if (!resolved) {
        logger.warn({ entity: entity.name, type: entity.typeName }, 'No usable fields, skipping entity');
        continue;
      }
      const schema = withAuxiliaryProperties(entity, resolved.schema);
      catalog.set(entity.name, {
        entity,
        schema,
        jsonSchema: toJsonSchema(schema),
        nestedConnections: resolved.nestedConnections,
      });
    }

    logger.info({ entities: [...catalog.keys()] }, 'Discovered entities');
    return catalog;
  }
}

function* readNodes(response: GraphQLResponse, queryName: string): Generator<ExtractedRecord> {
  const connection = ConnectionSchema.safeParse(rootField(response.data, queryName));
  if (!connection.success) return;
  for (const edge of connection.data.edges) yield edge.node;
}
