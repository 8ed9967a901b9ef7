/**
 * Sync Engine - Reconcile each entity type with the remote system
 *
 * Passes run one at a time in dependency order, so a dependent type's remote
 * reads always see the writes of the passes before it. Within a pass the
 * create/update/delete calls are independent and run with bounded
 * concurrency. Record- and operation-level failures are collected; a fatal
 * pass failure skips only the passes that depend on it.
 */

import pRetry, { AbortError } from "p-retry";

import {
  ConfigurationError,
  errorMessage,
  MalformedInputError,
  RemoteTransientError,
  SyncError,
  type SyncErrorCode,
} from "../errors.js";
import { syncLogger } from "../logger.js";
import { mapConcurrent, withTimeout } from "../utils/async.js";
import { planSync, type SyncOperation } from "./diff.js";
import {
  dependentsOf,
  orderDefinitions,
  toDependencyNodes,
  type DependencyNode,
} from "./graph.js";
import { preparePass } from "./prepare.js";
import {
  emptyCounts,
  RunReporter,
  type PassCounts,
  type PassResult,
  type PassStatus,
  type RecordFailure,
  type RunSummary,
} from "./reporter.js";

import type { RecordReader } from "../loader/reader.js";
import type {
  DeletePolicy,
  EntityDefinition,
  EntityType,
  LookupTable,
  LookupTables,
} from "../types/index.js";
import type { RemoteRecord, RemoteStore } from "../types/remote.js";

// ============================================================================
// Types
// ============================================================================

export interface EngineOptions {
  /** Remote calls in flight within one pass */
  concurrency: number;
  requestTimeoutMs: number;
  /** Retries of a transient failure, after the first attempt */
  maxRetries: number;
  retryMinTimeoutMs: number;
  /** Failure rate (0-1) above which a pass fails the run */
  failureThreshold: number;
  deletePolicies: Readonly<Partial<Record<EntityType, DeletePolicy>>>;
  /** Classify only; issue no writes */
  dryRun: boolean;
  /** Checked between passes */
  signal?: AbortSignal;
}

export const ENGINE_DEFAULTS: EngineOptions = {
  concurrency: 4,
  requestTimeoutMs: 30_000,
  maxRetries: 3,
  retryMinTimeoutMs: 500,
  failureThreshold: 1,
  deletePolicies: {},
  dryRun: false,
};

export interface SyncProgress {
  phase: EntityType;
  step: "load" | "read" | "apply";
  current: number;
  total: number;
  currentItem?: string;
}

type ProgressCallback = (progress: SyncProgress) => void;

interface PassOutcome {
  result: PassResult;
  table?: LookupTable;
}

export function defaultDeletePolicy(definition: EntityDefinition): DeletePolicy {
  return definition.deletable ? "hard" : "never";
}

function failureKind(error: unknown): SyncErrorCode {
  if (error instanceof SyncError) {
    return error.code;
  }
  return "REMOTE_PERMANENT";
}

// ============================================================================
// Sync Engine
// ============================================================================

export class SyncEngine {
  private readonly definitions: EntityDefinition[];
  private readonly nodes: DependencyNode<EntityType>[];
  private readonly options: EngineOptions;
  private onProgress?: ProgressCallback;

  constructor(
    definitions: readonly EntityDefinition[],
    private readonly reader: RecordReader,
    private readonly store: RemoteStore,
    options: Partial<EngineOptions> = {}
  ) {
    this.definitions = orderDefinitions(definitions);
    this.nodes = toDependencyNodes(this.definitions);
    this.options = { ...ENGINE_DEFAULTS, ...options };

    for (const definition of this.definitions) {
      if (
        this.policyFor(definition) === "inactive" &&
        definition.inactive === undefined
      ) {
        throw new ConfigurationError(
          "SYNC_DELETE_POLICY",
          `${definition.type} has no inactive marker; use hard or never`
        );
      }
    }
  }

  setProgressCallback(callback: ProgressCallback): void {
    this.onProgress = callback;
  }

  /** Pass order for this engine */
  get order(): EntityType[] {
    return this.definitions.map((definition) => definition.type);
  }

  policyFor(definition: EntityDefinition): DeletePolicy {
    return (
      this.options.deletePolicies[definition.type] ??
      defaultDeletePolicy(definition)
    );
  }

  /**
   * Run every pass and summarize the run
   */
  async run(): Promise<RunSummary> {
    const reporter = new RunReporter(this.options.dryRun);
    const blocked = new Map<EntityType, string>();
    let lookups: LookupTables = Object.freeze({});

    syncLogger.info(
      { order: this.order, dryRun: this.options.dryRun },
      "Starting sync run"
    );

    for (const definition of this.definitions) {
      if (this.options.signal?.aborted === true) {
        reporter.record(this.skipped(definition, "Run aborted"));
        continue;
      }

      const blockedReason = blocked.get(definition.type);
      if (blockedReason !== undefined) {
        reporter.record(this.skipped(definition, blockedReason));
        continue;
      }

      const outcome = await this.runPass(definition, lookups);
      reporter.record(outcome.result);

      if (outcome.table !== undefined) {
        lookups = Object.freeze({ ...lookups, [definition.type]: outcome.table });
      }

      if (outcome.result.status === "failed") {
        for (const dependent of dependentsOf(definition.type, this.nodes)) {
          if (!blocked.has(dependent)) {
            blocked.set(
              dependent,
              `Depends on ${definition.type}, which failed`
            );
          }
        }
      }
    }

    return reporter.summarize();
  }

  // ==========================================================================
  // Passes
  // ==========================================================================

  private skipped(definition: EntityDefinition, reason: string): PassResult {
    return {
      entityType: definition.type,
      status: "skipped",
      counts: emptyCounts(),
      failures: [],
      reason,
      durationMs: 0,
    };
  }

  /**
   * Load, map, read remote, plan and apply one entity type
   */
  async runPass(
    definition: EntityDefinition,
    lookups: LookupTables
  ): Promise<PassOutcome> {
    const entityType = definition.type;
    const startTime = performance.now();
    const counts: PassCounts = emptyCounts();
    const failures: RecordFailure[] = [];

    const finish = (
      status: PassStatus,
      extra: Pick<PassResult, "reason" | "fatalKind"> = {}
    ): PassResult => ({
      entityType,
      status,
      counts,
      failures,
      ...extra,
      durationMs: Math.round(performance.now() - startTime),
    });

    try {
      // 1. Load and map
      this.onProgress?.({ phase: entityType, step: "load", current: 0, total: 0 });
      const prepared = await preparePass(definition, this.reader, lookups);
      const table = prepared.table;
      failures.push(...prepared.failures);
      counts.failed = prepared.failures.length;

      // 2. Bulk read
      this.onProgress?.({ phase: entityType, step: "read", current: 0, total: 0 });
      let remote: RemoteRecord[];
      try {
        // a bulk read spans many requests; the store bounds each one
        remote = await this.callRemote(
          () => this.store.list(definition.endpoint),
          { entityType, operation: "list" },
          { timeout: false }
        );
      } catch (error) {
        return {
          result: finish("failed", {
            reason: `Bulk read of ${definition.endpoint} failed: ${errorMessage(error)}`,
            fatalKind: failureKind(error),
          }),
        };
      }

      // 3. Plan
      const plan = planSync(prepared.entities, remote, {
        keyField: definition.keyField,
        compareFields: definition.compareFields,
        deletePolicy: this.policyFor(definition),
        inactive: definition.inactive,
        protectedKeys: prepared.protectedKeys,
      });
      counts.unchanged = plan.counts.unchanged;

      syncLogger.info(
        {
          entityType,
          local: prepared.entities.length,
          remote: remote.length,
          ...plan.counts,
          dryRun: this.options.dryRun,
        },
        "Planned changes"
      );

      if (this.options.dryRun) {
        counts.new = plan.counts.new;
        counts.changed = plan.counts.changed;
        counts.removed = plan.counts.removable;
        return { table, result: finish("completed") };
      }

      // 4. Apply
      let done = 0;
      const total = plan.operations.length;
      const results = await mapConcurrent(
        plan.operations,
        async (operation) => {
          const failure = await this.apply(definition, operation);
          done++;
          this.onProgress?.({
            phase: entityType,
            step: "apply",
            current: done,
            total,
            currentItem: operation.key,
          });
          return { operation, failure };
        },
        this.options.concurrency
      );

      for (const { operation, failure } of results) {
        if (failure !== undefined) {
          counts.failed++;
          failures.push(failure);
        } else if (operation.kind === "create") {
          counts.new++;
        } else if (operation.kind === "update") {
          counts.changed++;
        } else {
          counts.removed++;
        }
      }

      // 5. Threshold
      const attempted = prepared.count + plan.counts.removable;
      const rate = attempted === 0 ? 0 : counts.failed / attempted;
      if (rate > this.options.failureThreshold) {
        return {
          table,
          result: finish("over-threshold", {
            reason: `Failure rate ${(rate * 100).toFixed(1)}% exceeds threshold ${(this.options.failureThreshold * 100).toFixed(1)}%`,
          }),
        };
      }

      return { table, result: finish("completed") };
    } catch (error) {
      if (!(error instanceof MalformedInputError)) {
        syncLogger.error(
          { entityType, error: errorMessage(error) },
          "Unexpected error during pass"
        );
      }
      return {
        result: finish("failed", {
          reason: errorMessage(error),
          fatalKind: failureKind(error),
        }),
      };
    }
  }

  // ==========================================================================
  // Remote Operations
  // ==========================================================================

  /**
   * Apply one operation; returns the failure instead of throwing
   */
  private async apply(
    definition: EntityDefinition,
    operation: SyncOperation
  ): Promise<RecordFailure | undefined> {
    const endpoint = definition.endpoint;
    const context = {
      entityType: definition.type,
      operation: operation.kind,
      key: operation.key,
    };

    try {
      await this.callRemote(async (): Promise<unknown> => {
        switch (operation.kind) {
          case "create":
            return this.store.create(endpoint, operation.payload);
          case "update":
            return this.store.update(endpoint, operation.target, operation.payload);
          case "deactivate":
            return this.store.patch(endpoint, operation.target, operation.changes);
          case "delete":
            return this.store.remove(endpoint, operation.target);
        }
      }, context);

      syncLogger.debug(
        operation.kind === "update"
          ? { ...context, changedFields: operation.changedFields }
          : context,
        "Applied operation"
      );
      return undefined;
    } catch (error) {
      syncLogger.warn(
        { ...context, error: errorMessage(error) },
        "Operation failed"
      );
      return {
        entityType: definition.type,
        stage: operation.kind,
        kind: failureKind(error),
        message: errorMessage(error),
        key: operation.key,
      };
    }
  }

  /**
   * Call the remote store, retrying transient failures with exponential
   * backoff. Anything else fails on the first attempt. Single-record calls
   * are bounded by `requestTimeoutMs` unless `timeout` is false.
   */
  private async callRemote<T>(
    fn: () => Promise<T>,
    context: Record<string, unknown>,
    { timeout = true }: { timeout?: boolean } = {}
  ): Promise<T> {
    const { requestTimeoutMs, maxRetries, retryMinTimeoutMs } = this.options;

    return pRetry(
      async () => {
        try {
          if (!timeout) {
            return await fn();
          }
          return await withTimeout(
            fn(),
            requestTimeoutMs,
            () =>
              new RemoteTransientError(
                `Remote call timed out after ${String(requestTimeoutMs)}ms`
              )
          );
        } catch (error) {
          if (error instanceof RemoteTransientError) {
            throw error;
          }
          throw new AbortError(
            error instanceof Error ? error : new Error(String(error))
          );
        }
      },
      {
        retries: maxRetries,
        factor: 2,
        minTimeout: retryMinTimeoutMs,
        maxTimeout: Math.max(retryMinTimeoutMs, 30_000),
        randomize: false,
        onFailedAttempt: (error) => {
          syncLogger.warn(
            {
              ...context,
              attempt: error.attemptNumber,
              retriesLeft: error.retriesLeft,
              error: error.message,
            },
            "Transient remote failure"
          );
        },
      }
    );
  }
}
