/**
 * Run Reporter - Aggregate pass results into a run summary
 */

import { syncLogger } from "../logger.js";

import type { OperationKind } from "./diff.js";
import type { SyncErrorCode } from "../errors.js";
import type { EntityType } from "../types/index.js";

// ============================================================================
// Types
// ============================================================================

export interface PassCounts {
  new: number;
  changed: number;
  unchanged: number;
  removed: number;
  failed: number;
}

/**
 * completed:      every operation was attempted
 * over-threshold: completed, but the failure rate exceeded the threshold
 * failed:         a fatal error aborted the pass
 * skipped:        not attempted (a dependency failed or the run was aborted)
 */
export type PassStatus = "completed" | "over-threshold" | "failed" | "skipped";

export type RunStatus = "success" | "partial" | "failure";

export type FailureStage = "load" | "map" | OperationKind;

export interface RecordFailure {
  entityType: EntityType;
  stage: FailureStage;
  kind: SyncErrorCode;
  message: string;
  key?: string;
  /** Position in the extract file, for records without a usable key */
  index?: number;
}

export interface PassResult {
  entityType: EntityType;
  status: PassStatus;
  counts: PassCounts;
  failures: RecordFailure[];
  /** Why the pass failed or was skipped */
  reason?: string;
  fatalKind?: SyncErrorCode;
  durationMs: number;
}

export interface RunSummary {
  status: RunStatus;
  dryRun: boolean;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  passes: PassResult[];
  totals: PassCounts;
  failures: RecordFailure[];
}

// ============================================================================
// Helpers
// ============================================================================

export function emptyCounts(): PassCounts {
  return { new: 0, changed: 0, unchanged: 0, removed: 0, failed: 0 };
}

export function addCounts(a: PassCounts, b: PassCounts): PassCounts {
  return {
    new: a.new + b.new,
    changed: a.changed + b.changed,
    unchanged: a.unchanged + b.unchanged,
    removed: a.removed + b.removed,
    failed: a.failed + b.failed,
  };
}

/**
 * failure: a pass failed, was skipped or crossed the failure threshold
 * partial: every pass completed, some records failed
 * success: nothing failed
 */
export function overallStatus(passes: readonly PassResult[]): RunStatus {
  if (passes.some((pass) => pass.status !== "completed")) {
    return "failure";
  }
  if (passes.some((pass) => pass.counts.failed > 0)) {
    return "partial";
  }
  return "success";
}

export function exitCodeFor(status: RunStatus): number {
  switch (status) {
    case "success":
      return 0;
    case "failure":
      return 1;
    case "partial":
      return 2;
  }
}

// ============================================================================
// Run Reporter
// ============================================================================

export class RunReporter {
  private readonly passes: PassResult[] = [];
  private readonly startedAt: Date;

  constructor(
    private readonly dryRun = false,
    private readonly now: () => Date = () => new Date()
  ) {
    this.startedAt = now();
  }

  record(pass: PassResult): void {
    this.passes.push(pass);

    const log = {
      entityType: pass.entityType,
      status: pass.status,
      counts: pass.counts,
      durationMs: pass.durationMs,
    };

    if (pass.status === "failed") {
      syncLogger.error(
        { ...log, kind: pass.fatalKind, reason: pass.reason },
        "Pass failed"
      );
    } else if (pass.status === "skipped") {
      syncLogger.warn({ ...log, reason: pass.reason }, "Pass skipped");
    } else {
      syncLogger.info(log, "Pass finished");
    }
  }

  summarize(): RunSummary {
    const finishedAt = this.now();
    const passes = [...this.passes];

    const summary: RunSummary = {
      status: overallStatus(passes),
      dryRun: this.dryRun,
      startedAt: this.startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs: finishedAt.getTime() - this.startedAt.getTime(),
      passes,
      totals: passes.reduce(
        (totals, pass) => addCounts(totals, pass.counts),
        emptyCounts()
      ),
      failures: passes.flatMap((pass) => pass.failures),
    };

    syncLogger.info(
      {
        status: summary.status,
        dryRun: summary.dryRun,
        durationMs: summary.durationMs,
        totals: summary.totals,
        passes: passes.map((pass) => ({
          entityType: pass.entityType,
          status: pass.status,
          ...pass.counts,
        })),
        failures: summary.failures,
      },
      "Sync run finished"
    );

    return summary;
  }
}
