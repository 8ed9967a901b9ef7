/**
 * Display utilities for CLI output formatting
 */

import chalk from "chalk";
import CliTable3 from "cli-table3";

import type {
  PassResult,
  PassStatus,
  RecordFailure,
  RunStatus,
  RunSummary,
} from "../../sync/reporter.js";
import type { DeletePolicy, EntityType } from "../../types/index.js";

const FAILURE_LIMIT = 20;

function colorPassStatus(status: PassStatus): string {
  switch (status) {
    case "completed":
      return chalk.green(status);
    case "over-threshold":
      return chalk.yellow(status);
    case "failed":
      return chalk.red(status);
    case "skipped":
      return chalk.gray(status);
  }
}

function colorRunStatus(status: RunStatus): string {
  switch (status) {
    case "success":
      return chalk.green.bold(status.toUpperCase());
    case "partial":
      return chalk.yellow.bold(status.toUpperCase());
    case "failure":
      return chalk.red.bold(status.toUpperCase());
  }
}

/**
 * Where a failed record sits: its key, else its position in the extract
 */
export function describeRecord(failure: RecordFailure): string {
  if (failure.key !== undefined) {
    return failure.key;
  }
  if (failure.index !== undefined) {
    return `#${String(failure.index + 1)}`;
  }
  return "-";
}

/**
 * Display per-type counts in a formatted table
 */
export function displayPassTable(passes: readonly PassResult[]): void {
  const table = new CliTable3({
    head: [
      chalk.cyan("Type"),
      chalk.cyan("Status"),
      chalk.cyan("New"),
      chalk.cyan("Changed"),
      chalk.cyan("Unchanged"),
      chalk.cyan("Removed"),
      chalk.cyan("Failed"),
    ],
  });

  for (const pass of passes) {
    table.push([
      pass.entityType,
      colorPassStatus(pass.status),
      String(pass.counts.new),
      String(pass.counts.changed),
      String(pass.counts.unchanged),
      String(pass.counts.removed),
      pass.counts.failed > 0
        ? chalk.red(String(pass.counts.failed))
        : String(pass.counts.failed),
    ]);
  }

  console.log(table.toString());
}

/**
 * Display record failures, the first few in full
 */
export function displayFailures(
  failures: readonly RecordFailure[],
  limit = FAILURE_LIMIT
): void {
  if (failures.length === 0) {
    return;
  }

  const table = new CliTable3({
    head: [
      chalk.cyan("Type"),
      chalk.cyan("Record"),
      chalk.cyan("Stage"),
      chalk.cyan("Kind"),
      chalk.cyan("Message"),
    ],
    colWidths: [14, 14, 12, 22, 60],
    wordWrap: true,
  });

  for (const failure of failures.slice(0, limit)) {
    table.push([
      failure.entityType,
      describeRecord(failure),
      failure.stage,
      failure.kind,
      failure.message,
    ]);
  }

  console.log(chalk.bold(`\nFailures (${String(failures.length)}):`));
  console.log(table.toString());

  if (failures.length > limit) {
    console.log(
      chalk.gray(`  ... and ${String(failures.length - limit)} more (see log)`)
    );
  }
}

/**
 * Display the outcome of a sync run
 */
export function displayRunSummary(summary: RunSummary): void {
  const title = summary.dryRun ? "Sync Summary (dry run)" : "Sync Summary";
  console.log(chalk.bold.underline(`\n${title}\n`));

  displayPassTable(summary.passes);

  for (const pass of summary.passes) {
    if (pass.reason !== undefined) {
      console.log(`  ${chalk.yellow(pass.entityType)}: ${pass.reason}`);
    }
  }

  displayFailures(summary.failures);

  const totals = summary.totals;
  console.log(
    `\n${colorRunStatus(summary.status)}  ` +
      `${String(totals.new)} new, ${String(totals.changed)} changed, ` +
      `${String(totals.unchanged)} unchanged, ${String(totals.removed)} removed, ` +
      `${String(totals.failed)} failed in ${(summary.durationMs / 1000).toFixed(1)}s\n`
  );
}

/**
 * Display the pass order with dependencies and delete policies
 */
export function displayPassOrder(
  rows: readonly {
    type: EntityType;
    label: string;
    dependsOn: readonly EntityType[];
    deletePolicy: DeletePolicy;
    file?: string;
  }[]
): void {
  const table = new CliTable3({
    head: [
      chalk.cyan("#"),
      chalk.cyan("Type"),
      chalk.cyan("Depends On"),
      chalk.cyan("Delete Policy"),
      chalk.cyan("File"),
    ],
    wordWrap: true,
  });

  for (const [index, row] of rows.entries()) {
    table.push([
      String(index + 1),
      chalk.green(row.type),
      row.dependsOn.length > 0 ? row.dependsOn.join(", ") : chalk.gray("-"),
      row.deletePolicy,
      row.file ?? chalk.gray("-"),
    ]);
  }

  console.log(table.toString());
}

/**
 * Print error message
 */
export function printError(message: string): void {
  console.error(chalk.red("Error:"), message);
}
