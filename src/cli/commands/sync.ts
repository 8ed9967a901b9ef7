import ora from "ora";

import {
  loadEngineSettings,
  loadRemoteSettings,
  resolveFiles,
} from "../../config.js";
import { errorMessage } from "../../errors.js";
import { FileRecordReader } from "../../loader/reader.js";
import { logger } from "../../logger.js";
import { ENTITY_DEFINITIONS } from "../../mapping/entities/index.js";
import { HttpRemoteStore } from "../../remote/client.js";
import { SyncEngine } from "../../sync/engine.js";
import { exitCodeFor } from "../../sync/reporter.js";
import { displayRunSummary, printError } from "../utils/display.js";
import {
  addExtractOptions,
  addRemoteOptions,
  toOverrides,
  type ExtractOptions,
  type RemoteOptions,
} from "../utils/options.js";

import type { Command } from "commander";

type SyncCommandOptions = ExtractOptions &
  RemoteOptions & {
    dryRun?: boolean;
  };

// ============================================================================
// Sync Command
// ============================================================================

export function registerSyncCommand(program: Command): void {
  const sync = program
    .command("sync")
    .description("Reconcile the remote system with the extract files")
    .option("--dry-run", "Read and compare everything, write nothing")
    .addHelpText(
      "after",
      `
PASS ORDER:
══════════════════════════════════════════════════════════════════════════════
Entity types sync one at a time, referenced types first (see 'order'). A type
whose file is malformed or whose remote read fails is skipped together with
every type that depends on it. Other types still run.

EXIT CODES:
──────────────────────────────────────────────────────────────────────────────
  0  every record synced
  1  a pass failed, was skipped, or crossed the failure threshold
  2  every pass completed, some records failed
══════════════════════════════════════════════════════════════════════════════
`
    );

  addExtractOptions(sync);
  addRemoteOptions(sync);

  sync.action(async (options: SyncCommandOptions) => {
    const overrides = toOverrides(options);
    const dryRun = options.dryRun === true;

    let engine: SyncEngine;
    const controller = new AbortController();

    try {
      const files = resolveFiles(ENTITY_DEFINITIONS, overrides);
      const remote = loadRemoteSettings(overrides);
      const settings = loadEngineSettings(overrides);

      const store = new HttpRemoteStore({
        apiRoot: remote.apiRoot,
        auth: remote.auth,
        pageSize: remote.pageSize,
        requestTimeoutMs: remote.requestTimeoutMs,
      });

      engine = new SyncEngine(
        ENTITY_DEFINITIONS,
        new FileRecordReader(files),
        store,
        { ...settings, dryRun, signal: controller.signal }
      );
    } catch (error) {
      printError(errorMessage(error));
      process.exitCode = 1;
      return;
    }

    const onSignal = (signal: NodeJS.Signals): void => {
      logger.warn({ signal }, "Stopping after the current pass");
      controller.abort();
    };
    process.once("SIGINT", onSignal);
    process.once("SIGTERM", onSignal);

    const spinner = ora(dryRun ? "Planning sync..." : "Syncing...").start();

    try {
      engine.setProgressCallback((progress) => {
        spinner.text =
          progress.step === "apply"
            ? `${progress.phase}: ${String(progress.current)}/${String(progress.total)} (${progress.currentItem ?? ""})`
            : `${progress.phase}: ${progress.step === "load" ? "loading extract" : "reading remote records"}`;
      });

      const summary = await engine.run();
      const message = `Sync ${summary.status} in ${(summary.durationMs / 1000).toFixed(1)}s`;

      if (summary.status === "success") {
        spinner.succeed(message);
      } else if (summary.status === "partial") {
        spinner.warn(message);
      } else {
        spinner.fail(message);
      }

      displayRunSummary(summary);
      process.exitCode = exitCodeFor(summary.status);
    } catch (error) {
      spinner.fail(`Sync failed: ${errorMessage(error)}`);
      process.exitCode = 1;
    } finally {
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
    }
  });
}
