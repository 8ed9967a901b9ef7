import chalk from "chalk";
import CliTable3 from "cli-table3";
import ora from "ora";

import { resolveFiles } from "../../config.js";
import { errorMessage } from "../../errors.js";
import { FileRecordReader } from "../../loader/reader.js";
import { ENTITY_DEFINITIONS } from "../../mapping/entities/index.js";
import { validateExtract, type ValidationReport } from "../../sync/prepare.js";
import { displayFailures, printError } from "../utils/display.js";
import { addExtractOptions, toOverrides, type ExtractOptions } from "../utils/options.js";

import type { Command } from "commander";

function colorStatus(status: ValidationReport["status"]): string {
  switch (status) {
    case "valid":
      return chalk.green(status);
    case "invalid":
      return chalk.yellow(status);
    case "failed":
      return chalk.red(status);
    case "skipped":
      return chalk.gray(status);
  }
}

// ============================================================================
// Validate Command
// ============================================================================

export function registerValidateCommand(program: Command): void {
  const validate = program
    .command("validate")
    .description("Load and map the extract files without contacting the remote system")
    .option("--limit <n>", "Show at most n failures", "20");

  addExtractOptions(validate);

  validate.action(async (options: ExtractOptions & { limit: string }) => {
    let reader: FileRecordReader;
    try {
      reader = new FileRecordReader(
        resolveFiles(ENTITY_DEFINITIONS, toOverrides(options))
      );
    } catch (error) {
      printError(errorMessage(error));
      process.exitCode = 1;
      return;
    }

    const spinner = ora("Validating extract...").start();

    try {
      const reports = await validateExtract(ENTITY_DEFINITIONS, reader);
      const failures = reports.flatMap((report) => report.failures);
      const broken = reports.filter(
        (report) => report.status === "failed" || report.status === "skipped"
      );

      if (broken.length > 0) {
        spinner.fail(`${String(broken.length)} type(s) could not be validated`);
      } else if (failures.length > 0) {
        spinner.warn(`${String(failures.length)} invalid record(s)`);
      } else {
        spinner.succeed("Every record is valid");
      }

      const table = new CliTable3({
        head: [
          chalk.cyan("Type"),
          chalk.cyan("Status"),
          chalk.cyan("Records"),
          chalk.cyan("Valid"),
          chalk.cyan("Note"),
        ],
        wordWrap: true,
      });

      for (const report of reports) {
        table.push([
          report.entityType,
          colorStatus(report.status),
          String(report.records),
          String(report.valid),
          report.reason ?? "",
        ]);
      }

      console.log(table.toString());

      const limit = Number.parseInt(options.limit, 10);
      displayFailures(failures, Number.isNaN(limit) ? undefined : limit);

      if (broken.length > 0) {
        process.exitCode = 1;
      } else if (failures.length > 0) {
        process.exitCode = 2;
      }
    } catch (error) {
      spinner.fail(`Validation failed: ${errorMessage(error)}`);
      process.exitCode = 1;
    }
  });
}
