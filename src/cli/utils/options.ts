/**
 * Shared command-line options and their mapping onto configuration overrides
 */

import { ENTITY_TYPES } from "../../types/index.js";

import type { CliOverrides } from "../../config.js";
import type { EntityType } from "../../types/index.js";
import type { Command } from "commander";

export interface ExtractOptions {
  extractDir?: string;
  [file: `${string}File`]: string | undefined;
}

export interface RemoteOptions {
  apiRoot?: string;
  username?: string;
  password?: string;
  token?: string;
  concurrency?: string;
  timeout?: string;
  failureThreshold?: string;
  deletePolicy?: string;
}

export function addExtractOptions(command: Command): Command {
  command.option(
    "--extract-dir <dir>",
    "Directory holding the extract files (env: SIS_EXTRACT_DIR)"
  );
  for (const type of ENTITY_TYPES) {
    command.option(`--${type}-file <path>`, `Extract file for ${type}`);
  }
  return command;
}

export function addRemoteOptions(command: Command): Command {
  return command
    .option("--api-root <url>", "Remote API root (env: SIS_API_ROOT)")
    .option("--username <name>", "API user (env: SIS_API_USERNAME)")
    .option("--password <password>", "API password (env: SIS_API_PASSWORD)")
    .option("--token <token>", "API token, instead of a password (env: SIS_API_TOKEN)")
    .option("--concurrency <n>", "Remote calls in flight per pass (env: SYNC_CONCURRENCY)")
    .option("--timeout <ms>", "Timeout of one remote call (env: SYNC_TIMEOUT_MS)")
    .option(
      "--failure-threshold <rate>",
      "Failure rate (0-1) above which a pass fails the run (env: SYNC_FAILURE_THRESHOLD)"
    )
    .option(
      "--delete-policy <policies>",
      "Per-type delete policy, e.g. students=inactive,courses=never (env: SYNC_DELETE_POLICY)"
    );
}

export function toOverrides(
  options: ExtractOptions & RemoteOptions
): CliOverrides {
  const files: Partial<Record<EntityType, string>> = {};
  for (const type of ENTITY_TYPES) {
    const key = `${type}File` as const;
    const file = options[key];
    if (file !== undefined) {
      files[type] = file;
    }
  }

  return {
    apiRoot: options.apiRoot,
    username: options.username,
    password: options.password,
    token: options.token,
    extractDir: options.extractDir,
    files,
    concurrency: options.concurrency,
    timeout: options.timeout,
    failureThreshold: options.failureThreshold,
    deletePolicy: options.deletePolicy,
  };
}
