/**
 * Configuration - environment (.env via dotenv) merged with CLI flags
 *
 * CLI flags win over the environment. Every problem is reported as a
 * ConfigurationError naming the environment variable, before anything is
 * read or written.
 */

import "dotenv/config";

import { join } from "node:path";

import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { ConfigurationError } from "./errors.js";
import {
  DELETE_POLICIES,
  isEntityType,
  type DeletePolicy,
  type EntityDefinition,
  type EntityType,
} from "./types/index.js";

import type { RemoteAuth } from "./types/remote.js";

export type Env = Readonly<Record<string, string | undefined>>;

/**
 * Values given on the command line; numbers stay text until validated
 */
export interface CliOverrides {
  apiRoot?: string;
  username?: string;
  password?: string;
  token?: string;
  extractDir?: string;
  files?: Partial<Record<EntityType, string>>;
  concurrency?: string;
  timeout?: string;
  failureThreshold?: string;
  deletePolicy?: string;
}

export interface RemoteSettings {
  apiRoot: string;
  auth: RemoteAuth;
  pageSize: number;
  requestTimeoutMs: number;
}

export interface EngineSettings {
  concurrency: number;
  requestTimeoutMs: number;
  maxRetries: number;
  retryMinTimeoutMs: number;
  failureThreshold: number;
  deletePolicies: Partial<Record<EntityType, DeletePolicy>>;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * First value that is not blank, trimmed
 */
function pick(...values: (string | undefined)[]): string | undefined {
  for (const value of values) {
    if (value !== undefined && value.trim() !== "") {
      return value.trim();
    }
  }
  return undefined;
}

export function fileEnvName(type: EntityType): string {
  return `SIS_${type.toUpperCase()}_FILE`;
}

// ============================================================================
// Numeric Settings
// ============================================================================

const NumericSettingsSchema = Type.Object({
  SYNC_CONCURRENCY: Type.Integer({ minimum: 1 }),
  SYNC_TIMEOUT_MS: Type.Integer({ minimum: 1 }),
  SYNC_MAX_RETRIES: Type.Integer({ minimum: 0 }),
  SYNC_RETRY_MIN_MS: Type.Integer({ minimum: 0 }),
  SYNC_FAILURE_THRESHOLD: Type.Number({ minimum: 0, maximum: 1 }),
  SYNC_PAGE_SIZE: Type.Integer({ minimum: 1 }),
});

const NUMERIC_OPTIONS = [
  "SYNC_CONCURRENCY",
  "SYNC_TIMEOUT_MS",
  "SYNC_MAX_RETRIES",
  "SYNC_RETRY_MIN_MS",
  "SYNC_FAILURE_THRESHOLD",
  "SYNC_PAGE_SIZE",
] as const;

type NumericOption = (typeof NUMERIC_OPTIONS)[number];

const NUMERIC_DEFAULTS: Record<NumericOption, string> = {
  SYNC_CONCURRENCY: "4",
  SYNC_TIMEOUT_MS: "30000",
  SYNC_MAX_RETRIES: "3",
  SYNC_RETRY_MIN_MS: "500",
  SYNC_FAILURE_THRESHOLD: "1",
  SYNC_PAGE_SIZE: "5000",
};

function loadNumbers(overrides: CliOverrides, env: Env) {
  const cli: Partial<Record<NumericOption, string>> = {
    SYNC_CONCURRENCY: overrides.concurrency,
    SYNC_TIMEOUT_MS: overrides.timeout,
    SYNC_FAILURE_THRESHOLD: overrides.failureThreshold,
  };

  const raw: Record<string, string> = {};
  for (const option of NUMERIC_OPTIONS) {
    raw[option] = pick(cli[option], env[option]) ?? NUMERIC_DEFAULTS[option];
  }

  const converted = Value.Convert(NumericSettingsSchema, raw);
  if (Value.Check(NumericSettingsSchema, converted)) {
    return converted;
  }

  const error = Value.Errors(NumericSettingsSchema, converted).First();
  const option = error?.path.replace(/^\//, "") ?? "SYNC_CONCURRENCY";
  throw new ConfigurationError(
    option,
    `Invalid value '${raw[option] ?? ""}' for ${option}: ${error?.message ?? "invalid"}`
  );
}

// ============================================================================
// Delete Policies
// ============================================================================

/**
 * Parse `type=policy,type=policy`
 */
export function parseDeletePolicies(
  text: string,
  option = "SYNC_DELETE_POLICY"
): Partial<Record<EntityType, DeletePolicy>> {
  const policies: Partial<Record<EntityType, DeletePolicy>> = {};

  for (const entry of text.split(",")) {
    const trimmed = entry.trim();
    if (trimmed === "") continue;

    const [type = "", policy = ""] = trimmed.split("=").map((part) => part.trim());

    if (!isEntityType(type)) {
      throw new ConfigurationError(
        option,
        `Unknown entity type '${type}' in ${option}`
      );
    }

    const known = DELETE_POLICIES.find((candidate) => candidate === policy);
    if (known === undefined) {
      throw new ConfigurationError(
        option,
        `Unknown delete policy '${policy}' for ${type} in ${option} (expected ${DELETE_POLICIES.join(", ")})`
      );
    }

    policies[type] = known;
  }

  return policies;
}

// ============================================================================
// Loaders
// ============================================================================

/**
 * Extract file for each entity type: an explicit file wins, otherwise the
 * type's default file name inside the extract directory.
 */
export function resolveFiles(
  definitions: readonly EntityDefinition[],
  overrides: CliOverrides = {},
  env: Env = process.env
): Partial<Record<EntityType, string>> {
  const extractDir = pick(overrides.extractDir, env.SIS_EXTRACT_DIR);
  const files: Partial<Record<EntityType, string>> = {};

  for (const definition of definitions) {
    const envName = fileEnvName(definition.type);
    const explicit = pick(overrides.files?.[definition.type], env[envName]);

    if (explicit !== undefined) {
      files[definition.type] = explicit;
    } else if (extractDir !== undefined) {
      files[definition.type] = join(extractDir, definition.defaultFile);
    } else {
      throw new ConfigurationError(
        envName,
        `Missing required configuration option ${envName} (or SIS_EXTRACT_DIR)`
      );
    }
  }

  return files;
}

export function loadRemoteSettings(
  overrides: CliOverrides = {},
  env: Env = process.env
): RemoteSettings {
  const apiRoot = pick(overrides.apiRoot, env.SIS_API_ROOT);
  if (apiRoot === undefined) {
    throw new ConfigurationError("SIS_API_ROOT");
  }
  if (!URL.canParse(apiRoot)) {
    throw new ConfigurationError(
      "SIS_API_ROOT",
      `SIS_API_ROOT is not a valid URL: ${apiRoot}`
    );
  }

  let auth: RemoteAuth;
  const token = pick(overrides.token, env.SIS_API_TOKEN);
  if (token !== undefined) {
    auth = { kind: "token", token };
  } else {
    const username = pick(overrides.username, env.SIS_API_USERNAME);
    if (username === undefined) {
      throw new ConfigurationError("SIS_API_USERNAME");
    }
    // passwords are taken as given, spaces included
    const password = overrides.password ?? env.SIS_API_PASSWORD;
    if (password === undefined || password === "") {
      throw new ConfigurationError("SIS_API_PASSWORD");
    }
    auth = { kind: "basic", username, password };
  }

  const numbers = loadNumbers(overrides, env);

  return {
    apiRoot,
    auth,
    pageSize: numbers.SYNC_PAGE_SIZE,
    requestTimeoutMs: numbers.SYNC_TIMEOUT_MS,
  };
}

export function loadEngineSettings(
  overrides: CliOverrides = {},
  env: Env = process.env
): EngineSettings {
  const numbers = loadNumbers(overrides, env);

  const deletePolicyText = pick(overrides.deletePolicy, env.SYNC_DELETE_POLICY);
  const deletePolicies =
    deletePolicyText !== undefined
      ? parseDeletePolicies(
          deletePolicyText,
          pick(overrides.deletePolicy) !== undefined
            ? "--delete-policy"
            : "SYNC_DELETE_POLICY"
        )
      : {};

  return {
    concurrency: numbers.SYNC_CONCURRENCY,
    requestTimeoutMs: numbers.SYNC_TIMEOUT_MS,
    maxRetries: numbers.SYNC_MAX_RETRIES,
    retryMinTimeoutMs: numbers.SYNC_RETRY_MIN_MS,
    failureThreshold: numbers.SYNC_FAILURE_THRESHOLD,
    deletePolicies,
  };
}
