/**
 * Diff - Classify local entities against remote records
 *
 * new:       key absent remotely          -> create
 * changed:   key present, a field differs  -> update
 * unchanged: key present, fields equal     -> nothing
 * removable: key only present remotely     -> delete / mark inactive / keep,
 *                                              per delete policy
 */

import { toMatchKey, readIdentifier } from "../mapping/mapper.js";

import type {
  CanonicalEntity,
  DeletePolicy,
  FieldValue,
  InactiveMarker,
  Payload,
} from "../types/index.js";
import type { RemoteRecord } from "../types/remote.js";

// ============================================================================
// Types
// ============================================================================

export type SyncOperation =
  | { kind: "create"; key: string; payload: Payload }
  | {
      kind: "update";
      key: string;
      target: RemoteRecord;
      payload: Payload;
      changedFields: string[];
    }
  | { kind: "delete"; key: string; target: RemoteRecord }
  | {
      kind: "deactivate";
      key: string;
      target: RemoteRecord;
      changes: Payload;
    };

export type OperationKind = SyncOperation["kind"];

export interface PlanCounts {
  new: number;
  changed: number;
  unchanged: number;
  removable: number;
  /** Remote-only records left in place (policy, protection or already inactive) */
  retained: number;
  /** Remote records without a usable key */
  unkeyed: number;
}

export interface SyncPlan {
  operations: SyncOperation[];
  counts: PlanCounts;
}

export interface PlanOptions {
  keyField: string;
  compareFields?: readonly string[];
  deletePolicy: DeletePolicy;
  inactive?: InactiveMarker;
  /** Match keys of local records that failed validation; never removed */
  protectedKeys?: ReadonlySet<string>;
}

// ============================================================================
// Field Comparison
// ============================================================================

/**
 * Value as compared: blank and missing are the same, numbers compare by their
 * decimal text, strings are trimmed.
 */
export function comparableValue(value: unknown): string | boolean | null {
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value === "boolean") {
    return value;
  }
  if (typeof value === "number") {
    return String(value);
  }
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed === "" ? null : trimmed;
  }
  return JSON.stringify(value);
}

export function sameValue(local: FieldValue | undefined, remote: unknown): boolean {
  return comparableValue(local) === comparableValue(remote);
}

/**
 * Fields of `payload` whose remote value differs
 */
export function changedFields(
  payload: Payload,
  remote: Readonly<Record<string, unknown>>,
  compareFields?: readonly string[]
): string[] {
  const fields = compareFields ?? Object.keys(payload);
  return fields.filter((field) => !sameValue(payload[field], remote[field]));
}

// ============================================================================
// Planning
// ============================================================================

/**
 * Compute the operations that bring the remote records in line with the
 * local entities.
 */
export function planSync(
  entities: readonly CanonicalEntity[],
  remote: readonly RemoteRecord[],
  options: PlanOptions
): SyncPlan {
  const counts: PlanCounts = {
    new: 0,
    changed: 0,
    unchanged: 0,
    removable: 0,
    retained: 0,
    unkeyed: 0,
  };
  const operations: SyncOperation[] = [];

  const remoteByKey = new Map<string, RemoteRecord>();
  for (const record of remote) {
    const key = readIdentifier(record.fields[options.keyField]);
    if (key === undefined) {
      counts.unkeyed++;
      continue;
    }
    const matchKey = toMatchKey(key);
    if (!remoteByKey.has(matchKey)) {
      remoteByKey.set(matchKey, record);
    }
  }

  const localKeys = new Set<string>();

  for (const entity of entities) {
    localKeys.add(entity.matchKey);
    const existing = remoteByKey.get(entity.matchKey);

    if (existing === undefined) {
      counts.new++;
      operations.push({ kind: "create", key: entity.key, payload: entity.payload });
      continue;
    }

    const changed = changedFields(
      entity.payload,
      existing.fields,
      options.compareFields
    );

    if (changed.length === 0) {
      counts.unchanged++;
    } else {
      counts.changed++;
      operations.push({
        kind: "update",
        key: entity.key,
        target: existing,
        payload: entity.payload,
        changedFields: changed,
      });
    }
  }

  for (const [matchKey, record] of remoteByKey) {
    if (localKeys.has(matchKey)) {
      continue;
    }

    const key = readIdentifier(record.fields[options.keyField]) ?? matchKey;

    if (
      options.protectedKeys?.has(matchKey) === true ||
      options.deletePolicy === "never"
    ) {
      counts.retained++;
      continue;
    }

    if (options.deletePolicy === "hard") {
      counts.removable++;
      operations.push({ kind: "delete", key, target: record });
      continue;
    }

    const marker = options.inactive;
    if (marker === undefined || sameValue(marker.value, record.fields[marker.field])) {
      counts.retained++;
      continue;
    }

    counts.removable++;
    operations.push({
      kind: "deactivate",
      key,
      target: record,
      changes: { [marker.field]: marker.value },
    });
  }

  return { operations, counts };
}
