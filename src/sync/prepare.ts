/**
 * Load and map one entity type's extract into canonical entities
 */

import { MalformedInputError } from "../errors.js";
import {
  buildLookupTable,
  describeSource,
  mapRecords,
  toMatchKey,
  type IndexedRecord,
} from "../mapping/mapper.js";
import {
  dependentsOf,
  orderDefinitions,
  toDependencyNodes,
} from "./graph.js";

import type { RecordFailure } from "./reporter.js";
import type { RecordReader } from "../loader/reader.js";
import type {
  CanonicalEntity,
  EntityDefinition,
  EntityType,
  LookupTable,
  LookupTables,
} from "../types/index.js";

export interface PreparedPass {
  /** Records in the extract, valid or not */
  count: number;
  entities: CanonicalEntity[];
  failures: RecordFailure[];
  /** Match keys of records that failed; their remote counterparts stay */
  protectedKeys: Set<string>;
  table: LookupTable;
}

/**
 * @throws MalformedInputError when the extract cannot be read as a whole
 */
export async function preparePass(
  definition: EntityDefinition,
  reader: RecordReader,
  lookups: LookupTables
): Promise<PreparedPass> {
  const entityType = definition.type;
  const source = await reader.open(describeSource(definition));
  const valid: IndexedRecord[] = [];
  const failures: RecordFailure[] = [];
  const protectedKeys = new Set<string>();

  for (const loaded of source.records()) {
    if (loaded.ok) {
      valid.push({ index: loaded.index, record: loaded.record });
      continue;
    }
    failures.push({
      entityType,
      stage: "load",
      kind: loaded.error.code,
      message: loaded.error.message,
      key: loaded.key,
      index: loaded.index,
    });
    if (loaded.key !== undefined) {
      protectedKeys.add(toMatchKey(loaded.key));
    }
  }

  const mapped = mapRecords(definition, valid, lookups);
  for (const failure of mapped.failures) {
    failures.push({
      entityType,
      stage: "map",
      kind: failure.error.code,
      message: failure.error.message,
      key: failure.key,
      index: failure.index,
    });
    if (failure.key !== undefined) {
      protectedKeys.add(toMatchKey(failure.key));
    }
  }

  return {
    count: source.count,
    entities: mapped.entities,
    failures,
    protectedKeys,
    table: buildLookupTable(mapped.entities),
  };
}

// ============================================================================
// Extract Validation
// ============================================================================

export interface ValidationReport {
  entityType: EntityType;
  status: "valid" | "invalid" | "failed" | "skipped";
  records: number;
  valid: number;
  failures: RecordFailure[];
  reason?: string;
}

/**
 * Load and map every entity type in dependency order without touching the
 * remote system.
 */
export async function validateExtract(
  definitions: readonly EntityDefinition[],
  reader: RecordReader
): Promise<ValidationReport[]> {
  const ordered = orderDefinitions(definitions);
  const nodes = toDependencyNodes(ordered);
  const blocked = new Map<EntityType, string>();
  const reports: ValidationReport[] = [];
  let lookups: LookupTables = Object.freeze({});

  for (const definition of ordered) {
    const entityType = definition.type;

    const reason = blocked.get(entityType);
    if (reason !== undefined) {
      reports.push({
        entityType,
        status: "skipped",
        records: 0,
        valid: 0,
        failures: [],
        reason,
      });
      continue;
    }

    try {
      const prepared = await preparePass(definition, reader, lookups);
      lookups = Object.freeze({ ...lookups, [entityType]: prepared.table });
      reports.push({
        entityType,
        status: prepared.failures.length > 0 ? "invalid" : "valid",
        records: prepared.count,
        valid: prepared.entities.length,
        failures: prepared.failures,
      });
    } catch (error) {
      if (!(error instanceof MalformedInputError)) {
        throw error;
      }
      reports.push({
        entityType,
        status: "failed",
        records: 0,
        valid: 0,
        failures: [],
        reason: error.message,
      });
      for (const dependent of dependentsOf(entityType, nodes)) {
        if (!blocked.has(dependent)) {
          blocked.set(dependent, `Depends on ${entityType}, which failed`);
        }
      }
    }
  }

  return reports;
}
