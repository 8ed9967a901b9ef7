/**
 * Entity Mapper - Raw extract records to canonical entities
 *
 * Mapping is a pure function of the raw record, the entity definition and the
 * lookup tables published by earlier passes. A record that cannot be mapped
 * is returned as a failure; the batch never throws.
 */

import {
  FieldValidationError,
  UnresolvedReferenceError,
} from "../errors.js";
import { mapperLogger } from "../logger.js";
import { ParseError } from "./parsers.js";

import type {
  CanonicalEntity,
  EntityDefinition,
  EntityType,
  FieldMapping,
  FieldValue,
  LookupTable,
  LookupTables,
  RawRecord,
  RecordDescriptor,
  SourceField,
} from "../types/index.js";

// ============================================================================
// Types
// ============================================================================

export interface MappingFailure {
  entityType: EntityType;
  index: number;
  key?: string;
  error: FieldValidationError | UnresolvedReferenceError;
}

export interface MapResult {
  entities: CanonicalEntity[];
  failures: MappingFailure[];
}

export interface IndexedRecord {
  index: number;
  record: RawRecord;
}

// ============================================================================
// Keys
// ============================================================================

/**
 * Key used for lookups and remote matching
 */
export function toMatchKey(key: string): string {
  return key.trim().toUpperCase();
}

/**
 * Trimmed text of an identifier value, or undefined when blank or not scalar
 */
export function readIdentifier(value: unknown): string | undefined {
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  if (typeof value === "string" && value.trim() !== "") {
    return value.trim();
  }
  return undefined;
}

// ============================================================================
// Descriptor
// ============================================================================

/**
 * The extract columns an entity definition reads, with their types
 */
export function describeSource(definition: EntityDefinition): RecordDescriptor {
  const fields: SourceField[] = [
    { name: definition.keySource, type: "id", required: true },
  ];

  for (const mapping of definition.fields) {
    fields.push({
      name: mapping.source,
      type: mapping.type ?? "string",
      required: mapping.required ?? false,
    });
  }

  for (const reference of definition.references) {
    fields.push({
      name: reference.source,
      type: "id",
      required: reference.optional !== true,
    });
  }

  return {
    entityType: definition.type,
    keySource: definition.keySource,
    fields,
  };
}

// ============================================================================
// Single Record
// ============================================================================

function readField(
  mapping: FieldMapping,
  raw: RawRecord,
  key: string
): FieldValue {
  const value = raw[mapping.source];
  const type = mapping.type ?? "string";
  const blank =
    mapping.blank !== undefined ? mapping.blank : type === "string" ? "" : null;

  if (value === undefined || value === null) {
    return blank;
  }

  if (
    typeof value !== "string" &&
    typeof value !== "number" &&
    typeof value !== "boolean"
  ) {
    throw new FieldValidationError(
      `${mapping.source}: Expected a primitive value`,
      mapping.field,
      key
    );
  }

  const trimmed = typeof value === "string" ? value.trim() : value;
  if (trimmed === "") {
    return blank;
  }

  if (mapping.translate === undefined) {
    return trimmed;
  }

  try {
    return mapping.translate(trimmed);
  } catch (error) {
    if (error instanceof ParseError) {
      throw new FieldValidationError(
        `${mapping.source}: ${error.message}`,
        mapping.field,
        key
      );
    }
    throw error;
  }
}

/**
 * Map one raw record.
 *
 * @throws FieldValidationError when the key is blank, a translation rejects a value or the record check fails
 * @throws UnresolvedReferenceError when a reference does not resolve in the lookup tables
 */
export function mapRecord(
  definition: EntityDefinition,
  raw: RawRecord,
  lookups: LookupTables
): CanonicalEntity {
  const key = readIdentifier(raw[definition.keySource]);
  if (key === undefined) {
    throw new FieldValidationError(
      `${definition.keySource}: Key value is missing`,
      definition.keyField
    );
  }

  const payload: Record<string, FieldValue> = { [definition.keyField]: key };

  for (const mapping of definition.fields) {
    payload[mapping.field] = readField(mapping, raw, key);
  }

  for (const reference of definition.references) {
    const value = readIdentifier(raw[reference.source]);

    if (value === undefined) {
      if (reference.optional === true) {
        payload[reference.field] = null;
        continue;
      }
      throw new FieldValidationError(
        `${reference.source}: Reference value is missing`,
        reference.field,
        key
      );
    }

    const table: LookupTable | undefined = lookups[reference.target];
    const resolved = table?.get(toMatchKey(value));
    if (resolved === undefined) {
      throw new UnresolvedReferenceError(
        reference.field,
        value,
        reference.target
      );
    }

    payload[reference.field] = resolved.key;
  }

  const violation = definition.check?.(payload);
  if (violation !== undefined) {
    throw new FieldValidationError(violation, undefined, key);
  }

  return {
    type: definition.type,
    key,
    matchKey: toMatchKey(key),
    payload,
  };
}

// ============================================================================
// Batch
// ============================================================================

/**
 * Map every record of a pass. Duplicate keys after the first occurrence are
 * reported as failures.
 */
export function mapRecords(
  definition: EntityDefinition,
  records: Iterable<IndexedRecord>,
  lookups: LookupTables
): MapResult {
  const entities: CanonicalEntity[] = [];
  const failures: MappingFailure[] = [];
  const seen = new Set<string>();

  for (const { index, record } of records) {
    const rawKey = readIdentifier(record[definition.keySource]);

    try {
      const entity = mapRecord(definition, record, lookups);

      if (seen.has(entity.matchKey)) {
        throw new FieldValidationError(
          `Duplicate ${definition.keyField} '${entity.key}'`,
          definition.keyField,
          entity.key
        );
      }

      seen.add(entity.matchKey);
      entities.push(entity);
    } catch (error) {
      if (
        !(error instanceof FieldValidationError) &&
        !(error instanceof UnresolvedReferenceError)
      ) {
        throw error;
      }

      mapperLogger.warn(
        {
          entityType: definition.type,
          index,
          key: rawKey,
          kind: error.code,
        },
        `Excluding ${definition.label.toLowerCase()}: ${error.message}`
      );
      failures.push({
        entityType: definition.type,
        index,
        key: rawKey,
        error,
      });
    }
  }

  mapperLogger.debug(
    {
      entityType: definition.type,
      mapped: entities.length,
      failed: failures.length,
    },
    "Mapped records"
  );

  return { entities, failures };
}

/**
 * Index canonical entities by match key, for the passes that reference them
 */
export function buildLookupTable(
  entities: readonly CanonicalEntity[]
): LookupTable {
  return new Map(entities.map((entity) => [entity.matchKey, entity]));
}
