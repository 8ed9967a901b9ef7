/**
 * Record Loader - Read one extract file into validated raw records
 *
 * The top-level structure is checked eagerly, so a malformed file fails
 * before any record is handed out. Individual records are validated lazily
 * while iterating: a bad record is reported and skipped, the rest of the
 * file still loads.
 */

import { readFile } from "node:fs/promises";
import { extname } from "node:path";

import {
  Type,
  type TBoolean,
  type TInteger,
  type TNumber,
  type TObject,
  type TSchema,
  type TString,
  type TUnion,
} from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { parse as parseCsv } from "csv-parse/sync";

import {
  errorMessage,
  FieldValidationError,
  MalformedInputError,
} from "../errors.js";
import { loaderLogger } from "../logger.js";

import type {
  EntityType,
  PrimitiveType,
  RawRecord,
  RecordDescriptor,
} from "../types/index.js";

// ============================================================================
// Types
// ============================================================================

export type RecordFormat = "json" | "csv";

export type LoadedRecord =
  | { ok: true; index: number; record: RawRecord }
  | {
      ok: false;
      index: number;
      key?: string;
      error: FieldValidationError;
    };

/**
 * An opened extract file. `records()` may be iterated more than once;
 * each iteration validates (and warns) again.
 */
export interface RecordSource {
  entityType: EntityType;
  origin: string;
  count: number;
  records(): Generator<LoadedRecord>;
}

// ============================================================================
// Schemas
// ============================================================================

const NON_BLANK = "\\S";

function requiredSchema(type: PrimitiveType): TSchema {
  switch (type) {
    case "string":
      return Type.String({ pattern: NON_BLANK });
    case "number":
      return Type.Number();
    case "boolean":
      return Type.Boolean();
    case "id":
      return Type.Union([Type.String({ pattern: NON_BLANK }), Type.Integer()]);
  }
}

function optionalSchema(
  type: PrimitiveType
): TString | TNumber | TBoolean | TUnion<[TString, TInteger]> {
  switch (type) {
    case "string":
      return Type.String();
    case "number":
      return Type.Number();
    case "boolean":
      return Type.Boolean();
    case "id":
      return Type.Union([Type.String(), Type.Integer()]);
  }
}

/**
 * Build the TypeBox schema of one record from its descriptor.
 * Columns the descriptor does not mention are allowed and ignored.
 */
export function buildRecordSchema(descriptor: RecordDescriptor): TObject {
  const properties: Record<string, TSchema> = {};

  for (const field of descriptor.fields) {
    properties[field.name] = field.required
      ? requiredSchema(field.type)
      : Type.Optional(Type.Union([optionalSchema(field.type), Type.Null()]));
  }

  return Type.Object(properties, { additionalProperties: true });
}

// ============================================================================
// Record Sources
// ============================================================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Best-effort key of an element that failed validation, for reporting
 */
function recoverKey(element: unknown, keySource: string): string | undefined {
  if (!isPlainObject(element)) {
    return undefined;
  }
  const value = element[keySource];
  if (typeof value === "string" && value.trim() !== "") {
    return value.trim();
  }
  if (typeof value === "number") {
    return String(value);
  }
  return undefined;
}

/**
 * CSV cells are always text: blank optional cells are dropped and the rest
 * converted to the declared primitive types before validation.
 */
function coerceCsvRow(schema: TObject, row: Record<string, unknown>): unknown {
  const cleaned: Record<string, unknown> = {};
  for (const [column, value] of Object.entries(row)) {
    if (value !== "") {
      cleaned[column] = value;
    }
  }
  return Value.Convert(schema, cleaned);
}

/**
 * Only required fields reject a record. An optional value of the wrong type
 * is converted where its text allows ("3" for a number) and nulled otherwise.
 */
function repairOptionalFields(
  descriptor: RecordDescriptor,
  element: Record<string, unknown>,
  index: number
): Record<string, unknown> {
  const repaired = { ...element };

  for (const field of descriptor.fields) {
    const value = repaired[field.name];
    if (field.required || value === undefined || value === null) continue;

    const fieldSchema = optionalSchema(field.type);
    if (Value.Check(fieldSchema, value)) continue;

    if (typeof value === "string" && value.trim() === "") {
      repaired[field.name] = null;
      continue;
    }

    const converted = Value.Convert(fieldSchema, value);
    if (Value.Check(fieldSchema, converted)) {
      repaired[field.name] = converted;
      continue;
    }

    loaderLogger.warn(
      {
        entityType: descriptor.entityType,
        index,
        field: field.name,
        value,
      },
      `Ignoring ${field.name}: expected ${field.type}`
    );
    repaired[field.name] = null;
  }

  return repaired;
}

function validateElement(
  descriptor: RecordDescriptor,
  schema: TObject,
  raw: unknown,
  index: number
): LoadedRecord {
  if (!isPlainObject(raw)) {
    return {
      ok: false,
      index,
      error: new FieldValidationError(
        `Record ${String(index)} is not an object`
      ),
    };
  }

  const element = repairOptionalFields(descriptor, raw, index);
  if (Value.Check(schema, element)) {
    return { ok: true, index, record: element };
  }

  const key = recoverKey(element, descriptor.keySource);
  const first = Value.Errors(schema, element).First();
  const field =
    first !== undefined ? first.path.replace(/^\//, "") : undefined;
  const reason = first?.message ?? "Invalid record";
  const message =
    field !== undefined && field !== ""
      ? `${field}: ${reason}`
      : reason;

  return {
    ok: false,
    index,
    key,
    error: new FieldValidationError(message, field, key),
  };
}

/**
 * Wrap already-parsed elements as a record source
 */
export function createRecordSource(
  descriptor: RecordDescriptor,
  elements: readonly unknown[],
  origin: string,
  format: RecordFormat = "json"
): RecordSource {
  const schema = buildRecordSchema(descriptor);

  return {
    entityType: descriptor.entityType,
    origin,
    count: elements.length,
    *records(): Generator<LoadedRecord> {
      for (const [index, raw] of elements.entries()) {
        const element =
          format === "csv" && isPlainObject(raw)
            ? coerceCsvRow(schema, raw)
            : raw;
        const loaded = validateElement(descriptor, schema, element, index);

        if (!loaded.ok) {
          loaderLogger.warn(
            {
              entityType: descriptor.entityType,
              origin,
              index,
              key: loaded.key,
              field: loaded.error.field,
            },
            `Skipping invalid record: ${loaded.error.message}`
          );
        }

        yield loaded;
      }
    },
  };
}

// ============================================================================
// Parsing
// ============================================================================

export function detectFormat(path: string): RecordFormat {
  return extname(path).toLowerCase() === ".csv" ? "csv" : "json";
}

function parseJsonElements(text: string, origin: string): unknown[] {
  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (error) {
    throw new MalformedInputError(
      `${origin} is not valid JSON: ${errorMessage(error)}`,
      origin
    );
  }

  if (Array.isArray(document)) {
    return document;
  }

  if (isPlainObject(document) && Array.isArray(document.records)) {
    return document.records;
  }

  throw new MalformedInputError(
    `${origin} must contain an array of records or an object with a "records" array`,
    origin
  );
}

function parseCsvElements(text: string, origin: string): unknown[] {
  try {
    const rows: unknown[] = parseCsv(text, {
      columns: true,
      skip_empty_lines: true,
      trim: true,
      bom: true,
    });
    return rows;
  } catch (error) {
    throw new MalformedInputError(
      `${origin} is not valid CSV: ${errorMessage(error)}`,
      origin
    );
  }
}

/**
 * Parse the text of an extract file
 */
export function parseRecordText(
  descriptor: RecordDescriptor,
  text: string,
  format: RecordFormat,
  origin: string
): RecordSource {
  const elements =
    format === "csv"
      ? parseCsvElements(text, origin)
      : parseJsonElements(text, origin);

  loaderLogger.debug(
    { entityType: descriptor.entityType, origin, count: elements.length },
    "Parsed extract file"
  );

  return createRecordSource(descriptor, elements, origin, format);
}

/**
 * Open an extract file from disk
 * @throws MalformedInputError when the file is missing, unreadable or has the wrong top-level shape
 */
export async function openRecordFile(
  descriptor: RecordDescriptor,
  path: string
): Promise<RecordSource> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (error) {
    throw new MalformedInputError(
      `Cannot read ${path}: ${errorMessage(error)}`,
      path
    );
  }

  return parseRecordText(descriptor, text, detectFormat(path), path);
}
