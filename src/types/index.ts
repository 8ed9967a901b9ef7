// Core types for extract records, canonical entities and entity definitions

// =====================
// Entity Types
// =====================

/**
 * Entity types in declaration order. The pass order is computed from
 * references (see sync/graph.ts), not from this list.
 */
export const ENTITY_TYPES = [
  "families",
  "teachers",
  "students",
  "courses",
  "sections",
  "registrations",
  "enrollments",
  "discipline",
] as const;

export type EntityType = (typeof ENTITY_TYPES)[number];

export function isEntityType(value: string): value is EntityType {
  return ENTITY_TYPES.some((type) => type === value);
}

// =====================
// Values and Records
// =====================

export type FieldValue = string | number | boolean | null;

/** Body sent to (and compared against) the remote API */
export type Payload = Readonly<Record<string, FieldValue>>;

/** One element of an extract file, after shape validation */
export type RawRecord = Readonly<Record<string, unknown>>;

/**
 * Primitive type of a source column.
 * `id` accepts a non-blank string or an integer, since converted exports
 * are inconsistent about quoting identifiers.
 */
export type PrimitiveType = "string" | "number" | "boolean" | "id";

export interface SourceField {
  name: string;
  type: PrimitiveType;
  required: boolean;
}

/**
 * Shape of one extract file, as needed by the record loader
 */
export interface RecordDescriptor {
  entityType: EntityType;
  keySource: string;
  fields: readonly SourceField[];
}

// =====================
// Canonical Entities
// =====================

export interface CanonicalEntity {
  type: EntityType;
  /** Trimmed natural key, as sent to the remote API */
  key: string;
  /** Key used for lookups and remote matching (trimmed, upper-cased) */
  matchKey: string;
  payload: Payload;
}

export type LookupTable = ReadonlyMap<string, CanonicalEntity>;

/**
 * Lookup tables built by earlier passes, keyed by match key.
 * A fresh object is produced after every pass; nothing mutates a published table.
 */
export type LookupTables = Readonly<Partial<Record<EntityType, LookupTable>>>;

// =====================
// Entity Definitions
// =====================

/** Converts a trimmed, non-blank source value; throws ParseError on bad input */
export type Translation = (value: string | number | boolean) => FieldValue;

export interface FieldMapping {
  /** Canonical (remote) field name */
  field: string;
  /** Column name in the extract */
  source: string;
  /** Defaults to "string" */
  type?: PrimitiveType;
  required?: boolean;
  translate?: Translation;
  /** Value of a blank cell; "" for strings and null otherwise when omitted */
  blank?: FieldValue;
}

export interface ReferenceMapping {
  field: string;
  source: string;
  target: EntityType;
  /** A blank optional reference maps to null instead of failing */
  optional?: boolean;
}

/**
 * hard: DELETE the remote record
 * inactive: PATCH the inactive marker onto it
 * never: leave it in place
 */
export type DeletePolicy = "hard" | "inactive" | "never";

export const DELETE_POLICIES: readonly DeletePolicy[] = [
  "hard",
  "inactive",
  "never",
];

export interface InactiveMarker {
  field: string;
  value: FieldValue;
}

export interface EntityDefinition {
  type: EntityType;
  /** Singular human label, e.g. "Student" */
  label: string;
  /** Endpoint name in the remote API root listing */
  endpoint: string;
  keyField: string;
  keySource: string;
  fields: readonly FieldMapping[];
  references: readonly ReferenceMapping[];
  /** Remote-only records may be removed (hard-delete by default) */
  deletable: boolean;
  inactive?: InactiveMarker;
  /** Fields compared to detect a change; defaults to every payload field */
  compareFields?: readonly string[];
  /** Record-level rule run after mapping; returns a message when violated */
  check?: (payload: Payload) => string | undefined;
  /** File name inside the extract directory */
  defaultFile: string;
}
