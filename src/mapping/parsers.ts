/**
 * Field translations applied while mapping extract records.
 *
 * Every parser receives a trimmed, non-blank value and either returns the
 * canonical value or throws a ParseError. `withDefault` turns a parser into
 * one that falls back to a fixed value instead of throwing.
 */

import { mapperLogger } from "../logger.js";

import type { FieldValue, Translation } from "../types/index.js";

export class ParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ParseError";
  }
}

// ============================================================================
// Booleans
// ============================================================================

const TRUE_VALUES = new Set(["yes", "y", "true", "t", "1"]);
const FALSE_VALUES = new Set(["no", "n", "false", "f", "0"]);

export function parseBoolean(value: string | number | boolean): boolean {
  if (typeof value === "boolean") {
    return value;
  }

  const normalized = String(value).trim().toLowerCase();

  if (TRUE_VALUES.has(normalized)) {
    return true;
  }
  if (FALSE_VALUES.has(normalized)) {
    return false;
  }

  throw new ParseError(`Unknown true/false value: ${String(value)}`);
}

/**
 * Boarding status: "B" (boarder) or "D" (day student)
 */
export function parseBoarderDay(value: string | number | boolean): boolean {
  const normalized = String(value).trim().toUpperCase();

  if (normalized === "B") {
    return true;
  }
  if (normalized === "D") {
    return false;
  }

  throw new ParseError(`Unknown boarder/day value: ${String(value)}`);
}

// ============================================================================
// E-mail
// ============================================================================

// dot-atom or quoted-string local part
const EMAIL_USER_PATTERN =
  /^(?:[-!#$%&'*+/=?^_`{}|~0-9A-Z]+(?:\.[-!#$%&'*+/=?^_`{}|~0-9A-Z]+)*|"(?:[\x01-\x08\x0b\x0c\x0e-\x1f!#-\[\]-\x7f]|\\[\x01-\x09\x0b\x0c\x0e-\x7f])*")$/i;

// labels of at most 63 characters, TLD of 2-63 not ending in a hyphen
const EMAIL_DOMAIN_PATTERN =
  /^(?:[A-Z0-9](?:[A-Z0-9-]{0,61}[A-Z0-9])?\.)+[A-Z0-9-]{1,62}[A-Z0-9]$/i;

export function parseEmail(value: string | number | boolean): string {
  const email = String(value).trim();

  const at = email.lastIndexOf("@");
  if (at === -1) {
    throw new ParseError('Email must have at least an "@"');
  }

  const user = email.slice(0, at);
  const domain = email.slice(at + 1);

  if (!EMAIL_USER_PATTERN.test(user)) {
    throw new ParseError("User part of email was not valid");
  }
  if (!EMAIL_DOMAIN_PATTERN.test(domain)) {
    throw new ParseError("Domain part of email was not valid");
  }

  return email;
}

// ============================================================================
// Dates
// ============================================================================

const US_DATE_PATTERN = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;
const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})(?:[T ].*)?$/;

function formatDate(year: number, month: number, day: number): string {
  const date = new Date(Date.UTC(year, month - 1, day));

  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    throw new ParseError(
      `Not a calendar date: ${String(year)}-${String(month)}-${String(day)}`
    );
  }

  return date.toISOString().slice(0, 10);
}

/**
 * Normalize "MM/DD/YYYY", "YYYY-MM-DD" and ISO timestamps to "YYYY-MM-DD"
 */
export function parseDate(value: string | number | boolean): string {
  const text = String(value).trim();

  const us = US_DATE_PATTERN.exec(text);
  if (us !== null) {
    return formatDate(Number(us[3]), Number(us[1]), Number(us[2]));
  }

  const iso = ISO_DATE_PATTERN.exec(text);
  if (iso !== null) {
    return formatDate(Number(iso[1]), Number(iso[2]), Number(iso[3]));
  }

  throw new ParseError(`Unrecognized date: ${text}`);
}

// ============================================================================
// Text
// ============================================================================

export function lowerCase(value: string | number | boolean): string {
  return String(value).trim().toLowerCase();
}

// ============================================================================
// Combinators
// ============================================================================

/**
 * Use `fallback` whenever the parser rejects the value
 */
export function withDefault(
  parser: Translation,
  fallback: FieldValue
): Translation {
  return (value) => {
    try {
      return parser(value);
    } catch (error) {
      if (error instanceof ParseError) {
        mapperLogger.warn(
          { value, fallback, reason: error.message },
          "Using fallback for an unparseable value"
        );
        return fallback;
      }
      throw error;
    }
  };
}

/** School e-mail that syncs as blank when it does not validate */
export const emailOrBlank: Translation = withDefault(parseEmail, "");
