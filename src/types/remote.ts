import type { Payload } from "./index.js";

// =====================
// Remote Records
// =====================

/**
 * A record as returned by the remote system of record.
 * `locator` addresses the record for update/delete (its URL over HTTP).
 */
export interface RemoteRecord {
  locator: string;
  fields: Readonly<Record<string, unknown>>;
}

// =====================
// Remote Store Capability
// =====================

/**
 * Everything the sync engine needs from the remote system.
 *
 * Implementations report failures as RemoteTransientError (retryable) or
 * RemotePermanentError (not retryable).
 */
export interface RemoteStore {
  /** Bulk read of every record behind an endpoint */
  list(endpoint: string): Promise<RemoteRecord[]>;
  create(endpoint: string, payload: Payload): Promise<RemoteRecord>;
  /** Full replacement of the record's writable fields */
  update(
    endpoint: string,
    target: RemoteRecord,
    payload: Payload
  ): Promise<RemoteRecord>;
  /** Partial update, used to mark records inactive */
  patch(
    endpoint: string,
    target: RemoteRecord,
    changes: Payload
  ): Promise<RemoteRecord>;
  remove(endpoint: string, target: RemoteRecord): Promise<void>;
}

// =====================
// Authentication
// =====================

export type RemoteAuth =
  | { kind: "token"; token: string }
  | { kind: "basic"; username: string; password: string };
