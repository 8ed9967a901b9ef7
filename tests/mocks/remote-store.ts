/**
 * In-memory Remote Store
 *
 * Keeps records per endpoint, records every call (including retried
 * attempts) and lets tests inject failures or delays for matching calls.
 */

import { RemotePermanentError } from "../../src/errors.js";

import type { Payload } from "../../src/types/index.js";
import type { RemoteRecord, RemoteStore } from "../../src/types/remote.js";

export type RemoteMethod = "list" | "create" | "update" | "patch" | "remove";

export interface RemoteCall {
  method: RemoteMethod;
  endpoint: string;
  locator?: string;
  /** Body of create/update/patch */
  payload?: Payload;
  /** Fields of the targeted record, for update/patch/remove */
  target?: Readonly<Record<string, unknown>>;
}

interface CallRule {
  matches: (call: RemoteCall) => boolean;
  remaining: number;
  error?: () => Error;
  delayMs?: number;
}

export class InMemoryRemoteStore implements RemoteStore {
  readonly calls: RemoteCall[] = [];
  private readonly tables = new Map<string, Map<string, Record<string, unknown>>>();
  private readonly rules: CallRule[] = [];
  private nextId = 1;

  // ==========================================================================
  // Test Helpers
  // ==========================================================================

  /**
   * Put records in place before a run; each gets a `url`
   */
  seed(endpoint: string, records: readonly Record<string, unknown>[]): void {
    const table = this.table(endpoint);
    for (const record of records) {
      const url = this.newLocator(endpoint);
      table.set(url, { ...record, url });
    }
  }

  /** Current records behind an endpoint */
  records(endpoint: string): Record<string, unknown>[] {
    return [...this.table(endpoint).values()];
  }

  /** Every call except bulk reads */
  writes(): RemoteCall[] {
    return this.calls.filter((call) => call.method !== "list");
  }

  /**
   * Fail the next `times` matching calls with `error()`
   */
  failOn(
    matches: (call: RemoteCall) => boolean,
    error: () => Error,
    times = Number.POSITIVE_INFINITY
  ): void {
    this.rules.push({ matches, remaining: times, error });
  }

  /**
   * Hold the next `times` matching calls for `delayMs` before they proceed
   */
  delayOn(
    matches: (call: RemoteCall) => boolean,
    delayMs: number,
    times = Number.POSITIVE_INFINITY
  ): void {
    this.rules.push({ matches, remaining: times, delayMs });
  }

  // ==========================================================================
  // Remote Store
  // ==========================================================================

  async list(endpoint: string): Promise<RemoteRecord[]> {
    await this.intercept({ method: "list", endpoint });
    return this.records(endpoint).map((fields) => ({
      locator: String(fields.url),
      fields: { ...fields },
    }));
  }

  async create(endpoint: string, payload: Payload): Promise<RemoteRecord> {
    await this.intercept({ method: "create", endpoint, payload });
    const url = this.newLocator(endpoint);
    const fields = { ...payload, url };
    this.table(endpoint).set(url, fields);
    return { locator: url, fields: { ...fields } };
  }

  async update(
    endpoint: string,
    target: RemoteRecord,
    payload: Payload
  ): Promise<RemoteRecord> {
    await this.intercept({
      method: "update",
      endpoint,
      locator: target.locator,
      payload,
      target: target.fields,
    });
    this.existing(endpoint, target.locator);
    const fields = { ...payload, url: target.locator };
    this.table(endpoint).set(target.locator, fields);
    return { locator: target.locator, fields: { ...fields } };
  }

  async patch(
    endpoint: string,
    target: RemoteRecord,
    changes: Payload
  ): Promise<RemoteRecord> {
    await this.intercept({
      method: "patch",
      endpoint,
      locator: target.locator,
      payload: changes,
      target: target.fields,
    });
    const fields = { ...this.existing(endpoint, target.locator), ...changes };
    this.table(endpoint).set(target.locator, fields);
    return { locator: target.locator, fields: { ...fields } };
  }

  async remove(endpoint: string, target: RemoteRecord): Promise<void> {
    await this.intercept({
      method: "remove",
      endpoint,
      locator: target.locator,
      target: target.fields,
    });
    this.existing(endpoint, target.locator);
    this.table(endpoint).delete(target.locator);
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private table(endpoint: string): Map<string, Record<string, unknown>> {
    let table = this.tables.get(endpoint);
    if (table === undefined) {
      table = new Map();
      this.tables.set(endpoint, table);
    }
    return table;
  }

  private newLocator(endpoint: string): string {
    const id = this.nextId++;
    return `memory://${endpoint}/${String(id)}/`;
  }

  private existing(endpoint: string, locator: string): Record<string, unknown> {
    const fields = this.table(endpoint).get(locator);
    if (fields === undefined) {
      throw new RemotePermanentError(`${locator} not found`, 404);
    }
    return fields;
  }

  private async intercept(call: RemoteCall): Promise<void> {
    this.calls.push(call);

    for (const rule of this.rules) {
      if (rule.remaining <= 0 || !rule.matches(call)) continue;
      rule.remaining--;

      if (rule.delayMs !== undefined) {
        await new Promise((resolve) => setTimeout(resolve, rule.delayMs));
      }
      if (rule.error !== undefined) {
        throw rule.error();
      }
    }
  }
}
