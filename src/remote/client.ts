/**
 * Remote Client - HTTP implementation of the remote store
 *
 * The API root lists one URL per endpoint; list URLs are paginated with
 * `page_size` and `next` links, and every record carries its own `url`,
 * which is where updates and deletes go.
 */

import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import {
  errorMessage,
  RemotePermanentError,
  RemoteTransientError,
} from "../errors.js";
import { remoteLogger } from "../logger.js";

import type { Payload } from "../types/index.js";
import type { RemoteAuth, RemoteRecord, RemoteStore } from "../types/remote.js";

// ============================================================================
// Response Schemas
// ============================================================================

const RecordSchema = Type.Record(Type.String(), Type.Unknown());

const RecordListSchema = Type.Array(RecordSchema);

const PageSchema = Type.Object({
  count: Type.Optional(Type.Number()),
  next: Type.Union([Type.String(), Type.Null()]),
  previous: Type.Optional(Type.Union([Type.String(), Type.Null()])),
  results: RecordListSchema,
});

const EndpointMapSchema = Type.Record(Type.String(), Type.String());

type EndpointMap = Record<string, string>;

// ============================================================================
// Options
// ============================================================================

export interface HttpRemoteStoreOptions {
  apiRoot: string;
  auth?: RemoteAuth;
  pageSize?: number;
  requestTimeoutMs?: number;
  fetchFn?: typeof fetch;
}

const DEFAULT_PAGE_SIZE = 5000;
const DEFAULT_TIMEOUT_MS = 30_000;

/**
 * Statuses worth retrying: request timeout, rate limiting, server errors
 */
export function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

/**
 * Field-level error body as one line, e.g. `email: Enter a valid email address.`
 */
export function formatErrorDetails(details: Record<string, unknown>): string {
  return Object.entries(details)
    .map(([field, value]) => {
      if (Array.isArray(value)) {
        return `${field}: ${value.map((item) => (typeof item === "string" ? item : JSON.stringify(item))).join(" ")}`;
      }
      if (typeof value === "string") {
        return `${field}: ${value}`;
      }
      return `${field}: ${JSON.stringify(value)}`;
    })
    .join("; ");
}

function parseJson(text: string): unknown {
  if (text.trim() === "") {
    return undefined;
  }
  try {
    const data: unknown = JSON.parse(text);
    return data;
  } catch {
    return undefined;
  }
}

// ============================================================================
// HTTP Remote Store
// ============================================================================

export class HttpRemoteStore implements RemoteStore {
  private readonly apiRoot: string;
  private readonly auth?: RemoteAuth;
  private readonly pageSize: number;
  private readonly requestTimeoutMs: number;
  private readonly fetchFn: typeof fetch;
  private endpoints?: Promise<EndpointMap>;

  constructor(options: HttpRemoteStoreOptions) {
    this.apiRoot = options.apiRoot;
    this.auth = options.auth;
    this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchFn = options.fetchFn ?? fetch;
  }

  // ==========================================================================
  // Remote Store
  // ==========================================================================

  async list(endpoint: string): Promise<RemoteRecord[]> {
    const listUrl = await this.resolveEndpoint(endpoint);
    const first = new URL(listUrl);
    first.searchParams.set("page_size", String(this.pageSize));

    const records: RemoteRecord[] = [];
    let next: string | null = first.toString();
    let pages = 0;

    while (next !== null) {
      const data = await this.request("GET", next);
      pages++;

      // Unpaginated endpoints return a bare list
      if (Value.Check(RecordListSchema, data)) {
        records.push(...data.map((fields) => this.toRemoteRecord(fields, endpoint)));
        break;
      }

      if (!Value.Check(PageSchema, data)) {
        throw new RemotePermanentError(
          `${next} did not return a page of records`
        );
      }

      records.push(
        ...data.results.map((fields) => this.toRemoteRecord(fields, endpoint))
      );
      next = data.next;
    }

    remoteLogger.debug(
      { endpoint, records: records.length, pages },
      "Listed remote records"
    );

    return records;
  }

  async create(endpoint: string, payload: Payload): Promise<RemoteRecord> {
    const listUrl = await this.resolveEndpoint(endpoint);
    const data = await this.request("POST", listUrl, payload);
    return this.readWritten(data, endpoint, "POST", listUrl);
  }

  async update(
    endpoint: string,
    target: RemoteRecord,
    payload: Payload
  ): Promise<RemoteRecord> {
    const data = await this.request("PUT", target.locator, payload);
    return this.readWritten(data, endpoint, "PUT", target.locator);
  }

  async patch(
    endpoint: string,
    target: RemoteRecord,
    changes: Payload
  ): Promise<RemoteRecord> {
    const data = await this.request("PATCH", target.locator, changes);
    return this.readWritten(data, endpoint, "PATCH", target.locator);
  }

  async remove(endpoint: string, target: RemoteRecord): Promise<void> {
    await this.request("DELETE", target.locator);
    remoteLogger.debug({ endpoint, url: target.locator }, "Deleted remote record");
  }

  // ==========================================================================
  // Endpoint Discovery
  // ==========================================================================

  /**
   * List URL of an endpoint, from the API root (fetched once per client)
   */
  async resolveEndpoint(endpoint: string): Promise<string> {
    if (this.endpoints === undefined) {
      this.endpoints = this.discover().catch((error: unknown) => {
        // allow the next call to try again
        this.endpoints = undefined;
        throw error;
      });
    }

    const endpoints = await this.endpoints;
    const url = endpoints[endpoint];
    if (url === undefined) {
      throw new RemotePermanentError(
        `API root ${this.apiRoot} does not list endpoint ${endpoint}`
      );
    }
    return url;
  }

  private async discover(): Promise<EndpointMap> {
    remoteLogger.info({ apiRoot: this.apiRoot }, "Discovering API endpoints");

    const data = await this.request("GET", this.apiRoot);
    if (!Value.Check(EndpointMapSchema, data)) {
      throw new RemotePermanentError(
        `API root ${this.apiRoot} did not return an endpoint map`
      );
    }

    remoteLogger.debug(
      { endpoints: Object.keys(data) },
      "Discovered API endpoints"
    );
    return data;
  }

  // ==========================================================================
  // HTTP
  // ==========================================================================

  private authorization(): string | undefined {
    if (this.auth === undefined) {
      return undefined;
    }
    if (this.auth.kind === "token") {
      return `Token ${this.auth.token}`;
    }
    const credentials = Buffer.from(
      `${this.auth.username}:${this.auth.password}`
    ).toString("base64");
    return `Basic ${credentials}`;
  }

  private async request(
    method: string,
    url: string,
    body?: Payload
  ): Promise<unknown> {
    const headers: Record<string, string> = { Accept: "application/json" };
    const authorization = this.authorization();
    if (authorization !== undefined) {
      headers.Authorization = authorization;
    }
    if (body !== undefined) {
      headers["Content-Type"] = "application/json";
    }

    remoteLogger.debug({ method, url }, "Sending request");
    const startTime = performance.now();

    let response: Response;
    let text: string;
    try {
      response = await this.fetchFn(url, {
        method,
        headers,
        body: body !== undefined ? JSON.stringify(body) : undefined,
        signal: AbortSignal.timeout(this.requestTimeoutMs),
      });
      // the body arrives under the same timeout as the headers
      text = await response.text();
    } catch (error) {
      throw this.toTransportError(method, url, error);
    }

    const duration = Math.round(performance.now() - startTime);
    remoteLogger.debug(
      {
        method,
        url,
        status: response.status,
        duration: `${String(duration)}ms`,
      },
      "Received response"
    );

    if (!response.ok) {
      throw this.toError(method, url, response, text);
    }

    return parseJson(text);
  }

  /**
   * A request that never completed, while sending or while reading the body
   */
  private toTransportError(
    method: string,
    url: string,
    error: unknown
  ): RemoteTransientError {
    if (
      error instanceof Error &&
      (error.name === "TimeoutError" || error.name === "AbortError")
    ) {
      return new RemoteTransientError(
        `${method} ${url} timed out after ${String(this.requestTimeoutMs)}ms`
      );
    }
    return new RemoteTransientError(
      `${method} ${url} failed: ${errorMessage(error)}`
    );
  }

  private toError(
    method: string,
    url: string,
    response: Response,
    text: string
  ): RemoteTransientError | RemotePermanentError {
    const status = response.status;
    const summary = `${method} ${url} failed with ${String(status)} ${response.statusText}`.trimEnd();

    if (isTransientStatus(status)) {
      return new RemoteTransientError(summary, status);
    }

    const data = parseJson(text);
    if (Value.Check(RecordSchema, data)) {
      return new RemotePermanentError(
        `${summary}: ${formatErrorDetails(data)}`,
        status,
        data
      );
    }
    return new RemotePermanentError(summary, status);
  }

  // ==========================================================================
  // Records
  // ==========================================================================

  private toRemoteRecord(
    fields: Record<string, unknown>,
    endpoint: string
  ): RemoteRecord {
    const locator = fields.url;
    if (typeof locator !== "string" || locator === "") {
      throw new RemotePermanentError(
        `Record from ${endpoint} has no url`
      );
    }
    return { locator, fields };
  }

  private readWritten(
    data: unknown,
    endpoint: string,
    method: string,
    url: string
  ): RemoteRecord {
    if (!Value.Check(RecordSchema, data)) {
      throw new RemotePermanentError(
        `${method} ${url} did not return the written record`
      );
    }
    return this.toRemoteRecord(data, endpoint);
  }
}
