/**
 * OnshapeClient - signed JSON requests against the Onshape REST API.
 * Every failure surfaces as a TransportError carrying the HTTP status.
 */

import { TransportError, describeError } from "@cadsync/core";
import {
  buildQueryString,
  formatHttpDate,
  generateNonce,
  signedHeaders,
  type OnshapeCredentials,
} from "./auth.js";

export const DEFAULT_API_VERSION = "v10";
const DEFAULT_TIMEOUT_MS = 30_000;
const JSON_CONTENT_TYPE = "application/json";

/**
 * The part of a fetch Response the client reads.
 */
export interface FetchResponse {
  status: number;
  text(): Promise<string>;
}

export interface FetchInit {
  method: string;
  headers: { [header: string]: string };
  body?: string;
  signal?: AbortSignal;
}

export type FetchFn = (url: string, init: FetchInit) => Promise<FetchResponse>;

export interface OnshapeClientOptions {
  credentials: OnshapeCredentials;
  apiVersion?: string;
  /** Defaults to the global fetch */
  fetch?: FetchFn;
  nonce?: () => string;
  now?: () => Date;
  timeoutMs?: number;
}

export class OnshapeClient {
  readonly apiVersion: string;
  private readonly credentials: OnshapeCredentials;
  private readonly fetchFn: FetchFn;
  private readonly nonce: () => string;
  private readonly now: () => Date;
  private readonly timeoutMs: number;

  constructor(options: OnshapeClientOptions) {
    this.credentials = options.credentials;
    this.apiVersion = options.apiVersion ?? DEFAULT_API_VERSION;
    this.fetchFn = options.fetch ?? fetch;
    this.nonce = options.nonce ?? generateNonce;
    this.now = options.now ?? (() => new Date());
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  get baseUrl(): string {
    return this.credentials.baseUrl;
  }

  /**
   * GET an API path relative to `/api/<version>`.
   */
  async get(path: string, query?: { [key: string]: string }): Promise<unknown> {
    return this.request("GET", this.apiPath(path), query);
  }

  /**
   * POST a JSON body to an API path relative to `/api/<version>`.
   */
  async post(path: string, body: unknown): Promise<unknown> {
    return this.request("POST", this.apiPath(path), undefined, body);
  }

  /**
   * GET an absolute URL returned by the API, such as a `next` page link.
   */
  async getUrl(url: string): Promise<unknown> {
    const parsed = new URL(url, this.credentials.baseUrl);
    const query: { [key: string]: string } = {};
    parsed.searchParams.forEach((value, key) => {
      query[key] = value;
    });
    return this.request("GET", parsed.pathname, query);
  }

  private apiPath(path: string): string {
    return `/api/${this.apiVersion}${path.startsWith("/") ? path : `/${path}`}`;
  }

  private async request(
    method: "GET" | "POST",
    path: string,
    query?: { [key: string]: string },
    body?: unknown
  ): Promise<unknown> {
    const queryString = buildQueryString(query);
    const headers = signedHeaders(this.credentials, {
      method,
      path,
      query: queryString,
      nonce: this.nonce(),
      date: formatHttpDate(this.now()),
      contentType: JSON_CONTENT_TYPE,
    });
    const url = `${this.credentials.baseUrl}${path}${queryString ? `?${queryString}` : ""}`;

    let status: number;
    let text: string;
    try {
      const response = await this.fetchFn(url, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      status = response.status;
      text = await response.text();
    } catch (error) {
      throw new TransportError(`Request failed: ${describeError(error)}`, undefined, error);
    }

    if (status >= 400) {
      throw new TransportError(`API error ${status}: ${text.slice(0, 500)}`, status);
    }
    if (text.trim() === "") {
      return {};
    }
    try {
      return JSON.parse(text);
    } catch (error) {
      throw new TransportError(`Invalid JSON in response to ${method} ${path}`, status, error);
    }
  }
}
