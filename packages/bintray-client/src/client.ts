import { fetch, Headers, type BodyInit, type Dispatcher, type Response } from "undici";

import { defaultStatusMessage, unexpectedStatus } from "./errors.js";
import { createConsoleLogger, scopedLogger, type Logger, type ScopedLogger } from "./logger.js";
import { Subject } from "./subject.js";

export const DEFAULT_API_BASE_URL = "https://api.bintray.com/";
export const DEFAULT_DL_BASE_URL = "https://dl.bintray.com/";

export type HttpMethod = "GET" | "HEAD" | "POST" | "PUT" | "PATCH" | "DELETE";

export interface ClientOptions {
  apiBaseUrl?: string;
  dlBaseUrl?: string;
  username?: string;
  apiKey?: string;
  /** undici dispatcher used for every request; defaults to the global one. */
  dispatcher?: Dispatcher;
  logger?: Logger;
}

export interface RequestOptions {
  headers?: Record<string, string>;
  body?: BodyInit;
  signal?: AbortSignal;
}

function normalizeBase(value: string): URL {
  const url = new URL(value);
  if (!url.pathname.endsWith("/")) url.pathname = `${url.pathname}/`;
  return url;
}

function resolve(base: URL, path: string): URL {
  const encoded = path
    .replace(/^\/+/, "")
    .split("/")
    .map(segment => encodeURIComponent(segment))
    .join("/");
  return new URL(encoded, base);
}

export class BintrayClient {
  readonly logger: Logger;

  private readonly options: ClientOptions;
  private readonly apiBase: URL;
  private readonly dlBase: URL;
  private readonly log: ScopedLogger;

  constructor(options: ClientOptions = {}) {
    this.options = options;
    this.apiBase = normalizeBase(options.apiBaseUrl ?? DEFAULT_API_BASE_URL);
    this.dlBase = normalizeBase(options.dlBaseUrl ?? DEFAULT_DL_BASE_URL);
    if (this.apiBase.protocol !== this.dlBase.protocol) {
      throw new TypeError(
        `API and download base URLs must share a scheme (${this.apiBase.protocol} vs ${this.dlBase.protocol})`
      );
    }
    this.logger = options.logger ?? createConsoleLogger();
    this.log = scopedLogger(this.logger, "client");
  }

  get username(): string | undefined {
    return this.options.username;
  }

  /** Returns a client carrying credentials; this one stays as it is. */
  user(username: string, apiKey: string): BintrayClient {
    return new BintrayClient({ ...this.options, logger: this.logger, username, apiKey });
  }

  apiUrl(path: string): URL {
    return resolve(this.apiBase, path);
  }

  dlUrl(path: string): URL {
    return resolve(this.dlBase, path);
  }

  async request(method: HttpMethod, url: URL | string, init: RequestOptions = {}): Promise<Response> {
    const headers = new Headers(init.headers);
    if (!headers.has("accept")) headers.set("accept", "application/json");
    if (this.options.username !== undefined) {
      const credentials = `${this.options.username}:${this.options.apiKey ?? ""}`;
      headers.set("authorization", `Basic ${Buffer.from(credentials).toString("base64")}`);
    }

    this.log.debug(`${method} ${url.toString()}`);
    return fetch(url, {
      method,
      headers,
      body: init.body,
      signal: init.signal,
      dispatcher: this.options.dispatcher,
      duplex: init.body === undefined ? undefined : "half",
    });
  }

  head(url: URL | string, init?: RequestOptions): Promise<Response> {
    return this.request("HEAD", url, init);
  }

  get(url: URL | string, init?: RequestOptions): Promise<Response> {
    return this.request("GET", url, init);
  }

  post(url: URL | string, init?: RequestOptions): Promise<Response> {
    return this.request("POST", url, init);
  }

  put(url: URL | string, init?: RequestOptions): Promise<Response> {
    return this.request("PUT", url, init);
  }

  patch(url: URL | string, init?: RequestOptions): Promise<Response> {
    return this.request("PATCH", url, init);
  }

  delete(url: URL | string, init?: RequestOptions): Promise<Response> {
    return this.request("DELETE", url, init);
  }

  /** Sends `body` serialized as JSON. */
  json(method: HttpMethod, url: URL | string, body: unknown, init: RequestOptions = {}): Promise<Response> {
    return this.request(method, url, {
      ...init,
      headers: { ...init.headers, "content-type": "application/json" },
      body: JSON.stringify(body),
    });
  }

  /**
   * HEAD probe shared by the `exists()` methods: 2xx is true, 401 and 404
   * are false, anything else raises.
   */
  async probe(url: URL): Promise<boolean> {
    const response = await this.head(url);
    if (response.ok) return true;
    if (response.status === 401 || response.status === 404) {
      this.log.info(`HEAD ${url.toString()}: ${defaultStatusMessage(response.status)} (${response.status})`);
      return false;
    }
    throw unexpectedStatus(response.status);
  }

  subject(name: string): Subject {
    return new Subject(this, name);
  }
}
