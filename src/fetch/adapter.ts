/**
 * HTTP fetch adapter with a bounded retry budget.
 *
 * Transient failures (no response, 429, 5xx) are retried with exponential
 * backoff; everything else fails immediately.
 */
import { isAxiosError, isCancel, type AxiosInstance } from "axios";
import { setTimeout as sleep } from "node:timers/promises";

import {
  ConfigError,
  FetchError,
  RunCancelledError,
} from "../core/exceptions.js";
import { silentLogger, type Logger } from "../core/logger.js";
import { decodeCsv } from "../core/table.js";
import type { Table } from "../core/types.js";

export type QueryValue = string | number;

/** A request target: URL template plus its placeholder and query values. */
export interface Endpoint {
  /** URL with `{name}` placeholders filled from `params`. */
  url: string;
  params?: Record<string, QueryValue>;
  query?: Record<string, QueryValue>;
}

export interface FetchOptions {
  /** Extra attempts after the first one. */
  retries: number;
  timeoutMs: number;
  /** Base delay; attempt n waits `retryDelayMs * 2^n`. */
  retryDelayMs: number;
  /** Sent with every request, e.g. an API key. */
  defaultQuery?: Record<string, QueryValue>;
  signal?: AbortSignal;
  log?: Logger;
}

const PLACEHOLDER = /\{(\w+)\}/g;

/**
 * Fill `{name}` placeholders from `params`, URL-encoding each value.
 * @throws ConfigError when a placeholder has no value.
 */
export function expandTemplate(
  template: string,
  params: Record<string, QueryValue> = {},
): string {
  return template.replace(PLACEHOLDER, (_, name: string) => {
    const value = params[name];
    if (value === undefined) {
      throw new ConfigError(`no value for placeholder {${name}} in ${template}`);
    }
    return encodeURIComponent(String(value));
  });
}

export class FetchAdapter {
  private http: AxiosInstance;
  private opts: FetchOptions;
  private log: Logger;

  constructor(http: AxiosInstance, opts: FetchOptions) {
    this.http = http;
    this.opts = opts;
    this.log = opts.log ?? silentLogger;
  }

  /** GET and parse a JSON body. A body that does not parse is permanent. */
  async fetchJson(endpoint: Endpoint): Promise<unknown> {
    const { url, body } = await this.fetchText(endpoint);
    try {
      return JSON.parse(body);
    } catch (err) {
      throw new FetchError("permanent", url, "response is not valid JSON", {
        cause: err,
      });
    }
  }

  /** GET and parse a CSV body into a table of string cells. */
  async fetchCsv(endpoint: Endpoint): Promise<Table> {
    const { url, body } = await this.fetchText(endpoint);
    try {
      return decodeCsv(body);
    } catch (err) {
      throw new FetchError("permanent", url, "response is not valid CSV", {
        cause: err,
      });
    }
  }

  /** GET with retries; returns the expanded URL and the raw body. */
  async fetchText(endpoint: Endpoint): Promise<{ url: string; body: string }> {
    const url = expandTemplate(endpoint.url, endpoint.params);
    const query = { ...this.opts.defaultQuery, ...endpoint.query };

    for (let attempt = 0; ; attempt++) {
      if (this.opts.signal?.aborted) throw new RunCancelledError();
      try {
        const res = await this.http.get<unknown>(url, {
          params: query,
          timeout: this.opts.timeoutMs,
          responseType: "text",
          signal: this.opts.signal,
        });
        const body: unknown = res.data;
        if (typeof body !== "string") {
          throw new FetchError("permanent", url, `unexpected ${typeof body} body`);
        }
        return { url, body };
      } catch (err) {
        const failure = this.classify(err, url);
        if (
          failure instanceof RunCancelledError ||
          failure.kind === "permanent" ||
          attempt >= this.opts.retries
        ) {
          throw failure;
        }
        const delay = this.opts.retryDelayMs * 2 ** attempt;
        this.log.warn(
          `GET ${url} attempt ${attempt + 1}/${this.opts.retries + 1} failed, retrying in ${delay}ms: ${failure.message}`,
        );
        await this.wait(delay);
      }
    }
  }

  private classify(err: unknown, url: string): FetchError | RunCancelledError {
    if (err instanceof FetchError || err instanceof RunCancelledError) return err;
    if (isCancel(err) || this.opts.signal?.aborted) {
      return new RunCancelledError(`Request to ${url} cancelled`);
    }
    if (isAxiosError(err)) {
      const status = err.response?.status;
      if (status === undefined) {
        return new FetchError("transient", url, err.code ?? err.message, { cause: err });
      }
      const kind = status === 429 || status >= 500 ? "transient" : "permanent";
      return new FetchError(kind, url, `HTTP ${status}`, { status, cause: err });
    }
    return new FetchError("permanent", url, String(err), { cause: err });
  }

  private async wait(ms: number): Promise<void> {
    if (ms <= 0) return;
    try {
      await sleep(ms, undefined, { signal: this.opts.signal });
    } catch (err) {
      if (this.opts.signal?.aborted) throw new RunCancelledError();
      throw err;
    }
  }
}
