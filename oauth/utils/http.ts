import { readFileSync } from "node:fs";
import { Agent, fetch, type Dispatcher } from "undici";
import {
  AuthorizationDeniedError,
  ProviderError,
  ProviderTimeoutError,
  isTimeoutError,
} from "../flow/errors.ts";

export const DEFAULT_HTTP_TIMEOUT_MS = 10_000;

export type ProviderHttpOptions = {
  /** PEM bundle used to verify provider TLS certificates. */
  sslCaFile?: string;
  timeoutMs?: number;
  /** Replaces the agent built from the options above. */
  dispatcher?: Dispatcher;
};

export type HttpRequest = {
  method?: "GET" | "POST";
  headers?: Record<string, string>;
  body?: string;
};

export class ProviderHttpClient {
  private readonly dispatcher: Dispatcher;

  constructor(options: ProviderHttpOptions = {}) {
    const timeout = options.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
    this.dispatcher =
      options.dispatcher ??
      new Agent({
        connect: {
          timeout,
          ...(options.sslCaFile ? { ca: readFileSync(options.sslCaFile) } : {}),
        },
        headersTimeout: timeout,
        bodyTimeout: timeout,
      });
  }

  /**
   * Sends a request and parses the JSON response. 401 and 403 mean the
   * provider rejected the grant or token.
   */
  async requestJson(url: string, init: HttpRequest = {}): Promise<unknown> {
    let status: number;
    let text: string;
    try {
      const response = await fetch(url, {
        method: init.method ?? "GET",
        headers: { accept: "application/json", ...init.headers },
        body: init.body,
        dispatcher: this.dispatcher,
      });
      status = response.status;
      text = await response.text();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      if (isTimeoutError(error)) {
        throw new ProviderTimeoutError(`Request to ${url} timed out`, {
          cause: error,
        });
      }
      throw new ProviderError(`Request to ${url} failed: ${message}`, {
        cause: error,
      });
    }

    if (status === 401 || status === 403) {
      throw new AuthorizationDeniedError(
        `${url} responded with ${status}: ${text}`,
      );
    }
    if (status < 200 || status >= 300) {
      throw new ProviderError(`${url} responded with ${status}: ${text}`);
    }

    try {
      return JSON.parse(text);
    } catch {
      throw new ProviderError(`${url} responded with a non-JSON body`);
    }
  }
}
