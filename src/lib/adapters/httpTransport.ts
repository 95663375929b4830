import { Agent, fetch, type Dispatcher } from "undici";

import { DEFAULT_TIMEOUT_MS } from "@/lib/domain/constants";
import { ConnectivityError } from "@/lib/domain/errors";
import type { Protocol, WattBoxCredentials } from "@/lib/domain/models";
import type { QueryParams, WattBoxTransportPort } from "@/lib/ports/WattBoxTransportPort";

export interface HttpTransportConfig extends WattBoxCredentials {
  host: string;
  protocol?: Protocol;
  /** Per-request timeout in ms (default 5000). */
  timeout?: number;
  /** Defaults to an Agent that skips certificate verification. */
  dispatcher?: Dispatcher;
}

export function basicAuthHeader({ username, password }: WattBoxCredentials): string {
  return `Basic ${Buffer.from(`${username}:${password}`, "utf8").toString("base64")}`;
}

/**
 * GET-only transport for the WattBox web interface.
 *
 * Devices sit on a LAN and commonly serve plain HTTP or HTTPS with a
 * self-signed certificate, so the default dispatcher does not verify the peer.
 */
export class HttpTransport implements WattBoxTransportPort {
  readonly baseUrl: string;

  private readonly authorization: string;
  private readonly timeout: number;
  private readonly dispatcher: Dispatcher;
  private readonly ownsDispatcher: boolean;

  constructor(config: HttpTransportConfig) {
    const protocol = config.protocol ?? "http";
    this.baseUrl = `${protocol}://${config.host.replace(/\/$/, "")}`;
    this.authorization = basicAuthHeader(config);
    this.timeout = config.timeout ?? DEFAULT_TIMEOUT_MS;
    this.ownsDispatcher = config.dispatcher === undefined;
    this.dispatcher =
      config.dispatcher ?? new Agent({ connect: { rejectUnauthorized: false } });
  }

  async get(path: string, params?: QueryParams, signal?: AbortSignal): Promise<string> {
    const url = this.buildUrl(path, params);
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);
    const onAbort = () => controller.abort();
    if (signal?.aborted) {
      controller.abort();
    }
    signal?.addEventListener("abort", onAbort);

    try {
      const response = await fetch(url, {
        method: "GET",
        headers: {
          Authorization: this.authorization,
          Accept: "text/xml, application/xml, */*",
        },
        signal: controller.signal,
        dispatcher: this.dispatcher,
      });

      const body = await response.text();
      if (!response.ok) {
        throw new ConnectivityError(
          `HTTP ${response.status} ${response.statusText} from ${path}`,
          "HTTP_ERROR",
          response.status,
        );
      }
      return body;
    } catch (error) {
      throw this.normalizeError(error, path, signal);
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener("abort", onAbort);
    }
  }

  async close(): Promise<void> {
    if (this.ownsDispatcher) {
      await this.dispatcher.close();
    }
  }

  private buildUrl(path: string, params?: QueryParams): string {
    const url = new URL(path, this.baseUrl);
    if (params) {
      Object.entries(params).forEach(([key, value]) => {
        url.searchParams.append(key, String(value));
      });
    }
    return url.toString();
  }

  private normalizeError(error: unknown, path: string, signal?: AbortSignal): ConnectivityError {
    if (error instanceof ConnectivityError) {
      return error;
    }

    if (error instanceof Error && error.name === "AbortError") {
      if (signal?.aborted) {
        return new ConnectivityError(`Request to ${path} cancelled`, "CANCELLED", undefined, {
          cause: error,
        });
      }
      return new ConnectivityError(
        `Request to ${path} timed out after ${this.timeout}ms`,
        "TIMEOUT",
        undefined,
        { cause: error },
      );
    }

    const message = error instanceof Error ? error.message : String(error);
    return new ConnectivityError(
      `Network error reaching ${this.baseUrl}${path}: ${message}`,
      "NETWORK_ERROR",
      undefined,
      { cause: error },
    );
  }
}
