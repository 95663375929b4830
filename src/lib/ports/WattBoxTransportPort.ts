export type QueryParams = Record<string, string | number>;

export interface WattBoxTransportPort {
  /** Base URL the paths are resolved against, e.g. "http://192.168.1.40". */
  readonly baseUrl: string;

  /**
   * Authenticated GET returning the response body as text.
   * Rejects with a ConnectivityError when the device cannot be reached,
   * times out, or answers with a non-2xx status.
   */
  get(path: string, params?: QueryParams, signal?: AbortSignal): Promise<string>;

  close(): Promise<void>;
}
