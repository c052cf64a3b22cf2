import { fetch, type Dispatcher, type Headers } from "undici";
import {
  NetworkError,
  USER_AGENT,
  createDispatcher,
  type ProxySettings,
} from "@helpmirror/catalog-sdk";

export interface HttpResponse {
  status: number;
  statusText: string;
  headers: Record<string, string>;
  data: Uint8Array;
}

/**
 * What the catalog service needs from a transport
 */
export interface CatalogFetcher {
  getBytes(path: string): Promise<Uint8Array>;
}

export interface CatalogHttpClientOptions {
  /** Base URL relative paths resolve against */
  baseUrl: string;
  proxy?: ProxySettings;
  timeoutMs?: number;
  /** Dispatcher to use instead of one built from `proxy`; the client takes ownership */
  dispatcher?: Dispatcher;
}

function normalizeHeaders(headers: Headers): Record<string, string> {
  const result: Record<string, string> = {};
  headers.forEach((value, key) => {
    result[key] = value;
  });
  return result;
}

export class CatalogHttpClient implements CatalogFetcher {
  private readonly dispatcher: Dispatcher;

  constructor(private readonly options: CatalogHttpClientOptions) {
    this.dispatcher = options.dispatcher ?? createDispatcher(options.proxy);
  }

  resolve(path: string): string {
    try {
      return new URL(path, this.options.baseUrl).toString();
    } catch (error) {
      throw new NetworkError(`Invalid catalog address '${path}'`, path, undefined, error);
    }
  }

  async request(path: string): Promise<HttpResponse> {
    const url = this.resolve(path);
    const controller = new AbortController();

    let timeoutHandle: ReturnType<typeof setTimeout> | undefined;
    if (this.options.timeoutMs) {
      timeoutHandle = setTimeout(() => controller.abort(), this.options.timeoutMs);
    }

    try {
      const response = await fetch(url, {
        method: "GET",
        headers: { "User-Agent": USER_AGENT },
        signal: controller.signal,
        dispatcher: this.dispatcher,
      });

      const data = new Uint8Array(await response.arrayBuffer());

      return {
        status: response.status,
        statusText: response.statusText,
        headers: normalizeHeaders(response.headers),
        data,
      };
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new NetworkError(`Request to ${url} failed: ${detail}`, url, undefined, error);
    } finally {
      if (timeoutHandle) {
        clearTimeout(timeoutHandle);
      }
    }
  }

  /**
   * GETs `path` and returns the body of a successful response
   * @throws NetworkError on transport failure or a non-2xx status
   */
  async getBytes(path: string): Promise<Uint8Array> {
    const response = await this.request(path);
    if (response.status < 200 || response.status >= 300) {
      throw new NetworkError(
        `HTTP ${response.status}: ${response.statusText}`,
        this.resolve(path),
        response.status,
      );
    }
    return response.data;
  }

  async close(): Promise<void> {
    await this.dispatcher.close();
  }
}
