/**
 * HTTP client for the remote cover image service
 */

import type { CoverSource, CoversConfig, RemoteCoverResponse } from "../../types";
import { createLogger } from "../../utils/logger";

const logger = createLogger("covers");

export type FetchImpl = (input: string, init?: RequestInit) => Promise<Response>;

export interface OpenLibraryCoverClientOptions {
  baseUrl: string;
  size: string;
  timeoutMs: number;
  userAgent: string;
  fetchImpl?: FetchImpl;
}

/**
 * Strip dashes and spaces from an ISBN
 */
export function cleanIsbn(isbn: string): string {
  return isbn.replace(/[-\s]/g, "").trim();
}

export class OpenLibraryCoverClient implements CoverSource {
  private readonly baseUrl: string;
  private readonly size: string;
  private readonly timeoutMs: number;
  private readonly userAgent: string;
  private readonly fetchImpl: FetchImpl;

  constructor(options: OpenLibraryCoverClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.size = options.size;
    this.timeoutMs = options.timeoutMs;
    this.userAgent = options.userAgent;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  static fromConfig(config: CoversConfig, fetchImpl?: FetchImpl): OpenLibraryCoverClient {
    return new OpenLibraryCoverClient({
      baseUrl: config.baseUrl,
      size: config.size,
      timeoutMs: config.timeoutMs,
      userAgent: config.userAgent,
      fetchImpl,
    });
  }

  buildUrl(isbn: string): string {
    return `${this.baseUrl}/${encodeURIComponent(cleanIsbn(isbn))}-${this.size}.jpg`;
  }

  /**
   * GET the cover. Network failures and timeouts reject.
   */
  async fetchCover(isbn: string): Promise<RemoteCoverResponse> {
    const url = this.buildUrl(isbn);
    logger.debug(`Fetching cover: ${url}`);

    const response = await this.fetchImpl(url, {
      method: "GET",
      headers: { "User-Agent": this.userAgent },
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    const body = Buffer.from(await response.arrayBuffer());
    return { status: response.status, body };
  }
}
