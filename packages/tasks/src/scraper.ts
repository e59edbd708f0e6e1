import { ScraperRequestError } from "./errors.js";
import type { CrawlRequest } from "./jobs.js";

export interface ScraperClientOptions {
  baseUrl: string;
  fetch?: typeof fetch;
}

const RETRYABLE_STATUSES = new Set([408, 425, 429]);

export class ScraperClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: ScraperClientOptions) {
    this.baseUrl = options.baseUrl;
    this.fetchImpl = options.fetch ?? globalThis.fetch;
  }

  /** Starts a crawl. 5xx, 408, 425, 429 and transport failures are retryable. */
  async triggerCrawl(request: CrawlRequest): Promise<void> {
    const url = new URL("/crawl.json", this.baseUrl);

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: "POST",
        headers: { "Content-Type": "application/json", Accept: "application/json" },
        body: JSON.stringify(request),
      });
    } catch (error) {
      throw new ScraperRequestError("scraper request failed", { retryable: true, cause: error });
    }

    if (response.ok) return;

    const body = await response.text().catch(() => "");
    const retryable = response.status >= 500 || RETRYABLE_STATUSES.has(response.status);
    const detail = body.trim().length > 0 ? `: ${body.slice(0, 200)}` : "";
    throw new ScraperRequestError(`scraper returned ${response.status}${detail}`, {
      status: response.status,
      retryable,
    });
  }
}
