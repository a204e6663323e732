import type { FeedSource } from "../ports/feed-source.js";
import { feedFetchFailed } from "../errors/catalog.js";
import { errorMessage } from "../errors/types.js";
import { USER_AGENT } from "./user-agent.js";

export interface FetchFeedSourceOptions {
  /** Abort the request after this many milliseconds */
  timeoutMs: number;
  fetchImpl?: typeof fetch;
}

/**
 * Create a feed source that downloads feeds with fetch.
 */
export function createFetchFeedSource(options: FetchFeedSourceOptions): FeedSource {
  const fetchImpl = options.fetchImpl ?? globalThis.fetch;

  return {
    async fetch(url: string): Promise<Uint8Array> {
      let response: Response;
      try {
        response = await fetchImpl(url, {
          signal: AbortSignal.timeout(options.timeoutMs),
          headers: {
            "User-Agent": USER_AGENT,
            Accept: "application/rss+xml, application/xml;q=0.9, text/xml;q=0.8, */*;q=0.5",
          },
        });
      } catch (error) {
        const reason =
          error instanceof Error && error.name === "TimeoutError"
            ? `No response within ${options.timeoutMs}ms`
            : errorMessage(error);
        throw feedFetchFailed(url, reason, error);
      }

      if (!response.ok) {
        throw feedFetchFailed(url, `Server answered ${response.status} ${response.statusText}`.trim());
      }

      try {
        return new Uint8Array(await response.arrayBuffer());
      } catch (error) {
        throw feedFetchFailed(url, errorMessage(error), error);
      }
    },
  };
}
