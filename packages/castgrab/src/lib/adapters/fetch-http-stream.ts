import type { HttpStream, HttpStreamClient } from "../ports/http-stream.js";
import { httpStatusError, networkError } from "../errors/catalog.js";
import { errorMessage } from "../errors/types.js";
import { USER_AGENT } from "./user-agent.js";

/**
 * Parse a content-length header value.
 * Missing, negative or non-integer values mean the size is unknown.
 */
export function parseContentLength(header: string | null): number | undefined {
  if (header === null || !/^\s*\d+\s*$/.test(header)) {
    return undefined;
  }
  return parseInt(header, 10);
}

/**
 * Create an HTTP stream client using fetch.
 * Asks for an identity encoding so the bytes written are the bytes served
 * and content-length describes them.
 */
export function createFetchHttpStreamClient(
  fetchImpl: typeof fetch = globalThis.fetch
): HttpStreamClient {
  return {
    async open(url: string, signal: AbortSignal): Promise<HttpStream> {
      let response: Response;
      try {
        response = await fetchImpl(url, {
          signal,
          headers: {
            "User-Agent": USER_AGENT,
            "Accept-Encoding": "identity",
          },
        });
      } catch (error) {
        throw networkError(url, errorMessage(error), error);
      }

      if (!response.ok) {
        await response.body?.cancel();
        throw httpStatusError(url, response.status, response.statusText);
      }

      if (!response.body) {
        throw networkError(url, "Response has no body");
      }

      const reader = response.body.getReader();

      return {
        contentLength: parseContentLength(response.headers.get("content-length")),
        async read() {
          const { done, value } = await reader.read();
          return done ? undefined : value;
        },
        async close() {
          await reader.cancel();
        },
      };
    },
  };
}

/**
 * Default HTTP stream client instance.
 */
export const fetchHttpStreamClient = createFetchHttpStreamClient();
