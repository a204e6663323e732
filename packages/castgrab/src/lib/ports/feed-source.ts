/**
 * Retrieves raw feed documents.
 */
export interface FeedSource {
  /** Fetch the document at `url` and return its undecoded bytes */
  fetch(url: string): Promise<Uint8Array>;
}
