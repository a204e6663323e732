/**
 * One episode parsed from a feed item. Every field is filled in; see
 * parseFeed for the defaults applied to missing or malformed values.
 */
export interface ShowRecord {
  readonly title: string;
  /** Plain text of the first paragraph of the item's HTML description */
  readonly description: string;
  /** Enclosure URL, empty when the item has no media attached */
  readonly link: string;
  /** The feed's literal pubDate text */
  readonly publishedRaw: string;
  /** Milliseconds since epoch parsed from publishedRaw, 0 when unparseable */
  readonly publishedTimestamp: number;
  readonly lengthBytes: number;
}

export const DEFAULT_TITLE = "No Title";
export const DEFAULT_PUBLISHED = "No Date";
export const UNPARSEABLE_DESCRIPTION = "Could not parse description.";

/**
 * A record without a link has nothing to download.
 */
export function isDownloadable(show: ShowRecord): boolean {
  return show.link !== "";
}
