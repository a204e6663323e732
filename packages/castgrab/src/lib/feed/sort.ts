import type { ShowRecord } from "./types.js";

export type SortColumn = "date" | "size" | "title";
export type SortOrder = "asc" | "desc";

export const SORT_COLUMNS: readonly SortColumn[] = ["date", "size", "title"];
export const SORT_ORDERS: readonly SortOrder[] = ["asc", "desc"];

/**
 * The value a column sorts by. Dates sort by their parsed timestamp
 * (unparseable dates are 0 and sink to the bottom of a newest-first list),
 * titles case-insensitively.
 */
export function sortKey(show: ShowRecord, column: SortColumn): number | string {
  switch (column) {
    case "date":
      return show.publishedTimestamp;
    case "size":
      return show.lengthBytes;
    case "title":
      return show.title.toLocaleLowerCase();
  }
}

/**
 * Build a comparator for one column and direction.
 */
export function compareShows(
  column: SortColumn,
  order: SortOrder = "asc"
): (a: ShowRecord, b: ShowRecord) => number {
  const direction = order === "asc" ? 1 : -1;

  return (a, b) => {
    const left = sortKey(a, column);
    const right = sortKey(b, column);
    if (left < right) return -direction;
    if (left > right) return direction;
    return 0;
  };
}

/**
 * Return a sorted copy; ties keep feed order.
 */
export function sortShows<T extends ShowRecord>(
  shows: readonly T[],
  column: SortColumn = "date",
  order: SortOrder = "desc"
): T[] {
  return [...shows].sort(compareShows(column, order));
}
