import { extname, join } from "path";

export const DEFAULT_EXTENSION = ".mp4";
export const FALLBACK_BASENAME = "download";

/**
 * Keep letters, digits, spaces, dots and underscores; drop the rest and
 * trailing whitespace.
 */
export function sanitizeTitle(title: string): string {
  return title.replace(/[^\p{L}\p{N} ._]/gu, "").trimEnd();
}

/**
 * Extension of the media URL's path, ignoring query string and fragment.
 * Anything but a plain alphanumeric extension falls back to the default.
 */
export function extensionFromLink(link: string): string {
  let path = link;
  try {
    path = decodeURIComponent(new URL(link).pathname);
  } catch {
    path = link.split(/[?#]/)[0];
  }
  const extension = extname(path);
  return /^\.[\p{L}\p{N}]+$/u.test(extension) ? extension : DEFAULT_EXTENSION;
}

/**
 * Filesystem-safe name for a show's media file.
 */
export function deriveFilename(title: string, link: string): string {
  const base = sanitizeTitle(title) || FALLBACK_BASENAME;
  return `${base}${extensionFromLink(link)}`;
}

export function destinationPathFor(directory: string, title: string, link: string): string {
  return join(directory, deriveFilename(title, link));
}
