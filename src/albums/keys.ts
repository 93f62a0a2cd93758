import { extname } from "path";
import { InvalidAlbumNameError } from "../errors";

export const KEY_DELIMITER = "/";
export const INDEX_KEY = "index.html";
export const DEFAULT_PHOTO_EXTENSIONS = [".jpg", ".jpeg"];

export function assertAlbumName(name: string): void {
  if (name.length === 0 || name.includes(KEY_DELIMITER)) {
    throw new InvalidAlbumNameError(name, 'must be non-empty and contain no "/"');
  }
}

/** True when the album's page key would collide with the site index. */
export function isReservedAlbumName(name: string): boolean {
  return albumPageKey(name) === INDEX_KEY;
}

/** Stricter check for albums about to be created. */
export function assertNewAlbumName(name: string): void {
  assertAlbumName(name);
  if (isReservedAlbumName(name)) {
    throw new InvalidAlbumNameError(name, `its page would replace ${INDEX_KEY}`);
  }
}

export function albumPrefix(album: string): string {
  return `${album}${KEY_DELIMITER}`;
}

export function photoKey(album: string, filename: string): string {
  return `${albumPrefix(album)}${filename}`;
}

export function albumPageKey(album: string): string {
  return `${album}.html`;
}

/**
 * Strip the album prefix from a key. Returns null for keys outside the album
 * or nested below it.
 */
export function photoFilename(album: string, key: string): string | null {
  const prefix = albumPrefix(album);
  if (!key.startsWith(prefix)) return null;
  const rest = key.slice(prefix.length);
  if (rest.length === 0 || rest.includes(KEY_DELIMITER)) return null;
  return rest;
}

export function isPhotoFile(filename: string, extensions: readonly string[]): boolean {
  const ext = extname(filename).toLowerCase();
  return ext.length > 0 && extensions.includes(ext);
}

/**
 * Album names from a delimiter listing's common prefixes: trailing delimiter
 * removed, empties dropped, deduplicated and sorted.
 */
export function deriveAlbums(prefixes: Iterable<string>): string[] {
  const names = new Set<string>();
  for (const prefix of prefixes) {
    const name = prefix.endsWith(KEY_DELIMITER) ? prefix.slice(0, -KEY_DELIMITER.length) : prefix;
    if (name.length > 0) names.add(name);
  }
  return [...names].sort();
}

const CONTENT_TYPES: Record<string, string> = {
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".png": "image/png",
  ".gif": "image/gif",
  ".webp": "image/webp",
  ".heic": "image/heic",
  ".html": "text/html; charset=utf-8",
};

export function contentTypeFor(filename: string): string | undefined {
  return CONTENT_TYPES[extname(filename).toLowerCase()];
}
