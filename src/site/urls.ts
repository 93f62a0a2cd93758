import { albumPageKey } from "../albums/keys";

/** Public base URL of a bucket served as a static website, with trailing slash. */
export function websiteUrl(bucket: string, domain: string): string {
  return `https://${bucket}.${domain}/`;
}

/** Percent-encode each segment of an object key, keeping the slashes. */
export function encodeKeyPath(key: string): string {
  return key.split("/").map(encodeURIComponent).join("/");
}

export function albumPageUrl(baseUrl: string, album: string): string {
  return `${baseUrl}${encodeKeyPath(albumPageKey(album))}`;
}
