import type { CandidateItem } from "./types";

const MAGNET_PREFIX = "magnet:?";
const TORRENT_SUFFIX = ".torrent";

export function isMagnetLink(url: string): boolean {
  return url.length > MAGNET_PREFIX.length && url.startsWith(MAGNET_PREFIX);
}

export function isTorrentFile(url: string): boolean {
  return url.length > TORRENT_SUFFIX.length && url.endsWith(TORRENT_SUFFIX);
}

export function isDownloadLink(url: string): boolean {
  return isMagnetLink(url) || isTorrentFile(url);
}

/**
 * Picks the link to hand to the daemon: the item's own link, then the first
 * qualifying enclosure, then vendor-specific fields. Null when none qualify.
 */
export function resolveDownloadLink(item: CandidateItem): string | null {
  if (item.link && isDownloadLink(item.link)) {
    return item.link;
  }

  const enclosure = item.enclosures.find(isDownloadLink);
  if (enclosure) return enclosure;

  return item.vendorLinks.find(isDownloadLink) ?? null;
}
