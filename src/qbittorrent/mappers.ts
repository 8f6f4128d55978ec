/**
 * Mapping of raw WebUI payloads to domain types
 */

import type { RawTorrentInfo, TorrentItem } from "../types";

function optionalNumber(value: unknown): number | undefined {
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

export function parseTorrentInfo(raw: RawTorrentInfo): TorrentItem {
  return {
    hash: typeof raw.hash === "string" ? raw.hash : "",
    name: typeof raw.name === "string" ? raw.name : "",
    addedOn: optionalNumber(raw.added_on),
    ratio: optionalNumber(raw.ratio),
  };
}

export function parseTorrentList(body: unknown): TorrentItem[] | null {
  if (!Array.isArray(body)) {
    return null;
  }
  return body
    .filter((entry): entry is RawTorrentInfo => typeof entry === "object" && entry !== null)
    .map(parseTorrentInfo);
}
