/**
 * qBittorrent module exports
 */

export { type FetchFn, QbitClient } from "./client";
export { ApiError, AuthError, QbitError, RemovalError } from "./errors";
export { parseTorrentInfo, parseTorrentList } from "./mappers";
