/**
 * Torrent and torrent-service type definitions
 */

/**
 * A torrent as seen in one snapshot of the client.
 */
export interface TorrentItem {
  hash: string;
  name: string;
  /** Epoch seconds the torrent was added; absent means "as old as possible" */
  addedOn?: number;
  /** Uploaded / downloaded; absent when the client has no figure yet */
  ratio?: number;
}

/**
 * Raw entry of `/api/v2/torrents/info`. Only the fields we read are listed.
 */
export interface RawTorrentInfo {
  hash?: unknown;
  name?: unknown;
  added_on?: unknown;
  ratio?: unknown;
}

/**
 * The torrent-management service a retention pass talks to.
 */
export interface TorrentService {
  login(force: boolean): Promise<void>;
  listTorrents(): Promise<TorrentItem[]>;
  deleteTorrents(hashes: string[], deleteFiles: boolean): Promise<void>;
}
