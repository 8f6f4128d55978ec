/**
 * qBittorrent WebUI API v2 client
 */

import type { ClientConfig, TorrentItem, TorrentService } from "../types";
import { logger } from "../utils/logger";
import { ApiError, AuthError } from "./errors";
import { parseTorrentList } from "./mappers";

export type FetchFn = typeof fetch;

// qBittorrent 4 sets "SID", 5 sets "QBT_SID_<port>"
const SESSION_COOKIE_PATTERN = /(?:^|[;,]\s*)((?:SID|QBT_SID_\w+)=[^;,\s]+)/;

export class QbitClient implements TorrentService {
  private readonly baseUrl: URL;
  private readonly fetchFn: FetchFn;
  /** Session cookie as `name=value`, sent back verbatim */
  private session: string | null = null;

  constructor(
    private readonly config: ClientConfig,
    fetchFn: FetchFn = fetch,
  ) {
    this.baseUrl = new URL(config.endpoint);
    this.fetchFn = fetchFn;
  }

  /**
   * Log in and keep the session cookie. With `force` an existing session is
   * discarded first.
   */
  async login(force: boolean): Promise<void> {
    if (this.session && !force) {
      return;
    }
    this.session = null;

    logger.debug(`Logging in to ${this.baseUrl.origin} as ${this.config.username}`);

    let response: Response;
    try {
      response = await this.fetchFn(this.url("auth/login"), {
        method: "POST",
        headers: this.headers(),
        body: new URLSearchParams({
          username: this.config.username,
          password: this.config.password,
        }),
      });
    } catch (error) {
      throw new AuthError(
        `Cannot reach qBittorrent at ${this.baseUrl.origin}: ${(error as Error).message}`,
        { cause: error },
      );
    }

    if (response.status === 403) {
      throw new AuthError("Login refused: too many failed attempts, client IP is banned");
    }
    if (!response.ok) {
      throw new AuthError(`Login failed with HTTP ${response.status}`);
    }

    const body = (await response.text()).trim();
    if (body !== "Ok.") {
      throw new AuthError("Login failed: invalid username or password");
    }

    const match = SESSION_COOKIE_PATTERN.exec(response.headers.get("set-cookie") ?? "");
    if (!match?.[1]) {
      throw new AuthError("Login succeeded but no session cookie was returned");
    }

    this.session = match[1];
    logger.debug("Logged in");
  }

  async listTorrents(): Promise<TorrentItem[]> {
    const response = await this.request("list", "torrents/info", { method: "GET" });

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new ApiError(
        `Torrent list is not valid JSON: ${(error as Error).message}`,
        "list",
        response.status,
        { cause: error },
      );
    }

    const torrents = parseTorrentList(body);
    if (!torrents) {
      throw new ApiError("Torrent list is not an array", "list", response.status);
    }

    logger.debug(`Fetched ${torrents.length} torrent(s)`);
    return torrents;
  }

  async deleteTorrents(hashes: string[], deleteFiles: boolean): Promise<void> {
    if (hashes.length === 0) {
      return;
    }

    await this.request("delete", "torrents/delete", {
      method: "POST",
      body: new URLSearchParams({
        hashes: hashes.join("|"),
        deleteFiles: String(deleteFiles),
      }),
    });
  }

  private async request(
    operation: string,
    apiPath: string,
    init: { method: "GET" | "POST"; body?: URLSearchParams },
  ): Promise<Response> {
    const session = this.session;
    if (!session) {
      throw new AuthError(`Not logged in (${operation})`);
    }

    let response: Response;
    try {
      response = await this.fetchFn(this.url(apiPath), {
        ...init,
        headers: { ...this.headers(), Cookie: session },
      });
    } catch (error) {
      throw new ApiError(
        `${operation} request failed: ${(error as Error).message}`,
        operation,
        undefined,
        { cause: error },
      );
    }

    if (response.status === 403) {
      this.session = null;
      throw new ApiError(`${operation} request rejected: session expired`, operation, 403);
    }
    if (!response.ok) {
      throw new ApiError(
        `${operation} request failed with HTTP ${response.status}`,
        operation,
        response.status,
      );
    }

    return response;
  }

  private url(apiPath: string): string {
    return new URL(`api/v2/${apiPath}`, this.baseWithSlash()).toString();
  }

  private baseWithSlash(): string {
    const href = this.baseUrl.toString();
    return href.endsWith("/") ? href : `${href}/`;
  }

  private headers(): Record<string, string> {
    return { Referer: this.baseUrl.origin };
  }
}
