/**
 * qBittorrent client errors
 */

export class QbitError extends Error {
  constructor(
    message: string,
    readonly operation: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "QbitError";
  }
}

/**
 * Login rejected, IP banned, or the WebUI could not be reached.
 */
export class AuthError extends QbitError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "login", options);
    this.name = "AuthError";
  }
}

export class ApiError extends QbitError {
  constructor(
    message: string,
    operation: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, operation, options);
    this.name = "ApiError";
  }
}

/**
 * Removal of a single torrent failed. Carries the torrent hash.
 */
export class RemovalError extends QbitError {
  constructor(
    readonly hash: string,
    cause: unknown,
  ) {
    super(
      `Failed to remove torrent ${hash}: ${cause instanceof Error ? cause.message : String(cause)}`,
      "delete",
      { cause },
    );
    this.name = "RemovalError";
  }
}
