/**
 * Host-level failures. Everything that concerns a single session is
 * reported through result unions or a drop instead.
 */

export type FatalServerErrorCode = "SERVER_FULL_ON_LOCAL_CONNECT";

/**
 * A condition the session layer cannot recover from; the host should stop
 * or reload the server.
 */
export class FatalServerError extends Error {
  readonly name = "FatalServerError";

  constructor(
    public readonly code: FatalServerErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, FatalServerError);
    }
  }

  static serverFullOnLocalConnect(maxClients: number): FatalServerError {
    return new FatalServerError("SERVER_FULL_ON_LOCAL_CONNECT", "server is full on local connect", { maxClients });
  }
}
