/** An error whose message is safe to return to the client. */
export class HttpError extends Error {
  constructor(
    readonly status: number,
    readonly error: string,
    message: string,
    readonly details?: unknown
  ) {
    super(message);
    this.name = "HttpError";
  }

  static badRequest(message: string, details?: unknown): HttpError {
    return new HttpError(400, "Bad Request", message, details);
  }

  static notFound(message: string): HttpError {
    return new HttpError(404, "Not Found", message);
  }
}
