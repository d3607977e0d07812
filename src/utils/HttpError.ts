export class HttpError extends Error {
  constructor(
    public readonly statusCode: number,
    message: string,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = "HttpError";
  }

  static notFound(what: string, id: string): HttpError {
    return new HttpError(404, `${what} '${id}' was not found`, { id });
  }

  static conflict(message: string, details?: unknown): HttpError {
    return new HttpError(409, message, details);
  }
}

export default HttpError;
