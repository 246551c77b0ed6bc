export type ErrorDetails = string | Record<string, string>;

/**
 * Error carrying the HTTP status it should be answered with.
 * `message` becomes the `error` field of the response body.
 */
export class AppError extends Error {
  constructor(
    public readonly statusCode: number,
    message: string,
    public readonly details?: ErrorDetails
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  constructor(details: Record<string, string>) {
    super(400, "Validation failed", details);
  }
}

export class NotFoundError extends AppError {
  constructor(message = "Not found") {
    super(404, message);
  }
}

export class ExternalServiceError extends AppError {
  constructor(details: string) {
    super(503, "External data source unavailable", details);
  }
}
