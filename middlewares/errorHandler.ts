import type { Request, Response, NextFunction } from "express";
import { AppError } from "../utils/errors";

function isBodyParseError(err: unknown) {
  return (
    typeof err === "object" &&
    err !== null &&
    "type" in err &&
    err.type === "entity.parse.failed"
  );
}

export const notFoundHandler = (req: Request, res: Response) => {
  res.status(404).json({ error: "Route not found" });
};

/**
 * Shapes every error as `{ error, details? }`. Anything that is not an
 * AppError is answered as a 500; logging happens in the error logger ahead of it.
 */
const errorHandler = (
  err: unknown,
  req: Request,
  res: Response,
  next: NextFunction
) => {
  if (res.headersSent) {
    next(err);
    return;
  }

  if (err instanceof AppError) {
    res.status(err.statusCode).json(
      err.details === undefined ? { error: err.message } : { error: err.message, details: err.details }
    );
    return;
  }

  if (isBodyParseError(err)) {
    res.status(400).json({ error: "Validation failed", details: "Malformed JSON body" });
    return;
  }

  res.status(500).json({ error: "Internal server error" });
};

export default errorHandler;
