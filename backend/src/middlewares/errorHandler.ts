import { type NextFunction, type Request, type Response } from "express";
import { MulterError } from "multer";
import { ZodError } from "zod";
import { SessionNotFoundError } from "../services/sessions/actions";
import { createLogger } from "../utils/logger";
import { HttpError } from "../utils/httpError";

const log = createLogger("http");

export function notFoundHandler(_req: Request, _res: Response, next: NextFunction): void {
  next(new HttpError(404, "Route not found"));
}

/** Map any thrown error to a status code and user-facing message. */
export function toHttpError(error: unknown): HttpError {
  if (error instanceof HttpError) return error;
  if (error instanceof SessionNotFoundError) return new HttpError(404, "Session not found");
  if (error instanceof ZodError) {
    return new HttpError(400, error.issues.map((i) => i.message).join(", "));
  }
  if (error instanceof MulterError) {
    return new HttpError(error.code === "LIMIT_FILE_SIZE" ? 413 : 400, error.message);
  }
  log.error(error);
  return new HttpError(500, "Internal server error");
}

export function errorHandler(
  error: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  const httpError = toHttpError(error);
  res.status(httpError.statusCode).json({ error: httpError.message });
}
