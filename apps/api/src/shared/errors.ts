// apps/api/src/shared/errors.ts
import type { FastifyReply, FastifyRequest } from "fastify";

export type ErrorKind =
  | "BadRequest"
  | "InvalidScope"
  | "ValidationFailed"
  | "Unauthorized"
  | "Forbidden"
  | "AdminRequired"
  | "NotFound"
  | "Conflict"
  | "InternalServerError";

export interface HttpErrorShape {
  error: string;
  message: string;
  details?: Record<string, unknown>;
}

export class HttpError extends Error implements HttpErrorShape {
  public statusCode: number;
  public error: string;
  public details?: Record<string, unknown>;

  constructor(
    statusCode: number,
    error: string,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "HttpError";
    this.statusCode = statusCode;
    this.error = error;
    this.details = details;
  }
}

export function createHttpError(
  statusCode: number,
  message: string,
  error: ErrorKind = "BadRequest",
  details?: Record<string, unknown>
): HttpError {
  return new HttpError(statusCode, error, message, details);
}

export function isHttpError(err: unknown, kind?: ErrorKind): err is HttpError {
  if (!(err instanceof HttpError)) return false;
  return kind === undefined || err.error === kind;
}

export function toErrorResponse(err: unknown): {
  statusCode: number;
  payload: HttpErrorShape;
} {
  if (err instanceof HttpError) {
    return {
      statusCode: err.statusCode,
      payload: {
        error: err.error,
        message: err.message,
        ...(err.details ? { details: err.details } : {})
      }
    };
  }

  // Fastify's own errors (body parsing, content type, payload size) carry a 4xx statusCode.
  if (err instanceof Error) {
    const statusCode =
      "statusCode" in err &&
      typeof err.statusCode === "number" &&
      Number.isFinite(err.statusCode)
        ? err.statusCode
        : 500;

    return {
      statusCode,
      payload: {
        error: statusCode >= 500 ? "InternalServerError" : "BadRequest",
        message:
          statusCode >= 500 ? "Internal server error" : err.message || "Bad request"
      }
    };
  }

  return {
    statusCode: 500,
    payload: {
      error: "InternalServerError",
      message: "Internal server error"
    }
  };
}

/**
 * Route catch-all: answers with the mapped error and logs anything that ended up
 * as a 5xx.
 */
export function sendError(request: FastifyRequest, reply: FastifyReply, err: unknown): void {
  const { statusCode, payload } = toErrorResponse(err);
  if (statusCode >= 500) {
    request.log.error({ err }, "request failed");
  }
  reply.code(statusCode).send(payload);
}
