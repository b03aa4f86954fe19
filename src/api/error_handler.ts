import type { NextFunction, Request, Response } from "express";
import type { Logger } from "../logger.js";
import { HttpError } from "./http_error.js";

interface ErrorBody {
  error: string;
  message: string;
  details?: unknown;
  timestamp: string;
}

function isBodyParseError(error: unknown): error is SyntaxError & { type: string } {
  return error instanceof SyntaxError && "type" in error && error.type === "entity.parse.failed";
}

export class ErrorHandler {
  constructor(private readonly logger: Logger) {}

  /**
   * Express error middleware; register it after every route.
   */
  middleware() {
    return (error: unknown, req: Request, res: Response, next: NextFunction): void => {
      if (res.headersSent) {
        next(error);
        return;
      }
      const { status, body } = this.toResponse(error);
      if (status >= 500) {
        this.logger.error(`${req.method} ${req.originalUrl} failed`, {
          error: error instanceof Error ? error.message : String(error),
          stack: error instanceof Error ? error.stack : undefined
        });
      } else {
        this.logger.warn(`${req.method} ${req.originalUrl} rejected with ${status}`, { message: body.message });
      }
      res.status(status).json(body);
    };
  }

  toResponse(error: unknown): { status: number; body: ErrorBody } {
    const timestamp = new Date().toISOString();
    if (error instanceof HttpError) {
      return {
        status: error.status,
        body: {
          error: error.error,
          message: error.message,
          ...(error.details === undefined ? {} : { details: error.details }),
          timestamp
        }
      };
    }
    if (isBodyParseError(error)) {
      return {
        status: 400,
        body: { error: "Bad Request", message: "Request body is not valid JSON", timestamp }
      };
    }
    return {
      status: 500,
      body: { error: "Internal Server Error", message: "Internal Server Error", timestamp }
    };
  }
}
