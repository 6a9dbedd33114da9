import type { ErrorRequestHandler, RequestHandler } from "express";
import { ZodError } from "zod";
import { logError } from "./logger.js";

export class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string
  ) {
    super(message);
    this.name = "HttpError";
  }
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

export const notFound: RequestHandler = (_req, res) => {
  res.status(404).json({ message: "Not found" });
};

export const errorHandler: ErrorRequestHandler = (err, req, res, _next) => {
  if (err instanceof HttpError) {
    res.status(err.status).json({ message: err.message });
    return;
  }

  if (err instanceof ZodError) {
    res.status(400).json({ errors: err.flatten() });
    return;
  }

  // body-parser marks malformed JSON with a 4xx status
  if (err instanceof SyntaxError && "status" in err && err.status === 400) {
    res.status(400).json({ message: "Malformed JSON body" });
    return;
  }

  logError("Unhandled error", {
    method: req.method,
    path: req.originalUrl,
    error: err instanceof Error ? err.stack ?? err.message : String(err),
  });
  res.status(500).json({ message: "Server error" });
};
