// backend/services/shared/src/middleware/problemJson.ts
/**
 * References:
 * - RFC 7807: Problem Details for HTTP APIs (application/problem+json)
 *
 * Purpose:
 * - One envelope for every error a service emits:
 *     { type, title, status, detail, instance }
 * - notFoundHandler(): tail handler for unmatched routes.
 * - errorHandler(): global funnel. HttpError keeps its status/title/headers;
 *   anything else becomes a sanitized 500 and is logged with a trimmed stack.
 *
 * Notes:
 * - Stacks go to logs only, never over the wire.
 * - `instance` is the request id (set by the http logger).
 */

import type {
  ErrorRequestHandler,
  Request,
  RequestHandler,
  Response,
} from "express";
import type { Logger } from "pino";
import { HttpError } from "../errors";

export const PROBLEM_CONTENT_TYPE = "application/problem+json";

export type ProblemJson = {
  type: string;
  title: string;
  status: number;
  detail: string;
  instance?: string;
};

export function requestIdOf(req: Request): string | undefined {
  return typeof req.id === "string" && req.id ? req.id : undefined;
}

export function sendProblem(
  res: Response,
  problem: ProblemJson,
  headers: Readonly<Record<string, string>> = {}
): void {
  for (const [k, v] of Object.entries(headers)) res.setHeader(k, v);
  res.status(problem.status).type(PROBLEM_CONTENT_TYPE).json(problem);
}

export const notFoundHandler = (): RequestHandler => {
  return (req, res) => {
    sendProblem(res, {
      type: "about:blank",
      title: "Not Found",
      status: 404,
      detail: "Route not found",
      instance: requestIdOf(req),
    });
  };
};

function trimStack(err: Error): string[] {
  return String(err.stack || "")
    .split("\n")
    .slice(0, 8);
}

export const errorHandler = (opts: { log: Logger }): ErrorRequestHandler => {
  const { log } = opts;

  return (err: unknown, req, res, next) => {
    const e = err instanceof Error ? err : new Error(String(err));

    // Can't shape a new response once bytes went out; let Express finalize.
    if (res.headersSent) {
      log.warn(
        {
          reqId: requestIdOf(req),
          method: req.method,
          url: req.originalUrl,
          name: e.name,
          message: e.message,
        },
        "error after headers sent"
      );
      next(err);
      return;
    }

    if (e instanceof HttpError) {
      sendProblem(
        res,
        {
          type: "about:blank",
          title: e.title,
          status: e.status,
          detail: e.message,
          instance: requestIdOf(req),
        },
        e.headers
      );
      return;
    }

    log.error(
      {
        reqId: requestIdOf(req),
        method: req.method,
        url: req.originalUrl,
        name: e.name,
        message: e.message,
        stack: trimStack(e),
      },
      "unhandled error in request pipeline"
    );

    sendProblem(res, {
      type: "about:blank",
      title: "Internal Server Error",
      status: 500,
      detail: "Unexpected error",
      instance: requestIdOf(req),
    });
  };
};
