// backend/services/shared/src/middleware/problem.ts
/**
 * RFC 7807 problem+json responses.
 *
 * Purpose:
 * - One wire shape for every error a service emits.
 * - `sendProblem()` for handlers, `notFoundHandler()` as the 404 tail and
 *   `errorHandler()` as the global error tail.
 *
 * Invariants:
 * - No stack traces or internal fields over the wire; 5xx diagnostics go to
 *   the log with a trimmed stack.
 * - Never double-send: once headers are out, the error handler only logs.
 */

import type {
  ErrorRequestHandler,
  Request,
  RequestHandler,
  Response,
} from "express";
import type { Logger } from "pino";
import { logger as rootLogger } from "../utils/logger";

export type ProblemJson = {
  type: string;
  title: string;
  status: number;
  detail?: string;
  instance?: string;
  [k: string]: unknown;
};

const TITLES: Record<number, string> = {
  400: "Bad Request",
  401: "Unauthorized",
  403: "Forbidden",
  404: "Not Found",
  413: "Payload Too Large",
  429: "Too Many Requests",
  499: "Client Closed Request",
  500: "Internal Server Error",
  502: "Bad Gateway",
  503: "Service Unavailable",
  504: "Gateway Timeout",
};

export function titleFor(status: number): string {
  return TITLES[status] ?? (status >= 500 ? "Internal Server Error" : "Error");
}

export function requestIdOf(req: Request): string | undefined {
  const id: unknown = req.id;
  if (typeof id === "string" && id) return id;
  if (typeof id === "number") return String(id);
  return undefined;
}

export function buildProblem(
  status: number,
  detail: string,
  instance?: string,
  extra: Record<string, unknown> = {}
): ProblemJson {
  return {
    type: "about:blank",
    title: titleFor(status),
    status,
    detail,
    ...(instance ? { instance } : {}),
    ...extra,
  };
}

export function sendProblem(
  req: Request,
  res: Response,
  status: number,
  detail: string,
  headers: Record<string, string> = {}
): void {
  for (const [k, v] of Object.entries(headers)) res.setHeader(k, v);
  res
    .status(status)
    .type("application/problem+json")
    .json(buildProblem(status, detail, requestIdOf(req)));
}

export const notFoundHandler = (): RequestHandler => {
  return (req, res) => {
    sendProblem(req, res, 404, "Route not found");
  };
};

type HttpErrorLike = {
  status?: unknown;
  statusCode?: unknown;
  expose?: unknown;
  message?: unknown;
  name?: unknown;
  stack?: unknown;
};

function statusOf(err: HttpErrorLike): number {
  const raw = Number(err.status ?? err.statusCode ?? 500);
  return Number.isInteger(raw) && raw >= 400 && raw <= 599 ? raw : 500;
}

function trimmedStack(err: HttpErrorLike): string[] {
  return String(err.stack ?? "")
    .split("\n")
    .slice(0, 8);
}

export const errorHandler = (log: Logger = rootLogger): ErrorRequestHandler => {
  return (err: unknown, req, res, next) => {
    const e: HttpErrorLike =
      typeof err === "object" && err !== null ? err : { message: String(err) };
    const status = statusOf(e);

    if (res.headersSent) {
      log.warn(
        { rid: requestIdOf(req), url: req.originalUrl, status, message: e.message },
        "error after headers sent"
      );
      return next(err);
    }

    if (status >= 500) {
      log.error(
        {
          rid: requestIdOf(req),
          method: req.method,
          url: req.originalUrl,
          status,
          name: e.name,
          message: e.message,
          stack: trimmedStack(e),
        },
        "unhandled error"
      );
    }

    // body-parser marks client-safe messages with `expose`
    const detail =
      status < 500 && e.expose === true && typeof e.message === "string"
        ? e.message
        : titleFor(status);
    sendProblem(req, res, status, detail);
  };
};
