// backend/services/gateway/src/proxy/ProxyForwarder.ts
/**
 * Forwards one accepted request to its backend and streams the reply back.
 *
 * Purpose:
 * - Single outbound call per request, plus at most one retry when the
 *   connection itself failed before any response byte arrived.
 * - Backend 4xx/5xx are relayed verbatim; only transport failures become
 *   gateway errors (504 timeout, 502 unreachable).
 *
 * Invariants:
 * - One deadline per forward (route `timeoutMs` or the proxy default) covers
 *   every attempt and the backoff between them.
 * - A client that goes away aborts the backend call.
 * - Never writes a second status line: once headers are out, a failure only
 *   ends the response.
 */

import http, { type IncomingMessage, type ServerResponse } from "node:http";
import https from "node:https";
import type { Logger } from "pino";
import type { ProxyConfig } from "../config";
import type { TokenClaims } from "../auth/TokenValidator";
import type { RouteEntry } from "../routing/RouteTable";
import { buildOutboundHeaders, filterResponseHeaders } from "./headers";

export type BackendFailure = "BackendTimeout" | "BackendUnreachable";

export type ForwardResult =
  | { kind: "relayed"; status: number; bytesOut: number }
  | { kind: "failed"; error: BackendFailure; detail: string; headersSent: boolean }
  | { kind: "client_disconnected" };

export type ForwardRequest = {
  method: string;
  /** Path after prefix stripping, always starting with "/". */
  forwardPath: string;
  /** Raw query string including the leading "?", or "". */
  search: string;
  headers: http.IncomingHttpHeaders;
  body?: Buffer;
  requestId: string;
  clientIp?: string;
  protocol: string;
  claims?: TokenClaims;
};

const RETRYABLE_CODES = new Set([
  "ECONNREFUSED",
  "ENOTFOUND",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "EAI_AGAIN",
]);
const IDEMPOTENT = new Set(["GET", "HEAD", "OPTIONS", "PUT", "DELETE", "TRACE"]);

export function isRetryable(code: string | undefined, method: string): boolean {
  if (!code) return false;
  if (RETRYABLE_CODES.has(code)) return true;
  return code === "ECONNRESET" && IDEMPOTENT.has(method.toUpperCase());
}

type Attempt =
  | { kind: "relayed"; status: number; bytesOut: number }
  | { kind: "error"; code?: string; message: string; headersSent: boolean };

function errnoCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err) {
    const { code } = err;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function delay(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted || ms <= 0) return resolve();
    const done = () => {
      clearTimeout(t);
      signal.removeEventListener("abort", done);
      resolve();
    };
    const t = setTimeout(done, ms);
    signal.addEventListener("abort", done, { once: true });
  });
}

export class ProxyForwarder {
  constructor(
    private readonly cfg: ProxyConfig,
    private readonly log: Logger
  ) {}

  async forward(
    req: ForwardRequest,
    route: RouteEntry,
    res: ServerResponse
  ): Promise<ForwardResult> {
    const timeoutMs = route.timeoutMs ?? this.cfg.timeoutMs;
    const ac = new AbortController();
    let abortedBy: "timeout" | "client" | undefined;

    const timer = setTimeout(() => {
      abortedBy ??= "timeout";
      ac.abort();
    }, timeoutMs);
    const onClientClose = () => {
      if (res.writableFinished) return;
      abortedBy ??= "client";
      ac.abort();
    };
    res.on("close", onClientClose);

    try {
      let attempt = await this.attempt(req, route, res, ac.signal);
      if (
        attempt.kind === "error" &&
        !attempt.headersSent &&
        !ac.signal.aborted &&
        isRetryable(attempt.code, req.method)
      ) {
        this.log.warn(
          { rid: req.requestId, route: route.name, code: attempt.code },
          "backend connect failed; retrying once"
        );
        await delay(this.cfg.retryBackoffMs, ac.signal);
        if (!ac.signal.aborted) attempt = await this.attempt(req, route, res, ac.signal);
      }

      if (attempt.kind === "relayed") return attempt;
      if (abortedBy === "client") return { kind: "client_disconnected" };
      if (abortedBy === "timeout") {
        return {
          kind: "failed",
          error: "BackendTimeout",
          detail: `no complete response within ${timeoutMs}ms`,
          headersSent: attempt.headersSent,
        };
      }
      return {
        kind: "failed",
        error: "BackendUnreachable",
        detail: attempt.code ? `${attempt.code}: ${attempt.message}` : attempt.message,
        headersSent: attempt.headersSent,
      };
    } finally {
      clearTimeout(timer);
      res.off("close", onClientClose);
    }
  }

  private attempt(
    req: ForwardRequest,
    route: RouteEntry,
    res: ServerResponse,
    signal: AbortSignal
  ): Promise<Attempt> {
    return new Promise<Attempt>((resolve) => {
      if (signal.aborted) {
        resolve({ kind: "error", message: "aborted", headersSent: false });
        return;
      }

      // Joined as text: a URL setter would re-normalize the client's suffix.
      const url = route.target;
      const base = url.pathname.replace(/\/+$/, "");
      const path = `${base}${req.forwardPath}${req.search}`;

      const headers = buildOutboundHeaders(req.headers, {
        route,
        requestId: req.requestId,
        clientIp: req.clientIp,
        protocol: req.protocol,
        claims: req.claims,
        bodyLength: req.body?.length,
      });

      let headersSent = false;
      let settled = false;
      const settle = (a: Attempt) => {
        if (settled) return;
        settled = true;
        resolve(a);
      };
      const failed = (err: unknown) =>
        settle({ kind: "error", code: errnoCode(err), message: messageOf(err), headersSent });

      this.log.debug(
        { rid: req.requestId, route: route.name, method: req.method, target: url.origin },
        "proxy enter"
      );

      const onResponse = (upstreamRes: IncomingMessage) => {
        const status = upstreamRes.statusCode ?? 502;
        let bytesOut = 0;
        res.writeHead(status, filterResponseHeaders(upstreamRes.headers));
        headersSent = true;

        const cutShort = (err: unknown) => {
          failed(err);
          if (!res.writableEnded) res.end();
        };
        upstreamRes.on("data", (chunk: Buffer) => {
          bytesOut += chunk.length;
        });
        upstreamRes.on("error", cutShort);
        upstreamRes.on("close", () => {
          if (!upstreamRes.complete) cutShort(new Error("backend closed the response early"));
        });
        upstreamRes.on("end", () => {
          this.log.debug({ rid: req.requestId, route: route.name, status }, "proxy exit");
          settle({ kind: "relayed", status, bytesOut });
        });
        upstreamRes.pipe(res);
      };

      const options: http.RequestOptions = {
        protocol: url.protocol,
        hostname: url.hostname,
        port: url.port || (url.protocol === "https:" ? 443 : 80),
        method: req.method,
        path,
        headers,
        signal,
      };
      const upstream =
        url.protocol === "https:"
          ? https.request(options, onResponse)
          : http.request(options, onResponse);

      upstream.on("error", failed);
      upstream.end(req.body);
    });
  }
}
