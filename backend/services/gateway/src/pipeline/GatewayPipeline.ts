// backend/services/gateway/src/pipeline/GatewayPipeline.ts
/**
 * Gateway request pipeline.
 *
 * Flow:
 *   Received → authenticate → rate limit → resolve route → forward → Completed
 *
 * Purpose:
 * - Run the ordered stages; the first `reject` ends the request with a
 *   problem+json response.
 * - Forward accepted requests and map transport failures to 502/504.
 *
 * Invariants:
 * - Exactly one observation per request, on every path, unexpected errors
 *   included (500 `internal_error`).
 * - Client bodies carry a generic `detail`; the internal reason is only
 *   in the observation.
 * - Every collaborator is injected; the pipeline holds no module state.
 */

import type {
  ErrorRequestHandler,
  NextFunction,
  Request,
  RequestHandler,
  Response,
} from "express";
import type { Logger } from "pino";
import type { Clock } from "../clock";
import type { TokenValidator } from "../auth/TokenValidator";
import type { SlidingWindowLimiter } from "../ratelimit/SlidingWindowLimiter";
import type { RouteTable } from "../routing/RouteTable";
import type { ProxyForwarder, ForwardResult } from "../proxy/ProxyForwarder";
import type { ObservabilitySink } from "../observability/ObservabilitySink";
import { requestIdOf, sendProblem } from "../../../shared/src/middleware/problem";
import { createAuthenticateStage } from "./stages/authenticate.stage";
import { createRateLimitStage, rateLimitRejection } from "./stages/rateLimit.stage";
import { createResolveRouteStage } from "./stages/resolveRoute.stage";
import {
  addressIdentity,
  type RequestContext,
  type RequestOutcome,
  type Stage,
} from "./types";

export type GatewayPipelineDeps = {
  validator: TokenValidator;
  limiter: SlidingWindowLimiter;
  routes: RouteTable;
  forwarder: ProxyForwarder;
  sink: ObservabilitySink;
  clock: Clock;
  log: Logger;
};

type Completion = {
  status: number;
  outcome: RequestOutcome;
  bytesOut: number;
  reason?: string;
};

export function defaultStages(deps: GatewayPipelineDeps): Stage[] {
  return [
    createAuthenticateStage(deps),
    createRateLimitStage(deps),
    createResolveRouteStage(deps.routes),
  ];
}

function searchOf(originalUrl: string): string {
  const q = originalUrl.indexOf("?");
  return q === -1 ? "" : originalUrl.slice(q);
}

function clientErrorStatus(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null || !("status" in err)) return undefined;
  const { status } = err;
  return typeof status === "number" && status >= 400 && status < 500 ? status : undefined;
}

/** raw-body's error when the client goes away before the body is complete. */
function isClientAbort(err: unknown): boolean {
  if (typeof err !== "object" || err === null) return false;
  const type = "type" in err ? err.type : undefined;
  const code = "code" in err ? err.code : undefined;
  return type === "request.aborted" || code === "ECONNABORTED";
}

/** Body length of a response the gateway wrote itself. */
function sentBytes(res: Response): number {
  const len = Number(res.getHeader("content-length"));
  return Number.isFinite(len) && len > 0 ? len : 0;
}

function bodyOf(req: Request): Buffer | undefined {
  return Buffer.isBuffer(req.body) ? req.body : undefined;
}

export class GatewayPipeline {
  private readonly stages: readonly Stage[];

  constructor(
    private readonly deps: GatewayPipelineDeps,
    stages?: readonly Stage[]
  ) {
    this.stages = stages ?? defaultStages(deps);
  }

  handler(): RequestHandler {
    return (req: Request, res: Response, next: NextFunction) => {
      this.handle(req, res).catch(next);
    };
  }

  /**
   * Body-parser failures stop before the stages run; they still get their one
   * observation. A client that hangs up mid-body is `client_disconnected`;
   * 413/400 answer with problem+json and are charged to the caller's address
   * window like a failed authentication.
   */
  bodyErrorHandler(): ErrorRequestHandler {
    return (err: unknown, req: Request, res: Response, next: NextFunction) => {
      const status = clientErrorStatus(err);
      if (status === undefined || res.headersSent) return next(err);
      const ctx = this.newContext(req);
      const reason = err instanceof Error ? err.message : String(err);

      if (isClientAbort(err)) {
        this.observe(ctx, 0, { status: 499, outcome: "client_disconnected", bytesOut: 0, reason });
        return;
      }

      const charged = this.deps.limiter.check(ctx.identity.key, this.deps.clock.now());
      if (!charged.allowed) {
        const out = rateLimitRejection(this.deps.limiter, charged.retryAfterMs, reason);
        sendProblem(req, res, out.status, out.detail, out.headers);
        this.observe(ctx, 0, {
          status: out.status,
          outcome: out.outcome,
          bytesOut: sentBytes(res),
          reason: out.reason,
        });
        return;
      }

      sendProblem(
        req,
        res,
        status,
        status === 413 ? "Request body too large" : "Malformed request body"
      );
      this.observe(ctx, 0, {
        status,
        outcome: "invalid_request",
        bytesOut: sentBytes(res),
        reason,
      });
    };
  }

  private newContext(req: Request): RequestContext {
    const clientIp = req.ip ?? req.socket.remoteAddress ?? "unknown";
    return {
      requestId: requestIdOf(req) ?? "",
      method: req.method,
      path: req.path,
      search: searchOf(req.originalUrl),
      headers: req.headers,
      clientIp,
      receivedAt: this.deps.clock.now(),
      state: "Received",
      identity: addressIdentity(clientIp),
    };
  }

  private observe(ctx: RequestContext, bytesIn: number, c: Completion): void {
    if (c.outcome === "forwarded") ctx.state = "Completed";
    this.deps.sink.record(
      Object.freeze({
        requestId: ctx.requestId,
        timestamp: new Date(ctx.receivedAt).toISOString(),
        method: ctx.method,
        path: ctx.path,
        identity: ctx.identity,
        route: ctx.route?.name,
        stage: ctx.state,
        outcome: c.outcome,
        status: c.status,
        latencyMs: Math.max(0, this.deps.clock.now() - ctx.receivedAt),
        bytesIn,
        bytesOut: c.bytesOut,
        reason: c.reason,
      })
    );
  }

  async handle(req: Request, res: Response): Promise<void> {
    const ctx = this.newContext(req);
    const body = bodyOf(req);

    let recorded = false;
    const complete = (c: Completion) => {
      if (recorded) return;
      recorded = true;
      this.observe(ctx, body?.length ?? 0, c);
    };

    try {
      for (const stage of this.stages) {
        const out = stage.evaluate(ctx);
        if (out.kind === "reject") {
          sendProblem(req, res, out.status, out.detail, out.headers);
          complete({
            status: out.status,
            outcome: out.outcome,
            bytesOut: sentBytes(res),
            reason: out.reason,
          });
          return;
        }
        ctx.state = stage.reaches;
      }

      const { route, forwardPath } = ctx;
      if (!route || forwardPath === undefined) {
        throw new Error("pipeline finished without a resolved route");
      }

      const result = await this.deps.forwarder.forward(
        {
          method: ctx.method,
          forwardPath,
          search: ctx.search,
          headers: ctx.headers,
          body,
          requestId: ctx.requestId,
          clientIp: ctx.clientIp,
          protocol: req.protocol,
          claims: ctx.claims,
        },
        route,
        res
      );
      ctx.state = "Forwarded";
      complete(this.settle(req, res, result));
    } catch (err) {
      this.deps.log.error(
        {
          rid: ctx.requestId,
          stage: ctx.state,
          err: err instanceof Error ? err.message : String(err),
          stack: err instanceof Error ? err.stack?.split("\n").slice(0, 8) : undefined,
        },
        "pipeline failure"
      );
      let bytesOut = 0;
      if (!res.headersSent) {
        sendProblem(req, res, 500, "Internal Server Error");
        bytesOut = sentBytes(res);
      } else if (!res.writableEnded) res.end();
      complete({
        status: 500,
        outcome: "internal_error",
        bytesOut,
        reason: err instanceof Error ? err.message : String(err),
      });
    }
  }

  /** Turn a forward result into the client response (when still needed) and its completion. */
  private settle(req: Request, res: Response, result: ForwardResult): Completion {
    switch (result.kind) {
      case "relayed":
        return { status: result.status, outcome: "forwarded", bytesOut: result.bytesOut };
      case "client_disconnected":
        return { status: 499, outcome: "client_disconnected", bytesOut: 0, reason: "client closed the connection" };
      case "failed": {
        const status = result.error === "BackendTimeout" ? 504 : 502;
        const outcome: RequestOutcome =
          result.error === "BackendTimeout" ? "backend_timeout" : "backend_unreachable";
        if (result.headersSent) {
          if (!res.writableEnded) res.end();
          return { status: res.statusCode, outcome, bytesOut: 0, reason: result.detail };
        }
        sendProblem(
          req,
          res,
          status,
          status === 504 ? "Upstream service timed out" : "Upstream service unavailable"
        );
        return { status, outcome, bytesOut: sentBytes(res), reason: result.detail };
      }
    }
  }
}

export function createGatewayPipeline(
  deps: GatewayPipelineDeps,
  stages?: readonly Stage[]
): GatewayPipeline {
  return new GatewayPipeline(deps, stages);
}
