// backend/services/gateway/src/app.ts
/**
 * Gateway app assembly.
 *
 * Assembly:
 *   httpLogger (request id) → health (open) → metrics (open)
 *   → raw body (bounded) → pipeline → body errors → error
 *
 * Every stateful collaborator is built here from config and handed to the
 * pipeline; tests override the clock, logger and sinks.
 */

import express, { type Express } from "express";
import type { Logger } from "pino";
import type { AxiosInstance } from "axios";
import { makeHttpLogger } from "../../shared/src/middleware/httpLogger";
import { errorHandler } from "../../shared/src/middleware/problem";
import { logger as rootLogger } from "../../shared/src/utils/logger";
import { SystemClock, type Clock } from "./clock";
import { SERVICE_NAME, type GatewayConfig } from "./config";
import { TokenValidator } from "./auth/TokenValidator";
import { SlidingWindowLimiter } from "./ratelimit/SlidingWindowLimiter";
import { RouteTable } from "./routing/RouteTable";
import { ProxyForwarder } from "./proxy/ProxyForwarder";
import { CompositeSink, type ObservabilitySink } from "./observability/ObservabilitySink";
import { LogSink } from "./observability/LogSink";
import { MetricsSink } from "./observability/MetricsSink";
import { GatewayPipeline, createGatewayPipeline } from "./pipeline/GatewayPipeline";
import { buildGatewayHealthRouter } from "./routes/health.router";
import { buildMetricsRouter } from "./routes/metrics.router";

export type GatewayAppOverrides = {
  clock?: Clock;
  log?: Logger;
  /** Extra sinks after the log and metrics sinks. */
  sinks?: ObservabilitySink[];
  /** HTTP client for readiness probes. */
  http?: AxiosInstance;
  version?: string;
};

export type GatewayApp = {
  app: Express;
  limiter: SlidingWindowLimiter;
  routes: RouteTable;
  metrics: MetricsSink;
  pipeline: GatewayPipeline;
  clock: Clock;
};

export function createGatewayApp(
  cfg: GatewayConfig,
  overrides: GatewayAppOverrides = {}
): GatewayApp {
  const log = overrides.log ?? rootLogger;
  const clock = overrides.clock ?? new SystemClock();

  const validator = new TokenValidator(cfg.token);
  const limiter = new SlidingWindowLimiter(cfg.rateLimit);
  const routes = new RouteTable(cfg.routes, log);
  const forwarder = new ProxyForwarder(cfg.proxy, log);
  const metrics = new MetricsSink({
    limiter,
    collectDefault: cfg.metrics.collectDefault,
  });
  const sink = new CompositeSink(
    [new LogSink(log), metrics, ...(overrides.sinks ?? [])],
    log
  );

  const pipeline = createGatewayPipeline({
    validator,
    limiter,
    routes,
    forwarder,
    sink,
    clock,
    log,
  });

  const app = express();
  app.disable("x-powered-by");
  app.set("trust proxy", cfg.trustProxy);

  app.use(makeHttpLogger({ logger: log, serviceName: SERVICE_NAME }));

  app.use(
    buildGatewayHealthRouter({
      routes,
      deepPing: cfg.readiness.deepPing,
      timeoutMs: cfg.readiness.timeoutMs,
      env: cfg.nodeEnv,
      version: overrides.version,
      http: overrides.http,
    })
  );
  app.use(buildMetricsRouter(metrics));

  app.use(express.raw({ type: () => true, limit: cfg.proxy.maxBodyBytes }));
  app.use(pipeline.handler());

  app.use(pipeline.bodyErrorHandler());
  app.use(errorHandler(log));

  log.info(
    {
      routes: routes.list().map((r) => ({ name: r.name, prefix: r.prefix, target: r.target.origin })),
      algorithm: cfg.token.algorithm,
      rateLimit: cfg.rateLimit,
    },
    "gateway assembled"
  );

  return { app, limiter, routes, metrics, pipeline, clock };
}
