// backend/services/gateway/src/routes/metrics.router.ts
import express from "express";
import type { MetricsSink } from "../observability/MetricsSink";

/**
 * GET /metrics          Prometheus text exposition
 * GET /metrics/summary  JSON roll-up for humans
 */
export function buildMetricsRouter(metrics: MetricsSink): express.Router {
  const router = express.Router();

  router.get("/metrics", (_req, res, next) => {
    metrics
      .exposition()
      .then((body) => {
        res.setHeader("Content-Type", metrics.contentType);
        res.send(body);
      })
      .catch(next);
  });

  router.get("/metrics/summary", (_req, res, next) => {
    metrics
      .summary()
      .then((summary) => res.json(summary))
      .catch(next);
  });

  return router;
}
