// backend/services/shared/src/health.ts
import express from "express";
import { requestIdOf } from "./middleware/problem";

export type ReadinessDetails = Record<string, unknown>;
export type ReadinessFn = (
  req: express.Request
) => Promise<ReadinessDetails> | ReadinessDetails;

type Options = {
  service: string;
  env?: string;
  version?: string;
  readiness?: ReadinessFn;
};

/**
 * Exposes:
 *   GET /health         -> liveness
 *   GET /health/live    -> explicit liveness
 *   GET /health/ready   -> explicit readiness
 *   GET /healthz        -> k8s-style liveness
 *   GET /readyz         -> k8s-style readiness
 */
export function createHealthRouter(opts: Options): express.Router {
  const router = express.Router();
  const startedAt = Date.now();

  const base = {
    service: opts.service,
    env: opts.env ?? process.env.NODE_ENV,
    version: opts.version,
  };

  const liveness = (req: express.Request, res: express.Response) => {
    res.json({
      ...base,
      ok: true,
      status: "alive",
      uptimeMs: Date.now() - startedAt,
      instance: requestIdOf(req),
    });
  };

  const readiness = async (req: express.Request, res: express.Response) => {
    try {
      const details = opts.readiness ? await opts.readiness(req) : {};
      res.json({ ...base, ok: true, instance: requestIdOf(req), ...details });
    } catch (err) {
      res.status(503).json({
        ...base,
        ok: false,
        instance: requestIdOf(req),
        error: err instanceof Error ? err.message : String(err),
      });
    }
  };

  router.get("/health", liveness);
  router.get("/health/live", liveness);
  router.get("/health/ready", readiness);
  router.get("/healthz", liveness);
  router.get("/readyz", readiness);

  return router;
}
