// backend/services/gateway/src/routes/health.router.ts
import type express from "express";
import axios, { type AxiosInstance } from "axios";
import {
  createHealthRouter,
  type ReadinessDetails,
  type ReadinessFn,
} from "../../../shared/src/health";
import type { RouteTable } from "../routing/RouteTable";
import { SERVICE_NAME } from "../config";

export type BackendHealth = {
  route: string;
  url: string;
  status: "ok" | "unhealthy" | "unreachable";
  httpStatus?: number;
  error?: string;
};

export type HealthRouterOptions = {
  routes: RouteTable;
  deepPing: boolean;
  timeoutMs: number;
  env?: string;
  version?: string;
  http?: AxiosInstance;
};

function healthUrl(target: URL): string {
  return `${target.origin}${target.pathname.replace(/\/+$/, "")}/health`;
}

/** Probe one backend; readiness itself never fails on a bad backend. */
async function probe(
  http: AxiosInstance,
  route: string,
  url: string,
  timeoutMs: number
): Promise<BackendHealth> {
  try {
    const r = await http.get(url, { timeout: timeoutMs, validateStatus: () => true });
    return {
      route,
      url,
      status: r.status >= 200 && r.status < 300 ? "ok" : "unhealthy",
      httpStatus: r.status,
    };
  } catch (err) {
    const code = axios.isAxiosError(err) ? err.code : undefined;
    return {
      route,
      url,
      status: "unreachable",
      error: code ?? (err instanceof Error ? err.message : String(err)),
    };
  }
}

// Shallow by default: report the route table. READINESS_DEEP_PING=true probes
// each route's backend `/health` with a short timeout.
export function buildReadiness(opts: HealthRouterOptions): ReadinessFn {
  const http = opts.http ?? axios.create();
  return async (_req: express.Request): Promise<ReadinessDetails> => {
    const routes = opts.routes.list().map((r) => ({
      name: r.name,
      prefix: r.prefix,
      target: r.target.origin,
    }));
    if (!opts.deepPing) return { routes, deepPing: false };

    const backends = await Promise.all(
      opts.routes
        .list()
        .map((r) => probe(http, r.name, healthUrl(r.target), opts.timeoutMs))
    );
    return {
      routes,
      deepPing: true,
      backends,
      allBackendsHealthy: backends.every((b) => b.status === "ok"),
    };
  };
}

export function buildGatewayHealthRouter(opts: HealthRouterOptions): express.Router {
  return createHealthRouter({
    service: SERVICE_NAME,
    env: opts.env,
    version: opts.version,
    readiness: buildReadiness(opts),
  });
}
