// backend/services/gateway/src/observability/MetricsSink.ts
/**
 * Prometheus metrics via prom-client.
 *
 * Each sink owns its own `Registry`, so two gateway apps in one process
 * (tests) never share counters.
 */

import {
  Counter,
  Gauge,
  Histogram,
  Registry,
  collectDefaultMetrics,
} from "prom-client";
import type { RequestObservation, RequestOutcome } from "../pipeline/types";
import type { ObservabilitySink } from "./ObservabilitySink";

export const DURATION_BUCKETS = [
  0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30,
];

const AUTH_FAILURES: ReadonlySet<RequestOutcome> = new Set<RequestOutcome>([
  "missing_credential",
  "malformed_credential",
  "invalid_signature",
  "expired",
  "not_yet_valid",
  "invalid_claims",
]);

export type MetricsSinkOptions = {
  /** Source for the active-keys gauge. */
  limiter?: { size(): number };
  collectDefault?: boolean;
  registry?: Registry;
};

export type MetricsSummary = {
  totalRequests: number;
  byOutcome: Partial<Record<string, number>>;
  byStatus: Partial<Record<string, number>>;
  rateLimitRejections: number;
  authFailures: number;
  activeRateLimitKeys: number;
};

export class MetricsSink implements ObservabilitySink {
  readonly name = "metrics";
  readonly registry: Registry;

  private readonly requests: Counter<"method" | "route" | "outcome" | "status">;
  private readonly duration: Histogram<"route" | "outcome">;
  private readonly rateLimited: Counter<"identity_kind">;
  private readonly authFailures: Counter<"reason">;
  private readonly bytesIn: Counter;
  private readonly bytesOut: Counter;
  private readonly activeKeys: Gauge;

  constructor(opts: MetricsSinkOptions = {}) {
    this.registry = opts.registry ?? new Registry();
    const registers = [this.registry];
    const limiter = opts.limiter;

    this.requests = new Counter({
      name: "gateway_requests_total",
      help: "Requests handled by the gateway",
      labelNames: ["method", "route", "outcome", "status"] as const,
      registers,
    });
    this.duration = new Histogram({
      name: "gateway_request_duration_seconds",
      help: "End-to-end request latency in seconds",
      labelNames: ["route", "outcome"] as const,
      buckets: DURATION_BUCKETS,
      registers,
    });
    this.rateLimited = new Counter({
      name: "gateway_rate_limit_rejections_total",
      help: "Requests rejected by the rate limiter",
      labelNames: ["identity_kind"] as const,
      registers,
    });
    this.authFailures = new Counter({
      name: "gateway_auth_failures_total",
      help: "Requests rejected by token validation",
      labelNames: ["reason"] as const,
      registers,
    });
    this.bytesIn = new Counter({
      name: "gateway_bytes_in_total",
      help: "Request body bytes received from clients",
      registers,
    });
    this.bytesOut = new Counter({
      name: "gateway_bytes_out_total",
      help: "Response body bytes relayed from backends",
      registers,
    });
    this.activeKeys = new Gauge({
      name: "gateway_rate_limit_active_keys",
      help: "Identities currently tracked by the rate limiter",
      registers,
      collect() {
        this.set(limiter ? limiter.size() : 0);
      },
    });

    if (opts.collectDefault) collectDefaultMetrics({ register: this.registry });
  }

  record(o: RequestObservation): void {
    const route = o.route ?? "none";
    this.requests.inc({
      method: o.method,
      route,
      outcome: o.outcome,
      status: String(o.status),
    });
    this.duration.observe({ route, outcome: o.outcome }, o.latencyMs / 1000);
    if (o.outcome === "rate_limited") {
      this.rateLimited.inc({ identity_kind: o.identity.kind });
    }
    if (AUTH_FAILURES.has(o.outcome)) this.authFailures.inc({ reason: o.outcome });
    if (o.bytesIn > 0) this.bytesIn.inc(o.bytesIn);
    if (o.bytesOut > 0) this.bytesOut.inc(o.bytesOut);
  }

  get contentType(): string {
    return this.registry.contentType;
  }

  exposition(): Promise<string> {
    return this.registry.metrics();
  }

  async summary(): Promise<MetricsSummary> {
    const [requests, rateLimited, authFailures, activeKeys] = await Promise.all([
      this.requests.get(),
      this.rateLimited.get(),
      this.authFailures.get(),
      this.activeKeys.get(),
    ]);

    const byOutcome: Record<string, number> = {};
    const byStatus: Record<string, number> = {};
    let total = 0;
    for (const { value, labels } of requests.values) {
      total += value;
      const outcome = String(labels.outcome ?? "unknown");
      const status = String(labels.status ?? "unknown");
      byOutcome[outcome] = (byOutcome[outcome] ?? 0) + value;
      byStatus[status] = (byStatus[status] ?? 0) + value;
    }
    const sum = (vals: { value: number }[]) => vals.reduce((n, v) => n + v.value, 0);

    return {
      totalRequests: total,
      byOutcome,
      byStatus,
      rateLimitRejections: sum(rateLimited.values),
      authFailures: sum(authFailures.values),
      activeRateLimitKeys: sum(activeKeys.values),
    };
  }
}
