// backend/services/gateway/test/observability.spec.ts
import request from "supertest";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { silentLogger } from "../../shared/src/utils/logger";
import { CompositeSink, type ObservabilitySink } from "../src/observability/ObservabilitySink";
import { LogSink } from "../src/observability/LogSink";
import { MetricsSink } from "../src/observability/MetricsSink";
import type { RequestObservation } from "../src/pipeline/types";
import { startBackend, type TestBackend } from "./helpers/backend";
import { RecordingSink, buildTestGateway, route, testConfig } from "./helpers/gateway";

function observation(overrides: Partial<RequestObservation> = {}): RequestObservation {
  const o: RequestObservation = {
    requestId: "rid-1",
    timestamp: "2023-11-14T22:13:20.000Z",
    method: "GET",
    path: "/api/users/1",
    identity: { kind: "subject", key: "sub:alice" },
    route: "users",
    stage: "Completed",
    outcome: "forwarded",
    status: 200,
    latencyMs: 12,
    bytesIn: 0,
    bytesOut: 42,
    ...overrides,
  };
  return Object.freeze(o);
}

class ThrowingSink implements ObservabilitySink {
  readonly name = "broken";
  calls = 0;

  record(): void {
    this.calls += 1;
    throw new Error("sink offline");
  }
}

describe("CompositeSink", () => {
  it("keeps fanning out when a sink throws and reports it once", () => {
    const log = silentLogger();
    const error = vi.spyOn(log, "error");
    const broken = new ThrowingSink();
    const recorder = new RecordingSink();
    const sink = new CompositeSink([broken, recorder], log);

    sink.record(observation());
    sink.record(observation({ requestId: "rid-2" }));

    expect(broken.calls).toBe(2);
    expect(recorder.observations.map((o) => o.requestId)).toEqual(["rid-1", "rid-2"]);
    expect(error).toHaveBeenCalledTimes(1);
  });
});

describe("LogSink", () => {
  it("logs by status class", () => {
    const log = silentLogger();
    const info = vi.spyOn(log, "info");
    const warn = vi.spyOn(log, "warn");
    const error = vi.spyOn(log, "error");
    const sink = new LogSink(log);

    sink.record(observation());
    sink.record(observation({ status: 429, outcome: "rate_limited", reason: "limit" }));
    sink.record(observation({ status: 504, outcome: "backend_timeout" }));

    expect(info).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(error).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(
      expect.objectContaining({ identity: "sub:alice", outcome: "rate_limited", reason: "limit" }),
      "GET /api/users/1 -> 429 (rate_limited)"
    );
  });
});

describe("MetricsSink", () => {
  it("counts requests, failures and bytes", async () => {
    const metrics = new MetricsSink({ limiter: { size: () => 3 } });
    metrics.record(observation());
    metrics.record(observation({ outcome: "rate_limited", status: 429, bytesOut: 0 }));
    metrics.record(
      observation({
        outcome: "expired",
        status: 401,
        bytesOut: 0,
        identity: { kind: "address", key: "addr:10.0.0.1" },
      })
    );

    expect(await metrics.summary()).toEqual({
      totalRequests: 3,
      byOutcome: { forwarded: 1, rate_limited: 1, expired: 1 },
      byStatus: { "200": 1, "429": 1, "401": 1 },
      rateLimitRejections: 1,
      authFailures: 1,
      activeRateLimitKeys: 3,
    });

    const text = await metrics.exposition();
    expect(text).toContain(
      'gateway_requests_total{method="GET",route="users",outcome="forwarded",status="200"} 1'
    );
    expect(text).toContain('gateway_rate_limit_rejections_total{identity_kind="subject"} 1');
    expect(text).toContain('gateway_auth_failures_total{reason="expired"} 1');
    expect(text).toContain("gateway_bytes_out_total 42");
    expect(text).toContain("gateway_rate_limit_active_keys 3");
  });

  it("keeps registries apart between instances", async () => {
    const a = new MetricsSink();
    const b = new MetricsSink();
    a.record(observation());
    expect((await a.summary()).totalRequests).toBe(1);
    expect((await b.summary()).totalRequests).toBe(0);
  });
});

describe("metrics endpoints", () => {
  let backend: TestBackend;

  beforeEach(async () => {
    backend = await startBackend();
  });

  afterEach(async () => {
    await backend.close();
  });

  it("exposes Prometheus text and a JSON summary", async () => {
    const gw = buildTestGateway(
      testConfig({ routes: [route("/api/users", backend.url, { name: "users" })] })
    );
    await request(gw.app).get("/api/users/1").set("Authorization", gw.bearer("alice"));

    const prom = await request(gw.app).get("/metrics");
    expect(prom.status).toBe(200);
    expect(prom.headers["content-type"]).toMatch(/^text\/plain/);
    expect(prom.text).toContain(
      'gateway_requests_total{method="GET",route="users",outcome="forwarded",status="200"} 1'
    );
    expect(prom.text).toContain("gateway_rate_limit_active_keys 1");

    const summary = await request(gw.app).get("/metrics/summary");
    expect(summary.body).toEqual({
      totalRequests: 1,
      byOutcome: { forwarded: 1 },
      byStatus: { "200": 1 },
      rateLimitRejections: 0,
      authFailures: 0,
      activeRateLimitKeys: 1,
    });
  });

  it("a failing sink never reaches the client", async () => {
    const broken = new ThrowingSink();
    const gw = buildTestGateway(
      testConfig({ routes: [route("/api/users", backend.url)] }),
      [broken]
    );

    const first = await request(gw.app).get("/api/users/1").set("Authorization", gw.bearer("alice"));
    const second = await request(gw.app).get("/api/users/2").set("Authorization", gw.bearer("alice"));

    expect([first.status, second.status]).toEqual([200, 200]);
    expect(broken.calls).toBe(2);
    expect(gw.recorder.observations).toHaveLength(2);
  });
});
