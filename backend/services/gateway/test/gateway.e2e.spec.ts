// backend/services/gateway/test/gateway.e2e.spec.ts
import request from "supertest";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { startBackend, type TestBackend } from "./helpers/backend";
import { buildTestGateway, route, testConfig, type TestGateway } from "./helpers/gateway";
import { mintAccessToken } from "../src/auth/mintToken";

describe("gateway pipeline (end to end)", () => {
  let backend: TestBackend;
  let gw: TestGateway;

  beforeEach(async () => {
    backend = await startBackend();
    gw = buildTestGateway(
      testConfig({
        routes: [route("/api/users", backend.url, { name: "users", forwardIdentity: true })],
      })
    );
  });

  afterEach(async () => {
    await backend.close();
  });

  it("relays an authenticated request and the backend reply unchanged", async () => {
    const res = await request(gw.app)
      .get("/api/users/42?verbose=1")
      .set("Authorization", gw.bearer("alice", { scopes: ["users:read"] }))
      .set("x-request-id", "rid-e2e-1");

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ method: "GET", url: "/42?verbose=1", subject: "alice", body: "" });
    expect(res.headers["x-request-id"]).toBe("rid-e2e-1");

    expect(backend.seen).toHaveLength(1);
    const seen = backend.seen[0].headers;
    expect(seen.authorization).toBeUndefined();
    expect(seen["x-request-id"]).toBe("rid-e2e-1");
    expect(seen["x-authenticated-scopes"]).toBe("users:read");

    expect(gw.recorder.observations).toHaveLength(1);
    expect(gw.recorder.last()).toMatchObject({
      requestId: "rid-e2e-1",
      method: "GET",
      path: "/api/users/42",
      identity: { kind: "subject", key: "sub:alice" },
      route: "users",
      stage: "Completed",
      outcome: "forwarded",
      status: 200,
      bytesIn: 0,
    });
  });

  it("forwards request bodies", async () => {
    const res = await request(gw.app)
      .post("/api/users")
      .set("Authorization", gw.bearer("alice"))
      .send({ name: "bob" });

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ method: "POST", url: "/", body: '{"name":"bob"}' });
    expect(backend.seen[0].headers["content-length"]).toBe("14");
    expect(gw.recorder.last()?.bytesIn).toBe(14);
  });

  it("rejects the (L+1)th request in a window with 429 and Retry-After", async () => {
    const auth = gw.bearer("alice");
    for (let i = 0; i < 5; i++) {
      const ok = await request(gw.app).get("/api/users/1").set("Authorization", auth);
      expect(ok.status).toBe(200);
    }

    const res = await request(gw.app)
      .get("/api/users/1")
      .set("Authorization", auth)
      .set("x-request-id", "rid-limited");

    expect(res.status).toBe(429);
    expect(res.headers["retry-after"]).toBe("60");
    expect(res.headers["content-type"]).toMatch(/^application\/problem\+json/);
    expect(res.body).toEqual({
      type: "about:blank",
      title: "Too Many Requests",
      status: 429,
      detail: "Too many requests",
      instance: "rid-limited",
    });
    expect(backend.seen).toHaveLength(5);
    expect(gw.recorder.last()).toMatchObject({
      outcome: "rate_limited",
      status: 429,
      stage: "TokenValidated",
      identity: { kind: "subject", key: "sub:alice" },
    });
    expect(gw.recorder.last()?.bytesOut).toBe(Number(res.headers["content-length"]));
    expect(gw.recorder.last()?.bytesOut).toBeGreaterThan(0);
  });

  it("throttles repeated failed authentication from one address", async () => {
    for (let i = 0; i < 5; i++) {
      const denied = await request(gw.app).get("/api/users/1");
      expect(denied.status).toBe(401);
    }

    const res = await request(gw.app).get("/api/users/1").set("x-request-id", "rid-auth-flood");

    expect(res.status).toBe(429);
    expect(res.headers["retry-after"]).toBe("60");
    expect(res.headers["www-authenticate"]).toBeUndefined();
    expect(res.body).toEqual({
      type: "about:blank",
      title: "Too Many Requests",
      status: 429,
      detail: "Too many requests",
      instance: "rid-auth-flood",
    });
    expect(backend.seen).toHaveLength(0);

    const obs = gw.recorder.last();
    expect(obs).toMatchObject({ outcome: "rate_limited", status: 429, stage: "Received" });
    expect(obs?.identity.kind).toBe("address");
    expect(obs?.reason).toMatch(/^MissingCredential: /);
    expect(obs?.bytesOut).toBe(Number(res.headers["content-length"]));

    const ok = await request(gw.app).get("/api/users/1").set("Authorization", gw.bearer("alice"));
    expect(ok.status).toBe(200);
  });

  it("admits again once the window has slid past", async () => {
    const auth = gw.bearer("alice");
    for (let i = 0; i < 5; i++) await request(gw.app).get("/api/users/1").set("Authorization", auth);
    expect((await request(gw.app).get("/api/users/1").set("Authorization", auth)).status).toBe(429);

    gw.clock.advance(60_000);
    expect((await request(gw.app).get("/api/users/1").set("Authorization", auth)).status).toBe(200);
  });

  it("limits clients independently", async () => {
    const alice = gw.bearer("alice");
    for (let i = 0; i < 6; i++) await request(gw.app).get("/api/users/1").set("Authorization", alice);

    const bob = await request(gw.app).get("/api/users/1").set("Authorization", gw.bearer("bob"));
    expect(bob.status).toBe(200);
    expect(bob.body.subject).toBe("bob");
  });

  it("rejects an expired token with 401 and charges the caller's address", async () => {
    const token = mintAccessToken({
      subject: "alice",
      secret: "test-secret",
      ttlSec: 60,
      nowMs: gw.clock.now(),
    });
    gw.clock.advance(61_000);

    const res = await request(gw.app).get("/api/users/1").set("Authorization", `Bearer ${token}`);

    expect(res.status).toBe(401);
    expect(res.headers["www-authenticate"]).toBe('Bearer realm="gateway", error="invalid_token"');
    expect(res.body).toMatchObject({ status: 401, detail: "Invalid or expired credentials" });
    expect(backend.seen).toHaveLength(0);

    const obs = gw.recorder.last();
    expect(obs).toMatchObject({ outcome: "expired", status: 401, stage: "Received" });
    expect(obs?.identity.kind).toBe("address");
    expect(obs?.reason).toMatch(/^Expired: /);
    const key = obs?.identity.key ?? "";
    expect(key.startsWith("addr:")).toBe(true);
    expect(gw.limiter.snapshot(key, gw.clock.now())?.inWindow).toBe(1);
  });

  it("asks for credentials when none are sent", async () => {
    const res = await request(gw.app).get("/api/users/1");
    expect(res.status).toBe(401);
    expect(res.headers["www-authenticate"]).toBe('Bearer realm="gateway"');
    expect(res.body.detail).toBe("Authentication required");
    expect(gw.recorder.last()?.outcome).toBe("missing_credential");
  });

  it("returns 404 for an unrouted path without calling any backend", async () => {
    const res = await request(gw.app).get("/nowhere/1").set("Authorization", gw.bearer("alice"));

    expect(res.status).toBe(404);
    expect(res.body).toMatchObject({ title: "Not Found", detail: "Route not found" });
    expect(backend.seen).toHaveLength(0);
    expect(backend.connections()).toBe(0);
    expect(gw.recorder.last()).toMatchObject({
      outcome: "no_route",
      stage: "RateLimitChecked",
      reason: "no route for /nowhere/1",
    });
    expect(gw.recorder.last()?.bytesOut).toBe(Number(res.headers["content-length"]));
  });

  it("records exactly one observation per request", async () => {
    await request(gw.app).get("/api/users/1").set("Authorization", gw.bearer("alice"));
    await request(gw.app).get("/api/users/1");
    await request(gw.app).get("/elsewhere").set("Authorization", gw.bearer("alice"));
    expect(gw.recorder.observations.map((o) => o.outcome)).toEqual([
      "forwarded",
      "missing_credential",
      "no_route",
    ]);
  });
});
