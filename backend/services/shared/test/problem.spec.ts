// backend/services/shared/test/problem.spec.ts
import express from "express";
import request from "supertest";
import { describe, it, expect, vi } from "vitest";
import { makeHttpLogger } from "../src/middleware/httpLogger";
import {
  buildProblem,
  errorHandler,
  notFoundHandler,
  titleFor,
} from "../src/middleware/problem";
import { silentLogger } from "../src/utils/logger";

function buildApp(log = silentLogger()): express.Express {
  const app = express();
  app.use(makeHttpLogger({ logger: log, serviceName: "svc-test" }));
  app.get("/boom", () => {
    throw new Error("db password rejected");
  });
  app.get("/bad", () => {
    throw Object.assign(new Error("Unexpected token } in JSON"), { status: 400, expose: true });
  });
  app.get("/hidden", () => {
    throw Object.assign(new Error("internal detail"), { statusCode: 404 });
  });
  app.use(notFoundHandler());
  app.use(errorHandler(log));
  return app;
}

describe("problem+json", () => {
  it("titles known statuses and falls back by class", () => {
    expect(titleFor(429)).toBe("Too Many Requests");
    expect(titleFor(599)).toBe("Internal Server Error");
    expect(titleFor(418)).toBe("Error");
  });

  it("omits instance when there is no request id", () => {
    expect(buildProblem(404, "Route not found")).toEqual({
      type: "about:blank",
      title: "Not Found",
      status: 404,
      detail: "Route not found",
    });
  });

  it("answers unknown paths with 404", async () => {
    const res = await request(buildApp()).get("/missing").set("x-request-id", "rid-404");
    expect(res.status).toBe(404);
    expect(res.headers["content-type"]).toMatch(/^application\/problem\+json/);
    expect(res.body).toEqual({
      type: "about:blank",
      title: "Not Found",
      status: 404,
      detail: "Route not found",
      instance: "rid-404",
    });
  });

  it("hides 5xx internals from the client and logs them", async () => {
    const log = silentLogger();
    const error = vi.spyOn(log, "error");
    const res = await request(buildApp(log)).get("/boom").set("x-request-id", "rid-500");

    expect(res.status).toBe(500);
    expect(res.body).toEqual({
      type: "about:blank",
      title: "Internal Server Error",
      status: 500,
      detail: "Internal Server Error",
      instance: "rid-500",
    });
    expect(error).toHaveBeenCalledWith(
      expect.objectContaining({ rid: "rid-500", status: 500, message: "db password rejected" }),
      "unhandled error"
    );
  });

  it("passes through exposed client error messages only", async () => {
    const app = buildApp();
    const bad = await request(app).get("/bad");
    expect(bad.status).toBe(400);
    expect(bad.body.detail).toBe("Unexpected token } in JSON");

    const hidden = await request(app).get("/hidden");
    expect(hidden.status).toBe(404);
    expect(hidden.body.detail).toBe("Not Found");
  });
});
