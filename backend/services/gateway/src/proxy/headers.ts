// backend/services/gateway/src/proxy/headers.ts
/**
 * Header shaping for the proxy hop.
 *
 * Outbound:
 * - RFC 7230 hop-by-hop headers and anything named in `Connection` are dropped.
 * - The client's `Authorization` is dropped unless the route opts in.
 * - Client-supplied `x-authenticated-*` are always dropped; the gateway adds
 *   its own when the route sets `forwardIdentity`.
 * - `x-forwarded-for/host/proto` and `x-request-id` are stamped.
 */

import type { IncomingHttpHeaders, OutgoingHttpHeaders } from "node:http";
import type { TokenClaims } from "../auth/TokenValidator";
import type { RouteEntry } from "../routing/RouteTable";

export const HOP_BY_HOP = new Set([
  "connection",
  "keep-alive",
  "proxy-authenticate",
  "proxy-authorization",
  "te",
  "trailer",
  "transfer-encoding",
  "upgrade",
  "host",
]);

export const IDENTITY_PREFIX = "x-authenticated-";
export const SUBJECT_HEADER = "x-authenticated-subject";
export const SCOPES_HEADER = "x-authenticated-scopes";

function firstValue(v: string | string[] | undefined): string | undefined {
  return Array.isArray(v) ? v[0] : v;
}

/** Header names listed in `Connection: a, b` are hop-by-hop for this message. */
export function connectionTokens(headers: IncomingHttpHeaders): Set<string> {
  const raw = headers.connection;
  const joined = Array.isArray(raw) ? raw.join(",") : raw ?? "";
  return new Set(
    joined
      .split(",")
      .map((t) => t.trim().toLowerCase())
      .filter(Boolean)
  );
}

export function mergeForwardedFor(
  existing: string | string[] | undefined,
  addr: string | undefined
): string {
  const xs = Array.isArray(existing) ? existing.join(", ") : existing ?? "";
  if (!addr) return xs;
  return xs ? `${xs}, ${addr}` : addr;
}

export type OutboundContext = {
  route: RouteEntry;
  requestId: string;
  clientIp?: string;
  protocol: string;
  claims?: TokenClaims;
  bodyLength?: number;
};

export function buildOutboundHeaders(
  incoming: IncomingHttpHeaders,
  ctx: OutboundContext
): OutgoingHttpHeaders {
  const drop = connectionTokens(incoming);
  const out: OutgoingHttpHeaders = {};

  for (const [name, value] of Object.entries(incoming)) {
    const k = name.toLowerCase();
    if (value === undefined) continue;
    if (HOP_BY_HOP.has(k) || drop.has(k)) continue;
    if (k.startsWith(IDENTITY_PREFIX)) continue;
    if (k === "authorization" && !ctx.route.forwardAuthorization) continue;
    if (k === "content-length") continue;
    out[k] = value;
  }

  if (ctx.bodyLength !== undefined) out["content-length"] = String(ctx.bodyLength);

  out["x-forwarded-for"] = mergeForwardedFor(incoming["x-forwarded-for"], ctx.clientIp);
  const host = firstValue(incoming["x-forwarded-host"]) ?? incoming.host;
  if (host) out["x-forwarded-host"] = host;
  out["x-forwarded-proto"] = ctx.protocol;
  out["x-request-id"] = ctx.requestId;

  if (ctx.route.forwardIdentity && ctx.claims) {
    out[SUBJECT_HEADER] = ctx.claims.subject;
    out[SCOPES_HEADER] = ctx.claims.scopes.join(" ");
  }
  return out;
}

/** Backend response headers minus hop-by-hop ones. */
export function filterResponseHeaders(incoming: IncomingHttpHeaders): OutgoingHttpHeaders {
  const drop = connectionTokens(incoming);
  const out: OutgoingHttpHeaders = {};
  for (const [name, value] of Object.entries(incoming)) {
    const k = name.toLowerCase();
    if (value === undefined || HOP_BY_HOP.has(k) || drop.has(k)) continue;
    out[k] = value;
  }
  return out;
}
