// backend/services/gateway/src/routing/RouteTable.ts
/**
 * Static prefix → backend routing.
 *
 * - Matches on path-segment boundaries (`/api/users` ≠ `/api/usersx`).
 * - Longest prefix wins; equal prefixes resolve to the first in table order.
 * - Built once from validated config; lookups are pure.
 * - Paths carrying `.` or `..` segments (raw, percent-encoded or behind a
 *   backslash) never resolve: the backend must see exactly the suffix the
 *   client sent, under the route's base path.
 */

import type { Logger } from "pino";
import type { RouteSpec } from "../config";

export type RouteEntry = Readonly<{
  name: string;
  prefix: string;
  target: URL;
  timeoutMs?: number;
  forwardIdentity: boolean;
  forwardAuthorization: boolean;
}>;

export type RouteResolution =
  | { ok: true; route: RouteEntry; forwardPath: string }
  | { ok: false; error: "NoRouteMatch" | "InvalidPath" };

/** "/api/users/" → "/api/users"; "/" stays "/". */
export function normalizePrefix(prefix: string): string {
  const p = prefix.replace(/\/+$/, "");
  return p === "" ? "/" : p;
}

function decodeOrKeep(path: string): string {
  try {
    return decodeURIComponent(path);
  } catch (err) {
    if (err instanceof URIError) return path;
    throw err;
  }
}

const DOT_SEGMENT = /(^|[/\\])\.{1,2}([/\\]|$)/;

export function hasDotSegment(path: string): boolean {
  return DOT_SEGMENT.test(path) || DOT_SEGMENT.test(decodeOrKeep(path));
}

function matches(prefix: string, path: string): boolean {
  if (prefix === "/") return true;
  if (!path.startsWith(prefix)) return false;
  return path.length === prefix.length || path[prefix.length] === "/";
}

export class RouteTable {
  private readonly entries: readonly RouteEntry[];
  // Longest first; stable sort keeps table order for equal lengths.
  private readonly byLength: readonly RouteEntry[];

  constructor(specs: readonly RouteSpec[], log?: Logger) {
    const seen = new Map<string, string>();
    this.entries = Object.freeze(
      specs.map((s, i) => {
        const prefix = normalizePrefix(s.prefix);
        const name = s.name ?? (prefix === "/" ? "root" : prefix.slice(1));
        const prior = seen.get(prefix);
        if (prior !== undefined) {
          log?.warn(
            { prefix, kept: prior, ignored: name, index: i },
            "duplicate route prefix; first entry wins"
          );
        } else {
          seen.set(prefix, name);
        }
        return Object.freeze({
          name,
          prefix,
          target: new URL(s.target),
          timeoutMs: s.timeoutMs,
          forwardIdentity: s.forwardIdentity,
          forwardAuthorization: s.forwardAuthorization,
        });
      })
    );
    this.byLength = Object.freeze(
      [...this.entries].sort((a, b) => b.prefix.length - a.prefix.length)
    );
  }

  list(): readonly RouteEntry[] {
    return this.entries;
  }

  resolve(path: string): RouteResolution {
    if (hasDotSegment(path)) return { ok: false, error: "InvalidPath" };
    const route = this.byLength.find((r) => matches(r.prefix, path));
    if (!route) return { ok: false, error: "NoRouteMatch" };

    const rest = route.prefix === "/" ? path : path.slice(route.prefix.length);
    const forwardPath = rest.startsWith("/") ? rest : `/${rest}`;
    return { ok: true, route, forwardPath };
  }
}
