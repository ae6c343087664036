// backend/services/gateway/src/pipeline/types.ts
/**
 * Shared pipeline vocabulary: per-request context, stage contract, outcomes
 * and the observation recorded once per request.
 */

import type { IncomingHttpHeaders } from "node:http";
import type { TokenClaims } from "../auth/TokenValidator";
import type { RouteEntry } from "../routing/RouteTable";

export type PipelineState =
  | "Received"
  | "TokenValidated"
  | "RateLimitChecked"
  | "RouteResolved"
  | "Forwarded"
  | "Completed";

export type ClientIdentity = Readonly<{
  kind: "subject" | "address";
  key: string;
}>;

export function subjectIdentity(subject: string): ClientIdentity {
  return Object.freeze({ kind: "subject", key: `sub:${subject}` });
}

export function addressIdentity(ip: string): ClientIdentity {
  return Object.freeze({ kind: "address", key: `addr:${ip}` });
}

export const REQUEST_OUTCOMES = [
  "forwarded",
  "missing_credential",
  "malformed_credential",
  "invalid_signature",
  "expired",
  "not_yet_valid",
  "invalid_claims",
  "rate_limited",
  "no_route",
  "backend_timeout",
  "backend_unreachable",
  "client_disconnected",
  "invalid_request",
  "internal_error",
] as const;
export type RequestOutcome = (typeof REQUEST_OUTCOMES)[number];

export type RequestContext = {
  readonly requestId: string;
  readonly method: string;
  readonly path: string;
  readonly search: string;
  readonly headers: IncomingHttpHeaders;
  readonly clientIp: string;
  readonly receivedAt: number;
  state: PipelineState;
  /** Address identity until authentication succeeds. */
  identity: ClientIdentity;
  claims?: TokenClaims;
  route?: RouteEntry;
  forwardPath?: string;
};

export type StageOutcome =
  | { kind: "continue" }
  | {
      kind: "reject";
      status: number;
      outcome: RequestOutcome;
      /** Client-facing, generic. */
      detail: string;
      /** Internal; logs only. */
      reason: string;
      headers?: Record<string, string>;
    };

export type StageRejection = Extract<StageOutcome, { kind: "reject" }>;

export interface Stage {
  readonly name: string;
  /** State the request is in once this stage lets it through. */
  readonly reaches: PipelineState;
  evaluate(ctx: RequestContext): StageOutcome;
}

export const CONTINUE: StageOutcome = { kind: "continue" };

export type RequestObservation = Readonly<{
  requestId: string;
  timestamp: string;
  method: string;
  path: string;
  identity: ClientIdentity;
  route?: string;
  stage: PipelineState;
  outcome: RequestOutcome;
  status: number;
  latencyMs: number;
  bytesIn: number;
  bytesOut: number;
  reason?: string;
}>;
