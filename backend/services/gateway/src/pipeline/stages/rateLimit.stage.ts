// backend/services/gateway/src/pipeline/stages/rateLimit.stage.ts
import type { Clock } from "../../clock";
import type { SlidingWindowLimiter } from "../../ratelimit/SlidingWindowLimiter";
import { CONTINUE, type Stage, type StageRejection } from "../types";

export type RateLimitStageDeps = {
  limiter: SlidingWindowLimiter;
  clock: Clock;
};

/** 429 with Retry-After in whole seconds; `cause` prefixes the internal reason. */
export function rateLimitRejection(
  limiter: SlidingWindowLimiter,
  retryAfterMs: number,
  cause?: string
): StageRejection {
  const retryAfterSec = Math.max(1, Math.ceil(retryAfterMs / 1000));
  const exceeded = `${limiter.limit} per ${limiter.windowMs}ms exceeded; retry in ${retryAfterMs}ms`;
  return {
    kind: "reject",
    status: 429,
    outcome: "rate_limited",
    detail: "Too many requests",
    reason: cause ? `${cause}; ${exceeded}` : exceeded,
    headers: { "Retry-After": String(retryAfterSec) },
  };
}

/** Per-identity admission. */
export function createRateLimitStage(deps: RateLimitStageDeps): Stage {
  return {
    name: "rateLimit",
    reaches: "RateLimitChecked",
    evaluate(ctx) {
      const decision = deps.limiter.check(ctx.identity.key, deps.clock.now());
      return decision.allowed
        ? CONTINUE
        : rateLimitRejection(deps.limiter, decision.retryAfterMs);
    },
  };
}
