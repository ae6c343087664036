// backend/services/gateway/src/pipeline/stages/resolveRoute.stage.ts
import type { RouteTable } from "../../routing/RouteTable";
import { CONTINUE, type Stage } from "../types";

export function createResolveRouteStage(routes: RouteTable): Stage {
  return {
    name: "resolveRoute",
    reaches: "RouteResolved",
    evaluate(ctx) {
      const match = routes.resolve(ctx.path);
      if (!match.ok) {
        return match.error === "InvalidPath"
          ? {
              kind: "reject",
              status: 400,
              outcome: "invalid_request",
              detail: "Invalid request path",
              reason: `dot segment in ${ctx.path}`,
            }
          : {
              kind: "reject",
              status: 404,
              outcome: "no_route",
              detail: "Route not found",
              reason: `no route for ${ctx.path}`,
            };
      }
      ctx.route = match.route;
      ctx.forwardPath = match.forwardPath;
      return CONTINUE;
    },
  };
}
