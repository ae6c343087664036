// backend/services/gateway/src/observability/LogSink.ts
import type { Logger } from "pino";
import type { RequestObservation } from "../pipeline/types";
import type { ObservabilitySink } from "./ObservabilitySink";

/** One structured access line per request; level follows the status class. */
export class LogSink implements ObservabilitySink {
  readonly name = "log";

  constructor(private readonly log: Logger) {}

  record(o: RequestObservation): void {
    const fields = {
      rid: o.requestId,
      method: o.method,
      path: o.path,
      identity: o.identity.key,
      route: o.route,
      stage: o.stage,
      outcome: o.outcome,
      status: o.status,
      latencyMs: o.latencyMs,
      bytesIn: o.bytesIn,
      bytesOut: o.bytesOut,
      reason: o.reason,
    };
    const msg = `${o.method} ${o.path} -> ${o.status} (${o.outcome})`;
    if (o.status >= 500) this.log.error(fields, msg);
    else if (o.status >= 400) this.log.warn(fields, msg);
    else this.log.info(fields, msg);
  }
}
