// backend/services/gateway/src/observability/ObservabilitySink.ts
/**
 * Observation fan-out.
 *
 * A sink may fail; the request must not. `CompositeSink` swallows sink
 * errors after reporting the first one per sink to the logger.
 */

import type { Logger } from "pino";
import type { RequestObservation } from "../pipeline/types";

export interface ObservabilitySink {
  readonly name: string;
  record(observation: RequestObservation): void;
}

export class CompositeSink implements ObservabilitySink {
  readonly name = "composite";
  private readonly reported = new Set<string>();

  constructor(
    private readonly sinks: readonly ObservabilitySink[],
    private readonly log: Logger
  ) {}

  record(observation: RequestObservation): void {
    for (const sink of this.sinks) {
      try {
        sink.record(observation);
      } catch (err) {
        this.reportOnce(sink.name, err);
      }
    }
  }

  private reportOnce(sink: string, err: unknown): void {
    if (this.reported.has(sink)) return;
    this.reported.add(sink);
    this.log.error(
      { sink, err: err instanceof Error ? err.message : String(err) },
      "observability sink failed; further failures from this sink are dropped"
    );
  }
}
