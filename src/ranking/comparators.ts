import { ERROR_CATALOG } from "../types.js";
import type { ServerRecord } from "../servers/model.js";

/**
 * Orders two servers: negative when {@link a} should be listed first, positive
 * when {@link b} should, zero when neither is preferred.
 */
export type Comparator = (a: ServerRecord, b: ServerRecord) => number;

/**
 * Raised when a latency comparison involves a server that was never measured.
 * This is a sequencing bug in the caller, so the ranking pass never catches it.
 */
export class MissingLatencyDataError extends Error {
  public readonly code = ERROR_CATALOG.RANK.MISSING_LATENCY;
  public readonly details: { domain: string };

  constructor(domain: string) {
    super(`no latency measurement for ${domain}; the catalogue was not fully probed`);
    this.name = "MissingLatencyDataError";
    this.details = { domain };
  }
}

export const loadComparator: Comparator = (a, b) => a.load - b.load;

/** Builds a comparator over the microsecond means in {@link latencies}. */
export function latencyComparator(latencies: ReadonlyMap<string, number>): Comparator {
  const latencyOf = (server: ServerRecord): number => {
    const value = latencies.get(server.domain);
    if (value === undefined) {
      throw new MissingLatencyDataError(server.domain);
    }
    return value;
  };
  return (a, b) => latencyOf(a) - latencyOf(b);
}
