import type { StructuredLogger } from "../logger.js";
import { whitelist } from "../filters/predicates.js";
import type { ServerCatalog } from "../servers/catalog.js";
import { latencyComparator, loadComparator } from "./comparators.js";
import {
  ProbeError,
  ProbeFailureError,
  ProbePassCancelledError,
  type LatencyProber,
  type ProbeStrategy,
  type RankingResult,
} from "./prober.js";

/** Orders the catalogue by ascending load. */
export function rankByLoad(catalog: ServerCatalog): void {
  catalog.sort(loadComparator);
}

export interface LatencyRankingOptions {
  readonly prober: LatencyProber;
  /** Number of least-loaded servers that get probed. */
  readonly candidates: number;
  readonly tries: number;
  readonly strategy: ProbeStrategy;
  readonly signal?: AbortSignal;
  readonly logger?: StructuredLogger;
}

export type LatencyRankingOutcome =
  | { readonly ok: true; readonly result: RankingResult }
  | { readonly ok: false; readonly error: ProbeError };

/**
 * Keeps the {@link LatencyRankingOptions.candidates} least-loaded servers,
 * probes them and orders the survivors by mean latency. Servers without a
 * measurement are dropped before sorting. On a probe failure, or a pass
 * cancelled before any host was measured, the catalogue is left load-sorted
 * and truncated, and the error is returned for the caller's fallback. Any
 * other error propagates.
 */
export async function rankByLatency(
  catalog: ServerCatalog,
  options: LatencyRankingOptions,
): Promise<LatencyRankingOutcome> {
  rankByLoad(catalog);
  catalog.truncate(options.candidates);
  const hosts = catalog.toArray().map((server) => server.domain);

  let result: RankingResult;
  try {
    result = await options.prober.measure(hosts, {
      tries: options.tries,
      strategy: options.strategy,
      ...(options.signal ? { signal: options.signal } : {}),
    });
  } catch (error) {
    if (error instanceof ProbeError) {
      return { ok: false, error };
    }
    throw error;
  }

  if (hosts.length > 0 && result.latencies.size === 0) {
    const error = result.cancelled
      ? new ProbePassCancelledError(result.failures)
      : new ProbeFailureError(result.failures);
    return { ok: false, error };
  }

  const unmeasured = hosts.filter((host) => !result.latencies.has(host));
  if (unmeasured.length > 0) {
    options.logger?.warn("latency_candidates_dropped", {
      dropped: unmeasured,
      failures: Object.fromEntries(result.failures),
      cancelled: result.cancelled,
    });
    catalog.apply(whitelist(result.latencies.keys()));
  }

  catalog.sort(latencyComparator(result.latencies));
  options.logger?.info("latency_probe_completed", {
    strategy: result.strategy,
    tries: result.tries,
    measured: result.latencies.size,
    cancelled: result.cancelled,
  });
  return { ok: true, result };
}

export interface FallbackRankingOutcome {
  /** True when latency ranking failed and the catalogue was ranked by load. */
  readonly degraded: boolean;
  readonly result?: RankingResult;
  readonly error?: ProbeError;
}

/**
 * Latency ranking with the load fallback: a probe failure is logged as a
 * warning and the catalogue is ranked by load instead.
 */
export async function rankWithFallback(
  catalog: ServerCatalog,
  options: LatencyRankingOptions,
): Promise<FallbackRankingOutcome> {
  const outcome = await rankByLatency(catalog, options);
  if (outcome.ok) {
    return { degraded: false, result: outcome.result };
  }

  options.logger?.warn("latency_ranking_degraded", {
    code: outcome.error.code,
    message: outcome.error.message,
  });
  rankByLoad(catalog);
  return { degraded: true, error: outcome.error };
}
