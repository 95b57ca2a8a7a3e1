import type { StructuredLogger } from "./logger.js";
import { loadMembershipList, type ListSourceOptions } from "./filters/lists.js";
import { describePredicate, loadAtMost, loadRange, type Predicate } from "./filters/predicates.js";
import { parseFilterTokens } from "./filters/tokens.js";
import { ServerCatalog } from "./servers/catalog.js";
import type { ServerRecord } from "./servers/model.js";
import { buildCatalog, type CatalogSource } from "./servers/source.js";
import { LatencyProber, type ProbeError, type ProbeStrategy, type ProbeTransport, type RankingResult } from "./ranking/prober.js";
import { rankByLoad, rankWithFallback } from "./ranking/rank.js";

export type RankingMode =
  | { readonly kind: "load" }
  | {
      readonly kind: "latency";
      readonly strategy: ProbeStrategy;
      readonly tries: number;
      readonly candidates: number;
      readonly timeoutMs: number;
      readonly transport: ProbeTransport;
    };

export interface SelectionCriteria {
  /** User filter tokens such as `us`, `!p2p`, `tcp` or `eu`. */
  readonly tokens?: readonly string[];
  /** Files or URLs listing the only domains allowed. */
  readonly whitelists?: readonly string[];
  /** Files or URLs listing domains to exclude. */
  readonly blacklists?: readonly string[];
  readonly maxLoad?: number;
  readonly loadRange?: { readonly min: number; readonly max: number };
}

export interface SelectServerOptions extends SelectionCriteria {
  /** Where the catalogue comes from, or an already decoded catalogue. */
  readonly source: CatalogSource | ServerCatalog;
  readonly ranking: RankingMode;
  readonly fetch?: typeof fetch;
  readonly signal?: AbortSignal;
  readonly logger?: StructuredLogger;
}

export interface SelectionResult {
  /** Best-ranked server, `null` when the filters removed every candidate. */
  readonly server: ServerRecord | null;
  /** Number of servers left after filtering and ranking. */
  readonly remaining: number;
  /** True when latency ranking was requested but the load fallback was used. */
  readonly degraded: boolean;
  readonly probeError?: ProbeError;
  readonly latency?: RankingResult;
}

function loadLists(criteria: SelectionCriteria, options: ListSourceOptions): Promise<Predicate[]> {
  return Promise.all([
    ...(criteria.whitelists ?? []).map((location) => loadMembershipList("allow", location, options)),
    ...(criteria.blacklists ?? []).map((location) => loadMembershipList("deny", location, options)),
  ]);
}

function buildCriteriaPredicates(catalog: ServerCatalog, criteria: SelectionCriteria): Predicate[] {
  const predicates = parseFilterTokens(criteria.tokens ?? [], { countries: new Set(catalog.countries()) });
  if (criteria.maxLoad !== undefined) {
    predicates.push(loadAtMost(criteria.maxLoad));
  }
  if (criteria.loadRange !== undefined) {
    predicates.push(loadRange(criteria.loadRange.min, criteria.loadRange.max));
  }
  return predicates;
}

/**
 * Loads the catalogue, filters and ranks it, then reads the best server. The
 * catalogue and the membership lists are fetched concurrently.
 */
export async function selectServer(options: SelectServerOptions): Promise<SelectionResult> {
  const logger = options.logger;
  const fetchOptions = {
    ...(options.fetch ? { fetch: options.fetch } : {}),
    ...(options.signal ? { signal: options.signal } : {}),
  };
  const source = options.source;
  const catalogPromise =
    source instanceof ServerCatalog ? Promise.resolve(source) : buildCatalog(source, fetchOptions);
  const listsPromise = loadLists(options, options.fetch ? { fetch: options.fetch } : {});
  const [catalog, lists] = await Promise.all([catalogPromise, listsPromise]);
  logger?.info("catalog_loaded", {
    source: describeSource(source),
    servers: catalog.size,
  });

  // Lists first, then tokens, then load bounds.
  const predicates = [...lists, ...buildCriteriaPredicates(catalog, options)];

  const before = catalog.size;
  catalog.applyAll(predicates);
  logger?.info("filters_applied", {
    filters: predicates.map(describePredicate),
    before,
    after: catalog.size,
  });

  const ranking = options.ranking;
  if (ranking.kind === "load" || catalog.size === 0) {
    rankByLoad(catalog);
    return { server: catalog.best(), remaining: catalog.size, degraded: false };
  }

  const prober = new LatencyProber({
    transport: ranking.transport,
    timeoutMs: ranking.timeoutMs,
    ...(logger ? { logger } : {}),
  });
  const outcome = await rankWithFallback(catalog, {
    prober,
    candidates: ranking.candidates,
    tries: ranking.tries,
    strategy: ranking.strategy,
    ...(options.signal ? { signal: options.signal } : {}),
    ...(logger ? { logger } : {}),
  });

  return {
    server: catalog.best(),
    remaining: catalog.size,
    degraded: outcome.degraded,
    ...(outcome.error ? { probeError: outcome.error } : {}),
    ...(outcome.result ? { latency: outcome.result } : {}),
  };
}

function describeSource(source: CatalogSource | ServerCatalog): string {
  if (source instanceof ServerCatalog) {
    return "memory";
  }
  return source.kind === "url" ? source.url : source.path;
}
