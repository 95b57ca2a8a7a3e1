export { StructuredLogger } from "./logger.js";
export type { LogEntry, LogLevel, LogSink, LoggerOptions } from "./logger.js";
export { ERROR_CATALOG, normaliseError } from "./types.js";
export type { NormalisedError } from "./types.js";

export { loadSelectorConfig, SelectorConfigSchema } from "./config/selectorConfig.js";
export type { SelectorConfig } from "./config/selectorConfig.js";

export {
  PROTOCOLS,
  PROTOCOL_FEATURES,
  SERVER_CATEGORIES,
  VENDOR_DOMAIN_SUFFIX,
  categoryFromUpstream,
  isProtocol,
  isServerCategory,
  shortName,
} from "./servers/model.js";
export type { FeatureFlag, Protocol, ServerCategory, ServerFeatures, ServerRecord } from "./servers/model.js";
export { CatalogIntegrityError, ServerCatalog } from "./servers/catalog.js";
export {
  CatalogDecodeError,
  CatalogSourceError,
  buildCatalog,
  decodeCatalog,
  fetchCatalog,
  loadCatalogFile,
} from "./servers/source.js";
export type { CatalogSource, FetchCatalogOptions } from "./servers/source.js";

export {
  InvalidFilterError,
  accepts,
  allOf,
  blacklist,
  category,
  country,
  countrySet,
  describePredicate,
  loadAtMost,
  loadRange,
  not,
  protocol,
  whitelist,
} from "./filters/predicates.js";
export type { MembershipMode, Predicate } from "./filters/predicates.js";
export { RegionTableError, listRegionCodes, lookupRegion, parseRegionTable } from "./filters/regions.js";
export type { Region, RegionCodeListing, RegionTable } from "./filters/regions.js";
export { ListSourceError, loadMembershipList, parseMembershipList, readListSource } from "./filters/lists.js";
export type { ListSourceOptions } from "./filters/lists.js";
export {
  CATEGORY_TOKENS,
  NEGATION_PREFIX,
  UnrecognizedFilterError,
  parseFilterToken,
  parseFilterTokens,
} from "./filters/tokens.js";
export type { TokenContext } from "./filters/tokens.js";

export { MissingLatencyDataError, latencyComparator, loadComparator } from "./ranking/comparators.js";
export type { Comparator } from "./ranking/comparators.js";
export {
  LatencyProber,
  PROBE_STRATEGIES,
  ProbeError,
  ProbeFailureError,
  ProbePassCancelledError,
  ProbePermissionDeniedError,
  ProbeTimeoutError,
  ProbeUnavailableError,
} from "./ranking/prober.js";
export type {
  LatencyProberOptions,
  MeasureOptions,
  ProbeOutcome,
  ProbeRequest,
  ProbeStrategy,
  ProbeTransport,
  RankingResult,
} from "./ranking/prober.js";
export { SystemPingTransport, execFileRunner, parsePingLatency } from "./ranking/ping.js";
export type { CommandResult, CommandRunner, SystemPingTransportOptions } from "./ranking/ping.js";
export { rankByLatency, rankByLoad, rankWithFallback } from "./ranking/rank.js";
export type { FallbackRankingOutcome, LatencyRankingOptions, LatencyRankingOutcome } from "./ranking/rank.js";

export { selectServer } from "./selector.js";
export type { RankingMode, SelectServerOptions, SelectionCriteria, SelectionResult } from "./selector.js";
