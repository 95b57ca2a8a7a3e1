import { ERROR_CATALOG } from "../types.js";
import {
  PROTOCOL_FEATURES,
  type Protocol,
  type ServerCategory,
  type ServerRecord,
} from "../servers/model.js";

/** Raised when a predicate is built from bounds that can never be meaningful. */
export class InvalidFilterError extends Error {
  public readonly code = ERROR_CATALOG.FILTER.INVALID;
  public readonly details: Record<string, unknown>;

  constructor(message: string, details: Record<string, unknown>) {
    super(message);
    this.name = "InvalidFilterError";
    this.details = details;
  }
}

/** Whether a membership list keeps or drops the listed domains. */
export type MembershipMode = "allow" | "deny";

/**
 * Closed set of filters understood by the engine. Each variant is immutable
 * configuration; {@link accepts} gives it meaning.
 */
export type Predicate =
  | { readonly kind: "country"; readonly country: string }
  | { readonly kind: "countrySet"; readonly countries: ReadonlySet<string> }
  | { readonly kind: "protocol"; readonly protocol: Protocol }
  | { readonly kind: "category"; readonly category: ServerCategory }
  | { readonly kind: "loadAtMost"; readonly max: number }
  | { readonly kind: "loadRange"; readonly min: number; readonly max: number }
  | { readonly kind: "membership"; readonly mode: MembershipMode; readonly domains: ReadonlySet<string> }
  | { readonly kind: "not"; readonly predicate: Predicate }
  | { readonly kind: "all"; readonly predicates: readonly Predicate[] };

export function country(code: string): Predicate {
  return { kind: "country", country: code.trim().toUpperCase() };
}

/** Accepts servers located in any of {@link codes}. An empty set accepts nothing. */
export function countrySet(codes: Iterable<string>): Predicate {
  const countries = new Set<string>();
  for (const code of codes) {
    countries.add(code.trim().toUpperCase());
  }
  return { kind: "countrySet", countries };
}

export function protocol(name: Protocol): Predicate {
  return { kind: "protocol", protocol: name };
}

export function category(name: ServerCategory): Predicate {
  return { kind: "category", category: name };
}

function assertLoadBound(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0 || value > 100) {
    throw new InvalidFilterError(`${name} must be an integer between 0 and 100`, { [name]: value });
  }
}

/** Keeps servers whose load is lower than or equal to {@link max}. */
export function loadAtMost(max: number): Predicate {
  assertLoadBound("max", max);
  return { kind: "loadAtMost", max };
}

/**
 * Keeps servers whose load lies strictly between {@link min} and {@link max}.
 * Both bounds are excluded, unlike {@link loadAtMost}.
 */
export function loadRange(min: number, max: number): Predicate {
  assertLoadBound("min", min);
  assertLoadBound("max", max);
  if (min > max) {
    throw new InvalidFilterError("load range lower bound exceeds its upper bound", { min, max });
  }
  return { kind: "loadRange", min, max };
}

/** Keeps only the listed domains. */
export function whitelist(domains: Iterable<string>): Predicate {
  return { kind: "membership", mode: "allow", domains: domainSet(domains) };
}

/** Drops the listed domains. */
export function blacklist(domains: Iterable<string>): Predicate {
  return { kind: "membership", mode: "deny", domains: domainSet(domains) };
}

/** Catalogue domains are lowercase, so list entries are matched lowercased. */
function domainSet(domains: Iterable<string>): Set<string> {
  const set = new Set<string>();
  for (const domain of domains) {
    set.add(domain.trim().toLowerCase());
  }
  return set;
}

export function not(predicate: Predicate): Predicate {
  return { kind: "not", predicate };
}

/** Conjunction of {@link predicates}; an empty list accepts every server. */
export function allOf(predicates: readonly Predicate[]): Predicate {
  return { kind: "all", predicates: [...predicates] };
}

export function accepts(predicate: Predicate, server: ServerRecord): boolean {
  switch (predicate.kind) {
    case "country":
      return server.countryCode === predicate.country;
    case "countrySet":
      return predicate.countries.has(server.countryCode);
    case "protocol":
      return server.features[PROTOCOL_FEATURES[predicate.protocol]];
    case "category":
      return server.categories.has(predicate.category);
    case "loadAtMost":
      return server.load <= predicate.max;
    case "loadRange":
      return predicate.min < server.load && server.load < predicate.max;
    case "membership":
      return predicate.domains.has(server.domain) === (predicate.mode === "allow");
    case "not":
      return !accepts(predicate.predicate, server);
    case "all":
      return predicate.predicates.every((inner) => accepts(inner, server));
  }
}

/** Short human-readable form used in log payloads. */
export function describePredicate(predicate: Predicate): string {
  switch (predicate.kind) {
    case "country":
      return `country=${predicate.country}`;
    case "countrySet":
      return `country in [${[...predicate.countries].join(",")}]`;
    case "protocol":
      return `protocol=${predicate.protocol}`;
    case "category":
      return `category=${predicate.category}`;
    case "loadAtMost":
      return `load<=${predicate.max}`;
    case "loadRange":
      return `${predicate.min}<load<${predicate.max}`;
    case "membership":
      return `${predicate.mode === "allow" ? "whitelist" : "blacklist"}(${predicate.domains.size})`;
    case "not":
      return `!${describePredicate(predicate.predicate)}`;
    case "all":
      return predicate.predicates.map(describePredicate).join(" & ");
  }
}
