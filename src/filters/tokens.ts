import { ERROR_CATALOG } from "../types.js";
import { isProtocol, isServerCategory, type ServerCategory } from "../servers/model.js";
import { category, country, countrySet, not, protocol, type Predicate } from "./predicates.js";
import { lookupRegion } from "./regions.js";

/** Raised when a filter token is neither a static filter, a country nor a region. */
export class UnrecognizedFilterError extends Error {
  public readonly code = ERROR_CATALOG.FILTER.UNRECOGNIZED;
  public readonly details: { token: string };

  constructor(token: string) {
    super(`unrecognised filter '${token}'`);
    this.name = "UnrecognizedFilterError";
    this.details = { token };
  }
}

/** Prefix inverting any filter token (`!us`, `!p2p`). */
export const NEGATION_PREFIX = "!";

/** Category tokens a user may type; `unrecognized` is deliberately not selectable. */
export const CATEGORY_TOKENS: readonly Exclude<ServerCategory, "unrecognized">[] = [
  "standard",
  "dedicated",
  "double",
  "obfuscated",
  "p2p",
  "tor",
];

export interface TokenContext {
  /** Country codes present in the catalogue, uppercase. */
  readonly countries: ReadonlySet<string>;
}

/**
 * Resolves a single user token. Precedence: static filters (categories, then
 * protocols), then countries present in the catalogue, then region codes.
 */
export function parseFilterToken(token: string, context: TokenContext): Predicate {
  const trimmed = token.trim();
  if (trimmed.startsWith(NEGATION_PREFIX)) {
    return not(resolvePositive(trimmed.slice(NEGATION_PREFIX.length), token, context));
  }
  return resolvePositive(trimmed, token, context);
}

function resolvePositive(body: string, original: string, context: TokenContext): Predicate {
  const lower = body.toLowerCase();
  if (lower.length === 0) {
    throw new UnrecognizedFilterError(original);
  }
  if (lower !== "unrecognized" && isServerCategory(lower)) {
    return category(lower);
  }
  if (isProtocol(lower)) {
    return protocol(lower);
  }
  const upper = body.toUpperCase();
  if (context.countries.has(upper)) {
    return country(upper);
  }
  const region = lookupRegion(body);
  if (region) {
    return countrySet(region.countries);
  }
  throw new UnrecognizedFilterError(original);
}

/** Resolves every token, failing on the first unrecognised one. */
export function parseFilterTokens(tokens: readonly string[], context: TokenContext): Predicate[] {
  return tokens.map((token) => parseFilterToken(token, context));
}
