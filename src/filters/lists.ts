import { readFile } from "node:fs/promises";

import { ERROR_CATALOG } from "../types.js";
import { blacklist, whitelist, type MembershipMode, type Predicate } from "./predicates.js";

/** Raised when an allow/deny list cannot be read or downloaded. */
export class ListSourceError extends Error {
  public readonly code = ERROR_CATALOG.LIST.SOURCE;
  public readonly details: { location: string; status?: number };

  constructor(location: string, message: string, status?: number, options?: { cause?: unknown }) {
    super(`could not read server list ${location}: ${message}`, options);
    this.name = "ListSourceError";
    this.details = status === undefined ? { location } : { location, status };
  }
}

const DOMAIN_PATTERN = /^[a-z0-9](?:[a-z0-9-]*[a-z0-9])?(?:\.[a-z0-9](?:[a-z0-9-]*[a-z0-9])?)+$/i;

/**
 * Extracts one domain per line. Blank lines, `#` comments and lines that are
 * not hostnames are ignored.
 */
export function parseMembershipList(text: string): Set<string> {
  const domains = new Set<string>();
  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line.length === 0 || line.startsWith("#") || !DOMAIN_PATTERN.test(line)) {
      continue;
    }
    domains.add(line.toLowerCase());
  }
  return domains;
}

export interface ListSourceOptions {
  /** HTTP client used for `http(s)` locations. Defaults to the global `fetch`. */
  readonly fetch?: typeof fetch;
}

function isUrl(location: string): boolean {
  return /^https?:\/\//i.test(location);
}

/** Returns the raw text behind a file path or an `http(s)` URL. */
export async function readListSource(location: string, options: ListSourceOptions = {}): Promise<string> {
  if (!isUrl(location)) {
    try {
      return await readFile(location, "utf8");
    } catch (error) {
      throw new ListSourceError(location, error instanceof Error ? error.message : String(error), undefined, {
        cause: error,
      });
    }
  }

  const fetchImpl = options.fetch ?? fetch;
  let response: Response;
  try {
    response = await fetchImpl(location);
  } catch (error) {
    throw new ListSourceError(location, error instanceof Error ? error.message : String(error), undefined, {
      cause: error,
    });
  }
  if (!response.ok) {
    throw new ListSourceError(location, `HTTP ${response.status}`, response.status);
  }
  return response.text();
}

/** Reads {@link location} and turns it into a whitelist or blacklist predicate. */
export async function loadMembershipList(
  mode: MembershipMode,
  location: string,
  options: ListSourceOptions = {},
): Promise<Predicate> {
  const domains = parseMembershipList(await readListSource(location, options));
  return mode === "allow" ? whitelist(domains) : blacklist(domains);
}
