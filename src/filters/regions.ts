import { readFileSync } from "node:fs";
import { z } from "zod";

import { ERROR_CATALOG } from "../types.js";

/** Raised when the region data file is malformed or aliases two regions. */
export class RegionTableError extends Error {
  public readonly code = ERROR_CATALOG.REGION.TABLE;

  constructor(message: string) {
    super(message);
    this.name = "RegionTableError";
  }
}

const CountryCodeSchema = z.string().regex(/^[A-Z]{2}$/, "country codes must be two uppercase letters");

const RegionEntrySchema = z
  .object({
    code: z.string().min(1),
    aliases: z.array(z.string().min(1)).default([]),
    description: z.string().min(1),
    aliasDescriptions: z.record(z.string()).default({}),
    countries: z.array(CountryCodeSchema).min(1),
  })
  .strict();

const RegionTableSchema = z.array(RegionEntrySchema).min(1);

/** A named group of countries usable as a single filter. */
export interface Region {
  /** Canonical short code, e.g. `EU` or `5E`. */
  readonly code: string;
  readonly description: string;
  readonly countries: readonly string[];
}

export interface RegionCodeListing {
  readonly code: string;
  readonly description: string;
}

export interface RegionTable {
  readonly byCode: ReadonlyMap<string, Region>;
  readonly listing: readonly RegionCodeListing[];
}

/**
 * Validates raw region data and indexes it by uppercase code. Every alias is
 * listed as its own code. A code or alias claimed twice throws
 * {@link RegionTableError}.
 */
export function parseRegionTable(raw: unknown): RegionTable {
  const parsed = RegionTableSchema.safeParse(raw);
  if (!parsed.success) {
    throw new RegionTableError(`invalid region table: ${parsed.error.issues[0]?.message ?? "unknown issue"}`);
  }

  const byCode = new Map<string, Region>();
  const listing: RegionCodeListing[] = [];
  for (const entry of parsed.data) {
    const region: Region = Object.freeze({
      code: entry.code,
      description: entry.description,
      countries: Object.freeze([...entry.countries]),
    });
    const names: Array<[string, string]> = [
      [entry.code, entry.description],
      ...entry.aliases.map((alias): [string, string] => [alias, entry.aliasDescriptions[alias] ?? entry.description]),
    ];
    for (const [name, description] of names) {
      const key = name.toUpperCase();
      if (byCode.has(key)) {
        throw new RegionTableError(`region code ${name} is defined more than once`);
      }
      byCode.set(key, region);
      listing.push({ code: name, description });
    }
  }
  return { byCode, listing };
}

const REGION_DATA_URL = new URL("../../data/regions.json", import.meta.url);

const REGIONS: RegionTable = parseRegionTable(JSON.parse(readFileSync(REGION_DATA_URL, "utf8")));

/** Every accepted region code, aliases included, with a human description. */
export function listRegionCodes(): readonly RegionCodeListing[] {
  return REGIONS.listing;
}

/** Case-insensitive region lookup; `undefined` when the code is unknown. */
export function lookupRegion(code: string): Region | undefined {
  return REGIONS.byCode.get(code.trim().toUpperCase());
}
