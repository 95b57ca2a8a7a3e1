import { ERROR_CATALOG } from "../types.js";
import { accepts, allOf, type Predicate } from "../filters/predicates.js";
import type { Comparator } from "../ranking/comparators.js";
import type { ServerRecord } from "./model.js";

/** Raised when a decoded catalogue breaks the domain or load invariants. */
export class CatalogIntegrityError extends Error {
  public readonly code = ERROR_CATALOG.CATALOG.INTEGRITY;
  public readonly details: { domain: string; reason: "empty_domain" | "duplicate_domain" | "load_out_of_range" };

  constructor(domain: string, reason: CatalogIntegrityError["details"]["reason"]) {
    super(`server catalogue rejected: ${reason.replaceAll("_", " ")} (${domain || "<empty>"})`);
    this.name = "CatalogIntegrityError";
    this.details = { domain, reason };
  }
}

/**
 * Ordered collection of server records for one run. The initial order is the
 * upstream order; afterwards only {@link apply}, {@link sort} and
 * {@link truncate} change it. Records themselves are never modified.
 */
export class ServerCatalog {
  private records: ServerRecord[];

  constructor(records: Iterable<ServerRecord>) {
    const seen = new Set<string>();
    const accepted: ServerRecord[] = [];
    for (const record of records) {
      if (record.domain.length === 0) {
        throw new CatalogIntegrityError(record.domain, "empty_domain");
      }
      if (seen.has(record.domain)) {
        throw new CatalogIntegrityError(record.domain, "duplicate_domain");
      }
      if (!Number.isInteger(record.load) || record.load < 0 || record.load > 100) {
        throw new CatalogIntegrityError(record.domain, "load_out_of_range");
      }
      seen.add(record.domain);
      accepted.push(Object.freeze(record));
    }
    this.records = accepted;
  }

  get size(): number {
    return this.records.length;
  }

  /** Snapshot of the current order. */
  toArray(): ServerRecord[] {
    return [...this.records];
  }

  /** Keeps only the records the predicate accepts, preserving their relative order. */
  apply(predicate: Predicate): void {
    this.records = this.records.filter((record) => accepts(predicate, record));
  }

  /** Keeps only the records every predicate accepts. */
  applyAll(predicates: readonly Predicate[]): void {
    this.apply(allOf(predicates));
  }

  /** Reorders the records in place so the preferred server comes first. */
  sort(comparator: Comparator): void {
    this.records.sort(comparator);
  }

  /** Drops everything after the first {@link max} records. */
  truncate(max: number): void {
    if (max < this.records.length) {
      this.records = this.records.slice(0, Math.max(0, max));
    }
  }

  /** The best-ranked record, or `null` when filtering left nothing. */
  best(): ServerRecord | null {
    return this.records[0] ?? null;
  }

  /** Sorted distinct country codes present in the catalogue. */
  countries(): string[] {
    return [...new Set(this.records.map((record) => record.countryCode))].sort();
  }
}
