import { readFile } from "node:fs/promises";
import { z } from "zod";

import { ERROR_CATALOG } from "../types.js";
import { ServerCatalog } from "./catalog.js";
import { categoryFromUpstream, type ServerFeatures, type ServerRecord } from "./model.js";

/** Raised when the catalogue cannot be downloaded or read. */
export class CatalogSourceError extends Error {
  public readonly code = ERROR_CATALOG.CATALOG.SOURCE;
  public readonly details: { location: string; status?: number };

  constructor(location: string, message: string, status?: number, options?: { cause?: unknown }) {
    super(`could not load the server catalogue from ${location}: ${message}`, options);
    this.name = "CatalogSourceError";
    this.details = status === undefined ? { location } : { location, status };
  }
}

/** Raised when the payload does not match the vendor schema. */
export class CatalogDecodeError extends Error {
  public readonly code = ERROR_CATALOG.CATALOG.DECODE;
  public readonly details: { issues: z.ZodIssue[] };

  constructor(issues: z.ZodIssue[]) {
    const first = issues[0];
    const where = first ? `${first.path.join(".") || "<root>"}: ${first.message}` : "unknown issue";
    super(`server catalogue does not match the expected format (${where})`);
    this.name = "CatalogDecodeError";
    this.details = { issues };
  }
}

const flag = z.boolean().default(false);

/** Feature block as published upstream. Flags the vendor omits count as unsupported. */
const UpstreamFeaturesSchema = z.object({
  ikev2: flag,
  openvpn_udp: flag,
  openvpn_tcp: flag,
  socks: flag,
  proxy: flag,
  pptp: flag,
  l2tp: flag,
  openvpn_xor_udp: flag,
  openvpn_xor_tcp: flag,
  proxy_cybersec: flag,
  proxy_ssl: flag,
  proxy_ssl_cybersec: flag,
  wireguard_udp: flag,
});

const UpstreamServerSchema = z.object({
  flag: z.string().regex(/^[A-Za-z]{2}$/),
  domain: z.string().min(1),
  load: z.number().int().min(0).max(100),
  categories: z.array(z.object({ name: z.string() })).default([]),
  features: UpstreamFeaturesSchema.default({}),
});

const UpstreamCatalogSchema = z.array(UpstreamServerSchema);

type UpstreamServer = z.infer<typeof UpstreamServerSchema>;

function toFeatures(raw: UpstreamServer["features"]): ServerFeatures {
  return {
    ikev2: raw.ikev2,
    openvpnUdp: raw.openvpn_udp,
    openvpnTcp: raw.openvpn_tcp,
    socks: raw.socks,
    proxy: raw.proxy,
    pptp: raw.pptp,
    l2tp: raw.l2tp,
    openvpnXorUdp: raw.openvpn_xor_udp,
    openvpnXorTcp: raw.openvpn_xor_tcp,
    proxyCybersec: raw.proxy_cybersec,
    proxySsl: raw.proxy_ssl,
    proxySslCybersec: raw.proxy_ssl_cybersec,
    wireguardUdp: raw.wireguard_udp,
  };
}

function toRecord(raw: UpstreamServer): ServerRecord {
  return {
    countryCode: raw.flag.toUpperCase(),
    domain: raw.domain.trim().toLowerCase(),
    load: raw.load,
    categories: new Set(raw.categories.map((entry) => categoryFromUpstream(entry.name))),
    features: toFeatures(raw.features),
  };
}

/** Validates a parsed vendor payload and builds the catalogue in upstream order. */
export function decodeCatalog(payload: unknown): ServerCatalog {
  const parsed = UpstreamCatalogSchema.safeParse(payload);
  if (!parsed.success) {
    throw new CatalogDecodeError(parsed.error.issues);
  }
  return new ServerCatalog(parsed.data.map(toRecord));
}

function parseJson(location: string, text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new CatalogSourceError(location, "response is not valid JSON", undefined, { cause: error });
  }
}

export interface FetchCatalogOptions {
  readonly fetch?: typeof fetch;
  readonly signal?: AbortSignal;
}

/** Downloads and decodes the catalogue published at {@link url}. */
export async function fetchCatalog(url: string, options: FetchCatalogOptions = {}): Promise<ServerCatalog> {
  const fetchImpl = options.fetch ?? fetch;
  let response: Response;
  try {
    response = await fetchImpl(url, options.signal ? { signal: options.signal } : {});
  } catch (error) {
    throw new CatalogSourceError(url, error instanceof Error ? error.message : String(error), undefined, {
      cause: error,
    });
  }
  if (!response.ok) {
    throw new CatalogSourceError(url, `HTTP ${response.status}`, response.status);
  }
  return decodeCatalog(parseJson(url, await response.text()));
}

/** Reads a catalogue saved on disk, e.g. a fixture captured from the vendor API. */
export async function loadCatalogFile(path: string): Promise<ServerCatalog> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    throw new CatalogSourceError(path, error instanceof Error ? error.message : String(error), undefined, {
      cause: error,
    });
  }
  return decodeCatalog(parseJson(path, text));
}

/** Where {@link buildCatalog} reads the vendor payload from. */
export type CatalogSource =
  | { readonly kind: "url"; readonly url: string }
  | { readonly kind: "file"; readonly path: string };

export function buildCatalog(source: CatalogSource, options: FetchCatalogOptions = {}): Promise<ServerCatalog> {
  return source.kind === "url" ? fetchCatalog(source.url, options) : loadCatalogFile(source.path);
}
