import { fileURLToPath } from "node:url";

import type { ServerCategory, ServerFeatures, ServerRecord } from "../../src/servers/model.js";

/** Upstream-shaped catalogue shared by the source, selector and CLI suites. */
export const FIXTURE_CATALOG_PATH = fileURLToPath(new URL("../fixtures/servers.json", import.meta.url));

export const NO_FEATURES: ServerFeatures = {
  ikev2: false,
  openvpnUdp: false,
  openvpnTcp: false,
  socks: false,
  proxy: false,
  pptp: false,
  l2tp: false,
  openvpnXorUdp: false,
  openvpnXorTcp: false,
  proxyCybersec: false,
  proxySsl: false,
  proxySslCybersec: false,
  wireguardUdp: false,
};

export interface ServerOverrides {
  categories?: ServerCategory[];
  features?: Partial<ServerFeatures>;
}

/** Builds an in-memory record without going through the upstream decoder. */
export function server(domain: string, countryCode: string, load: number, overrides: ServerOverrides = {}): ServerRecord {
  return {
    domain,
    countryCode,
    load,
    categories: new Set(overrides.categories ?? ["standard"]),
    features: { ...NO_FEATURES, ...overrides.features },
  };
}

/** The three-server catalogue used by the filtering scenarios. */
export function scenarioServers(): ServerRecord[] {
  return [server("us1", "US", 50), server("us2", "US", 10), server("be1", "BE", 5)];
}

export function domainsOf(records: readonly ServerRecord[]): string[] {
  return records.map((record) => record.domain);
}
