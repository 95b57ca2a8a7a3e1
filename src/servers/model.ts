/** Category tags the vendor attaches to its servers. */
export const SERVER_CATEGORIES = [
  "standard",
  "p2p",
  "double",
  "tor",
  "obfuscated",
  "dedicated",
  "unrecognized",
] as const;

export type ServerCategory = (typeof SERVER_CATEGORIES)[number];

/**
 * Upstream category names as published by the vendor API. Names missing from
 * this table decode as `unrecognized` instead of failing the catalogue.
 */
const UPSTREAM_CATEGORY_NAMES: Readonly<Record<string, ServerCategory>> = {
  "Standard VPN servers": "standard",
  P2P: "p2p",
  "Double VPN": "double",
  "Onion Over VPN": "tor",
  "Obfuscated Servers": "obfuscated",
  "Dedicated IP": "dedicated",
};

export function categoryFromUpstream(name: string): ServerCategory {
  return UPSTREAM_CATEGORY_NAMES[name] ?? "unrecognized";
}

/** Capability flags published for each server. Every flag is independent. */
export interface ServerFeatures {
  readonly ikev2: boolean;
  readonly openvpnUdp: boolean;
  readonly openvpnTcp: boolean;
  readonly socks: boolean;
  readonly proxy: boolean;
  /** Point-to-Point Tunneling Protocol, considered unsafe by the vendor. */
  readonly pptp: boolean;
  /** Layer 2 Tunneling Protocol, considered unsafe by the vendor. */
  readonly l2tp: boolean;
  readonly openvpnXorUdp: boolean;
  readonly openvpnXorTcp: boolean;
  readonly proxyCybersec: boolean;
  readonly proxySsl: boolean;
  readonly proxySslCybersec: boolean;
  readonly wireguardUdp: boolean;
}

export type FeatureFlag = keyof ServerFeatures;

/** Protocol names accepted on the command line, in the order they are listed. */
export const PROTOCOLS = [
  "tcp",
  "udp",
  "pptp",
  "l2tp",
  "tcp_xor",
  "udp_xor",
  "socks",
  "cybersecproxy",
  "sslproxy",
  "cybersecsslproxy",
  "proxy",
  "wg_udp",
  "ikev2",
] as const;

export type Protocol = (typeof PROTOCOLS)[number];

/** The single feature flag each protocol name checks. */
export const PROTOCOL_FEATURES = {
  tcp: "openvpnTcp",
  udp: "openvpnUdp",
  pptp: "pptp",
  l2tp: "l2tp",
  tcp_xor: "openvpnXorTcp",
  udp_xor: "openvpnXorUdp",
  socks: "socks",
  cybersecproxy: "proxyCybersec",
  sslproxy: "proxySsl",
  cybersecsslproxy: "proxySslCybersec",
  proxy: "proxy",
  wg_udp: "wireguardUdp",
  ikev2: "ikev2",
} as const satisfies Record<Protocol, FeatureFlag>;

export function isProtocol(value: string): value is Protocol {
  return PROTOCOLS.some((protocol) => protocol === value);
}

export function isServerCategory(value: string): value is ServerCategory {
  return SERVER_CATEGORIES.some((category) => category === value);
}

/** One VPN endpoint from the vendor catalogue. Records are frozen once built. */
export interface ServerRecord {
  /** ISO 3166-1 alpha-2 code, uppercase. */
  readonly countryCode: string;
  /** Fully-qualified hostname; unique within a catalogue and used as probe target. */
  readonly domain: string;
  /** Current utilisation in percent, 0 to 100. */
  readonly load: number;
  readonly categories: ReadonlySet<ServerCategory>;
  readonly features: ServerFeatures;
}

/** Vendor suffix stripped by {@link shortName}. */
export const VENDOR_DOMAIN_SUFFIX = ".nordvpn.com";

/**
 * Returns the host label without the vendor suffix (`us1.nordvpn.com` gives
 * `us1`), or `null` when the domain does not carry the suffix.
 */
export function shortName(domain: string, suffix: string = VENDOR_DOMAIN_SUFFIX): string | null {
  if (!domain.endsWith(suffix) || domain.length === suffix.length) {
    return null;
  }
  return domain.slice(0, -suffix.length);
}
