import { z } from "zod";

import { PROBE_STRATEGIES, type ProbeStrategy } from "../ranking/prober.js";
import { readEnum, readInt, readOptionalString, readString } from "./env.js";

/** Vendor endpoint publishing the full server list. */
export const DEFAULT_API_URL = "https://nordvpn.com/api/server";

export const DEFAULT_PING_TRIES = 2;
export const DEFAULT_PING_CANDIDATES = 10;
export const DEFAULT_PROBE_TIMEOUT_MS = 1_000;

/** Defaults of every run, derived from the environment. */
export interface SelectorConfig {
  readonly apiUrl: string;
  readonly tries: number;
  readonly candidates: number;
  readonly strategy: ProbeStrategy;
  readonly probeTimeoutMs: number;
  readonly logFile: string | null;
}

export const SelectorConfigSchema = z
  .object({
    apiUrl: z.string().url(),
    tries: z.number().int().min(1).max(100),
    candidates: z.number().int().min(1).max(1_000),
    strategy: z.enum(["batched", "sequential"]),
    probeTimeoutMs: z.number().int().min(1).max(60_000),
    logFile: z.string().min(1).nullable(),
  })
  .strict();

/**
 * Reads `VPN_SELECT_*` variables. Malformed values fall back to the defaults;
 * the merged result must satisfy {@link SelectorConfigSchema}.
 */
export function loadSelectorConfig(): SelectorConfig {
  return SelectorConfigSchema.parse({
    apiUrl: readString("VPN_SELECT_API_URL", DEFAULT_API_URL),
    tries: readInt("VPN_SELECT_PING_TRIES", DEFAULT_PING_TRIES, { min: 1 }),
    candidates: readInt("VPN_SELECT_PING_CANDIDATES", DEFAULT_PING_CANDIDATES, { min: 1 }),
    strategy: readEnum("VPN_SELECT_PING_STRATEGY", PROBE_STRATEGIES, "batched"),
    probeTimeoutMs: readInt("VPN_SELECT_PROBE_TIMEOUT_MS", DEFAULT_PROBE_TIMEOUT_MS, { min: 1 }),
    logFile: readOptionalString("VPN_SELECT_LOG_FILE") ?? null,
  });
}
