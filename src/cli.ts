#!/usr/bin/env node
import { realpathSync } from "node:fs";
import process from "node:process";
import { fileURLToPath } from "node:url";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.
import { z } from "zod";

import { loadSelectorConfig, type SelectorConfig } from "./config/selectorConfig.js";
import { listRegionCodes } from "./filters/regions.js";
import { CATEGORY_TOKENS, NEGATION_PREFIX } from "./filters/tokens.js";
import { StructuredLogger } from "./logger.js";
import type { ProbeStrategy, ProbeTransport } from "./ranking/prober.js";
import { SystemPingTransport } from "./ranking/ping.js";
import { selectServer, type RankingMode } from "./selector.js";
import type { ServerCatalog } from "./servers/catalog.js";
import { PROTOCOLS, shortName } from "./servers/model.js";
import { buildCatalog, type CatalogSource } from "./servers/source.js";
import { normaliseError } from "./types.js";

interface CliOptions {
  readonly tokens: string[];
  readonly strategy: ProbeStrategy | null;
  readonly tries?: number;
  readonly candidates?: number;
  readonly printDomain: boolean;
  readonly listFilters: boolean;
  readonly help: boolean;
  readonly whitelists: string[];
  readonly blacklists: string[];
  readonly maxLoad?: number;
  readonly loadRange?: { readonly min: number; readonly max: number };
  readonly fixture?: string;
}

/** Side effects of one run, replaced in tests. */
export interface CliEnvironment {
  /** Result lines (stdout). */
  readonly out: (line: string) => void;
  /** Diagnostics (stderr). */
  readonly err: (line: string) => void;
  readonly config: SelectorConfig;
  readonly logger: StructuredLogger;
  readonly transport: ProbeTransport;
  readonly fetch?: typeof fetch;
}

const CountSchema = z.coerce.number().int().min(1);
const LoadSchema = z.coerce.number().int().min(0).max(100);

function parseCount(flag: string, value: string | undefined): number {
  const parsed = CountSchema.safeParse(value);
  if (value === undefined || !parsed.success) {
    throw new Error(`${flag} expects a positive integer`);
  }
  return parsed.data;
}

function parseLoad(flag: string, value: string | undefined): number {
  const parsed = LoadSchema.safeParse(value);
  if (value === undefined || !parsed.success) {
    throw new Error(`${flag} expects an integer between 0 and 100`);
  }
  return parsed.data;
}

function parseLoadRange(value: string | undefined): { min: number; max: number } {
  const [low, high, ...extra] = (value ?? "").split(":");
  if (extra.length > 0 || !low || !high) {
    throw new Error("--load-range expects LOW:HIGH");
  }
  return { min: parseLoad("--load-range", low), max: parseLoad("--load-range", high) };
}

function requireValue(flag: string, value: string | undefined): string {
  if (!value || value.startsWith("-")) {
    throw new Error(`${flag} expects a file path or URL`);
  }
  return value;
}

function parseArgs(argv: readonly string[]): CliOptions {
  const tokens: string[] = [];
  const whitelists: string[] = [];
  const blacklists: string[] = [];
  let strategy: ProbeStrategy | null = null;
  let tries: number | undefined;
  let candidates: number | undefined;
  let printDomain = false;
  let listFilters = false;
  let help = false;
  let maxLoad: number | undefined;
  let loadRange: { min: number; max: number } | undefined;
  let fixture: string | undefined;

  const pickStrategy = (flag: string, value: ProbeStrategy): void => {
    if (strategy !== null && strategy !== value) {
      throw new Error(`${flag} cannot be combined with another ping mode`);
    }
    strategy = value;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? "";
    switch (arg) {
      case "-p":
      case "--ping":
        pickStrategy(arg, "batched");
        break;
      case "-s":
      case "--sping":
        pickStrategy(arg, "sequential");
        break;
      case "-t":
      case "--tries":
        tries = parseCount(arg, argv[++i]);
        break;
      case "-a":
      case "--amount":
        candidates = parseCount(arg, argv[++i]);
        break;
      case "-d":
      case "--domain":
        printDomain = true;
        break;
      case "--filters":
        listFilters = true;
        break;
      case "-h":
      case "--help":
        help = true;
        break;
      case "--whitelist":
        whitelists.push(requireValue(arg, argv[++i]));
        break;
      case "--blacklist":
        blacklists.push(requireValue(arg, argv[++i]));
        break;
      case "--max-load":
        maxLoad = parseLoad(arg, argv[++i]);
        break;
      case "--load-range":
        loadRange = parseLoadRange(argv[++i]);
        break;
      case "--fixture":
        fixture = requireValue(arg, argv[++i]);
        break;
      default:
        // `!` starts a negated filter, everything else with a dash is a typo.
        if (arg.startsWith("-")) {
          throw new Error(`Unknown argument '${arg}'`);
        }
        tokens.push(arg);
    }
  }

  return {
    tokens,
    strategy,
    printDomain,
    listFilters,
    help,
    whitelists,
    blacklists,
    ...(tries === undefined ? {} : { tries }),
    ...(candidates === undefined ? {} : { candidates }),
    ...(maxLoad === undefined ? {} : { maxLoad }),
    ...(loadRange === undefined ? {} : { loadRange }),
    ...(fixture === undefined ? {} : { fixture }),
  };
}

function catalogSource(options: CliOptions, config: SelectorConfig): CatalogSource {
  return options.fixture ? { kind: "file", path: options.fixture } : { kind: "url", url: config.apiUrl };
}

function rankingMode(options: CliOptions, env: CliEnvironment): RankingMode {
  if (options.strategy === null) {
    return { kind: "load" };
  }
  return {
    kind: "latency",
    strategy: options.strategy,
    tries: options.tries ?? env.config.tries,
    candidates: options.candidates ?? env.config.candidates,
    timeoutMs: env.config.probeTimeoutMs,
    transport: env.transport,
  };
}

/** Lines printed by `--filters`. */
function renderFilterListing(catalog: ServerCatalog): string[] {
  const lines = [
    "Protocols:",
    `  ${PROTOCOLS.join(", ")}`,
    "Server types:",
    `  ${CATEGORY_TOKENS.join(", ")}`,
    "Countries:",
    `  ${catalog.countries().map((code) => code.toLowerCase()).join(", ")}`,
    "Regions:",
  ];
  for (const region of listRegionCodes()) {
    lines.push(`  ${region.code.toLowerCase()}: ${region.description}`);
  }
  lines.push(`Any filter can be inverted by prefixing it with ${NEGATION_PREFIX}, e.g. ${NEGATION_PREFIX}p2p`);
  return lines;
}

function printUsage(out: (line: string) => void): void {
  out("Usage: vpn-select [filters...] [-p|--ping] [-s|--sping] [-t|--tries N] [-a|--amount N] [-d|--domain]");
  out("                  [--filters] [--whitelist SRC]... [--blacklist SRC]... [--max-load N]");
  out("                  [--load-range LO:HI] [--fixture FILE]");
  out("");
  out("Examples:");
  out("  vpn-select us p2p");
  out("  vpn-select eu !double tcp --ping --tries 3");
  out("  vpn-select --filters");
}

/** Runs one invocation and returns the process exit code. */
async function run(argv: readonly string[], env: CliEnvironment): Promise<number> {
  const options = parseArgs(argv);
  if (options.help) {
    printUsage(env.out);
    return 0;
  }

  const source = catalogSource(options, env.config);
  const fetchOptions = env.fetch ? { fetch: env.fetch } : {};

  if (options.listFilters) {
    const catalog = await buildCatalog(source, fetchOptions);
    for (const line of renderFilterListing(catalog)) {
      env.out(line);
    }
    return 0;
  }

  const selection = await selectServer({
    source,
    tokens: options.tokens,
    whitelists: options.whitelists,
    blacklists: options.blacklists,
    ranking: rankingMode(options, env),
    logger: env.logger,
    ...fetchOptions,
    ...(options.maxLoad === undefined ? {} : { maxLoad: options.maxLoad }),
    ...(options.loadRange === undefined ? {} : { loadRange: options.loadRange }),
  });

  if (!selection.server) {
    env.err("No server found");
    return 1;
  }
  const domain = selection.server.domain;
  env.out(options.printDomain ? domain : (shortName(domain) ?? domain));
  return 0;
}

async function main(argv: readonly string[]): Promise<void> {
  let logger: StructuredLogger | undefined;
  try {
    const config = loadSelectorConfig();
    logger = new StructuredLogger({ logFile: config.logFile });
    process.exitCode = await run(argv, {
      out: (line) => console.log(line),
      err: (line) => console.error(line),
      config,
      logger,
      transport: new SystemPingTransport(),
    });
  } catch (error) {
    const normalised = normaliseError(error);
    logger?.error("selection_failed", normalised);
    console.error(normalised.message);
    process.exitCode = 1;
  } finally {
    await logger?.flush();
  }
}

const isCliEntryPoint = (() => {
  const executedFromCli = process.argv[1];
  if (!executedFromCli) {
    return false;
  }

  const thisModulePath = fileURLToPath(import.meta.url);
  try {
    // npm installs the bin as a symlink.
    return thisModulePath === realpathSync(executedFromCli);
  } catch {
    return thisModulePath === executedFromCli;
  }
})();

if (isCliEntryPoint) {
  void main(process.argv.slice(2));
}

/** Internal helpers exercised by the CLI test suite. */
export const __testing = {
  parseArgs,
  renderFilterListing,
  run,
};
