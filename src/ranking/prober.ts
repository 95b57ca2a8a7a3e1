import { z } from "zod";

import type { StructuredLogger } from "../logger.js";
import { runtimeClearTimeout, runtimeSetTimeout } from "../runtime/timers.js";
import { ERROR_CATALOG } from "../types.js";

/**
 * `sequential` measures one host at a time (precise, slow); `batched` probes
 * every host once per round concurrently (fast, hosts share network noise).
 */
export type ProbeStrategy = "sequential" | "batched";

export const PROBE_STRATEGIES: readonly ProbeStrategy[] = ["batched", "sequential"];

/** Per-call context handed to the transport. */
export interface ProbeRequest {
  /** Aborted on timeout or cancellation; transports must stop waiting when it fires. */
  readonly signal: AbortSignal;
  readonly timeoutMs: number;
}

export type ProbeOutcome =
  | { readonly ok: true; readonly latencyUs: number }
  | { readonly ok: false; readonly error: unknown };

/** Probe primitive. Latencies are round-trip times in microseconds. */
export interface ProbeTransport {
  probe(host: string, request: ProbeRequest): Promise<number>;
  /**
   * Sends one probe to every host and settles once each replied or timed out.
   * Hosts missing from the returned map count as failed. When absent, the
   * prober fans out {@link probe} calls itself.
   */
  probeRound?(hosts: readonly string[], request: ProbeRequest): Promise<Map<string, ProbeOutcome>>;
}

/** Base class of the failures that stop a whole measuring pass. */
export abstract class ProbeError extends Error {
  public abstract readonly code: string;
}

/** The process may not send probes (e.g. raw sockets need privileges). */
export class ProbePermissionDeniedError extends ProbeError {
  public readonly code = ERROR_CATALOG.PROBE.PERMISSION;

  constructor(message = "permission denied while sending probes", options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ProbePermissionDeniedError";
  }
}

/** The probing mechanism itself is missing (e.g. no `ping` binary). */
export class ProbeUnavailableError extends ProbeError {
  public readonly code = ERROR_CATALOG.PROBE.UNAVAILABLE;

  constructor(message = "probing is not available on this system", options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ProbeUnavailableError";
  }
}

/** Every candidate failed, so the pass produced no usable measurement. */
export class ProbeFailureError extends ProbeError {
  public readonly code = ERROR_CATALOG.PROBE.FAILED;
  public readonly details: { failures: Record<string, string> };

  constructor(failures: ReadonlyMap<string, string>) {
    super(`no host answered the latency probes (${failures.size} failed)`);
    this.name = "ProbeFailureError";
    this.details = { failures: Object.fromEntries(failures) };
  }
}

/** The pass was aborted before any host was fully measured. */
export class ProbePassCancelledError extends ProbeError {
  public readonly code = ERROR_CATALOG.PROBE.CANCELLED;
  public readonly details: { failures: Record<string, string> };

  constructor(failures: ReadonlyMap<string, string>) {
    super("latency measuring was cancelled before any host was measured");
    this.name = "ProbePassCancelledError";
    this.details = { failures: Object.fromEntries(failures) };
  }
}

/** A single probe exceeded its budget. Only the host concerned is dropped. */
export class ProbeTimeoutError extends Error {
  public readonly code = ERROR_CATALOG.PROBE.TIMEOUT;

  constructor(host: string, timeoutMs: number) {
    super(`probe to ${host} timed out after ${timeoutMs}ms`);
    this.name = "ProbeTimeoutError";
  }
}

class ProbeCancelledError extends Error {
  constructor() {
    super("probe cancelled");
    this.name = "ProbeCancelledError";
  }
}

function isFatal(error: unknown): error is ProbePermissionDeniedError | ProbeUnavailableError {
  return error instanceof ProbePermissionDeniedError || error instanceof ProbeUnavailableError;
}

function describeFailure(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Per-host latency map produced by one measuring pass. */
export interface RankingResult {
  /** Integer mean round-trip time in microseconds, keyed by domain. */
  readonly latencies: ReadonlyMap<string, number>;
  /** Reason each dropped host failed, keyed by domain. */
  readonly failures: ReadonlyMap<string, string>;
  /** True when the pass was aborted and the maps hold partial results. */
  readonly cancelled: boolean;
  readonly strategy: ProbeStrategy;
  /** Rounds or tries each kept host was averaged over. */
  readonly tries: number;
}

const MeasureOptionsSchema = z.object({
  tries: z.number().int().min(1),
  strategy: z.enum(["batched", "sequential"]),
});

export interface MeasureOptions {
  readonly tries: number;
  readonly strategy: ProbeStrategy;
  /** Aborting returns what was measured so far instead of throwing. */
  readonly signal?: AbortSignal;
}

export interface LatencyProberOptions {
  readonly transport: ProbeTransport;
  /** Budget of a single probe; a timeout counts as a failure of that host. */
  readonly timeoutMs: number;
  readonly logger?: StructuredLogger;
}

/**
 * Measures the mean round-trip time of a bounded list of hosts. A host is
 * kept only when all its probes succeed; permission or availability errors
 * abort the pass, and a pass where every host failed throws
 * {@link ProbeFailureError}.
 */
export class LatencyProber {
  private readonly transport: ProbeTransport;
  private readonly timeoutMs: number;
  private readonly logger: StructuredLogger | undefined;

  constructor(options: LatencyProberOptions) {
    this.transport = options.transport;
    this.timeoutMs = z.number().int().positive().parse(options.timeoutMs);
    this.logger = options.logger;
  }

  async measure(hosts: readonly string[], options: MeasureOptions): Promise<RankingResult> {
    const { tries, strategy } = MeasureOptionsSchema.parse({ tries: options.tries, strategy: options.strategy });
    const targets = [...new Set(hosts)];
    const result =
      strategy === "sequential"
        ? await this.measureSequential(targets, tries, options.signal)
        : await this.measureBatched(targets, tries, options.signal);

    if (targets.length > 0 && result.latencies.size === 0 && !result.cancelled) {
      throw new ProbeFailureError(result.failures);
    }
    return result;
  }

  private async measureSequential(
    hosts: readonly string[],
    tries: number,
    signal: AbortSignal | undefined,
  ): Promise<RankingResult> {
    const latencies = new Map<string, number>();
    const failures = new Map<string, string>();
    let cancelled = false;

    for (const host of hosts) {
      if (signal?.aborted) {
        cancelled = true;
        break;
      }
      let sum = 0;
      let failed = false;
      for (let attempt = 0; attempt < tries && !failed; attempt += 1) {
        try {
          sum += await this.probeOnce(host, signal);
        } catch (error) {
          if (isFatal(error)) {
            throw error;
          }
          if (error instanceof ProbeCancelledError) {
            cancelled = true;
            break;
          }
          failed = true;
          this.recordFailure(failures, host, error);
        }
      }
      if (cancelled) {
        break;
      }
      if (!failed) {
        latencies.set(host, Math.floor(sum / tries));
      }
    }

    return { latencies, failures, cancelled, strategy: "sequential", tries };
  }

  private async measureBatched(
    hosts: readonly string[],
    tries: number,
    signal: AbortSignal | undefined,
  ): Promise<RankingResult> {
    const sums = new Map<string, number>(hosts.map((host) => [host, 0]));
    const failures = new Map<string, string>();
    let completedRounds = 0;
    let cancelled = false;

    for (let round = 0; round < tries; round += 1) {
      const targets = [...sums.keys()];
      if (targets.length === 0) {
        break;
      }
      if (signal?.aborted) {
        cancelled = true;
        break;
      }
      const outcomes = await this.probeRound(targets, signal);
      if (signal?.aborted) {
        // A round interrupted halfway is discarded so every host keeps the same denominator.
        cancelled = true;
        break;
      }
      for (const outcome of outcomes.values()) {
        if (!outcome.ok && isFatal(outcome.error)) {
          throw outcome.error;
        }
      }
      for (const host of targets) {
        const outcome = outcomes.get(host);
        const previous = sums.get(host);
        if (outcome?.ok && previous !== undefined) {
          sums.set(host, previous + outcome.latencyUs);
          continue;
        }
        sums.delete(host);
        this.recordFailure(failures, host, outcome ? outcome.error : new Error("no reply collected"));
      }
      completedRounds += 1;
    }

    const latencies = new Map<string, number>();
    if (completedRounds > 0) {
      for (const [host, sum] of sums) {
        latencies.set(host, Math.floor(sum / completedRounds));
      }
    }
    return { latencies, failures, cancelled, strategy: "batched", tries: completedRounds };
  }

  private async probeRound(hosts: readonly string[], signal: AbortSignal | undefined): Promise<Map<string, ProbeOutcome>> {
    const transport = this.transport;
    if (transport.probeRound) {
      const controller = new AbortController();
      const release = forwardAbort(signal, controller);
      try {
        return await transport.probeRound(hosts, { signal: controller.signal, timeoutMs: this.timeoutMs });
      } catch (error) {
        if (isFatal(error)) {
          throw error;
        }
        // A failed round fails each of its hosts.
        return new Map(hosts.map((host): [string, ProbeOutcome] => [host, { ok: false, error }]));
      } finally {
        release();
      }
    }

    const settled = await Promise.all(
      hosts.map(async (host): Promise<[string, ProbeOutcome]> => {
        try {
          return [host, { ok: true, latencyUs: await this.probeOnce(host, signal) }];
        } catch (error) {
          return [host, { ok: false, error }];
        }
      }),
    );
    return new Map(settled);
  }

  /** One probe bounded by the timeout and the caller's signal. */
  private async probeOnce(host: string, signal: AbortSignal | undefined): Promise<number> {
    if (signal?.aborted) {
      throw new ProbeCancelledError();
    }
    const controller = new AbortController();
    let rejectGuard: (error: Error) => void = () => {};
    const guard = new Promise<never>((_, reject) => {
      rejectGuard = reject;
    });
    const timer = runtimeSetTimeout(() => {
      const error = new ProbeTimeoutError(host, this.timeoutMs);
      controller.abort(error);
      rejectGuard(error);
    }, this.timeoutMs);
    const onAbort = (): void => {
      const error = new ProbeCancelledError();
      controller.abort(error);
      rejectGuard(error);
    };
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      return await Promise.race([
        this.transport.probe(host, { signal: controller.signal, timeoutMs: this.timeoutMs }),
        guard,
      ]);
    } finally {
      runtimeClearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    }
  }

  private recordFailure(failures: Map<string, string>, host: string, error: unknown): void {
    const reason = describeFailure(error);
    failures.set(host, reason);
    this.logger?.debug("latency_probe_host_failed", { host, reason });
  }
}

/** Mirrors {@link source} aborting onto {@link target}; returns the unsubscribe hook. */
function forwardAbort(source: AbortSignal | undefined, target: AbortController): () => void {
  if (!source) {
    return () => {};
  }
  if (source.aborted) {
    target.abort(source.reason);
    return () => {};
  }
  const listener = (): void => target.abort(source.reason);
  source.addEventListener("abort", listener, { once: true });
  return () => source.removeEventListener("abort", listener);
}
