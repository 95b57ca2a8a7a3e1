import { describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";

import {
  LatencyProber,
  ProbeFailureError,
  ProbePermissionDeniedError,
  ProbeUnavailableError,
  type ProbeOutcome,
  type ProbeTransport,
} from "../src/ranking/prober.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";
import { ScriptedTransport } from "./helpers/transports.js";

function prober(transport: ProbeTransport, logger?: RecordingLogger): LatencyProber {
  return new LatencyProber({ transport, timeoutMs: 500, ...(logger ? { logger } : {}) });
}

describe("ranking latency prober", () => {
  it("averages three batched rounds per host", async () => {
    const transport = new ScriptedTransport({ a: [10, 20, 30], b: [40, 40, 40] });

    const result = await prober(transport).measure(["a", "b"], { tries: 3, strategy: "batched" });

    expect([...result.latencies]).to.deep.equal([
      ["a", 20],
      ["b", 40],
    ]);
    expect(result.cancelled).to.equal(false);
    expect(result.strategy).to.equal("batched");
    expect(result.tries).to.equal(3);
    expect(transport.calls).to.deep.equal(["a", "b", "a", "b", "a", "b"]);
  });

  it("measures one host at a time in sequential mode", async () => {
    const transport = new ScriptedTransport({ a: [10, 20, 30], b: [40, 40, 40] });

    const result = await prober(transport).measure(["a", "b"], { tries: 3, strategy: "sequential" });

    expect(Object.fromEntries(result.latencies)).to.deep.equal({ a: 20, b: 40 });
    expect(transport.calls).to.deep.equal(["a", "a", "a", "b", "b", "b"]);
  });

  it("floors the mean of fractional microsecond readings", async () => {
    const transport = new ScriptedTransport({ a: [10.5, 10.4] });

    const result = await prober(transport).measure(["a"], { tries: 2, strategy: "batched" });

    expect(result.latencies.get("a")).to.equal(10);
  });

  for (const strategy of ["batched", "sequential"] as const) {
    it(`drops a host with one failed try (${strategy})`, async () => {
      const logger = new RecordingLogger();
      const transport = new ScriptedTransport({ a: [10, 20, 30], b: [40, new Error("no reply from b"), 40] });

      const result = await prober(transport, logger).measure(["a", "b"], { tries: 3, strategy });

      expect(Object.fromEntries(result.latencies)).to.deep.equal({ a: 20 });
      expect(Object.fromEntries(result.failures)).to.deep.equal({ b: "no reply from b" });
      expect(logger.entries).to.deep.equal([
        { level: "debug", message: "latency_probe_host_failed", payload: { host: "b", reason: "no reply from b" } },
      ]);
    });

    it(`aborts the pass on a permission error (${strategy})`, async () => {
      const transport = new ScriptedTransport({ a: [new ProbePermissionDeniedError()], b: [40] });

      try {
        await prober(transport).measure(["a", "b"], { tries: 1, strategy });
        expect.fail("the permission error should abort the pass");
      } catch (error) {
        expect(error).to.be.instanceOf(ProbePermissionDeniedError);
        expect((error as ProbePermissionDeniedError).code).to.equal("E-PROBE-PERMISSION");
      }
    });

    it(`throws ProbeFailureError when every host fails (${strategy})`, async () => {
      const transport = new ScriptedTransport({ a: [new Error("cannot resolve a")], b: [] });

      try {
        await prober(transport).measure(["a", "b"], { tries: 2, strategy });
        expect.fail("an empty measurement must not succeed");
      } catch (error) {
        expect(error).to.be.instanceOf(ProbeFailureError);
        expect((error as ProbeFailureError).message).to.equal("no host answered the latency probes (2 failed)");
        expect((error as ProbeFailureError).details).to.deep.equal({
          failures: { a: "cannot resolve a", b: "no scripted reply for b" },
        });
      }
    });
  }

  it("returns an empty result for an empty host list", async () => {
    const result = await prober(new ScriptedTransport({})).measure([], { tries: 2, strategy: "batched" });

    expect(result.latencies.size).to.equal(0);
    expect(result.failures.size).to.equal(0);
  });

  it("probes duplicated hosts once", async () => {
    const transport = new ScriptedTransport({ a: [15] });

    const result = await prober(transport).measure(["a", "a"], { tries: 1, strategy: "sequential" });

    expect(transport.calls).to.deep.equal(["a"]);
    expect(result.latencies.get("a")).to.equal(15);
  });

  it("rejects invalid options", async () => {
    const transport = new ScriptedTransport({ a: [1] });

    expect(() => new LatencyProber({ transport, timeoutMs: 0 })).to.throw();
    try {
      await prober(transport).measure(["a"], { tries: 0, strategy: "batched" });
      expect.fail("zero tries should be rejected");
    } catch (error) {
      expect((error as Error).name).to.equal("ZodError");
    }
  });

  it("fails a host whose probe exceeds the timeout", async () => {
    const clock = sinon.useFakeTimers();
    try {
      const transport = new ScriptedTransport({ slow: ["hang"], fast: [120] });
      const pending = prober(transport).measure(["slow", "fast"], { tries: 1, strategy: "sequential" });

      await clock.tickAsync(500);
      const result = await pending;

      expect(Object.fromEntries(result.latencies)).to.deep.equal({ fast: 120 });
      expect(Object.fromEntries(result.failures)).to.deep.equal({ slow: "probe to slow timed out after 500ms" });
    } finally {
      clock.restore();
    }
  });

  it("uses the transport's round primitive when it offers one", async () => {
    const probeRound = sinon.stub().resolves(
      new Map<string, ProbeOutcome>([
        ["a", { ok: true, latencyUs: 30 }],
        ["b", { ok: false, error: new Error("host unreachable") }],
      ]),
    );
    const transport: ProbeTransport = { probe: sinon.stub().rejects(new Error("unused")), probeRound };

    const result = await prober(transport).measure(["a", "b", "c"], { tries: 1, strategy: "batched" });

    expect(probeRound.calledOnce).to.equal(true);
    expect(probeRound.firstCall.args[0]).to.deep.equal(["a", "b", "c"]);
    expect(Object.fromEntries(result.latencies)).to.deep.equal({ a: 30 });
    expect(Object.fromEntries(result.failures)).to.deep.equal({ b: "host unreachable", c: "no reply collected" });
  });

  it("rethrows an unavailable transport reported by a round", async () => {
    const transport: ProbeTransport = {
      probe: sinon.stub().rejects(new Error("unused")),
      probeRound: sinon.stub().resolves(new Map<string, ProbeOutcome>([["a", { ok: false, error: new ProbeUnavailableError() }]])),
    };

    try {
      await prober(transport).measure(["a"], { tries: 1, strategy: "batched" });
      expect.fail("the unavailable transport should abort the pass");
    } catch (error) {
      expect(error).to.be.instanceOf(ProbeUnavailableError);
    }
  });

  it("fails every host of a round whose primitive rejects", async () => {
    const transport: ProbeTransport = {
      probe: sinon.stub().rejects(new Error("unused")),
      probeRound: sinon.stub().rejects(new Error("socket error: network unreachable")),
    };

    try {
      await prober(transport).measure(["a", "b"], { tries: 1, strategy: "batched" });
      expect.fail("a failed round should fail the pass");
    } catch (error) {
      expect(error).to.be.instanceOf(ProbeFailureError);
      expect((error as ProbeFailureError).details).to.deep.equal({
        failures: { a: "socket error: network unreachable", b: "socket error: network unreachable" },
      });
    }
  });

  it("returns the hosts measured before a sequential pass was cancelled", async () => {
    const controller = new AbortController();
    const transport = new ScriptedTransport({ a: [10, 30], b: ["hang"] }, (host) => {
      if (host === "b") {
        controller.abort();
      }
    });

    const result = await prober(transport).measure(["a", "b", "c"], {
      tries: 2,
      strategy: "sequential",
      signal: controller.signal,
    });

    expect(result.cancelled).to.equal(true);
    expect(Object.fromEntries(result.latencies)).to.deep.equal({ a: 20 });
    expect(result.failures.size).to.equal(0);
    expect(transport.calls).to.deep.equal(["a", "a", "b"]);
  });

  it("discards the batched round interrupted by cancellation", async () => {
    const controller = new AbortController();
    const transport = new ScriptedTransport({ a: [10, 99, 99], b: [40, 99, 99] }, (_host, callIndex) => {
      if (callIndex === 2) {
        controller.abort();
      }
    });

    const result = await prober(transport).measure(["a", "b"], {
      tries: 3,
      strategy: "batched",
      signal: controller.signal,
    });

    expect(result.cancelled).to.equal(true);
    expect(result.tries).to.equal(1);
    expect(Object.fromEntries(result.latencies)).to.deep.equal({ a: 10, b: 40 });
  });
});
