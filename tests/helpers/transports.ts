import type { ProbeRequest, ProbeTransport } from "../../src/ranking/prober.js";

/** Reply scripted for one probe: a latency, an error to throw, or `"hang"` to never settle. */
export type ScriptedReply = number | Error | "hang";

/**
 * In-process transport replaying scripted replies per host, in order. A host
 * without a remaining reply fails with `no scripted reply for <host>`.
 */
export class ScriptedTransport implements ProbeTransport {
  public readonly calls: string[] = [];
  private readonly script: Map<string, ScriptedReply[]>;

  constructor(
    script: Record<string, ScriptedReply[]>,
    private readonly beforeReply?: (host: string, callIndex: number) => void,
  ) {
    this.script = new Map(Object.entries(script).map(([host, replies]) => [host, [...replies]]));
  }

  async probe(host: string, _request: ProbeRequest): Promise<number> {
    const callIndex = this.calls.length;
    this.calls.push(host);
    this.beforeReply?.(host, callIndex);
    const reply = this.script.get(host)?.shift();
    if (reply === undefined) {
      throw new Error(`no scripted reply for ${host}`);
    }
    if (reply === "hang") {
      return new Promise<number>(() => {});
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  }
}
