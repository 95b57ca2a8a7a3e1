/**
 * Probe transport backed by the system `ping` binary. Privilege and missing
 * binary errors surface as fatal probe errors; anything else fails one host.
 */
import { execFile } from "node:child_process";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import {
  ProbePermissionDeniedError,
  ProbeUnavailableError,
  type ProbeRequest,
  type ProbeTransport,
} from "./prober.js";

/** Outcome of one command invocation. Spawn failures are reported, not thrown. */
export interface CommandResult {
  readonly exitCode: number | null;
  readonly stdout: string;
  readonly stderr: string;
  /** Node error code when the process could not run or was killed (`ENOENT`, `ABORT_ERR`, ...). */
  readonly errorCode?: string;
}

export type CommandRunner = (
  command: string,
  args: readonly string[],
  options: { readonly signal: AbortSignal; readonly timeoutMs: number },
) => Promise<CommandResult>;

/** Runs {@link command} through `execFile`, never rejecting. */
export const execFileRunner: CommandRunner = (command, args, options) =>
  new Promise((resolve) => {
    execFile(
      command,
      [...args],
      { signal: options.signal, timeout: options.timeoutMs, encoding: "utf8", windowsHide: true },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ exitCode: 0, stdout, stderr });
          return;
        }
        resolve({
          exitCode: typeof error.code === "number" ? error.code : null,
          stdout,
          stderr,
          ...(typeof error.code === "string" ? { errorCode: error.code } : {}),
        });
      },
    );
  });

const PERMISSION_PATTERN = /operation not permitted|permission denied|must be root|are you root/i;
const UNKNOWN_HOST_PATTERN = /unknown host|name or service not known|cannot resolve|temporary failure in name resolution/i;
const RTT_PATTERN = /time\s*[=<]\s*([\d.]+)\s*ms/i;

/** Extracts the round-trip time of a single reply, in microseconds. */
export function parsePingLatency(output: string): number | null {
  const match = RTT_PATTERN.exec(output);
  if (!match?.[1]) {
    return null;
  }
  const millis = Number.parseFloat(match[1]);
  return Number.isFinite(millis) ? millis * 1000 : null;
}

export interface SystemPingTransportOptions {
  /** Binary to run. Defaults to `ping` from the PATH. */
  readonly command?: string;
  readonly runner?: CommandRunner;
}

/** Sends one ICMP echo per call by running `ping -n -c 1 -W <seconds> <host>`. */
export class SystemPingTransport implements ProbeTransport {
  private readonly command: string;
  private readonly runner: CommandRunner;

  constructor(options: SystemPingTransportOptions = {}) {
    this.command = options.command ?? "ping";
    this.runner = options.runner ?? execFileRunner;
  }

  async probe(host: string, request: ProbeRequest): Promise<number> {
    const waitSeconds = Math.max(1, Math.ceil(request.timeoutMs / 1000));
    const result = await this.runner(this.command, ["-n", "-c", "1", "-W", String(waitSeconds), host], request);

    if (result.errorCode === "ENOENT") {
      throw new ProbeUnavailableError(`${this.command} is not installed or not on the PATH`);
    }
    if (result.errorCode === "EACCES" || PERMISSION_PATTERN.test(result.stderr)) {
      throw new ProbePermissionDeniedError(`${this.command} is not allowed to send probes: ${firstLine(result.stderr)}`);
    }
    if (result.errorCode !== undefined) {
      throw new Error(`${this.command} ${host} did not complete (${result.errorCode})`);
    }
    if (UNKNOWN_HOST_PATTERN.test(result.stderr)) {
      throw new Error(`cannot resolve ${host}`);
    }

    const latency = result.exitCode === 0 ? parsePingLatency(result.stdout) : null;
    if (latency === null) {
      throw new Error(`no reply from ${host}`);
    }
    return latency;
  }
}

function firstLine(text: string): string {
  return text.trim().split(/\r?\n/)[0] ?? "";
}
