/**
 * Mocha bootstrap keeping the suite hermetic. Outbound connections through
 * `fetch`, the HTTP agents and `net.Socket#connect` throw `E-NETWORK-BLOCKED`
 * until the run finishes; tests hand the code an in-process `fetch` instead.
 */
import { after } from "mocha";
import { Agent as HttpAgent } from "node:http";
import { Agent as HttpsAgent } from "node:https";
import { Socket } from "node:net";

type RestoreHook = () => void;

const restores: RestoreHook[] = [];

/** Error thrown by every blocked primitive. */
export class NetworkBlockedError extends Error {
  public readonly code = "E-NETWORK-BLOCKED";

  constructor(moduleName: string) {
    super(`network access via ${moduleName} is disabled during tests`);
    this.name = "NetworkBlockedError";
  }
}

function blocked(moduleName: string): (...args: unknown[]) => never {
  return () => {
    throw new NetworkBlockedError(moduleName);
  };
}

function installNetworkGuards(): void {
  const originalHttpCreate = HttpAgent.prototype.createConnection;
  HttpAgent.prototype.createConnection = blocked("http.Agent#createConnection");
  restores.push(() => {
    HttpAgent.prototype.createConnection = originalHttpCreate;
  });

  const originalHttpsCreate = HttpsAgent.prototype.createConnection;
  HttpsAgent.prototype.createConnection = blocked("https.Agent#createConnection");
  restores.push(() => {
    HttpsAgent.prototype.createConnection = originalHttpsCreate;
  });

  const originalSocketConnect = Socket.prototype.connect;
  Socket.prototype.connect = blocked("net.Socket#connect");
  restores.push(() => {
    Socket.prototype.connect = originalSocketConnect;
  });

  const originalFetch = globalThis.fetch;
  globalThis.fetch = async () => {
    throw new NetworkBlockedError("fetch");
  };
  restores.push(() => {
    globalThis.fetch = originalFetch;
  });
}

installNetworkGuards();

after(() => {
  while (restores.length > 0) {
    restores.pop()?.();
  }
});
