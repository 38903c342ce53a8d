// pattern: Imperative Shell
import { access, mkdtemp, rm, writeFile } from "node:fs/promises";
import { connect, type Socket } from "node:net";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { CommandRegistry } from "../commands/registry.js";
import { createTestContext } from "../test-utils/context-helpers.js";

import { DaemonServer } from "./server.js";

import type { DaemonResponse } from "./protocol.js";

interface Client {
  socket: Socket;
  next(): Promise<DaemonResponse>;
  received(): number;
}

async function openClient(socketPath: string): Promise<Client> {
  const socket = connect(socketPath);
  await new Promise<void>((resolve, reject) => {
    socket.once("connect", resolve);
    socket.once("error", reject);
  });

  let buffer = "";
  const responses: DaemonResponse[] = [];
  const waiters: ((response: DaemonResponse) => void)[] = [];
  let count = 0;

  socket.setEncoding("utf8");
  socket.on("data", (chunk: string) => {
    buffer += chunk;
    let index: number;
    while ((index = buffer.indexOf("\n")) !== -1) {
      const response: DaemonResponse = JSON.parse(buffer.slice(0, index));
      buffer = buffer.slice(index + 1);
      count += 1;
      const waiter = waiters.shift();
      if (waiter) waiter(response);
      else responses.push(response);
    }
  });

  return {
    socket,
    received: () => count,
    next: () =>
      new Promise(resolve => {
        const ready = responses.shift();
        if (ready) resolve(ready);
        else waiters.push(resolve);
      }),
  };
}

function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

describe("DaemonServer", () => {
  let testDir: string;
  let socketPath: string;
  let server: DaemonServer;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), "appctl-d-"));
    socketPath = join(testDir, "appctl.sock");
    server = new DaemonServer(socketPath, {
      registry: CommandRegistry.withBuiltins(),
      context: createTestContext(),
    });
  });

  afterEach(async () => {
    await server.stop();
    await rm(testDir, { recursive: true, force: true });
  });

  it("answers requests over the socket", async () => {
    await server.start();
    const client = await openClient(socketPath);

    client.socket.write('{"id":"1","method":"doctor"}\n');
    const response = await client.next();

    expect(response.id).toBe("1");
    expect(response.result?.data).toHaveProperty("headless", expect.any(Boolean));
    client.socket.destroy();
  });

  it("replaces a stale socket file", async () => {
    await writeFile(socketPath, "stale");
    await server.start();

    expect(server.listening).toBe(true);
  });

  it("serves a second client only after the first disconnects", async () => {
    await server.start();
    const first = await openClient(socketPath);
    const second = await openClient(socketPath);

    first.socket.write('{"id":"first","method":"call","params":{"cmd":"ping"}}\n');
    expect((await first.next()).id).toBe("first");

    second.socket.write('{"id":"second","method":"call","params":{"cmd":"ping"}}\n');
    await delay(100);
    expect(second.received()).toBe(0);

    first.socket.end();
    expect((await second.next()).id).toBe("second");
    second.socket.destroy();
  });

  it("removes the socket file on stop", async () => {
    await server.start();
    await server.stop();

    await expect(access(socketPath)).rejects.toThrow();
  });
});
