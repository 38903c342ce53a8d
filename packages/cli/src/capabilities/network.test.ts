// pattern: Imperative Shell
import { createServer, type RequestListener, type Server } from "node:http";
import { afterEach, describe, expect, it } from "vitest";

import { CapabilityError } from "../utils/errors.js";

import { FetchNetwork, readBodySnippet } from "./network.js";
import { HTTP_BODY_SNIPPET_BYTES } from "./types.js";

describe("readBodySnippet", () => {
  it("caps the body at the limit", async () => {
    const body = await readBodySnippet(new Response("x".repeat(10_000)), 4096);

    expect(body).toHaveLength(4096);
  });

  it("returns a short body whole", async () => {
    await expect(readBodySnippet(new Response("short"), 4096)).resolves.toBe("short");
  });

  it("returns an empty string without a body", async () => {
    await expect(readBodySnippet(new Response(null), 4096)).resolves.toBe("");
  });
});

describe("FetchNetwork.httpsGet", () => {
  let server: Server | undefined;

  async function serve(listener: RequestListener): Promise<string> {
    const started = createServer(listener);
    server = started;
    await new Promise<void>(resolve => started.listen(0, "127.0.0.1", () => resolve()));
    const address = started.address();
    if (address === null || typeof address === "string") {
      throw new Error("test server has no TCP address");
    }
    return `http://127.0.0.1:${address.port}/`;
  }

  afterEach(async () => {
    const running = server;
    server = undefined;
    if (running) {
      running.closeAllConnections();
      await new Promise<void>(resolve => running.close(() => resolve()));
    }
  });

  it("returns the status and a capped body snippet", async () => {
    const url = await serve((_req, res) => {
      res.writeHead(201);
      res.end("y".repeat(HTTP_BODY_SNIPPET_BYTES + 1000));
    });

    const snippet = await new FetchNetwork().httpsGet(url, 5000);

    expect(snippet.status).toBe(201);
    expect(snippet.body).toBe("y".repeat(HTTP_BODY_SNIPPET_BYTES));
  });

  it("reports a server that never answers as a timeout", async () => {
    // Holds the request open without responding
    const url = await serve(() => undefined);

    const error = await new FetchNetwork().httpsGet(url, 200).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CapabilityError);
    expect(error).toHaveProperty("kind", "timeout");
    expect(error).toHaveProperty("message", `timeout: HTTPS GET ${url} exceeded 200ms`);
  });

  it("reports a refused connection as a network error", async () => {
    const url = await serve(() => undefined);
    const running = server;
    server = undefined;
    if (running) {
      await new Promise<void>(resolve => running.close(() => resolve()));
    }

    const error = await new FetchNetwork().httpsGet(url, 5000).catch((e: unknown) => e);

    expect(error).toHaveProperty("kind", "network");
    expect(error).toHaveProperty("message", expect.stringMatching(/^network error: HTTPS GET /));
  });
});
