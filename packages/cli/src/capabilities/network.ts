// pattern: Imperative Shell

import { lookup } from "node:dns/promises";

import { CapabilityError } from "../utils/errors.js";

import { HTTP_BODY_SNIPPET_BYTES, type HttpSnippet, type NetworkProvider } from "./types.js";

function describeError(error: unknown): string {
  if (error instanceof Error) {
    // fetch wraps the socket error; the cause names what actually happened
    const cause: unknown = error.cause;
    return cause instanceof Error ? `${error.message} (${cause.message})` : error.message;
  }
  return String(error);
}

function isTimeout(error: unknown): boolean {
  return error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError");
}

/**
 * Read at most `limit` bytes of a response body, then release the connection
 */
export async function readBodySnippet(response: Response, limit: number): Promise<string> {
  if (!response.body) {
    return "";
  }

  const reader = response.body.getReader();
  const chunks: Uint8Array[] = [];
  let received = 0;

  try {
    while (received < limit) {
      const { done, value } = await reader.read();
      if (done) break;
      const slice = value.subarray(0, limit - received);
      chunks.push(slice);
      received += slice.length;
    }
  } finally {
    await reader.cancel();
  }

  return Buffer.concat(chunks).toString("utf8");
}

/**
 * Network backed by the system resolver and the global fetch
 */
export class FetchNetwork implements NetworkProvider {
  async dnsResolve(host: string): Promise<string[]> {
    let addresses: string[];
    try {
      const records = await lookup(host, { all: true });
      addresses = records.map(record => record.address);
    } catch (error) {
      throw new CapabilityError("network", `DNS resolution failed for ${host}: ${describeError(error)}`);
    }

    if (addresses.length === 0) {
      throw new CapabilityError("network", `DNS resolution returned no addresses for ${host}`);
    }
    return addresses;
  }

  async httpsGet(url: string, timeoutMs: number): Promise<HttpSnippet> {
    try {
      const response = await fetch(url, {
        signal: AbortSignal.timeout(timeoutMs),
      });
      const body = await readBodySnippet(response, HTTP_BODY_SNIPPET_BYTES);
      return { status: response.status, body };
    } catch (error) {
      if (isTimeout(error)) {
        throw new CapabilityError("timeout", `HTTPS GET ${url} exceeded ${timeoutMs}ms`);
      }
      throw new CapabilityError("network", `HTTPS GET ${url}: ${describeError(error)}`);
    }
  }
}
