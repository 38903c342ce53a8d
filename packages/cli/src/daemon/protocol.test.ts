import { describe, expect, it } from "vitest";

import { CommandRegistry } from "../commands/registry.js";
import { ErrorCode, Status } from "../engine/types.js";
import { createTestContext } from "../test-utils/context-helpers.js";

import { handleRequestLine, parseRequest, PLACEHOLDER_ID } from "./protocol.js";

const deps = { registry: CommandRegistry.withBuiltins(), context: createTestContext() };

describe("parseRequest", () => {
  it("accepts a request without params", () => {
    expect(parseRequest('{"id":"1","method":"doctor"}')).toEqual({ id: "1", method: "doctor" });
  });

  it("answers invalid JSON with the placeholder id", () => {
    const response = parseRequest("{nope");

    expect(response).toMatchObject({
      id: PLACEHOLDER_ID,
      error: { code: ErrorCode.InvalidInput },
    });
    expect(response).toHaveProperty("error.message", expect.stringMatching(/^invalid JSON request: /));
  });

  it("treats a document without a string id as unparseable", () => {
    expect(parseRequest('{"id":7,"method":"doctor"}')).toEqual({
      id: "unknown",
      error: {
        code: ErrorCode.InvalidInput,
        message: "invalid JSON request: Request validation failed: /id: must be string",
      },
    });
  });
});

describe("handleRequestLine", () => {
  it("answers doctor with the caller's id and a headless flag", async () => {
    const response = await handleRequestLine('{"id":"1","method":"doctor"}', deps);

    expect(response.id).toBe("1");
    expect(response.error).toBeUndefined();
    expect(response.result?.command).toBe("doctor");
    expect(response.result?.data).toHaveProperty("headless", expect.any(Boolean));
  });

  it("delegates call to the registry", async () => {
    const response = await handleRequestLine(
      JSON.stringify({ id: "c1", method: "call", params: { cmd: "ping", args: {} } }),
      deps
    );

    expect(response.id).toBe("c1");
    expect(response.result?.status).toBe(Status.Pass);
    expect(response.result?.data).toEqual({ pong: true });
  });

  it("reports a missing command name through the registry", async () => {
    const response = await handleRequestLine('{"id":"c2","method":"call"}', deps);

    expect(response.result?.status).toBe(Status.Error);
    expect(response.result?.error?.message).toBe("unknown command: ");
  });

  it("delegates probe to the probe runner", async () => {
    const response = await handleRequestLine(
      '{"id":"p1","method":"probe","params":{"target":"clipboard"}}',
      { ...deps, context: createTestContext({ headless: true }) }
    );

    expect(response.result?.target).toBe("clipboard");
    expect(response.result?.status).toBe(Status.Skip);
  });

  it("echoes the id when params is not an object", async () => {
    const doctor = await handleRequestLine('{"id":"7","method":"doctor","params":null}', deps);
    expect(doctor.id).toBe("7");
    expect(doctor.result?.command).toBe("doctor");

    const call = await handleRequestLine('{"id":"8","method":"call","params":[]}', deps);
    expect(call.id).toBe("8");
    expect(call.result?.status).toBe(Status.Error);
    expect(call.result?.error?.message).toBe("unknown command: ");

    const probe = await handleRequestLine('{"id":"9","method":"probe","params":"clipboard"}', deps);
    expect(probe.id).toBe("9");
    expect(probe.result?.error?.code).toBe(ErrorCode.InvalidInput);
  });

  it("rejects an unknown method and echoes the id", async () => {
    const response = await handleRequestLine('{"id":"x9","method":"reboot","params":{}}', deps);

    expect(response).toEqual({
      id: "x9",
      error: { code: ErrorCode.InvalidInput, message: "unknown method: reboot" },
    });
  });
});
