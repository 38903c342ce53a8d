// pattern: Imperative Shell

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, type MockInstance, vi } from "vitest";

import {
  createProgram,
  getDefaultLogLevel,
  isNonInteractive,
  parseLogFormat,
  parseLogLevel,
} from "./program.js";

const GLOBALS = ["node", "appctl", "--non-interactive", "--format", "json", "--log-level", "error"];

describe("appctl program", () => {
  let stdout: MockInstance<typeof process.stdout.write>;
  let testDir: string;

  async function run(...args: string[]): Promise<string> {
    const program = createProgram().exitOverride();
    await program.parseAsync([...GLOBALS, ...args]);
    return stdout.mock.calls.map(call => String(call[0])).join("");
  }

  beforeEach(async () => {
    stdout = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
    testDir = await mkdtemp(join(tmpdir(), "appctl-cli-test-"));
  });

  afterEach(async () => {
    stdout.mockRestore();
    process.exitCode = undefined;
    await rm(testDir, { recursive: true, force: true });
  });

  it("lists commands", async () => {
    expect(await run("commands", "--json")).toBe('["ping","read_file","write_file"]\n');
  });

  it("calls ping and exits 0", async () => {
    const output = JSON.parse(await run("call", "ping", "--json"));

    expect(output).toMatchObject({ command: "call", target: "ping", status: "pass", data: { pong: true } });
    expect(process.exitCode).toBe(0);
  });

  it("reports malformed --args without consulting the registry", async () => {
    const output = JSON.parse(await run("call", "nonexistent", "--args", "{bad", "--json"));

    expect(output.status).toBe("error");
    expect(output.error.code).toBe("INVALID_INPUT");
    expect(output.error.message).toMatch(/^invalid JSON args: /);
    expect(output.timing).toEqual({ total_ms: 0, steps: {} });
    expect(process.exitCode).toBe(2);
  });

  it("prints human output for an unknown probe", async () => {
    const lines = (await run("probe", "bluetooth")).split("\n");

    expect(lines[0]).toBe("[ERROR] probe bluetooth");
    expect(lines).toContain(
      "  error:  INVALID_INPUT - unknown probe: bluetooth (available: filesystem, network, clipboard)"
    );
    expect(process.exitCode).toBe(2);
  });

  it("writes artifacts for a call", async () => {
    const output = JSON.parse(await run("call", "ping", "--json", "--artifacts", testDir));

    expect(output.artifacts).toEqual([
      join(testDir, output.run_id, "result.json"),
      join(testDir, output.run_id, "events.jsonl"),
    ]);
  });

  it("runs a scenario file and exits 1 on an expectation mismatch", async () => {
    const file = join(testDir, "mismatch.yaml");
    await writeFile(file, "name: mismatch\nsteps:\n  - call: ping\n    expect_status: fail\n");

    const output = JSON.parse(await run("run-scenario", file, "--json"));

    expect(output.name).toBe("mismatch");
    expect(output.overall_status).toBe("fail");
    expect(output.step_results[0].status).toBe("pass");
    expect(process.exitCode).toBe(1);
  });

  it("reports an unreadable scenario file as an I/O error", async () => {
    const file = join(testDir, "missing.yaml");
    const output = JSON.parse(await run("run-scenario", file, "--json"));

    expect(output).toMatchObject({
      command: "run-scenario",
      target: file,
      status: "error",
      error: { code: "IO_ERROR" },
    });
    expect(process.exitCode).toBe(2);
  });

  it("skips emit", async () => {
    const output = JSON.parse(await run("emit", "tray-click", "--json"));

    expect(output.status).toBe("skip");
    expect(["UNSUPPORTED", "UNIMPLEMENTED"]).toContain(output.error.code);
    expect(process.exitCode).toBe(0);
  });

  it("skips emit even when the payload is not JSON", async () => {
    const output = JSON.parse(await run("emit", "file-drop", "--payload", "{", "--json"));

    expect(output.status).toBe("skip");
    expect(output.target).toBe("file-drop");
    expect(process.exitCode).toBe(0);
  });

  it("fails with exit code 2 when the config file is invalid", async () => {
    const config = join(testDir, "bad.json");
    await writeFile(config, JSON.stringify({ network: { timeoutMs: -1 } }));

    const program = createProgram().exitOverride();
    await program.parseAsync([...GLOBALS, "--config", config, "call", "ping"]);

    expect(stdout).not.toHaveBeenCalled();
    expect(process.exitCode).toBe(2);
  });
});

describe("option parsing", () => {
  it("accepts only known log levels and formats", () => {
    expect(parseLogLevel("debug")).toBe("debug");
    expect(() => parseLogLevel("loud")).toThrow("Invalid log level: loud");
    expect(parseLogFormat("json")).toBe("json");
    expect(() => parseLogFormat("xml")).toThrow("Invalid log format: xml");
  });

  it("reads defaults from the environment", () => {
    expect(getDefaultLogLevel({ APPCTL_LOG_LEVEL: "trace" })).toBe("trace");
    expect(getDefaultLogLevel({ APPCTL_LOG_LEVEL: "chatty" })).toBe("info");
    expect(isNonInteractive({}, true)).toBe(false);
    expect(isNonInteractive({ APPCTL_NON_INTERACTIVE: "1" }, true)).toBe(true);
    expect(isNonInteractive({}, false)).toBe(true);
  });
});
