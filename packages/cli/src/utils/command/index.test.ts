// pattern: Imperative Shell
import { pino } from "pino";
import { describe, expect, it } from "vitest";

import { classifyCommandFailure, createCommand } from "./index.js";

describe("CommandBuilder", () => {
  const logger = pino({ level: "silent" });
  const node = process.execPath;

  it("should return stdout of the child", async () => {
    const result = await createCommand(node, logger)
      .addArgs(["-e", "process.stdout.write('hello world')"])
      .output();

    expect(result).toBe("hello world");
  });

  it("should pass input text to the child's stdin", async () => {
    const result = await createCommand(node, logger)
      .arg("-e")
      .arg(
        "let s='';process.stdin.on('data',c=>s+=c).on('end',()=>process.stdout.write(s.toUpperCase()))"
      )
      .input("marker")
      .output();

    expect(result).toBe("MARKER");
  });

  it("should return an empty string when output is ignored", async () => {
    const result = await createCommand(node, logger)
      .addArgs(["-e", "process.stdout.write('discarded')"])
      .ignoreOutput()
      .output();

    expect(result).toBe("");
  });

  it("should classify a non-zero exit as a failure with its exit code", async () => {
    const error = await createCommand(node, logger)
      .addArgs(["-e", "process.exit(3)"])
      .output()
      .then(
        () => undefined,
        (e: unknown) => e
      );

    const failure = classifyCommandFailure(node, error);
    expect(failure.type).toBe("failed");
    expect(failure.type === "failed" && failure.exitCode).toBe(3);
  });

  it("should classify a missing binary as not found", async () => {
    const missing = "appctl-definitely-not-a-real-binary";
    const error = await createCommand(missing, logger)
      .output()
      .then(
        () => undefined,
        (e: unknown) => e
      );

    expect(classifyCommandFailure(missing, error)).toEqual({
      type: "not_found",
      command: missing,
    });
  });

  it("should treat non-execa errors as failures", () => {
    expect(classifyCommandFailure("xclip", new Error("boom"))).toEqual({
      type: "failed",
      command: "xclip",
      message: "boom",
    });
  });
});
