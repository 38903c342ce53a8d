import { describe, expect, it } from "vitest";

import { ErrorCode, Status } from "../engine/types.js";
import { createTestContext } from "../test-utils/context-helpers.js";
import { RecordingClipboard } from "../test-utils/fakes.js";
import { CapabilityError } from "../utils/errors.js";

import { clipboardMarker, runClipboardProbe } from "./clipboard.js";

describe("runClipboardProbe", () => {
  it("skips in a headless context without touching the clipboard", async () => {
    const clipboard = new RecordingClipboard();
    const result = await runClipboardProbe(createTestContext({ clipboard, headless: true }));

    expect(result.status).toBe(Status.Skip);
    expect(result.error).toEqual({
      code: ErrorCode.Unsupported,
      message: "headless environment: no clipboard access",
    });
    expect(clipboard.calls).toEqual([]);
  });

  it("writes a marker and reads it back", async () => {
    const clipboard = new RecordingClipboard();
    const result = await runClipboardProbe(createTestContext({ clipboard }));

    const marker = clipboardMarker(result.run_id);
    expect(marker).toBe(`appctl_clipboard_probe_${result.run_id.slice(0, 8)}`);
    expect(result.status).toBe(Status.Pass);
    expect(clipboard.calls).toEqual([`write ${marker}`, "read"]);
    expect(Object.keys(result.timing.steps).sort()).toEqual(["read", "write"]);
  });

  it("ignores surrounding whitespace on read-back", async () => {
    const clipboard = new RecordingClipboard();
    const original = clipboard.readText.bind(clipboard);
    clipboard.readText = async () => `${await original()}\n`;

    const result = await runClipboardProbe(createTestContext({ clipboard }));
    expect(result.status).toBe(Status.Pass);
  });

  it("reports a different read-back as external interference", async () => {
    const clipboard = new RecordingClipboard({ readBack: "someone else's text" });
    const result = await runClipboardProbe(createTestContext({ clipboard }));

    expect(result.status).toBe(Status.Error);
    expect(result.error).toEqual({
      code: ErrorCode.ExternalInterference,
      message: "clipboard read-back does not match written text",
    });
  });

  it("skips when no clipboard utility is installed", async () => {
    const clipboard = new RecordingClipboard({
      writeError: new CapabilityError("dependency_missing", "none of xclip, xsel, or wl-copy found"),
    });
    const result = await runClipboardProbe(createTestContext({ clipboard }));

    expect(result.status).toBe(Status.Skip);
    expect(result.error).toEqual({
      code: ErrorCode.DependencyMissing,
      message:
        "clipboard probe failed at write: dependency missing: none of xclip, xsel, or wl-copy found",
    });
    expect(clipboard.calls).toHaveLength(1);
  });

  it("skips when the backend is unsupported", async () => {
    const clipboard = new RecordingClipboard({
      readError: new CapabilityError("unsupported", "clipboard unavailable in headless environment"),
    });
    const result = await runClipboardProbe(createTestContext({ clipboard }));

    expect(result.status).toBe(Status.Skip);
    expect(result.error?.code).toBe(ErrorCode.Unsupported);
    expect(result.error?.message).toBe(
      "clipboard probe failed at read: unsupported: clipboard unavailable in headless environment"
    );
  });

  it("treats permission and tool failures as errors", async () => {
    const denied = await runClipboardProbe(
      createTestContext({
        clipboard: new RecordingClipboard({
          writeError: new CapabilityError("permission_denied", "pasteboard locked"),
        }),
      })
    );
    const failed = await runClipboardProbe(
      createTestContext({
        clipboard: new RecordingClipboard({
          writeError: new CapabilityError("other", "xclip exited with code 1: Error: Can't open display"),
        }),
      })
    );

    expect(denied.status).toBe(Status.Error);
    expect(denied.error?.code).toBe(ErrorCode.PermissionDenied);
    expect(failed.status).toBe(Status.Error);
    expect(failed.error).toEqual({
      code: ErrorCode.InternalError,
      message: "clipboard probe failed at write: xclip exited with code 1: Error: Can't open display",
    });
  });
});
