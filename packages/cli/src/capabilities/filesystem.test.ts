// pattern: Imperative Shell
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { mapFsError, StandardFilesystem } from "./filesystem.js";

function errnoError(code: string, message: string): Error {
  return Object.assign(new Error(message), { code });
}

describe("mapFsError", () => {
  it("maps EACCES and EPERM to permission_denied", () => {
    const denied = mapFsError(errnoError("EACCES", "denied"), "read", "/secret");
    expect(denied.kind).toBe("permission_denied");
    expect(denied.message).toBe("permission denied: cannot read /secret: denied");

    expect(mapFsError(errnoError("EPERM", "nope"), "remove", "/x").kind).toBe("permission_denied");
  });

  it("maps every other failure to io", () => {
    const missing = mapFsError(errnoError("ENOENT", "no such file"), "read", "/gone");
    expect(missing.kind).toBe("io");
    expect(missing.message).toBe("io error: no such file");

    expect(mapFsError("odd", "write", "/x").kind).toBe("io");
  });
});

describe("StandardFilesystem", () => {
  const fs = new StandardFilesystem();
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "appctl-fs-test-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("creates missing parents on write and reads the bytes back", async () => {
    const path = join(dir, "nested", "deeper", "file.txt");

    await fs.write(path, new TextEncoder().encode("hello"));

    expect(new TextDecoder().decode(await fs.read(path))).toBe("hello");
    await expect(fs.exists(path)).resolves.toBe(true);
  });

  it("removes files and directory trees", async () => {
    const path = join(dir, "tree", "file.txt");
    await fs.write(path, new Uint8Array([1, 2, 3]));

    await fs.removeFile(path);
    await expect(fs.exists(path)).resolves.toBe(false);

    await fs.removeDirAll(join(dir, "tree"));
    await expect(fs.exists(join(dir, "tree"))).resolves.toBe(false);
  });

  it("rejects a missing file with an io error", async () => {
    await expect(fs.read(join(dir, "absent.txt"))).rejects.toHaveProperty("kind", "io");
  });
});
