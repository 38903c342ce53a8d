// pattern: Imperative Shell

import { access, mkdir, readFile, rm, unlink, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname } from "node:path";

import { CapabilityError } from "../utils/errors.js";

import type { FilesystemProvider } from "./types.js";

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

/**
 * Separate permission failures from every other I/O failure
 */
export function mapFsError(error: unknown, action: string, path: string): CapabilityError {
  const message = error instanceof Error ? error.message : String(error);
  const code = errnoCode(error);
  if (code === "EACCES" || code === "EPERM") {
    return new CapabilityError("permission_denied", `cannot ${action} ${path}: ${message}`);
  }
  return new CapabilityError("io", message);
}

/**
 * Filesystem backed by node:fs
 */
export class StandardFilesystem implements FilesystemProvider {
  async read(path: string): Promise<Uint8Array> {
    try {
      return await readFile(path);
    } catch (error) {
      throw mapFsError(error, "read", path);
    }
  }

  async write(path: string, data: Uint8Array): Promise<void> {
    try {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, data);
    } catch (error) {
      throw mapFsError(error, "write", path);
    }
  }

  async removeFile(path: string): Promise<void> {
    try {
      await unlink(path);
    } catch (error) {
      throw mapFsError(error, "remove", path);
    }
  }

  async createDirAll(path: string): Promise<void> {
    try {
      await mkdir(path, { recursive: true });
    } catch (error) {
      throw mapFsError(error, "create", path);
    }
  }

  async removeDirAll(path: string): Promise<void> {
    try {
      await rm(path, { recursive: true });
    } catch (error) {
      throw mapFsError(error, "remove", path);
    }
  }

  async exists(path: string): Promise<boolean> {
    try {
      await access(path);
      return true;
    } catch {
      return false;
    }
  }

  tempDir(): string {
    return tmpdir();
  }
}
