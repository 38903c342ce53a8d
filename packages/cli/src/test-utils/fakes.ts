// pattern: Functional Core
// In-memory capability providers for tests. None of them touch the OS.

import { dirname } from "node:path";

import { CapabilityError } from "../utils/errors.js";

import type {
  ClipboardProvider,
  FilesystemProvider,
  HttpSnippet,
  NetworkProvider,
} from "../capabilities/types.js";

type FsOperation = "read" | "write" | "removeFile" | "createDirAll" | "removeDirAll";

export interface MemoryFilesystemOptions {
  tempDir?: string;
  /** Reject the named operation with this error */
  failures?: Partial<Record<FsOperation, CapabilityError>>;
  /** Rewrite data on its way back out of read() */
  tamper?: (path: string, data: Uint8Array) => Uint8Array;
}

export class MemoryFilesystem implements FilesystemProvider {
  readonly files = new Map<string, Uint8Array>();
  readonly dirs = new Set<string>();
  readonly calls: string[] = [];
  private readonly options: MemoryFilesystemOptions;

  constructor(options: MemoryFilesystemOptions = {}) {
    this.options = options;
  }

  private enter(operation: FsOperation, path: string): void {
    this.calls.push(`${operation} ${path}`);
    const failure = this.options.failures?.[operation];
    if (failure) {
      throw failure;
    }
  }

  async read(path: string): Promise<Uint8Array> {
    this.enter("read", path);
    const data = this.files.get(path);
    if (!data) {
      throw new CapabilityError("io", `ENOENT: no such file or directory, open '${path}'`);
    }
    return this.options.tamper ? this.options.tamper(path, data) : data;
  }

  async write(path: string, data: Uint8Array): Promise<void> {
    this.enter("write", path);
    this.dirs.add(dirname(path));
    this.files.set(path, Uint8Array.from(data));
  }

  async removeFile(path: string): Promise<void> {
    this.enter("removeFile", path);
    this.files.delete(path);
  }

  async createDirAll(path: string): Promise<void> {
    this.enter("createDirAll", path);
    this.dirs.add(path);
  }

  async removeDirAll(path: string): Promise<void> {
    this.enter("removeDirAll", path);
    for (const dir of [...this.dirs]) {
      if (dir === path || dir.startsWith(`${path}/`)) this.dirs.delete(dir);
    }
    for (const file of [...this.files.keys()]) {
      if (file.startsWith(`${path}/`)) this.files.delete(file);
    }
  }

  async exists(path: string): Promise<boolean> {
    return this.dirs.has(path) || this.files.has(path);
  }

  tempDir(): string {
    return this.options.tempDir ?? "/virtual/tmp";
  }
}

export interface ScriptedNetworkOptions {
  addresses?: string[] | CapabilityError;
  response?: HttpSnippet | CapabilityError;
}

/**
 * Network that answers from a script and records every request
 */
export class ScriptedNetwork implements NetworkProvider {
  readonly resolved: string[] = [];
  readonly fetched: { url: string; timeoutMs: number }[] = [];
  private readonly options: ScriptedNetworkOptions;

  constructor(options: ScriptedNetworkOptions = {}) {
    this.options = options;
  }

  async dnsResolve(host: string): Promise<string[]> {
    this.resolved.push(host);
    const addresses = this.options.addresses ?? ["192.0.2.10"];
    if (addresses instanceof Error) throw addresses;
    return addresses;
  }

  async httpsGet(url: string, timeoutMs: number): Promise<HttpSnippet> {
    this.fetched.push({ url, timeoutMs });
    const response = this.options.response ?? { status: 200, body: "{}" };
    if (response instanceof Error) throw response;
    return response;
  }
}

export interface RecordingClipboardOptions {
  writeError?: CapabilityError;
  readError?: CapabilityError;
  /** Returned by readText() instead of the last written text */
  readBack?: string;
}

/**
 * Clipboard that keeps its text in memory and logs each call
 */
export class RecordingClipboard implements ClipboardProvider {
  readonly name = "recording";
  readonly calls: string[] = [];
  text = "";
  private readonly options: RecordingClipboardOptions;

  constructor(options: RecordingClipboardOptions = {}) {
    this.options = options;
  }

  async readText(): Promise<string> {
    this.calls.push("read");
    if (this.options.readError) throw this.options.readError;
    return this.options.readBack ?? this.text;
  }

  async writeText(text: string): Promise<void> {
    this.calls.push(`write ${text}`);
    if (this.options.writeError) throw this.options.writeError;
    this.text = text;
  }
}
