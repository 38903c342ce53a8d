// pattern: Functional Core
// Capability provider contracts. Every operation either resolves or rejects
// with a CapabilityError; nothing else escapes a provider.

export interface FilesystemProvider {
  read(path: string): Promise<Uint8Array>;
  /** Creates missing parent directories */
  write(path: string, data: Uint8Array): Promise<void>;
  removeFile(path: string): Promise<void>;
  createDirAll(path: string): Promise<void>;
  removeDirAll(path: string): Promise<void>;
  exists(path: string): Promise<boolean>;
  tempDir(): string;
}

export interface HttpSnippet {
  status: number;
  /** At most HTTP_BODY_SNIPPET_BYTES of the response body */
  body: string;
}

export interface NetworkProvider {
  /** Resolves to at least one address; zero addresses is a failure */
  dnsResolve(host: string): Promise<string[]>;
  httpsGet(url: string, timeoutMs: number): Promise<HttpSnippet>;
}

export interface ClipboardProvider {
  readonly name: string;
  readText(): Promise<string>;
  writeText(text: string): Promise<void>;
}

export const HTTP_BODY_SNIPPET_BYTES = 4096;

export type ClipboardBackend = "auto" | "system" | "headless";
