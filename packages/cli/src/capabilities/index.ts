// pattern: Imperative Shell

export * from "./clipboard/index.js";
export { mapFsError, StandardFilesystem } from "./filesystem.js";
export { FetchNetwork, readBodySnippet } from "./network.js";
export * from "./types.js";
