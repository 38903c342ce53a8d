// pattern: Imperative Shell

export { ClipboardImplementation } from "./base.js";
export { createClipboard } from "./factory.js";
export { HeadlessClipboard } from "./headless.js";
export { SystemClipboard } from "./system.js";
export { type ClipboardTool, type ClipboardToolset, getClipboardTools } from "./tools.js";
