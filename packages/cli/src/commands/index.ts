export { BUILTIN_COMMANDS } from "./builtins.js";
export { CALL_COMMAND, CommandRegistry } from "./registry.js";
export type { CommandHandler } from "./types.js";
