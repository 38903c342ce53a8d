export { clipboardMarker, runClipboardProbe } from "./clipboard.js";
export { FILESYSTEM_PAYLOAD, probeDirName, runFilesystemProbe } from "./filesystem.js";
export { hostFromUrl, runNetworkProbe } from "./network.js";
export { runProbe } from "./runner.js";
export { isProbeName, PROBE_COMMAND, PROBE_NAMES, type ProbeName } from "./types.js";
