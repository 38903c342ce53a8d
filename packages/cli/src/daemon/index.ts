export {
  type DaemonDeps,
  DaemonRequest,
  type DaemonResponse,
  dispatchRequest,
  handleRequestLine,
  parseRequest,
  PLACEHOLDER_ID,
} from "./protocol.js";
export { DaemonServer } from "./server.js";
export { LineSession, type SessionEnd } from "./session.js";
