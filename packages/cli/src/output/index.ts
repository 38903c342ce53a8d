export {
  artifactPaths,
  type ArtifactPaths,
  EVENTS_FILE,
  RESULT_FILE,
  writeResultArtifacts,
  writeResultFile,
  writeScenarioArtifacts,
} from "./artifacts.js";
export { exitCodeFor, renderHuman, renderJson, renderScenarioHuman, statusLabel } from "./render.js";
