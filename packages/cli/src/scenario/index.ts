export {
  loadScenario,
  parseScenario,
  parseStep,
  RUN_SCENARIO_COMMAND,
  scenarioLoadFailure,
} from "./loader.js";
export { runScenario } from "./runner.js";
export type { CallStep, ProbeStep, Scenario, ScenarioStep } from "./types.js";
