// pattern: Functional Core
import { type Static, Type } from "@sinclair/typebox";

import { Status } from "../engine/types.js";

export const DEFAULT_EXPECT_STATUS = Status.Pass;
// Carried on the step but not enforced
export const DEFAULT_STEP_TIMEOUT_MS = 30_000;

export const StatusName = Type.Union(
  Object.values(Status).map(value => Type.Literal(value)),
  { description: "Lowercase result status." }
);

export const CallStepDocument = Type.Object({
  call: Type.String({ minLength: 1, description: "Registered command name." }),
  args: Type.Optional(Type.Unknown()),
  expect_status: Type.Optional(StatusName),
  timeout_ms: Type.Optional(Type.Integer({ minimum: 0 })),
});
export type CallStepDocument = Static<typeof CallStepDocument>;

export const ProbeStepDocument = Type.Object({
  probe: Type.String({ minLength: 1, description: "Probe name." }),
});
export type ProbeStepDocument = Static<typeof ProbeStepDocument>;

export const ScenarioDocument = Type.Object({
  name: Type.Optional(Type.String()),
  steps: Type.Array(Type.Unknown()),
});

export interface CallStep {
  kind: "call";
  call: string;
  args: unknown;
  expect_status: Status;
  timeout_ms: number;
}

export interface ProbeStep {
  kind: "probe";
  probe: string;
}

export type ScenarioStep = CallStep | ProbeStep;

export interface Scenario {
  name?: string;
  steps: ScenarioStep[];
}
