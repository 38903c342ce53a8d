// pattern: Functional Core
import { type Static, Type } from "@sinclair/typebox";

export const CLIPBOARD_BACKENDS = ["auto", "system", "headless"] as const;

export const ClipboardBackendSchema = Type.Union(
  CLIPBOARD_BACKENDS.map(value => Type.Literal(value)),
  {
    description:
      "Clipboard backend. 'auto' picks headless when no display is attached.",
  }
);

export const NetworkSettings = Type.Object(
  {
    probeUrl: Type.Optional(
      Type.String({
        format: "uri",
        description: "URL fetched by the network probe.",
        errorMessage: "must be an absolute URL",
      })
    ),
    timeoutMs: Type.Optional(
      Type.Integer({
        minimum: 1,
        description: "HTTPS timeout for the network probe, in milliseconds.",
      })
    ),
  },
  { additionalProperties: false }
);

export const ClipboardSettings = Type.Object(
  {
    backend: Type.Optional(ClipboardBackendSchema),
  },
  { additionalProperties: false }
);

/**
 * Shape of a harness configuration file. Every field is optional.
 */
export const HarnessConfigFile = Type.Object(
  {
    network: Type.Optional(NetworkSettings),
    clipboard: Type.Optional(ClipboardSettings),
  },
  { additionalProperties: false }
);
export type HarnessConfigFile = Static<typeof HarnessConfigFile>;

export interface HarnessConfig {
  network: {
    probeUrl: string;
    timeoutMs: number;
  };
  clipboard: {
    backend: (typeof CLIPBOARD_BACKENDS)[number];
  };
}

export const DEFAULT_CONFIG: HarnessConfig = {
  network: {
    probeUrl: "https://httpbin.org/get",
    timeoutMs: 10_000,
  },
  clipboard: {
    backend: "auto",
  },
};
