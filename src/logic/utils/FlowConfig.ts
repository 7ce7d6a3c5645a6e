import * as fs from "fs";
import { z } from "zod";
import { ConfigurationError } from "../errors";

export type NodeStyleKey =
  | "start"
  | "decision"
  | "loop"
  | "try"
  | "return"
  | "service";

/**
 * Configuration interface for flow diagram generation
 */
export interface FlowConfiguration {
  title: string;
  direction: "TD" | "TB" | "BT" | "LR" | "RL";
  maxDepth: number;
  maxEventHandlers: number;
  labelMaxLength: number;
  conditionMaxLength: number;
  entryMethod: string;
  eventHandlerSuffixes: string[];
  serviceMarkers: string[];
  constructionMarker: string;
  styles: Record<NodeStyleKey, string>;
}

/**
 * Default flow configuration
 */
export const DEFAULT_FLOW_CONFIG: FlowConfiguration = {
  title: "Code Flow Diagram",
  direction: "TD",
  maxDepth: 10,
  maxEventHandlers: 10,
  labelMaxLength: 40,
  conditionMaxLength: 60,
  entryMethod: "Page_Load",
  eventHandlerSuffixes: [
    "_Click",
    "_Changed",
    "_SelectedIndexChanged",
    "_CheckedChanged",
  ],
  serviceMarkers: ["Service", "Client", "Proxy"],
  constructionMarker: "new ",
  styles: {
    start: "fill:#e1f5ff,stroke:#01579b,stroke-width:2px",
    decision: "fill:#fff9c4,stroke:#f57f17",
    loop: "fill:#e8f5e9,stroke:#2e7d32",
    try: "fill:#ffebee,stroke:#c62828",
    return: "fill:#fce4ec,stroke:#880e4f",
    service: "fill:#f3e5f5,stroke:#4a148c",
  },
};

const styleValue = z.string().min(1);

export const FlowConfigFileSchema = z
  .object({
    title: z.string().min(1),
    direction: z.enum(["TD", "TB", "BT", "LR", "RL"]),
    maxDepth: z.number().int().nonnegative(),
    maxEventHandlers: z.number().int().nonnegative(),
    labelMaxLength: z.number().int().min(4),
    conditionMaxLength: z.number().int().min(4),
    entryMethod: z.string().min(1),
    eventHandlerSuffixes: z.array(z.string().min(1)),
    serviceMarkers: z.array(z.string().min(1)),
    constructionMarker: z.string().min(1),
    styles: z
      .object({
        start: styleValue,
        decision: styleValue,
        loop: styleValue,
        try: styleValue,
        return: styleValue,
        service: styleValue,
      })
      .partial()
      .strict(),
  })
  .partial()
  .strict();

export type FlowConfigFile = z.infer<typeof FlowConfigFileSchema>;

/**
 * Overlays a partial configuration on the defaults. Styles merge per key.
 */
export function resolveFlowConfig(
  overrides: FlowConfigFile = {}
): FlowConfiguration {
  return {
    ...DEFAULT_FLOW_CONFIG,
    ...overrides,
    styles: { ...DEFAULT_FLOW_CONFIG.styles, ...overrides.styles },
  };
}

/**
 * Reads a JSON configuration file and merges it over the defaults.
 * Without a path the defaults are returned as-is.
 */
export function loadFlowConfig(configPath?: string): FlowConfiguration {
  if (!configPath) {
    return resolveFlowConfig();
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, "utf8"));
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read configuration file ${configPath}: ${
        error instanceof Error ? error.message : String(error)
      }`
    );
  }

  const parsed = FlowConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(
      `Invalid configuration in ${configPath}: ${issues}`
    );
  }

  return resolveFlowConfig(parsed.data);
}
