import { resolve } from "node:path";
import { LogLevel } from "@scenepack/glb";

export interface ScenepackCliConfig {
  inPath: string;
  outPath: string;
  includeAttributes: boolean;
  printJson: boolean;
  atomic: boolean;
  logLevel: number;
}

export interface ParsedCliConfig {
  config: ScenepackCliConfig;
  error?: string;
}

export const DEFAULT_CLI_CONFIG: ScenepackCliConfig = {
  inPath: "",
  outPath: "",
  includeAttributes: true,
  printJson: false,
  atomic: false,
  logLevel: LogLevel.Info,
};

function parseLogLevel(value: string | undefined): number | null {
  if (value === undefined || !/^[0-2]$/.test(value)) return null;
  return Number(value);
}

/** Parse `export` flags; environment values apply first and flags override them. */
export function parseCliConfig(argv: string[], env: NodeJS.ProcessEnv = process.env): ParsedCliConfig {
  const config: ScenepackCliConfig = {
    ...DEFAULT_CLI_CONFIG,
  };

  if (env.SCENEPACK_NO_ATTRIBUTES === "1") config.includeAttributes = false;
  if (env.SCENEPACK_ATOMIC === "1") config.atomic = true;
  if (env.SCENEPACK_LOG_LEVEL !== undefined) {
    const level = parseLogLevel(env.SCENEPACK_LOG_LEVEL);
    if (level === null) {
      return { config, error: `Invalid SCENEPACK_LOG_LEVEL value "${env.SCENEPACK_LOG_LEVEL}".` };
    }
    config.logLevel = level;
  }

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (arg === "--") {
      continue;
    }
    if (arg === "--in" || arg === "--out") {
      const value = argv[index + 1];
      if (!value) {
        return { config, error: `${arg} requires a value.` };
      }
      if (arg === "--in") config.inPath = resolve(value);
      else config.outPath = resolve(value);
      index += 1;
      continue;
    }
    if (arg === "--no-attributes") {
      config.includeAttributes = false;
      continue;
    }
    if (arg === "--attributes") {
      config.includeAttributes = true;
      continue;
    }
    if (arg === "--print-json") {
      config.printJson = true;
      continue;
    }
    if (arg === "--atomic") {
      config.atomic = true;
      continue;
    }
    if (arg === "--quiet") {
      config.logLevel = LogLevel.Error;
      continue;
    }
    if (arg === "--log-level") {
      const value = argv[index + 1];
      const level = parseLogLevel(value);
      if (level === null) {
        return { config, error: `Invalid --log-level value "${value ?? ""}".` };
      }
      config.logLevel = level;
      index += 1;
      continue;
    }
    if (arg === "--help" || arg === "-h") {
      return { config, error: "help" };
    }
    return { config, error: `Unknown flag "${arg}".` };
  }

  if (!config.inPath) return { config, error: "--in is required." };
  if (!config.outPath) return { config, error: "--out is required." };
  return { config };
}

export function renderHelpText(): string {
  return [
    "scenepack",
    "",
    "Usage:",
    "  scenepack export --in ./scene.json --out ./scene.glb",
    "",
    "Command: export",
    "  --in <path>            Scene document (JSON)",
    "  --out <path>           Destination .glb file",
    "  --no-attributes        Do not write group attributes as node extras",
    "  --attributes           Write group attributes (default)",
    "  --print-json           Print the indented glTF JSON to stdout",
    "  --atomic               Write to a temporary file and rename on success",
    "  --log-level <0|1|2>    Minimum log level: 0 debug, 1 info (default), 2 error",
    "  --quiet                Same as --log-level 2",
    "  -h, --help             Show help",
    "",
    "Environment:",
    "  SCENEPACK_NO_ATTRIBUTES=1, SCENEPACK_ATOMIC=1, SCENEPACK_LOG_LEVEL=<0|1|2>",
  ].join("\n");
}
