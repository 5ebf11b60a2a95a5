export { runScenepackCli, EXIT_OK, EXIT_FAILURE, EXIT_INVALID_SCENE } from "./cli.js";
export type { CliIo } from "./cli.js";
export { parseCliConfig, renderHelpText, DEFAULT_CLI_CONFIG } from "./config.js";
export type { ScenepackCliConfig, ParsedCliConfig } from "./config.js";
export { createExportSummary, stableJsonStringify, sha256HexFromBytes } from "./summary.js";
export type { ExportSummary } from "./summary.js";
