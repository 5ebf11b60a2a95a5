#!/usr/bin/env node
import { readFile } from "node:fs/promises";
import { pathToFileURL } from "node:url";
import { createLogger, exportScene } from "@scenepack/glb";
import { isSceneError, loadSceneDocument, type SceneStore } from "@scenepack/scene";
import { parseCliConfig, renderHelpText } from "./config.js";
import { createExportSummary, stableJsonStringify } from "./summary.js";

export interface CliIo {
  writeStdout: (line: string) => void;
  writeStderr: (line: string) => void;
}

const defaultIo: CliIo = {
  writeStdout: (line) => process.stdout.write(`${line}\n`),
  writeStderr: (line) => process.stderr.write(`${line}\n`),
};

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_INVALID_SCENE = 2;

function countRoots(store: SceneStore): number {
  let roots = 0;
  for (const file of store.roots()) {
    for (const model of file.children) {
      roots += model.children.length;
    }
  }
  return roots;
}

async function readSceneFile(inPath: string): Promise<unknown> {
  const text = await readFile(inPath, "utf8");
  return JSON.parse(text);
}

export async function runScenepackCli(
  argv: string[],
  io: CliIo = defaultIo,
  env: NodeJS.ProcessEnv = process.env,
): Promise<number> {
  if (argv.length === 0 || argv.includes("--help") || argv.includes("-h")) {
    io.writeStdout(renderHelpText());
    return EXIT_OK;
  }

  const command = argv[0];
  if (command !== "export") {
    io.writeStderr(`Unknown command "${command}".`);
    io.writeStdout(renderHelpText());
    return EXIT_FAILURE;
  }

  const parsed = parseCliConfig(argv.slice(1), env);
  if (parsed.error) {
    io.writeStderr(`scenepack: ${parsed.error}`);
    io.writeStdout(renderHelpText());
    return EXIT_FAILURE;
  }
  const { config } = parsed;

  let data: unknown;
  try {
    data = await readSceneFile(config.inPath);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    io.writeStderr(`Failed to read scene file: ${message}`);
    return error instanceof SyntaxError ? EXIT_INVALID_SCENE : EXIT_FAILURE;
  }

  let store: SceneStore;
  try {
    store = loadSceneDocument(data);
  } catch (error) {
    if (!isSceneError(error)) throw error;
    io.writeStderr(`${error.code}: ${error.message}`);
    return EXIT_INVALID_SCENE;
  }

  const logger = createLogger(io.writeStderr, config.logLevel);
  const ok = exportScene(store, logger, config.outPath, {
    includeAttributes: config.includeAttributes,
    atomic: config.atomic,
    onJson: config.printJson ? io.writeStdout : undefined,
  });
  if (!ok) {
    return EXIT_FAILURE;
  }

  const output = await readFile(config.outPath);
  io.writeStdout(
    stableJsonStringify(createExportSummary(config.outPath, output, store.countGroups(), countRoots(store))),
  );
  return EXIT_OK;
}

async function main() {
  const exitCode = await runScenepackCli(process.argv.slice(2), defaultIo);
  process.exitCode = exitCode;
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch((error: unknown) => {
    process.stderr.write(`scenepack failed: ${error instanceof Error ? error.message : String(error)}\n`);
    process.exitCode = 1;
  });
}
