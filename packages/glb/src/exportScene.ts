import { renameSync, rmSync } from "node:fs";
import type { SceneSource } from "@scenepack/scene";
import { GlbContainerWriter } from "./container.js";
import { createExportContext } from "./context.js";
import { buildDocument, stringifyDocument } from "./document.js";
import { describeError, isStructuralError } from "./errors.js";
import { LogLevel, type Logger } from "./logger.js";
import type { SinkFactory } from "./sink.js";
import type { PayloadStaging } from "./staging.js";
import { walkScene } from "./walker.js";

export interface ExportSceneOptions {
  /** Emit group attributes as node `extras` (default: true). */
  includeAttributes?: boolean;
  /** Deepest group nesting accepted before the scene is rejected (default: 1024). */
  maxDepth?: number;
  /** Upper bound on staged payload bytes (default: 2^32 - 1). */
  maxPayloadBytes?: number;
  /** Runs after the walk, before anything is written. Offsets it gets back are BIN chunk offsets. */
  stagePayloads?: (staging: PayloadStaging) => void;
  /** Receives the document as indented JSON before it is written. */
  onJson?: (prettyJson: string) => void;
  openSink?: SinkFactory;
  /** Write to a temporary sibling and rename it over the destination on success. */
  atomic?: boolean;
}

export function temporaryPathFor(destinationPath: string): string {
  return `${destinationPath}.${process.pid}.tmp`;
}

function commitTemporary(temporaryPath: string, destinationPath: string, logger: Logger): boolean {
  try {
    renameSync(temporaryPath, destinationPath);
    return true;
  } catch (error) {
    logger(LogLevel.Error, "%s: Error moving output into place: %s", destinationPath, describeError(error));
    discardTemporary(temporaryPath, logger);
    return false;
  }
}

function discardTemporary(temporaryPath: string, logger: Logger): void {
  try {
    rmSync(temporaryPath, { force: true });
  } catch (error) {
    logger(LogLevel.Error, "%s: Error removing temporary output: %s", temporaryPath, describeError(error));
  }
}

/**
 * Export every group of `source` into a binary glTF container at
 * `destinationPath`. Failures are logged at error level and reported as
 * `false`; partially written files are left in place unless `atomic` is set.
 */
export function exportScene(
  source: SceneSource,
  logger: Logger,
  destinationPath: string,
  options: ExportSceneOptions = {},
): boolean {
  const ctx = createExportContext(options);

  let rootNodes: number[];
  try {
    rootNodes = walkScene(ctx, source);
  } catch (error) {
    if (!isStructuralError(error)) throw error;
    logger(LogLevel.Error, "%s: Invalid scene structure: %s", destinationPath, error.message);
    return false;
  }

  options.stagePayloads?.(ctx.staging);

  const document = buildDocument(ctx, rootNodes);
  options.onJson?.(stringifyDocument(document, 2));

  const atomic = options.atomic ?? false;
  const targetPath = atomic ? temporaryPathFor(destinationPath) : destinationPath;
  const writer = new GlbContainerWriter(targetPath, {
    logger,
    openSink: options.openSink,
    label: destinationPath,
  });

  const written = writer.write(document, ctx.staging);
  if (atomic) {
    if (!written) {
      discardTemporary(targetPath, logger);
      return false;
    }
    if (!commitTemporary(targetPath, destinationPath, logger)) {
      return false;
    }
  } else if (!written) {
    return false;
  }

  logger(
    LogLevel.Info,
    "%s: Wrote %d nodes and %d payload bytes",
    destinationPath,
    ctx.nodes.length,
    ctx.staging.byteLength,
  );
  return true;
}
