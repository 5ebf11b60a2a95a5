import type { SceneGroup } from "@scenepack/scene";
import type { GltfNode } from "./document.js";
import { PayloadStaging } from "./staging.js";

export const DEFAULT_MAX_DEPTH = 1024;
/** The walker recurses once per level; deeper limits risk the call stack. */
export const MAX_DEPTH_LIMIT = 4096;

/** Per-call export state. Nothing here outlives one export. */
export interface ExportContext {
  nodes: GltfNode[];
  staging: PayloadStaging;
  includeAttributes: boolean;
  maxDepth: number;
  /** Groups that already have a node. */
  visited: Set<SceneGroup>;
}

export interface ExportContextOptions {
  includeAttributes?: boolean;
  maxDepth?: number;
  maxPayloadBytes?: number;
}

export function createExportContext(options: ExportContextOptions = {}): ExportContext {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  if (!Number.isInteger(maxDepth) || maxDepth < 1 || maxDepth > MAX_DEPTH_LIMIT) {
    throw new RangeError(`maxDepth must be an integer between 1 and ${MAX_DEPTH_LIMIT} (got ${maxDepth})`);
  }
  return {
    nodes: [],
    staging: new PayloadStaging(options.maxPayloadBytes),
    includeAttributes: options.includeAttributes ?? true,
    maxDepth,
    visited: new Set(),
  };
}
