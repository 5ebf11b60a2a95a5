import type { SceneGroup, SceneSource } from "@scenepack/scene";
import type { ExportContext } from "./context.js";
import type { GltfNode } from "./document.js";
import { ExportError } from "./errors.js";

function describeGroup(group: SceneGroup): string {
  return group.name !== null ? `${group.kind} "${group.name}"` : `unnamed ${group.kind}`;
}

function expectKind(group: SceneGroup, kind: SceneGroup["kind"], where: string): void {
  if (group.kind !== kind) {
    throw new ExportError("EXPORT_ERR_STRUCTURE", `expected a ${kind} ${where}, found ${describeGroup(group)}`);
  }
}

function visitGroup(ctx: ExportContext, group: SceneGroup, active: Set<SceneGroup>, depth: number): number {
  expectKind(group, "group", "below a model");
  if (active.has(group)) {
    throw new ExportError("EXPORT_ERR_CYCLE", `${describeGroup(group)} is its own ancestor`);
  }
  if (ctx.visited.has(group)) {
    throw new ExportError("EXPORT_ERR_STRUCTURE", `${describeGroup(group)} is reachable from more than one parent`);
  }
  if (depth > ctx.maxDepth) {
    throw new ExportError("EXPORT_ERR_DEPTH", `group nesting exceeds ${ctx.maxDepth} levels at ${describeGroup(group)}`);
  }

  ctx.visited.add(group);

  const node: GltfNode = {};
  if (group.name !== null) {
    node.name = group.name;
  }
  if (ctx.includeAttributes && group.attributes.length > 0) {
    // Repeated keys keep their first position and take the last value.
    node.extras = new Map(group.attributes.map((attribute): [string, string] => [attribute.key, attribute.value]));
  }
  if (group.children.length > 0) {
    active.add(group);
    const children: number[] = [];
    for (const child of group.children) {
      children.push(visitGroup(ctx, child, active, depth + 1));
    }
    active.delete(group);
    node.children = children;
  }

  // Appending after the children keeps every child index below its parent's.
  const index = ctx.nodes.length;
  ctx.nodes.push(node);
  return index;
}

/** Emit one node for `group` and its subtree; returns the group's node index. */
export function processGroup(ctx: ExportContext, group: SceneGroup): number {
  return visitGroup(ctx, group, new Set(), 1);
}

/**
 * Walk every file and model, emitting nodes for their groups. Files and models
 * produce no nodes; every direct child of a model becomes a scene root.
 */
export function walkScene(ctx: ExportContext, source: SceneSource): number[] {
  const rootNodes: number[] = [];
  for (const file of source.roots()) {
    expectKind(file, "file", "at the scene root");
    for (const model of file.children) {
      expectKind(model, "model", "below a file");
      for (const group of model.children) {
        rootNodes.push(processGroup(ctx, group));
      }
    }
  }
  return rootNodes;
}
