import type { ExportContext } from "./context.js";

/** Attribute metadata in insertion order; integer-like keys keep their place. */
export type GltfExtras = ReadonlyMap<string, string>;

export interface GltfNode {
  name?: string;
  extras?: GltfExtras;
  children?: number[];
}

export interface GltfScene {
  nodes: number[];
}

// Geometry entries are reserved; the exporter does not produce them yet.
export interface GltfBuffer {
  byteLength: number;
  uri?: string;
}

export interface GltfBufferView {
  buffer: number;
  byteOffset?: number;
  byteLength: number;
  byteStride?: number;
  target?: number;
}

export interface GltfAccessor {
  bufferView?: number;
  byteOffset?: number;
  componentType: number;
  count: number;
  type: string;
  min?: number[];
  max?: number[];
}

export interface GltfMesh {
  name?: string;
  primitives: { attributes: Record<string, number>; indices?: number; mode?: number }[];
}

export interface GltfDocument {
  asset: Record<string, string>;
  scene: number;
  scenes: GltfScene[];
  nodes: GltfNode[];
  meshes: GltfMesh[];
  accessors: GltfAccessor[];
  bufferViews: GltfBufferView[];
  buffers: GltfBuffer[];
}

/** Assemble the top-level document around the walked node array. */
export function buildDocument(ctx: ExportContext, rootNodes: readonly number[]): GltfDocument {
  return {
    asset: {},
    scene: 0,
    scenes: [{ nodes: [...rootNodes] }],
    nodes: ctx.nodes,
    meshes: [],
    accessors: [],
    bufferViews: [],
    buffers: [],
  };
}

function joinLines(open: string, close: string, items: string[], indent: string, current: string): string {
  if (items.length === 0) return open + close;
  if (indent === "") return `${open}${items.join(",")}${close}`;
  const inner = current + indent;
  return `${open}\n${inner}${items.join(`,\n${inner}`)}\n${current}${close}`;
}

function writeMembers(entries: Iterable<[string, unknown]>, indent: string, current: string): string {
  const members: string[] = [];
  for (const [key, member] of entries) {
    const text = writeValue(member, indent, current + indent);
    if (text !== undefined) {
      members.push(`${JSON.stringify(key)}:${indent === "" ? "" : " "}${text}`);
    }
  }
  return joinLines("{", "}", members, indent, current);
}

function writeValue(value: unknown, indent: string, current: string): string | undefined {
  if (value === undefined || typeof value === "function" || typeof value === "symbol") return undefined;
  if (value instanceof Map) {
    return writeMembers(Array.from(value, ([key, member]): [string, unknown] => [String(key), member]), indent, current);
  }
  if (Array.isArray(value)) {
    const items = value.map((item: unknown) => writeValue(item, indent, current + indent) ?? "null");
    return joinLines("[", "]", items, indent, current);
  }
  if (value !== null && typeof value === "object") {
    return writeMembers(Object.entries(value), indent, current);
  }
  return JSON.stringify(value);
}

/**
 * JSON text laid out like `JSON.stringify(value, null, space)`, except that a
 * `Map` is written as an object whose members keep the map's insertion order.
 * Plain objects would hoist integer-like keys ahead of the rest.
 */
export function stringifyDocument(value: unknown, space = 0): string {
  return writeValue(value, " ".repeat(space), "") ?? "null";
}
