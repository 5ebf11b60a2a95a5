import { createHash } from "node:crypto";

export interface ExportSummary {
  ok: boolean;
  outPath: string;
  bytes: number;
  sha256: string;
  nodes: number;
  roots: number;
}

function sortKeysDeep(input: unknown): unknown {
  if (Array.isArray(input)) return input.map(sortKeysDeep);
  if (input === null || typeof input !== "object") return input;
  return Object.fromEntries(
    Object.entries(input)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([key, value]) => [key, sortKeysDeep(value)]),
  );
}

/** Indented JSON with keys sorted at every level, so summaries diff cleanly. */
export function stableJsonStringify(input: unknown): string {
  return JSON.stringify(sortKeysDeep(input), null, 2);
}

export function sha256HexFromBytes(input: Uint8Array): string {
  return createHash("sha256").update(input).digest("hex");
}

export function createExportSummary(outPath: string, output: Uint8Array, nodes: number, roots: number): ExportSummary {
  return {
    ok: true,
    outPath,
    bytes: output.byteLength,
    sha256: sha256HexFromBytes(output),
    nodes,
    roots,
  };
}
