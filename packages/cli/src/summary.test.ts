import { describe, expect, it } from "vitest";
import { createExportSummary, sha256HexFromBytes, stableJsonStringify } from "./summary.js";

const EMPTY_SHA256 = "e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855";

describe("export summary", () => {
  it("stableJsonStringify sorts keys recursively", () => {
    expect(stableJsonStringify({ z: 1, a: { k: 2, b: [{ y: 1, x: 2 }] } })).toBe(
      stableJsonStringify({ a: { b: [{ x: 2, y: 1 }], k: 2 }, z: 1 }),
    );
    expect(stableJsonStringify({ b: 1, a: null })).toBe('{\n  "a": null,\n  "b": 1\n}');
  });

  it("hashes bytes to lowercase hex", () => {
    expect(sha256HexFromBytes(new Uint8Array(0))).toBe(EMPTY_SHA256);
  });

  it("records size and digest of the output", () => {
    expect(createExportSummary("/tmp/out.glb", new Uint8Array(0), 3, 2)).toEqual({
      ok: true,
      outPath: "/tmp/out.glb",
      bytes: 0,
      sha256: EMPTY_SHA256,
      nodes: 3,
      roots: 2,
    });
  });
});
