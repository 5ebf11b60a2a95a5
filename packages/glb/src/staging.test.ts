import { describe, expect, it } from "vitest";
import { PayloadStaging } from "./staging.js";
import { isExportError } from "./errors.js";

describe("PayloadStaging", () => {
  it("returns running offsets in registration order", () => {
    const staging = new PayloadStaging();
    expect(staging.register(new Uint8Array([1, 2, 3]))).toBe(0);
    expect(staging.register(new Uint8Array([4, 5, 6, 7]))).toBe(3);
    expect(staging.register(new Uint8Array([8, 9, 10, 11, 12]))).toBe(7);
    expect(staging.byteLength).toBe(12);
    expect(staging.count).toBe(3);
    expect([...staging].map((item) => item.byteLength)).toEqual([3, 4, 5]);
  });

  it("keeps a reference unless asked to copy", () => {
    const shared = new Uint8Array([1, 2]);
    const owned = new Uint8Array([3, 4]);
    const staging = new PayloadStaging();
    staging.register(shared);
    staging.register(owned, true);
    shared[0] = 9;
    owned[0] = 9;

    const [first, second] = [...staging];
    expect(first?.data).toBe(shared);
    expect(Array.from(first?.data ?? [])).toEqual([9, 2]);
    expect(Array.from(second?.data ?? [])).toEqual([3, 4]);
  });

  it("stores strings as UTF-8", () => {
    const staging = new PayloadStaging();
    expect(staging.register("test0")).toBe(0);
    expect(staging.register("é")).toBe(5);
    expect(staging.byteLength).toBe(7);
  });

  it("accepts empty payloads without moving the offset", () => {
    const staging = new PayloadStaging();
    staging.register("ab");
    expect(staging.register(new Uint8Array(0))).toBe(2);
    expect(staging.register("c")).toBe(2);
  });

  it("refuses registrations past the byte limit", () => {
    const staging = new PayloadStaging(8);
    staging.register("test0");
    try {
      staging.register("abcd");
      expect.unreachable();
    } catch (error) {
      expect(isExportError(error)).toBe(true);
      if (isExportError(error)) {
        expect(error.code).toBe("EXPORT_ERR_PAYLOAD_OVERFLOW");
        expect(error.message).toBe("registering 4 bytes would exceed the 8-byte payload limit (5 already staged)");
      }
    }
    expect(staging.byteLength).toBe(5);
    expect(staging.count).toBe(1);
    expect(staging.register("abc")).toBe(5);
  });

  it("rejects limits the length field cannot hold", () => {
    expect(() => new PayloadStaging(-1)).toThrow(RangeError);
    expect(() => new PayloadStaging(2 ** 32)).toThrow(RangeError);
  });
});
