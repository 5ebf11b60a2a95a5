import { resolve } from "node:path";
import { describe, expect, it } from "vitest";
import { DEFAULT_CLI_CONFIG, parseCliConfig } from "./config.js";

describe("parseCliConfig", () => {
  it("resolves paths and applies defaults", () => {
    const parsed = parseCliConfig(["--in", "scene.json", "--out", "scene.glb"], {});
    expect(parsed.error).toBeUndefined();
    expect(parsed.config).toEqual({
      ...DEFAULT_CLI_CONFIG,
      inPath: resolve("scene.json"),
      outPath: resolve("scene.glb"),
    });
  });

  it("reads flags", () => {
    const parsed = parseCliConfig(
      ["--in", "a.json", "--out", "a.glb", "--no-attributes", "--print-json", "--atomic", "--log-level", "0"],
      {},
    );
    expect(parsed.config).toMatchObject({ includeAttributes: false, printJson: true, atomic: true, logLevel: 0 });
  });

  it("reads the environment and lets flags override it", () => {
    const env = { SCENEPACK_NO_ATTRIBUTES: "1", SCENEPACK_ATOMIC: "1", SCENEPACK_LOG_LEVEL: "2" };
    expect(parseCliConfig(["--in", "a.json", "--out", "a.glb"], env).config).toMatchObject({
      includeAttributes: false,
      atomic: true,
      logLevel: 2,
    });
    expect(parseCliConfig(["--in", "a.json", "--out", "a.glb", "--attributes", "--log-level", "1"], env).config).toMatchObject({
      includeAttributes: true,
      logLevel: 1,
    });
  });

  it("maps --quiet to error-level logging", () => {
    expect(parseCliConfig(["--in", "a.json", "--out", "a.glb", "--quiet"], {}).config.logLevel).toBe(2);
  });

  it("reports missing and invalid values", () => {
    expect(parseCliConfig(["--in"], {}).error).toBe("--in requires a value.");
    expect(parseCliConfig(["--in", "a.json"], {}).error).toBe("--out is required.");
    expect(parseCliConfig(["--out", "a.glb"], {}).error).toBe("--in is required.");
    expect(parseCliConfig(["--in", "a.json", "--out", "a.glb", "--log-level", "9"], {}).error).toBe(
      'Invalid --log-level value "9".',
    );
    expect(parseCliConfig(["--in", "a.json", "--out", "a.glb"], { SCENEPACK_LOG_LEVEL: "loud" }).error).toBe(
      'Invalid SCENEPACK_LOG_LEVEL value "loud".',
    );
  });

  it("rejects unknown flags and recognizes help", () => {
    expect(parseCliConfig(["--verbose"], {}).error).toBe('Unknown flag "--verbose".');
    expect(parseCliConfig(["-h"], {}).error).toBe("help");
  });
});
