import { describe, expect, it } from "vitest";
import { loadSceneDocument, validateSceneDocument, validateSceneDocumentDetailed } from "./sceneSchema.js";

const VALID_SCENE = {
  version: 1,
  files: [
    {
      name: "plant.rvm",
      models: [
        {
          name: "SITE",
          groups: [
            { name: "A", attributes: { unit: "mm" } },
            { name: "B", children: [{ name: "C" }] },
          ],
        },
      ],
    },
  ],
};

describe("validateSceneDocument", () => {
  it("accepts a valid scene", () => {
    expect(validateSceneDocument(VALID_SCENE)).toBe(true);
  });

  it("accepts an empty forest", () => {
    expect(validateSceneDocument({ version: 1, files: [] })).toBe(true);
  });

  it("accepts attribute pair lists with repeated keys", () => {
    const scene = {
      version: 1,
      files: [{ models: [{ groups: [{ attributes: [{ key: "k", value: "1" }, { key: "k", value: "2" }] }] }] }],
    };
    expect(validateSceneDocument(scene)).toBe(true);
  });

  it("rejects null", () => {
    expect(validateSceneDocumentDetailed(null)).toEqual({ valid: false, error: "document must be an object" });
  });

  it("rejects unsupported versions", () => {
    expect(validateSceneDocumentDetailed({ version: 2, files: [] })).toEqual({
      valid: false,
      error: "version unsupported scene document version",
    });
  });

  it("reports missing files", () => {
    expect(validateSceneDocumentDetailed({ version: 1 })).toEqual({ valid: false, error: "files is required" });
  });

  it("reports the path of a nested bad name", () => {
    const scene = {
      version: 1,
      files: [{ models: [{ groups: [{ name: "ok", children: [{ name: 5 }] }] }] }],
    };
    expect(validateSceneDocumentDetailed(scene)).toEqual({
      valid: false,
      error: "files[0].models[0].groups[0].children[0].name must be a string or null",
    });
  });

  it("rejects non-string attribute values", () => {
    const scene = { version: 1, files: [{ models: [{ groups: [{ attributes: { size: 3 } }] }] }] };
    expect(validateSceneDocumentDetailed(scene)).toEqual({
      valid: false,
      error: "files[0].models[0].groups[0].attributes must be an object of strings or a list of { key, value } pairs",
    });
  });
});

describe("loadSceneDocument", () => {
  it("builds the forest in document order", () => {
    const store = loadSceneDocument(VALID_SCENE);
    const [file] = [...store.roots()];
    expect(file?.kind).toBe("file");
    expect(file?.name).toBe("plant.rvm");
    const model = file?.children[0];
    expect(model?.kind).toBe("model");
    expect(model?.children.map((group) => group.name)).toEqual(["A", "B"]);
    expect(model?.children[0]?.attributes).toEqual([{ key: "unit", value: "mm" }]);
    expect(model?.children[1]?.children[0]?.name).toBe("C");
    expect(store.countGroups()).toBe(3);
  });

  it("keeps repeated attribute keys in order", () => {
    const store = loadSceneDocument({
      version: 1,
      files: [{ models: [{ groups: [{ attributes: [{ key: "k", value: "1" }, { key: "k", value: "2" }] }] }] }],
    });
    const group = [...store.roots()][0]?.children[0]?.children[0];
    expect(group?.name).toBeNull();
    expect(group?.attributes).toEqual([
      { key: "k", value: "1" },
      { key: "k", value: "2" },
    ]);
  });

  it("throws a coded error for invalid documents", () => {
    expect(() => loadSceneDocument({ version: 1, files: "nope" })).toThrow("files must be an array");
  });
});
