import { z } from "zod";
import { SceneError } from "./errors.js";
import { SceneStore } from "./store.js";
import type { SceneGroup } from "./types.js";

/**
 * JSON description of a scene forest. Attributes may be given as an object
 * (unique keys) or as an ordered list of pairs (duplicates kept in order).
 */
export interface SceneGroupDocument {
  name?: string | null;
  attributes?: Record<string, string> | { key: string; value: string }[];
  children?: SceneGroupDocument[];
}

export interface SceneModelDocument {
  name?: string | null;
  groups: SceneGroupDocument[];
}

export interface SceneFileDocument {
  name?: string | null;
  models: SceneModelDocument[];
}

export interface SceneDocument {
  version: 1;
  files: SceneFileDocument[];
}

export const SCENE_DOCUMENT_VERSION = 1;

const NameSchema = z.string({ invalid_type_error: "must be a string or null" }).nullable().optional();

function objectOf<T extends z.ZodRawShape>(shape: T) {
  return z.object(shape, { required_error: "is required", invalid_type_error: "must be an object" });
}

function arrayOf<T extends z.ZodTypeAny>(item: T) {
  return z.array(item, { required_error: "is required", invalid_type_error: "must be an array" });
}

const AttributesSchema = z.union(
  [
    z.record(z.string()),
    z.array(z.object({ key: z.string(), value: z.string() })),
  ],
  { errorMap: () => ({ message: "must be an object of strings or a list of { key, value } pairs" }) },
);

export const SceneGroupDocumentSchema: z.ZodType<SceneGroupDocument> = z.lazy(() =>
  objectOf({
    name: NameSchema,
    attributes: AttributesSchema.optional(),
    children: arrayOf(SceneGroupDocumentSchema).optional(),
  }),
);

export const SceneDocumentSchema = objectOf({
  version: z.literal(SCENE_DOCUMENT_VERSION, {
    errorMap: () => ({ message: "unsupported scene document version" }),
  }),
  files: arrayOf(
    objectOf({
      name: NameSchema,
      models: arrayOf(
        objectOf({
          name: NameSchema,
          groups: arrayOf(SceneGroupDocumentSchema),
        }),
      ),
    }),
  ),
});

export interface SceneValidationResult {
  valid: boolean;
  error?: string;
}

function formatIssuePath(path: (string | number)[]): string {
  let out = "";
  for (const segment of path) {
    if (typeof segment === "number") {
      out += `[${segment}]`;
    } else {
      out += out.length > 0 ? `.${segment}` : segment;
    }
  }
  return out.length > 0 ? out : "document";
}

export function validateSceneDocument(data: unknown): data is SceneDocument {
  return validateSceneDocumentDetailed(data).valid;
}

export function validateSceneDocumentDetailed(data: unknown): SceneValidationResult {
  const result = SceneDocumentSchema.safeParse(data);
  if (result.success) return { valid: true };
  const issue = result.error.issues[0];
  if (!issue) return { valid: false, error: "document is invalid" };
  return { valid: false, error: `${formatIssuePath(issue.path)} ${issue.message}` };
}

function addGroupDocument(store: SceneStore, parent: SceneGroup, doc: SceneGroupDocument): void {
  const group = store.addGroup(parent, doc.name);
  const attributes = doc.attributes ?? [];
  if (Array.isArray(attributes)) {
    for (const attribute of attributes) {
      store.addAttribute(group, attribute.key, attribute.value);
    }
  } else {
    for (const [key, value] of Object.entries(attributes)) {
      store.addAttribute(group, key, value);
    }
  }
  for (const child of doc.children ?? []) {
    addGroupDocument(store, group, child);
  }
}

/** Validate a parsed JSON scene document and build a store from it. */
export function loadSceneDocument(data: unknown): SceneStore {
  const result = SceneDocumentSchema.safeParse(data);
  if (!result.success) {
    throw new SceneError("SCENE_ERR_INVALID_DOCUMENT", validateSceneDocumentDetailed(data).error ?? "document is invalid");
  }

  const store = new SceneStore();
  for (const fileDoc of result.data.files) {
    const file = store.addFile(fileDoc.name);
    for (const modelDoc of fileDoc.models) {
      const model = store.addModel(file, modelDoc.name);
      for (const groupDoc of modelDoc.groups) {
        addGroupDocument(store, model, groupDoc);
      }
    }
  }
  return store;
}
