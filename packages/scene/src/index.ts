export type { GroupKind, SceneAttribute, SceneGroup, SceneSource } from "./types.js";
export { SceneError, isSceneError } from "./errors.js";
export type { SceneErrorCode } from "./errors.js";
export { SceneStore } from "./store.js";
export {
  SCENE_DOCUMENT_VERSION,
  SceneDocumentSchema,
  SceneGroupDocumentSchema,
  loadSceneDocument,
  validateSceneDocument,
  validateSceneDocumentDetailed,
} from "./sceneSchema.js";
export type {
  SceneDocument,
  SceneFileDocument,
  SceneModelDocument,
  SceneGroupDocument,
  SceneValidationResult,
} from "./sceneSchema.js";
