export type SceneErrorCode = "SCENE_ERR_PARENT_KIND" | "SCENE_ERR_INVALID_DOCUMENT";

export class SceneError extends Error {
  readonly code: SceneErrorCode;

  constructor(code: SceneErrorCode, message: string) {
    super(message);
    this.name = "SceneError";
    this.code = code;
  }
}

export function isSceneError(error: unknown): error is SceneError {
  return error instanceof SceneError;
}
