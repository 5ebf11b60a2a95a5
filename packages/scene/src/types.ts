export type GroupKind = "file" | "model" | "group";

/** A key/value pair attached to a group. Keys are not unique. */
export interface SceneAttribute {
  key: string;
  value: string;
}

/**
 * One node of the scene forest.
 *
 * Files are roots, models sit directly under files, and groups sit under
 * models or other groups. Only `group` nodes are materialized on export.
 */
export interface SceneGroup {
  kind: GroupKind;
  name: string | null;
  children: SceneGroup[];
  attributes: SceneAttribute[];
}

/** Read-only view over a forest of file-kind roots, in file order. */
export interface SceneSource {
  roots(): Iterable<SceneGroup>;
}
