import { SceneError } from "./errors.js";
import type { GroupKind, SceneGroup, SceneSource } from "./types.js";

const ALLOWED_PARENTS: Record<Exclude<GroupKind, "file">, readonly GroupKind[]> = {
  model: ["file"],
  group: ["model", "group"],
};

function createGroup(kind: GroupKind, name: string | null | undefined): SceneGroup {
  return {
    kind,
    name: name ?? null,
    children: [],
    attributes: [],
  };
}

/**
 * In-memory owner of a scene forest. Builders append in order; iteration
 * order is insertion order at every level.
 */
export class SceneStore implements SceneSource {
  private readonly files: SceneGroup[] = [];

  addFile(name?: string | null): SceneGroup {
    const file = createGroup("file", name);
    this.files.push(file);
    return file;
  }

  addModel(file: SceneGroup, name?: string | null): SceneGroup {
    return this.appendChild(file, createGroup("model", name));
  }

  addGroup(parent: SceneGroup, name?: string | null): SceneGroup {
    return this.appendChild(parent, createGroup("group", name));
  }

  addAttribute(group: SceneGroup, key: string, value: string): void {
    group.attributes.push({ key, value });
  }

  roots(): Iterable<SceneGroup> {
    return this.files;
  }

  /** Number of `group`-kind nodes across the whole forest. */
  countGroups(): number {
    let count = 0;
    const stack: SceneGroup[] = [...this.files];
    while (stack.length > 0) {
      const item = stack.pop();
      if (!item) break;
      if (item.kind === "group") count += 1;
      stack.push(...item.children);
    }
    return count;
  }

  private appendChild(parent: SceneGroup, child: SceneGroup): SceneGroup {
    if (child.kind === "file") {
      throw new SceneError("SCENE_ERR_PARENT_KIND", "file nodes can only be added as roots");
    }
    if (!ALLOWED_PARENTS[child.kind].includes(parent.kind)) {
      throw new SceneError("SCENE_ERR_PARENT_KIND", `a ${child.kind} cannot be added under a ${parent.kind}`);
    }
    parent.children.push(child);
    return child;
  }
}
