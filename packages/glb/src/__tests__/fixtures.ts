import { SceneStore } from "@scenepack/scene";
import { MemorySink } from "../sink.js";
import { createLogger, type Logger } from "../logger.js";

/** One file, one model, groups "A" (unit=mm) and "B" with child "C". */
export function createTwoGroupScene(): SceneStore {
  const store = new SceneStore();
  const model = store.addModel(store.addFile("plant.rvm"), "SITE");
  const a = store.addGroup(model, "A");
  store.addAttribute(a, "unit", "mm");
  const b = store.addGroup(model, "B");
  store.addGroup(b, "C");
  return store;
}

export const TWO_GROUP_NODES = [{ name: "A", extras: { unit: "mm" } }, { name: "C" }, { name: "B", children: [1] }];

/** Memory sink whose n-th write (1-based) throws. */
export class FailingSink extends MemorySink {
  private writes = 0;

  constructor(
    private readonly failOnWrite: number,
    private readonly reason = "disk full",
  ) {
    super();
  }

  write(bytes: Uint8Array): void {
    this.writes += 1;
    if (this.writes === this.failOnWrite) {
      throw new Error(this.reason);
    }
    super.write(bytes);
  }
}

export function collectLog(): { lines: string[]; logger: Logger } {
  const lines: string[] = [];
  return { lines, logger: createLogger((line) => lines.push(line)) };
}
