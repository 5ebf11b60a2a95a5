import { closeSync, openSync, writeSync } from "node:fs";

/** Synchronous byte destination. Both methods throw on failure. */
export interface OutputSink {
  write(bytes: Uint8Array): void;
  close(): void;
}

export type SinkFactory = (path: string) => OutputSink;

/** Create or truncate `path` and write to it with blocking calls. */
export function openFileSink(path: string): OutputSink {
  const fd = openSync(path, "w");
  return {
    write(bytes) {
      let offset = 0;
      while (offset < bytes.byteLength) {
        const written = writeSync(fd, bytes, offset, bytes.byteLength - offset);
        if (written <= 0) {
          throw new Error(`short write: ${offset} of ${bytes.byteLength} bytes`);
        }
        offset += written;
      }
    },
    close() {
      closeSync(fd);
    },
  };
}

/** Collects written bytes in memory. */
export class MemorySink implements OutputSink {
  private readonly chunks: Uint8Array[] = [];
  private length = 0;
  private isClosed = false;

  get closed(): boolean {
    return this.isClosed;
  }

  get byteLength(): number {
    return this.length;
  }

  write(bytes: Uint8Array): void {
    if (this.isClosed) {
      throw new Error("sink is closed");
    }
    this.chunks.push(bytes.slice());
    this.length += bytes.byteLength;
  }

  close(): void {
    this.isClosed = true;
  }

  toUint8Array(): Uint8Array {
    const out = new Uint8Array(this.length);
    let offset = 0;
    for (const chunk of this.chunks) {
      out.set(chunk, offset);
      offset += chunk.byteLength;
    }
    return out;
  }
}
