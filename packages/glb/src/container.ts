import { stringifyDocument, type GltfDocument } from "./document.js";
import { describeError } from "./errors.js";
import { LogLevel, type Logger } from "./logger.js";
import { openFileSink, type OutputSink, type SinkFactory } from "./sink.js";
import type { PayloadStaging } from "./staging.js";

export const GLB_MAGIC = 0x46546c67; // "glTF"
export const GLB_VERSION = 2;
export const JSON_CHUNK_TYPE = 0x4e4f534a; // "JSON"
export const BIN_CHUNK_TYPE = 0x004e4942; // "BIN\0"
export const GLB_HEADER_BYTES = 12;
export const CHUNK_HEADER_BYTES = 8;
export const JSON_PADDING_BYTE = 0x20;
export const BIN_PADDING_BYTE = 0x00;

const MAX_CONTAINER_BYTES = 0xffffffff;
const encoder = new TextEncoder();

export type WriterState = "idle" | "headerWritten" | "jsonWritten" | "binWritten" | "done" | "failed";

export function paddingFor(length: number): number {
  return (4 - (length % 4)) % 4;
}

export function alignTo4(length: number): number {
  return length + paddingFor(length);
}

/** Compact JSON text of `document`, padded with spaces to a 4-byte boundary. */
export function encodeJsonChunkData(document: GltfDocument): Uint8Array {
  const text = encoder.encode(stringifyDocument(document));
  const out = new Uint8Array(alignTo4(text.byteLength)).fill(JSON_PADDING_BYTE);
  out.set(text);
  return out;
}

function encodeWords(words: number[]): Uint8Array {
  const out = new Uint8Array(words.length * 4);
  const view = new DataView(out.buffer);
  words.forEach((word, index) => view.setUint32(index * 4, word >>> 0, true));
  return out;
}

export interface GlbContainerWriterOptions {
  logger: Logger;
  openSink?: SinkFactory;
  /** Name used in log lines; defaults to the path. */
  label?: string;
}

/**
 * Writes one GLB container: header, JSON chunk, BIN chunk. Each step advances
 * `state`; any failure logs at error level and parks the writer in `failed`.
 * The sink is closed on every path once it has been opened.
 */
export class GlbContainerWriter {
  private current: WriterState = "idle";
  private readonly logger: Logger;
  private readonly openSink: SinkFactory;
  private readonly label: string;

  constructor(
    private readonly path: string,
    options: GlbContainerWriterOptions,
  ) {
    this.logger = options.logger;
    this.openSink = options.openSink ?? openFileSink;
    this.label = options.label ?? path;
  }

  get state(): WriterState {
    return this.current;
  }

  write(document: GltfDocument, staging: PayloadStaging): boolean {
    if (this.current !== "idle") {
      throw new Error(`GlbContainerWriter is single-use (state: ${this.current})`);
    }

    const jsonData = encodeJsonChunkData(document);
    const binLength = alignTo4(staging.byteLength);
    const totalLength = GLB_HEADER_BYTES + CHUNK_HEADER_BYTES + jsonData.byteLength + CHUNK_HEADER_BYTES + binLength;
    if (totalLength > MAX_CONTAINER_BYTES) {
      return this.fail("%s: Container would be %d bytes, over the 4 GiB format limit", this.label, totalLength);
    }

    let sink: OutputSink;
    try {
      sink = this.openSink(this.path);
    } catch (error) {
      return this.fail("Failed to open %s for writing: %s", this.label, describeError(error));
    }

    let written = false;
    let closed = false;
    try {
      written =
        this.writeHeader(sink, totalLength) &&
        this.writeJsonChunk(sink, jsonData) &&
        this.writeBinChunk(sink, staging, binLength);
    } finally {
      closed = this.closeSink(sink);
    }

    if (!written || !closed) {
      this.current = "failed";
      return false;
    }
    this.current = "done";
    return true;
  }

  private writeHeader(sink: OutputSink, totalLength: number): boolean {
    if (!this.tryWrite(sink, encodeWords([GLB_MAGIC, GLB_VERSION, totalLength]), "Error writing header")) {
      return false;
    }
    this.current = "headerWritten";
    return true;
  }

  private writeJsonChunk(sink: OutputSink, data: Uint8Array): boolean {
    if (!this.tryWrite(sink, encodeWords([data.byteLength, JSON_CHUNK_TYPE]), "Error writing JSON chunk header")) {
      return false;
    }
    if (!this.tryWrite(sink, data, "Error writing JSON data")) {
      return false;
    }
    this.current = "jsonWritten";
    return true;
  }

  private writeBinChunk(sink: OutputSink, staging: PayloadStaging, binLength: number): boolean {
    if (!this.tryWrite(sink, encodeWords([binLength, BIN_CHUNK_TYPE]), "Error writing BIN chunk header")) {
      return false;
    }

    let offset = 0;
    for (const item of staging) {
      if (item.byteLength > 0 && !this.tryWrite(sink, item.data, `Error writing BIN chunk data at offset ${offset}`)) {
        return false;
      }
      offset += item.byteLength;
    }

    const padding = binLength - offset;
    if (padding > 0) {
      const fill = new Uint8Array(padding).fill(BIN_PADDING_BYTE);
      if (!this.tryWrite(sink, fill, `Error writing BIN chunk data at offset ${offset}`)) {
        return false;
      }
    }
    this.current = "binWritten";
    return true;
  }

  private tryWrite(sink: OutputSink, bytes: Uint8Array, what: string): boolean {
    try {
      sink.write(bytes);
      return true;
    } catch (error) {
      this.fail("%s: %s: %s", this.label, what, describeError(error));
      return false;
    }
  }

  private closeSink(sink: OutputSink): boolean {
    try {
      sink.close();
      return true;
    } catch (error) {
      this.fail("%s: Error closing output: %s", this.label, describeError(error));
      return false;
    }
  }

  private fail(message: string, ...args: unknown[]): false {
    this.current = "failed";
    this.logger(LogLevel.Error, message, ...args);
    return false;
  }
}
