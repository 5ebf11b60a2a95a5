import {
  BIN_CHUNK_TYPE,
  CHUNK_HEADER_BYTES,
  GLB_HEADER_BYTES,
  GLB_MAGIC,
  GLB_VERSION,
  JSON_CHUNK_TYPE,
} from "./container.js";
import { ExportError, describeError } from "./errors.js";

export interface GlbChunk {
  type: number;
  data: Uint8Array;
}

export interface ParsedGlb {
  version: number;
  totalLength: number;
  json: unknown;
  /** JSON chunk contents including trailing space padding. */
  jsonText: string;
  jsonChunkLength: number;
  /** BIN chunk contents, padding included; `null` when the chunk is absent. */
  bin: Uint8Array | null;
  /** Chunks of any type other than JSON and BIN, in file order. */
  extraChunks: GlbChunk[];
}

const decoder = new TextDecoder();

function invalid(message: string): ExportError {
  return new ExportError("EXPORT_ERR_INVALID_CONTAINER", message);
}

/** Parse and check the framing of a binary glTF container. */
export function readGlb(bytes: Uint8Array): ParsedGlb {
  if (bytes.byteLength < GLB_HEADER_BYTES) {
    throw invalid(`container is ${bytes.byteLength} bytes, shorter than the ${GLB_HEADER_BYTES}-byte header`);
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const magic = view.getUint32(0, true);
  if (magic !== GLB_MAGIC) {
    throw invalid(`bad magic 0x${magic.toString(16).padStart(8, "0")}`);
  }
  const version = view.getUint32(4, true);
  if (version !== GLB_VERSION) {
    throw invalid(`unsupported container version ${version}`);
  }
  const totalLength = view.getUint32(8, true);
  if (totalLength !== bytes.byteLength) {
    throw invalid(`header declares ${totalLength} bytes but the container holds ${bytes.byteLength}`);
  }

  const chunks: GlbChunk[] = [];
  let offset = GLB_HEADER_BYTES;
  while (offset < totalLength) {
    if (offset + CHUNK_HEADER_BYTES > totalLength) {
      throw invalid(`truncated chunk header at offset ${offset}`);
    }
    const chunkLength = view.getUint32(offset, true);
    const chunkType = view.getUint32(offset + 4, true);
    offset += CHUNK_HEADER_BYTES;
    if (chunkLength % 4 !== 0) {
      throw invalid(`chunk at offset ${offset - CHUNK_HEADER_BYTES} has unaligned length ${chunkLength}`);
    }
    if (offset + chunkLength > totalLength) {
      throw invalid(`truncated chunk data at offset ${offset}`);
    }
    chunks.push({ type: chunkType, data: bytes.subarray(offset, offset + chunkLength) });
    offset += chunkLength;
  }

  const [first, ...rest] = chunks;
  if (!first || first.type !== JSON_CHUNK_TYPE) {
    throw invalid("container does not start with a JSON chunk");
  }
  const jsonText = decoder.decode(first.data);
  let json: unknown;
  try {
    json = JSON.parse(jsonText);
  } catch (error) {
    throw invalid(`JSON chunk does not parse: ${describeError(error)}`);
  }

  const binChunk = rest[0]?.type === BIN_CHUNK_TYPE ? rest[0] : undefined;
  return {
    version,
    totalLength,
    json,
    jsonText,
    jsonChunkLength: first.data.byteLength,
    bin: binChunk ? binChunk.data : null,
    extraChunks: rest.filter((chunk) => chunk !== binChunk),
  };
}
