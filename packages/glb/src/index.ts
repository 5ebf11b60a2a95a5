export { exportScene, temporaryPathFor } from "./exportScene.js";
export type { ExportSceneOptions } from "./exportScene.js";
export { createExportContext, DEFAULT_MAX_DEPTH, MAX_DEPTH_LIMIT } from "./context.js";
export type { ExportContext, ExportContextOptions } from "./context.js";
export { walkScene, processGroup } from "./walker.js";
export { buildDocument, stringifyDocument } from "./document.js";
export type {
  GltfDocument,
  GltfExtras,
  GltfNode,
  GltfScene,
  GltfMesh,
  GltfAccessor,
  GltfBufferView,
  GltfBuffer,
} from "./document.js";
export { PayloadStaging, MAX_PAYLOAD_BYTES } from "./staging.js";
export type { PayloadDescriptor } from "./staging.js";
export {
  GlbContainerWriter,
  GLB_MAGIC,
  GLB_VERSION,
  JSON_CHUNK_TYPE,
  BIN_CHUNK_TYPE,
  GLB_HEADER_BYTES,
  CHUNK_HEADER_BYTES,
  alignTo4,
  paddingFor,
  encodeJsonChunkData,
} from "./container.js";
export type { WriterState, GlbContainerWriterOptions } from "./container.js";
export { readGlb } from "./reader.js";
export type { ParsedGlb, GlbChunk } from "./reader.js";
export { openFileSink, MemorySink } from "./sink.js";
export type { OutputSink, SinkFactory } from "./sink.js";
export { LogLevel, createLogger, formatLogLine } from "./logger.js";
export type { Logger } from "./logger.js";
export { ExportError, isExportError, isStructuralError, describeError } from "./errors.js";
export type { ExportErrorCode } from "./errors.js";
