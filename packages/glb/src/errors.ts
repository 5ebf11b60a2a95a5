export type ExportErrorCode =
  | "EXPORT_ERR_STRUCTURE"
  | "EXPORT_ERR_CYCLE"
  | "EXPORT_ERR_DEPTH"
  | "EXPORT_ERR_PAYLOAD_OVERFLOW"
  | "EXPORT_ERR_INVALID_CONTAINER";

export class ExportError extends Error {
  readonly code: ExportErrorCode;

  constructor(code: ExportErrorCode, message: string) {
    super(message);
    this.name = "ExportError";
    this.code = code;
  }
}

export function isExportError(error: unknown): error is ExportError {
  return error instanceof ExportError;
}

/** Scene-shape problems found while walking; reported, never thrown out of an export. */
export function isStructuralError(error: unknown): error is ExportError {
  return (
    isExportError(error) &&
    (error.code === "EXPORT_ERR_STRUCTURE" || error.code === "EXPORT_ERR_CYCLE" || error.code === "EXPORT_ERR_DEPTH")
  );
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
