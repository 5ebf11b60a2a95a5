import { ExportError } from "./errors.js";

/** Largest byte total a BIN chunk length field can describe. */
export const MAX_PAYLOAD_BYTES = 0xffffffff;

export interface PayloadDescriptor {
  readonly data: Uint8Array;
  readonly byteLength: number;
}

const encoder = new TextEncoder();

/**
 * Ordered list of payload contributions for the BIN chunk. Registration order
 * is the byte layout order; nothing is sorted or merged.
 */
export class PayloadStaging implements Iterable<PayloadDescriptor> {
  private readonly descriptors: PayloadDescriptor[] = [];
  private total = 0;
  private readonly maxBytes: number;

  constructor(maxBytes: number = MAX_PAYLOAD_BYTES) {
    if (!Number.isInteger(maxBytes) || maxBytes < 0 || maxBytes > MAX_PAYLOAD_BYTES) {
      throw new RangeError(`maxBytes must be an integer between 0 and ${MAX_PAYLOAD_BYTES} (got ${maxBytes})`);
    }
    this.maxBytes = maxBytes;
  }

  /** Sum of every registered payload size. */
  get byteLength(): number {
    return this.total;
  }

  get count(): number {
    return this.descriptors.length;
  }

  /**
   * Append a payload and return the offset it will start at inside the BIN
   * chunk. Without `ownCopy` the caller must keep `data` unchanged until the
   * export finishes. Strings are stored as UTF-8 and always copied.
   */
  register(data: Uint8Array | string, ownCopy = false): number {
    const bytes = typeof data === "string" ? encoder.encode(data) : ownCopy ? data.slice() : data;
    if (this.total + bytes.byteLength > this.maxBytes) {
      throw new ExportError(
        "EXPORT_ERR_PAYLOAD_OVERFLOW",
        `registering ${bytes.byteLength} bytes would exceed the ${this.maxBytes}-byte payload limit (${this.total} already staged)`,
      );
    }
    const offset = this.total;
    this.descriptors.push({ data: bytes, byteLength: bytes.byteLength });
    this.total += bytes.byteLength;
    return offset;
  }

  [Symbol.iterator](): Iterator<PayloadDescriptor> {
    return this.descriptors[Symbol.iterator]();
  }
}
