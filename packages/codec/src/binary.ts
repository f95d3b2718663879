/**
 * @actus-sm/codec: Little-endian binary primitives.
 *
 * Layout:
 * - u8: enum codes, option tags (0 absent, 1 present), versions
 * - u32: lengths and cycle counts
 * - u64: timestamps
 * - i64: Units and Rates (two's complement)
 * - string: u32 byte length + UTF-8 (strictly decoded)
 * - vector: u32 element count + elements
 *
 * Every read is bounds-checked; malformed input raises
 * ValidationError("DECODE_FAILED"), never a RangeError.
 */

import { TextDecoder } from "node:util";
import { MAX_UNITS, MIN_UNITS, ValidationError } from "@actus-sm/units";
import { isTimestamp, MAX_TIMESTAMP } from "@actus-sm/types";

const MAX_U32 = 0xffff_ffff;

// Rejects malformed sequences instead of substituting U+FFFD
const UTF8 = new TextDecoder("utf-8", { fatal: true });

function decodeFailed(message: string): ValidationError {
  return new ValidationError("DECODE_FAILED", message);
}

// =============================================================================
// Writer
// =============================================================================

export class BinaryWriter {
  private readonly _chunks: Buffer[] = [];

  u8(value: number): this {
    if (!Number.isInteger(value) || value < 0 || value > 0xff) {
      throw new ValidationError("INVALID_TERMS", `${String(value)} does not fit in u8`);
    }
    const chunk = Buffer.alloc(1);
    chunk.writeUInt8(value, 0);
    this._chunks.push(chunk);
    return this;
  }

  u32(value: number): this {
    if (!Number.isInteger(value) || value < 0 || value > MAX_U32) {
      throw new ValidationError("INVALID_TERMS", `${String(value)} does not fit in u32`);
    }
    const chunk = Buffer.alloc(4);
    chunk.writeUInt32LE(value, 0);
    this._chunks.push(chunk);
    return this;
  }

  /** Timestamps: integers in [0, MAX_TIMESTAMP]. */
  u64(value: number): this {
    if (!isTimestamp(value)) {
      throw new ValidationError("INVALID_TIMESTAMP", `${String(value)} is not a valid timestamp`);
    }
    const chunk = Buffer.alloc(8);
    chunk.writeBigUInt64LE(BigInt(value), 0);
    this._chunks.push(chunk);
    return this;
  }

  i64(value: bigint): this {
    if (value < MIN_UNITS || value > MAX_UNITS) {
      throw new ValidationError("INVALID_AMOUNT", `${value.toString()} does not fit in i64`);
    }
    const chunk = Buffer.alloc(8);
    chunk.writeBigInt64LE(value, 0);
    this._chunks.push(chunk);
    return this;
  }

  string(value: string): this {
    const bytes = Buffer.from(value, "utf8");
    this.u32(bytes.length);
    this._chunks.push(bytes);
    return this;
  }

  /** Option tag followed by the value when present. */
  option<T>(value: T | undefined, write: (value: T) => void): this {
    if (value === undefined) {
      return this.u8(0);
    }
    this.u8(1);
    write(value);
    return this;
  }

  vector<T>(values: readonly T[], write: (value: T) => void): this {
    this.u32(values.length);
    for (const value of values) {
      write(value);
    }
    return this;
  }

  toBytes(): Uint8Array {
    return new Uint8Array(Buffer.concat(this._chunks));
  }
}

// =============================================================================
// Reader
// =============================================================================

export class BinaryReader {
  private readonly _buffer: Buffer;
  private _offset = 0;

  constructor(bytes: Uint8Array) {
    this._buffer = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  private _take(length: number, what: string): number {
    if (this._offset + length > this._buffer.length) {
      throw decodeFailed(
        `Unexpected end of input reading ${what} at byte ${String(this._offset)} (length ${String(this._buffer.length)})`,
      );
    }
    const start = this._offset;
    this._offset += length;
    return start;
  }

  u8(what = "u8"): number {
    return this._buffer.readUInt8(this._take(1, what));
  }

  u32(what = "u32"): number {
    return this._buffer.readUInt32LE(this._take(4, what));
  }

  u64(what = "u64"): number {
    const value = this._buffer.readBigUInt64LE(this._take(8, what));
    if (value > BigInt(MAX_TIMESTAMP)) {
      throw new ValidationError("INVALID_TIMESTAMP", `${what} ${value.toString()} is beyond the representable date range`);
    }
    return Number(value);
  }

  i64(what = "i64"): bigint {
    return this._buffer.readBigInt64LE(this._take(8, what));
  }

  string(what = "string"): string {
    const length = this.u32(`${what} length`);
    const start = this._take(length, what);
    try {
      return UTF8.decode(this._buffer.subarray(start, start + length));
    } catch {
      throw decodeFailed(`${what} is not valid UTF-8`);
    }
  }

  option<T>(read: () => T, what = "option"): T | undefined {
    const tag = this.u8(`${what} tag`);
    if (tag === 0) return undefined;
    if (tag === 1) return read();
    throw decodeFailed(`Invalid option tag ${String(tag)} for ${what}`);
  }

  vector<T>(read: () => T, what = "vector"): T[] {
    const count = this.u32(`${what} length`);
    const values: T[] = [];
    for (let i = 0; i < count; i++) {
      values.push(read());
    }
    return values;
  }

  /** Require the whole input to have been consumed. */
  finish(): void {
    const remaining = this._buffer.length - this._offset;
    if (remaining !== 0) {
      throw decodeFailed(`${String(remaining)} trailing byte(s) after the encoded value`);
    }
  }
}
