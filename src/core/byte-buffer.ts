import { writeUint32 } from '../common-utils-binary';
import { ErrorCode, MuxError } from './error';

const DEFAULT_INITIAL_CAPACITY = 64 * 1024;

/**
 * Growable in-memory byte sink.
 *
 * Forward-referencing fields are written in two phases: `reserve` appends a
 * zero-filled region and returns its offset, `patch`/`patchUint32` later
 * overwrite bytes inside what has already been written. Patching can never
 * move the write cursor.
 */
export class ByteBuffer {
  private data_: Uint8Array;
  private length_: number = 0;

  constructor (initialCapacity: number = DEFAULT_INITIAL_CAPACITY) {
    this.data_ = new Uint8Array(Math.max(1, initialCapacity));
  }

  /**
   * Number of bytes written so far, i.e the current write cursor.
   */
  get length (): number {
    return this.length_;
  }

  get capacity (): number {
    return this.data_.byteLength;
  }

  writeBytes (bytes: Uint8Array): number {
    const offset = this.length_;
    this.ensureCapacity_(bytes.byteLength);
    this.data_.set(bytes, offset);
    this.length_ += bytes.byteLength;
    return offset;
  }

  writeUint32 (value: number): number {
    const offset = this.length_;
    this.ensureCapacity_(4);
    this.length_ += writeUint32(this.data_, offset, value);
    return offset;
  }

  /**
   * Appends `size` zero bytes.
   * @returns offset of the reserved region
   */
  reserve (size: number): number {
    if (!Number.isSafeInteger(size) || size < 0) {
      throw new MuxError(ErrorCode.PROC_INTERNAL, `Can not reserve ${size} bytes`);
    }
    const offset = this.length_;
    this.ensureCapacity_(size);
    this.data_.fill(0, offset, offset + size);
    this.length_ += size;
    return offset;
  }

  patch (offset: number, bytes: Uint8Array) {
    this.checkPatchRange_(offset, bytes.byteLength);
    this.data_.set(bytes, offset);
  }

  patchUint32 (offset: number, value: number) {
    this.checkPatchRange_(offset, 4);
    writeUint32(this.data_, offset, value);
  }

  /**
   * @returns a copy of the written bytes
   */
  toUint8Array (): Uint8Array {
    return this.data_.slice(0, this.length_);
  }

  private checkPatchRange_ (offset: number, size: number) {
    if (!Number.isSafeInteger(offset) || offset < 0 || offset + size > this.length_) {
      throw new MuxError(ErrorCode.PROC_INTERNAL,
        `Patch of ${size} bytes at offset ${offset} is outside of written range (${this.length_} bytes)`);
    }
  }

  private ensureCapacity_ (additional: number) {
    const required = this.length_ + additional;
    if (required <= this.data_.byteLength) {
      return;
    }
    let capacity = this.data_.byteLength;
    while (capacity < required) {
      capacity *= 2;
    }
    const grown = new Uint8Array(capacity);
    grown.set(this.data_.subarray(0, this.length_));
    this.data_ = grown;
  }
}
