/**
 * Copyright 2015 Mozilla Foundation
 *
 * Licensed under the Apache License, Version 2.0 (the "License");
 * you may not use this file except in compliance with the License.
 * You may obtain a copy of the License at
 *
 * http://www.apache.org/licenses/LICENSE-2.0
 *
 * Unless required by applicable law or agreed to in writing, software
 * distributed under the License is distributed on an "AS IS" BASIS,
 * WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
 * See the License for the specific language governing permissions and
 * limitations under the License.
 */

import { decodeInt32, MAX_UINT_32, writeInt32, writeUint32 } from '../../common-utils-binary';
import { ErrorCode, MuxError } from '../../core/error';

export const BOX_HEADER_SIZE = 8;

export const FULL_BOX_HEADER_SIZE = 12;

/**
 * Writes a 32-bit size + four-character type header
 * @returns amount of written bytes
 * @throws MuxError ValueOutOfRange when the size needs more than 32 bits
 */
export function writeBoxHeader (data: Uint8Array, offset: number, size: number, boxtype: string): number {
  if (size >= MAX_UINT_32) {
    throw MuxError.ValueOutOfRange(`'${boxtype}' box size`, size, MAX_UINT_32 - 1);
  }
  if (size < BOX_HEADER_SIZE) {
    throw new MuxError(ErrorCode.PROC_INTERNAL, `Invalid size ${size} for box '${boxtype}'`);
  }
  writeUint32(data, offset, size);
  writeInt32(data, offset + 4, decodeInt32(boxtype));
  return BOX_HEADER_SIZE;
}

export function makeBoxHeader (size: number, boxtype: string): Uint8Array {
  const header = new Uint8Array(BOX_HEADER_SIZE);
  writeBoxHeader(header, 0, size, boxtype);
  return header;
}

/**
 * Two-pass serialization: `layout` assigns every box its absolute offset and
 * total size (children included), `write` then fills a buffer of at least
 * that size. A box's size field is therefore always the exact byte count
 * `write` produces for it.
 */
export class Box {
  public offset: number = 0;
  public size: number = 0;

  public boxtype: string;

  public constructor (boxtype: string) {
    if (boxtype.length !== 4) {
      throw new Error(`Box type must be a four-character code, got '${boxtype}'`);
    }
    this.boxtype = boxtype;
  }

  /**
   * @param offset Position where writing will start in the output array
   * @returns Size of the box including its children
   */
  public layout (offset: number): number {
    this.offset = offset;
    this.size = BOX_HEADER_SIZE;
    return this.size;
  }

  /**
   * @param data Output array
   * @returns Amount of written bytes by this Box and its children only.
   */
  public write (data: Uint8Array): number {
    return writeBoxHeader(data, this.offset, this.size, this.boxtype);
  }

  public toUint8Array (): Uint8Array {
    const size = this.layout(0);
    const data = new Uint8Array(size);
    this.write(data);
    return data;
  }
}

export class BoxContainerBox extends Box {
  public children: Box[];

  constructor (type: string, children: Box[]) {
    super(type);
    this.children = children;
  }

  public layout (offset: number): number {
    let size = super.layout(offset);
    this.children.forEach((child) => {
      size += child.layout(offset + size);
    });
    return (this.size = size);
  }

  public write (data: Uint8Array): number {
    let offset = super.write(data);
    this.children.forEach((child) => {
      offset += child.write(data);
    });
    return offset;
  }
}

export class FullBox extends Box {
  public version: number;
  public flags: number;

  constructor (boxtype: string, version: number = 0, flags: number = 0) {
    super(boxtype);
    this.version = version;
    this.flags = flags;
  }

  public layout (offset: number): number {
    this.size = super.layout(offset) + 4;
    return this.size;
  }

  public write (data: Uint8Array): number {
    const offset = super.write(data);
    writeInt32(data, this.offset + offset, (this.version << 24) | this.flags);
    return offset + 4;
  }
}

/**
 * Box of a fixed total size, filled with zeroes.
 */
export class FreeSpaceBox extends Box {
  constructor (public totalSize: number) {
    super('free');
    if (totalSize < BOX_HEADER_SIZE) {
      throw new MuxError(ErrorCode.PROC_INTERNAL, `A free box needs at least ${BOX_HEADER_SIZE} bytes, got ${totalSize}`);
    }
  }

  public layout (offset: number): number {
    super.layout(offset);
    return (this.size = this.totalSize);
  }

  public write (data: Uint8Array): number {
    const offset = super.write(data);
    data.fill(0, this.offset + offset, this.offset + this.size);
    return this.size;
  }
}
