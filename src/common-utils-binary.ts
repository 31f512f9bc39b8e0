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

export const MAX_UINT_32 = 4294967296;

/**
 * Encodes a string into its UTF-8 bytes
 */
export function utf8StringToBytes (str: string): Uint8Array {
  const bytes = new Uint8Array(str.length * 4);
  let b = 0;
  for (let i = 0, j = str.length; i < j; i++) {
    let code = str.charCodeAt(i);
    if (code <= 0x7f) {
      bytes[b++] = code;
      continue;
    }
    if (code >= 0xD800 && code <= 0xDBFF) {
      const codeLow = str.charCodeAt(i + 1);
      if (codeLow >= 0xDC00 && codeLow <= 0xDFFF) {
        // convert only when both high and low surrogates are present
        code = ((code & 0x3FF) << 10) + (codeLow & 0x3FF) + 0x10000;
        ++i;
      }
    }
    if ((code & 0xFFFF0000) !== 0) {
      bytes[b++] = 0xF0 | ((code >>> 18) & 0x07);
      bytes[b++] = 0x80 | ((code >>> 12) & 0x3F);
      bytes[b++] = 0x80 | ((code >>> 6) & 0x3F);
      bytes[b++] = 0x80 | (code & 0x3F);
    } else if ((code & 0xFFFFF800) !== 0) {
      bytes[b++] = 0xE0 | ((code >>> 12) & 0x0F);
      bytes[b++] = 0x80 | ((code >>> 6) & 0x3F);
      bytes[b++] = 0x80 | (code & 0x3F);
    } else {
      bytes[b++] = 0xC0 | ((code >>> 6) & 0x1F);
      bytes[b++] = 0x80 | (code & 0x3F);
    }
  }
  return bytes.subarray(0, b);
}

export const readUint16 = (buffer: Uint8Array, offset: number): number => {
  return (buffer[offset] << 8) | buffer[offset + 1];
};

export const readUint32 = (buffer: Uint8Array, offset: number): number => {
  const val = buffer[offset] << 24 |
              buffer[offset + 1] << 16 |
              buffer[offset + 2] << 8 |
              buffer[offset + 3];
  return val < 0 ? MAX_UINT_32 + val : val;
};

/**
 * Values above 2^53 lose precision.
 */
export const readUint64 = (buffer: Uint8Array, offset: number): number => {
  return readUint32(buffer, offset) * MAX_UINT_32 + readUint32(buffer, offset + 4);
};

export function writeUint16 (buffer: Uint8Array, offset: number, value: number): number {
  buffer[offset] = (value >> 8) & 0xff;
  buffer[offset + 1] = value & 0xff;
  return 2;
}

export function writeUint32 (buffer: Uint8Array, offset: number, value: number): number {
  buffer[offset] = (value >>> 24) & 0xff;
  buffer[offset + 1] = (value >> 16) & 0xff;
  buffer[offset + 2] = (value >> 8) & 0xff;
  buffer[offset + 3] = value & 0xff;
  return 4;
}

export function writeInt32 (data: Uint8Array, offset: number, value: number): number {
  data[offset] = (value >> 24) & 255;
  data[offset + 1] = (value >> 16) & 255;
  data[offset + 2] = (value >> 8) & 255;
  data[offset + 3] = value & 255;
  return 4;
}

/**
 * Four-character code to its big-endian 32-bit value
 */
export function decodeInt32 (s: string): number {
  return (s.charCodeAt(0) << 24) | (s.charCodeAt(1) << 16) |
           (s.charCodeAt(2) << 8) | s.charCodeAt(3);
}

export function readFourCC (buffer: Uint8Array, offset: number): string {
  return String.fromCharCode(buffer[offset], buffer[offset + 1], buffer[offset + 2], buffer[offset + 3]);
}

/**
 * Milliseconds since the epoch to seconds since `referenceDate`
 * @param referenceDate defaults to midnight after Jan. 1, 1904
 */
export function encodeDate (d: number, referenceDate: number = -2082844800000): number {
  return ((d - referenceDate) / 1000) | 0;
}

export function encodeFloat_16_16 (f: number): number {
  return (f * 0x10000) | 0;
}

export function encodeFloat_2_30 (f: number): number {
  return (f * 0x40000000) | 0;
}

export function encodeFloat_8_8 (f: number): number {
  return (f * 0x100) | 0;
}

export function encodeLang (s: string): number {
  return ((s.charCodeAt(0) & 0x1F) << 10) | ((s.charCodeAt(1) & 0x1F) << 5) | (s.charCodeAt(2) & 0x1F);
}

export function decodeLang (packed: number): string {
  return String.fromCharCode(
    ((packed >> 10) & 0x1F) + 0x60,
    ((packed >> 5) & 0x1F) + 0x60,
    (packed & 0x1F) + 0x60
  );
}
