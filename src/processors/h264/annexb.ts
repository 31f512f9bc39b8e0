import { MuxError } from '../../core/error';
import { getLogger, LoggerLevel } from '../../logger';

import { createNalu, Nalu, NALU_FORBIDDEN_ZERO_BIT, StartCodeLength } from './nalu';

const { warn } = getLogger('AnnexB', LoggerLevel.WARN);

export type StartCode = {
  position: number
  length: StartCodeLength
};

export type AnnexBSplitOptions = {
  /**
   * Raise on structurally invalid framing instead of skipping/tolerating it
   */
  strict: boolean
};

const defaultSplitOptions: AnnexBSplitOptions = {
  strict: false
};

/**
 * Finds the next `00 00 01` or `00 00 00 01` at or after `from`.
 * The 3-byte form is tested first at each position; the 4-byte form only where
 * it fits the buffer.
 */
export function findStartCode (bytes: Uint8Array, from: number = 0): StartCode | null {
  const len = bytes.byteLength;
  for (let pos = Math.max(0, from); pos + 3 <= len; pos++) {
    if (bytes[pos] !== 0 || bytes[pos + 1] !== 0) {
      continue;
    }
    if (bytes[pos + 2] === 1) {
      return { position: pos, length: 3 };
    }
    if (pos + 4 <= len && bytes[pos + 2] === 0 && bytes[pos + 3] === 1) {
      return { position: pos, length: 4 };
    }
  }
  return null;
}

/**
 * Splits an Annex-B byte-stream into NAL units. Each unit runs from the byte
 * after its start code up to the next start code (or the end of the buffer).
 *
 * Units are views into `bytes`, no data is copied.
 */
export function splitAnnexBNalus (bytes: Uint8Array, opts: Partial<AnnexBSplitOptions> = {}): Nalu[] {
  const { strict } = Object.assign({}, defaultSplitOptions, opts);
  const nalus: Nalu[] = [];

  let startCode = findStartCode(bytes, 0);
  while (startCode) {
    const headerPos = startCode.position + startCode.length;
    if (headerPos >= bytes.byteLength) {
      if (strict) {
        throw MuxError.MalformedStream('Start code at end of stream without NALU header', startCode.position);
      }
      warn('Ignoring start code without NALU header at position', startCode.position);
      break;
    }

    if (strict && (bytes[headerPos] & NALU_FORBIDDEN_ZERO_BIT)) {
      throw MuxError.MalformedStream('NALU header has forbidden_zero_bit set', headerPos);
    }

    const next = findStartCode(bytes, headerPos + 1);
    const end = next ? next.position : bytes.byteLength;
    nalus.push(createNalu(bytes.subarray(headerPos, end), startCode.length, startCode.position));
    startCode = next;
  }

  return nalus;
}
