import { MuxError } from '../../core/error';

/**
0 	Unspecified 		non-VCL
1 	Coded slice of a non-IDR picture 	VCL
2-4 	Coded slice data partition A/B/C 	VCL
5 	Coded slice of an IDR picture 	VCL
6 	Supplemental enhancement information (SEI) 	non-VCL
7 	Sequence parameter set 	non-VCL
8 	Picture parameter set 	non-VCL
9 	Access unit delimiter 	non-VCL
10 	End of sequence 	non-VCL
11 	End of stream 	non-VCL
12 	Filler data 	non-VCL
13-23 	Extensions, reserved
24-31 	Unspecified
 */

export enum H264NaluType {
  UNS = 0,
  NOI = 1,
  SDA = 2,
  SDB = 3,
  SDC = 4,
  IDR = 5,
  SEI = 6,
  SPS = 7,
  PPS = 8,
  AUD = 9,
  SEE = 10,
  STE = 11,
  FIL = 12
}

/**
 * What the muxer does with a unit, resolved once at segmentation.
 */
export enum NaluKind {
  SequenceParam = 'sequence-param',
  PictureParam = 'picture-param',
  Slice = 'slice',
  SyncSlice = 'sync-slice',
  Other = 'other'
}

export const NALU_HEADER_SIZE = 1;

export const NALU_TYPE_MASK = 0x1f;

export const NALU_FORBIDDEN_ZERO_BIT = 0x80;

export type StartCodeLength = 3 | 4;

export type Nalu = {
  /**
   * 5-bit nal_unit_type
   */
  readonly type: number
  readonly kind: NaluKind
  readonly refIdc: number
  /**
   * Header byte and payload, what goes into a length-prefixed sample
   */
  readonly data: Uint8Array
  /**
   * Payload without the header byte
   */
  readonly payload: Uint8Array
  readonly startCodeLength: StartCodeLength
  /**
   * Position of the start code in the segmented buffer
   */
  readonly position: number
};

export type NaluTypeSummary = {
  type: number
  name: string
  count: number
  bytes: number
};

export function getNaluTypeName (nalType: number): string {
  switch (nalType) {
  case H264NaluType.NOI:
    return 'NON_IDR_SLICE';
  case H264NaluType.SEI:
    return 'SEI';
  case H264NaluType.PPS:
    return 'PPS';
  case H264NaluType.SPS:
    return 'SPS';
  case H264NaluType.AUD:
    return 'AUD';
  case H264NaluType.IDR:
    return 'IDR';
  case H264NaluType.SEE:
    return 'END SEQUENCE';
  case H264NaluType.STE:
    return 'END STREAM';
  case H264NaluType.FIL:
    return 'FILLER';
  default:
    return `${nalType} (unknown NAL type)`;
  }
}

export function getNaluKind (header: number): NaluKind {
  if (header & NALU_FORBIDDEN_ZERO_BIT) {
    return NaluKind.Other;
  }
  switch (header & NALU_TYPE_MASK) {
  case H264NaluType.SPS:
    return NaluKind.SequenceParam;
  case H264NaluType.PPS:
    return NaluKind.PictureParam;
  case H264NaluType.NOI:
    return NaluKind.Slice;
  case H264NaluType.IDR:
    return NaluKind.SyncSlice;
  default:
    return NaluKind.Other;
  }
}

/**
 * @param data header byte and payload (at least the header byte)
 */
export function createNalu (data: Uint8Array, startCodeLength: StartCodeLength = 4, position: number = 0): Nalu {
  if (data.byteLength < NALU_HEADER_SIZE) {
    throw MuxError.MalformedStream('NALU data needs at least the header byte', position);
  }
  const header = data[0];
  return {
    type: header & NALU_TYPE_MASK,
    kind: getNaluKind(header),
    refIdc: (header & 0x60) >> 5,
    data,
    payload: data.subarray(NALU_HEADER_SIZE),
    startCodeLength,
    position
  };
}

export function isSliceNalu (nalu: Nalu): boolean {
  return nalu.kind === NaluKind.Slice || nalu.kind === NaluKind.SyncSlice;
}

/**
 * Count and payload bytes per NAL unit type, in order of first appearance.
 */
export function summarizeNalus (nalus: Iterable<Nalu>): NaluTypeSummary[] {
  const byType = new Map<number, NaluTypeSummary>();
  for (const nalu of nalus) {
    let entry = byType.get(nalu.type);
    if (!entry) {
      entry = {
        type: nalu.type,
        name: getNaluTypeName(nalu.type),
        count: 0,
        bytes: 0
      };
      byType.set(nalu.type, entry);
    }
    entry.count++;
    entry.bytes += nalu.payload.byteLength;
  }
  return Array.from(byType.values());
}
