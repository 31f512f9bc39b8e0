import { decodeLang, readFourCC, readUint16, readUint32, readUint64 } from '../../common-utils-binary';
import { MuxError } from '../../core/error';

import { BOX_HEADER_SIZE } from './mp4iso-base';
import { DecodingTimeToSampleEntry, SampleToChunkEntry } from './mp4iso-boxes';

const CONTAINER_BOXES: ReadonlySet<string> = new Set([
  'moov', 'trak', 'mdia', 'minf', 'dinf', 'stbl', 'mvex', 'edts', 'udta'
]);

// bytes of payload before the child boxes start
const CHILD_OFFSETS: Readonly<Record<string, number>> = {
  stsd: 8, // version/flags, entry count
  dref: 8,
  avc1: 78 // visual sample entry fields
};

export type ParsedBox = {
  type: string
  /**
   * absolute offset of the box header
   */
  offset: number
  size: number
  headerSize: number
  /**
   * payload, a view into the parsed bytes
   */
  data: Uint8Array
  children: ParsedBox[]
};

export type AvcConfigRecord = {
  version: number
  profile: number
  profileCompatibility: number
  level: number
  nalUnitSizeFieldLength: number
  sps: Uint8Array[]
  pps: Uint8Array[]
};

export type Mp4VideoTrackInfo = {
  majorBrand: string
  minorVersion: number
  compatibleBrands: string[]
  movieTimescale: number
  movieDuration: number
  width: number
  height: number
  timescale: number
  duration: number
  language: string
  handlerType: string
  handlerName: string
  codingName: string
  compressorName: string
  frameCount: number
  sampleSizes: number[]
  chunkOffsets: number[]
  sampleToChunk: SampleToChunkEntry[]
  timeToSample: DecodingTimeToSampleEntry[]
  /**
   * null when there is no stss box (all samples are sync samples then)
   */
  syncSampleNumbers: number[] | null
  /**
   * absolute offset of every sample, derived from chunk offsets, stsc and sizes
   */
  sampleOffsets: number[]
  avcC: AvcConfigRecord
  hasMovieExtends: boolean
};

/**
 * Walks a box tree, checking every length field against the bytes available.
 * Known container boxes (and sample description boxes) get their children parsed.
 *
 * @throws MuxError MalformedStream
 */
export function parseBoxes (bytes: Uint8Array, start: number = 0, end: number = bytes.byteLength): ParsedBox[] {
  const boxes: ParsedBox[] = [];
  let offset = start;

  while (offset < end) {
    if (end - offset < BOX_HEADER_SIZE) {
      throw MuxError.MalformedStream(`Truncated box header (${end - offset} bytes left)`, offset);
    }

    let size = readUint32(bytes, offset);
    const type = readFourCC(bytes, offset + 4);
    let headerSize = BOX_HEADER_SIZE;

    if (size === 1) {
      if (end - offset < 16) {
        throw MuxError.MalformedStream(`Truncated large-size header of '${type}'`, offset);
      }
      size = readUint64(bytes, offset + 8);
      headerSize = 16;
    } else if (size === 0) {
      size = end - offset;
    }

    if (size < headerSize || offset + size > end) {
      throw MuxError.MalformedStream(`Box '${type}' declares ${size} bytes, ${end - offset} available`, offset);
    }

    const payloadStart = offset + headerSize;
    const box: ParsedBox = {
      type,
      offset,
      size,
      headerSize,
      data: bytes.subarray(payloadStart, offset + size),
      children: []
    };

    if (CONTAINER_BOXES.has(type)) {
      box.children = parseBoxes(bytes, payloadStart, offset + size);
    } else if (type in CHILD_OFFSETS) {
      const childStart = payloadStart + CHILD_OFFSETS[type];
      if (childStart > offset + size) {
        throw MuxError.MalformedStream(`Box '${type}' too small for its fields`, offset);
      }
      box.children = parseBoxes(bytes, childStart, offset + size);
    }

    boxes.push(box);
    offset += size;
  }

  return boxes;
}

/**
 * @param path box types from the top level down, as array or slash-separated, e.g `moov/trak/tkhd`
 */
export function findBox (boxes: ParsedBox[], path: string | string[]): ParsedBox | null {
  const types = typeof path === 'string' ? path.split('/') : path;
  let level = boxes;
  let found: ParsedBox | null = null;
  for (const type of types) {
    found = level.find((box) => box.type === type) ?? null;
    if (!found) {
      return null;
    }
    level = found.children;
  }
  return found;
}

/**
 * @param minPayloadSize bytes of fixed fields read from the payload
 */
function requireBox (boxes: ParsedBox[], path: string, minPayloadSize: number = 0): ParsedBox {
  const box = findBox(boxes, path);
  if (!box) {
    throw MuxError.MalformedStream(`Missing box ${path}`);
  }
  if (box.data.byteLength < minPayloadSize) {
    throw MuxError.MalformedStream(`Box ${path} has ${box.data.byteLength} payload bytes, needs ${minPayloadSize}`, box.offset);
  }
  return box;
}

/**
 * Reads a 32-bit entry count and hands the offset of each entry to `read`.
 * The entries must all lie within the payload.
 */
function readTable<T> (box: ParsedBox, countOffset: number, entrySize: number, read: (entryOffset: number) => T): T[] {
  const { data } = box;
  if (countOffset + 4 > data.byteLength) {
    throw MuxError.MalformedStream(`Box '${box.type}' too small for its entry count`, box.offset);
  }
  const count = readUint32(data, countOffset);
  const available = Math.floor((data.byteLength - countOffset - 4) / entrySize);
  if (count > available) {
    throw MuxError.MalformedStream(`Box '${box.type}' declares ${count} entries, has room for ${available}`, box.offset);
  }
  const table: T[] = [];
  for (let i = 0; i < count; i++) {
    table.push(read(countOffset + 4 + i * entrySize));
  }
  return table;
}

function readAsciiString (data: Uint8Array, offset: number, length: number): string {
  return String.fromCharCode(...Array.from(data.subarray(offset, offset + length)));
}

function readCString (data: Uint8Array, offset: number): string {
  let end = offset;
  while (end < data.byteLength && data[end] !== 0) {
    end++;
  }
  return Buffer.from(data.subarray(offset, end)).toString('utf8');
}

/**
 * @throws MuxError MalformedStream when a count or length points past the record
 */
export function parseAvcConfigRecord (data: Uint8Array): AvcConfigRecord {
  const truncated = (offset: number) => MuxError.MalformedStream(`Truncated avcC record (${data.byteLength} bytes)`, offset);

  const readParameterSets = (count: number, offset: number): [Uint8Array[], number] => {
    const sets: Uint8Array[] = [];
    for (let i = 0; i < count; i++) {
      if (offset + 2 > data.byteLength) {
        throw truncated(offset);
      }
      const length = readUint16(data, offset);
      if (offset + 2 + length > data.byteLength) {
        throw truncated(offset);
      }
      sets.push(data.slice(offset + 2, offset + 2 + length));
      offset += 2 + length;
    }
    return [sets, offset];
  };

  if (data.byteLength < 6) {
    throw truncated(0);
  }
  const [sps, afterSps] = readParameterSets(data[5] & 0x1F, 6);
  if (afterSps >= data.byteLength) {
    throw truncated(afterSps);
  }
  const [pps] = readParameterSets(data[afterSps], afterSps + 1);

  return {
    version: data[0],
    profile: data[1],
    profileCompatibility: data[2],
    level: data[3],
    nalUnitSizeFieldLength: (data[4] & 0x03) + 1,
    sps,
    pps
  };
}

/**
 * Offset of every sample, following the stsc runs over the chunks.
 */
export function deriveSampleOffsets (
  chunkOffsets: number[],
  sampleToChunk: SampleToChunkEntry[],
  sampleSizes: number[]
): number[] {
  const offsets: number[] = [];
  let sampleIndex = 0;
  for (let chunk = 1; chunk <= chunkOffsets.length; chunk++) {
    let samplesInChunk = 0;
    for (const entry of sampleToChunk) {
      if (entry.firstChunk <= chunk) {
        samplesInChunk = entry.samplesPerChunk;
      }
    }
    let offset = chunkOffsets[chunk - 1];
    for (let i = 0; i < samplesInChunk && sampleIndex < sampleSizes.length; i++) {
      offsets.push(offset);
      offset += sampleSizes[sampleIndex++];
    }
  }
  return offsets;
}

/**
 * Reads back what a single-video-track file declares about its track.
 *
 * @throws MuxError MalformedStream
 */
export function readMp4VideoTrackInfo (bytes: Uint8Array): Mp4VideoTrackInfo {
  const boxes = parseBoxes(bytes);
  const stblPath = 'moov/trak/mdia/minf/stbl';

  const ftyp = requireBox(boxes, 'ftyp', 8).data;
  const mvhd = requireBox(boxes, 'moov/mvhd', 20).data;
  const tkhd = requireBox(boxes, 'moov/trak/tkhd', 84).data;
  const mdhd = requireBox(boxes, 'moov/trak/mdia/mdhd', 22).data;
  const hdlr = requireBox(boxes, 'moov/trak/mdia/hdlr', 24).data;
  const sampleEntry = requireBox(boxes, `${stblPath}/stsd`).children[0];
  if (!sampleEntry) {
    throw MuxError.MalformedStream('Empty sample description box');
  }
  const avcC = requireBox(sampleEntry.children, 'avcC').data;
  const stsz = requireBox(boxes, `${stblPath}/stsz`, 12);
  const stsc = requireBox(boxes, `${stblPath}/stsc`);
  const stts = requireBox(boxes, `${stblPath}/stts`);
  const stco = requireBox(boxes, `${stblPath}/stco`);
  const stss = findBox(boxes, `${stblPath}/stss`);

  const compatibleBrands: string[] = [];
  for (let i = 8; i + 4 <= ftyp.byteLength; i += 4) {
    compatibleBrands.push(readFourCC(ftyp, i));
  }

  const defaultSampleSize = readUint32(stsz.data, 4);
  const frameCount = readUint32(stsz.data, 8);
  if (defaultSampleSize !== 0 && frameCount * defaultSampleSize > bytes.byteLength) {
    throw MuxError.MalformedStream(`${frameCount} samples of ${defaultSampleSize} bytes exceed the file size`, stsz.offset);
  }
  const sampleSizes = defaultSampleSize === 0
    ? readTable(stsz, 8, 4, (o) => readUint32(stsz.data, o))
    : new Array<number>(frameCount).fill(defaultSampleSize);

  const chunkOffsets = readTable(stco, 4, 4, (o) => readUint32(stco.data, o));

  const sampleToChunk: SampleToChunkEntry[] = readTable(stsc, 4, 12, (o) => ({
    firstChunk: readUint32(stsc.data, o),
    samplesPerChunk: readUint32(stsc.data, o + 4),
    sampleDescriptionIndex: readUint32(stsc.data, o + 8)
  }));

  const timeToSample: DecodingTimeToSampleEntry[] = readTable(stts, 4, 8, (o) => ({
    sampleCount: readUint32(stts.data, o),
    sampleDelta: readUint32(stts.data, o + 4)
  }));

  const compressorNameLength = Math.min(sampleEntry.data[42], 31);

  return {
    majorBrand: readFourCC(ftyp, 0),
    minorVersion: readUint32(ftyp, 4),
    compatibleBrands,
    movieTimescale: readUint32(mvhd, 12),
    movieDuration: readUint32(mvhd, 16),
    width: readUint32(tkhd, 76) / 0x10000,
    height: readUint32(tkhd, 80) / 0x10000,
    timescale: readUint32(mdhd, 12),
    duration: readUint32(mdhd, 16),
    language: decodeLang(readUint16(mdhd, 20)),
    handlerType: readFourCC(hdlr, 8),
    handlerName: readCString(hdlr, 24),
    codingName: sampleEntry.type,
    compressorName: readAsciiString(sampleEntry.data, 43, compressorNameLength),
    frameCount,
    sampleSizes,
    chunkOffsets,
    sampleToChunk,
    timeToSample,
    syncSampleNumbers: stss ? readTable(stss, 4, 4, (o) => readUint32(stss.data, o)) : null,
    sampleOffsets: deriveSampleOffsets(chunkOffsets, sampleToChunk, sampleSizes),
    avcC: parseAvcConfigRecord(avcC),
    hasMovieExtends: findBox(boxes, 'moov/mvex') !== null
  };
}
