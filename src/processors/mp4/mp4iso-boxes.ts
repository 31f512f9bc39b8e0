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

import {
  decodeInt32, encodeDate, encodeFloat_16_16, encodeFloat_2_30, encodeFloat_8_8,
  encodeLang, utf8StringToBytes, writeInt32, writeUint16, writeUint32
} from '../../common-utils-binary';
import { MuxError } from '../../core/error';
import { AvcDecoderConfig } from '../h264/parameter-sets';

import { Box, BoxContainerBox, FullBox } from './mp4iso-base';

export const START_DATE = -2082844800000; /* midnight after Jan. 1, 1904 */
export const DEFAULT_MOVIE_MATRIX: number[] = [1.0, 0, 0, 0, 1.0, 0, 0, 0, 1.0];
export const DEFAULT_OP_COLOR: number[] = [0, 0, 0];

function writeMatrix (data: Uint8Array, offset: number, matrix: number[]): number {
  for (let i = 0; i < 9; i++) {
    // u,v,w column is 2.30 fixed-point, the rest 16.16
    const value = (i % 3 === 2) ? encodeFloat_2_30(matrix[i]) : encodeFloat_16_16(matrix[i]);
    writeInt32(data, offset + 4 * i, value);
  }
  return 36;
}

export class FileTypeBox extends Box {
  constructor (public majorBrand: string,
               public minorVersion: number,
               public compatibleBrands: string[]) {
    super('ftyp');
  }

  public layout (offset: number): number {
    this.size = super.layout(offset) + 8 + (4 * this.compatibleBrands.length);
    return this.size;
  }

  public write (data: Uint8Array): number {
    let offset = super.write(data);
    offset += writeInt32(data, this.offset + offset, decodeInt32(this.majorBrand));
    offset += writeUint32(data, this.offset + offset, this.minorVersion);
    this.compatibleBrands.forEach((brand: string) => {
      offset += writeInt32(data, this.offset + offset, decodeInt32(brand));
    });
    return offset;
  }
}

export class MovieBox extends BoxContainerBox {
  constructor (public header: MovieHeaderBox,
               public tracks: TrackBox[],
               public extendsBox: MovieExtendsBox | null = null) {
    super('moov', extendsBox ? [header, ...tracks, extendsBox] : [header, ...tracks]);
  }
}

export class MovieHeaderBox extends FullBox {
  constructor (public timescale: number,
               public duration: number,
               public nextTrackId: number,
               public rate: number = 1.0,
               public volume: number = 1.0,
               public matrix: number[] = DEFAULT_MOVIE_MATRIX,
               public creationTime: number = START_DATE,
               public modificationTime: number = START_DATE) {
    super('mvhd', 0, 0);
  }

  public layout (offset: number): number {
    this.size = super.layout(offset) + 16 + 4 + 2 + 2 + 8 + 36 + 24 + 4;
    return this.size;
  }

  public write (data: Uint8Array): number {
    let offset = super.write(data);
    // version 0 only
    writeUint32(data, this.offset + offset, encodeDate(this.creationTime));
    writeUint32(data, this.offset + offset + 4, encodeDate(this.modificationTime));
    writeUint32(data, this.offset + offset + 8, this.timescale);
    writeUint32(data, this.offset + offset + 12, this.duration);
    offset += 16;
    writeInt32(data, this.offset + offset, encodeFloat_16_16(this.rate));
    writeInt32(data, this.offset + offset + 4, encodeFloat_8_8(this.volume) << 16);
    writeInt32(data, this.offset + offset + 8, 0);
    writeInt32(data, this.offset + offset + 12, 0);
    offset += 16;
    offset += writeMatrix(data, this.offset + offset, this.matrix);
    // pre_defined
    data.fill(0, this.offset + offset, this.offset + offset + 24);
    offset += 24;
    writeUint32(data, this.offset + offset, this.nextTrackId);
    offset += 4;
    return offset;
  }
}

export enum TrackHeaderFlags {
  TRACK_ENABLED = 0x000001,
  TRACK_IN_MOVIE = 0x000002,
  TRACK_IN_PREVIEW = 0x000004,
}

export class TrackHeaderBox extends FullBox {
  constructor (flags: number,
               public trackId: number,
               public duration: number,
               public width: number,
               public height: number,
               public volume: number,
               public alternateGroup: number = 0,
               public layer: number = 0,
               public matrix: number[] = DEFAULT_MOVIE_MATRIX,
               public creationTime: number = START_DATE,
               public modificationTime: number = START_DATE) {
    super('tkhd', 0, flags);
  }

  public layout (offset: number): number {
    this.size = super.layout(offset) + 20 + 8 + 6 + 2 + 36 + 8;
    return this.size;
  }

  public write (data: Uint8Array): number {
    let offset = super.write(data);
    // version 0 only
    writeUint32(data, this.offset + offset, encodeDate(this.creationTime));
    writeUint32(data, this.offset + offset + 4, encodeDate(this.modificationTime));
    writeUint32(data, this.offset + offset + 8, this.trackId);
    writeUint32(data, this.offset + offset + 12, 0);
    writeUint32(data, this.offset + offset + 16, this.duration);
    offset += 20;
    writeInt32(data, this.offset + offset, 0);
    writeInt32(data, this.offset + offset + 4, 0);
    writeInt32(data, this.offset + offset + 8, (this.layer << 16) | this.alternateGroup);
    writeInt32(data, this.offset + offset + 12, encodeFloat_8_8(this.volume) << 16);
    offset += 16;
    offset += writeMatrix(data, this.offset + offset, this.matrix);
    writeInt32(data, this.offset + offset, encodeFloat_16_16(this.width));
    writeInt32(data, this.offset + offset + 4, encodeFloat_16_16(this.height));
    offset += 8;
    return offset;
  }
}

export class MediaHeaderBox extends FullBox {
  constructor (public timescale: number,
               public duration: number,
               public language: string = 'und',
               public creationTime: number = START_DATE,
               public modificationTime: number = START_DATE) {
    super('mdhd', 0, 0);
  }

  public layout (offset: number): number {
    this.size = super.layout(offset) + 16 + 4;
    return this.size;
  }

  public write (data: Uint8Array): number {
    const offset = super.write(data);
    // version 0 only
    writeUint32(data, this.offset + offset, encodeDate(this.creationTime));
    writeUint32(data, this.offset + offset + 4, encodeDate(this.modificationTime));
    writeUint32(data, this.offset + offset + 8, this.timescale);
    writeUint32(data, this.offset + offset + 12, this.duration);
    writeInt32(data, this.offset + offset + 16, encodeLang(this.language) << 16);
    return offset + 20;
  }
}

export class HandlerBox extends FullBox {
  private _encodedName: Uint8Array;

  constructor (public handlerType: string,
               public name: string) {
    super('hdlr', 0, 0);
    this._encodedName = utf8StringToBytes(this.name);
  }

  public layout (offset: number): number {
    this.size = super.layout(offset) + 8 + 12 + (this._encodedName.length + 1);
    return this.size;
  }

  public write (data: Uint8Array): number {
    let offset = super.write(data);
    writeInt32(data, this.offset + offset, 0);
    writeInt32(data, this.offset + offset + 4, decodeInt32(this.handlerType));
    writeInt32(data, this.offset + offset + 8, 0);
    writeInt32(data, this.offset + offset + 12, 0);
    writeInt32(data, this.offset + offset + 16, 0);
    offset += 20;
    data.set(this._encodedName, this.offset + offset);
    data[this.offset + offset + this._encodedName.length] = 0;
    offset += this._encodedName.length + 1;
    return offset;
  }
}

export const VIDEO_MEDIA_HEADER_FLAGS = 0x000001;

export class VideoMediaHeaderBox extends FullBox {
  constructor (public graphicsMode: number = 0,
               public opColor: number[] = DEFAULT_OP_COLOR) {
    super('vmhd', 0, VIDEO_MEDIA_HEADER_FLAGS);
  }

  public layout (offset: number): number {
    this.size = super.layout(offset) + 8;
    return this.size;
  }

  public write (data: Uint8Array): number {
    const offset = super.write(data);
    writeInt32(data, this.offset + offset, (this.graphicsMode << 16) | this.opColor[0]);
    writeInt32(data, this.offset + offset + 4, (this.opColor[1] << 16) | this.opColor[2]);
    return offset + 8;
  }
}

export const SELF_CONTAINED_DATA_REFERENCE_FLAG = 0x000001;

/**
 * Media data lives in the same file, so the entry carries no location
 */
export class DataEntryUrlBox extends FullBox {
  constructor () {
    super('url ', 0, SELF_CONTAINED_DATA_REFERENCE_FLAG);
  }
}

export class DataReferenceBox extends FullBox {
  constructor (public entries: Box[]) {
    super('dref', 0, 0);
  }

  public layout (offset: number): number {
    let size = super.layout(offset) + 4;
    this.entries.forEach((entry) => {
      size += entry.layout(offset + size);
    });
    return (this.size = size);
  }

  public write (data: Uint8Array): number {
    let offset = super.write(data);
    offset += writeUint32(data, this.offset + offset, this.entries.length);
    this.entries.forEach((entry) => {
      offset += entry.write(data);
    });
    return offset;
  }
}

export class DataInformationBox extends BoxContainerBox {
  constructor (public dataReference: DataReferenceBox) {
    super('dinf', [dataReference]);
  }
}

export class SampleDescriptionBox extends FullBox {
  constructor (public entries: SampleEntry[]) {
    super('stsd', 0, 0);
  }

  public layout (offset: number): number {
    let size = super.layout(offset) + 4;
    this.entries.forEach((entry) => {
      size += entry.layout(offset + size);
    });
    return (this.size = size);
  }

  public write (data: Uint8Array): number {
    let offset = super.write(data);
    offset += writeUint32(data, this.offset + offset, this.entries.length);
    this.entries.forEach((entry) => {
      offset += entry.write(data);
    });
    return offset;
  }
}

export type DecodingTimeToSampleEntry = {
  sampleCount: number
  sampleDelta: number
}

export class DecodingTimeToSampleBox extends FullBox {
  constructor (public entries: DecodingTimeToSampleEntry[]) {
    super('stts', 0, 0);
  }

  public layout (offset: number): number {
    this.size = super.layout(offset) + 4 + (this.entries.length * 2 * 4);
    return this.size;
  }

  public write (data: Uint8Array): number {
    let offset = super.write(data);
    offset += writeUint32(data, this.offset + offset, this.entries.length);
    for (let i = 0; i < this.entries.length; i++) {
      offset += writeUint32(data, this.offset + offset, this.entries[i].sampleCount);
      offset += writeUint32(data, this.offset + offset, this.entries[i].sampleDelta);
    }
    return offset;
  }
}

/**
 * Sample count and a table giving the size in bytes of each sample,
 * which allows the media data itself to be unframed.
 */
export class SampleSizeBox extends FullBox {
  constructor (
    public sampleSizes: number[] = [],
    public sampleCount: number = sampleSizes.length,
    public defaultSampleSize: number = 0) {
    super('stsz', 0, 0);

    if (sampleSizes.length > 0 && defaultSampleSize !== 0) {
      throw new Error('Should not have default sample size unequal zero but sample-size list length > 0');
    }
  }

  public layout (offset: number): number {
    this.size = super.layout(offset) + 2 * 4 + (this.sampleSizes.length * 4);
    return this.size;
  }

  public write (data: Uint8Array): number {
    let offset = super.write(data);
    offset += writeUint32(data, this.offset + offset, this.defaultSampleSize);
    offset += writeUint32(data, this.offset + offset, this.sampleCount);
    if (this.defaultSampleSize === 0) {
      for (let i = 0; i < this.sampleSizes.length; i++) {
        offset += writeUint32(data, this.offset + offset, this.sampleSizes[i]);
      }
    }
    return offset;
  }
}

/**
 * Runs of chunks sharing samples-per-chunk and sample-description-index.
 * `firstChunk` is one-based: the first record of the box has the value 1.
 */
export type SampleToChunkEntry = {
  firstChunk: number;
  samplesPerChunk: number;
  sampleDescriptionIndex: number
};

export class SampleToChunkBox extends FullBox {
  constructor (public entries: SampleToChunkEntry[]) {
    super('stsc', 0, 0);
  }

  public layout (offset: number): number {
    this.size = super.layout(offset) + 4 + (this.entries.length * 3 * 4);
    return this.size;
  }

  public write (data: Uint8Array): number {
    let offset = super.write(data);

    offset += writeUint32(data, this.offset + offset, this.entries.length);
    for (let i = 0; i < this.entries.length; i++) {
      offset += writeUint32(data, this.offset + offset, this.entries[i].firstChunk);
      offset += writeUint32(data, this.offset + offset, this.entries[i].samplesPerChunk);
      offset += writeUint32(data, this.offset + offset, this.entries[i].sampleDescriptionIndex);
    }

    return offset;
  }
}

/**
 * Absolute file offset of each chunk. With the movie box up front, its size
 * shifts every one of these, so they are only final once the moov is laid out.
 */
export class ChunkOffsetBox extends FullBox {
  constructor (public chunkOffsets: number[]) {
    super('stco', 0, 0);
  }

  public layout (offset: number): number {
    this.size = super.layout(offset) + 4 + this.chunkOffsets.length * 4;
    return this.size;
  }

  public write (data: Uint8Array): number {
    let offset = super.write(data);

    offset += writeUint32(data, this.offset + offset, this.chunkOffsets.length);
    for (let i = 0; i < this.chunkOffsets.length; i++) {
      offset += writeUint32(data, this.offset + offset, this.chunkOffsets[i]);
    }

    return offset;
  }
}

/**
 * Random access points, one-based sample numbers in strictly increasing order.
 * Without this box every sample is a random access point.
 */
export class SyncSampleBox extends FullBox {
  constructor (public syncSampleNumbers: number[]) {
    super('stss', 0, 0);
  }

  public layout (offset: number): number {
    this.size = super.layout(offset) + 4 + this.syncSampleNumbers.length * 4;
    return this.size;
  }

  public write (data: Uint8Array): number {
    let offset = super.write(data);
    offset += writeUint32(data, this.offset + offset, this.syncSampleNumbers.length);
    for (let i = 0; i < this.syncSampleNumbers.length; i++) {
      offset += writeUint32(data, this.offset + offset, this.syncSampleNumbers[i]);
    }
    return offset;
  }
}

export class SampleTableBox extends BoxContainerBox {
  constructor (public sampleDescriptions: SampleDescriptionBox,
               public timeToSample: DecodingTimeToSampleBox,
               public sampleToChunk: SampleToChunkBox,
               public sampleSizes: SampleSizeBox,
               public chunkOffset: ChunkOffsetBox,
               public syncSamples: SyncSampleBox | null = null) {
    super('stbl',
      syncSamples
        ? [sampleDescriptions, timeToSample, sampleToChunk, sampleSizes, chunkOffset, syncSamples]
        : [sampleDescriptions, timeToSample, sampleToChunk, sampleSizes, chunkOffset]);
  }
}

export class MediaInformationBox extends BoxContainerBox {
  constructor (public header: VideoMediaHeaderBox,
               public info: DataInformationBox,
               public sampleTable: SampleTableBox) {
    super('minf', [header, info, sampleTable]);
  }
}

export class MediaBox extends BoxContainerBox {
  constructor (public header: MediaHeaderBox,
               public handler: HandlerBox,
               public info: MediaInformationBox) {
    super('mdia', [header, handler, info]);
  }
}

export class TrackBox extends BoxContainerBox {
  constructor (public header: TrackHeaderBox,
               public media: MediaBox) {
    super('trak', [header, media]);
  }
}

export class TrackExtendsBox extends FullBox {
  constructor (public trackId: number,
               public defaultSampleDescriptionIndex: number,
               public defaultSampleDuration: number,
               public defaultSampleSize: number,
               public defaultSampleFlags: number) {
    super('trex', 0, 0);
  }

  public layout (offset: number): number {
    this.size = super.layout(offset) + 20;
    return this.size;
  }

  public write (data: Uint8Array): number {
    const offset = super.write(data);
    writeUint32(data, this.offset + offset, this.trackId);
    writeUint32(data, this.offset + offset + 4, this.defaultSampleDescriptionIndex);
    writeUint32(data, this.offset + offset + 8, this.defaultSampleDuration);
    writeUint32(data, this.offset + offset + 12, this.defaultSampleSize);
    writeUint32(data, this.offset + offset + 16, this.defaultSampleFlags);
    return offset + 20;
  }
}

export class MovieExtendsBox extends BoxContainerBox {
  constructor (public trackDefaults: TrackExtendsBox[]) {
    super('mvex', trackDefaults);
  }
}

export class SampleEntry extends Box {
  constructor (format: string,
               public dataReferenceIndex: number) {
    super(format);
  }

  public layout (offset: number): number {
    this.size = super.layout(offset) + 8;
    return this.size;
  }

  public write (data: Uint8Array): number {
    const offset = super.write(data);
    // 6 bytes reserved, then the 16-bit index
    writeInt32(data, this.offset + offset, 0);
    writeInt32(data, this.offset + offset + 4, this.dataReferenceIndex);
    return offset + 8;
  }
}

export const COLOR_NO_ALPHA_VIDEO_SAMPLE_DEPTH = 0x0018;

export const MAX_COMPRESSOR_NAME_LENGTH = 31;

export class VideoSampleEntry extends SampleEntry {
  constructor (codingName: string,
               dataReferenceIndex: number,
               public width: number,
               public height: number,
               public compressorName: string = '',
               public horizResolution: number = 72,
               public vertResolution: number = 72,
               public frameCount: number = 1,
               public depth: number = COLOR_NO_ALPHA_VIDEO_SAMPLE_DEPTH,
               public otherBoxes: Box[] = []) {
    super(codingName, dataReferenceIndex);
    if (compressorName.length > MAX_COMPRESSOR_NAME_LENGTH) {
      throw MuxError.InvalidConfig(`Compressor name longer than ${MAX_COMPRESSOR_NAME_LENGTH} characters: '${compressorName}'`);
    }
  }

  public layout (offset: number): number {
    let size = super.layout(offset) + 16 + 12 + 4 + 2 + 32 + 2 + 2;
    this.otherBoxes.forEach((box) => {
      size += box.layout(offset + size);
    });
    return (this.size = size);
  }

  public write (data: Uint8Array): number {
    let offset = super.write(data);
    data.fill(0, this.offset + offset, this.offset + offset + 16);
    offset += 16;
    offset += writeUint16(data, this.offset + offset, this.width);
    offset += writeUint16(data, this.offset + offset, this.height);
    offset += writeInt32(data, this.offset + offset, encodeFloat_16_16(this.horizResolution));
    offset += writeInt32(data, this.offset + offset, encodeFloat_16_16(this.vertResolution));
    offset += writeInt32(data, this.offset + offset, 0);
    offset += writeUint16(data, this.offset + offset, this.frameCount);
    // Pascal string in a fixed 32-byte field
    data[this.offset + offset] = this.compressorName.length;
    for (let i = 0; i < MAX_COMPRESSOR_NAME_LENGTH; i++) {
      data[this.offset + offset + i + 1] = i < this.compressorName.length ? (this.compressorName.charCodeAt(i) & 127) : 0;
    }
    offset += 32;
    writeInt32(data, this.offset + offset, (this.depth << 16) | 0xFFFF);
    offset += 4;
    this.otherBoxes.forEach((box) => {
      offset += box.write(data);
    });
    return offset;
  }
}

export const AVCC_CONFIGURATION_VERSION = 1;

/**
 * AVCDecoderConfigurationRecord
 */
export class AvcCodecDataBox extends Box {
  constructor (
    public config: AvcDecoderConfig,
    public nalUnitSizeFieldLength: number = 4,
    public version: number = AVCC_CONFIGURATION_VERSION
  ) {
    super('avcC');
  }

  public layout (offset: number): number {
    let size = super.layout(offset);
    size += 7 // 5 fixed field bytes + SPS count + PPS count
      + this.config.spsNALUs.reduce((accu, data) => accu + 2 + data.byteLength, 0)
      + this.config.ppsNALUs.reduce((accu, data) => accu + 2 + data.byteLength, 0);
    return (this.size = size);
  }

  public write (data: Uint8Array): number {
    let offset = super.write(data);
    const { profile, profileCompatibility, level, spsNALUs, ppsNALUs } = this.config;

    data[this.offset + offset + 0] = this.version;
    data[this.offset + offset + 1] = profile;
    data[this.offset + offset + 2] = profileCompatibility;
    data[this.offset + offset + 3] = level;
    // 6 bits reserved (111111) + 2 bits nal size length - 1
    data[this.offset + offset + 4] = 0xFC | ((this.nalUnitSizeFieldLength - 1) & 0x03);
    // 3 bits reserved (111) + 5 bits number of sps
    data[this.offset + offset + 5] = 0xE0 | (spsNALUs.length & 0x1F);
    offset += 6;

    spsNALUs.forEach((spsNalUnit) => {
      offset += writeUint16(data, this.offset + offset, spsNalUnit.byteLength);
      data.set(spsNalUnit, this.offset + offset);
      offset += spsNalUnit.byteLength;
    });

    data[this.offset + offset++] = ppsNALUs.length & 0xFF;

    ppsNALUs.forEach((ppsNalUnit) => {
      offset += writeUint16(data, this.offset + offset, ppsNalUnit.byteLength);
      data.set(ppsNalUnit, this.offset + offset);
      offset += ppsNalUnit.byteLength;
    });

    return offset;
  }
}
