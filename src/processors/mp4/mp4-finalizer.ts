import { MAX_UINT_32 } from '../../common-utils-binary';
import { ByteBuffer } from '../../core/byte-buffer';
import { MuxError } from '../../core/error';
import { getLogger, LoggerLevel } from '../../logger';

import { BOX_HEADER_SIZE, FreeSpaceBox, makeBoxHeader } from './mp4iso-base';
import { FileTypeBox, MovieBox } from './mp4iso-boxes';
import { MediaDataSink } from './mp4-sample-accumulator';
import { DEFAULT_RESERVED_MOOV_SIZE, Mp4ChunkLayout, Mp4FinalizerStrategy } from './mp4mux-types';

const { debug } = getLogger('Mp4Finalizer', LoggerLevel.WARN);

/**
 * Size field of the `mdat` box around `mediaDataSize` bytes of samples.
 * The header is a plain 8-byte one, so the whole box must stay below 2^32.
 *
 * @throws MuxError ValueOutOfRange
 */
export function getMediaDataBoxSize (mediaDataSize: number): number {
  const boxSize = BOX_HEADER_SIZE + mediaDataSize;
  if (boxSize >= MAX_UINT_32) {
    throw MuxError.ValueOutOfRange('mdat box size', boxSize, MAX_UINT_32 - 1);
  }
  return boxSize;
}

/**
 * Owns the output bytes of one container build. Sample data is written
 * as it arrives; `finalize` resolves the sizes and offsets only known
 * at the end, and hands out the finished file.
 */
export abstract class Mp4Finalizer implements MediaDataSink {
  protected readonly buffer_: ByteBuffer = new ByteBuffer();

  private mdatHeaderOffset_: number = -1;
  private mediaDataStart_: number = -1;

  abstract readonly strategy: Mp4FinalizerStrategy;

  /**
   * How samples map to chunks in the sample table built for this strategy
   */
  abstract readonly chunkLayout: Mp4ChunkLayout;

  /**
   * Absolute offset of the first sample byte
   */
  get mediaDataStart (): number {
    return this.mediaDataStart_;
  }

  get mediaDataSize (): number {
    return this.buffer_.length - this.mediaDataStart_;
  }

  writeSampleData (nalUnits: Uint8Array[]): number {
    const offset = this.buffer_.length;
    nalUnits.forEach((data) => {
      this.buffer_.writeUint32(data.byteLength);
      this.buffer_.writeBytes(data);
    });
    return offset;
  }

  /**
   * @returns the complete container
   */
  abstract finalize (moov: MovieBox): Uint8Array;

  protected openMediaData_ () {
    this.mdatHeaderOffset_ = this.buffer_.length;
    // size is patched on close
    this.buffer_.writeBytes(makeBoxHeader(BOX_HEADER_SIZE, 'mdat'));
    this.mediaDataStart_ = this.buffer_.length;
  }

  protected closeMediaData_ () {
    this.buffer_.patchUint32(this.mdatHeaderOffset_, getMediaDataBoxSize(this.mediaDataSize));
  }
}

/**
 * ftyp, mdat, then moov at the end of the file. One chunk per sample.
 */
export class TrailerMoovFinalizer extends Mp4Finalizer {
  readonly strategy = 'trailer';
  readonly chunkLayout = Mp4ChunkLayout.CHUNK_PER_SAMPLE;

  constructor (ftyp: FileTypeBox) {
    super();
    this.buffer_.writeBytes(ftyp.toUint8Array());
    this.openMediaData_();
  }

  finalize (moov: MovieBox): Uint8Array {
    this.closeMediaData_();
    const moovBytes = moov.toUint8Array();
    this.buffer_.writeBytes(moovBytes);
    debug('appended moov of', moovBytes.byteLength, 'bytes after', this.mediaDataSize, 'bytes of media data');
    return this.buffer_.toUint8Array();
  }
}

/**
 * ftyp, a region reserved for moov (remainder padded with a free box), then mdat.
 * All samples form a single chunk.
 */
export class PlaceholderMoovFinalizer extends Mp4Finalizer {
  readonly strategy = 'placeholder';
  readonly chunkLayout = Mp4ChunkLayout.SINGLE_CHUNK;

  private moovOffset_: number;

  constructor (ftyp: FileTypeBox, readonly reservedMoovSize: number = DEFAULT_RESERVED_MOOV_SIZE) {
    super();
    this.buffer_.writeBytes(ftyp.toUint8Array());
    this.moovOffset_ = this.buffer_.reserve(reservedMoovSize);
    this.openMediaData_();
  }

  /**
   * @throws MuxError MoovTooLarge when the moov (plus a free box for any remainder) does not fit the reservation
   */
  finalize (moov: MovieBox): Uint8Array {
    const moovBytes = moov.toUint8Array();
    const remainder = this.reservedMoovSize - moovBytes.byteLength;

    if (remainder !== 0 && remainder < BOX_HEADER_SIZE) {
      throw MuxError.MoovTooLarge(moovBytes.byteLength, this.reservedMoovSize);
    }

    this.buffer_.patch(this.moovOffset_, moovBytes);
    if (remainder > 0) {
      const free = new FreeSpaceBox(remainder);
      this.buffer_.patch(this.moovOffset_ + moovBytes.byteLength, free.toUint8Array());
    }
    this.closeMediaData_();

    debug('patched moov of', moovBytes.byteLength, 'bytes into', this.reservedMoovSize, 'reserved bytes');
    return this.buffer_.toUint8Array();
  }
}

export function createMp4Finalizer (
  strategy: Mp4FinalizerStrategy,
  ftyp: FileTypeBox,
  reservedMoovSize: number = DEFAULT_RESERVED_MOOV_SIZE
): Mp4Finalizer {
  switch (strategy) {
  case 'trailer':
    return new TrailerMoovFinalizer(ftyp);
  case 'placeholder':
    return new PlaceholderMoovFinalizer(ftyp, reservedMoovSize);
  }
}
