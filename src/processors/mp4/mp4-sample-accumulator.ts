import { MuxError } from '../../core/error';
import { getLogger, LoggerLevel } from '../../logger';
import { Nalu, NaluKind } from '../h264/nalu';
import { ParameterSetCache } from '../h264/parameter-sets';

import {
  DEFAULT_MAX_NALUS_PER_SAMPLE,
  Mp4FlushPolicy,
  Mp4Sample,
  Mp4SampleTable,
  NALU_LENGTH_PREFIX_SIZE
} from './mp4mux-types';

const { debug } = getLogger('Mp4SampleAccumulator', LoggerLevel.WARN);

/**
 * Where flushed samples go. Units are written length-prefixed, back to back.
 */
export interface MediaDataSink {
  /**
   * @returns absolute offset of the first written byte
   */
  writeSampleData (nalUnits: Uint8Array[]): number
}

export function getSampleSize (nalUnits: Uint8Array[]): number {
  return nalUnits.reduce((size, data) => size + NALU_LENGTH_PREFIX_SIZE + data.byteLength, 0);
}

/**
 * Groups slice NALUs into samples and writes them to the sink as they are flushed.
 * SPS/PPS go to the parameter-set cache; other unit types are dropped.
 */
export class Mp4SampleAccumulator {
  private pending_: Nalu[] = [];
  private samples_: Mp4Sample[] = [];
  private syncSampleNumbers_: number[] = [];
  private mediaDataSize_: number = 0;
  private droppedNaluCount_: number = 0;

  constructor (
    private sink_: MediaDataSink,
    private parameterSets_: ParameterSetCache,
    private flushPolicy_: Mp4FlushPolicy = 'per-nalu',
    private maxNalusPerSample_: number = DEFAULT_MAX_NALUS_PER_SAMPLE
  ) {}

  get frameCount (): number {
    return this.samples_.length;
  }

  get mediaDataSize (): number {
    return this.mediaDataSize_;
  }

  get droppedNaluCount (): number {
    return this.droppedNaluCount_;
  }

  get pendingNaluCount (): number {
    return this.pending_.length;
  }

  getSyncSampleNumbers (): number[] {
    return this.syncSampleNumbers_.slice();
  }

  getSamples (): Mp4Sample[] {
    return this.samples_.slice();
  }

  /**
   * @returns samples flushed as a consequence of this unit (possibly none)
   * @throws MuxError MissingParameterSets on an IDR slice before SPS and PPS, nothing is written then
   */
  add (nalu: Nalu): Mp4Sample[] {
    switch (nalu.kind) {
    case NaluKind.SequenceParam:
    case NaluKind.PictureParam:
      this.parameterSets_.observe(nalu);
      return [];
    case NaluKind.SyncSlice:
      if (!this.parameterSets_.hasBoth()) {
        throw MuxError.MissingParameterSets('IDR slice found before SPS and PPS');
      }
      return this.addSlice_(nalu);
    case NaluKind.Slice:
      return this.addSlice_(nalu);
    case NaluKind.Other:
      this.droppedNaluCount_++;
      debug('dropping NALU of type', nalu.type);
      return [];
    }
  }

  /**
   * Flushes what is still pending.
   * @throws MuxError NoSamples, MissingParameterSets
   */
  finalize (): Mp4SampleTable {
    this.flush_();

    if (this.samples_.length === 0) {
      throw MuxError.NoSamples();
    }
    if (!this.parameterSets_.hasBoth()) {
      throw MuxError.MissingParameterSets();
    }

    return {
      samples: this.getSamples(),
      frameCount: this.frameCount,
      syncSampleNumbers: this.getSyncSampleNumbers()
    };
  }

  private addSlice_ (nalu: Nalu): Mp4Sample[] {
    const flushed: Mp4Sample[] = [];

    if (this.flushPolicy_ === 'per-nalu') {
      this.pending_.push(nalu);
      this.pushFlushed_(flushed);
      return flushed;
    }

    // an IDR always opens a new access unit
    if (nalu.kind === NaluKind.SyncSlice) {
      this.pushFlushed_(flushed);
    }
    this.pending_.push(nalu);
    if (this.pending_.length >= this.maxNalusPerSample_) {
      this.pushFlushed_(flushed);
    }
    return flushed;
  }

  private pushFlushed_ (flushed: Mp4Sample[]) {
    const sample = this.flush_();
    if (sample) {
      flushed.push(sample);
    }
  }

  private flush_ (): Mp4Sample | null {
    if (this.pending_.length === 0) {
      return null;
    }

    const nalUnits = this.pending_.map((nalu) => nalu.data);
    const isSync = this.pending_[0].kind === NaluKind.SyncSlice;
    const size = getSampleSize(nalUnits);
    const offset = this.sink_.writeSampleData(nalUnits);

    const sample: Mp4Sample = {
      index: this.samples_.length,
      offset,
      size,
      isSync,
      nalUnitCount: nalUnits.length
    };

    this.samples_.push(sample);
    if (isSync) {
      this.syncSampleNumbers_.push(sample.index + 1);
    }
    this.mediaDataSize_ += size;
    this.pending_ = [];

    return sample;
  }
}
