import { EventEmitter } from 'eventemitter3';

import { isPositiveInteger, objectNewFromDefaultAndPartials } from '../../common-utils';
import { MAX_UINT_32 } from '../../common-utils-binary';
import { isMuxError, MuxError } from '../../core/error';
import { mixinWithOptions } from '../../lib/options';
import { getLogger, LoggerLevel } from '../../logger';
import { AnnexBSplitOptions, splitAnnexBNalus } from '../h264/annexb';
import { createNalu, getNaluTypeName, Nalu, NaluKind } from '../h264/nalu';
import { getAvcCodecString, ParameterSetCache } from '../h264/parameter-sets';

import { BOX_HEADER_SIZE } from './mp4iso-base';
import { MAX_COMPRESSOR_NAME_LENGTH } from './mp4iso-boxes';
import { createMp4Finalizer, Mp4Finalizer } from './mp4-finalizer';
import { createFileTypeBox, createMovieBox } from './mp4-movie-builder';
import { Mp4SampleAccumulator } from './mp4-sample-accumulator';
import {
  DEFAULT_MP4_MUX_OPTIONS,
  MAX_VIDEO_DIMENSION,
  Mp4MuxEvent,
  Mp4MuxEventMap,
  Mp4MuxOptions,
  ResolvedTrackConfig,
  TrackConfig
} from './mp4mux-types';

const { debug, warn, error } = getLogger('AvcMp4Mux', LoggerLevel.WARN);

/**
 * Checks geometry and timing, and derives the (integer) frame duration.
 * @throws MuxError InvalidConfig
 */
export function resolveTrackConfig (config: TrackConfig): ResolvedTrackConfig {
  const { width, height, timescale, frameRate } = config;

  if (!isPositiveInteger(width) || width > MAX_VIDEO_DIMENSION ||
    !isPositiveInteger(height) || height > MAX_VIDEO_DIMENSION) {
    throw MuxError.InvalidConfig(`Width and height must be integers in [1, ${MAX_VIDEO_DIMENSION}], got ${width}x${height}`);
  }
  if (!isPositiveInteger(timescale) || !isPositiveInteger(frameRate)) {
    throw MuxError.InvalidConfig(`Timescale and frame rate must be positive integers, got ${timescale} and ${frameRate}`);
  }
  // mvhd/mdhd carry it in 32 bits
  if (timescale >= MAX_UINT_32) {
    throw MuxError.InvalidConfig(`Timescale must be below ${MAX_UINT_32}, got ${timescale}`);
  }

  const frameDuration = Math.floor(timescale / frameRate);
  if (frameDuration < 1) {
    throw MuxError.InvalidConfig(`Frame rate ${frameRate} is higher than timescale ${timescale}`);
  }
  if (timescale % frameRate !== 0) {
    warn(`Timescale ${timescale} is not a multiple of frame rate ${frameRate},`,
      `frame duration truncated to ${frameDuration} (drift of ${timescale % frameRate} units per second)`);
  }

  return { width, height, timescale, frameRate, frameDuration };
}

function isFourCC (value: string): boolean {
  return /^[\x20-\x7e]{4}$/.test(value);
}

/**
 * @throws MuxError InvalidConfig
 */
export function validateMp4MuxOptions (opts: Mp4MuxOptions) {
  if (opts.finalizer !== 'trailer' && opts.finalizer !== 'placeholder') {
    throw MuxError.InvalidConfig(`Unknown finalizer strategy: ${opts.finalizer}`);
  }
  if (opts.flushPolicy !== 'per-nalu' && opts.flushPolicy !== 'access-unit') {
    throw MuxError.InvalidConfig(`Unknown flush policy: ${opts.flushPolicy}`);
  }
  if (!Number.isSafeInteger(opts.reservedMoovSize) || opts.reservedMoovSize < BOX_HEADER_SIZE) {
    throw MuxError.InvalidConfig(`Reserved moov size must be an integer of at least ${BOX_HEADER_SIZE}, got ${opts.reservedMoovSize}`);
  }
  if (!isPositiveInteger(opts.maxNalusPerSample)) {
    throw MuxError.InvalidConfig(`Max NALUs per sample must be a positive integer, got ${opts.maxNalusPerSample}`);
  }
  if (![opts.majorBrand, ...opts.compatibleBrands].every(isFourCC)) {
    throw MuxError.InvalidConfig('Brands must be four-character codes');
  }
  if (opts.compressorName.length > MAX_COMPRESSOR_NAME_LENGTH) {
    throw MuxError.InvalidConfig(`Compressor name longer than ${MAX_COMPRESSOR_NAME_LENGTH} characters`);
  }
  if (!/^[a-z]{3}$/.test(opts.language)) {
    throw MuxError.InvalidConfig(`Language must be a 3-letter lowercase ISO-639-2 code, got '${opts.language}'`);
  }
}

type Mp4MuxPipeline = {
  finalizer: Mp4Finalizer
  accumulator: Mp4SampleAccumulator
};

enum Mp4MuxState {
  OPEN = 'open',
  FINALIZED = 'finalized',
  FAILED = 'failed'
}

class Mp4MuxEmitter extends EventEmitter<Mp4MuxEventMap> {}

/**
 * Annex-B H.264 in, single-track MP4 out.
 *
 * Feed units with `addNalu` / `addNaluData` / `appendAnnexB`, then call `finalize`
 * once to get the container. Options can be changed until the first unit is fed.
 * Any error is fatal to the build, after which all further calls throw.
 */
export class AvcMp4Mux extends mixinWithOptions<typeof Mp4MuxEmitter, Mp4MuxOptions>(Mp4MuxEmitter, DEFAULT_MP4_MUX_OPTIONS) {
  readonly trackConfig: ResolvedTrackConfig;

  private parameterSets_: ParameterSetCache = new ParameterSetCache();
  private pipeline_: Mp4MuxPipeline | null = null;
  private state_: Mp4MuxState = Mp4MuxState.OPEN;

  constructor (trackConfig: TrackConfig, options: Partial<Mp4MuxOptions> = {}) {
    super();
    this.trackConfig = resolveTrackConfig(trackConfig);
    this.setOptions(options);
  }

  setOptions (opts?: Partial<Mp4MuxOptions>): Mp4MuxOptions {
    if (this.pipeline_) {
      throw MuxError.InvalidConfig('Options are fixed once muxing has started');
    }
    validateMp4MuxOptions(objectNewFromDefaultAndPartials(this.OptionsDefault, this.options_, opts ?? null));
    return super.setOptions(opts);
  }

  get isFinalized (): boolean {
    return this.state_ !== Mp4MuxState.OPEN;
  }

  getFrameCount (): number {
    return this.pipeline_ ? this.pipeline_.accumulator.frameCount : 0;
  }

  getMediaDataSize (): number {
    return this.pipeline_ ? this.pipeline_.accumulator.mediaDataSize : 0;
  }

  /**
   * @returns one-based sample numbers of the sync samples written so far
   */
  getSyncSampleNumbers (): number[] {
    return this.pipeline_ ? this.pipeline_.accumulator.getSyncSampleNumbers() : [];
  }

  /**
   * @returns RFC 6381 codec string once an SPS was seen
   */
  getCodecString (): string | null {
    return this.parameterSets_.getCodecString();
  }

  addNalu (nalu: Nalu) {
    this.run_(() => {
      const { accumulator } = this.getPipeline_();
      debug('adding', getNaluTypeName(nalu.type), 'of', nalu.data.byteLength, 'bytes');

      const samples = accumulator.add(nalu);

      if (nalu.kind === NaluKind.SequenceParam || nalu.kind === NaluKind.PictureParam) {
        this.emit(Mp4MuxEvent.PARAMETER_SETS, {
          type: nalu.kind === NaluKind.SequenceParam ? 'sps' : 'pps',
          byteLength: nalu.data.byteLength
        });
      }
      samples.forEach((sample) => {
        this.emit(Mp4MuxEvent.SAMPLE, { index: sample.index, sample });
      });
    });
  }

  /**
   * @param data One NAL unit, header byte first, no start code
   */
  addNaluData (data: Uint8Array) {
    this.addNalu(this.run_(() => createNalu(data)));
  }

  /**
   * Segments an Annex-B buffer and feeds every unit.
   * @returns number of units found
   */
  appendAnnexB (bytes: Uint8Array, opts: Partial<AnnexBSplitOptions> = {}): number {
    const nalus = this.run_(() => splitAnnexBNalus(bytes, opts));
    nalus.forEach((nalu) => this.addNalu(nalu));
    return nalus.length;
  }

  /**
   * Flushes pending units and builds the container. Can only succeed once.
   *
   * @throws MuxError NoSamples, MissingParameterSets, MoovTooLarge, ValueOutOfRange, AlreadyFinalized
   */
  finalize (): Uint8Array {
    const { output, codec } = this.run_(() => {
      const { accumulator, finalizer } = this.getPipeline_();
      const sampleTable = accumulator.finalize();
      const decoderConfig = this.parameterSets_.getDecoderConfig();
      const moov = createMovieBox({
        track: this.trackConfig,
        decoderConfig,
        sampleTable,
        chunkLayout: finalizer.chunkLayout,
        withMovieExtends: this.options_.withMovieExtends,
        options: this.options_
      });
      return {
        output: finalizer.finalize(moov),
        codec: getAvcCodecString(decoderConfig.spsNALUs[0])
      };
    });

    this.state_ = Mp4MuxState.FINALIZED;

    const frameCount = this.getFrameCount();
    debug('finalized container of', output.byteLength, 'bytes with', frameCount, 'frames');
    this.emit(Mp4MuxEvent.FINALIZED, { byteLength: output.byteLength, frameCount, codec });

    return output;
  }

  private getPipeline_ (): Mp4MuxPipeline {
    if (!this.pipeline_) {
      const opts = this.options_;
      const finalizer = createMp4Finalizer(opts.finalizer, createFileTypeBox(opts), opts.reservedMoovSize);
      const accumulator = new Mp4SampleAccumulator(finalizer, this.parameterSets_, opts.flushPolicy, opts.maxNalusPerSample);
      this.pipeline_ = { finalizer, accumulator };
    }
    return this.pipeline_;
  }

  /**
   * Runs a step of the build: refuses to once the build is over,
   * and ends it on any error.
   */
  private run_<T> (step: () => T): T {
    if (this.state_ !== Mp4MuxState.OPEN) {
      const err = MuxError.AlreadyFinalized();
      error(err.message);
      throw err;
    }
    try {
      return step();
    } catch (err) {
      this.state_ = Mp4MuxState.FAILED;
      error(isMuxError(err) ? err.toString() : err);
      throw err;
    }
  }
}
