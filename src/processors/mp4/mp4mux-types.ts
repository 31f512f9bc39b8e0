export const NALU_LENGTH_PREFIX_SIZE = 4;

export const VIDEO_TRACK_ID = 1;

export const SAMPLE_DESCRIPTION_INDEX = 1;

export const DEFAULT_RESERVED_MOOV_SIZE = 16 * 1024;

export const DEFAULT_MAX_NALUS_PER_SAMPLE = 10;

export const MAX_VIDEO_DIMENSION = 0xFFFF;

export type TrackConfig = {
  width: number
  height: number
  timescale: number
  frameRate: number
};

export type ResolvedTrackConfig = TrackConfig & {
  /**
   * floor(timescale / frameRate), in timescale units
   */
  frameDuration: number
};

/**
 * - `trailer`: mdat straight after ftyp, moov appended at the end
 * - `placeholder`: fixed region reserved for moov after ftyp, backpatched at the end
 */
export type Mp4FinalizerStrategy = 'trailer' | 'placeholder';

/**
 * - `per-nalu`: every slice NALU is one sample
 * - `access-unit`: slices are batched until the next IDR or `maxNalusPerSample`
 */
export type Mp4FlushPolicy = 'per-nalu' | 'access-unit';

export enum Mp4ChunkLayout {
  SINGLE_CHUNK = 'single-chunk',
  CHUNK_PER_SAMPLE = 'chunk-per-sample'
}

export type Mp4MuxOptions = {
  finalizer: Mp4FinalizerStrategy
  reservedMoovSize: number
  flushPolicy: Mp4FlushPolicy
  maxNalusPerSample: number
  withMovieExtends: boolean
  majorBrand: string
  minorVersion: number
  compatibleBrands: string[]
  compressorName: string
  language: string
  handlerName: string
};

export const DEFAULT_MP4_MUX_OPTIONS: Mp4MuxOptions = {
  finalizer: 'trailer',
  reservedMoovSize: DEFAULT_RESERVED_MOOV_SIZE,
  flushPolicy: 'per-nalu',
  maxNalusPerSample: DEFAULT_MAX_NALUS_PER_SAMPLE,
  withMovieExtends: false,
  majorBrand: 'isom',
  minorVersion: 0x200,
  compatibleBrands: ['isom', 'iso2', 'avc1', 'mp41'],
  compressorName: 'AVC Coding',
  language: 'und',
  handlerName: 'VideoHandler'
};

export type Mp4Sample = {
  /**
   * zero-based, decode order
   */
  index: number
  /**
   * absolute byte offset in the output
   */
  offset: number
  size: number
  isSync: boolean
  nalUnitCount: number
};

export type Mp4SampleTable = {
  samples: Mp4Sample[]
  frameCount: number
  /**
   * one-based sample numbers
   */
  syncSampleNumbers: number[]
};

export enum Mp4MuxEvent {
  PARAMETER_SETS = 'mux:parameter-sets',
  SAMPLE = 'mux:sample',
  FINALIZED = 'mux:finalized'
}

export type Mp4MuxParameterSetsEvent = {
  type: 'sps' | 'pps'
  byteLength: number
};

export type Mp4MuxSampleEvent = {
  index: number
  sample: Mp4Sample
};

export type Mp4MuxFinalizedEvent = {
  byteLength: number
  frameCount: number
  codec: string
};

export type Mp4MuxEventMap = {
  [Mp4MuxEvent.PARAMETER_SETS]: (event: Mp4MuxParameterSetsEvent) => void
  [Mp4MuxEvent.SAMPLE]: (event: Mp4MuxSampleEvent) => void
  [Mp4MuxEvent.FINALIZED]: (event: Mp4MuxFinalizedEvent) => void
};
