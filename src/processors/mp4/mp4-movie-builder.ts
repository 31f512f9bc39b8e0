import { MAX_UINT_32 } from '../../common-utils-binary';
import { MuxError } from '../../core/error';
import { AvcDecoderConfig } from '../h264/parameter-sets';

import {
  AvcCodecDataBox,
  DataEntryUrlBox,
  DataInformationBox,
  DataReferenceBox,
  FileTypeBox,
  HandlerBox,
  MediaBox,
  MediaHeaderBox,
  MediaInformationBox,
  MovieBox,
  MovieExtendsBox,
  MovieHeaderBox,
  TrackBox,
  TrackExtendsBox,
  TrackHeaderBox,
  TrackHeaderFlags,
  VideoMediaHeaderBox,
  VideoSampleEntry
} from './mp4iso-boxes';
import { SampleTablePackager } from './mp4iso-sample-table';
import {
  Mp4ChunkLayout,
  Mp4MuxOptions,
  Mp4SampleTable,
  ResolvedTrackConfig,
  SAMPLE_DESCRIPTION_INDEX,
  VIDEO_TRACK_ID
} from './mp4mux-types';

export type MovieParams = {
  track: ResolvedTrackConfig
  decoderConfig: AvcDecoderConfig
  sampleTable: Mp4SampleTable
  chunkLayout: Mp4ChunkLayout
  withMovieExtends: boolean
  options: Pick<Mp4MuxOptions, 'compressorName' | 'language' | 'handlerName'>
};

export const AVC_CODING_NAME = 'avc1';

export const VIDEO_HANDLER_TYPE = 'vide';

export function createFileTypeBox (options: Pick<Mp4MuxOptions, 'majorBrand' | 'minorVersion' | 'compatibleBrands'>): FileTypeBox {
  return new FileTypeBox(options.majorBrand, options.minorVersion, options.compatibleBrands);
}

function createTrackBox (params: MovieParams, duration: number): TrackBox {
  const { track, decoderConfig, sampleTable, chunkLayout, options } = params;

  const sampleEntry = new VideoSampleEntry(
    AVC_CODING_NAME,
    SAMPLE_DESCRIPTION_INDEX,
    track.width,
    track.height,
    options.compressorName,
    72, 72, 1, undefined,
    [new AvcCodecDataBox(decoderConfig)]
  );

  const stbl = SampleTablePackager.createFromSamples(
    [sampleEntry],
    sampleTable,
    track.frameDuration,
    chunkLayout
  );

  return new TrackBox(
    new TrackHeaderBox(
      TrackHeaderFlags.TRACK_ENABLED | TrackHeaderFlags.TRACK_IN_MOVIE | TrackHeaderFlags.TRACK_IN_PREVIEW,
      VIDEO_TRACK_ID,
      duration,
      track.width,
      track.height,
      0 // no volume for video
    ),
    new MediaBox(
      new MediaHeaderBox(track.timescale, duration, options.language),
      new HandlerBox(VIDEO_HANDLER_TYPE, options.handlerName),
      new MediaInformationBox(
        new VideoMediaHeaderBox(),
        new DataInformationBox(
          new DataReferenceBox([new DataEntryUrlBox()])
        ),
        stbl
      )
    )
  );
}

/**
 * Builds the moov tree for a single AVC video track. Movie and media timescale
 * are the track timescale, every sample lasts `frameDuration`.
 *
 * @throws MuxError ValueOutOfRange when the total duration does not fit the 32-bit header fields
 */
export function createMovieBox (params: MovieParams): MovieBox {
  const { track, sampleTable, withMovieExtends } = params;
  const duration = sampleTable.frameCount * track.frameDuration;
  if (duration >= MAX_UINT_32) {
    throw MuxError.ValueOutOfRange('Track duration', duration, MAX_UINT_32 - 1);
  }

  const extendsBox = withMovieExtends
    ? new MovieExtendsBox([
      new TrackExtendsBox(VIDEO_TRACK_ID, SAMPLE_DESCRIPTION_INDEX, track.frameDuration, 0, 0)
    ])
    : null;

  return new MovieBox(
    new MovieHeaderBox(track.timescale, duration, VIDEO_TRACK_ID + 1),
    [createTrackBox(params, duration)],
    extendsBox
  );
}
