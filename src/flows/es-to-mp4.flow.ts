import { getLogger, LoggerLevel } from '../logger';
import { AnnexBSplitOptions } from '../processors/h264/annexb';
import { AvcMp4Mux } from '../processors/mp4/mp4mux';
import { Mp4MuxEvent, Mp4MuxOptions, TrackConfig } from '../processors/mp4/mp4mux-types';

const { info } = getLogger('ElementaryStreamToMp4', LoggerLevel.WARN);

export type ElementaryStreamToMp4Options = Partial<Mp4MuxOptions> & Partial<AnnexBSplitOptions>;

/**
 * Annex-B H.264 elementary stream to a complete MP4 file, in memory.
 * Nothing is returned unless the whole build succeeds.
 *
 * @throws MuxError
 */
export function muxAnnexBToMp4 (
  bytes: Uint8Array,
  trackConfig: TrackConfig,
  options: ElementaryStreamToMp4Options = {}
): Uint8Array {
  const { strict, ...muxOptions } = options;
  const mux = new AvcMp4Mux(trackConfig, muxOptions);

  mux.once(Mp4MuxEvent.FINALIZED, ({ byteLength, frameCount, codec }) => {
    info(`muxed ${frameCount} frames of ${codec} into ${byteLength} bytes`);
  });

  const nalCount = mux.appendAnnexB(bytes, { strict });
  info(`segmented ${nalCount} NAL units from ${bytes.byteLength} bytes`);

  return mux.finalize();
}
