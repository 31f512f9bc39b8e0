import { printNumberAsHex } from '../../common-utils';
import { MuxError } from '../../core/error';

import { Nalu, NaluKind } from './nalu';

// header byte + profile_idc + constraint flags + level_idc
const SPS_MIN_SIZE = 4;

/**
 * What an `avcC` box needs: the profile indication bytes of the SPS and the
 * parameter-set units themselves (header byte included).
 */
export type AvcDecoderConfig = {
  profile: number
  profileCompatibility: number
  level: number
  spsNALUs: Uint8Array[]
  ppsNALUs: Uint8Array[]
};

function checkSps (sps: Uint8Array) {
  if (sps.byteLength < SPS_MIN_SIZE) {
    throw MuxError.MalformedStream(`SPS of ${sps.byteLength} bytes is too short to carry profile and level`);
  }
}

/**
 * RFC 6381 codec string, e.g `avc1.42001e`
 *
 * @param sps SPS unit data, header byte included
 */
export function getAvcCodecString (sps: Uint8Array): string {
  checkSps(sps);
  return 'avc1.' + Array.from(sps.subarray(1, 4), (b) => printNumberAsHex(b)).join('');
}

export function makeAvcDecoderConfig (sps: Uint8Array, pps: Uint8Array): AvcDecoderConfig {
  checkSps(sps);
  return {
    profile: sps[1],
    profileCompatibility: sps[2],
    level: sps[3],
    spsNALUs: [sps],
    ppsNALUs: [pps]
  };
}

/**
 * Latest SPS and PPS seen in the stream (last write wins).
 */
export class ParameterSetCache {
  private sps_: Uint8Array | null = null;
  private pps_: Uint8Array | null = null;

  /**
   * @returns true when the unit was a parameter set and got cached
   */
  observe (nalu: Nalu): boolean {
    switch (nalu.kind) {
    case NaluKind.SequenceParam:
      this.sps_ = nalu.data;
      return true;
    case NaluKind.PictureParam:
      this.pps_ = nalu.data;
      return true;
    default:
      return false;
    }
  }

  hasBoth (): boolean {
    return this.sps_ !== null && this.pps_ !== null;
  }

  /**
   * @returns the current pair, or null when either one is missing
   */
  snapshot (): { sps: Uint8Array, pps: Uint8Array } | null {
    if (this.sps_ === null || this.pps_ === null) {
      return null;
    }
    return { sps: this.sps_, pps: this.pps_ };
  }

  /**
   * @throws MuxError MissingParameterSets when SPS or PPS has not been observed yet
   */
  getDecoderConfig (): AvcDecoderConfig {
    const sets = this.snapshot();
    if (!sets) {
      throw MuxError.MissingParameterSets();
    }
    return makeAvcDecoderConfig(sets.sps, sets.pps);
  }

  getCodecString (): string | null {
    return this.sps_ ? getAvcCodecString(this.sps_) : null;
  }
}
