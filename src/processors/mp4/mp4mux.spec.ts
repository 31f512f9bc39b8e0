import should from 'should';

import { writeUint32 } from '../../common-utils-binary';
import { ErrorCode, isMuxError, MuxError } from '../../core/error';
import { createNalu } from '../h264/nalu';
import { catchError, hexToBytes } from '../../utils-spec';

import { findBox, parseBoxes, readMp4VideoTrackInfo } from './mp4-box-reader';
import { AvcMp4Mux, resolveTrackConfig, validateMp4MuxOptions } from './mp4mux';
import { DEFAULT_MP4_MUX_OPTIONS, Mp4MuxEvent, Mp4MuxOptions, TrackConfig } from './mp4mux-types';

const SPS = '67 42 00 1e ab cd';
const PPS = '68 ee 3c 80';
const IDR = '65 88 84 21 a0';
const P1 = '41 9a 02 03';
const P2 = '41 9a 04';
const IDR2 = '65 88 85 10';

const START_CODE = '00 00 00 01';

function annexB (...units: string[]): Uint8Array {
  return hexToBytes(units.map((unit) => START_CODE + unit).join(''));
}

const ONE_FRAME = annexB(SPS, PPS, IDR);
const FOUR_FRAMES = annexB(SPS, PPS, IDR, P1, P2, IDR2);

const TRACK: TrackConfig = { width: 640, height: 480, timescale: 90000, frameRate: 30 };

// moov of a single-sample file with the units above and default options
const ONE_FRAME_MOOV_SIZE = 620;

function mux (bytes: Uint8Array, options: Partial<Mp4MuxOptions> = {}): Uint8Array {
  const muxer = new AvcMp4Mux(TRACK, options);
  muxer.appendAnnexB(bytes);
  return muxer.finalize();
}

function topLevelBoxes (output: Uint8Array): [string, number][] {
  return parseBoxes(output).map((box): [string, number] => [box.type, box.size]);
}

describe('AvcMp4Mux', () => {
  describe('track configuration', () => {
    it('should derive the frame duration', () => {
      resolveTrackConfig(TRACK).frameDuration.should.be.equal(3000);
    });

    it('should truncate a fractional frame duration', () => {
      resolveTrackConfig({ width: 2, height: 2, timescale: 1000, frameRate: 30 }).frameDuration.should.be.equal(33);
    });

    [
      { width: 0, height: 480, timescale: 90000, frameRate: 30 },
      { width: 640, height: 0x10000, timescale: 90000, frameRate: 30 },
      { width: 640.5, height: 480, timescale: 90000, frameRate: 30 },
      { width: 640, height: 480, timescale: 0, frameRate: 30 },
      { width: 640, height: 480, timescale: 90000, frameRate: -1 },
      { width: 640, height: 480, timescale: 25, frameRate: 30 },
      { width: 640, height: 480, timescale: 2 ** 32, frameRate: 30 }
    ].forEach((config) => {
      it(`should reject ${JSON.stringify(config)}`, () => {
        isMuxError(catchError(() => new AvcMp4Mux(config)), ErrorCode.MUX_INVALID_CONFIG).should.be.true();
      });
    });
  });

  describe('options', () => {
    it('should accept the defaults', () => {
      validateMp4MuxOptions(DEFAULT_MP4_MUX_OPTIONS);
    });

    [
      { reservedMoovSize: 4 },
      { maxNalusPerSample: 0 },
      { majorBrand: 'mp4' },
      { compressorName: 'x'.repeat(32) },
      { language: 'EN' }
    ].forEach((options) => {
      it(`should reject ${JSON.stringify(options)}`, () => {
        isMuxError(catchError(() => new AvcMp4Mux(TRACK, options)), ErrorCode.MUX_INVALID_CONFIG).should.be.true();
      });
    });

    it('should take option changes until the first unit is fed', () => {
      const muxer = new AvcMp4Mux(TRACK);
      muxer.setOptions({ finalizer: 'placeholder' });
      muxer.getOptions().finalizer.should.be.equal('placeholder');

      muxer.addNaluData(hexToBytes(SPS));

      isMuxError(catchError(() => muxer.setOptions({ finalizer: 'trailer' })), ErrorCode.MUX_INVALID_CONFIG).should.be.true();
      muxer.getOptions().finalizer.should.be.equal('placeholder');
    });
  });

  describe('with the trailer finalizer', () => {
    it('should mux a single frame', () => {
      const output = mux(ONE_FRAME);

      topLevelBoxes(output).should.eql([['ftyp', 32], ['mdat', 17], ['moov', ONE_FRAME_MOOV_SIZE]]);
      output.byteLength.should.be.equal(32 + 17 + ONE_FRAME_MOOV_SIZE);
      Array.from(output.subarray(40, 49)).should.eql([0, 0, 0, 5, 0x65, 0x88, 0x84, 0x21, 0xa0]);

      const { avcC, ...info } = readMp4VideoTrackInfo(output);
      info.should.eql({
        majorBrand: 'isom',
        minorVersion: 0x200,
        compatibleBrands: ['isom', 'iso2', 'avc1', 'mp41'],
        movieTimescale: 90000,
        movieDuration: 3000,
        width: 640,
        height: 480,
        timescale: 90000,
        duration: 3000,
        language: 'und',
        handlerType: 'vide',
        handlerName: 'VideoHandler',
        codingName: 'avc1',
        compressorName: 'AVC Coding',
        frameCount: 1,
        sampleSizes: [9],
        chunkOffsets: [40],
        sampleToChunk: [{ firstChunk: 1, samplesPerChunk: 1, sampleDescriptionIndex: 1 }],
        timeToSample: [{ sampleCount: 1, sampleDelta: 3000 }],
        syncSampleNumbers: [1],
        sampleOffsets: [40],
        hasMovieExtends: false
      });
      avcC.should.eql({
        version: 1,
        profile: 0x42,
        profileCompatibility: 0x00,
        level: 0x1e,
        nalUnitSizeFieldLength: 4,
        sps: [hexToBytes(SPS)],
        pps: [hexToBytes(PPS)]
      });
    });

    it('should give every sample its own chunk', () => {
      const info = readMp4VideoTrackInfo(mux(FOUR_FRAMES));

      info.frameCount.should.be.equal(4);
      info.sampleSizes.should.eql([9, 8, 7, 8]);
      info.chunkOffsets.should.eql([40, 49, 57, 64]);
      info.sampleOffsets.should.eql([40, 49, 57, 64]);
      should(info.syncSampleNumbers).eql([1, 4]);
      info.duration.should.be.equal(12000);
      info.movieDuration.should.be.equal(12000);
    });

    it('should refuse to read back a table count running past its box', () => {
      const output = mux(FOUR_FRAMES);
      const stsz = findBox(parseBoxes(output), 'moov/trak/mdia/minf/stbl/stsz');
      should(stsz).not.be.null();
      // sample count field, after version/flags and the default size
      writeUint32(output, (stsz?.offset ?? 0) + 8 + 8, 0x10000000);

      const err = catchError(() => readMp4VideoTrackInfo(output));
      isMuxError(err, ErrorCode.PROC_MALFORMED_STREAM).should.be.true();
      should(err instanceof MuxError && err.message).be.equal("Box 'stsz' declares 268435456 entries, has room for 4");
    });

    it('should write the movie extends box on request', () => {
      const output = mux(ONE_FRAME, { withMovieExtends: true });
      readMp4VideoTrackInfo(output).hasMovieExtends.should.be.true();
      const trex = findBox(parseBoxes(output), 'moov/mvex/trex');
      should(trex?.size).be.equal(32);
    });
  });

  describe('with the placeholder finalizer', () => {
    it('should put moov in front of the media data', () => {
      const output = mux(FOUR_FRAMES, { finalizer: 'placeholder' });
      const boxes = topLevelBoxes(output);

      boxes.map(([type]) => type).should.eql(['ftyp', 'moov', 'free', 'mdat']);
      (boxes[1][1] + boxes[2][1]).should.be.equal(16384);
      boxes[3].should.eql(['mdat', 40]);
      output.byteLength.should.be.equal(32 + 16384 + 40);

      const info = readMp4VideoTrackInfo(output);
      info.chunkOffsets.should.eql([16424]);
      info.sampleToChunk.should.eql([{ firstChunk: 1, samplesPerChunk: 4, sampleDescriptionIndex: 1 }]);
      info.sampleOffsets.should.eql([16424, 16433, 16441, 16448]);
      should(info.syncSampleNumbers).eql([1, 4]);
    });

    it('should fill an exactly sized reservation with moov alone', () => {
      const output = mux(ONE_FRAME, { finalizer: 'placeholder', reservedMoovSize: ONE_FRAME_MOOV_SIZE });

      topLevelBoxes(output).should.eql([['ftyp', 32], ['moov', ONE_FRAME_MOOV_SIZE], ['mdat', 17]]);
      readMp4VideoTrackInfo(output).sampleOffsets.should.eql([32 + ONE_FRAME_MOOV_SIZE + 8]);
    });

    it('should pad a remainder of 8 bytes with a free box', () => {
      const output = mux(ONE_FRAME, { finalizer: 'placeholder', reservedMoovSize: ONE_FRAME_MOOV_SIZE + 8 });

      topLevelBoxes(output).should.eql([['ftyp', 32], ['moov', ONE_FRAME_MOOV_SIZE], ['free', 8], ['mdat', 17]]);
    });

    [ONE_FRAME_MOOV_SIZE + 7, 64].forEach((reservedMoovSize) => {
      it(`should fail when moov does not fit ${reservedMoovSize} bytes`, () => {
        const muxer = new AvcMp4Mux(TRACK, { finalizer: 'placeholder', reservedMoovSize });
        muxer.appendAnnexB(ONE_FRAME);

        isMuxError(catchError(() => muxer.finalize()), ErrorCode.MUX_MOOV_TOO_LARGE).should.be.true();
        muxer.isFinalized.should.be.true();
        isMuxError(catchError(() => muxer.finalize()), ErrorCode.MUX_ALREADY_FINALIZED).should.be.true();
      });
    });

    it('should carry the same media data as the trailer layout', () => {
      const trailer = mux(FOUR_FRAMES);
      const placeholder = mux(FOUR_FRAMES, { finalizer: 'placeholder' });

      const trailerMdat = findBox(parseBoxes(trailer), 'mdat');
      const placeholderMdat = findBox(parseBoxes(placeholder), 'mdat');
      should(placeholderMdat?.data).eql(trailerMdat?.data);
    });
  });

  describe('with access-unit flushing', () => {
    it('should group slices up to the next IDR', () => {
      const info = readMp4VideoTrackInfo(mux(FOUR_FRAMES, { flushPolicy: 'access-unit' }));

      info.sampleSizes.should.eql([24, 8]);
      info.sampleOffsets.should.eql([40, 64]);
      should(info.syncSampleNumbers).eql([1, 2]);
    });

    it('should cap samples at the configured unit count', () => {
      const info = readMp4VideoTrackInfo(mux(FOUR_FRAMES, { flushPolicy: 'access-unit', maxNalusPerSample: 2 }));

      info.sampleSizes.should.eql([17, 7, 8]);
      should(info.syncSampleNumbers).eql([1, 3]);
    });
  });

  describe('failures', () => {
    it('should fail on an IDR slice before the parameter sets, without writing it', () => {
      const muxer = new AvcMp4Mux(TRACK);

      isMuxError(catchError(() => muxer.addNaluData(hexToBytes(IDR))), ErrorCode.MUX_MISSING_PARAMETER_SETS).should.be.true();
      muxer.getMediaDataSize().should.be.equal(0);
      muxer.getFrameCount().should.be.equal(0);
      muxer.isFinalized.should.be.true();
      isMuxError(catchError(() => muxer.addNaluData(hexToBytes(SPS))), ErrorCode.MUX_ALREADY_FINALIZED).should.be.true();
    });

    it('should fail to finalize without samples', () => {
      const muxer = new AvcMp4Mux(TRACK);
      muxer.appendAnnexB(annexB(SPS, PPS)).should.be.equal(2);

      isMuxError(catchError(() => muxer.finalize()), ErrorCode.MUX_NO_SAMPLES).should.be.true();
    });

    it('should fail to finalize before any input', () => {
      isMuxError(catchError(() => new AvcMp4Mux(TRACK).finalize()), ErrorCode.MUX_NO_SAMPLES).should.be.true();
    });

    it('should fail to finalize non-IDR slices without parameter sets', () => {
      const muxer = new AvcMp4Mux(TRACK);
      muxer.appendAnnexB(annexB(P1, P2));
      muxer.getFrameCount().should.be.equal(2);

      isMuxError(catchError(() => muxer.finalize()), ErrorCode.MUX_MISSING_PARAMETER_SETS).should.be.true();
    });

    it('should finalize only once', () => {
      const muxer = new AvcMp4Mux(TRACK);
      muxer.appendAnnexB(ONE_FRAME);
      muxer.finalize();

      isMuxError(catchError(() => muxer.finalize()), ErrorCode.MUX_ALREADY_FINALIZED).should.be.true();
      isMuxError(catchError(() => muxer.appendAnnexB(ONE_FRAME)), ErrorCode.MUX_ALREADY_FINALIZED).should.be.true();
    });

    it('should fail to finalize when the track duration overflows 32 bits', () => {
      const muxer = new AvcMp4Mux({ width: 640, height: 480, timescale: 2 ** 31, frameRate: 1 });
      muxer.appendAnnexB(FOUR_FRAMES);

      const err = catchError(() => muxer.finalize());
      isMuxError(err, ErrorCode.MUX_VALUE_OUT_OF_RANGE).should.be.true();
      should(err instanceof MuxError && err.message).be.equal('Track duration of 8589934592 exceeds the maximum of 4294967295');
      muxer.isFinalized.should.be.true();
    });

    it('should fail on empty unit data', () => {
      const muxer = new AvcMp4Mux(TRACK);
      isMuxError(catchError(() => muxer.addNaluData(new Uint8Array(0))), ErrorCode.PROC_MALFORMED_STREAM).should.be.true();
      muxer.isFinalized.should.be.true();
    });
  });

  describe('progress', () => {
    it('should report counts and the codec while muxing', () => {
      const muxer = new AvcMp4Mux(TRACK);
      should(muxer.getCodecString()).be.null();

      muxer.addNalu(createNalu(hexToBytes(SPS)));
      should(muxer.getCodecString()).be.equal('avc1.42001e');

      muxer.appendAnnexB(annexB(PPS, IDR, P1)).should.be.equal(3);
      muxer.getFrameCount().should.be.equal(2);
      muxer.getMediaDataSize().should.be.equal(17);
      muxer.getSyncSampleNumbers().should.eql([1]);
      muxer.isFinalized.should.be.false();
    });

    it('should emit parameter set, sample and finalized events', () => {
      const muxer = new AvcMp4Mux(TRACK);
      const onParameterSets = jest.fn();
      const onSample = jest.fn();
      const onFinalized = jest.fn();
      muxer.on(Mp4MuxEvent.PARAMETER_SETS, onParameterSets);
      muxer.on(Mp4MuxEvent.SAMPLE, onSample);
      muxer.on(Mp4MuxEvent.FINALIZED, onFinalized);

      muxer.appendAnnexB(FOUR_FRAMES);
      const output = muxer.finalize();

      should(onParameterSets.mock.calls.map(([event]) => event)).eql([
        { type: 'sps', byteLength: 6 },
        { type: 'pps', byteLength: 4 }
      ]);
      should(onSample.mock.calls.map(([event]) => [event.index, event.sample.offset])).eql([
        [0, 40], [1, 49], [2, 57], [3, 64]
      ]);
      should(onFinalized.mock.calls.map(([event]) => event)).eql([
        { byteLength: output.byteLength, frameCount: 4, codec: 'avc1.42001e' }
      ]);
    });
  });
});
