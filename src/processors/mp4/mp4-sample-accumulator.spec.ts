import 'should';

import { ErrorCode, isMuxError } from '../../core/error';
import { createNalu, Nalu } from '../h264/nalu';
import { ParameterSetCache } from '../h264/parameter-sets';
import { catchError, hexToBytes } from '../../utils-spec';

import { getSampleSize, MediaDataSink, Mp4SampleAccumulator } from './mp4-sample-accumulator';

class FakeSink implements MediaDataSink {
  position = 40;
  writes: Uint8Array[][] = [];

  writeSampleData (nalUnits: Uint8Array[]): number {
    const offset = this.position;
    this.writes.push(nalUnits);
    this.position += getSampleSize(nalUnits);
    return offset;
  }
}

function nalu (hex: string): Nalu {
  return createNalu(hexToBytes(hex));
}

const SPS = nalu('67 42 00 1e ab cd');
const PPS = nalu('68 ee 3c 80');
const IDR = nalu('65 88 84 21 a0');
const P1 = nalu('41 9a 02 03');
const P2 = nalu('41 9a 04');
const IDR2 = nalu('65 88 85 10');
const SEI = nalu('06 05 01');

describe('Mp4SampleAccumulator', () => {
  let sink: FakeSink;
  let parameterSets: ParameterSetCache;

  beforeEach(() => {
    sink = new FakeSink();
    parameterSets = new ParameterSetCache();
  });

  it('should size samples as length prefixes plus unit data', () => {
    getSampleSize([IDR.data]).should.be.equal(9);
    getSampleSize([IDR.data, P1.data, P2.data]).should.be.equal(24);
  });

  it('should write one sample per slice unit by default', () => {
    const acc = new Mp4SampleAccumulator(sink, parameterSets);

    [SPS, PPS].forEach((unit) => acc.add(unit).should.eql([]));
    acc.add(IDR).should.eql([{ index: 0, offset: 40, size: 9, isSync: true, nalUnitCount: 1 }]);
    acc.add(P1).should.eql([{ index: 1, offset: 49, size: 8, isSync: false, nalUnitCount: 1 }]);
    acc.add(P2);
    acc.add(IDR2);

    const table = acc.finalize();
    table.frameCount.should.be.equal(4);
    table.samples.map((s) => s.offset).should.eql([40, 49, 57, 64]);
    table.samples.map((s) => s.size).should.eql([9, 8, 7, 8]);
    table.syncSampleNumbers.should.eql([1, 4]);
    acc.mediaDataSize.should.be.equal(32);
    parameterSets.hasBoth().should.be.true();
  });

  it('should drop units that are neither slices nor parameter sets', () => {
    const acc = new Mp4SampleAccumulator(sink, parameterSets);
    [SPS, PPS, SEI, IDR].forEach((unit) => acc.add(unit));

    acc.droppedNaluCount.should.be.equal(1);
    acc.frameCount.should.be.equal(1);
    sink.writes.should.eql([[IDR.data]]);
  });

  it('should refuse an IDR slice before both parameter sets and write nothing', () => {
    const acc = new Mp4SampleAccumulator(sink, parameterSets);
    acc.add(SPS);

    const err = catchError(() => acc.add(IDR));
    isMuxError(err, ErrorCode.MUX_MISSING_PARAMETER_SETS).should.be.true();
    sink.writes.length.should.be.equal(0);
    acc.mediaDataSize.should.be.equal(0);
  });

  it('should accept non-IDR slices before parameter sets but fail to finalize without them', () => {
    const acc = new Mp4SampleAccumulator(sink, parameterSets);
    acc.add(P1).length.should.be.equal(1);

    isMuxError(catchError(() => acc.finalize()), ErrorCode.MUX_MISSING_PARAMETER_SETS).should.be.true();
  });

  it('should fail to finalize without samples', () => {
    const acc = new Mp4SampleAccumulator(sink, parameterSets);
    [SPS, PPS].forEach((unit) => acc.add(unit));

    isMuxError(catchError(() => acc.finalize()), ErrorCode.MUX_NO_SAMPLES).should.be.true();
  });

  describe('with access-unit flushing', () => {
    it('should start a new sample at every IDR slice', () => {
      const acc = new Mp4SampleAccumulator(sink, parameterSets, 'access-unit');
      [SPS, PPS, IDR, P1, P2].forEach((unit) => acc.add(unit).should.eql([]));
      acc.pendingNaluCount.should.be.equal(3);

      acc.add(IDR2).should.eql([{ index: 0, offset: 40, size: 24, isSync: true, nalUnitCount: 3 }]);

      const table = acc.finalize();
      table.samples.map((s) => [s.offset, s.size, s.nalUnitCount]).should.eql([[40, 24, 3], [64, 8, 1]]);
      table.syncSampleNumbers.should.eql([1, 2]);
      sink.writes[0].should.eql([IDR.data, P1.data, P2.data]);
    });

    it('should flush once the unit limit is reached', () => {
      const acc = new Mp4SampleAccumulator(sink, parameterSets, 'access-unit', 2);
      [SPS, PPS, IDR, P1, P2, IDR2].forEach((unit) => acc.add(unit));

      const table = acc.finalize();
      table.samples.map((s) => [s.offset, s.size, s.isSync]).should.eql([
        [40, 17, true],
        [57, 7, false],
        [64, 8, true]
      ]);
      table.syncSampleNumbers.should.eql([1, 3]);
    });
  });
});
