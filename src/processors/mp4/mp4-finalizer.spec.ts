import should from 'should';

import { readFourCC, readUint32 } from '../../common-utils-binary';
import { ErrorCode, isMuxError, MuxError } from '../../core/error';
import { catchError, hexToBytes } from '../../utils-spec';

import { MovieBox, MovieHeaderBox } from './mp4iso-boxes';
import { createMp4Finalizer, getMediaDataBoxSize, PlaceholderMoovFinalizer, TrailerMoovFinalizer } from './mp4-finalizer';
import { createFileTypeBox } from './mp4-movie-builder';
import { DEFAULT_MP4_MUX_OPTIONS, Mp4ChunkLayout } from './mp4mux-types';

const IDR = hexToBytes('65 88 84 21 a0');
const P1 = hexToBytes('41 9a 02 03');

// 8 byte header + 108 byte mvhd
const EMPTY_MOOV_SIZE = 116;

function makeFileTypeBox () {
  return createFileTypeBox(DEFAULT_MP4_MUX_OPTIONS);
}

function makeMoov (): MovieBox {
  return new MovieBox(new MovieHeaderBox(1000, 0, 2), []);
}

function boxAt (bytes: Uint8Array, offset: number): [number, string] {
  return [readUint32(bytes, offset), readFourCC(bytes, offset + 4)];
}

describe('MP4 finalizers', () => {
  describe('getMediaDataBoxSize', () => {
    it('should add the header to the media data size', () => {
      getMediaDataBoxSize(17).should.be.equal(25);
      getMediaDataBoxSize(2 ** 32 - 9).should.be.equal(4294967295);
    });

    it('should refuse media data that needs a 64-bit size', () => {
      const err = catchError(() => getMediaDataBoxSize(2 ** 32 - 8));
      isMuxError(err, ErrorCode.MUX_VALUE_OUT_OF_RANGE).should.be.true();
      should(err instanceof MuxError && err.customData).eql({ field: 'mdat box size', value: 4294967296, maxValue: 4294967295 });
    });
  });

  describe('TrailerMoovFinalizer', () => {
    it('should fail to close an mdat of 4 GiB', () => {
      const finalizer = new TrailerMoovFinalizer(makeFileTypeBox());
      finalizer.writeSampleData([IDR]);
      jest.spyOn(finalizer, 'mediaDataSize', 'get').mockReturnValue(2 ** 32);

      isMuxError(catchError(() => finalizer.finalize(makeMoov())), ErrorCode.MUX_VALUE_OUT_OF_RANGE).should.be.true();
    });

    it('should write mdat right after ftyp and append moov', () => {
      const finalizer = new TrailerMoovFinalizer(makeFileTypeBox());
      finalizer.mediaDataStart.should.be.equal(40);

      finalizer.writeSampleData([IDR]).should.be.equal(40);
      finalizer.writeSampleData([P1]).should.be.equal(49);
      finalizer.mediaDataSize.should.be.equal(17);

      const output = finalizer.finalize(makeMoov());

      output.byteLength.should.be.equal(32 + 8 + 17 + EMPTY_MOOV_SIZE);
      boxAt(output, 0).should.eql([32, 'ftyp']);
      boxAt(output, 32).should.eql([25, 'mdat']);
      Array.from(output.subarray(40, 49)).should.eql([0, 0, 0, 5, 0x65, 0x88, 0x84, 0x21, 0xa0]);
      boxAt(output, 57).should.eql([EMPTY_MOOV_SIZE, 'moov']);
    });

    it('should lay samples out one chunk each', () => {
      const finalizer = createMp4Finalizer('trailer', makeFileTypeBox());
      finalizer.strategy.should.be.equal('trailer');
      finalizer.chunkLayout.should.be.equal(Mp4ChunkLayout.CHUNK_PER_SAMPLE);
    });
  });

  describe('PlaceholderMoovFinalizer', () => {
    it('should reserve room for moov between ftyp and mdat', () => {
      const finalizer = new PlaceholderMoovFinalizer(makeFileTypeBox(), 200);
      finalizer.mediaDataStart.should.be.equal(240);
      finalizer.writeSampleData([IDR]).should.be.equal(240);

      const output = finalizer.finalize(makeMoov());

      output.byteLength.should.be.equal(249);
      boxAt(output, 32).should.eql([EMPTY_MOOV_SIZE, 'moov']);
      boxAt(output, 32 + EMPTY_MOOV_SIZE).should.eql([200 - EMPTY_MOOV_SIZE, 'free']);
      boxAt(output, 232).should.eql([17, 'mdat']);
    });

    it('should not need a free box on an exact fit', () => {
      const finalizer = new PlaceholderMoovFinalizer(makeFileTypeBox(), EMPTY_MOOV_SIZE);
      finalizer.writeSampleData([IDR]);

      const output = finalizer.finalize(makeMoov());

      boxAt(output, 32).should.eql([EMPTY_MOOV_SIZE, 'moov']);
      boxAt(output, 32 + EMPTY_MOOV_SIZE).should.eql([17, 'mdat']);
    });

    it('should pad the smallest possible remainder with a free box', () => {
      const finalizer = new PlaceholderMoovFinalizer(makeFileTypeBox(), EMPTY_MOOV_SIZE + 8);
      finalizer.writeSampleData([IDR]);

      boxAt(finalizer.finalize(makeMoov()), 32 + EMPTY_MOOV_SIZE).should.eql([8, 'free']);
    });

    [EMPTY_MOOV_SIZE - 1, EMPTY_MOOV_SIZE + 4].forEach((reservedSize) => {
      it(`should fail with ${reservedSize} reserved bytes`, () => {
        const finalizer = new PlaceholderMoovFinalizer(makeFileTypeBox(), reservedSize);
        finalizer.writeSampleData([IDR]);

        let caught: unknown = null;
        try {
          finalizer.finalize(makeMoov());
        } catch (err) {
          caught = err;
        }
        isMuxError(caught, ErrorCode.MUX_MOOV_TOO_LARGE).should.be.true();
        if (caught instanceof MuxError) {
          should(caught.customData).eql({ moovSize: EMPTY_MOOV_SIZE, reservedSize });
        }
      });
    });

    it('should use a single chunk', () => {
      const finalizer = createMp4Finalizer('placeholder', makeFileTypeBox(), 64);
      finalizer.should.be.instanceOf(PlaceholderMoovFinalizer);
      finalizer.chunkLayout.should.be.equal(Mp4ChunkLayout.SINGLE_CHUNK);
      finalizer.mediaDataStart.should.be.equal(32 + 64 + 8);
    });
  });
});
