import { getLogger, LoggerLevel } from '../../logger';

import {
  ChunkOffsetBox,
  DecodingTimeToSampleBox,
  SampleDescriptionBox,
  SampleEntry,
  SampleSizeBox,
  SampleTableBox,
  SampleToChunkBox,
  SampleToChunkEntry,
  SyncSampleBox
} from './mp4iso-boxes';
import { Mp4ChunkLayout, Mp4Sample, Mp4SampleTable, SAMPLE_DESCRIPTION_INDEX } from './mp4mux-types';

const { debug } = getLogger('Mp4SampleTablePackager', LoggerLevel.WARN);

export type ChunkTable = {
  chunkOffsets: number[]
  sampleToChunk: SampleToChunkEntry[]
};

/**
 * All samples in one contiguous chunk: only the first offset is stored,
 * every other sample offset follows from the sizes before it.
 */
export function makeSingleChunkTable (samples: Mp4Sample[]): ChunkTable {
  if (samples.length === 0) {
    return { chunkOffsets: [], sampleToChunk: [] };
  }
  return {
    chunkOffsets: [samples[0].offset],
    sampleToChunk: [{
      firstChunk: 1,
      samplesPerChunk: samples.length,
      sampleDescriptionIndex: SAMPLE_DESCRIPTION_INDEX
    }]
  };
}

/**
 * Every sample is its own chunk: one offset per sample, one stsc run.
 */
export function makeChunkPerSampleTable (samples: Mp4Sample[]): ChunkTable {
  if (samples.length === 0) {
    return { chunkOffsets: [], sampleToChunk: [] };
  }
  return {
    chunkOffsets: samples.map((sample) => sample.offset),
    sampleToChunk: [{
      firstChunk: 1,
      samplesPerChunk: 1,
      sampleDescriptionIndex: SAMPLE_DESCRIPTION_INDEX
    }]
  };
}

export function makeChunkTable (samples: Mp4Sample[], layout: Mp4ChunkLayout): ChunkTable {
  switch (layout) {
  case Mp4ChunkLayout.SINGLE_CHUNK:
    return makeSingleChunkTable(samples);
  case Mp4ChunkLayout.CHUNK_PER_SAMPLE:
    return makeChunkPerSampleTable(samples);
  }
}

export class SampleTablePackager {
  /**
   * Constant-rate table: a single stts run of `sampleDuration` covers all samples.
   */
  static createFromSamples (
    sampleDescriptionEntries: SampleEntry[],
    sampleTable: Mp4SampleTable,
    sampleDuration: number,
    layout: Mp4ChunkLayout
  ): SampleTableBox {
    const { samples, syncSampleNumbers } = sampleTable;
    debug('creating sample table from', samples.length, 'samples with layout:', layout);

    const { chunkOffsets, sampleToChunk } = makeChunkTable(samples, layout);

    return new SampleTableBox(
      new SampleDescriptionBox(sampleDescriptionEntries),
      new DecodingTimeToSampleBox(samples.length > 0
        ? [{ sampleCount: samples.length, sampleDelta: sampleDuration }]
        : []),
      new SampleToChunkBox(sampleToChunk),
      new SampleSizeBox(samples.map((sample) => sample.size)),
      new ChunkOffsetBox(chunkOffsets),
      new SyncSampleBox(syncSampleNumbers)
    );
  }
}
