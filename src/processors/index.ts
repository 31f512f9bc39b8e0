export * from './h264/nalu';
export * from './h264/annexb';
export * from './h264/parameter-sets';

export * from './mp4/mp4mux-types';
export * from './mp4/mp4mux';
export * from './mp4/mp4-finalizer';
export * from './mp4/mp4-sample-accumulator';
export * from './mp4/mp4-movie-builder';
export * from './mp4/mp4iso-sample-table';
export * from './mp4/mp4-box-reader';

export * as IsoBoxes from './mp4/mp4iso-boxes';
export * as IsoBoxBase from './mp4/mp4iso-base';
