/*

Copyright (c) Stephan Hesse 2015 <tchakabam@gmail.com>

This library is free software; you can redistribute it and/or
modify it under the terms of the GNU Lesser General Public
License as published by the Free Software Foundation; either
version 2.1 of the License, or (at your option) any later version.

This library is distributed in the hope that it will be useful,
but WITHOUT ANY WARRANTY; without even the implied warranty of
MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE.  See the GNU
Lesser General Public License for more details.

*/

export {
  setLocalLoggerLevel,
  createAndGetLocalLoggerConfig as getLocalLoggerConfig,
  removeLocalLoggerConfig,
  LoggerLevel,
  LOGGER_CONFIG_ENV_VAR
} from './src/logger';

export * from './src/common-types';

export * from './src/core/error';
export * from './src/core/byte-buffer';

export * as Procs from './src/processors/index';

export { AvcMp4Mux } from './src/processors/mp4/mp4mux';
export { readMp4VideoTrackInfo } from './src/processors/mp4/mp4-box-reader';
export * from './src/flows/es-to-mp4.flow';
