export type ErrorInfo = {
  space: ErrorCodeSpace,
  code: ErrorCode,
  message: string,
  innerError?: ErrorInfo,
  nativeError?: Error,
  customData?: unknown,
};

export type ErrorInfoSpace<T extends ErrorCodeSpace> = ErrorInfo & {
  space: T
}

/**
 * Caution: This does a (recursive) shallow clone. May matter if you have custom data.
 * In case you want that actually copied, take care of it yourself
 */
export function cloneErrorInfo (errorInfo: ErrorInfo,
  synthesizeNativeError: boolean = false,
  withCustomData: boolean = true): ErrorInfo {
  const clone: ErrorInfo = Object.assign({}, errorInfo);
  if (!withCustomData) {
    delete clone.customData;
  }
  if (synthesizeNativeError && clone.nativeError) {
    const { message, stack, name } = clone.nativeError;
    clone.nativeError = {
      message,
      stack,
      name
    };
  }
  if (clone.innerError) {
    clone.innerError = cloneErrorInfo(clone.innerError, synthesizeNativeError, withCustomData);
  }
  return clone;
}

export enum ErrorCodeSpace {
  NONE = 0,
  MUX = 1,
  PROC = 2
}

// 99 positions per space, increase at will
const ERROR_NUM_PER_SPACE = 99;
// number of decimal digits of ERROR_NUM_PER_SPACE
const ERROR_CODE_SPACE_WIDTH = Math.ceil(Math.log10(ERROR_NUM_PER_SPACE));
// power of 10, so codes are "prefixed" by their space in decimal
const ERROR_CODE_SPACE_SCALE = Math.pow(10, ERROR_CODE_SPACE_WIDTH);

function getErrorCodeValue (space: ErrorCodeSpace, position: number): number {
  return ERROR_CODE_SPACE_SCALE * space + position;
}

export function isErrorCodeSpace (errCode: ErrorCode, space: ErrorCodeSpace): boolean {
  return (space * ERROR_CODE_SPACE_SCALE <= errCode) &&
    ((space + 1) * ERROR_CODE_SPACE_SCALE > errCode);
}

export enum ErrorCode {
  GENERIC = getErrorCodeValue(ErrorCodeSpace.NONE, 0),

  MUX_GENERIC = getErrorCodeValue(ErrorCodeSpace.MUX, 0),
  MUX_MISSING_PARAMETER_SETS = getErrorCodeValue(ErrorCodeSpace.MUX, 1),
  MUX_NO_SAMPLES = getErrorCodeValue(ErrorCodeSpace.MUX, 2),
  MUX_MOOV_TOO_LARGE = getErrorCodeValue(ErrorCodeSpace.MUX, 3),
  MUX_INVALID_CONFIG = getErrorCodeValue(ErrorCodeSpace.MUX, 4),
  MUX_ALREADY_FINALIZED = getErrorCodeValue(ErrorCodeSpace.MUX, 5),
  MUX_VALUE_OUT_OF_RANGE = getErrorCodeValue(ErrorCodeSpace.MUX, 6),

  PROC_GENERIC = getErrorCodeValue(ErrorCodeSpace.PROC, 0),
  PROC_MALFORMED_STREAM = getErrorCodeValue(ErrorCodeSpace.PROC, 1),
  PROC_INTERNAL = getErrorCodeValue(ErrorCodeSpace.PROC, 2)
}

export function getErrorNameByCode (errCode: ErrorCode): string {
  return ErrorCode[errCode];
}

export function getErrorSpaceByCode (errCode: ErrorCode): ErrorCodeSpace {
  const space = Math.floor(errCode / ERROR_CODE_SPACE_SCALE);
  if (ErrorCodeSpace[space] === undefined) {
    throw new Error('No errorcode-space found for: ' + errCode);
  }
  return space;
}

export class MuxError extends Error {
  static MissingParameterSets (message: string = 'SPS and PPS must both be observed first'): MuxError {
    return new MuxError(ErrorCode.MUX_MISSING_PARAMETER_SETS, message);
  }

  static NoSamples (message: string = 'No samples were accumulated'): MuxError {
    return new MuxError(ErrorCode.MUX_NO_SAMPLES, message);
  }

  static MoovTooLarge (moovSize: number, reservedSize: number): MuxError {
    return new MuxError(ErrorCode.MUX_MOOV_TOO_LARGE,
      `moov box of ${moovSize} bytes does not fit into the ${reservedSize} bytes reserved for it`,
      { moovSize, reservedSize });
  }

  static MalformedStream (message: string, position?: number): MuxError {
    return new MuxError(ErrorCode.PROC_MALFORMED_STREAM, message,
      position === undefined ? undefined : { position });
  }

  static InvalidConfig (message: string): MuxError {
    return new MuxError(ErrorCode.MUX_INVALID_CONFIG, message);
  }

  static AlreadyFinalized (): MuxError {
    return new MuxError(ErrorCode.MUX_ALREADY_FINALIZED, 'Muxer has already been finalized');
  }

  /**
   * A value does not fit the field it is written into
   */
  static ValueOutOfRange (field: string, value: number, maxValue: number): MuxError {
    return new MuxError(ErrorCode.MUX_VALUE_OUT_OF_RANGE,
      `${field} of ${value} exceeds the maximum of ${maxValue}`,
      { field, value, maxValue });
  }

  readonly info: ErrorInfo;

  constructor (code: ErrorCode, message: string, customData?: unknown, innerError?: ErrorInfo) {
    super(message);
    this.name = 'MuxError';
    this.info = {
      space: getErrorSpaceByCode(code),
      code,
      message,
      innerError,
      customData
    };
  }

  get code (): ErrorCode {
    return this.info.code;
  }

  get space (): ErrorCodeSpace {
    return this.info.space;
  }

  get customData (): unknown {
    return this.info.customData;
  }

  toString (): string {
    return `${this.name} [${getErrorNameByCode(this.code)}]: ${this.message}`;
  }
}

export function isMuxError (err: unknown, code?: ErrorCode): err is MuxError {
  return err instanceof MuxError && (code === undefined || err.code === code);
}
