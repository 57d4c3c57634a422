export {
  LengthLimit,
  limitBytes,
  limitKb,
  limitMb,
  limitGb,
  toBytes,
  parseSizeUnit,
  KILOBYTE,
  MEGABYTE,
  GIGABYTE,
  Cursor,
  IterableSource,
  pump,
  readToEnd,
  DEFAULT_CHUNK_SIZE,
  LengthLimitTransformStream,
} from '@internal/streams'
export type { AsyncRead, MaybePromise, SizeUnit, PumpOptions } from '@internal/streams'
export {
  IoError,
  IoErrorKind,
  LengthLimitExceeded,
  isIoError,
  isLengthLimitExceeded,
} from '@internal/errors'
