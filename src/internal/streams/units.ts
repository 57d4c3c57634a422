import { IoError, IoErrorKind } from '@internal/errors'
import { AsyncRead } from './types'
import { LengthLimit } from './length-limit'

export const KILOBYTE = 1024
export const MEGABYTE = KILOBYTE * 1024
export const GIGABYTE = MEGABYTE * 1024

export type SizeUnit = 'b' | 'kb' | 'mb' | 'gb'

const multipliers: Record<SizeUnit, number> = {
  b: 1,
  kb: KILOBYTE,
  mb: MEGABYTE,
  gb: GIGABYTE,
}

export function parseSizeUnit(unit: string): SizeUnit {
  const normalized = unit.trim().toLowerCase()
  if (normalized === 'b' || normalized === 'kb' || normalized === 'mb' || normalized === 'gb') {
    return normalized
  }
  throw new IoError(IoErrorKind.InvalidInput, `unknown size unit "${unit}"`)
}

export function toBytes(value: number, unit: SizeUnit): number {
  return value * multipliers[unit]
}

/**
 * Applies an exclusive limit of `maxBytes` bytes to `reader`
 */
export function limitBytes<T extends AsyncRead>(reader: T, maxBytes: number): LengthLimit<T> {
  return new LengthLimit(reader, maxBytes)
}

/**
 * Applies an exclusive limit of `maxKb` kilobytes (1024 bytes each)
 */
export function limitKb<T extends AsyncRead>(reader: T, maxKb: number): LengthLimit<T> {
  return limitBytes(reader, toBytes(maxKb, 'kb'))
}

/**
 * Applies an exclusive limit of `maxMb` megabytes (1,048,576 bytes each)
 */
export function limitMb<T extends AsyncRead>(reader: T, maxMb: number): LengthLimit<T> {
  return limitBytes(reader, toBytes(maxMb, 'mb'))
}

/**
 * Applies an exclusive limit of `maxGb` gigabytes (1,073,741,824 bytes each)
 */
export function limitGb<T extends AsyncRead>(reader: T, maxGb: number): LengthLimit<T> {
  return limitBytes(reader, toBytes(maxGb, 'gb'))
}
