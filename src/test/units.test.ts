import {
  Cursor,
  GIGABYTE,
  IoError,
  IoErrorKind,
  KILOBYTE,
  limitBytes,
  limitGb,
  limitKb,
  limitMb,
  MEGABYTE,
  parseSizeUnit,
  toBytes,
} from '../index'

describe('size units', () => {
  test('limit helpers multiply by 1024 per step', () => {
    expect(limitBytes(new Cursor(''), 7).bytesRemaining).toBe(7)
    expect(limitKb(new Cursor(''), 1).bytesRemaining).toBe(1024)
    expect(limitMb(new Cursor(''), 1).bytesRemaining).toBe(1_048_576)
    expect(limitGb(new Cursor(''), 1).bytesRemaining).toBe(1_073_741_824)
  })

  test('constants', () => {
    expect(KILOBYTE).toBe(1024)
    expect(MEGABYTE).toBe(1024 * 1024)
    expect(GIGABYTE).toBe(1024 * 1024 * 1024)
  })

  test('toBytes', () => {
    expect(toBytes(3, 'b')).toBe(3)
    expect(toBytes(3, 'kb')).toBe(3072)
    expect(toBytes(2, 'mb')).toBe(2_097_152)
    expect(toBytes(0, 'gb')).toBe(0)
  })

  test('parseSizeUnit normalizes case and whitespace', () => {
    expect(parseSizeUnit(' MB ')).toBe('mb')
    expect(parseSizeUnit('Kb')).toBe('kb')
    expect(parseSizeUnit('b')).toBe('b')
  })

  test('parseSizeUnit rejects unknown units', () => {
    expect(() => parseSizeUnit('tb')).toThrow('unknown size unit "tb"')
  })

  test('a limit past the safe integer range is rejected', () => {
    let caught: unknown
    try {
      limitGb(new Cursor(''), 2 ** 30)
    } catch (e) {
      caught = e
    }
    expect(caught).toBeInstanceOf(IoError)
    expect(caught).toMatchObject({ kind: IoErrorKind.InvalidInput })
  })
})
