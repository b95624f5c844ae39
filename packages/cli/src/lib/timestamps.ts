// FILETIME counts 100 ns ticks since 1601-01-01T00:00:00Z.
const FILETIME_UNIX_EPOCH_TICKS = 116_444_736_000_000_000n
const NANOS_PER_TICK = 100n
const NANOS_PER_MILLI = 1_000_000n

const UNSIGNED_INTEGER_PATTERN = /^\d+$/
const SIGNED_INTEGER_PATTERN = /^-?\d+$/

export function fromFileTime(value: string): bigint | undefined {
  const normalized = value.trim()
  if (!UNSIGNED_INTEGER_PATTERN.test(normalized)) {
    return undefined
  }

  return (BigInt(normalized) - FILETIME_UNIX_EPOCH_TICKS) * NANOS_PER_TICK
}

export function toFileTime(nanos: bigint): string {
  return (floorDiv(nanos, NANOS_PER_TICK) + FILETIME_UNIX_EPOCH_TICKS).toString()
}

export function fromEpochMillis(value: string): bigint | undefined {
  const normalized = value.trim()
  if (!SIGNED_INTEGER_PATTERN.test(normalized)) {
    return undefined
  }

  return BigInt(normalized) * NANOS_PER_MILLI
}

export function toEpochMillis(nanos: bigint): string {
  return floorDiv(nanos, NANOS_PER_MILLI).toString()
}

export function parseEpochNanos(value: string): bigint | undefined {
  const normalized = value.trim()
  if (!SIGNED_INTEGER_PATTERN.test(normalized)) {
    return undefined
  }

  return BigInt(normalized)
}

export function compareTimestamps(left: bigint, right: bigint): number {
  if (left === right) {
    return 0
  }

  return left < right ? -1 : 1
}

function floorDiv(value: bigint, divisor: bigint): bigint {
  const quotient = value / divisor
  return value % divisor < 0n ? quotient - 1n : quotient
}
