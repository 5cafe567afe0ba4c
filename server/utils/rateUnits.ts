/** Decimal prefixes used by the sampler's human-readable columns */
const PREFIX_MULTIPLIERS: Record<string, number> = {
  '': 1,
  k: 1e3,
  m: 1e6,
  g: 1e9,
  t: 1e12
}

/** Number, optional K/M/G/T prefix, b (bits) or B (bytes). A bare number has no unit. */
const QUANTITY_PATTERN = /^(\d+(?:\.\d+)?)(?:([kmgtKMGT]?)([bB]))?$/

interface Quantity {
  value: number
  unit: 'bits' | 'bytes' | 'none'
}

function parseQuantity(token: string): Quantity | null {
  const match = QUANTITY_PATTERN.exec(token.trim())
  if (!match) return null

  const [, digits, prefix = '', suffix] = match
  const base = Number(digits)
  const multiplier = PREFIX_MULTIPLIERS[prefix.toLowerCase()]
  if (!Number.isFinite(base) || multiplier === undefined) return null

  const value = base * multiplier
  if (!Number.isFinite(value) || value < 0) return null

  if (suffix === 'b') return { value, unit: 'bits' }
  if (suffix === 'B') return { value, unit: 'bytes' }
  return { value, unit: 'none' }
}

/**
 * Parse a rate column (e.g. "1.52Kb", "416b", "2.1MB") into bits per second.
 * Byte-denominated rates are converted; a bare number is taken as bits/s.
 * Returns null when the token is not a rate.
 */
export function parseBitRate(token: string): number | null {
  const q = parseQuantity(token)
  if (!q) return null
  return q.unit === 'bytes' ? q.value * 8 : q.value
}

/**
 * Parse a cumulative column (e.g. "390B", "1.2MB") into bytes.
 * Bit-denominated totals are converted; a bare number is taken as bytes.
 */
export function parseByteCount(token: string): number | null {
  const q = parseQuantity(token)
  if (!q) return null
  return q.unit === 'bits' ? q.value / 8 : q.value
}
