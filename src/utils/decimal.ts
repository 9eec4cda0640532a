// src/utils/decimal.ts

// aggregators expect plain decimal strings with 8 fractional digits
export function formatDecimal(n: number): string {
  if (!Number.isFinite(n)) return '0.00000000'
  return n.toFixed(8)
}
