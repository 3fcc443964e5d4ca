const scratch = new DataView(new ArrayBuffer(8))

/**
 * 32-bit hash of a double, from its IEEE bit pattern. 0 and -0 hash alike
 * since they compare equal.
 */
export function hashNumber(value: number): number {
  scratch.setFloat64(0, value === 0 ? 0 : value)
  return scratch.getInt32(0) ^ scratch.getInt32(4)
}

/**
 * Combine hashes left to right as `(h * 397) ^ next` in 32-bit arithmetic.
 */
export function combineHashes(...hashes: number[]): number {
  let combined = 0
  hashes.forEach((hash, index) => {
    combined = index === 0 ? hash | 0 : Math.imul(combined, 397) ^ hash
  })
  return combined
}
