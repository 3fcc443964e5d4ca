/**
 * Geometry Configuration
 *
 * Default tolerances used when a caller does not pass one explicitly.
 */

/**
 * Relative precision of an IEEE double: 2^-53.
 */
export const DOUBLE_PRECISION = Math.pow(2, -53)

export interface GeometryConfig {
  /** Dot-product tolerance for `LineSegment.isParallelTo(other)` */
  parallelTolerance: number
  /** Default tolerance for segment/plane intersection */
  intersectionTolerance: number
  /** How far from 1 a magnitude may be for `UnitVector3D.create` */
  unitVectorTolerance: number
}

const DEFAULT_CONFIG: GeometryConfig = {
  // Parallel up to floating point rounding only.
  parallelTolerance: DOUBLE_PRECISION * 2,
  // Smallest positive double: effectively exact.
  intersectionTolerance: Number.MIN_VALUE,
  unitVectorTolerance: 1e-10
}

let config: GeometryConfig = { ...DEFAULT_CONFIG }

/**
 * Override one or more defaults. Values must be non-negative.
 */
export function setGeometryConfig(overrides: Partial<GeometryConfig>): void {
  for (const [key, value] of Object.entries(overrides)) {
    if (typeof value !== 'number' || !(value >= 0)) {
      throw new RangeError(`Geometry config "${key}" must be a non-negative number, got ${String(value)}`)
    }
  }
  config = { ...config, ...overrides }
}

export function resetGeometryConfig(): void {
  config = { ...DEFAULT_CONFIG }
}

export function getGeometryConfig(): Readonly<GeometryConfig> {
  return config
}

export function getDefaultParallelTolerance(): number {
  return config.parallelTolerance
}

export function getDefaultIntersectionTolerance(): number {
  return config.intersectionTolerance
}

export function getUnitVectorTolerance(): number {
  return config.unitVectorTolerance
}
