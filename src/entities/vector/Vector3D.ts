import { DegenerateGeometryError } from '../../errors'
import { getUnitVectorTolerance } from '../../config/geometry-config'
import type { Angle } from '../angle'

export type Vec3Array = [number, number, number]

export class Vector3D {
  readonly x: number
  readonly y: number
  readonly z: number

  constructor(x: number, y: number, z: number) {
    this.x = x
    this.y = y
    this.z = z
  }

  get magnitude(): number {
    return Math.hypot(this.x, this.y, this.z)
  }

  add(other: Vector3D): Vector3D {
    return new Vector3D(this.x + other.x, this.y + other.y, this.z + other.z)
  }

  subtract(other: Vector3D): Vector3D {
    return new Vector3D(this.x - other.x, this.y - other.y, this.z - other.z)
  }

  scale(s: number): Vector3D {
    return new Vector3D(this.x * s, this.y * s, this.z * s)
  }

  negate(): Vector3D {
    return new Vector3D(-this.x, -this.y, -this.z)
  }

  dot(other: Vector3D): number {
    return this.x * other.x + this.y * other.y + this.z * other.z
  }

  cross(other: Vector3D): Vector3D {
    return new Vector3D(
      this.y * other.z - this.z * other.y,
      this.z * other.x - this.x * other.z,
      this.x * other.y - this.y * other.x
    )
  }

  /**
   * Unit vector in the same direction. The zero vector has no direction.
   */
  normalize(): UnitVector3D {
    const mag = this.magnitude
    if (mag === 0 || !Number.isFinite(mag)) {
      throw new DegenerateGeometryError(`Cannot normalize vector ${this.toString()} with magnitude ${mag}`)
    }
    return UnitVector3D.create(this.x / mag, this.y / mag, this.z / mag)
  }

  /**
   * Component-wise comparison; exact unless a tolerance is given.
   */
  equals(other: Vector3D, tolerance: number = 0): boolean {
    return (
      Math.abs(this.x - other.x) <= tolerance &&
      Math.abs(this.y - other.y) <= tolerance &&
      Math.abs(this.z - other.z) <= tolerance
    )
  }

  toArray(): Vec3Array {
    return [this.x, this.y, this.z]
  }

  toString(): string {
    return `(${this.x}, ${this.y}, ${this.z})`
  }
}

export class UnitVector3D extends Vector3D {
  private constructor(x: number, y: number, z: number) {
    super(x, y, z)
  }

  static readonly xAxis = new UnitVector3D(1, 0, 0)
  static readonly yAxis = new UnitVector3D(0, 1, 0)
  static readonly zAxis = new UnitVector3D(0, 0, 1)

  /**
   * Throws unless (x, y, z) already has magnitude 1 within `tolerance`.
   */
  static create(x: number, y: number, z: number, tolerance: number = getUnitVectorTolerance()): UnitVector3D {
    const mag = Math.hypot(x, y, z)
    if (!(Math.abs(mag - 1) <= tolerance)) {
      throw new DegenerateGeometryError(`UnitVector3D requires magnitude 1, got ${mag}`)
    }
    return new UnitVector3D(x, y, z)
  }

  override negate(): UnitVector3D {
    return new UnitVector3D(-this.x, -this.y, -this.z)
  }

  /**
   * Parallel or anti-parallel when |1 - |a·b|| <= tolerance.
   */
  isParallelTo(other: UnitVector3D, tolerance: number): boolean {
    const dp = Math.abs(this.dot(other))
    return Math.abs(1 - dp) <= tolerance
  }

  /**
   * Parallel or anti-parallel when the angle between the directions, or its
   * supplement, is below `angleTolerance`.
   */
  isParallelToWithin(other: UnitVector3D, angleTolerance: Angle): boolean {
    const angle = this.angleTo(other)
    return angle < angleTolerance.radians || Math.PI - angle < angleTolerance.radians
  }

  /**
   * Angle in [0, π] radians.
   */
  angleTo(other: Vector3D): number {
    return Math.atan2(this.cross(other).magnitude, this.dot(other))
  }
}
