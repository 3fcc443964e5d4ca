import { ParseError } from '../../errors'
import { tryParse3D } from '../../utils/text'
import { combineHashes, hashNumber } from '../../utils/hash'
import { Vector3D, type Vec3Array } from '../vector/Vector3D'
import type { ISerializable } from '../serialization/ISerializable'
import { findElementNode, formatZodError } from '../serialization/document-node'
import { Point3DDtoSchema, type Point3DDto } from './Point3DDto'

const POINT_CHILDREN = ['X', 'Y', 'Z'] as const

export class Point3D implements ISerializable<Point3DDto> {
  readonly x: number
  readonly y: number
  readonly z: number

  constructor(x: number, y: number, z: number) {
    this.x = x
    this.y = y
    this.z = z
  }

  static readonly origin = new Point3D(0, 0, 0)

  /**
   * Parses "x, y, z", "(x; y; z)", "x y z" and decimal-comma variants.
   */
  static parse(text: string): Point3D {
    const point = Point3D.tryParse(text)
    if (!point) {
      throw new ParseError(text, 'Point3D')
    }
    return point
  }

  static tryParse(text: string): Point3D | undefined {
    const parsed = tryParse3D(text)
    return parsed ? new Point3D(parsed.x, parsed.y, parsed.z) : undefined
  }

  /**
   * Vector from this point to `other`.
   */
  vectorTo(other: Point3D): Vector3D {
    return other.subtract(this)
  }

  subtract(other: Point3D): Vector3D {
    return new Vector3D(this.x - other.x, this.y - other.y, this.z - other.z)
  }

  add(offset: Vector3D): Point3D {
    return new Point3D(this.x + offset.x, this.y + offset.y, this.z + offset.z)
  }

  distanceTo(other: Point3D): number {
    return this.vectorTo(other).magnitude
  }

  toVector(): Vector3D {
    return new Vector3D(this.x, this.y, this.z)
  }

  /**
   * Exact coordinate equality.
   */
  equals(other: Point3D): boolean {
    return this.x === other.x && this.y === other.y && this.z === other.z
  }

  equalsWithin(other: Point3D, tolerance: number): boolean {
    return (
      Math.abs(this.x - other.x) <= tolerance &&
      Math.abs(this.y - other.y) <= tolerance &&
      Math.abs(this.z - other.z) <= tolerance
    )
  }

  hashCode(): number {
    return combineHashes(hashNumber(this.x), hashNumber(this.y), hashNumber(this.z))
  }

  toArray(): Vec3Array {
    return [this.x, this.y, this.z]
  }

  toString(): string {
    return `(${this.x}, ${this.y}, ${this.z})`
  }

  serialize(): Point3DDto {
    return {
      X: this.x,
      Y: this.y,
      Z: this.z
    }
  }

  static deserialize(node: unknown): Point3D {
    const element = findElementNode(node, POINT_CHILDREN, 'Point3D')
    const result = Point3DDtoSchema.safeParse(element)
    if (!result.success) {
      throw formatZodError('Point3D', result.error)
    }
    return new Point3D(result.data.X, result.data.Y, result.data.Z)
  }
}
