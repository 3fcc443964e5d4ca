import { DegenerateGeometryError } from '../errors'
import { getDefaultIntersectionTolerance } from '../config/geometry-config'
import { LineSegment } from './line-segment/LineSegment'
import { Point3D } from './point/Point3D'
import type { UnitVector3D } from './vector/Vector3D'
import type { PlaneOperations } from './interfaces'

/**
 * The plane `normal · p + d = 0`.
 */
export class Plane implements PlaneOperations {
  readonly normal: UnitVector3D
  readonly d: number

  private constructor(normal: UnitVector3D, d: number) {
    this.normal = normal
    this.d = d
  }

  static create(normal: UnitVector3D, d: number): Plane {
    return new Plane(normal, d)
  }

  static fromNormalAndPoint(normal: UnitVector3D, point: Point3D): Plane {
    return new Plane(normal, -normal.dot(point.toVector()))
  }

  /**
   * Plane through three points, normal following the right-hand rule p1 → p2 → p3.
   */
  static fromPoints(p1: Point3D, p2: Point3D, p3: Point3D): Plane {
    const cross = p1.vectorTo(p2).cross(p1.vectorTo(p3))
    if (cross.magnitude === 0) {
      throw new DegenerateGeometryError(
        `Plane requires 3 non-collinear points, got ${p1.toString()}, ${p2.toString()}, ${p3.toString()}`
      )
    }
    return Plane.fromNormalAndPoint(cross.normalize(), p1)
  }

  /**
   * Point of the plane closest to the origin.
   */
  get rootPoint(): Point3D {
    return Point3D.origin.add(this.normal.scale(-this.d))
  }

  signedDistanceTo(point: Point3D): number {
    return this.normal.dot(point.toVector()) + this.d
  }

  projectPoint(point: Point3D): Point3D {
    return point.add(this.normal.scale(-this.signedDistanceTo(point)))
  }

  /**
   * Throws DegenerateGeometryError for a segment perpendicular to the plane,
   * whose projection is a single point.
   */
  project(segment: LineSegment): LineSegment {
    return LineSegment.create(this.projectPoint(segment.start), this.projectPoint(segment.end))
  }

  /**
   * Where the segment crosses the plane. Undefined when the segment is
   * parallel to the plane within `tolerance`, or crosses it beyond its ends.
   */
  intersectionWith(segment: LineSegment, tolerance: number = getDefaultIntersectionTolerance()): Point3D | undefined {
    const u = segment.start.vectorTo(segment.end)
    if (Math.abs(segment.direction.dot(this.normal)) < tolerance) {
      return undefined
    }

    const denominator = u.dot(this.normal)
    if (denominator === 0) {
      return undefined
    }

    const t = -this.signedDistanceTo(segment.start) / denominator
    if (t < 0 || t > 1) {
      return undefined
    }
    return segment.start.add(u.scale(t))
  }

  toString(): string {
    return `Normal: ${this.normal.toString()}, D: ${this.d}`
  }
}
