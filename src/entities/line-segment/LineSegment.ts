import { computed, type IComputedValue } from 'mobx'
import { DegenerateGeometryError, SerializationError } from '../../errors'
import { getDefaultIntersectionTolerance, getDefaultParallelTolerance } from '../../config/geometry-config'
import { combineHashes } from '../../utils/hash'
import { Point3D } from '../point/Point3D'
import type { UnitVector3D } from '../vector/Vector3D'
import type { Angle } from '../angle'
import type { PlaneOperations } from '../interfaces'
import type { ISerializable } from '../serialization/ISerializable'
import { findElementNode } from '../serialization/document-node'
import { LINE_SEGMENT_CHILDREN, type LineSegmentDto } from './LineSegmentDto'

interface SegmentMetrics {
  length: number
  // missing when the endpoints coincide, which only a segment read from a document allows
  direction?: UnitVector3D
}

function deriveMetrics(start: Point3D, end: Point3D): SegmentMetrics {
  const vectorTo = start.vectorTo(end)
  const length = vectorTo.magnitude
  return {
    length,
    direction: length > 0 && Number.isFinite(length) ? vectorTo.normalize() : undefined
  }
}

/**
 * A line segment between two distinct points.
 */
export class LineSegment implements ISerializable<LineSegmentDto> {
  readonly start: Point3D
  readonly end: Point3D

  // keepAlive: computed once, held for the segment's lifetime
  private readonly metrics: IComputedValue<SegmentMetrics>

  private constructor(start: Point3D, end: Point3D) {
    this.start = start
    this.end = end
    this.metrics = computed(() => deriveMetrics(start, end), { keepAlive: true })
  }

  // ============================================================================
  // Factory methods
  // ============================================================================

  /**
   * Throws DegenerateGeometryError if start and end are the same point.
   */
  static create(start: Point3D, end: Point3D): LineSegment {
    if (start.equals(end)) {
      throw new DegenerateGeometryError(`LineSegment: start point equals end point ${start.toString()}`)
    }
    return new LineSegment(start, end)
  }

  /**
   * @internal Used only when reading documents written from a valid segment - do not use directly
   */
  static createFromSerialized(start: Point3D, end: Point3D): LineSegment {
    return new LineSegment(start, end)
  }

  /**
   * Creates a segment from the text of its two endpoints, e.g. "0, 0, 0" and "(1; 2; 3)".
   */
  static parse(startText: string, endText: string): LineSegment {
    return LineSegment.create(Point3D.parse(startText), Point3D.parse(endText))
  }

  /**
   * Like `parse`, but unparsable text gives undefined. Coincident points still throw.
   */
  static tryParse(startText: string, endText: string): LineSegment | undefined {
    const start = Point3D.tryParse(startText)
    const end = Point3D.tryParse(endText)
    if (!start || !end) {
      return undefined
    }
    return LineSegment.create(start, end)
  }

  // ============================================================================
  // Derived properties
  // ============================================================================

  /**
   * Distance from start to end.
   */
  get length(): number {
    return this.metrics.get().length
  }

  /**
   * Unit vector pointing from start to end.
   */
  /**
   * Throws DegenerateGeometryError when the endpoints coincide.
   */
  get direction(): UnitVector3D {
    const { direction } = this.metrics.get()
    if (!direction) {
      throw new DegenerateGeometryError(`LineSegment ${this.toString()} has no direction`)
    }
    return direction
  }

  // ============================================================================
  // Geometry
  // ============================================================================

  /**
   * Closest point to `point` on this segment, or on the infinite line through
   * it when `clampToSegment` is false.
   */
  closestPointTo(point: Point3D, clampToSegment: boolean): Point3D {
    let t = point.subtract(this.start).dot(this.direction)
    if (clampToSegment) {
      if (t < 0) t = 0
      if (t > this.length) t = this.length
    }
    return this.start.add(this.direction.scale(t))
  }

  /**
   * Shortest segment from this line (or segment, with clamping) to `point`.
   * Throws DegenerateGeometryError when `point` already lies on it.
   */
  segmentTo(point: Point3D, clampToSegment: boolean): LineSegment {
    return LineSegment.create(this.closestPointTo(point, clampToSegment), point)
  }

  projectOn(plane: PlaneOperations): LineSegment {
    return plane.project(this)
  }

  intersectionWith(plane: PlaneOperations, tolerance: number = getDefaultIntersectionTolerance()): Point3D | undefined {
    return plane.intersectionWith(this, tolerance)
  }

  /**
   * Parallel (or anti-parallel) up to floating point rounding, or within
   * `angleTolerance` when one is given.
   */
  isParallelTo(other: LineSegment, angleTolerance?: Angle): boolean {
    if (angleTolerance === undefined) {
      return this.direction.isParallelTo(other.direction, getDefaultParallelTolerance())
    }
    return this.direction.isParallelToWithin(other.direction, angleTolerance)
  }

  // ============================================================================
  // Equality
  // ============================================================================

  /**
   * Same start and same end, exactly. A reversed segment is a different segment.
   */
  equals(other: LineSegment): boolean {
    return this.start.equals(other.start) && this.end.equals(other.end)
  }

  hashCode(): number {
    return combineHashes(this.start.hashCode(), this.end.hashCode())
  }

  toString(): string {
    return `StartPoint: ${this.start.toString()}, EndPoint: ${this.end.toString()}`
  }

  // ============================================================================
  // Serialization
  // ============================================================================

  serialize(): LineSegmentDto {
    return {
      StartPoint: this.start.serialize(),
      EndPoint: this.end.serialize()
    }
  }

  static deserialize(node: unknown): LineSegment {
    const element = findElementNode(node, LINE_SEGMENT_CHILDREN, 'LineSegment')

    const keys = Object.keys(element)
    if (keys.length !== LINE_SEGMENT_CHILDREN.length || keys.some((key, i) => key !== LINE_SEGMENT_CHILDREN[i])) {
      throw new SerializationError(
        `LineSegment: expected children ${LINE_SEGMENT_CHILDREN.join(', ')} in that order, found ${keys.join(', ')}`
      )
    }

    const start = Point3D.deserialize(element.StartPoint)
    const end = Point3D.deserialize(element.EndPoint)
    return LineSegment.createFromSerialized(start, end)
  }
}
