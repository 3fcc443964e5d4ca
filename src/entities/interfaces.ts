import type { Point3D } from './point/Point3D'
import type { LineSegment } from './line-segment/LineSegment'

/**
 * What a segment needs from a plane. The segment knows nothing about how the
 * plane is represented.
 */
export interface PlaneOperations {
  project(segment: LineSegment): LineSegment
  intersectionWith(segment: LineSegment, tolerance: number): Point3D | undefined
}
