import type { Point3DDto } from '../point/Point3DDto'

// Children are written, and must be read, in this order.
export const LINE_SEGMENT_CHILDREN = ['StartPoint', 'EndPoint'] as const

export interface LineSegmentDto {
  StartPoint: Point3DDto
  EndPoint: Point3DDto
}
