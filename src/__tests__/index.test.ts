import { LineSegment, Plane, Point3D, Serialization, UnitVector3D, tryParse2D } from '../index'

describe('public API', () => {
  test('segment projected on a plane and written to a document', () => {
    const plane = Plane.fromNormalAndPoint(UnitVector3D.yAxis, new Point3D(0, 1, 0))
    const segment = LineSegment.parse('0 3 0', '4 5 0')

    const projected = segment.projectOn(plane)
    const json = Serialization.serializeLineSegment(projected)

    expect(Serialization.deserializeLineSegment(json).equals(LineSegment.parse('0 1 0', '4 1 0'))).toBe(true)
  })

  test('exports the pair parser', () => {
    expect(tryParse2D('(3; 4)')).toEqual({ x: 3, y: 4 })
  })
})
