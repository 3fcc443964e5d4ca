import { Plane } from '../plane'
import { LineSegment } from '../line-segment/LineSegment'
import { Point3D } from '../point/Point3D'
import { UnitVector3D } from '../vector/Vector3D'
import { DegenerateGeometryError } from '../../errors'

const p = (x: number, y: number, z: number) => new Point3D(x, y, z)

describe('Plane', () => {
  const ground = Plane.fromNormalAndPoint(UnitVector3D.zAxis, Point3D.origin)

  test('fromPoints follows the right-hand rule', () => {
    const plane = Plane.fromPoints(p(0, 0, 2), p(1, 0, 2), p(0, 1, 2))

    expect(plane.normal.toArray()).toEqual([0, 0, 1])
    expect(plane.d).toBe(-2)
    expect(plane.rootPoint.equals(p(0, 0, 2))).toBe(true)
  })

  test('fromPoints rejects collinear points', () => {
    expect(() => Plane.fromPoints(p(0, 0, 0), p(1, 1, 1), p(2, 2, 2))).toThrow(DegenerateGeometryError)
  })

  test('create takes the normal and offset directly', () => {
    expect(Plane.create(UnitVector3D.zAxis, -2).signedDistanceTo(p(0, 0, 2))).toBe(0)
  })

  test('signedDistanceTo', () => {
    expect(ground.signedDistanceTo(p(1, 2, 3))).toBe(3)
    expect(ground.signedDistanceTo(p(1, 2, -3))).toBe(-3)
  })

  test('projectPoint', () => {
    expect(ground.projectPoint(p(1, 2, 3)).equals(p(1, 2, 0))).toBe(true)
  })

  describe('project', () => {
    test('projects both endpoints', () => {
      const projected = ground.project(LineSegment.create(p(0, 0, 5), p(10, 0, 7)))

      expect(projected.equals(LineSegment.create(p(0, 0, 0), p(10, 0, 0)))).toBe(true)
    })

    test('throws for a segment perpendicular to the plane', () => {
      expect(() => ground.project(LineSegment.create(p(1, 1, 1), p(1, 1, 5)))).toThrow(DegenerateGeometryError)
    })

    test('is what LineSegment.projectOn returns', () => {
      const segment = LineSegment.create(p(0, 0, 5), p(10, 0, 7))

      expect(segment.projectOn(ground).equals(ground.project(segment))).toBe(true)
    })
  })

  describe('intersectionWith', () => {
    test('finds the crossing point', () => {
      const hit = ground.intersectionWith(LineSegment.create(p(0, 0, -1), p(0, 0, 1)))

      expect(hit?.equals(p(0, 0, 0))).toBe(true)
    })

    test('misses when the crossing is beyond the ends', () => {
      expect(ground.intersectionWith(LineSegment.create(p(0, 0, 1), p(0, 0, 3)))).toBeUndefined()
    })

    test('misses a parallel segment', () => {
      expect(ground.intersectionWith(LineSegment.create(p(0, 0, 1), p(1, 0, 1)))).toBeUndefined()
    })

    test('tolerance rejects nearly parallel segments', () => {
      const shallow = LineSegment.create(p(0, 0, -0.001), p(10, 0, 0.001))

      expect(shallow.intersectionWith(ground, 1e-3)).toBeUndefined()
      expect(shallow.intersectionWith(ground)?.equalsWithin(p(5, 0, 0), 1e-12)).toBe(true)
    })
  })
})
