import { Point3D } from '../Point3D'
import { Vector3D } from '../../vector/Vector3D'
import { ParseError } from '../../../errors'

describe('Point3D', () => {
  test('point minus point is the vector between them', () => {
    const a = new Point3D(1, 2, 3)
    const b = new Point3D(4, 6, 3)

    expect(b.subtract(a).toArray()).toEqual([3, 4, 0])
    expect(a.vectorTo(b).toArray()).toEqual([3, 4, 0])
    expect(a.distanceTo(b)).toBe(5)
  })

  test('point plus vector', () => {
    expect(new Point3D(1, 1, 1).add(new Vector3D(1, -1, 2)).toArray()).toEqual([2, 0, 3])
  })

  test('equals is exact', () => {
    const a = new Point3D(0.1, 0.2, 0.3)

    expect(a.equals(new Point3D(0.1, 0.2, 0.3))).toBe(true)
    expect(a.equals(new Point3D(0.1, 0.2, 0.3 + 1e-12))).toBe(false)
    expect(a.equalsWithin(new Point3D(0.1, 0.2, 0.3 + 1e-12), 1e-9)).toBe(true)
  })

  test('equal points hash alike', () => {
    expect(new Point3D(1, 2, 3).hashCode()).toBe(new Point3D(1, 2, 3).hashCode())
    expect(new Point3D(0, 0, 0).hashCode()).toBe(new Point3D(-0, 0, -0).hashCode())
  })

  test('parse', () => {
    expect(Point3D.parse('1, 2, 3').toArray()).toEqual([1, 2, 3])
    expect(Point3D.parse('(1,5; -2; 0)').toArray()).toEqual([1.5, -2, 0])
  })

  test('parse throws ParseError for unparsable text', () => {
    expect(() => Point3D.parse('1, 2')).toThrow(ParseError)
    expect(() => Point3D.parse('x')).toThrow('Could not parse Point3D from "x"')
  })

  test('tryParse returns undefined for unparsable text', () => {
    expect(Point3D.tryParse('1,2,3,4')).toBeUndefined()
  })

  test('toString', () => {
    expect(new Point3D(1, -2.5, 0).toString()).toBe('(1, -2.5, 0)')
  })
})
