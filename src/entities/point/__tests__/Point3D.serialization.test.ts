import { Point3D } from '../Point3D'
import { SerializationError } from '../../../errors'

describe('Point3D Serialization', () => {
  test('serializes coordinates as X, Y, Z', () => {
    expect(new Point3D(1, 2, 3).serialize()).toEqual({ X: 1, Y: 2, Z: 3 })
  })

  test('round-trip preserves coordinates', () => {
    const original = new Point3D(-1.25, 1e-9, 42)

    const deserialized = Point3D.deserialize(original.serialize())

    expect(deserialized.equals(original)).toBe(true)
  })

  test('reads through a wrapper node', () => {
    const point = Point3D.deserialize({ Point3D: { X: 4, Y: 5, Z: 6 } })

    expect(point.toArray()).toEqual([4, 5, 6])
  })

  test('rejects missing coordinates', () => {
    expect(() => Point3D.deserialize({ X: 1, Y: 2 })).toThrow(SerializationError)
    expect(() => Point3D.deserialize({ X: 1, Y: 2 })).toThrow(/^Point3D: Z: /)
  })

  test('rejects non-numeric coordinates', () => {
    expect(() => Point3D.deserialize({ X: 1, Y: '2', Z: 3 })).toThrow(/^Point3D: Y: /)
  })

  test('rejects unknown children', () => {
    expect(() => Point3D.deserialize({ X: 1, Y: 2, Z: 3, W: 4 })).toThrow(SerializationError)
  })

  test('rejects non-object nodes', () => {
    expect(() => Point3D.deserialize([1, 2, 3])).toThrow('Point3D: expected an object node, got array')
  })
})
