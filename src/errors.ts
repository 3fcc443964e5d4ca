/**
 * Error types raised by the geometry primitives.
 *
 * Error Class Hierarchy:
 *   GeometryError (base class)
 *   ├── DegenerateGeometryError - coincident points, zero-length vectors
 *   ├── ParseError - text that does not describe a coordinate tuple
 *   └── SerializationError - malformed or unsupported documents
 */

export type GeometryErrorCode =
  | 'DEGENERATE_GEOMETRY'
  | 'PARSE_FAILURE'
  | 'SERIALIZATION_FAILURE'

export class GeometryError extends Error {
  readonly code: GeometryErrorCode

  constructor(code: GeometryErrorCode, message: string) {
    super(message)
    this.name = 'GeometryError'
    this.code = code
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

export class DegenerateGeometryError extends GeometryError {
  constructor(message: string) {
    super('DEGENERATE_GEOMETRY', message)
    this.name = 'DegenerateGeometryError'
  }
}

/**
 * Grammar mismatches and numeric conversion failures are reported alike,
 * with only the rejected text.
 */
export class ParseError extends GeometryError {
  readonly text: string

  constructor(text: string, what: string) {
    super('PARSE_FAILURE', `Could not parse ${what} from "${text}"`)
    this.name = 'ParseError'
    this.text = text
  }
}

export class SerializationError extends GeometryError {
  constructor(message: string) {
    super('SERIALIZATION_FAILURE', message)
    this.name = 'SerializationError'
  }
}

export function isGeometryError(error: unknown): error is GeometryError {
  return error instanceof GeometryError
}
