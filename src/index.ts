export { Angle } from './entities/angle'
export { Vector3D, UnitVector3D, type Vec3Array } from './entities/vector/Vector3D'
export { Point3D } from './entities/point/Point3D'
export type { Point3DDto } from './entities/point/Point3DDto'
export { LineSegment } from './entities/line-segment/LineSegment'
export type { LineSegmentDto } from './entities/line-segment/LineSegmentDto'
export { Plane } from './entities/plane'
export type { PlaneOperations } from './entities/interfaces'
export { Serialization, CURRENT_FORMAT_VERSION, type LineSegmentDocument } from './entities/Serialization'
export type { ISerializable, IDeserializable } from './entities/serialization/ISerializable'
export { tryParse2D, tryParse3D, tryParseTuple, type NumericPair, type NumericTriple } from './utils/text'
export {
  GeometryError,
  DegenerateGeometryError,
  ParseError,
  SerializationError,
  isGeometryError,
  type GeometryErrorCode
} from './errors'
export {
  DOUBLE_PRECISION,
  getGeometryConfig,
  setGeometryConfig,
  resetGeometryConfig,
  type GeometryConfig
} from './config/geometry-config'
export { setVerbosity, clearGeometryLogs, geometryLogs } from './logging/geometry-logger'
export type { LogVerbosity } from './logging/geometry-logger'
