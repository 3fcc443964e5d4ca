import { SerializationError } from '../errors'
import { log } from '../logging/geometry-logger'
import { LineSegment } from './line-segment/LineSegment'
import type { LineSegmentDto } from './line-segment/LineSegmentDto'
import type { IDeserializable } from './serialization/ISerializable'
import { isDocumentNode } from './serialization/document-node'

export const CURRENT_FORMAT_VERSION = 1

export interface LineSegmentDocument {
  formatVersion: number
  LineSegment: LineSegmentDto
}

export class Serialization {

  static serializeLineSegment(segment: LineSegment): string {
    const document: LineSegmentDocument = {
      formatVersion: CURRENT_FORMAT_VERSION,
      LineSegment: segment.serialize()
    }
    return JSON.stringify(document, null, 2)
  }

  static deserializeLineSegment(json: string): LineSegment {
    return this.readDocument(json, LineSegment)
  }

  /**
   * Parses `json`, checks its format version and hands the remaining content
   * to `reader`, which may find its element under wrapper nodes.
   */
  static readDocument<T>(json: string, reader: IDeserializable<T>): T {
    let parsed: unknown
    try {
      parsed = JSON.parse(json)
    } catch (e) {
      throw new SerializationError(`Invalid document: ${e instanceof Error ? e.message : String(e)}`)
    }

    if (!isDocumentNode(parsed)) {
      throw new SerializationError('Invalid document: expected a JSON object at the root')
    }

    const { formatVersion, ...content } = parsed
    if (formatVersion === undefined) {
      log(`[Serialization] Document has no formatVersion, reading as version ${CURRENT_FORMAT_VERSION}`)
    } else if (typeof formatVersion !== 'number' || !Number.isInteger(formatVersion) || formatVersion < 1) {
      throw new SerializationError(`Invalid document: formatVersion must be a positive integer, got ${JSON.stringify(formatVersion)}`)
    } else if (formatVersion > CURRENT_FORMAT_VERSION) {
      throw new SerializationError(
        `Document format version ${formatVersion} is newer than supported version ${CURRENT_FORMAT_VERSION}. ` +
        `Please update the library.`
      )
    }

    return reader.deserialize(content)
  }
}
