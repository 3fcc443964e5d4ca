import type { ZodError } from 'zod'
import { SerializationError } from '../../errors'
import { logDebug } from '../../logging/geometry-logger'

const MAX_WRAPPER_DEPTH = 8

export type DocumentNode = Record<string, unknown>

export function isDocumentNode(value: unknown): value is DocumentNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Find the element that carries any of `childNames`, peeling single-child
 * wrapper nodes such as `{ "LineSegment": { ... } }` on the way down.
 */
export function findElementNode(node: unknown, childNames: readonly string[], elementName: string): DocumentNode {
  let current = node
  for (let depth = 0; depth <= MAX_WRAPPER_DEPTH; depth++) {
    if (!isDocumentNode(current)) {
      throw new SerializationError(`${elementName}: expected an object node, got ${describe(current)}`)
    }

    const keys = Object.keys(current)
    if (keys.some(key => childNames.includes(key))) {
      return current
    }

    if (keys.length !== 1) {
      throw new SerializationError(
        `${elementName}: expected children ${childNames.join(', ')}, found ${keys.length === 0 ? 'none' : keys.join(', ')}`
      )
    }

    logDebug(`[Serialization] ${elementName}: unwrapping "${keys[0]}"`)
    current = current[keys[0]]
  }

  throw new SerializationError(`${elementName}: wrapper nodes nested deeper than ${MAX_WRAPPER_DEPTH}`)
}

export function formatZodError(elementName: string, error: ZodError): SerializationError {
  const issues = error.issues.map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
  return new SerializationError(`${elementName}: ${issues.join('; ')}`)
}

function describe(value: unknown): string {
  if (value === null) return 'null'
  if (Array.isArray(value)) return 'array'
  return typeof value
}
