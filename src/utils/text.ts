/**
 * Parsing of coordinate tuples such as "1, 2", "(1; 2)", "1 2" or "1,5 2,5".
 *
 * Coordinates may use either '.' or ',' as decimal separator, and ',' is also
 * a list separator, so a text can have more than one reading ("1,2,3" is
 * both (1.2, 3) and (1, 2.3)). Such text is rejected rather than guessed.
 */
import { logDebug } from '../logging/geometry-logger'

export interface NumericPair {
  x: number
  y: number
}

export interface NumericTriple {
  x: number
  y: number
  z: number
}

// sign, mantissa with optional '.' or ',' fraction, optional exponent
const COORDINATE_PATTERN = /^[+-]?(?:\d+(?:[.,]\d+)?|[.,]\d+)(?:[eE][+-]?\d+)?$/
const TUPLE_CHARS = /^[0-9+\-.,;eE ]+$/
const SEPARATOR_CHARS = ' ,;'

type Reading = string[]

/**
 * Ends of the coordinates that can start at `start`. A coordinate holds no
 * space or ';' and at most one ',', and must be followed by a separator or
 * the end of the text.
 */
function coordinateEnds(body: string, start: number): number[] {
  const candidates: number[] = []
  let commas = 0
  let i = start
  for (; i < body.length; i++) {
    const c = body[i]
    if (c === ' ' || c === ';' || c === ',') {
      if (i > start) {
        candidates.push(i)
      }
      if (c !== ',' || ++commas > 1) {
        break
      }
    }
  }
  if (i === body.length && i > start) {
    candidates.push(i)
  }
  return candidates.filter((end) => COORDINATE_PATTERN.test(body.slice(start, end)))
}

// A separator is a run of spaces holding at most one ',' or ';'.
function separatorEnds(body: string, start: number): number[] {
  const ends: number[] = []
  let marks = 0
  for (let i = start; i < body.length && SEPARATOR_CHARS.includes(body[i]); i++) {
    if (body[i] !== ' ' && ++marks > 1) {
      break
    }
    ends.push(i + 1)
  }
  return ends
}

/**
 * Distinct ways `body` from `start` splits into `count` coordinates, at most
 * two: the caller only needs to know it is ambiguous. Memoized per
 * (count, start) so each position is explored once.
 */
function readingsFrom(body: string, start: number, count: number, memo: Map<string, Reading[]>): Reading[] {
  const key = `${count}:${start}`
  const known = memo.get(key)
  if (known) {
    return known
  }

  const readings = new Map<string, Reading>()
  const add = (reading: Reading) => {
    if (readings.size < 2) {
      readings.set(reading.join('|'), reading)
    }
  }

  for (const end of coordinateEnds(body, start)) {
    const head = body.slice(start, end)
    if (count === 1) {
      if (end === body.length) {
        add([head])
      }
      continue
    }
    for (const next of separatorEnds(body, end)) {
      for (const tail of readingsFrom(body, next, count - 1, memo)) {
        add([head, ...tail])
      }
    }
    if (readings.size > 1) {
      break
    }
  }

  const result = [...readings.values()]
  memo.set(key, result)
  return result
}

function toNumber(coordinate: string): number | undefined {
  const value = Number(coordinate.replace(',', '.'))
  return Number.isFinite(value) ? value : undefined
}

/**
 * Parse `text` as exactly `dimension` coordinates.
 * Returns undefined for anything that is not exactly one such tuple.
 */
export function tryParseTuple(text: string, dimension: number): number[] | undefined {
  let body = text.trim()
  if (body.length === 0) {
    return undefined
  }

  const opens = body.startsWith('(')
  const closes = body.endsWith(')')
  if (opens !== closes) {
    return undefined
  }
  if (opens) {
    body = body.slice(1, -1).trim()
  }

  if (body.length === 0 || !TUPLE_CHARS.test(body)) {
    return undefined
  }

  const readings = readingsFrom(body, 0, dimension, new Map())
  if (readings.length !== 1) {
    if (readings.length > 1) {
      logDebug(`[Text] Rejected ambiguous ${dimension}D input "${text}"`)
    }
    return undefined
  }

  const values: number[] = []
  for (const coordinate of readings[0]) {
    const value = toNumber(coordinate)
    if (value === undefined) {
      return undefined
    }
    values.push(value)
  }
  return values
}

export function tryParse2D(text: string): NumericPair | undefined {
  const values = tryParseTuple(text, 2)
  if (!values) {
    return undefined
  }
  const [x, y] = values
  return { x, y }
}

export function tryParse3D(text: string): NumericTriple | undefined {
  const values = tryParseTuple(text, 3)
  if (!values) {
    return undefined
  }
  const [x, y, z] = values
  return { x, y, z }
}
