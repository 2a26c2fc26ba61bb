/**
 * Restoration Codec
 *
 * Encodes the raw bucket tree to the JSON blob handed to a RestorationStore and
 * validates blobs on the way back in. Stored shape:
 *
 *   { "version": 1, "data": { "v": { id: value }, "c": { id: { "v": ..., "c": ... } } } }
 */

import { z } from "zod"

export type RestorationPrimitive =
  | null
  | boolean
  | number
  | string
  | RestorationPrimitive[]
  | { [key: string]: RestorationPrimitive }

export interface RawBucketData {
  values?: Map<string, RestorationPrimitive>
  children?: Map<string, RawBucketData>
}

export const RESTORATION_DATA_VERSION = 1

interface EncodedBucket {
  v?: Record<string, RestorationPrimitive>
  c?: Record<string, EncodedBucket>
}

const PrimitiveSchema: z.ZodType<RestorationPrimitive> = z.lazy(() =>
  z.union([
    z.null(),
    z.boolean(),
    z.number().finite(),
    z.string(),
    z.array(PrimitiveSchema),
    z.record(PrimitiveSchema),
  ]),
)

const EncodedBucketSchema: z.ZodType<EncodedBucket> = z.lazy(() =>
  z
    .object({
      v: z.record(PrimitiveSchema).optional(),
      c: z.record(EncodedBucketSchema).optional(),
    })
    .strict(),
)

const EnvelopeSchema = z.object({
  version: z.literal(RESTORATION_DATA_VERSION),
  data: EncodedBucketSchema,
})

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

/**
 * Whether `value` survives an encode/decode round trip unchanged.
 */
export function isSerializableForRestoration(value: unknown): value is RestorationPrimitive {
  if (value === null) return true
  switch (typeof value) {
    case "boolean":
    case "string":
      return true
    case "number":
      return Number.isFinite(value)
    case "object":
      if (Array.isArray(value)) {
        return value.every(isSerializableForRestoration)
      }
      return isPlainObject(value) && Object.values(value).every(isSerializableForRestoration)
    default:
      return false
  }
}

export function primitivesEqual(a: RestorationPrimitive, b: RestorationPrimitive): boolean {
  if (Object.is(a, b)) return true
  if (a === null || b === null || typeof a !== "object" || typeof b !== "object") return false
  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false
    const other: RestorationPrimitive[] = b
    return a.every((item, index) => primitivesEqual(item, other[index]))
  }
  const left: { [key: string]: RestorationPrimitive } = a
  const right: { [key: string]: RestorationPrimitive } = b
  const leftKeys = Object.keys(left)
  if (leftKeys.length !== Object.keys(right).length) return false
  return leftKeys.every(
    (key) => Object.prototype.hasOwnProperty.call(right, key) && primitivesEqual(left[key], right[key]),
  )
}

function toEncodedBucket(raw: RawBucketData): EncodedBucket {
  const encoded: EncodedBucket = {}
  if (raw.values && raw.values.size > 0) {
    encoded.v = Object.fromEntries(raw.values)
  }
  if (raw.children && raw.children.size > 0) {
    encoded.c = Object.fromEntries(
      Array.from(raw.children, ([id, child]) => [id, toEncodedBucket(child)] as const),
    )
  }
  return encoded
}

function fromEncodedBucket(encoded: EncodedBucket): RawBucketData {
  const raw: RawBucketData = {}
  if (encoded.v) {
    raw.values = new Map(Object.entries(encoded.v))
  }
  if (encoded.c) {
    raw.children = new Map(
      Object.entries(encoded.c).map(([id, child]) => [id, fromEncodedBucket(child)] as const),
    )
  }
  return raw
}

export function encodeRestorationData(raw: RawBucketData): string {
  return JSON.stringify({ version: RESTORATION_DATA_VERSION, data: toEncodedBucket(raw) })
}

export type DecodeResult =
  | { ok: true; data: RawBucketData | null }
  | { ok: false; reason: string }

/**
 * Decodes a stored blob. `null` input means nothing was stored yet and is not
 * an error; anything unparsable or of another version is reported as such.
 */
export function decodeRestorationData(encoded: string | null): DecodeResult {
  if (encoded === null) {
    return { ok: true, data: null }
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(encoded)
  } catch (error) {
    return { ok: false, reason: `malformed JSON: ${error instanceof Error ? error.message : String(error)}` }
  }

  const result = EnvelopeSchema.safeParse(parsed)
  if (!result.success) {
    const issue = result.error.issues[0]
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : ""
    return { ok: false, reason: `invalid restoration data${where}: ${issue?.message ?? "unknown issue"}` }
  }

  return { ok: true, data: fromEncodedBucket(result.data.data) }
}
