import type { Codec } from "../../ports/codec"
import { CacheCodecError } from "../errors/cache-codec-error"

/**
 * One tag byte in front of the codec output, so a cached "confirmed absent"
 * can be told apart from a value:
 *
 * - `0x00`: negative result, no payload
 * - `0x01`: value, followed by the codec bytes
 */
export const NEGATIVE_TAG = 0x00
export const VALUE_TAG = 0x01

const NEGATIVE_ENTRY = Uint8Array.of(NEGATIVE_TAG)

export function encodeEntry<T>(codec: Codec<T>, value: T | null): Uint8Array {
  if (value === null) return NEGATIVE_ENTRY.slice()

  let payload: Uint8Array

  try {
    payload = codec.encode(value)
  } catch (err) {
    if (err instanceof CacheCodecError) throw err
    throw new CacheCodecError("Codec failed to encode value", {}, err)
  }

  const out = new Uint8Array(payload.length + 1)
  out[0] = VALUE_TAG
  out.set(payload, 1)

  return out
}

export function decodeEntry<T>(codec: Codec<T>, bytes: Uint8Array): T | null {
  const tag = bytes[0]

  if (tag === NEGATIVE_TAG && bytes.length === 1) return null

  if (tag !== VALUE_TAG) {
    throw new CacheCodecError("Unrecognized cache entry", {
      tag: tag ?? null,
      length: bytes.length,
    })
  }

  try {
    return codec.decode(bytes.subarray(1))
  } catch (err) {
    if (err instanceof CacheCodecError) throw err
    throw new CacheCodecError("Codec failed to decode value", {}, err)
  }
}
