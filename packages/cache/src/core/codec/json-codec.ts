import type { Codec } from "../../ports/codec"
import { CacheCodecError } from "../errors/cache-codec-error"

const encoder = new TextEncoder()
const decoder = new TextDecoder("utf-8", { fatal: true })

/**
 * UTF-8 JSON. Decoding trusts the stored shape; pair it with a validating
 * codec when the bytes may come from an older deploy.
 */
export function jsonCodec<T>(): Codec<T> {
  return {
    encode(value: T): Uint8Array {
      const text = JSON.stringify(value)

      if (text === undefined) {
        throw new CacheCodecError("Value is not JSON-serializable", { type: typeof value })
      }

      return encoder.encode(text)
    },

    decode(bytes: Uint8Array): T {
      try {
        return JSON.parse(decoder.decode(bytes))
      } catch (err) {
        throw new CacheCodecError("Stored bytes are not valid JSON", { bytes: bytes.length }, err)
      }
    },
  }
}
