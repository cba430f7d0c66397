import superjson from "superjson"
import type { Codec } from "../../ports/codec"
import { CacheCodecError } from "../errors/cache-codec-error"

const encoder = new TextEncoder()
const decoder = new TextDecoder("utf-8", { fatal: true })

/** JSON that keeps `Date`, `Map`, `Set`, `BigInt` and `undefined` intact. */
export function superjsonCodec<T>(): Codec<T> {
  return {
    encode: (value) => encoder.encode(superjson.stringify(value)),

    decode(bytes) {
      try {
        return superjson.parse<T>(decoder.decode(bytes))
      } catch (err) {
        throw new CacheCodecError(
          "Stored bytes are not valid superjson",
          { bytes: bytes.length },
          err,
        )
      }
    },
  }
}
