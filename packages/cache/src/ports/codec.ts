/**
 * Bidirectional transform between a typed value `T` and bytes.
 *
 * @remarks
 * Codecs sit between typed `fetch` calls and the byte-oriented record store.
 * They should be pure and deterministic; the store treats their output as
 * opaque.
 *
 * Plain JSON does not preserve `Date`, `Map`, `Set`, `BigInt` or class
 * instances. Define a domain codec when that matters.
 */
export interface Codec<T> {
  encode(value: T): Uint8Array
  decode(bytes: Uint8Array): T
}
