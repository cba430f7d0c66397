/**
 * Narrowing helpers for script replies. Each returns `undefined` when the
 * reply is not in the expected shape so the caller can report it.
 */

export function replyBytes(reply: unknown): Uint8Array | null | undefined {
  if (reply === null) return null
  if (Buffer.isBuffer(reply)) return new Uint8Array(reply)
  if (typeof reply === "string") return new TextEncoder().encode(reply)

  return undefined
}

export function replyText(reply: unknown): string | null | undefined {
  if (reply === null) return null
  if (Buffer.isBuffer(reply)) return reply.toString("utf8")
  if (typeof reply === "string") return reply

  return undefined
}

export function replyInteger(reply: unknown): number | undefined {
  const n = typeof reply === "number" ? reply : Number(replyText(reply) ?? Number.NaN)

  return Number.isSafeInteger(n) ? n : undefined
}

export function replyTuple(reply: unknown, length: number): unknown[] | undefined {
  return Array.isArray(reply) && reply.length === length ? reply : undefined
}
