import { createHash } from "node:crypto"
import type { RedisScriptArg, RedisScriptClient } from "./redis-client"

export function isNoScriptError(err: unknown): boolean {
  return err instanceof Error && err.message.startsWith("NOSCRIPT")
}

/**
 * A Lua script addressed by its SHA1.
 *
 * Runs with EVALSHA; when the server has not cached the script yet (fresh
 * server, SCRIPT FLUSH, failover) it answers NOSCRIPT and the script is sent
 * once in full with EVAL, which also caches it.
 */
export class LuaScript {
  readonly sha1: string

  constructor(
    readonly name: string,
    readonly source: string,
  ) {
    this.sha1 = createHash("sha1").update(source).digest("hex")
  }

  async run(
    client: RedisScriptClient,
    keys: string[],
    args: RedisScriptArg[],
    onFallback?: () => void,
  ): Promise<unknown> {
    const opts = { keys, arguments: args }

    try {
      return await client.evalSha(this.sha1, opts)
    } catch (err) {
      if (!isNoScriptError(err)) throw err

      onFallback?.()

      return await client.eval(this.source, opts)
    }
  }
}
