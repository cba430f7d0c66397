import { createClient, RESP_TYPES, type RedisClientOptions } from "redis"

export type RedisScriptArg = string | Buffer

export type RedisScriptOptions = {
  keys: string[]
  arguments: RedisScriptArg[]
}

/**
 * The slice of a node-redis client the record store needs.
 *
 * Bulk strings come back as `Buffer` so stored values survive byte for byte.
 */
export type RedisScriptClient = {
  evalSha(sha1: string, opts: RedisScriptOptions): Promise<unknown>
  eval(script: string, opts: RedisScriptOptions): Promise<unknown>

  pTTL(key: string): Promise<unknown>
  keys(pattern: string): Promise<unknown>
  del(keys: string[]): Promise<unknown>

  connect(): Promise<void>
  close(): Promise<void>
  readonly isOpen: boolean
}

export type RedisScriptClientOptions = { url: string } & Omit<RedisClientOptions, "url">

export function createRedisScriptClient(options: RedisScriptClientOptions): RedisScriptClient {
  const client = createClient(options).withTypeMapping({
    [RESP_TYPES.BLOB_STRING]: Buffer,
  })

  return {
    evalSha: (sha1, opts) => client.evalSha(sha1, opts),
    eval: (script, opts) => client.eval(script, opts),
    pTTL: (key) => client.pTTL(key),
    keys: (pattern) => client.keys(pattern),
    del: (keys) => client.del(keys),
    connect: async () => {
      await client.connect()
    },
    close: async () => {
      await client.close()
    },
    get isOpen() {
      return client.isOpen
    },
  }
}
