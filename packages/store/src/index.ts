export {
  createMemoryRecordStore,
  MemoryRecordStore,
  type MemoryRecordStoreDeps,
} from "./adapters/memory/memory-record-store"
export { isNoScriptError, LuaScript } from "./adapters/redis/lua-script"
export {
  createRedisScriptClient,
  type RedisScriptArg,
  type RedisScriptClient,
  type RedisScriptClientOptions,
  type RedisScriptOptions,
} from "./adapters/redis/redis-client"
export {
  createRedisRecordStore,
  type KeyspacePrefix,
  RedisRecordStore,
  type RedisRecordStoreDeps,
  type RedisRecordStoreOptions,
} from "./adapters/redis/redis-record-store"
export {
  type StoreOperation,
  StoreUnavailableError,
} from "./core/store-unavailable-error"
export type { CacheRecord, OwnerToken, RecordKey, RecordTtl } from "./ports/cache-record"
export type {
  FencedWriteResult,
  ReadAndLockInput,
  ReadAndLockResult,
  RecordStore,
  ReleaseInput,
  TagInput,
  TagResult,
  TagSkipReason,
  WriteResultInput,
} from "./ports/record-store"
