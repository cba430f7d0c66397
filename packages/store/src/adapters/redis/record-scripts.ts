import { LuaScript } from "./lua-script"

/**
 * Hash fields: `value` (bytes), `lockUntil` (epoch ms), `lockOwner` (token),
 * `taggedAt` (epoch ms, only while a tag waits on a live lock).
 */
export const READ_AND_LOCK = new LuaScript(
  "readAndLock",
  `
  -- KEYS[1] = record key
  -- ARGV[1] = now, ARGV[2] = lockUntil, ARGV[3] = owner, ARGV[4] = physical ttl ms

  local value = redis.call('HGET', KEYS[1], 'value')
  local lockUntil = redis.call('HGET', KEYS[1], 'lockUntil')
  local lockOwner = redis.call('HGET', KEYS[1], 'lockOwner')
  local exists = redis.call('EXISTS', KEYS[1])

  if lockUntil == false or tonumber(lockUntil) <= tonumber(ARGV[1]) then
    redis.call('HSET', KEYS[1], 'lockUntil', ARGV[2], 'lockOwner', ARGV[3])
    redis.call('HDEL', KEYS[1], 'taggedAt')
    if redis.call('PTTL', KEYS[1]) < tonumber(ARGV[4]) then
      redis.call('PEXPIRE', KEYS[1], ARGV[4])
    end
    return { exists, value, lockUntil, lockOwner, 1 }
  end

  return { exists, value, lockUntil, lockOwner, 0 }
  `,
)

export const WRITE_RESULT = new LuaScript(
  "writeResult",
  `
  -- KEYS[1] = record key
  -- ARGV[1] = owner, ARGV[2] = value, ARGV[3] = lockUntil, ARGV[4] = physical ttl ms

  if redis.call('HGET', KEYS[1], 'lockOwner') ~= ARGV[1] then
    return 0
  end

  local lockUntil = ARGV[3]
  local taggedAt = redis.call('HGET', KEYS[1], 'taggedAt')
  if taggedAt and tonumber(taggedAt) < tonumber(lockUntil) then
    lockUntil = taggedAt
  end

  redis.call('HSET', KEYS[1], 'value', ARGV[2], 'lockUntil', lockUntil)
  redis.call('HDEL', KEYS[1], 'lockOwner', 'taggedAt')
  redis.call('PEXPIRE', KEYS[1], ARGV[4])
  return 1
  `,
)

export const RELEASE = new LuaScript(
  "release",
  `
  -- KEYS[1] = record key
  -- ARGV[1] = owner, ARGV[2] = now, ARGV[3] = physical ttl ms

  if redis.call('HGET', KEYS[1], 'lockOwner') ~= ARGV[1] then
    return 0
  end

  redis.call('HSET', KEYS[1], 'lockUntil', ARGV[2])
  redis.call('HDEL', KEYS[1], 'lockOwner', 'taggedAt')
  if redis.call('HEXISTS', KEYS[1], 'value') == 0 then
    redis.call('PEXPIRE', KEYS[1], ARGV[3])
  end
  return 1
  `,
)

export const TAG_AS_DELETED = new LuaScript(
  "tagAsDeleted",
  `
  -- KEYS[1] = record key
  -- ARGV[1] = now, ARGV[2] = physical ttl ms

  if redis.call('EXISTS', KEYS[1]) == 0 then
    return 'not_found'
  end

  local lockUntil = tonumber(redis.call('HGET', KEYS[1], 'lockUntil'))
  if lockUntil == nil or lockUntil <= tonumber(ARGV[1]) then
    return 'already_stale'
  end

  if redis.call('HEXISTS', KEYS[1], 'lockOwner') == 1 then
    redis.call('HSETNX', KEYS[1], 'taggedAt', ARGV[1])
    return 'tagged_while_locked'
  end

  redis.call('HSET', KEYS[1], 'lockUntil', ARGV[1])
  redis.call('PEXPIRE', KEYS[1], ARGV[2])
  return 'tagged'
  `,
)
