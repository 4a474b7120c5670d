export { InMemoryPresetStorage } from './memory'
export { FilePresetStorage } from './file'
export { RedisPresetStorage, type PresetRedisClient } from './redis'
export { createRedisClient, redisHealthCheck } from './client'
