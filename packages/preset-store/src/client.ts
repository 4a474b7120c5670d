import Redis from 'ioredis'

/** A Redis client for preset storage. Connects on first command. */
export function createRedisClient(url: string): Redis {
  return new Redis(url, {
    maxRetriesPerRequest: 3,
    lazyConnect: true,
  })
}

/** Check if Redis is connected and responding. */
export async function redisHealthCheck(client: { ping(): Promise<string> }): Promise<boolean> {
  try {
    const pong = await client.ping()
    return pong === 'PONG'
  } catch {
    return false
  }
}
