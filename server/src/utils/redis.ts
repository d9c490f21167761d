import Redis from 'ioredis'
import { getLogger } from '../lib/logger'

const redisOptions = (redisUrl: string) => ({
  ...(redisUrl.startsWith('rediss://') ? { tls: {} } : {}),
  enableReadyCheck: false,
  maxRetriesPerRequest: null,
})

/**
 * Client factory for Bull. Works with both:
 * - Self-hosted Redis: redis://host:6379 (or redis://redis:6379 in Docker)
 * - Managed TLS Redis: rediss://...
 *
 * Bull requires enableReadyCheck: false and maxRetriesPerRequest: null for its
 * subscriber and blocking clients.
 */
export function createRedisClientFactory(redisUrl: string): (type: 'client' | 'subscriber' | 'bclient') => Redis {
  let logged = false
  return () => {
    if (!logged) {
      logged = true
      const kind = redisUrl.startsWith('rediss://') ? 'TLS' : 'plain TCP'
      getLogger('api').info({ msg: 'Redis: connecting for task queue', kind })
    }
    return new Redis(redisUrl, redisOptions(redisUrl))
  }
}
