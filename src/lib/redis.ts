/**
 * Job Leases
 *
 * Periodic jobs must not overlap. A lease is a Redis key set with NX and a TTL;
 * release only deletes the key if it still holds our token.
 */

import { Redis } from '@upstash/redis';
import { nanoid } from 'nanoid';

export interface LeaseHandle {
  key: string;
  token: string;
}

export interface JobLease {
  acquire(name: string, ttlSeconds: number): Promise<LeaseHandle | null>;
  release(handle: LeaseHandle): Promise<void>;
}

const LEASE_PREFIX = 'lease:job:';

const RELEASE_SCRIPT = `
if redis.call("get", KEYS[1]) == ARGV[1] then
  return redis.call("del", KEYS[1])
end
return 0
`;

/**
 * Upstash-backed lease shared by every process of the deployment
 */
export function createRedisLease(redis: Redis): JobLease {
  return {
    async acquire(name: string, ttlSeconds: number): Promise<LeaseHandle | null> {
      const key = `${LEASE_PREFIX}${name}`;
      const token = nanoid();
      const result = await redis.set(key, token, { nx: true, ex: ttlSeconds });
      return result === 'OK' ? { key, token } : null;
    },

    async release(handle: LeaseHandle): Promise<void> {
      await redis.eval(RELEASE_SCRIPT, [handle.key], [handle.token]);
    },
  };
}

/**
 * In-process lease for single-instance deployments and tests
 */
export function createMemoryLease(now: () => number = Date.now): JobLease {
  const held = new Map<string, { token: string; expiresAt: number }>();

  return {
    acquire(name: string, ttlSeconds: number): Promise<LeaseHandle | null> {
      const key = `${LEASE_PREFIX}${name}`;
      const current = held.get(key);
      if (current !== undefined && current.expiresAt > now()) {
        return Promise.resolve(null);
      }
      const token = nanoid();
      held.set(key, { token, expiresAt: now() + ttlSeconds * 1000 });
      return Promise.resolve({ key, token });
    },

    release(handle: LeaseHandle): Promise<void> {
      if (held.get(handle.key)?.token === handle.token) {
        held.delete(handle.key);
      }
      return Promise.resolve();
    },
  };
}

export function createRedisClient(url: string, token: string): Redis {
  return new Redis({ url, token });
}
