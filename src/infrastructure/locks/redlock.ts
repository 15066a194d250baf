import Redis from "ioredis";
import Redlock from "redlock";
import { DistributedLock } from "../../application/ports/services";

export class RedisDistributedLock implements DistributedLock {
  private readonly redlock: Redlock;

  constructor(redis: Redis) {
    this.redlock = new Redlock([redis], {
      retryCount: 20,
      retryDelay: 100,
      retryJitter: 50
    });
  }

  async withLock<T>(resource: string, ttlMs: number, handler: () => Promise<T>): Promise<T> {
    const lock = await this.redlock.acquire([resource], ttlMs);
    try {
      return await handler();
    } finally {
      await lock.release();
    }
  }
}
