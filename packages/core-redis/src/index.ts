import { Global, Module } from "@nestjs/common";
import { ConfigModule, ConfigService } from "@nestjs/config";
import { Redis } from "ioredis";
import { randomUUID } from "crypto";
import { LOGGER } from "@wagerhouse/core-logging";
import type { ILogger } from "@wagerhouse/core-logging";

export interface IKeyValueStore {
  get<T>(key: string): Promise<T | null>;
  set<T>(key: string, value: T, ttlSeconds?: number): Promise<void>;
  setNx(key: string, value: string, ttlSeconds?: number): Promise<boolean>;
  incr(key: string, ttlSeconds?: number): Promise<number>;
  del(key: string): Promise<void>;
}

export interface ILockManager {
  withLock<T>(key: string, ttlMs: number, fn: () => Promise<T>): Promise<T>;
}

export const REDIS_CLIENT = Symbol("REDIS_CLIENT");
export const KEY_VALUE_STORE = Symbol("KEY_VALUE_STORE");
export const LOCK_MANAGER = Symbol("LOCK_MANAGER");

const BIGINT_FLAG = "__wh_bigint__";

export function serializeForRedis(value: unknown): string {
  const replacer = (input: unknown): unknown => {
    if (typeof input === "bigint") {
      return { [BIGINT_FLAG]: input.toString() };
    }
    if (Array.isArray(input)) {
      return input.map((item) => replacer(item));
    }
    if (input && typeof input === "object") {
      return Object.entries(input).reduce<Record<string, unknown>>((acc, [key, val]) => {
        acc[key] = replacer(val);
        return acc;
      }, {});
    }
    return input;
  };

  return JSON.stringify(replacer(value));
}

export function deserializeFromRedis<T>(payload: string | null): T | null {
  if (!payload) return null;
  const reviver = (input: unknown): unknown => {
    if (Array.isArray(input)) {
      return input.map((item) => reviver(item));
    }
    if (input && typeof input === "object") {
      const entries = Object.entries(input);
      const flagged = entries.length === 1 && entries[0][0] === BIGINT_FLAG ? entries[0][1] : undefined;
      if (typeof flagged === "string") {
        return BigInt(flagged);
      }
      return entries.reduce<Record<string, unknown>>((acc, [key, val]) => {
        acc[key] = reviver(val);
        return acc;
      }, {});
    }
    return input;
  };

  return reviver(JSON.parse(payload)) as T;
}

export class RedisKeyValueStore implements IKeyValueStore {
  constructor(private readonly redis: Redis) {}

  async get<T>(key: string): Promise<T | null> {
    return deserializeFromRedis<T>(await this.redis.get(key));
  }

  async set<T>(key: string, value: T, ttlSeconds?: number): Promise<void> {
    const payload = serializeForRedis(value);
    if (ttlSeconds) {
      await this.redis.set(key, payload, "EX", ttlSeconds);
    } else {
      await this.redis.set(key, payload);
    }
  }

  async setNx(key: string, value: string, ttlSeconds?: number): Promise<boolean> {
    const payload = serializeForRedis(value);
    const response = ttlSeconds
      ? await this.redis.set(key, payload, "EX", ttlSeconds, "NX")
      : await this.redis.set(key, payload, "NX");
    return response === "OK";
  }

  async incr(key: string, ttlSeconds?: number): Promise<number> {
    const value = await this.redis.incr(key);
    if (ttlSeconds) {
      await this.redis.expire(key, ttlSeconds);
    }
    return value;
  }

  async del(key: string): Promise<void> {
    await this.redis.del(key);
  }
}

const RELEASE_SCRIPT = `if redis.call("get", KEYS[1]) == ARGV[1] then return redis.call("del", KEYS[1]) else return 0 end`;

export class RedisLockManager implements ILockManager {
  constructor(private readonly redis: Redis, private readonly retries = 20, private readonly retryDelayMs = 25) {}

  async withLock<T>(key: string, ttlMs: number, fn: () => Promise<T>): Promise<T> {
    const token = randomUUID();
    for (let attempt = 0; ; attempt++) {
      const acquired = await this.redis.set(key, token, "PX", ttlMs, "NX");
      if (acquired) break;
      if (attempt >= this.retries) {
        throw new Error(`Failed to acquire lock for ${key}`);
      }
      await new Promise((resolve) => setTimeout(resolve, this.retryDelayMs));
    }

    try {
      return await fn();
    } finally {
      await this.redis.eval(RELEASE_SCRIPT, 1, key, token);
    }
  }
}

export interface RedisModuleOptions {
  url?: string;
  keyPrefix?: string;
}

export const redisModuleOptionsToken = Symbol("REDIS_MODULE_OPTIONS");

@Global()
@Module({
  imports: [ConfigModule.forRoot({ isGlobal: true })],
  providers: [
    {
      provide: REDIS_CLIENT,
      inject: [ConfigService, LOGGER, redisModuleOptionsToken],
      useFactory: (config: ConfigService, logger: ILogger, options?: RedisModuleOptions) => {
        const url = options?.url ?? config.get<string>("REDIS_URL") ?? "redis://localhost:6379";
        const client = new Redis(url, {
          keyPrefix: options?.keyPrefix ?? config.get<string>("REDIS_KEY_PREFIX") ?? "wh:",
        });
        client.on("error", (err: Error) => {
          logger.error("redis.connection.error", { err: err.message });
        });
        return client;
      },
    },
    {
      provide: KEY_VALUE_STORE,
      inject: [REDIS_CLIENT],
      useFactory: (redis: Redis) => new RedisKeyValueStore(redis),
    },
    {
      provide: LOCK_MANAGER,
      inject: [REDIS_CLIENT],
      useFactory: (redis: Redis) => new RedisLockManager(redis),
    },
  ],
  exports: [REDIS_CLIENT, KEY_VALUE_STORE, LOCK_MANAGER],
})
export class RedisModule {
  static forRoot(options?: RedisModuleOptions) {
    return {
      module: RedisModule,
      providers: [
        {
          provide: redisModuleOptionsToken,
          useValue: options ?? {},
        },
      ],
      exports: [redisModuleOptionsToken],
    };
  }
}
