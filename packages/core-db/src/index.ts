import { Global, Module } from "@nestjs/common";
import { ConfigModule, ConfigService } from "@nestjs/config";
import { Pool, PoolClient } from "pg";

export type SqlParam = string | number | boolean | Date | null;

export interface IDbClient {
  query<T = Record<string, unknown>>(sql: string, params?: SqlParam[]): Promise<T[]>;
  transaction<T>(fn: (tx: IDbClient) => Promise<T>): Promise<T>;
}

export const DB_CLIENT = Symbol("DB_CLIENT");

/** Transaction-scoped client; the outer client owns BEGIN/COMMIT. */
class PgTransactionClient implements IDbClient {
  constructor(private readonly client: PoolClient) {}

  async query<T = Record<string, unknown>>(sql: string, params: SqlParam[] = []): Promise<T[]> {
    const result = await this.client.query(sql, params);
    return result.rows as T[];
  }

  async transaction<T>(): Promise<T> {
    throw new Error("Nested transactions are not supported");
  }
}

export class PgDbClient implements IDbClient {
  constructor(private readonly pool: Pool) {}

  async query<T = Record<string, unknown>>(sql: string, params: SqlParam[] = []): Promise<T[]> {
    const result = await this.pool.query(sql, params);
    return result.rows as T[];
  }

  async transaction<T>(fn: (tx: IDbClient) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
      const result = await fn(new PgTransactionClient(client));
      await client.query("COMMIT");
      return result;
    } catch (err) {
      await client.query("ROLLBACK");
      throw err;
    } finally {
      client.release();
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}

export interface DbModuleOptions {
  connectionString?: string;
  maxConnections?: number;
}

export const dbModuleOptionsToken = Symbol("DB_MODULE_OPTIONS");

@Global()
@Module({
  imports: [ConfigModule.forRoot({ isGlobal: true })],
  providers: [
    {
      provide: DB_CLIENT,
      inject: [ConfigService, dbModuleOptionsToken],
      useFactory: (config: ConfigService, options?: DbModuleOptions) => {
        const connectionString = options?.connectionString ?? config.get<string>("DATABASE_URL");
        if (!connectionString) {
          throw new Error("DATABASE_URL is not configured");
        }
        const pool = new Pool({
          connectionString,
          max: options?.maxConnections ?? (Number(config.get("DB_MAX_CONNECTIONS")) || 10),
        });
        return new PgDbClient(pool);
      },
    },
  ],
  exports: [DB_CLIENT],
})
export class DbModule {
  static forRoot(options?: DbModuleOptions) {
    return {
      module: DbModule,
      providers: [
        {
          provide: dbModuleOptionsToken,
          useValue: options ?? {},
        },
      ],
    };
  }
}
