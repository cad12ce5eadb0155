import type { INestApplication, Type } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { Test } from "@nestjs/testing";
import type { TestingModuleBuilder } from "@nestjs/testing";
import { EnvGameConfigService, GAME_CONFIG_SERVICE } from "@wagerhouse/core-config";
import { DB_CLIENT } from "@wagerhouse/core-db";
import type { PgDbClient } from "@wagerhouse/core-db";
import { LOGGER } from "@wagerhouse/core-logging";
import { METRICS } from "@wagerhouse/core-metrics";
import { KEY_VALUE_STORE, LOCK_MANAGER, REDIS_CLIENT } from "@wagerhouse/core-redis";
import { WALLET } from "@wagerhouse/core-wallet";
import type { IWalletPort } from "@wagerhouse/core-wallet";
import type { AccountId } from "@wagerhouse/core-types";
import type { HouseTable } from "@wagerhouse/core-house";
import { ENTROPY_SOURCE_FACTORY, HOUSE_TABLE } from "@wagerhouse/game-core";
import { InMemoryLockManager, InMemoryLogger, InMemoryStore, RecordingMetrics, ScriptedEntropy, createDbClient } from "./test-helpers";

export const TEST_OWNER = "owner";

export interface GameTestHarness {
  app: INestApplication;
  table: HouseTable;
  wallet: IWalletPort;
  entropy: ScriptedEntropy;
  kvStore: InMemoryStore;
  dbClient: PgDbClient;
  logger: InMemoryLogger;
  metrics: RecordingMetrics;
  fund(accountId: AccountId, amount: bigint): Promise<void>;
  close(): Promise<void>;
}

export interface GameTestHarnessOptions {
  appModule: Type<unknown>;
  /** Configuration the game reads instead of the process environment. */
  config?: Record<string, string>;
  /** Shares state with an earlier harness, e.g. to test a restart. */
  kvStore?: InMemoryStore;
  /** Pre-loaded entropy, for apps that draw while booting. */
  entropy?: ScriptedEntropy;
  customize?: (builder: TestingModuleBuilder) => TestingModuleBuilder;
}

/**
 * Boots a game app with every outside dependency replaced by an in-process
 * stand-in: key/value store, locks, Postgres (pg-mem), logger, metrics and
 * the entropy source.
 */
export async function createGameTestHarness(options: GameTestHarnessOptions): Promise<GameTestHarness> {
  const kvStore = options.kvStore ?? new InMemoryStore();
  const dbClient = createDbClient();
  const logger = new InMemoryLogger();
  const metrics = new RecordingMetrics();
  const entropy = options.entropy ?? new ScriptedEntropy();
  const gameConfig = new EnvGameConfigService(new ConfigService({ HOUSE_OWNER_ID: TEST_OWNER, ...options.config }));

  let builder = Test.createTestingModule({ imports: [options.appModule] })
    .overrideProvider(REDIS_CLIENT)
    .useValue({})
    .overrideProvider(KEY_VALUE_STORE)
    .useValue(kvStore)
    .overrideProvider(LOCK_MANAGER)
    .useValue(new InMemoryLockManager())
    .overrideProvider(DB_CLIENT)
    .useValue(dbClient)
    .overrideProvider(LOGGER)
    .useValue(logger)
    .overrideProvider(METRICS)
    .useValue(metrics)
    .overrideProvider(GAME_CONFIG_SERVICE)
    .useValue(gameConfig)
    .overrideProvider(ENTROPY_SOURCE_FACTORY)
    .useValue(() => entropy);
  if (options.customize) {
    builder = options.customize(builder);
  }

  const moduleRef = await builder.compile();
  const app = moduleRef.createNestApplication({ logger: false });
  await app.init();

  const wallet = app.get<IWalletPort>(WALLET);
  return {
    app,
    table: app.get<HouseTable>(HOUSE_TABLE),
    wallet,
    entropy,
    kvStore,
    dbClient,
    logger,
    metrics,
    fund: (accountId, amount) => wallet.credit(accountId, amount, { reason: "FUNDING" }),
    close: async () => {
      await app.close();
      await dbClient.close();
    },
  };
}
