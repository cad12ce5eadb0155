import {
  ArgumentsHost,
  BadRequestException,
  Body,
  Catch,
  Controller,
  DynamicModule,
  ExceptionFilter,
  Get,
  Inject,
  Injectable,
  Module,
  Post,
  Query,
  ValidationPipe,
} from "@nestjs/common";
import type { ValidationError } from "@nestjs/common";
import { ConfigModule, ConfigService } from "@nestjs/config";
import { APP_FILTER, APP_INTERCEPTOR } from "@nestjs/core";
import type { Response } from "express";
import { Type } from "class-transformer";
import { IsInt, IsOptional, IsString, Matches, Max, Min } from "class-validator";
import { Auth, AuthModule } from "@wagerhouse/core-auth";
import type { AuthContext } from "@wagerhouse/core-auth";
import { EnvGameConfigService, GAME_CONFIG_SERVICE } from "@wagerhouse/core-config";
import type { IGameConfigService } from "@wagerhouse/core-config";
import { DbModule, DB_CLIENT } from "@wagerhouse/core-db";
import type { DbModuleOptions, IDbClient } from "@wagerhouse/core-db";
import { ENTROPY_INPUTS, EntropySource, SystemEntropyInputs } from "@wagerhouse/core-entropy";
import type { EntropyInputs, EntropyState, IEntropySource } from "@wagerhouse/core-entropy";
import { HOUSE_ERROR_HTTP_STATUS, HouseError, HouseErrorCode, houseErrorPayload } from "@wagerhouse/core-errors";
import { BET_HISTORY_REPOSITORY, BetHistoryRepository } from "@wagerhouse/core-game-history";
import type { BetRecord, IBetHistoryRepository } from "@wagerhouse/core-game-history";
import { HOUSE_STATE_STORE, HouseTable, KvHouseStateStore } from "@wagerhouse/core-house";
import type { BetOutcome, BetRequest, IHouseStateStore, OutcomeEngine } from "@wagerhouse/core-house";
import { IDEMPOTENCY_STORE, RedisIdempotencyStore } from "@wagerhouse/core-idempotency";
import type { IIdempotencyStore } from "@wagerhouse/core-idempotency";
import { TRANSFER_JOURNAL, TransferJournalRepository } from "@wagerhouse/core-ledger";
import type { ITransferJournal, TransferRecord } from "@wagerhouse/core-ledger";
import { CorrelationIdInterceptor, LOGGER, LoggingModule } from "@wagerhouse/core-logging";
import type { ILogger } from "@wagerhouse/core-logging";
import { METRICS, MetricsModule } from "@wagerhouse/core-metrics";
import type { IMetrics } from "@wagerhouse/core-metrics";
import { KEY_VALUE_STORE, LOCK_MANAGER, RedisModule } from "@wagerhouse/core-redis";
import type { IKeyValueStore, ILockManager, RedisModuleOptions } from "@wagerhouse/core-redis";
import type { BankrollView, GameName } from "@wagerhouse/core-types";
import { WALLET, createWallet } from "@wagerhouse/core-wallet";
import type { IWalletPort } from "@wagerhouse/core-wallet";

export const HOUSE_TABLE = Symbol("HOUSE_TABLE");
export const GAME_NAME = Symbol("GAME_NAME");
export const ENTROPY_SOURCE_FACTORY = Symbol("ENTROPY_SOURCE_FACTORY");

/** Builds the table's entropy source, resuming from checkpointed state when there is one. */
export type EntropySourceFactory = (state?: EntropyState) => IEntropySource;

export const AMOUNT_PATTERN = /^\d+$/;

/** Wire form of amounts: decimal strings, since bigint has no JSON encoding. */
export type Wire<T> = {
  [K in keyof T]: T[K] extends bigint ? string : T[K];
};

export function bankrollToWire(view: BankrollView): Wire<BankrollView> {
  return { held: view.held.toString(), pending: view.pending.toString(), available: view.available.toString() };
}

@Catch(HouseError)
export class HouseExceptionFilter implements ExceptionFilter<HouseError> {
  catch(exception: HouseError, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();
    response.status(HOUSE_ERROR_HTTP_STATUS[exception.code]).json(exception.toPayload());
  }
}

function validationPipe<T>(dto: new () => T, code: HouseErrorCode, message: string): ValidationPipe {
  return new ValidationPipe({
    expectedType: dto,
    whitelist: true,
    transform: true,
    exceptionFactory: (errors: ValidationError[]) =>
      new BadRequestException(
        houseErrorPayload(code, message, {
          fields: errors.flatMap((error) => Object.values(error.constraints ?? {})),
        })
      ),
  });
}

/**
 * Body validation against an explicit DTO class; failures come back in the
 * house error format under `code`.
 */
export function validateBody<T>(dto: new () => T, code: HouseErrorCode = HouseErrorCode.INVALID_BET): ValidationPipe {
  return validationPipe(dto, code, "Request body failed validation");
}

export function validateQuery<T>(dto: new () => T): ValidationPipe {
  return validationPipe(dto, HouseErrorCode.INVALID_QUERY, "Query parameters failed validation");
}

export class DepositDto {
  @IsString()
  @Matches(AMOUNT_PATTERN, { message: "amount must be a non-negative integer string" })
  amount!: string;
}

export class PageQueryDto {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(200)
  limit?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  offset?: number;
}

export interface BetRecordResponse {
  id: string;
  betAmount: string;
  payoutAmount: string;
  result: BetRecord["result"];
  nonce: number;
  roundId: number | null;
  meta: Record<string, unknown>;
  createdAt: string;
}

export interface TransferRecordResponse {
  id: string;
  fromAccount: string | null;
  toAccount: string;
  amount: string;
  reason: TransferRecord["reason"];
  createdAt: string;
}

export interface StatsResponse {
  totalBet: string;
  totalWon: string;
  totalLost: string;
  pendingPrize: string;
  globalTotalBet: string;
}

/** Routes every game shares: bankroll funding, claims, withdrawals and read models. */
export abstract class BankrollController {
  protected constructor(protected readonly table: HouseTable, protected readonly journal: ITransferJournal) {}

  @Post("deposit")
  async deposit(
    @Auth() ctx: AuthContext,
    @Body(validateBody(DepositDto, HouseErrorCode.INVALID_DEPOSIT)) dto: DepositDto
  ): Promise<Wire<BankrollView>> {
    return bankrollToWire(await this.table.deposit(ctx.userId, BigInt(dto.amount)));
  }

  @Post("claim")
  async claim(@Auth() ctx: AuthContext): Promise<{ amount: string }> {
    return { amount: (await this.table.claim(ctx.userId)).toString() };
  }

  @Post("withdraw")
  async withdraw(@Auth() ctx: AuthContext): Promise<{ amount: string }> {
    return { amount: (await this.table.withdraw(ctx.userId)).toString() };
  }

  @Get("bankroll")
  async bankroll(): Promise<Wire<BankrollView>> {
    return bankrollToWire(await this.table.bankroll());
  }

  @Get("stats")
  stats(@Auth() ctx: AuthContext): StatsResponse {
    const stats = this.table.userStats(ctx.userId);
    return {
      totalBet: stats.totalBet.toString(),
      totalWon: stats.totalWon.toString(),
      totalLost: stats.totalLost.toString(),
      pendingPrize: this.table.pendingOf(ctx.userId).toString(),
      globalTotalBet: this.table.globalTotalBet().toString(),
    };
  }

  @Get("history")
  async history(
    @Auth() ctx: AuthContext,
    @Query(validateQuery(PageQueryDto)) query: PageQueryDto
  ): Promise<BetRecordResponse[]> {
    const records = await this.table.history(ctx.userId, query.limit, query.offset);
    return records.map((record) => ({
      id: record.id,
      betAmount: record.betAmount.toString(),
      payoutAmount: record.payoutAmount.toString(),
      result: record.result,
      nonce: record.nonce,
      roundId: record.roundId,
      meta: record.meta,
      createdAt: record.createdAt.toISOString(),
    }));
  }

  /** Owner-only view of the house account's transfer journal. */
  @Get("transfers")
  async transfers(
    @Auth() ctx: AuthContext,
    @Query(validateQuery(PageQueryDto)) query: PageQueryDto
  ): Promise<TransferRecordResponse[]> {
    this.table.assertOwner(ctx.userId);
    const records = await this.journal.listForAccount(this.table.houseAccount, query.limit, query.offset);
    return records.map((record) => ({
      id: record.id,
      fromAccount: record.fromAccount,
      toAccount: record.toAccount,
      amount: record.amount.toString(),
      reason: record.reason,
      createdAt: record.createdAt.toISOString(),
    }));
  }
}

@Controller()
export class HealthController {
  @Get("health")
  health(): { status: string } {
    return { status: "ok" };
  }
}

export interface HouseBetParams<TInput, TMeta extends object, TResponse> {
  ctx: AuthContext;
  idempotencyKey: string;
  engine: OutcomeEngine<TInput, TMeta>;
  request: Omit<BetRequest<TInput>, "caller">;
  toResponse: (outcome: BetOutcome<TMeta>) => TResponse;
}

/** Places a bet on the table at most once per idempotency key. */
@Injectable()
export class HouseBetRunner {
  constructor(
    @Inject(HOUSE_TABLE) private readonly table: HouseTable,
    @Inject(IDEMPOTENCY_STORE) private readonly idempotency: IIdempotencyStore,
    @Inject(GAME_CONFIG_SERVICE) private readonly configService: IGameConfigService,
    @Inject(LOGGER) private readonly logger: ILogger,
    @Inject(METRICS) private readonly metrics: IMetrics
  ) {}

  run<TInput, TMeta extends object, TResponse>(params: HouseBetParams<TInput, TMeta, TResponse>): Promise<TResponse> {
    const { ctx, idempotencyKey } = params;
    const game = this.table.game;
    const ttl = this.configService.getConfig(game).idempotencyTtlSeconds;

    return this.idempotency.performOrGetCached(
      `${game}:${ctx.userId}:${idempotencyKey}`,
      ttl,
      async () => params.toResponse(await this.table.placeBet(params.engine, { ...params.request, caller: ctx.userId })),
      {
        onCached: () => {
          this.logger.info(`${game}.bet.idempotent.cached`, { game, userId: ctx.userId, idempotencyKey });
          this.metrics.increment("house_bets_replayed_total", { game });
        },
      }
    );
  }
}

export interface GameCoreModuleOptions {
  game: GameName;
  db?: DbModuleOptions;
  redis?: RedisModuleOptions;
}

@Module({})
export class GameCoreModule {
  static register(options: GameCoreModuleOptions): DynamicModule {
    return {
      module: GameCoreModule,
      imports: [
        ConfigModule.forRoot({ isGlobal: true }),
        DbModule.forRoot(options.db),
        RedisModule.forRoot(options.redis),
        AuthModule,
        LoggingModule,
        MetricsModule,
      ],
      controllers: [HealthController],
      providers: [
        HouseBetRunner,
        { provide: APP_INTERCEPTOR, useClass: CorrelationIdInterceptor },
        { provide: APP_FILTER, useClass: HouseExceptionFilter },
        { provide: GAME_NAME, useValue: options.game },
        {
          provide: GAME_CONFIG_SERVICE,
          inject: [ConfigService],
          useFactory: (config: ConfigService) => new EnvGameConfigService(config),
        },
        {
          provide: BET_HISTORY_REPOSITORY,
          inject: [DB_CLIENT],
          useFactory: (db: IDbClient) => new BetHistoryRepository(db),
        },
        {
          provide: TRANSFER_JOURNAL,
          inject: [DB_CLIENT],
          useFactory: (db: IDbClient) => new TransferJournalRepository(db),
        },
        {
          provide: WALLET,
          inject: [ConfigService, KEY_VALUE_STORE, LOCK_MANAGER, DB_CLIENT],
          useFactory: (config: ConfigService, store: IKeyValueStore, lock: ILockManager, db: IDbClient) =>
            createWallet(config.get<string>("WALLET_IMPL") ?? "kv", { store, lock, db }),
        },
        {
          provide: IDEMPOTENCY_STORE,
          inject: [KEY_VALUE_STORE],
          useFactory: (kv: IKeyValueStore) => new RedisIdempotencyStore(kv),
        },
        {
          provide: HOUSE_STATE_STORE,
          inject: [KEY_VALUE_STORE],
          useFactory: (kv: IKeyValueStore) => new KvHouseStateStore(kv),
        },
        {
          provide: ENTROPY_INPUTS,
          useFactory: (): EntropyInputs => new SystemEntropyInputs(),
        },
        {
          provide: ENTROPY_SOURCE_FACTORY,
          inject: [GAME_NAME, ENTROPY_INPUTS],
          useFactory:
            (game: GameName, inputs: EntropyInputs): EntropySourceFactory =>
            (state) =>
              new EntropySource(game, inputs, state),
        },
        {
          provide: HOUSE_TABLE,
          inject: [GAME_NAME, GAME_CONFIG_SERVICE, WALLET, ENTROPY_SOURCE_FACTORY, HOUSE_STATE_STORE, BET_HISTORY_REPOSITORY, LOGGER, METRICS],
          useFactory: (
            game: GameName,
            configService: IGameConfigService,
            wallet: IWalletPort,
            entropy: EntropySourceFactory,
            stateStore: IHouseStateStore,
            history: IBetHistoryRepository,
            logger: ILogger,
            metrics: IMetrics
          ) => {
            const config = configService.getConfig(game);
            return HouseTable.open({
              game,
              config,
              wallet,
              entropy,
              stateStore,
              history,
              logger,
              metrics,
            });
          },
        },
      ],
      exports: [
        HouseBetRunner,
        HOUSE_TABLE,
        GAME_NAME,
        GAME_CONFIG_SERVICE,
        BET_HISTORY_REPOSITORY,
        TRANSFER_JOURNAL,
        WALLET,
        IDEMPOTENCY_STORE,
        HOUSE_STATE_STORE,
        ENTROPY_INPUTS,
        ENTROPY_SOURCE_FACTORY,
      ],
    };
  }
}
