import { randomUUID } from "crypto";
import type { IDbClient, SqlParam } from "@wagerhouse/core-db";
import type { AccountId, BetResult, GameName } from "@wagerhouse/core-types";

export interface BetRecord {
  id: string;
  game: GameName;
  userId: AccountId;
  betAmount: bigint;
  payoutAmount: bigint;
  result: BetResult;
  nonce: number;
  roundId: number | null;
  createdAt: Date;
  meta: Record<string, unknown>;
}

export interface IBetHistoryRepository {
  append(entry: Omit<BetRecord, "id" | "createdAt">): Promise<BetRecord>;
  listForUser(userId: AccountId, game?: GameName, limit?: number, offset?: number): Promise<BetRecord[]>;
}

export const BET_HISTORY_REPOSITORY = Symbol("BET_HISTORY_REPOSITORY");

export class BetHistoryRepository implements IBetHistoryRepository {
  constructor(private readonly db: IDbClient) {}

  async append(entry: Omit<BetRecord, "id" | "createdAt">): Promise<BetRecord> {
    const rows = await this.db.query<Row>(
      `INSERT INTO bet_history (id, game, user_id, bet_amount, payout_amount, result, nonce, round_id, meta)
       VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9)
       RETURNING *`,
      [
        randomUUID(),
        entry.game,
        entry.userId,
        entry.betAmount.toString(),
        entry.payoutAmount.toString(),
        entry.result,
        entry.nonce,
        entry.roundId,
        JSON.stringify(entry.meta, (_key, value: unknown) => (typeof value === "bigint" ? value.toString() : value)),
      ]
    );
    return mapRow(rows[0]);
  }

  async listForUser(userId: AccountId, game?: GameName, limit = 50, offset = 0): Promise<BetRecord[]> {
    const params: SqlParam[] = [userId];
    let sql = `SELECT * FROM bet_history WHERE user_id = $1`;
    if (game) {
      params.push(game);
      sql += ` AND game = $${params.length}`;
    }
    sql += ` ORDER BY created_at DESC LIMIT ${pageBound(limit)} OFFSET ${pageBound(offset)}`;
    const rows = await this.db.query<Row>(sql, params);
    return rows.map(mapRow);
  }
}

function pageBound(value: number): number {
  return Number.isFinite(value) ? Math.max(0, Math.floor(value)) : 0;
}

interface Row {
  id: string;
  game: GameName;
  user_id: string;
  bet_amount: string | number;
  payout_amount: string | number;
  result: BetResult;
  nonce: number;
  round_id: number | null;
  created_at: string | Date;
  meta: string | Record<string, unknown> | null;
}

function parseMeta(raw: Row["meta"]): Record<string, unknown> {
  if (!raw) return {};
  if (typeof raw === "string") {
    const parsed: unknown = JSON.parse(raw);
    return parsed && typeof parsed === "object" ? { ...parsed } : {};
  }
  return raw;
}

function mapRow(row: Row): BetRecord {
  return {
    id: row.id,
    game: row.game,
    userId: row.user_id,
    betAmount: BigInt(row.bet_amount),
    payoutAmount: BigInt(row.payout_amount),
    result: row.result,
    nonce: row.nonce,
    roundId: row.round_id,
    createdAt: new Date(row.created_at),
    meta: parseMeta(row.meta),
  };
}
