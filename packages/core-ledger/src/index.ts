import { randomUUID } from "crypto";
import type { IDbClient } from "@wagerhouse/core-db";
import type { AccountId, GameName } from "@wagerhouse/core-types";

export type TransferReason = "DEPOSIT" | "STAKE" | "CLAIM" | "WITHDRAWAL" | "REFUND" | "FUNDING";

export interface TransferMeta {
  reason: TransferReason;
  game?: GameName;
  [key: string]: unknown;
}

/** One row of the append-only journal of native-asset movements. */
export interface TransferRecord {
  id: string;
  fromAccount: AccountId | null;
  toAccount: AccountId;
  amount: bigint;
  reason: TransferReason;
  game: GameName | null;
  createdAt: Date;
  meta: Record<string, unknown>;
}

export interface ITransferJournal {
  append(entry: Omit<TransferRecord, "id" | "createdAt">): Promise<TransferRecord>;
  listForAccount(accountId: AccountId, limit?: number, offset?: number): Promise<TransferRecord[]>;
}

export const TRANSFER_JOURNAL = Symbol("TRANSFER_JOURNAL");

export class TransferJournalRepository implements ITransferJournal {
  constructor(private readonly db: IDbClient) {}

  async append(entry: Omit<TransferRecord, "id" | "createdAt">): Promise<TransferRecord> {
    const rows = await this.db.query<Row>(
      `INSERT INTO wallet_transfers (id, from_account, to_account, amount, reason, game, meta)
       VALUES ($1,$2,$3,$4,$5,$6,$7)
       RETURNING *`,
      [
        randomUUID(),
        entry.fromAccount,
        entry.toAccount,
        entry.amount.toString(),
        entry.reason,
        entry.game,
        JSON.stringify(entry.meta ?? {}),
      ]
    );
    return mapRow(rows[0]);
  }

  async listForAccount(accountId: AccountId, limit = 100, offset = 0): Promise<TransferRecord[]> {
    const rows = await this.db.query<Row>(
      `SELECT * FROM wallet_transfers WHERE from_account = $1 OR to_account = $1 ORDER BY created_at DESC LIMIT ${Math.max(0, Math.floor(limit))} OFFSET ${Math.max(0, Math.floor(offset))}`,
      [accountId]
    );
    return rows.map(mapRow);
  }
}

interface Row {
  id: string;
  from_account: string | null;
  to_account: string;
  amount: string | number;
  reason: TransferReason;
  game: GameName | null;
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

function mapRow(row: Row): TransferRecord {
  return {
    id: row.id,
    fromAccount: row.from_account,
    toAccount: row.to_account,
    amount: BigInt(row.amount),
    reason: row.reason,
    game: row.game,
    createdAt: new Date(row.created_at),
    meta: parseMeta(row.meta),
  };
}
