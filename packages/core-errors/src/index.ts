export enum HouseErrorCode {
  INVALID_BET = "INVALID_BET",
  INVALID_DEPOSIT = "INVALID_DEPOSIT",
  INVALID_QUERY = "INVALID_QUERY",
  INSUFFICIENT_BANKROLL = "INSUFFICIENT_BANKROLL",
  PAYOUT_CAP_EXCEEDED = "PAYOUT_CAP_EXCEEDED",
  NOTHING_TO_CLAIM = "NOTHING_TO_CLAIM",
  NOT_OWNER = "NOT_OWNER",
  REENTRANCY = "REENTRANCY",
  BETTING_CLOSED = "BETTING_CLOSED",
  ROUND_STILL_OPEN = "ROUND_STILL_OPEN",
  INSUFFICIENT_FUNDS = "INSUFFICIENT_FUNDS",
  TRANSFER_FAILED = "TRANSFER_FAILED",
  LEDGER_INVARIANT = "LEDGER_INVARIANT",
  CHECKPOINT_FAILED = "CHECKPOINT_FAILED",
  AUTH_FAILED = "AUTH_FAILED",
  TOKEN_EXPIRED = "TOKEN_EXPIRED",
  IDEMPOTENCY_KEY_MISSING = "IDEMPOTENCY_KEY_MISSING",
  IDEMPOTENCY_IN_PROGRESS = "IDEMPOTENCY_IN_PROGRESS",
}

export interface HouseErrorPayload {
  error: HouseErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export class HouseError extends Error {
  constructor(public readonly code: HouseErrorCode, message: string, public readonly details?: Record<string, unknown>) {
    super(message);
    this.name = "HouseError";
  }

  toPayload(): HouseErrorPayload {
    return houseErrorPayload(this.code, this.message, this.details);
  }
}

export function houseErrorPayload(code: HouseErrorCode, message: string, details?: Record<string, unknown>): HouseErrorPayload {
  return { error: code, message, details };
}

export function isHouseError(err: unknown, code?: HouseErrorCode): err is HouseError {
  return err instanceof HouseError && (code === undefined || err.code === code);
}

// Consumed by the HTTP layer; the core itself never deals in status codes.
export const HOUSE_ERROR_HTTP_STATUS: Record<HouseErrorCode, number> = {
  [HouseErrorCode.INVALID_BET]: 400,
  [HouseErrorCode.INVALID_DEPOSIT]: 400,
  [HouseErrorCode.INVALID_QUERY]: 400,
  [HouseErrorCode.IDEMPOTENCY_KEY_MISSING]: 400,
  [HouseErrorCode.AUTH_FAILED]: 401,
  [HouseErrorCode.TOKEN_EXPIRED]: 401,
  [HouseErrorCode.NOT_OWNER]: 403,
  [HouseErrorCode.NOTHING_TO_CLAIM]: 404,
  [HouseErrorCode.BETTING_CLOSED]: 409,
  [HouseErrorCode.ROUND_STILL_OPEN]: 409,
  [HouseErrorCode.REENTRANCY]: 409,
  [HouseErrorCode.IDEMPOTENCY_IN_PROGRESS]: 409,
  [HouseErrorCode.INSUFFICIENT_BANKROLL]: 422,
  [HouseErrorCode.PAYOUT_CAP_EXCEEDED]: 422,
  [HouseErrorCode.INSUFFICIENT_FUNDS]: 422,
  [HouseErrorCode.TRANSFER_FAILED]: 500,
  [HouseErrorCode.LEDGER_INVARIANT]: 500,
  [HouseErrorCode.CHECKPOINT_FAILED]: 503,
};
