export type GameName = "wheel" | "coinflip" | "crash";

export const ALL_GAMES: GameName[] = ["wheel", "coinflip", "crash"];

export type BetResult = "WIN" | "LOSE";

/** Identity of a wallet account: a player, an owner or a game's house account. */
export type AccountId = string;

export interface BankrollView {
  held: bigint;
  pending: bigint;
  available: bigint;
}

export interface UserStats {
  totalBet: bigint;
  totalWon: bigint;
  totalLost: bigint;
}

export function isGameName(value: unknown): value is GameName {
  return ALL_GAMES.some((game) => game === value);
}
