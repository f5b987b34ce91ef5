import type { PlayerGameRow } from "@/lib/domain/types";

/** True Shooting: PTS / (2 * (FGA + 0.44 * FTA)). 0 when no shots or free throws were taken. */
export function trueShooting(
  row: Pick<PlayerGameRow, "points" | "fieldGoalsAttempted" | "freeThrowsAttempted">
): number {
  const denom = 2 * (row.fieldGoalsAttempted + 0.44 * row.freeThrowsAttempted);
  return denom > 0 ? row.points / denom : 0;
}

/**
 * Simple efficiency rating: counting stats minus missed shots, missed free
 * throws and turnovers. Not clamped; bad nights go negative.
 */
export function efficiency(
  row: Pick<
    PlayerGameRow,
    | "points"
    | "reboundsTotal"
    | "assists"
    | "steals"
    | "blocks"
    | "fieldGoalsMade"
    | "fieldGoalsAttempted"
    | "freeThrowsMade"
    | "freeThrowsAttempted"
    | "turnovers"
  >
): number {
  const positive = row.points + row.reboundsTotal + row.assists + row.steals + row.blocks;
  const negative =
    row.fieldGoalsAttempted - row.fieldGoalsMade + (row.freeThrowsAttempted - row.freeThrowsMade) + row.turnovers;
  return positive - negative;
}

/**
 * Rounds the exact binary value of `value` to `digits` decimals, ties to even.
 * 0.3125 -> 0.312, while 0.0375 (stored just below the tie) -> 0.037.
 */
export function roundTo(value: number, digits: number): number {
  if (!Number.isFinite(value) || Math.abs(value) >= 1e21) return value;
  // toFixed(100) spells out the stored double exactly for any magnitude a stat line produces
  const [intPart, fracPart = ""] = Math.abs(value).toFixed(100).split(".");
  const kept = fracPart.slice(0, digits);
  const rest = fracPart.slice(digits);
  let scaled = BigInt(intPart + kept);

  const head = rest.charAt(0);
  const tail = rest.slice(1);
  const roundUp =
    head > "5" ||
    (head === "5" && (/[1-9]/.test(tail) || scaled % BigInt(2) === BigInt(1)));
  if (roundUp) scaled += BigInt(1);

  if (scaled === BigInt(0)) return 0;
  const rounded = Number(scaled) / 10 ** digits;
  return value < 0 ? -rounded : rounded;
}
