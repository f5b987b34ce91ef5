import type { BoxScoreTable, ChartData, GameInfo, PlayerGameRow, PlayerStats } from "@/lib/domain/types";
import { efficiency, roundTo, trueShooting } from "@/lib/metrics/shooting";

export class GameNotFoundError extends Error {
  readonly gameId: string;

  constructor(gameId: string) {
    super("Game not found");
    this.name = "GameNotFoundError";
    this.gameId = gameId;
  }
}

// Only two-team games are expected; a lone team is shown by itself
function teamsLabel(rows: PlayerGameRow[]): string {
  const names: string[] = [];
  for (const r of rows) {
    if (!names.includes(r.teamName)) names.push(r.teamName);
  }
  return names.length > 1 ? `${names[0]} vs. ${names[1]}` : names[0] ?? "";
}

function rowsForGame(table: BoxScoreTable, gameId: string): PlayerGameRow[] {
  const id = String(gameId).trim();
  const rows = table.rows.filter((r) => r.gameId === id);
  if (rows.length === 0) throw new GameNotFoundError(id);
  return rows;
}

export function listGames(table: BoxScoreTable): GameInfo[] {
  const byGame = new Map<string, PlayerGameRow[]>();
  for (const r of table.rows) {
    const group = byGame.get(r.gameId);
    if (group) group.push(r);
    else byGame.set(r.gameId, [r]);
  }
  return Array.from(byGame.keys())
    .sort((a, b) => a.localeCompare(b, "en", { numeric: true }))
    .map((gameId) => {
      const rows = byGame.get(gameId) ?? [];
      return {
        gameId,
        game_date: rows[0]?.gameDate ?? "",
        teams: [teamsLabel(rows)],
      };
    });
}

export function getGamePlayers(table: BoxScoreTable, gameId: string): PlayerStats[] {
  return rowsForGame(table, gameId).map((r) => ({
    gameId: r.gameId,
    teamId: r.teamId,
    teamName: r.teamName,
    teamTricode: r.teamTricode,
    personId: r.personId,
    personName: r.personName,
    position: r.position,
    minutes: r.minutes,
    points: r.points,
    rebounds: r.reboundsTotal,
    assists: r.assists,
    steals: r.steals,
    blocks: r.blocks,
    turnovers: r.turnovers,
    true_shooting: roundTo(trueShooting(r), 3),
    efficiency: roundTo(efficiency(r), 2),
    plusMinus: r.plusMinusPoints,
  }));
}

export function getGameCharts(table: BoxScoreTable, gameId: string): ChartData {
  const rows = rowsForGame(table, gameId);
  return {
    labels: rows.map((r) => r.personName),
    datasets: {
      points: rows.map((r) => r.points),
      true_shooting: rows.map((r) => roundTo(trueShooting(r), 3)),
      momentum: rows.map((r) => r.plusMinusPoints),
    },
  };
}
