import { z } from "zod";
import type { ChartData, GameInfo, PlayerStats } from "@/lib/domain/types";

const GameInfoSchema: z.ZodType<GameInfo> = z.object({
  gameId: z.string(),
  game_date: z.string(),
  teams: z.array(z.string()),
});

const PlayerStatsSchema: z.ZodType<PlayerStats> = z.object({
  gameId: z.string(),
  teamId: z.number(),
  teamName: z.string(),
  teamTricode: z.string(),
  personId: z.number(),
  personName: z.string(),
  position: z.string(),
  minutes: z.string(),
  points: z.number(),
  rebounds: z.number(),
  assists: z.number(),
  steals: z.number(),
  blocks: z.number(),
  turnovers: z.number(),
  true_shooting: z.number(),
  efficiency: z.number(),
  plusMinus: z.number(),
});

const ChartDataSchema: z.ZodType<ChartData> = z.object({
  labels: z.array(z.string()),
  datasets: z.object({
    points: z.array(z.number()),
    true_shooting: z.array(z.number()),
    momentum: z.array(z.number()),
  }),
});

const ErrorBodySchema = z.object({ detail: z.string() });

async function getJson<T>(url: string, schema: z.ZodType<T>, action: string): Promise<T> {
  const res = await fetch(url);
  const text = await res.text();
  if (!res.ok) {
    let detail: string | undefined;
    try {
      const parsed = ErrorBodySchema.safeParse(JSON.parse(text));
      if (parsed.success) detail = parsed.data.detail;
    } catch {
      detail = undefined; // plain-text body from a 500
    }
    throw new Error(detail ?? `Failed to ${action} (${res.status})`);
  }
  return schema.parse(JSON.parse(text));
}

export function fetchGames(base: string): Promise<GameInfo[]> {
  return getJson(`${base}/games`, z.array(GameInfoSchema), "list games");
}

export function fetchGamePlayers(base: string, gameId: string): Promise<PlayerStats[]> {
  return getJson(`${base}/game/${encodeURIComponent(gameId)}/players`, z.array(PlayerStatsSchema), "load players");
}

export function fetchGameCharts(base: string, gameId: string): Promise<ChartData> {
  return getJson(`${base}/game/${encodeURIComponent(gameId)}/charts`, ChartDataSchema, "load charts");
}
