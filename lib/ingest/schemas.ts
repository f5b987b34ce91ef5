import { z } from "zod";

// Helpers
const toStr = z
  .union([z.string(), z.number()])
  .transform((s) => String(s).trim())
  .pipe(z.string().min(1));

const toOptStr = z
  .union([z.string(), z.null(), z.undefined()])
  .transform((v) => (v === null || v === undefined ? "" : v.trim()));

// Plain decimal text only; hex/binary/octal literals and "Infinity" are not numbers here
const DECIMAL_RE = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

const toInt = z
  .union([
    z.number(),
    z
      .string()
      .trim()
      .min(1)
      .regex(DECIMAL_RE, "Expected a decimal number")
      .transform((s) => Number(s)),
  ])
  .pipe(z.number().int());

// Counting stats never reject: anything that is not a finite decimal number reads as 0
const toStat = z
  .unknown()
  .transform((v) => {
    if (typeof v === "number") return Number.isFinite(v) ? v : 0;
    if (typeof v !== "string") return 0;
    const s = v.trim();
    if (!DECIMAL_RE.test(s)) return 0;
    const n = Number(s);
    return Number.isFinite(n) ? n : 0;
  });

// Row schema for the box-score CSV after aliasing
export const BoxScoreCsvSchema = z.object({
  gameId: toStr,
  gameDate: toStr,
  teamId: toInt,
  teamName: toStr,
  teamTricode: toStr.transform((s) => s.toUpperCase()),
  personId: toInt,
  personName: toStr,
  position: toOptStr,
  minutes: toOptStr,
  fieldGoalsMade: toStat,
  fieldGoalsAttempted: toStat,
  threePointersMade: toStat,
  threePointersAttempted: toStat,
  freeThrowsMade: toStat,
  freeThrowsAttempted: toStat,
  reboundsOffensive: toStat,
  reboundsDefensive: toStat,
  reboundsTotal: toStat,
  assists: toStat,
  steals: toStat,
  blocks: toStat,
  turnovers: toStat,
  foulsPersonal: toStat,
  points: toStat,
  plusMinusPoints: toStat,
});

export type BoxScoreCsv = z.infer<typeof BoxScoreCsvSchema>;

export type BoxScoreKey = keyof BoxScoreCsv;

// Header aliases, keyed by lowercased header
export const BOX_SCORE_ALIASES: Record<string, BoxScoreKey> = {
  gameid: "gameId",
  game_id: "gameId",
  game_date: "gameDate",
  gamedate: "gameDate",
  date: "gameDate",
  teamid: "teamId",
  team_id: "teamId",
  teamname: "teamName",
  team_name: "teamName",
  teamtricode: "teamTricode",
  team_abbreviation: "teamTricode",
  personid: "personId",
  player_id: "personId",
  personname: "personName",
  player_name: "personName",
  position: "position",
  pos: "position",
  minutes: "minutes",
  min: "minutes",
  fieldgoalsmade: "fieldGoalsMade",
  fgm: "fieldGoalsMade",
  fieldgoalsattempted: "fieldGoalsAttempted",
  fga: "fieldGoalsAttempted",
  threepointersmade: "threePointersMade",
  fg3m: "threePointersMade",
  threepointersattempted: "threePointersAttempted",
  fg3a: "threePointersAttempted",
  freethrowsmade: "freeThrowsMade",
  ftm: "freeThrowsMade",
  freethrowsattempted: "freeThrowsAttempted",
  fta: "freeThrowsAttempted",
  reboundsoffensive: "reboundsOffensive",
  oreb: "reboundsOffensive",
  reboundsdefensive: "reboundsDefensive",
  dreb: "reboundsDefensive",
  reboundstotal: "reboundsTotal",
  reb: "reboundsTotal",
  assists: "assists",
  ast: "assists",
  steals: "steals",
  stl: "steals",
  blocks: "blocks",
  blk: "blocks",
  turnovers: "turnovers",
  to: "turnovers",
  tov: "turnovers",
  foulspersonal: "foulsPersonal",
  pf: "foulsPersonal",
  points: "points",
  pts: "points",
  plusminuspoints: "plusMinusPoints",
  plus_minus: "plusMinusPoints",
};

// Columns that must be present in the header; position and minutes may be absent
export const REQUIRED_COLUMNS: BoxScoreKey[] = Object.keys(BoxScoreCsvSchema.shape).filter(
  (k): k is BoxScoreKey => k !== "position" && k !== "minutes"
);
