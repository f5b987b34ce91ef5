import { readFileSync } from "fs";
import type { BoxScoreTable, PlayerGameRow } from "@/lib/domain/types";
import { parseCsvText } from "./parse";
import { BOX_SCORE_ALIASES, BoxScoreCsvSchema, REQUIRED_COLUMNS } from "./schemas";

export class BoxScoreLoadError extends Error {
  readonly issues: { row: number; message: string }[];

  constructor(message: string, issues: { row: number; message: string }[] = []) {
    super(message);
    this.name = "BoxScoreLoadError";
    this.issues = issues;
  }
}

/**
 * Parses box-score CSV text into immutable rows.
 *
 * Malformed counting stats read as 0. Anything else wrong with the file
 * (missing columns, bad identifiers, ragged rows, duplicate player-game keys)
 * rejects the whole file.
 */
export function parseBoxScoreCsv(text: string, source = "<inline>"): BoxScoreTable {
  const rep = parseCsvText(text, BoxScoreCsvSchema, BOX_SCORE_ALIASES);

  const present = new Set(rep.headers.map((h) => BOX_SCORE_ALIASES[h.toLowerCase()]).filter(Boolean));
  const missing = REQUIRED_COLUMNS.filter((c) => !present.has(c));
  if (missing.length > 0) {
    throw new BoxScoreLoadError(`${source}: missing required columns: ${missing.join(", ")}`);
  }

  if (rep.errors.length > 0) {
    const first = rep.errors[0];
    throw new BoxScoreLoadError(
      `${source}: ${rep.errors.length} malformed row(s), first at row ${first.row}: ${first.message}`,
      rep.errors
    );
  }

  const seen = new Map<string, number>();
  const dupes: { row: number; message: string }[] = [];
  rep.rows.forEach((r, idx) => {
    const key = `${r.gameId}|${r.personId}`;
    const prev = seen.get(key);
    if (prev !== undefined) {
      dupes.push({ row: idx + 1, message: `duplicate of row ${prev} (gameId=${r.gameId}, personId=${r.personId})` });
      return;
    }
    seen.set(key, idx + 1);
  });
  if (dupes.length > 0) {
    throw new BoxScoreLoadError(`${source}: ${dupes.length} duplicate player-game row(s)`, dupes);
  }

  const rows: PlayerGameRow[] = rep.rows.map((r) => Object.freeze({ ...r }));
  return {
    rows: Object.freeze(rows),
    source,
    unknownColumns: rep.unknownColumns,
  };
}

export function loadBoxScores(path: string): BoxScoreTable {
  let text: string;
  try {
    text = readFileSync(path, "utf8");
  } catch (e) {
    throw new BoxScoreLoadError(`${path}: ${e instanceof Error ? e.message : String(e)}`);
  }
  const table = parseBoxScoreCsv(text, path);
  if (table.unknownColumns.length > 0) {
    console.warn("[boxscores] ignoring unknown columns:", table.unknownColumns.join(", "));
  }
  console.info(`[boxscores] loaded ${table.rows.length} rows from ${path}`);
  return table;
}
