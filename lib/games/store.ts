import type { BoxScoreTable } from "@/lib/domain/types";
import { loadConfig } from "@/lib/config";
import { loadBoxScores } from "@/lib/ingest/boxscores";

// Next bundles instrumentation and route handlers separately; the table lives on
// globalThis so every bundle in the process shares the single startup load.
declare global {
  // eslint-disable-next-line no-var
  var __boxScoreTable: BoxScoreTable | undefined;
}

export function getBoxScoreTable(): BoxScoreTable {
  if (!globalThis.__boxScoreTable) {
    globalThis.__boxScoreTable = loadBoxScores(loadConfig().dataPath);
  }
  return globalThis.__boxScoreTable;
}
