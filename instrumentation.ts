export async function register() {
  if (process.env.NEXT_RUNTIME !== "nodejs") return;
  const { getBoxScoreTable } = await import("./lib/games/store");
  try {
    getBoxScoreTable();
  } catch (e) {
    console.error("[boxscores] failed to load box scores:", e instanceof Error ? e.message : String(e));
    process.exit(1);
  }
}
