import { getBoxScoreTable } from "@/lib/games/store";
import { listGames } from "@/lib/games/queries";
import { errorResponse } from "@/lib/http/responses";

export async function GET() {
  try {
    return Response.json(listGames(getBoxScoreTable()));
  } catch (e) {
    return errorResponse(e, "games");
  }
}
export const dynamic = "force-dynamic";
export const runtime = "nodejs";
