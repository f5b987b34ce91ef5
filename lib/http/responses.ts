import { GameNotFoundError } from "@/lib/games/queries";

export function errorResponse(e: unknown, route: string): Response {
  if (e instanceof GameNotFoundError) {
    return Response.json({ detail: e.message }, { status: 404 });
  }
  const message = e instanceof Error ? e.message : String(e);
  console.error(`[${route}]`, message);
  return new Response(message, { status: 500 });
}
