import { describe, it, expect } from "vitest";
import { NextRequest } from "next/server";
import { GET as getGames } from "@/app/games/route";
import { GET as getPlayers } from "@/app/game/[gameId]/players/route";
import { GET as getCharts } from "@/app/game/[gameId]/charts/route";

const req = (url: string) => new NextRequest(new URL(url, "http://localhost"));

describe("box score routes", () => {
  it("GET /games lists the bundled games", async () => {
    const res = await getGames();
    expect(res.status).toBe(200);
    const body = await res.json();
    expect(body.map((g: { gameId: string }) => g.gameId)).toEqual(["0022400101", "0022400115"]);
  });

  it("GET /game/:id/players returns enriched rows", async () => {
    const res = await getPlayers(req("/game/0022400115/players"), { params: { gameId: "0022400115" } });
    expect(res.status).toBe(200);
    const body = await res.json();
    expect(body.length).toBe(3);
    expect(body[0].personName).toBe("Noah Lindqvist");
    expect(body[0].true_shooting).toBe(0.598);
    expect(body[0].efficiency).toBe(16);
  });

  it("GET /game/:id/charts returns chart series", async () => {
    const res = await getCharts(req("/game/0022400101/charts"), { params: { gameId: "0022400101" } });
    expect(res.status).toBe(200);
    const body = await res.json();
    expect(body.labels[0]).toBe("Marcus Vale");
    expect(body.datasets.momentum).toEqual([8, 5, 0, -6, -9, -2]);
  });

  it("answers 404 for unknown games", async () => {
    const players = await getPlayers(req("/game/nope/players"), { params: { gameId: "nope" } });
    expect(players.status).toBe(404);
    expect(await players.json()).toEqual({ detail: "Game not found" });

    const charts = await getCharts(req("/game/nope/charts"), { params: { gameId: "nope" } });
    expect(charts.status).toBe(404);
    expect(await charts.json()).toEqual({ detail: "Game not found" });
  });
});
