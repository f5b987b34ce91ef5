import { describe, it, expect } from "vitest";
import path from "path";
import { loadConfig } from "@/lib/config";

describe("config", () => {
  it("defaults to the bundled dataset under the working directory", () => {
    expect(loadConfig({}, "/srv/app").dataPath).toBe(path.resolve("/srv/app", "data", "box_scores.csv"));
  });

  it("resolves a configured path against the working directory", () => {
    expect(loadConfig({ BOX_SCORES_PATH: "fixtures/games.csv" }, "/srv/app").dataPath).toBe(
      path.resolve("/srv/app", "fixtures/games.csv")
    );
    expect(loadConfig({ BOX_SCORES_PATH: "/data/games.csv" }, "/srv/app").dataPath).toBe(path.resolve("/data/games.csv"));
  });

  it("treats an empty value as unset", () => {
    expect(loadConfig({ BOX_SCORES_PATH: " " }, "/srv/app").dataPath).toBe(path.resolve("/srv/app", "data", "box_scores.csv"));
  });
});
