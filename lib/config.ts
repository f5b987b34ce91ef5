import path from "path";
import { z } from "zod";

export const DEFAULT_DATA_FILE = path.join("data", "box_scores.csv");

const EnvSchema = z.object({
  BOX_SCORES_PATH: z
    .string()
    .optional()
    .transform((v) => (v === undefined || v.trim() === "" ? DEFAULT_DATA_FILE : v.trim())),
});

export type AppConfig = {
  dataPath: string;
};

export function loadConfig(env: Record<string, string | undefined> = process.env, cwd = process.cwd()): AppConfig {
  const parsed = EnvSchema.parse(env);
  return {
    dataPath: path.resolve(cwd, parsed.BOX_SCORES_PATH),
  };
}
