import { z } from "zod";

export const DEFAULT_CORS_ORIGIN = "*";

const OriginSchema = z
  .string()
  .optional()
  .transform((v) => (v === undefined || v.trim() === "" ? DEFAULT_CORS_ORIGIN : v.trim()));

// Kept free of node-only imports: middleware runs on the edge runtime
export function corsOriginFromEnv(env: Record<string, string | undefined> = process.env): string {
  return OriginSchema.parse(env.CORS_ALLOW_ORIGIN);
}

export function corsHeaders(origin: string): Record<string, string> {
  return {
    "Access-Control-Allow-Origin": origin,
    "Access-Control-Allow-Methods": "GET, OPTIONS",
    "Access-Control-Allow-Headers": "*",
  };
}
