import Papa from "papaparse";
import { z } from "zod";

export type ParseReport<T> = {
  rows: T[];
  errors: { row: number; message: string }[];
  headers: string[];
  unknownColumns: string[];
};

// CSV text parser with header aliasing + row validation
export function parseCsvText<S extends z.ZodTypeAny>(
  text: string,
  schema: S,
  aliases: Record<string, string>
): ParseReport<z.infer<S>> {
  const rows: z.infer<S>[] = [];
  const errors: { row: number; message: string }[] = [];

  const result = Papa.parse<Record<string, unknown>>(text, {
    header: true,
    dynamicTyping: false,
    skipEmptyLines: true,
    transformHeader: (h) => h.trim(),
  });

  // Structural problems (unbalanced quotes, ragged rows) are reported per data row
  for (const err of result.errors) {
    errors.push({ row: (err.row ?? -1) + 1, message: `${err.code}: ${err.message}` });
  }

  const headers = result.meta.fields ?? [];
  const unknownColumns = headers.filter((h) => !(h.toLowerCase() in aliases));

  result.data.forEach((raw, idx) => {
    // Map aliases → canonical keys
    const mapped: Record<string, unknown> = {};
    for (const [key, val] of Object.entries(raw)) {
      const target = aliases[key.trim().toLowerCase()];
      if (!target) continue;
      mapped[target] = val;
    }

    const parsed = schema.safeParse(mapped);
    if (parsed.success) {
      rows.push(parsed.data);
    } else {
      const msg = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
      errors.push({ row: idx + 1, message: msg });
    }
  });

  return {
    rows,
    errors,
    headers,
    unknownColumns,
  };
}
