import { readFile } from "node:fs/promises";
import { parse } from "csv-parse/sync";
import { ZodError } from "zod";
import { buildGameStore } from "./games";
import { describeZodError, seedRatingRowSchema } from "./schemas";

export function parseCsvRecords(text: string): unknown[] {
  const rows: unknown = parse(text, {
    columns: true,
    bom: true,
    trim: true,
    skip_empty_lines: true
  });

  if (!Array.isArray(rows)) {
    throw new Error("CSV input did not produce a list of records");
  }

  return rows;
}

export function parseGameCsv(text: string) {
  return buildGameStore(parseCsvRecords(text));
}

export async function loadGameCsv(path: string) {
  return parseGameCsv(await readFile(path, "utf-8"));
}

export function parseSeedRatings(text: string) {
  const ratings = new Map<string, number>();

  parseCsvRecords(text).forEach((record, index) => {
    try {
      const row = seedRatingRowSchema.parse(record);
      ratings.set(row.Player, row.Rating);
    } catch (error) {
      if (error instanceof ZodError) {
        throw new Error(`Seed ratings row ${index + 2}: ${describeZodError(error)}`);
      }

      throw error;
    }
  });

  return ratings;
}

export async function loadSeedRatings(path: string) {
  return parseSeedRatings(await readFile(path, "utf-8"));
}
