import { z } from "zod";

const requiredField = z.string().trim().min(1);

export function cleanName(name: string) {
  return name.replace(/\s+/g, " ").replace(/\u200B/g, "").trim();
}

// Checked after cleaning so a slot of only whitespace or zero-width spaces is empty.
const playerField = z.string().transform(cleanName).pipe(z.string().min(1));

export const gameRecordSchema = z.object({
  match_id: requiredField,
  game_id: requiredField,
  match_date: requiredField,
  team1_name: z.string().default(""),
  team2_name: z.string().default(""),
  partner1: playerField,
  partner2: playerField,
  opponent1: playerField,
  opponent2: playerField,
  team1_points: z.string(),
  team2_points: z.string()
});

const marginMultipliersSchema = z
  .object({
    narrow: z.number().nonnegative(),
    solid: z.number().nonnegative(),
    blowout: z.number().nonnegative()
  })
  .partial()
  .strict();

const levelMultipliersSchema = z
  .object({
    slight: marginMultipliersSchema,
    heavy: marginMultipliersSchema
  })
  .partial()
  .strict();

export const ratingPolicyFileSchema = z
  .object({
    defaultRating: z.number(),
    baseRatingDelta: z.number().nonnegative(),
    winningBonus: z.number().nonnegative(),
    tossupThreshold: z.number().nonnegative(),
    slightThreshold: z.number().nonnegative(),
    blowoutMargin: z.number().int().positive(),
    narrowMargin: z.number().int().nonnegative(),
    fallbackMultiplier: z.number().nonnegative(),
    multipliers: z
      .object({
        underdog: levelMultipliersSchema,
        favored: levelMultipliersSchema,
        tossup: marginMultipliersSchema
      })
      .partial()
      .strict()
  })
  .partial()
  .strict();

export type RatingPolicyFile = z.infer<typeof ratingPolicyFileSchema>;

export const seedRatingRowSchema = z.object({
  Player: requiredField,
  Rating: z.coerce.number().finite()
});

export const minGamesSchema = z.coerce.number().int().min(1);

export const strengthSourceSchema = z.enum(["trueskill", "contextual"]);

export type StrengthSource = z.infer<typeof strengthSourceSchema>;

export function describeZodError(error: z.ZodError) {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}
