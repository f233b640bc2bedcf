import { readFileSync } from "node:fs";
import { ZodError } from "zod";
import { describeZodError, ratingPolicyFileSchema } from "./schemas";
import type { RatingPolicyFile } from "./schemas";
import type { FavorednessLevel, MarginClass, WinnerContext } from "./types";

export type MarginMultipliers = Partial<Record<MarginClass, number>>;
export type LevelMultipliers = Partial<Record<FavorednessLevel, MarginMultipliers>>;

export interface MultiplierTable {
  underdog: LevelMultipliers;
  favored: LevelMultipliers;
  tossup: MarginMultipliers;
}

export interface RatingPolicy {
  defaultRating: number;
  // Scales every multiplier in the table.
  baseRatingDelta: number;
  winningBonus: number;
  tossupThreshold: number;
  slightThreshold: number;
  blowoutMargin: number;
  narrowMargin: number;
  fallbackMultiplier: number;
  multipliers: MultiplierTable;
}

export const DEFAULT_RATING_POLICY: RatingPolicy = {
  defaultRating: 3.5,
  baseRatingDelta: 0.0035,
  winningBonus: 0,
  tossupThreshold: 0.1,
  slightThreshold: 0.2,
  blowoutMargin: 12,
  narrowMargin: 3,
  fallbackMultiplier: 10,
  multipliers: {
    underdog: {
      heavy: { narrow: 25, solid: 30, blowout: 35 },
      slight: { narrow: 18, solid: 22, blowout: 26 }
    },
    tossup: { narrow: 12, solid: 15, blowout: 18 },
    favored: {
      slight: { narrow: 8, solid: 10, blowout: 12 },
      heavy: { narrow: 3, solid: 5, blowout: 7 }
    }
  }
};

export function lookupMultiplier(
  policy: RatingPolicy,
  context: WinnerContext,
  level: FavorednessLevel | null,
  margin: MarginClass
) {
  const value =
    context === "tossup"
      ? policy.multipliers.tossup[margin]
      : level
        ? policy.multipliers[context][level]?.[margin]
        : undefined;

  return value ?? policy.fallbackMultiplier;
}

export function mergeRatingPolicy(overrides: RatingPolicyFile, base: RatingPolicy = DEFAULT_RATING_POLICY): RatingPolicy {
  const { multipliers, ...scalars } = overrides;
  const merged: RatingPolicy = {
    ...base,
    ...scalars,
    multipliers: {
      underdog: mergeLevels(base.multipliers.underdog, multipliers?.underdog),
      favored: mergeLevels(base.multipliers.favored, multipliers?.favored),
      tossup: { ...base.multipliers.tossup, ...multipliers?.tossup }
    }
  };

  if (merged.tossupThreshold > merged.slightThreshold) {
    throw new Error("tossupThreshold must not exceed slightThreshold");
  }

  if (merged.narrowMargin > merged.blowoutMargin) {
    throw new Error("narrowMargin must not exceed blowoutMargin");
  }

  return merged;
}

export function parseRatingPolicy(raw: unknown, base: RatingPolicy = DEFAULT_RATING_POLICY) {
  try {
    return mergeRatingPolicy(ratingPolicyFileSchema.parse(raw), base);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new Error(`Invalid rating policy: ${describeZodError(error)}`);
    }

    throw error;
  }
}

export function loadRatingPolicy(path: string) {
  const text = readFileSync(path, "utf-8");
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    throw new Error(`Rating policy ${path} is not valid JSON`);
  }

  return parseRatingPolicy(raw);
}

function mergeLevels(base: LevelMultipliers, overrides: LevelMultipliers | undefined): LevelMultipliers {
  return {
    slight: { ...base.slight, ...overrides?.slight },
    heavy: { ...base.heavy, ...overrides?.heavy }
  };
}
