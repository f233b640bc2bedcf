#!/usr/bin/env node
import { Command, InvalidArgumentError } from "commander";
import { renderContextualRanking, renderPools, renderSynergy, renderTrueSkillRanking } from "../lib/commands";
import { loadSeedRatings } from "../lib/csv";
import { DEFAULT_RATING_POLICY, loadRatingPolicy } from "../lib/ratingPolicy";
import { minGamesSchema, strengthSourceSchema } from "../lib/schemas";
import type { StrengthSource } from "../lib/schemas";
import { loadGameStore } from "../lib/sources";

function parsePositiveNumber(value: string) {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive number.");
  }

  return parsed;
}

function parseMinGames(value: string) {
  const parsed = minGamesSchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidArgumentError("Expected an integer of at least 1.");
  }

  return parsed.data;
}

function parseStrengthSource(value: string): StrengthSource {
  const parsed = strengthSourceSchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidArgumentError("Expected trueskill or contextual.");
  }

  return parsed.data;
}

async function main() {
  const program = new Command();

  program
    .name("league-ratings")
    .description("Ratings, partnership synergy and pool checks for doubles league results")
    .showHelpAfterError();

  program
    .command("rank")
    .description("Contextual rating pass, printed as Rank,Player,Rating")
    .argument("<source>", "match CSV path, postgres:// URL, or db to use DATABASE_URL")
    .option("--seed <file>", "CSV of starting ratings with Player,Rating columns")
    .option("--policy <file>", "JSON rating policy overrides")
    .option("--explain", "print how each game moved the ratings", false)
    .action(async (source: string, options: { seed?: string; policy?: string; explain: boolean }) => {
      const { games } = await loadGameStore(source);
      const policy = options.policy ? loadRatingPolicy(options.policy) : DEFAULT_RATING_POLICY;
      const seedRatings = options.seed ? await loadSeedRatings(options.seed) : undefined;
      process.stdout.write(renderContextualRanking(games, { policy, seedRatings, explain: options.explain }));
    });

  program
    .command("rank-ts")
    .description("TrueSkill pass, printed as Rank,Player,Team,Skill,Mu,Sigma")
    .argument("<source>", "match CSV path, postgres:// URL, or db to use DATABASE_URL")
    .option("--sigma <n>", "initial uncertainty", parsePositiveNumber)
    .action(async (source: string, options: { sigma?: number }) => {
      const { games } = await loadGameStore(source);
      process.stdout.write(renderTrueSkillRanking(games, { sigma: options.sigma }));
    });

  program
    .command("synergy")
    .description("Partnership synergy ranking")
    .argument("<source>", "match CSV path, postgres:// URL, or db to use DATABASE_URL")
    .option("--strength <source>", "skill source: trueskill or contextual", parseStrengthSource, "trueskill")
    .option("--min-games <n>", "minimum games together", parseMinGames, 2)
    .option("--policy <file>", "JSON rating policy overrides for the contextual source")
    .option("--seed <file>", "CSV of starting ratings for the contextual source")
    .action(
      async (
        source: string,
        options: { strength: StrengthSource; minGames: number; policy?: string; seed?: string }
      ) => {
        const { games } = await loadGameStore(source);
        const policy = options.policy ? loadRatingPolicy(options.policy) : DEFAULT_RATING_POLICY;
        const seedRatings = options.seed ? await loadSeedRatings(options.seed) : undefined;
        process.stdout.write(
          renderSynergy(games, { strength: options.strength, minGames: options.minGames, policy, seedRatings })
        );
      }
    );

  program
    .command("pools")
    .description("Report disconnected pools of players")
    .argument("<source>", "match CSV path, postgres:// URL, or db to use DATABASE_URL")
    .action(async (source: string) => {
      const { games } = await loadGameStore(source);
      console.log(renderPools(games));
    });

  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`[league-ratings] ${message}`);
  process.exitCode = 1;
});
