import { firstTeamByPlayer } from "./games";
import { findPlayerPools } from "./pools";
import { rankRatings, runRatingPass } from "./rating";
import { DEFAULT_RATING_POLICY } from "./ratingPolicy";
import type { RatingPolicy } from "./ratingPolicy";
import {
  describeRatingUpdate,
  formatEstimatesCsv,
  formatPoolReport,
  formatRatingsCsv,
  formatSynergyCsv
} from "./report";
import type { StrengthSource } from "./schemas";
import { buildPartnershipRecords, computeSynergy, DEFAULT_MIN_GAMES, strengthsFromEstimates, strengthsFromRatings } from "./synergy";
import { rankEstimates, toCompositions, TrueSkillEstimator } from "./trueskill";
import type { SkillEstimator, TrueSkillOptions } from "./trueskill";
import type { Game } from "./types";

export function renderContextualRanking(
  games: readonly Game[],
  {
    policy = DEFAULT_RATING_POLICY,
    seedRatings = new Map<string, number>(),
    explain = false
  }: {
    policy?: RatingPolicy;
    seedRatings?: ReadonlyMap<string, number>;
    explain?: boolean;
  } = {}
) {
  const result = runRatingPass(games, { policy, seedRatings });
  const table = formatRatingsCsv(rankRatings(result.ratings));

  if (!explain) {
    return table;
  }

  const explanations = result.updates.map(describeRatingUpdate);
  return [...explanations, table].join("\n\n");
}

export function renderTrueSkillRanking(games: readonly Game[], options: TrueSkillOptions = {}) {
  const estimator = new TrueSkillEstimator(options);
  const estimates = estimator.estimate(toCompositions(games));
  const ranked = rankEstimates(estimates, {
    expose: (estimate) => estimator.expose(estimate),
    teamsByPlayer: firstTeamByPlayer(games)
  });
  return formatEstimatesCsv(ranked);
}

export function resolveStrengths(
  games: readonly Game[],
  source: StrengthSource,
  {
    policy = DEFAULT_RATING_POLICY,
    seedRatings = new Map<string, number>(),
    estimator = new TrueSkillEstimator()
  }: {
    policy?: RatingPolicy;
    seedRatings?: ReadonlyMap<string, number>;
    estimator?: SkillEstimator;
  } = {}
) {
  if (source === "contextual") {
    return strengthsFromRatings(runRatingPass(games, { policy, seedRatings }).ratings);
  }

  return strengthsFromEstimates(estimator.estimate(toCompositions(games)));
}

export function renderSynergy(
  games: readonly Game[],
  {
    strength = "trueskill",
    minGames = DEFAULT_MIN_GAMES,
    policy = DEFAULT_RATING_POLICY,
    seedRatings = new Map<string, number>()
  }: {
    strength?: StrengthSource;
    minGames?: number;
    policy?: RatingPolicy;
    seedRatings?: ReadonlyMap<string, number>;
  } = {}
) {
  const strengths = resolveStrengths(games, strength, { policy, seedRatings });
  const synergies = computeSynergy(buildPartnershipRecords(games), strengths, { minGames });
  return formatSynergyCsv(synergies);
}

export function renderPools(games: readonly Game[]) {
  return formatPoolReport(findPlayerPools(games));
}
