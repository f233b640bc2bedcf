import { gameWinner, hasValidPoints, isForfeit, sortChronologically, teamPlayers } from "./games";
import { logRatingEvent, summarizeGame } from "./ratingDebug";
import { DEFAULT_RATING_POLICY, lookupMultiplier } from "./ratingPolicy";
import type { RatingPolicy } from "./ratingPolicy";
import type { FavorednessLevel, Game, MarginClass, RankedRating, WinnerContext } from "./types";

interface RatingUpdateInput {
  ratingsById: Record<string, number>;
  teamA: [string, string];
  teamB: [string, string];
  scoreA: number;
  scoreB: number;
  policy?: RatingPolicy;
}

export interface Favoredness {
  context: WinnerContext;
  level: FavorednessLevel | null;
  favoredTeam: "A" | "B" | null;
}

export interface RatingDiagnostics extends Favoredness {
  teamRatingA: number;
  teamRatingB: number;
  ratingDiff: number;
  marginClass: MarginClass;
  multiplier: number;
  delta: number;
}

interface RatingUpdateResult {
  deltasById: Record<string, number>;
  newRatingsById: Record<string, number>;
  diagnostics: RatingDiagnostics;
}

export interface GameRatingUpdate extends RatingUpdateResult {
  game: Game;
  preRatingsById: Record<string, number>;
}

export interface RatingPassResult {
  ratings: Map<string, number>;
  updates: GameRatingUpdate[];
  skippedGames: number;
}

export function calculateContextualRatingUpdate(input: RatingUpdateInput): RatingUpdateResult {
  const policy = input.policy ?? DEFAULT_RATING_POLICY;
  const players = [...input.teamA, ...input.teamB];
  assertDistinctPlayers(players);

  if (input.scoreA === input.scoreB) {
    throw new Error("Rating update requires a decisive score");
  }

  const teamRatingA = average(input.teamA.map((id) => getRating(input.ratingsById, id)));
  const teamRatingB = average(input.teamB.map((id) => getRating(input.ratingsById, id)));
  const teamAWon = input.scoreA > input.scoreB;
  const ratingDiff = Math.abs(teamRatingA - teamRatingB);

  const favoredness = classifyFavoredness(teamRatingA, teamRatingB, teamAWon, policy);
  const marginClass = classifyMargin(Math.abs(input.scoreA - input.scoreB), policy);
  const multiplier = lookupMultiplier(policy, favoredness.context, favoredness.level, marginClass);
  const delta = (policy.baseRatingDelta * multiplier) / 2;

  const winners = teamAWon ? input.teamA : input.teamB;
  const losers = teamAWon ? input.teamB : input.teamA;

  const deltasById: Record<string, number> = {};
  for (const id of winners) {
    deltasById[id] = delta + policy.winningBonus;
  }
  for (const id of losers) {
    deltasById[id] = -delta;
  }

  const newRatingsById: Record<string, number> = {};
  for (const id of players) {
    newRatingsById[id] = getRating(input.ratingsById, id) + deltasById[id];
  }

  return {
    deltasById,
    newRatingsById,
    diagnostics: {
      ...favoredness,
      teamRatingA,
      teamRatingB,
      ratingDiff,
      marginClass,
      multiplier,
      delta
    }
  };
}

export function classifyFavoredness(
  teamRatingA: number,
  teamRatingB: number,
  teamAWon: boolean,
  policy: RatingPolicy = DEFAULT_RATING_POLICY
): Favoredness {
  const ratingDiff = Math.abs(teamRatingA - teamRatingB);
  if (ratingDiff < policy.tossupThreshold) {
    return { context: "tossup", level: null, favoredTeam: null };
  }

  const favoredTeam = teamRatingA > teamRatingB ? "A" : "B";
  const winnerWasFavored = (favoredTeam === "A") === teamAWon;

  return {
    context: winnerWasFavored ? "favored" : "underdog",
    level: ratingDiff < policy.slightThreshold ? "slight" : "heavy",
    favoredTeam
  };
}

export function classifyMargin(margin: number, policy: RatingPolicy = DEFAULT_RATING_POLICY): MarginClass {
  if (margin >= policy.blowoutMargin) {
    return "blowout";
  }

  if (margin >= policy.narrowMargin) {
    return "solid";
  }

  return "narrow";
}

/**
 * Player ratings for one rating pass. Unknown players are created on first
 * lookup with the configured default; ratings are never removed.
 */
export class RatingStore {
  private readonly ratings = new Map<string, number>();

  constructor(
    readonly defaultRating: number,
    seed: Iterable<[string, number]> = []
  ) {
    for (const [playerId, rating] of seed) {
      this.ratings.set(playerId, rating);
    }
  }

  getOrInsertDefault(playerId: string) {
    const existing = this.ratings.get(playerId);
    if (existing !== undefined) {
      return existing;
    }

    this.ratings.set(playerId, this.defaultRating);
    return this.defaultRating;
  }

  get(playerId: string) {
    return this.ratings.get(playerId);
  }

  commit(newRatingsById: Record<string, number>) {
    for (const [playerId, rating] of Object.entries(newRatingsById)) {
      this.ratings.set(playerId, rating);
    }
  }

  snapshot() {
    return new Map(this.ratings);
  }

  get size() {
    return this.ratings.size;
  }
}

export class ContextualRatingEngine {
  readonly store: RatingStore;

  constructor(
    readonly policy: RatingPolicy = DEFAULT_RATING_POLICY,
    seedRatings: Iterable<[string, number]> = []
  ) {
    this.store = new RatingStore(policy.defaultRating, seedRatings);
  }

  applyGame(game: Game): GameRatingUpdate | null {
    if (isForfeit(game)) {
      logRatingEvent("game_skipped", { reason: "forfeit", game: summarizeGame(game) });
      return null;
    }

    if (!hasValidPoints(game)) {
      logRatingEvent("game_skipped", { reason: "unparseable_score", game: summarizeGame(game) });
      return null;
    }

    const teamA = teamPlayers(game.teamA);
    const teamB = teamPlayers(game.teamB);
    assertDistinctPlayers([...teamA, ...teamB]);

    const preRatingsById: Record<string, number> = {};
    for (const id of [...teamA, ...teamB]) {
      preRatingsById[id] = this.store.getOrInsertDefault(id);
    }

    const result = calculateContextualRatingUpdate({
      ratingsById: preRatingsById,
      teamA,
      teamB,
      scoreA: game.teamA.points,
      scoreB: game.teamB.points,
      policy: this.policy
    });

    this.store.commit(result.newRatingsById);

    logRatingEvent("game_rated", {
      game: summarizeGame(game),
      winner: gameWinner(game).name,
      context: result.diagnostics.context,
      level: result.diagnostics.level,
      marginClass: result.diagnostics.marginClass,
      multiplier: result.diagnostics.multiplier,
      deltasById: result.deltasById
    });

    return { ...result, game, preRatingsById };
  }

  run(games: readonly Game[]): RatingPassResult {
    const updates: GameRatingUpdate[] = [];
    let skippedGames = 0;

    for (const game of sortChronologically(games)) {
      const update = this.applyGame(game);
      if (update) {
        updates.push(update);
      } else {
        skippedGames += 1;
      }
    }

    return { ratings: this.store.snapshot(), updates, skippedGames };
  }
}

export function runRatingPass(
  games: readonly Game[],
  {
    policy = DEFAULT_RATING_POLICY,
    seedRatings = []
  }: {
    policy?: RatingPolicy;
    seedRatings?: Iterable<[string, number]>;
  } = {}
) {
  return new ContextualRatingEngine(policy, seedRatings).run(games);
}

export function rankRatings(ratings: ReadonlyMap<string, number>): RankedRating[] {
  return [...ratings.entries()]
    .sort(([playerA, ratingA], [playerB, ratingB]) => {
      if (ratingB !== ratingA) {
        return ratingB - ratingA;
      }

      return playerA.localeCompare(playerB);
    })
    .map(([player, rating], index) => ({ rank: index + 1, player, rating }));
}

function average(values: number[]) {
  if (values.length === 0) {
    return 0;
  }

  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

function getRating(ratingsById: Record<string, number>, playerId: string) {
  const value = Number(ratingsById[playerId]);
  if (!Number.isFinite(value)) {
    throw new Error(`Missing rating for player ${playerId}`);
  }

  return value;
}

function assertDistinctPlayers(players: string[]) {
  if (new Set(players).size !== 4) {
    throw new Error("Doubles rating update requires 4 distinct players");
  }
}
