import { gameLoser, gameWinner, hasValidPoints, isForfeit, sortChronologically, teamPlayers } from "./games";
import type { Composition, Game, RankedEstimate, SkillEstimate } from "./types";

/**
 * A probabilistic skill estimator. Given chronologically ordered
 * compositions it returns a final (mu, sigma) per player.
 */
export interface SkillEstimator {
  estimate(compositions: readonly Composition[]): Map<string, SkillEstimate>;
}

export interface TrueSkillOptions {
  mu?: number;
  sigma?: number;
  beta?: number;
  tau?: number;
}

export const DEFAULT_MU = 25;
export const DEFAULT_SIGMA = DEFAULT_MU / 3;

// Lower bound on sigma^2 so a player never becomes fully certain.
const MIN_VARIANCE = 1e-6;

export function normPdf(x: number) {
  return Math.exp(-0.5 * x * x) / Math.sqrt(2 * Math.PI);
}

/**
 * Standard normal CDF, Abramowitz & Stegun 7.1.26.
 */
export function normCdf(x: number) {
  const a1 = 0.254829592;
  const a2 = -0.284496736;
  const a3 = 1.421413741;
  const a4 = -1.453152027;
  const a5 = 1.061405429;
  const p = 0.3275911;

  const sign = x < 0 ? -1 : 1;
  const z = Math.abs(x) / Math.SQRT2;
  const t = 1 / (1 + p * z);
  const y = 1 - ((((a5 * t + a4) * t + a3) * t + a2) * t + a1) * t * Math.exp(-z * z);

  return 0.5 * (1 + sign * y);
}

function vWin(t: number) {
  const denom = normCdf(t);
  if (denom < 1e-10) {
    return -t;
  }

  return normPdf(t) / denom;
}

function wWin(t: number) {
  const v = vWin(t);
  return v * (v + t);
}

/**
 * Two-team TrueSkill with no draws, applied game by game.
 */
export class TrueSkillEstimator implements SkillEstimator {
  readonly mu: number;
  readonly sigma: number;
  readonly beta: number;
  readonly tau: number;

  constructor(options: TrueSkillOptions = {}) {
    this.mu = options.mu ?? DEFAULT_MU;
    this.sigma = options.sigma ?? DEFAULT_SIGMA;
    this.beta = options.beta ?? this.sigma / 2;
    this.tau = options.tau ?? 0;

    if (this.sigma <= 0 || this.beta <= 0 || this.tau < 0) {
      throw new Error("TrueSkill sigma and beta must be positive and tau non-negative");
    }
  }

  estimate(compositions: readonly Composition[]) {
    const ratings = new Map<string, SkillEstimate>();

    for (const composition of compositions) {
      const updated = this.rateGame(
        composition.winners.map((id) => this.current(ratings, id)),
        composition.losers.map((id) => this.current(ratings, id))
      );

      composition.winners.forEach((id, index) => ratings.set(id, updated.winners[index]));
      composition.losers.forEach((id, index) => ratings.set(id, updated.losers[index]));
    }

    return ratings;
  }

  /**
   * Conservative skill, mu - k * sigma with k = initial mu / initial sigma,
   * so a player with no games exposes 0.
   */
  expose(estimate: SkillEstimate) {
    return estimate.mu - (this.mu / this.sigma) * estimate.sigma;
  }

  private current(ratings: Map<string, SkillEstimate>, playerId: string): SkillEstimate {
    const rating = ratings.get(playerId) ?? { mu: this.mu, sigma: this.sigma };
    return { mu: rating.mu, sigma: Math.sqrt(rating.sigma * rating.sigma + this.tau * this.tau) };
  }

  private rateGame(winners: SkillEstimate[], losers: SkillEstimate[]) {
    const players = [...winners, ...losers];
    const c = Math.sqrt(
      players.reduce((sum, rating) => sum + rating.sigma * rating.sigma + this.beta * this.beta, 0)
    );
    const teamMu = (team: SkillEstimate[]) => team.reduce((sum, rating) => sum + rating.mu, 0);
    const t = (teamMu(winners) - teamMu(losers)) / c;
    const v = vWin(t);
    const w = wWin(t);

    const adjust = (rating: SkillEstimate, direction: 1 | -1): SkillEstimate => {
      const variance = rating.sigma * rating.sigma;
      const nextVariance = variance * (1 - (variance / (c * c)) * w);
      return {
        mu: rating.mu + direction * (variance / c) * v,
        sigma: Math.sqrt(Math.max(nextVariance, MIN_VARIANCE))
      };
    };

    return {
      winners: winners.map((rating) => adjust(rating, 1)),
      losers: losers.map((rating) => adjust(rating, -1))
    };
  }
}

export function toCompositions(games: readonly Game[]): Composition[] {
  return sortChronologically(games)
    .filter((game) => !isForfeit(game) && hasValidPoints(game))
    .map((game) => ({
      winners: teamPlayers(gameWinner(game)),
      losers: teamPlayers(gameLoser(game))
    }));
}

export const UNKNOWN_TEAM = "Unknown";

export function rankEstimates(
  estimates: ReadonlyMap<string, SkillEstimate>,
  {
    expose = (estimate: SkillEstimate) => estimate.mu,
    teamsByPlayer = new Map<string, string>()
  }: {
    expose?: (estimate: SkillEstimate) => number;
    teamsByPlayer?: ReadonlyMap<string, string>;
  } = {}
): RankedEstimate[] {
  return [...estimates.entries()]
    .sort(([playerA, a], [playerB, b]) => {
      if (b.mu !== a.mu) {
        return b.mu - a.mu;
      }

      return playerA.localeCompare(playerB);
    })
    .map(([player, estimate], index) => ({
      rank: index + 1,
      player,
      team: teamsByPlayer.get(player) ?? UNKNOWN_TEAM,
      skill: expose(estimate),
      mu: estimate.mu,
      sigma: estimate.sigma
    }));
}
