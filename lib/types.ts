export const FORFEIT_SENTINEL = "DEFAULT";

export interface Team {
  name: string;
  player1: string;
  player2: string;
  points: number;
}

export interface Game {
  matchId: string;
  gameId: string;
  matchDate: string;
  teamA: Team;
  teamB: Team;
}

export interface GameRecord {
  match_id: string;
  game_id: string;
  match_date: string;
  team1_name: string;
  team2_name: string;
  partner1: string;
  partner2: string;
  opponent1: string;
  opponent2: string;
  team1_points: string;
  team2_points: string;
}

export type SkipReason = "forfeit" | "unparseable_score";

export interface SkippedRecord {
  rowNumber: number;
  matchId: string;
  gameId: string;
  reason: SkipReason;
}

export type WinnerContext = "favored" | "underdog" | "tossup";
export type FavorednessLevel = "slight" | "heavy";
export type MarginClass = "narrow" | "solid" | "blowout";

export interface SkillEstimate {
  mu: number;
  sigma: number;
}

export interface Composition {
  winners: [string, string];
  losers: [string, string];
}

export interface PartnershipGame {
  won: boolean;
  scoreDiff: number;
  opponents: [string, string];
}

export interface PartnershipRecord {
  key: string;
  player1: string;
  player2: string;
  team: string;
  games: PartnershipGame[];
  wins: number;
  losses: number;
}

export interface SynergyResult {
  partnership: string;
  player1: string;
  player2: string;
  team: string;
  synergyScore: number;
  winRate: number;
  gamesPlayed: number;
  avgScoreDiff: number;
  individualStrength: number;
}

export interface RankedRating {
  rank: number;
  player: string;
  rating: number;
}

export interface RankedEstimate {
  rank: number;
  player: string;
  team: string;
  skill: number;
  mu: number;
  sigma: number;
}
