import { gameLoser, gameWinner, hasValidPoints, isForfeit, teamPlayers } from "./games";
import type { Game, PartnershipRecord, SkillEstimate, SynergyResult, Team } from "./types";

export const DEFAULT_MIN_GAMES = 2;

// Logistic scale for the expected-result model, in strength units.
const EXPECTATION_SCALE = 10;

// Player ids may contain any character, so the sorted pair is JSON-encoded.
export function partnershipKey(a: string, b: string) {
  return JSON.stringify([a, b].sort());
}

export function buildPartnershipRecords(games: readonly Game[]) {
  const records = new Map<string, PartnershipRecord>();

  for (const game of games) {
    if (isForfeit(game) || !hasValidPoints(game)) {
      continue;
    }

    const winner = gameWinner(game);
    const loser = gameLoser(game);
    const margin = Math.abs(game.teamA.points - game.teamB.points);

    recordPartnershipGame(records, winner, loser, true, margin);
    recordPartnershipGame(records, loser, winner, false, -margin);
  }

  return records;
}

export function expectedResult(teamStrength: number, opponentStrength: number) {
  return 1 / (1 + 10 ** ((opponentStrength - teamStrength) / EXPECTATION_SCALE));
}

export function computeSynergy(
  records: ReadonlyMap<string, PartnershipRecord>,
  strengths: ReadonlyMap<string, number>,
  { minGames = DEFAULT_MIN_GAMES }: { minGames?: number } = {}
): SynergyResult[] {
  const results: SynergyResult[] = [];

  for (const record of records.values()) {
    if (record.games.length < minGames) {
      continue;
    }

    const teamStrength = getStrength(strengths, record.player1) + getStrength(strengths, record.player2);

    let totalPerformance = 0;
    let totalScoreDiff = 0;
    for (const game of record.games) {
      const [opponent1, opponent2] = game.opponents;
      const opponentStrength = getStrength(strengths, opponent1) + getStrength(strengths, opponent2);
      const actual = game.won ? 1 : 0;
      totalPerformance += actual - expectedResult(teamStrength, opponentStrength);
      totalScoreDiff += game.scoreDiff;
    }

    const gamesPlayed = record.games.length;

    results.push({
      partnership: `${record.player1} + ${record.player2}`,
      player1: record.player1,
      player2: record.player2,
      team: record.team,
      synergyScore: (totalPerformance / gamesPlayed) * 100,
      winRate: record.wins / (record.wins + record.losses),
      gamesPlayed,
      avgScoreDiff: totalScoreDiff / gamesPlayed,
      individualStrength: teamStrength
    });
  }

  return results.sort((a, b) => {
    if (b.synergyScore !== a.synergyScore) {
      return b.synergyScore - a.synergyScore;
    }

    return a.partnership.localeCompare(b.partnership);
  });
}

export function strengthsFromRatings(ratings: ReadonlyMap<string, number>) {
  return new Map(ratings);
}

export function strengthsFromEstimates(estimates: ReadonlyMap<string, SkillEstimate>) {
  return new Map([...estimates].map(([player, estimate]): [string, number] => [player, estimate.mu]));
}

function recordPartnershipGame(
  records: Map<string, PartnershipRecord>,
  team: Team,
  opponents: Team,
  won: boolean,
  scoreDiff: number
) {
  const [player1, player2] = teamPlayers(team).sort();
  const key = partnershipKey(player1, player2);
  const [opponent1, opponent2] = teamPlayers(opponents).sort();

  let record = records.get(key);
  if (!record) {
    record = { key, player1, player2, team: team.name, games: [], wins: 0, losses: 0 };
    records.set(key, record);
  }

  if (team.name) {
    record.team = team.name;
  }

  record.games.push({ won, scoreDiff, opponents: [opponent1, opponent2] });
  if (won) {
    record.wins += 1;
  } else {
    record.losses += 1;
  }
}

function getStrength(strengths: ReadonlyMap<string, number>, playerId: string) {
  const value = strengths.get(playerId);
  if (value === undefined || !Number.isFinite(value)) {
    throw new Error(`Missing skill strength for player ${playerId}`);
  }

  return value;
}
