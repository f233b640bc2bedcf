import { stringify } from "csv-stringify/sync";
import type { GameRatingUpdate } from "./rating";
import type { RankedEstimate, RankedRating, SynergyResult } from "./types";

export function formatRatingsCsv(ranked: RankedRating[]) {
  return stringify([
    ["Rank", "Player", "Rating"],
    ...ranked.map((row) => [String(row.rank), row.player, row.rating.toFixed(2)])
  ]);
}

export function formatEstimatesCsv(ranked: RankedEstimate[]) {
  return stringify([
    ["Rank", "Player", "Team", "Skill", "Mu", "Sigma"],
    ...ranked.map((row) => [
      String(row.rank),
      row.player,
      row.team,
      row.skill.toFixed(2),
      row.mu.toFixed(2),
      row.sigma.toFixed(2)
    ])
  ]);
}

export function formatSynergyCsv(results: SynergyResult[]) {
  return stringify([
    [
      "Rank",
      "Partnership",
      "Player1",
      "Player2",
      "Team",
      "Synergy_Score",
      "Win_Rate",
      "Games",
      "Individual_Strength"
    ],
    ...results.map((row, index) => [
      String(index + 1),
      row.partnership,
      row.player1,
      row.player2,
      row.team,
      row.synergyScore.toFixed(2),
      row.winRate.toFixed(2),
      String(row.gamesPlayed),
      row.individualStrength.toFixed(2)
    ])
  ]);
}

export function formatPoolReport(pools: string[][]) {
  const lines = [`Found ${pools.length} disconnected player pools.`];

  pools.forEach((pool, index) => {
    lines.push(`Pool ${index + 1} — ${pool.length} players: ${pool.join(", ")}`);
  });

  return lines.join("\n");
}

export function describeRatingUpdate(update: GameRatingUpdate) {
  const { game, diagnostics, preRatingsById, newRatingsById } = update;
  const teamA = `${game.teamA.player1}/${game.teamA.player2}`;
  const teamB = `${game.teamB.player1}/${game.teamB.player2}`;
  const winners = game.teamA.points > game.teamB.points ? teamA : teamB;

  const lines = [
    `Match ${game.matchId} game ${game.gameId} (${game.matchDate}): ${teamA} (${game.teamA.points}) vs ${teamB} (${game.teamB.points})`,
    `${teamA} avg rating: ${diagnostics.teamRatingA.toFixed(2)}, ${teamB} avg rating: ${diagnostics.teamRatingB.toFixed(2)}`,
    `Winners: ${winners}, rating difference: ${diagnostics.ratingDiff.toFixed(2)}`
  ];

  if (diagnostics.context === "tossup") {
    lines.push("Match context: tossup");
  } else {
    const favored = diagnostics.favoredTeam === "A" ? teamA : teamB;
    lines.push(`Favored team: ${favored} (${diagnostics.level}), winning team was ${diagnostics.context}`);
  }

  lines.push(
    `Result margin: ${diagnostics.marginClass}, multiplier ${diagnostics.multiplier}, change per player ${diagnostics.delta.toFixed(3)}`
  );

  for (const [playerId, rating] of Object.entries(newRatingsById)) {
    lines.push(`  ${playerId}: ${preRatingsById[playerId].toFixed(3)} -> ${rating.toFixed(3)}`);
  }

  return lines.join("\n");
}
