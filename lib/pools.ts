import { isForfeit, teamPlayers } from "./games";
import type { Game } from "./types";

/**
 * Undirected "played with or against" graph over player ids, kept as a
 * union-find forest plus the set of distinct edges seen.
 */
export class PoolGraph {
  private readonly parent = new Map<string, string>();
  private readonly size = new Map<string, number>();
  private readonly edges = new Set<string>();

  addPlayer(playerId: string) {
    if (!this.parent.has(playerId)) {
      this.parent.set(playerId, playerId);
      this.size.set(playerId, 1);
    }
  }

  addEdge(a: string, b: string) {
    this.addPlayer(a);
    this.addPlayer(b);
    this.edges.add(JSON.stringify([a, b].sort()));
    this.union(a, b);
  }

  get playerCount() {
    return this.parent.size;
  }

  get edgeCount() {
    return this.edges.size;
  }

  components() {
    const groups = new Map<string, string[]>();
    for (const playerId of this.parent.keys()) {
      const root = this.find(playerId);
      const members = groups.get(root) ?? [];
      members.push(playerId);
      groups.set(root, members);
    }

    return [...groups.values()]
      .map((members) => members.sort((a, b) => a.localeCompare(b)))
      .sort((a, b) => {
        if (b.length !== a.length) {
          return b.length - a.length;
        }

        return a[0].localeCompare(b[0]);
      });
  }

  private find(playerId: string): string {
    let root = playerId;
    let next = this.parent.get(root);
    while (next !== undefined && next !== root) {
      root = next;
      next = this.parent.get(root);
    }

    // Path compression.
    let current = playerId;
    while (current !== root) {
      const up = this.parent.get(current);
      this.parent.set(current, root);
      if (up === undefined) {
        break;
      }
      current = up;
    }

    return root;
  }

  private union(a: string, b: string) {
    const rootA = this.find(a);
    const rootB = this.find(b);
    if (rootA === rootB) {
      return;
    }

    const sizeA = this.size.get(rootA) ?? 1;
    const sizeB = this.size.get(rootB) ?? 1;
    const [larger, smaller] = sizeA >= sizeB ? [rootA, rootB] : [rootB, rootA];
    this.parent.set(smaller, larger);
    this.size.set(larger, sizeA + sizeB);
  }
}

export function buildPoolGraph(games: readonly Game[]) {
  const graph = new PoolGraph();

  for (const game of games) {
    if (isForfeit(game)) {
      continue;
    }

    const [a1, a2] = teamPlayers(game.teamA);
    const [b1, b2] = teamPlayers(game.teamB);

    graph.addEdge(a1, a2);
    graph.addEdge(b1, b2);
    for (const player of [a1, a2]) {
      for (const opponent of [b1, b2]) {
        graph.addEdge(player, opponent);
      }
    }
  }

  return graph;
}

export function findPlayerPools(games: readonly Game[]) {
  return buildPoolGraph(games).components();
}
