import type { GameNumber, PlayerHandle, RandomSource, TimePoint } from "../typedefs.js";

export const ALL_GAMES: readonly GameNumber[] = [1, 2, 3];

export function mulberry32(seed: number): RandomSource {
  return function mulberry32Generator() {
    let t = (seed += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function shuffle<T>(items: readonly T[], rng: RandomSource): T[] {
  const copy = [...items];
  for (let i = copy.length - 1; i > 0; i -= 1) {
    const j = Math.floor(rng() * (i + 1));
    if (j === i) continue;
    const moved = copy.splice(i, 1);
    const displaced = copy.splice(j, 1, ...moved);
    copy.splice(i, 0, ...displaced);
  }
  return copy;
}

// -----------------------------------------------------------------------------
//  Game rotation
// -----------------------------------------------------------------------------

/**
 * Games eligible for the next round: everything outside the last two entries of
 * the history, falling back to excluding only the last entry, then to all games.
 */
export function candidateGames<G extends number>(
  history: readonly G[],
  games: readonly G[],
): G[] {
  const lastTwo = history.slice(-2);
  const fresh = games.filter((game) => !lastTwo.includes(game));
  if (fresh.length > 0) return fresh;

  const last = history[history.length - 1];
  const notLast = games.filter((game) => game !== last);
  if (notLast.length > 0) return notLast;

  return [...games];
}

export function gameWeight<G extends number>(game: G, history: readonly G[]): number {
  if (!history.includes(game)) return 2.0;
  if (history.length >= 3 && !history.slice(-3).includes(game)) return 1.5;
  return 1.0;
}

export function gameWeights<G extends number>(
  history: readonly G[],
  games: readonly G[],
): Map<G, number> {
  return new Map(
    candidateGames(history, games).map((game) => [game, gameWeight(game, history)] as const),
  );
}

/** Weighted draw over the candidates, walked in the order `games` lists them. */
export function selectNextGame<G extends number>(
  history: readonly G[],
  random: RandomSource,
  games: readonly G[],
): G {
  const weights = [...gameWeights(history, games)];
  const total = weights.reduce((sum, [, weight]) => sum + weight, 0);
  const target = random() * total;

  let cumulative = 0;
  for (const [game, weight] of weights) {
    cumulative += weight;
    if (target < cumulative) return game;
  }

  const [lastGame] = weights[weights.length - 1] ?? [];
  if (lastGame === undefined) {
    throw new Error("No games to select from");
  }
  return lastGame;
}

// -----------------------------------------------------------------------------
//  Ranking
// -----------------------------------------------------------------------------

export interface Standing {
  readonly handle: PlayerHandle;
  readonly score: number;
  /** When the score last changed; players who never scored rank last on ties */
  readonly updatedAt: TimePoint | undefined;
}

export function compareStandings(a: Standing, b: Standing): number {
  if (a.score !== b.score) return b.score - a.score;

  const aAt = a.updatedAt ?? Number.POSITIVE_INFINITY;
  const bAt = b.updatedAt ?? Number.POSITIVE_INFINITY;
  if (aAt !== bAt) return aAt < bAt ? -1 : 1;

  if (a.handle === b.handle) return 0;
  return a.handle < b.handle ? -1 : 1;
}

export function rankStandings<T extends Standing>(standings: readonly T[]): T[] {
  return [...standings].sort(compareStandings);
}

/** Number of players that survive an elimination round of `total` players. */
export function advancementCut(total: number): number {
  if (total <= 1) return total;
  return Math.ceil(total / 2);
}
