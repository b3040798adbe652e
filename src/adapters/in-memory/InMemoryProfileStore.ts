/* eslint-disable functional/immutable-data */
import { DEFAULT_COLOR, DEFAULT_SHAPE } from "../../domain/entities/Player.js";
import type {
  PlayerProfile,
  ProfileChanges,
  ProfileStore,
  TournamentOutcome,
} from "../../domain/ports/ProfileStore.js";

function defaultProfile(username: string): PlayerProfile {
  return {
    username,
    color: DEFAULT_COLOR,
    shape: DEFAULT_SHAPE,
    wins: 0,
    losses: 0,
    totalGames: 0,
  };
}

export class InMemoryProfileStore implements ProfileStore {
  readonly #profiles = new Map<string, PlayerProfile>();

  async getProfile(username: string): Promise<PlayerProfile> {
    const stored = this.#profiles.get(username);
    return stored ? { ...stored } : defaultProfile(username);
  }

  async updateProfile(username: string, changes: ProfileChanges): Promise<PlayerProfile> {
    const current = await this.getProfile(username);
    const next: PlayerProfile = {
      ...current,
      color: changes.color ?? current.color,
      shape: changes.shape ?? current.shape,
    };
    this.#profiles.set(username, next);
    return { ...next };
  }

  async recordResult(username: string, outcome: TournamentOutcome): Promise<void> {
    const current = await this.getProfile(username);
    this.#profiles.set(username, {
      ...current,
      wins: current.wins + (outcome === "win" ? 1 : 0),
      losses: current.losses + (outcome === "loss" ? 1 : 0),
      totalGames: current.totalGames + 1,
    });
  }
}
