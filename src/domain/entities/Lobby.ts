/* eslint-disable functional/immutable-data */
import { SerialQueue } from "../concurrency/SerialQueue.js";
import type { Minigame, RoundHost } from "../minigames/Minigame.js";
import type { Logger } from "../ports/Logger.js";
import type {
  LeaderboardView,
  LobbySummary,
  PlayerView,
  ServerEvent,
} from "../protocol/ServerEvent.js";
import type {
  AvatarShape,
  ConnectionId,
  GameNumber,
  LobbyCode,
  PlayerHandle,
  RandomSource,
  TimePoint,
  TournamentPhase,
} from "../typedefs.js";
import { DEFAULT_COLOR, DEFAULT_SHAPE, type Player } from "./Player.js";
import {
  ALL_GAMES,
  advancementCut,
  rankStandings,
  selectNextGame,
  type Standing,
} from "./TournamentRules.js";

/**
 * Everything the tournament knows about one player, keyed by the stable
 * handle. A reconnect only rebinds `connectionId` and `player`.
 */
export interface Participant {
  readonly handle: PlayerHandle;
  connectionId: ConnectionId | undefined;
  /** Latest connection's player, kept for display after a disconnect */
  player: Player;
  score: number;
  lastScoreAt: TimePoint | undefined;
}

export interface LeaderboardEntry extends Standing {
  readonly username: string;
  readonly color: string;
  readonly shape: AvatarShape;
  readonly connected: boolean;
}

export interface AdvancementResult {
  readonly advancing: readonly LeaderboardEntry[];
  readonly eliminated: readonly LeaderboardEntry[];
}

export interface LobbyOptions {
  readonly minCapacity: number;
  readonly maxCapacity: number;
  readonly logger?: Logger;
}

export function clampCapacity(capacity: number, min: number, max: number): number {
  return Math.max(min, Math.min(capacity, max));
}

export function toLeaderboardView(entry: LeaderboardEntry): LeaderboardView {
  return {
    player_id: entry.handle,
    username: entry.username,
    color: entry.color,
    shape: entry.shape,
    score: entry.score,
  };
}

export class Lobby implements RoundHost {
  readonly capacity: number;
  readonly hostHandle: PlayerHandle;

  #phase: TournamentPhase = "lobby";
  #roundNumber = 0;
  #currentGame: GameNumber | 0 = 0;
  #nextGame: GameNumber | undefined = undefined;
  #minigame: Minigame | undefined = undefined;
  #advancement: { readonly round: number; readonly result: AdvancementResult } | undefined;

  readonly #players = new Map<ConnectionId, Player>();
  readonly #participants = new Map<PlayerHandle, Participant>();
  #active: PlayerHandle[] = [];
  #spectators: PlayerHandle[] = [];
  #history: GameNumber[] = [];

  readonly #queue = new SerialQueue();
  readonly #logger: Logger | undefined;

  constructor(
    public readonly code: LobbyCode,
    host: Player,
    capacity: number,
    options: LobbyOptions,
  ) {
    this.capacity = clampCapacity(capacity, options.minCapacity, options.maxCapacity);
    this.hostHandle = host.username;
    this.#logger = options.logger;
    this.addPlayer(host);
  }

  /**
   * Serialization point for every read-modify-broadcast on this lobby.
   * Never call it again from inside a task: the queue is not reentrant.
   */
  exclusive<T>(task: () => Promise<T> | T): Promise<T> {
    return this.#queue.run(task);
  }

  // ---------------------------------------------------------------------------
  //  Membership
  // ---------------------------------------------------------------------------

  get size(): number {
    return this.#players.size;
  }

  get isFull(): boolean {
    return this.#players.size >= this.capacity;
  }

  get isEmpty(): boolean {
    return this.#players.size === 0;
  }

  get players(): readonly Player[] {
    return [...this.#players.values()];
  }

  getPlayer(connectionId: ConnectionId): Player | undefined {
    return this.#players.get(connectionId);
  }

  hasParticipant(handle: PlayerHandle): boolean {
    return this.#participants.has(handle);
  }

  getParticipant(handle: PlayerHandle): Readonly<Participant> | undefined {
    return this.#participants.get(handle);
  }

  /**
   * Adds a connection to the roster. Returns false, changing nothing, when the
   * lobby is full or the username is already live here. A username seen before
   * takes its participant record over, tournament standing included.
   */
  addPlayer(player: Player): boolean {
    if (this.#players.has(player.id)) {
      return true;
    }
    if (this.isFull) {
      return false;
    }
    for (const existing of this.#players.values()) {
      if (existing.username === player.username) {
        return false;
      }
    }

    this.#players.set(player.id, player);
    player.lobbyCode = this.code;
    player.isHost = player.username === this.hostHandle;

    const participant = this.#participants.get(player.username);
    if (participant) {
      participant.connectionId = player.id;
      participant.player = player;
    } else {
      this.#participants.set(player.username, {
        handle: player.username,
        connectionId: player.id,
        player,
        score: 0,
        lastScoreAt: undefined,
      });
    }
    return true;
  }

  /** Returns true when the roster is empty afterwards. */
  removePlayer(connectionId: ConnectionId): boolean {
    const player = this.#players.get(connectionId);
    if (player) {
      this.#players.delete(connectionId);
      player.lobbyCode = undefined;
      player.isHost = false;
      player.isReady = false;

      const participant = this.#participants.get(player.username);
      if (participant?.connectionId === connectionId) {
        participant.connectionId = undefined;
      }
    }
    return this.#players.size === 0;
  }

  get allReady(): boolean {
    return [...this.#players.values()].every((player) => player.isReady);
  }

  // ---------------------------------------------------------------------------
  //  Fan-out
  // ---------------------------------------------------------------------------

  broadcast(event: ServerEvent, excludeId?: ConnectionId): void {
    for (const player of [...this.#players.values()]) {
      if (player.id === excludeId) continue;
      this.#deliver(player, event);
    }
  }

  sendTo(handle: PlayerHandle, event: ServerEvent): void {
    const connectionId = this.#participants.get(handle)?.connectionId;
    if (connectionId === undefined) return;
    const player = this.#players.get(connectionId);
    if (player) this.#deliver(player, event);
  }

  sendToConnection(connectionId: ConnectionId, event: ServerEvent): void {
    const player = this.#players.get(connectionId);
    if (player) this.#deliver(player, event);
  }

  #deliver(player: Player, event: ServerEvent): void {
    try {
      player.channel.send(event);
    } catch (error) {
      this.#logger?.warn("Failed to deliver event", {
        lobbyCode: this.code,
        connectionId: player.id,
        type: event.type,
        error,
      });
    }
  }

  // ---------------------------------------------------------------------------
  //  Tournament state
  // ---------------------------------------------------------------------------

  get phase(): TournamentPhase {
    return this.#phase;
  }

  get roundNumber(): number {
    return this.#roundNumber;
  }

  get currentGame(): GameNumber | 0 {
    return this.#currentGame;
  }

  get nextGame(): GameNumber | undefined {
    return this.#nextGame;
  }

  get minigame(): Minigame | undefined {
    return this.#minigame;
  }

  get activePlayers(): readonly PlayerHandle[] {
    return this.#active;
  }

  get spectators(): readonly PlayerHandle[] {
    return this.#spectators;
  }

  get gameHistory(): readonly GameNumber[] {
    return this.#history;
  }

  get isInTournament(): boolean {
    return this.#phase !== "lobby" && this.#phase !== "finished";
  }

  isActivePlayer(handle: PlayerHandle): boolean {
    return this.#active.includes(handle);
  }

  /** Every connected player becomes active; previous tournament data is dropped. */
  beginTournament(): void {
    for (const [handle, participant] of [...this.#participants]) {
      if (participant.connectionId === undefined) {
        this.#participants.delete(handle);
        continue;
      }
      participant.score = 0;
      participant.lastScoreAt = undefined;
    }

    this.#active = [...this.#players.values()].map((player) => player.username);
    this.#spectators = [];
    this.#history = [];
    this.#roundNumber = 0;
    this.#currentGame = 0;
    this.#nextGame = undefined;
    this.#minigame = undefined;
    this.#advancement = undefined;
  }

  /** Picks the next game and records it in the history. */
  selectNextGame(random: RandomSource): GameNumber {
    const game = selectNextGame(this.#history, random, ALL_GAMES);
    this.#history.push(game);
    return game;
  }

  enterPreview(game: GameNumber): void {
    this.#roundNumber += 1;
    this.#phase = "preview";
    this.#nextGame = game;
  }

  /** Round scores start from zero for every participant, spectators included. */
  enterRunning(minigame: Minigame): void {
    for (const handle of [...this.#active, ...this.#spectators]) {
      const participant = this.#participants.get(handle);
      if (participant) {
        participant.score = 0;
        participant.lastScoreAt = undefined;
      }
    }
    this.#phase = "running";
    this.#currentGame = minigame.gameNumber;
    this.#nextGame = undefined;
    this.#minigame = minigame;
  }

  enterRoundEnd(nextGame: GameNumber | undefined): void {
    this.#phase = "round_end";
    this.#minigame = undefined;
    this.#currentGame = 0;
    this.#nextGame = nextGame;
  }

  finishTournament(): void {
    this.#phase = "finished";
    this.#minigame = undefined;
    this.#currentGame = 0;
    this.#nextGame = undefined;
    for (const player of this.#players.values()) {
      player.isReady = false;
    }
  }

  addScore(handle: PlayerHandle, delta: number, at: TimePoint): void {
    const participant = this.#participants.get(handle);
    if (!participant) return;
    participant.score += delta;
    participant.lastScoreAt = at;
  }

  // ---------------------------------------------------------------------------
  //  Ranking
  // ---------------------------------------------------------------------------

  getLeaderboard(): LeaderboardEntry[] {
    const handles = [...this.#active, ...this.#spectators];
    return rankStandings(handles.map((handle) => this.#entryFor(handle)));
  }

  /** Leaderboard as shown to clients: players currently offline are left out. */
  leaderboardView(): LeaderboardView[] {
    return this.getLeaderboard()
      .filter((entry) => entry.connected)
      .map(toLeaderboardView);
  }

  /**
   * Splits the active players at the round's cut: the top half (rounded up)
   * stays active, the rest become spectators. Calling it again in the same
   * round returns the first result unchanged.
   */
  advancePlayers(): AdvancementResult {
    if (this.#advancement?.round === this.#roundNumber) {
      return this.#advancement.result;
    }

    const activeSet = new Set(this.#active);
    const ranked = this.getLeaderboard().filter((entry) => activeSet.has(entry.handle));
    const cut = advancementCut(ranked.length);
    const result: AdvancementResult = {
      advancing: ranked.slice(0, cut),
      eliminated: ranked.slice(cut),
    };

    this.#active = result.advancing.map((entry) => entry.handle);
    this.#spectators.push(...result.eliminated.map((entry) => entry.handle));
    this.#advancement = { round: this.#roundNumber, result };
    return result;
  }

  #entryFor(handle: PlayerHandle): LeaderboardEntry {
    const participant = this.#participants.get(handle);
    const standing = this.#minigame?.standing(handle) ?? {
      score: participant?.score ?? 0,
      updatedAt: participant?.lastScoreAt,
    };

    return {
      handle,
      score: standing.score,
      updatedAt: standing.updatedAt,
      username: participant?.player.username ?? handle,
      color: participant?.player.color ?? DEFAULT_COLOR,
      shape: participant?.player.shape ?? DEFAULT_SHAPE,
      connected: participant?.connectionId !== undefined,
    };
  }

  // ---------------------------------------------------------------------------
  //  Views
  // ---------------------------------------------------------------------------

  roster(): PlayerView[] {
    return [...this.#players.values()].map((player) => player.toView());
  }

  summary(): LobbySummary {
    return {
      id: this.code,
      host_name: this.hostHandle,
      player_count: this.#players.size,
      max_players: this.capacity,
      is_full: this.isFull,
      phase: this.#phase,
    };
  }
}
