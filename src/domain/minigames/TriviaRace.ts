import { shuffle } from "../entities/TournamentRules.js";
import type { GameConfig } from "../GameConfig.js";
import type { MinigameInput } from "../protocol/ClientEvent.js";
import { errorEvent, type ServerEvent } from "../protocol/ServerEvent.js";
import type { PlayerHandle, RandomSource, TimePoint } from "../typedefs.js";
import TRIVIA_POOL from "./data/trivia.json";
import type { InputOutcome, Minigame, MinigameStanding, RoundHost } from "./Minigame.js";

type RaceAnswer = Extract<MinigameInput, { type: "SUBMIT_RACE_ANSWER" }>;

export interface TriviaQuestion {
  readonly id: string;
  readonly text: string;
  readonly options: readonly string[];
  /** Index into `options`; never sent to clients */
  readonly answer: number;
}

/** One step forward on a correct answer, one back otherwise, kept on the track. */
export function stepRacePosition(position: number, correct: boolean, finishLine: number): number {
  const next = correct ? position + 1 : position - 1;
  return Math.max(0, Math.min(next, finishLine));
}

export function finishBonus(rank: number, bonuses: readonly number[]): number {
  if (bonuses.length === 0 || rank < 1) return 0;
  return bonuses[Math.min(rank, bonuses.length) - 1] ?? 0;
}

/**
 * Multiple-choice race along a bounded track. Each player answers the shuffled
 * pool in order; the answer key stays on the server. Every start, sync and
 * answer result carries `next_index`, the player's place in that order, and an
 * answer may name its `question_id` to pin the grading to that question.
 */
export class TriviaRace implements Minigame {
  readonly gameNumber = 3 as const;
  readonly durationMs: number;

  #active = false;
  #questions: readonly TriviaQuestion[] = [];
  readonly #positions = new Map<PlayerHandle, number>();
  readonly #movedAt = new Map<PlayerHandle, TimePoint>();
  readonly #cursors = new Map<PlayerHandle, number>();
  readonly #finishers: PlayerHandle[] = [];

  constructor(
    private readonly host: RoundHost,
    private readonly config: GameConfig,
    private readonly random: RandomSource,
    private readonly pool: readonly TriviaQuestion[] = TRIVIA_POOL,
  ) {
    this.durationMs = config.raceDurationMs;
  }

  get isActive(): boolean {
    return this.#active;
  }

  get finishers(): readonly PlayerHandle[] {
    return this.#finishers;
  }

  positionOf(handle: PlayerHandle): number | undefined {
    return this.#positions.get(handle);
  }

  questionFor(handle: PlayerHandle): TriviaQuestion | undefined {
    const cursor = this.#cursors.get(handle);
    if (cursor === undefined) return undefined;
    return this.#questions[this.#wrap(cursor)];
  }

  start(_at: TimePoint): void {
    this.#active = true;
    this.#questions = shuffle(this.pool, this.random);
    for (const handle of this.host.activePlayers) {
      this.#positions.set(handle, 0);
      this.#cursors.set(handle, 0);
    }
    this.host.broadcast(this.#startEvent(0));
  }

  handleInput(handle: PlayerHandle, input: MinigameInput, at: TimePoint): InputOutcome {
    if (!this.#active || input.type !== "SUBMIT_RACE_ANSWER") return "ignored";
    if (!this.host.isActivePlayer(handle)) return "ignored";

    const position = this.#positions.get(handle);
    if (position === undefined || this.#finishers.includes(handle)) return "ignored";

    const index = this.#answeredIndex(handle, input.questionId);
    if (index === undefined) {
      this.host.sendTo(handle, errorEvent("Unknown race question"));
      return "rejected";
    }

    const correct = this.#grade(index, input);
    if (correct === undefined) {
      this.host.sendTo(handle, errorEvent("Race answers need a valid choice index"));
      return "rejected";
    }

    const finishLine = this.config.raceFinishLine;
    const next = stepRacePosition(position, correct, finishLine);
    const nextIndex = this.#wrap(index + 1);
    this.#positions.set(handle, next);
    this.#cursors.set(handle, nextIndex);

    this.host.sendTo(handle, {
      type: "ANSWER_RESULT",
      payload: { correct, new_pos: next, next_index: nextIndex },
    });

    if (next !== position) {
      this.#movedAt.set(handle, at);
      this.host.broadcast({ type: "PLAYER_MOVED", payload: { player_id: handle, new_pos: next } });
    }

    if (next >= finishLine) {
      this.#finishers.push(handle);
      const rank = this.#finishers.length;
      const bonus = finishBonus(rank, this.config.raceFinishBonuses);
      this.host.addScore(handle, bonus, at);
      this.host.sendTo(handle, { type: "PLAYER_FINISHED", payload: { rank, bonus } });
    }
    return "applied";
  }

  standing(handle: PlayerHandle): MinigameStanding | undefined {
    const position = this.#positions.get(handle);
    if (position === undefined) return undefined;
    return { score: position, updatedAt: this.#movedAt.get(handle) };
  }

  /** Every player still in the tournament has crossed the line. */
  isComplete(): boolean {
    return this.host.activePlayers.every((handle) => this.#finishers.includes(handle));
  }

  sync(handle: PlayerHandle): void {
    if (!this.#positions.has(handle)) return;
    this.host.sendTo(handle, this.#startEvent(this.#wrap(this.#cursors.get(handle) ?? 0)));
  }

  stop(): void {
    this.#active = false;
  }

  #wrap(cursor: number): number {
    return this.#questions.length === 0 ? 0 : cursor % this.#questions.length;
  }

  /** The named question when the client sent one, else the player's cursor. */
  #answeredIndex(handle: PlayerHandle, questionId: unknown): number | undefined {
    if (questionId === undefined) return this.#wrap(this.#cursors.get(handle) ?? 0);
    const index = this.#questions.findIndex((question) => question.id === questionId);
    return index === -1 ? undefined : index;
  }

  #grade(index: number, input: RaceAnswer): boolean | undefined {
    if (this.config.trustClientRaceGrading) {
      return typeof input.isCorrect === "boolean" ? input.isCorrect : undefined;
    }

    const question = this.#questions[index];
    const { choice } = input;
    if (!question || typeof choice !== "number" || !Number.isInteger(choice)) return undefined;
    if (choice < 0 || choice >= question.options.length) return undefined;
    return choice === question.answer;
  }

  #startEvent(nextIndex: number): ServerEvent {
    return {
      type: "GAME_3_START",
      payload: {
        duration: Math.round(this.durationMs / 1000),
        round_number: this.host.roundNumber,
        questions: this.#questions.map(({ id, text, options }) => ({ id, text, options })),
        total_steps: this.config.raceFinishLine,
        positions: Object.fromEntries(this.#positions),
        next_index: nextIndex,
      },
    };
  }
}
