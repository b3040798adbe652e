import type { GameConfig } from "../GameConfig.js";
import type { MinigameInput } from "../protocol/ClientEvent.js";
import { errorEvent, type ServerEvent } from "../protocol/ServerEvent.js";
import type { PlayerHandle, RandomSource, TimePoint } from "../typedefs.js";
import WORD_POOL from "./data/words.json";
import type { InputOutcome, Minigame, MinigameStanding, RoundHost } from "./Minigame.js";

export function normalizeWord(word: string): string {
  return word.trim().toLowerCase();
}

export function checkWord(currentWord: string, typedWord: string): boolean {
  const target = normalizeWord(currentWord);
  return target.length > 0 && target === normalizeWord(typedWord);
}

/** Draws `count` words with repetition. */
export function generateWordList(
  count: number,
  random: RandomSource,
  pool: readonly string[] = WORD_POOL,
): string[] {
  if (pool.length === 0) return [];
  return Array.from({ length: count }, () => {
    const index = Math.floor(random() * pool.length);
    return pool[index] ?? pool[0] ?? "";
  });
}

/**
 * Everyone types the same word list. Each player works through it in order;
 * a correct word scores a point and refreshes the shared leaderboard.
 */
export class SpeedTyping implements Minigame {
  readonly gameNumber = 2 as const;
  readonly durationMs: number;

  #active = false;
  #words: readonly string[] = [];
  readonly #cursors = new Map<PlayerHandle, number>();
  readonly #wordCount: number;

  constructor(
    private readonly host: RoundHost,
    config: GameConfig,
    private readonly random: RandomSource,
    private readonly pool: readonly string[] = WORD_POOL,
  ) {
    this.durationMs = config.typingDurationMs;
    this.#wordCount = config.typingWordCount;
  }

  get isActive(): boolean {
    return this.#active;
  }

  get words(): readonly string[] {
    return this.#words;
  }

  cursorOf(handle: PlayerHandle): number | undefined {
    return this.#cursors.get(handle);
  }

  start(_at: TimePoint): void {
    this.#active = true;
    this.#words = generateWordList(this.#wordCount, this.random, this.pool);
    for (const handle of this.host.activePlayers) {
      this.#cursors.set(handle, 0);
    }

    this.host.broadcast(this.#startEvent());
    this.host.broadcast({ type: "NEW_WORDS", payload: { words: this.#words, next_index: 0 } });
  }

  handleInput(handle: PlayerHandle, input: MinigameInput, at: TimePoint): InputOutcome {
    if (!this.#active || input.type !== "SUBMIT_WORD") return "ignored";
    if (!this.host.isActivePlayer(handle)) return "ignored";

    const cursor = this.#cursors.get(handle);
    if (cursor === undefined) return "ignored";

    const { currentWord, typedWord } = input;
    if (typeof currentWord !== "string" || typeof typedWord !== "string") {
      this.host.sendTo(handle, errorEvent("current_word and typed_word must be strings"));
      return "rejected";
    }

    const expected = this.#words[cursor];
    if (expected === undefined) return "ignored";

    if (normalizeWord(currentWord) !== normalizeWord(expected)) {
      this.host.sendTo(handle, errorEvent(`Out of sequence: the next word is "${expected}"`));
      return "rejected";
    }

    this.#cursors.set(handle, cursor + 1);
    const correct = checkWord(currentWord, typedWord);
    if (correct) {
      this.host.addScore(handle, 1, at);
    }

    this.host.sendTo(handle, { type: "ANSWER_RESULT", payload: { correct } });
    if (correct) {
      this.host.broadcast({
        type: "SCORE_UPDATE",
        payload: { leaderboard: this.host.leaderboardView() },
      });
    }
    return "applied";
  }

  standing(_handle: PlayerHandle): MinigameStanding | undefined {
    return undefined;
  }

  isComplete(): boolean {
    return false;
  }

  sync(handle: PlayerHandle): void {
    const cursor = this.#cursors.get(handle);
    if (cursor === undefined) return;
    this.host.sendTo(handle, this.#startEvent());
    this.host.sendTo(handle, {
      type: "NEW_WORDS",
      payload: { words: this.#words, next_index: cursor },
    });
  }

  stop(): void {
    this.#active = false;
  }

  #startEvent(): ServerEvent {
    return {
      type: "GAME_2_START",
      payload: {
        duration: Math.round(this.durationMs / 1000),
        round_number: this.host.roundNumber,
      },
    };
  }
}
