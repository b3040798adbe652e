import type { GameConfig } from "../GameConfig.js";
import type { MinigameInput } from "../protocol/ClientEvent.js";
import { errorEvent, type ServerEvent } from "../protocol/ServerEvent.js";
import type { PlayerHandle, RandomSource, TimePoint } from "../typedefs.js";
import type { InputOutcome, Minigame, MinigameStanding, RoundHost } from "./Minigame.js";

export type MathOperation = "+" | "-";

export interface MathQuestion {
  readonly id: string;
  readonly text: string;
  readonly answer: number;
}

const MIN_OPERAND = 1;
const MAX_OPERAND = 20;
const WHOLE_NUMBER = /^\s*[+-]?\d+\s*$/;

/** Subtraction puts the larger operand first so the answer is never negative. */
export function buildMathQuestion(
  id: string,
  num1: number,
  num2: number,
  operation: MathOperation,
): MathQuestion {
  if (operation === "+") {
    return { id, text: `${num1} + ${num2}`, answer: num1 + num2 };
  }
  const [high, low] = num1 < num2 ? [num2, num1] : [num1, num2];
  return { id, text: `${high} - ${low}`, answer: high - low };
}

export function generateMathQuestion(id: string, random: RandomSource): MathQuestion {
  const span = MAX_OPERAND - MIN_OPERAND + 1;
  const num1 = MIN_OPERAND + Math.floor(random() * span);
  const num2 = MIN_OPERAND + Math.floor(random() * span);
  const operation: MathOperation = random() < 0.5 ? "+" : "-";
  return buildMathQuestion(id, num1, num2, operation);
}

/** Accepts integers and integer strings ("7", " -3 "); anything else is undefined. */
export function parseWholeNumber(value: unknown): number | undefined {
  if (typeof value === "number") {
    return Number.isInteger(value) ? value : undefined;
  }
  if (typeof value === "string" && WHOLE_NUMBER.test(value)) {
    return Number.parseInt(value, 10);
  }
  return undefined;
}

/**
 * Continuous-flow arithmetic: everyone starts on the same question, and each
 * correct answer earns a point and a fresh question for that player alone.
 */
export class MathQuiz implements Minigame {
  readonly gameNumber = 1 as const;
  readonly durationMs: number;

  #active = false;
  #sequence = 0;
  readonly #questions = new Map<PlayerHandle, MathQuestion>();

  constructor(
    private readonly host: RoundHost,
    config: GameConfig,
    private readonly random: RandomSource,
  ) {
    this.durationMs = config.mathDurationMs;
  }

  get isActive(): boolean {
    return this.#active;
  }

  questionFor(handle: PlayerHandle): MathQuestion | undefined {
    return this.#questions.get(handle);
  }

  start(_at: TimePoint): void {
    this.#active = true;
    this.host.broadcast(this.#startEvent());

    const first = this.#nextQuestion();
    for (const handle of this.host.activePlayers) {
      this.#questions.set(handle, first);
      this.host.sendTo(handle, questionEvent(first));
    }
  }

  handleInput(handle: PlayerHandle, input: MinigameInput, at: TimePoint): InputOutcome {
    if (!this.#active || input.type !== "SUBMIT_ANSWER") return "ignored";
    if (!this.host.isActivePlayer(handle)) return "ignored";

    const question = this.#questions.get(handle);
    if (!question) return "ignored";

    const value = parseWholeNumber(input.answer);
    if (value === undefined) {
      this.host.sendTo(handle, errorEvent("Answer must be a whole number"));
      return "rejected";
    }

    const correct = value === question.answer;
    if (correct) {
      this.host.addScore(handle, 1, at);
    }
    this.host.sendTo(handle, { type: "ANSWER_RESULT", payload: { correct } });

    if (correct) {
      const next = this.#nextQuestion();
      this.#questions.set(handle, next);
      this.host.sendTo(handle, questionEvent(next));
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
    const question = this.#questions.get(handle);
    if (!question) return;
    this.host.sendTo(handle, this.#startEvent());
    this.host.sendTo(handle, questionEvent(question));
  }

  stop(): void {
    this.#active = false;
  }

  #nextQuestion(): MathQuestion {
    this.#sequence += 1;
    return generateMathQuestion(`r${this.host.roundNumber}-q${this.#sequence}`, this.random);
  }

  #startEvent(): ServerEvent {
    return {
      type: "GAME_1_START",
      payload: {
        duration: Math.round(this.durationMs / 1000),
        round_number: this.host.roundNumber,
      },
    };
  }
}

function questionEvent(question: MathQuestion): ServerEvent {
  return { type: "NEW_QUESTION", payload: { id: question.id, text: question.text } };
}
