import type { GameConfig } from "../GameConfig.js";
import type { GameInfo } from "../protocol/ServerEvent.js";
import type { GameNumber, RandomSource } from "../typedefs.js";
import { MathQuiz } from "./MathQuiz.js";
import type { Minigame, RoundHost } from "./Minigame.js";
import { SpeedTyping } from "./SpeedTyping.js";
import { TriviaRace } from "./TriviaRace.js";

export function gameInfo(game: GameNumber, config: GameConfig): GameInfo {
  switch (game) {
    case 1:
      return {
        name: "Math Quiz",
        description: "Solve as many sums as you can. Every right answer is a point.",
        duration: Math.round(config.mathDurationMs / 1000),
      };
    case 2:
      return {
        name: "Speed Typing",
        description: "Type the shared word list in order. Every correct word is a point.",
        duration: Math.round(config.typingDurationMs / 1000),
      };
    case 3:
      return {
        name: "Trivia Race",
        description: `Right answers move you forward, wrong ones back. First to step ${config.raceFinishLine} wins the bonus.`,
        duration: Math.round(config.raceDurationMs / 1000),
      };
  }
}

export function createMinigame(
  game: GameNumber,
  host: RoundHost,
  config: GameConfig,
  random: RandomSource,
): Minigame {
  switch (game) {
    case 1:
      return new MathQuiz(host, config, random);
    case 2:
      return new SpeedTyping(host, config, random);
    case 3:
      return new TriviaRace(host, config, random);
  }
}
