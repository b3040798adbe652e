export interface GameConfig {
  readonly minCapacity: number;
  readonly maxCapacity: number;
  readonly defaultCapacity: number;
  readonly minPlayersToStart: number;
  readonly previewDurationMs: number;
  readonly intermissionDurationMs: number;
  readonly mathDurationMs: number;
  readonly typingDurationMs: number;
  readonly raceDurationMs: number;
  /** Tournament ends after this many elimination rounds */
  readonly eliminationRounds: number;
  readonly typingWordCount: number;
  readonly raceFinishLine: number;
  /** Finish bonus by rank; the last entry applies to every later finisher */
  readonly raceFinishBonuses: readonly number[];
  /** Lets the host skip the all-ready check with START_GAME{test_mode} */
  readonly allowTestMode: boolean;
  /** Accept the client's own is_correct flag in the trivia race */
  readonly trustClientRaceGrading: boolean;
  readonly chatMessageMaxLength: number;
}

export type GameConfigOverrides = Partial<GameConfig>;

export function createGameConfig(overrides: GameConfigOverrides = {}): GameConfig {
  return {
    minCapacity: overrides.minCapacity ?? 5,
    maxCapacity: overrides.maxCapacity ?? 50,
    defaultCapacity: overrides.defaultCapacity ?? 10,
    minPlayersToStart: overrides.minPlayersToStart ?? 2,
    previewDurationMs: overrides.previewDurationMs ?? 5_000,
    intermissionDurationMs: overrides.intermissionDurationMs ?? 5_000,
    mathDurationMs: overrides.mathDurationMs ?? 20_000,
    typingDurationMs: overrides.typingDurationMs ?? 30_000,
    raceDurationMs: overrides.raceDurationMs ?? 90_000,
    eliminationRounds: overrides.eliminationRounds ?? 3,
    typingWordCount: overrides.typingWordCount ?? 50,
    raceFinishLine: overrides.raceFinishLine ?? 10,
    raceFinishBonuses: overrides.raceFinishBonuses ?? [50, 30, 15, 5],
    allowTestMode: overrides.allowTestMode ?? false,
    trustClientRaceGrading: overrides.trustClientRaceGrading ?? false,
    chatMessageMaxLength: overrides.chatMessageMaxLength ?? 200,
  };
}
