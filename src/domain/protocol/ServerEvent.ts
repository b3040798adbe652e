import type { PlayerProfile } from "../ports/ProfileStore.js";
import type { AvatarShape, ConnectionId, GameNumber, LobbyCode, PlayerHandle, TournamentPhase } from "../typedefs.js";

/**
 * `id` names the connection. `handle` is the key used in standings, race
 * moves and round results.
 */
export interface PlayerView {
  readonly id: ConnectionId;
  readonly handle: PlayerHandle;
  readonly username: string;
  readonly color: string;
  readonly shape: AvatarShape;
  readonly is_ready: boolean;
  readonly is_host: boolean;
}

export interface LobbySummary {
  readonly id: LobbyCode;
  readonly host_name: string;
  readonly player_count: number;
  readonly max_players: number;
  readonly is_full: boolean;
  readonly phase: TournamentPhase;
}

export interface LeaderboardView {
  readonly player_id: PlayerHandle;
  readonly username: string;
  readonly color: string;
  readonly shape: AvatarShape;
  readonly score: number;
}

export interface GameInfo {
  readonly name: string;
  readonly description: string;
  readonly duration: number;
}

export interface ProfileView {
  readonly username: string;
  readonly color: string;
  readonly shape: AvatarShape;
  readonly wins: number;
  readonly losses: number;
  readonly total_games: number;
}

export interface TriviaQuestionView {
  readonly id: string;
  readonly text: string;
  readonly options: readonly string[];
}

export interface RoundStart {
  /** Seconds */
  readonly duration: number;
  readonly round_number: number;
}

/** Every event the server sends; the wire form is `{ type, payload }`. */
export type ServerEvent =
  | {
      readonly type: "WELCOME";
      readonly payload: {
        readonly player_id: ConnectionId;
        readonly handle: PlayerHandle;
        readonly username: string;
        readonly profile: ProfileView;
      };
    }
  | { readonly type: "PROFILE_ACK"; readonly payload: { readonly username: string; readonly color: string; readonly shape: AvatarShape } }
  | { readonly type: "LOBBY_JOINED"; readonly payload: LobbySummary & { readonly capacity: number; readonly rejoined: boolean } }
  | { readonly type: "LOBBY_LEFT"; readonly payload: { readonly id: LobbyCode } }
  | { readonly type: "ROSTER_UPDATE"; readonly payload: { readonly players: readonly PlayerView[] } }
  | { readonly type: "CHAT_INCOMING"; readonly payload: { readonly sender: string; readonly text: string } }
  | {
      readonly type: "GAME_PREVIEW";
      readonly payload: { readonly game_number: GameNumber; readonly game_info: GameInfo; readonly round_number: number };
    }
  | { readonly type: "GAME_1_START"; readonly payload: RoundStart }
  | { readonly type: "GAME_2_START"; readonly payload: RoundStart }
  | { readonly type: "NEW_QUESTION"; readonly payload: { readonly id: string; readonly text: string } }
  | { readonly type: "NEW_WORDS"; readonly payload: { readonly words: readonly string[]; readonly next_index: number } }
  | {
      readonly type: "GAME_3_START";
      readonly payload: {
        readonly duration: number;
        readonly round_number: number;
        readonly questions: readonly TriviaQuestionView[];
        readonly total_steps: number;
        readonly positions: Readonly<Record<PlayerHandle, number>>;
        /** Index into `questions` of the recipient's next question */
        readonly next_index: number;
      };
    }
  | {
      readonly type: "ANSWER_RESULT";
      readonly payload: { readonly correct: boolean; readonly new_pos?: number; readonly next_index?: number };
    }
  | { readonly type: "SCORE_UPDATE"; readonly payload: { readonly leaderboard: readonly LeaderboardView[] } }
  | { readonly type: "PLAYER_MOVED"; readonly payload: { readonly player_id: PlayerHandle; readonly new_pos: number } }
  | { readonly type: "PLAYER_FINISHED"; readonly payload: { readonly rank: number; readonly bonus: number } }
  | {
      readonly type: "ROUND_END";
      readonly payload: {
        readonly round_number: number;
        readonly advancing: readonly LeaderboardView[];
        readonly eliminated: readonly LeaderboardView[];
        readonly next_game: GameNumber | null;
      };
    }
  | { readonly type: "TOURNAMENT_WINNER"; readonly payload: { readonly winner: string; readonly player: LeaderboardView | null } }
  | { readonly type: "ERROR"; readonly payload: { readonly msg: string } };

export function errorEvent(msg: string): ServerEvent {
  return { type: "ERROR", payload: { msg } };
}

export function toProfileView(profile: PlayerProfile): ProfileView {
  return {
    username: profile.username,
    color: profile.color,
    shape: profile.shape,
    wins: profile.wins,
    losses: profile.losses,
    total_games: profile.totalGames,
  };
}
