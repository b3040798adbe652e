import type { ClientEvent } from "../protocol/ClientEvent.js";
import type { ConnectionId, TimePoint } from "../typedefs.js";
import type { Command } from "./Command.js";
import { CreateLobby } from "./CreateLobby.js";
import { JoinLobby } from "./JoinLobby.js";
import { LeaveLobby } from "./LeaveLobby.js";
import { SendChat } from "./SendChat.js";
import { StartGame } from "./StartGame.js";
import { SubmitMinigameInput } from "./SubmitMinigameInput.js";
import { ToggleReady } from "./ToggleReady.js";
import { UpdateProfile } from "./UpdateProfile.js";

export function commandFromEvent(
  event: ClientEvent,
  connectionId: ConnectionId,
  at: TimePoint,
): Command {
  switch (event.type) {
    case "CREATE_LOBBY":
      return new CreateLobby(connectionId, event.capacity, at);
    case "JOIN_LOBBY":
      return new JoinLobby(connectionId, event.lobbyId, at);
    case "UPDATE_PROFILE":
      return new UpdateProfile(
        connectionId,
        { color: event.color, shape: event.shape, username: event.username },
        at,
      );
    case "TOGGLE_READY":
      return new ToggleReady(connectionId, at);
    case "LEAVE_LOBBY":
      return new LeaveLobby(connectionId, at);
    case "START_GAME":
      return new StartGame(connectionId, event.testMode, at);
    case "CHAT_MESSAGE":
      return new SendChat(connectionId, event.message, at);
    case "SUBMIT_ANSWER":
    case "SUBMIT_WORD":
    case "SUBMIT_RACE_ANSWER":
      return new SubmitMinigameInput(connectionId, event, at);
  }
}
