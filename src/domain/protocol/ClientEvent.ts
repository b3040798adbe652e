import { ClientEventDecodeError } from "../errors/ClientEventDecodeError.js";
import { isAvatarShape, type AvatarShape } from "../typedefs.js";

/**
 * Minigame submissions keep their payload loosely typed: the running
 * minigame validates them and answers malformed ones itself.
 */
export type MinigameInput =
  | { readonly type: "SUBMIT_ANSWER"; readonly answer: unknown }
  | { readonly type: "SUBMIT_WORD"; readonly currentWord: unknown; readonly typedWord: unknown }
  | {
      readonly type: "SUBMIT_RACE_ANSWER";
      readonly choice: unknown;
      readonly isCorrect: unknown;
      readonly questionId?: unknown;
    };

export type ClientEvent =
  | { readonly type: "CREATE_LOBBY"; readonly capacity: number | undefined }
  | { readonly type: "JOIN_LOBBY"; readonly lobbyId: string }
  | {
      readonly type: "UPDATE_PROFILE";
      readonly color: string | undefined;
      readonly shape: AvatarShape | undefined;
      readonly username: string | undefined;
    }
  | { readonly type: "TOGGLE_READY" }
  | { readonly type: "LEAVE_LOBBY" }
  | { readonly type: "START_GAME"; readonly testMode: boolean }
  | { readonly type: "CHAT_MESSAGE"; readonly message: string }
  | MinigameInput;

type Fields = Readonly<Record<string, unknown>>;

function isRecord(value: unknown): value is Fields {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parses one inbound message. Fields may sit at the top level next to `type`
 * or inside a `payload` object.
 */
export function decodeClientEvent(raw: string): ClientEvent {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw ClientEventDecodeError.because(["Message is not valid JSON"]);
  }

  if (!isRecord(parsed)) {
    throw ClientEventDecodeError.because(["Message must be a JSON object"]);
  }

  const type = parsed["type"];
  if (typeof type !== "string" || type.length === 0) {
    throw ClientEventDecodeError.because(["Message must include a string type"]);
  }

  const nested = parsed["payload"];
  const fields: Fields = isRecord(nested) ? { ...parsed, ...nested } : parsed;

  switch (type) {
    case "CREATE_LOBBY":
      return { type, capacity: optionalInteger(fields, "capacity") };
    case "JOIN_LOBBY":
      return { type, lobbyId: requiredString(fields, "lobby_id").trim().toUpperCase() };
    case "UPDATE_PROFILE":
      return decodeProfileUpdate(fields);
    case "TOGGLE_READY":
    case "LEAVE_LOBBY":
      return { type };
    case "START_GAME":
      return { type, testMode: fields["test_mode"] === true };
    case "CHAT_MESSAGE":
      return { type, message: requiredString(fields, "message") };
    case "SUBMIT_ANSWER":
      return { type, answer: fields["answer"] };
    case "SUBMIT_WORD":
      return { type, currentWord: fields["current_word"], typedWord: fields["typed_word"] };
    case "SUBMIT_RACE_ANSWER":
      return {
        type,
        choice: fields["choice"],
        isCorrect: fields["is_correct"],
        questionId: fields["question_id"],
      };
    default:
      throw ClientEventDecodeError.because([`Unknown event type: ${type}`]);
  }
}

function decodeProfileUpdate(fields: Fields): ClientEvent {
  const issues: string[] = [];
  const color = fields["color"];
  const shape = fields["shape"];
  const username = fields["username"];

  if (color !== undefined && (typeof color !== "string" || !HEX_COLOR.test(color))) {
    issues.push("color must be a hex value such as #4a148c");
  }
  if (shape !== undefined && !isAvatarShape(shape)) {
    issues.push("shape must be one of square, circle, triangle, star, hexagon");
  }
  if (username !== undefined && (typeof username !== "string" || !USERNAME.test(username))) {
    issues.push("username must be 3-20 letters, digits, dashes or underscores");
  }
  if (issues.length > 0) {
    throw ClientEventDecodeError.because(issues);
  }

  return {
    type: "UPDATE_PROFILE",
    color: typeof color === "string" ? color : undefined,
    shape: isAvatarShape(shape) ? shape : undefined,
    username: typeof username === "string" ? username : undefined,
  };
}

function requiredString(fields: Fields, key: string): string {
  const value = fields[key];
  if (typeof value !== "string" || value.trim().length === 0) {
    throw ClientEventDecodeError.because([`${key} must be a non-empty string`]);
  }
  return value;
}

function optionalInteger(fields: Fields, key: string): number | undefined {
  const value = fields[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  const numeric = typeof value === "string" ? Number(value) : value;
  if (typeof numeric !== "number" || !Number.isInteger(numeric)) {
    throw ClientEventDecodeError.because([`${key} must be a whole number`]);
  }
  return numeric;
}

const HEX_COLOR = /^#[0-9a-fA-F]{6}$/;
export const USERNAME = /^[A-Za-z0-9_-]{3,20}$/;
